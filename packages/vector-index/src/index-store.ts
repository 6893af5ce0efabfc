import { randomBytes } from "node:crypto";
import { mkdir, readdir, rm } from "node:fs/promises";
import { join, posix } from "node:path";
import { z } from "zod";
import type { IndexManifest } from "@lexrag/types";
import { IndexUnavailableError, ValidationError, errorMessage } from "@lexrag/errors";
import { createSilentLogger, type Logger } from "@lexrag/logger";
import { decodeChunks, encodeChunks } from "./chunk-store.js";
import { INDEX_FORMAT_VERSION, decodeIndex, encodeIndex } from "./codec.js";
import type { FlatL2Index } from "./flat-index.js";
import { readFileIfExists, sha256, writeFileAtomic } from "./fs-utils.js";

export const MANIFEST_FILE = "manifest.json";
export const INDEX_FILE = "index.bin";
export const CHUNKS_FILE = "chunks.json";
export const LEGACY_GENERATION = "legacy";

const GENERATION_PREFIX = "gen-";

const manifestSchema = z.object({
  formatVersion: z.number().int(),
  generation: z.string().min(1),
  indexFile: z.string().min(1),
  chunksFile: z.string().min(1),
  rowCount: z.number().int().nonnegative(),
  dimensions: z.number().int().positive(),
  createdAt: z.string(),
  checksums: z.object({
    index: z.string(),
    chunks: z.string(),
  }),
});

export interface IndexStoreOptions {
  dir: string;
  /** Published generations kept on disk, the current one included. Default 2. */
  keepGenerations?: number;
  logger?: Logger;
  /** Override generation naming; ids must sort chronologically. */
  generationId?: () => string;
}

export interface StoredPair {
  index: FlatL2Index;
  chunks: string[];
  generation: string;
  /** `null` for a pair read from the legacy flat layout. */
  manifest: IndexManifest | null;
}

export interface StoreDescription {
  dir: string;
  manifestPath: string;
  generation: string | null;
  indexPath: string | null;
  chunksPath: string | null;
}

let sequence = 0;

function defaultGenerationId(): string {
  const stamp = new Date().toISOString().replace(/[-:.]/g, "");
  sequence = (sequence + 1) % 10_000;
  return `${GENERATION_PREFIX}${stamp}-${String(sequence).padStart(4, "0")}-${randomBytes(3).toString("hex")}`;
}

/**
 * Persists an index and its chunk list as one unit.
 *
 * Each publish writes a fresh `gen-<id>/` directory and then atomically
 * replaces `manifest.json` to point at it. The manifest is the only thing
 * that makes a pair current, so a reader never sees an index from one build
 * next to chunks from another.
 */
export class IndexStore {
  readonly dir: string;
  private readonly keepGenerations: number;
  private readonly logger: Logger;
  private readonly generationId: () => string;
  private current: { generation: string; indexPath: string; chunksPath: string } | null = null;

  constructor(options: IndexStoreOptions) {
    this.dir = options.dir;
    this.keepGenerations = Math.max(1, options.keepGenerations ?? 2);
    this.logger = options.logger ?? createSilentLogger();
    this.generationId = options.generationId ?? defaultGenerationId;
  }

  get manifestPath(): string {
    return join(this.dir, MANIFEST_FILE);
  }

  async publish(index: FlatL2Index, chunks: readonly string[]): Promise<IndexManifest> {
    if (chunks.length !== index.rowCount) {
      throw new ValidationError(
        `Refusing to publish ${String(chunks.length)} chunks against ${String(index.rowCount)} index rows`,
        {},
        { details: { chunks: chunks.length, rows: index.rowCount } },
      );
    }

    const generation = this.generationId();
    const genDir = join(this.dir, generation);
    // Manifest paths use "/" on every platform so the directory can be moved between hosts.
    const indexFile = posix.join(generation, INDEX_FILE);
    const chunksFile = posix.join(generation, CHUNKS_FILE);

    await mkdir(this.dir, { recursive: true });
    // Not recursive: an existing directory with this name is not ours to touch.
    await mkdir(genDir);

    let manifest: IndexManifest;
    try {
      const indexBytes = encodeIndex(index);
      const chunkText = encodeChunks(chunks);

      await writeFileAtomic(join(this.dir, indexFile), indexBytes);
      await writeFileAtomic(join(this.dir, chunksFile), chunkText);

      manifest = {
        formatVersion: INDEX_FORMAT_VERSION,
        generation,
        indexFile,
        chunksFile,
        rowCount: index.rowCount,
        dimensions: index.dimensions,
        createdAt: new Date().toISOString(),
        checksums: {
          index: sha256(indexBytes),
          chunks: sha256(chunkText),
        },
      };

      await writeFileAtomic(this.manifestPath, JSON.stringify(manifest, null, 2));
    } catch (err) {
      await rm(genDir, { recursive: true, force: true });
      throw err;
    }

    this.remember(manifest);
    this.logger.info(
      { generation, rows: manifest.rowCount, dimensions: manifest.dimensions },
      "Published index generation",
    );

    await this.prune(generation);
    return manifest;
  }

  async load(): Promise<StoredPair> {
    const manifest = await this.readManifest();
    if (manifest === null) {
      return this.loadLegacy();
    }

    const indexPath = join(this.dir, manifest.indexFile);
    const chunksPath = join(this.dir, manifest.chunksFile);

    const indexBytes = await this.readVerified(indexPath, manifest.checksums.index);
    const chunkBytes = await this.readVerified(chunksPath, manifest.checksums.chunks);

    const index = decodeIndex(indexBytes, indexPath);
    const chunks = decodeChunks(chunkBytes.toString("utf8"), chunksPath);

    if (index.rowCount !== manifest.rowCount || index.dimensions !== manifest.dimensions) {
      throw new IndexUnavailableError(`Index ${indexPath} disagrees with its manifest`, {
        details: {
          manifest: { rows: manifest.rowCount, dimensions: manifest.dimensions },
          file: { rows: index.rowCount, dimensions: index.dimensions },
        },
      });
    }
    assertParallel(index, chunks, manifest.generation);

    this.remember(manifest);
    return { index, chunks, generation: manifest.generation, manifest };
  }

  /** The current manifest, or `null` when nothing has been published. */
  async readManifest(): Promise<IndexManifest | null> {
    const bytes = await readFileIfExists(this.manifestPath);
    if (bytes === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(bytes.toString("utf8"));
    } catch (err) {
      throw new IndexUnavailableError(`Corrupt manifest ${this.manifestPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexUnavailableError(`Corrupt manifest ${this.manifestPath}`, {
        details: { issues: parsed.error.issues.slice(0, 5) },
      });
    }
    return parsed.data;
  }

  describe(): StoreDescription {
    return {
      dir: this.dir,
      manifestPath: this.manifestPath,
      generation: this.current?.generation ?? null,
      indexPath: this.current?.indexPath ?? null,
      chunksPath: this.current?.chunksPath ?? null,
    };
  }

  private async loadLegacy(): Promise<StoredPair> {
    const indexPath = join(this.dir, INDEX_FILE);
    const chunksPath = join(this.dir, CHUNKS_FILE);

    const indexBytes = await readFileIfExists(indexPath);
    const chunkBytes = await readFileIfExists(chunksPath);
    if (indexBytes === null || chunkBytes === null) {
      throw new IndexUnavailableError(`No index published in ${this.dir}`);
    }

    const index = decodeIndex(indexBytes, indexPath);
    const chunks = decodeChunks(chunkBytes.toString("utf8"), chunksPath);
    assertParallel(index, chunks, LEGACY_GENERATION);

    this.current = { generation: LEGACY_GENERATION, indexPath, chunksPath };
    this.logger.warn({ dir: this.dir }, "Loaded index from legacy layout without a manifest");
    return { index, chunks, generation: LEGACY_GENERATION, manifest: null };
  }

  private async readVerified(path: string, checksum: string): Promise<Buffer> {
    const bytes = await readFileIfExists(path);
    if (bytes === null) {
      throw new IndexUnavailableError(`Manifest points at missing file ${path}`);
    }
    if (sha256(bytes) !== checksum) {
      throw new IndexUnavailableError(`Checksum mismatch for ${path}`);
    }
    return bytes;
  }

  private remember(manifest: IndexManifest): void {
    this.current = {
      generation: manifest.generation,
      indexPath: join(this.dir, manifest.indexFile),
      chunksPath: join(this.dir, manifest.chunksFile),
    };
  }

  private async prune(currentGeneration: string): Promise<void> {
    try {
      const entries = await readdir(this.dir, { withFileTypes: true });
      const stale = entries
        .filter(
          (entry) =>
            entry.isDirectory() &&
            entry.name.startsWith(GENERATION_PREFIX) &&
            entry.name !== currentGeneration,
        )
        .map((entry) => entry.name)
        .sort()
        .reverse()
        .slice(this.keepGenerations - 1);

      for (const name of stale) {
        await rm(join(this.dir, name), { recursive: true, force: true });
      }
      if (stale.length > 0) {
        this.logger.debug({ removed: stale }, "Pruned old index generations");
      }
    } catch (err) {
      // The new pair is already authoritative; leftover directories only cost disk.
      this.logger.warn({ err, dir: this.dir }, "Failed to prune old index generations");
    }
  }
}

function assertParallel(index: FlatL2Index, chunks: readonly string[], generation: string): void {
  if (chunks.length !== index.rowCount) {
    throw new IndexUnavailableError(
      `Generation ${generation} has ${String(chunks.length)} chunks for ${String(index.rowCount)} index rows`,
      { details: { chunks: chunks.length, rows: index.rowCount } },
    );
  }
}
