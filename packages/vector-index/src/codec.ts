import { IndexUnavailableError } from "@lexrag/errors";
import { FlatL2Index } from "./flat-index.js";
import { readFileIfExists, writeFileAtomic } from "./fs-utils.js";

/**
 * Binary layout, all little-endian:
 *
 * | offset | size  | field                   |
 * |--------|-------|-------------------------|
 * | 0      | 4     | magic `LXFI`            |
 * | 4      | 4     | format version (u32)    |
 * | 8      | 4     | dimensions D (u32)      |
 * | 12     | 4     | row count N (u32)       |
 * | 16     | 4·N·D | row-major float32 data  |
 */
const INDEX_MAGIC = "LXFI";
export const INDEX_FORMAT_VERSION = 1;
export const HEADER_BYTES = 16;

export function encodeIndex(index: FlatL2Index): Buffer {
  const values = index.packed;
  const buffer = Buffer.alloc(HEADER_BYTES + values.length * 4);

  buffer.write(INDEX_MAGIC, 0, "ascii");
  buffer.writeUInt32LE(INDEX_FORMAT_VERSION, 4);
  buffer.writeUInt32LE(index.dimensions, 8);
  buffer.writeUInt32LE(index.rowCount, 12);

  let offset = HEADER_BYTES;
  for (const value of values) {
    buffer.writeFloatLE(value, offset);
    offset += 4;
  }
  return buffer;
}

export function decodeIndex(buffer: Uint8Array, source = "index buffer"): FlatL2Index {
  const bytes = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  if (bytes.length < HEADER_BYTES) {
    throw new IndexUnavailableError(`Truncated ${source}: ${String(bytes.length)} bytes`);
  }

  const magic = bytes.toString("ascii", 0, 4);
  if (magic !== INDEX_MAGIC) {
    throw new IndexUnavailableError(`Unrecognised ${source}: bad magic "${magic}"`);
  }

  const version = bytes.readUInt32LE(4);
  if (version !== INDEX_FORMAT_VERSION) {
    throw new IndexUnavailableError(`Unsupported ${source} format version ${String(version)}`, {
      details: { version, supported: INDEX_FORMAT_VERSION },
    });
  }

  const dimensions = bytes.readUInt32LE(8);
  const rowCount = bytes.readUInt32LE(12);
  if (dimensions === 0) {
    throw new IndexUnavailableError(`Corrupt ${source}: zero dimensions`);
  }

  const expected = HEADER_BYTES + rowCount * dimensions * 4;
  if (bytes.length !== expected) {
    throw new IndexUnavailableError(
      `Corrupt ${source}: expected ${String(expected)} bytes, found ${String(bytes.length)}`,
      { details: { dimensions, rowCount } },
    );
  }

  const values = new Float32Array(rowCount * dimensions);
  for (let i = 0; i < values.length; i++) {
    values[i] = bytes.readFloatLE(HEADER_BYTES + i * 4);
  }
  return FlatL2Index.fromPacked(values, dimensions);
}

export async function saveIndex(path: string, index: FlatL2Index): Promise<void> {
  await writeFileAtomic(path, encodeIndex(index));
}

export async function loadIndex(path: string): Promise<FlatL2Index> {
  const bytes = await readFileIfExists(path);
  if (bytes === null) {
    throw new IndexUnavailableError(`Index file not found: ${path}`);
  }
  return decodeIndex(bytes, path);
}
