/**
 * @lexrag/vector-index
 *
 * Exact L2 vector index, its binary file format and the persisted
 * index + chunk pair.
 */

export { FlatL2Index } from "./flat-index.js";
export type { BuildOptions } from "./flat-index.js";
export {
  encodeIndex,
  decodeIndex,
  saveIndex,
  loadIndex,
  INDEX_FORMAT_VERSION,
} from "./codec.js";
export { encodeChunks, decodeChunks, saveChunks, loadChunks } from "./chunk-store.js";
export {
  IndexStore,
  MANIFEST_FILE,
  INDEX_FILE,
  CHUNKS_FILE,
  LEGACY_GENERATION,
} from "./index-store.js";
export type { IndexStoreOptions, StoredPair, StoreDescription } from "./index-store.js";
