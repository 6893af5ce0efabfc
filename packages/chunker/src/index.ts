export type { IChunker } from "./chunker.interface.js";
export { WordWindowChunker, chunkText } from "./word-window-chunker.js";
