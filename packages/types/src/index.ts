export type * from "./chunk.js";
export type * from "./record.js";
export type * from "./vector.js";
export type * from "./pipeline.js";
export type * from "./query.js";
export type * from "./config.js";
