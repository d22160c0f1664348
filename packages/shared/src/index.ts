export * from "./blobList.js";
export * from "./errors.js";
export type * from "./types.js";
