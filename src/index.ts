export * from "./chain/index.js";
export * from "./extract/index.js";
export * from "./merkle/index.js";
export * from "./proof/index.js";
export * from "./registry/index.js";
export * from "./report/index.js";
export type { Result } from "./result.js";
