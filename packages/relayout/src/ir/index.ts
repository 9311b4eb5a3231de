/**
 * Tensor IR: program representation the layout optimizer rewrites
 */

export * from "./spec/index.js";
export { IrError, ErrorCode as IrErrorCode } from "./errors.js";
export { Builder, type CreateOptions } from "./builder.js";
export * as Utils from "./utils/index.js";
export * as Analysis from "./analysis/index.js";
export { pass } from "./pass.js";
