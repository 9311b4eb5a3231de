export const VERSION = "0.1.0";

export * as Ir from "#ir";
export * as Layouts from "#layouts";

// Re-export parser functionality
export { parse, Parser } from "#parser";

// Re-export optimizer functionality
export { removeLayoutConversions } from "#optimizer";
export type { LayoutOptions, LayoutResult, Transformation } from "#optimizer";

// Re-export layout inference
export { DefaultLayoutOracle, Target } from "#layouts";
export type { LayoutOracle } from "#layouts";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export { compile, type CompileOptions } from "#compiler";
