/**
 * Compiler pass system for composing compilation passes
 */

export * from "./pass.js";
export {
  compile,
  type CompileOptions,
  type CompileOutput,
  type CompileTarget,
} from "./compile.js";
