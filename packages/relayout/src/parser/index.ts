/**
 * Textual IR parser
 */

export { parse, Parser } from "./parser.js";
export { Tokenizer } from "./tokenizer.js";
export { ParseError, ErrorCode as ParseErrorCode } from "./errors.js";
export { pass } from "./pass.js";
