/**
 * IR analysis exports
 */

export { Formatter, format } from "./formatter.js";
export { type ValidationResult, Validator, validate } from "./validator.js";
