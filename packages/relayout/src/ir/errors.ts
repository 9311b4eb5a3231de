/**
 * Ir-specific errors and error codes
 */

import { CompilerError, type SourceLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  UNDEFINED_VALUE = "IR001",
  DEAD_OPERAND = "IR002",
  TERMINATOR_ARITY = "IR003",
  TERMINATOR_TYPE = "IR004",
  MISSING_TERMINATOR = "IR005",
  CONVERSION_SHAPE = "IR006",
  REGION_COUNT = "IR007",
  INTERNAL_ERROR = "IR999",
}

export const ErrorMessages = {
  [ErrorCode.UNDEFINED_VALUE]: "Value used before it is defined",
  [ErrorCode.DEAD_OPERAND]: "Operand refers to a removed operation",
  [ErrorCode.TERMINATOR_ARITY]: "Terminator operand count does not match",
  [ErrorCode.TERMINATOR_TYPE]: "Terminator operand type does not match",
  [ErrorCode.MISSING_TERMINATOR]: "Region does not end in a terminator",
  [ErrorCode.CONVERSION_SHAPE]:
    "Layout conversion changes shape or element type",
  [ErrorCode.REGION_COUNT]: "Unexpected number of regions",
  [ErrorCode.INTERNAL_ERROR]: "Internal IR error",
};

export class IrError extends CompilerError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
