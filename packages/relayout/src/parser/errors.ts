/**
 * Parser-specific errors and error codes
 */

import { CompilerError, type SourceLocation } from "#errors";

export enum ErrorCode {
  UNEXPECTED_TOKEN = "PARSE001",
  UNKNOWN_OPERATION = "PARSE002",
  UNKNOWN_LAYOUT = "PARSE003",
  UNKNOWN_ALIAS = "PARSE004",
  UNDEFINED_VALUE = "PARSE005",
  DUPLICATE_VALUE = "PARSE006",
  MISSING_ATTRIBUTE = "PARSE007",
  INVALID_ATTRIBUTE = "PARSE008",
  RESULT_COUNT = "PARSE009",
  INVALID_TYPE = "PARSE010",
}

export const ErrorMessages = {
  [ErrorCode.UNEXPECTED_TOKEN]: "Unexpected token",
  [ErrorCode.UNKNOWN_OPERATION]: "Unknown operation",
  [ErrorCode.UNKNOWN_LAYOUT]: "Unknown layout",
  [ErrorCode.UNKNOWN_ALIAS]: "Unknown layout alias",
  [ErrorCode.UNDEFINED_VALUE]: "Undefined value",
  [ErrorCode.DUPLICATE_VALUE]: "Value defined twice",
  [ErrorCode.MISSING_ATTRIBUTE]: "Missing attribute",
  [ErrorCode.INVALID_ATTRIBUTE]: "Invalid attribute",
  [ErrorCode.RESULT_COUNT]: "Result names and types do not match",
  [ErrorCode.INVALID_TYPE]: "Invalid type",
};

/**
 * Parse errors
 */
export class ParseError extends CompilerError {
  public readonly expected?: string[];

  constructor(
    code: ErrorCode,
    message: string | undefined,
    location: SourceLocation,
    expected?: string[],
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location);
    this.expected = expected;
  }
}
