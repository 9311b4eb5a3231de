/**
 * Optimizer errors and error codes
 */

import { CompilerError, type SourceLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  CLEANUP_DID_NOT_CONVERGE = "OPT001",
  INVALID_OPTIONS = "OPT002",
  INTERNAL_ERROR = "OPT999",
}

export const ErrorMessages = {
  [ErrorCode.CLEANUP_DID_NOT_CONVERGE]:
    "Cleanup patterns did not reach a fixpoint",
  [ErrorCode.INVALID_OPTIONS]: "Invalid layout options",
  [ErrorCode.INTERNAL_ERROR]: "Internal optimizer error",
};

export class OptimizerError extends CompilerError {
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
