/**
 * Base error class for everything the compiler reports
 */

import { Severity } from "#result";

/**
 * Location of a construct in the textual IR
 */
export interface SourceLocation {
  offset: number;
  length: number;
}

export class CompilerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly location?: SourceLocation,
    public readonly severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = "CompilerError";
  }
}

/**
 * Raised when the pass reaches a state its own invariants rule out, e.g. an
 * operation arriving at the rewriter that no rewrite rule covers. Passes
 * never turn this into a reported message.
 */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}

export function assert(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InternalConsistencyError(message);
  }
}
