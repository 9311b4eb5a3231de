/**
 * Result type shared by every pass
 *
 * A result either carries a value or not, and in both cases carries the
 * messages (errors and warnings) produced along the way, grouped by
 * severity.
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
}

export type MessagesBySeverity<E> = {
  [S in Severity]?: E[];
};

export type Result<T, E> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

export namespace Result {
  export function ok<T, E = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  /**
   * Successful result that still reports messages (usually warnings)
   */
  export function okWith<T, E>(
    value: T,
    messages: MessagesBySeverity<E>,
  ): Result<T, E> {
    return { success: true, value, messages };
  }

  export function err<T, E extends { severity: Severity }>(
    errors: E | E[],
  ): Result<T, E> {
    const list = Array.isArray(errors) ? errors : [errors];
    const messages: MessagesBySeverity<E> = {};
    for (const error of list) {
      const bucket = messages[error.severity] ?? [];
      bucket.push(error);
      messages[error.severity] = bucket;
    }
    return { success: false, messages };
  }

  export function map<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  }

  export function firstError<T, E>(result: Result<T, E>): E | undefined {
    return result.messages[Severity.Error]?.[0];
  }

  export function warnings<T, E>(result: Result<T, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  }
}
