import type * as Ir from "#ir";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { ParseError } from "./errors.js";
import { parse } from "./parser.js";

/**
 * Parsing pass - converts textual IR to a module
 */
export const pass: Pass<{
  needs: {
    source: string;
    sourcePath?: string;
  };
  adds: {
    ir: Ir.Module;
  };
  error: ParseError;
}> = {
  async run({ source }) {
    const result = parse(source);
    return Result.map(result, (ir) => ({ ir }));
  },
};
