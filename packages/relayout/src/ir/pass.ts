import type { Pass } from "#compiler";
import { Result, Severity } from "#result";

import type * as Ir from "./spec/index.js";
import type { IrError } from "./errors.js";
import { validate } from "./analysis/index.js";

/**
 * Validation pass - checks the structural consistency of a module
 */
export const pass: Pass<{
  needs: {
    ir: Ir.Module;
  };
  adds: {
    ir: Ir.Module;
  };
  error: IrError;
}> = {
  async run({ ir }) {
    const { isValid, errors, warnings } = validate(ir);
    if (!isValid) {
      return Result.err(errors);
    }
    return Result.okWith({ ir }, { [Severity.Warning]: warnings });
  },
};
