import { Result } from "#result";
import type { Pass } from "#compiler";
import type * as Ir from "#ir";
import { InternalConsistencyError } from "#errors";

import { OptimizerError, ErrorCode } from "./errors.js";
import type { Transformation } from "./optimizer.js";
import {
  removeLayoutConversions,
  type LayoutOptions,
} from "./remove-layout-conversions.js";

/**
 * Layout pass - removes redundant layout conversions
 */
export const pass: Pass<{
  needs: {
    ir: Ir.Module;
    layout?: LayoutOptions;
  };
  adds: {
    ir: Ir.Module;
    transformations: Transformation[];
  };
  error: OptimizerError;
}> = {
  async run({ ir, layout = {} }) {
    try {
      const { module, transformations } = removeLayoutConversions(ir, layout);
      return Result.ok({ ir: module, transformations });
    } catch (error) {
      if (error instanceof OptimizerError) {
        return Result.err(error);
      }
      // Broken invariants are bugs, not diagnostics
      if (error instanceof InternalConsistencyError) {
        throw error;
      }

      // Wrap unexpected errors
      return Result.err(
        new OptimizerError(
          ErrorCode.INTERNAL_ERROR,
          error instanceof globalThis.Error ? error.message : String(error),
        ),
      );
    }
  },
};
