import type * as Ir from "#ir";

/**
 * Layout inference and cost queries the optimizer relies on. Absence of a
 * layout means no constraint can be derived; it is never an error.
 */
export interface LayoutOracle {
  /**
   * Layout the results of `op` take when an operand has layout `source`
   */
  inferDestinationLayout(
    op: Ir.Operation,
    source: Ir.Layout,
  ): Ir.Layout | undefined;

  /**
   * Layout the operands of `op` need for its results to have `result`
   */
  inferSourceLayout(op: Ir.Operation, result: Ir.Layout): Ir.Layout | undefined;

  /**
   * Whether re-emitting `op` directly in `layout` costs no more than
   * emitting it as is
   */
  canFoldConversionInto(op: Ir.Operation, layout: Ir.Layout): boolean;

  /**
   * Whether a load or store touches enough data that its layout should be
   * kept
   */
  isExpensiveMemoryOp(op: Ir.Operation): boolean;
}

/**
 * Execution resources of the target a module is compiled for
 */
export interface Target {
  numWarps: number;
  threadsPerWarp: number;
}

export namespace Target {
  export const DEFAULT: Target = { numWarps: 4, threadsPerWarp: 32 };

  /**
   * Target from module attributes, with explicit overrides taking precedence
   */
  export function fromModule(
    module: Ir.Module,
    overrides: Partial<Target> = {},
  ): Target {
    return {
      numWarps:
        overrides.numWarps ??
        module.attributes.numWarps ??
        DEFAULT.numWarps,
      threadsPerWarp:
        overrides.threadsPerWarp ??
        module.attributes.threadsPerWarp ??
        DEFAULT.threadsPerWarp,
    };
  }
}
