import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";
import { getRematerializableSlice, rewriteSlice } from "../slice.js";

/**
 * Removes a conversion by re-emitting everything its source depends on
 * directly in the target layout
 */
export class BackwardRematerializationStep extends BaseOptimizationStep {
  name = "backward-rematerialization";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      for (const convert of this.collect(func, "convert_layout")) {
        if (!convert.dead) {
          this.rematerialize(convert, context);
        }
      }
    });
    return module;
  }

  rematerialize(
    convert: Ir.Operation.ConvertLayout,
    context: OptimizationContext,
  ): boolean {
    const source = Ir.Value.layout(convert.operands[0]);
    const target = Ir.Value.layout(convert.results[0]);
    if (!source || !target) return false;
    if (Ir.Layout.isStaging(source) || Ir.Layout.isStaging(target)) {
      return false;
    }
    // Matrix operand conversions stay where they are
    if (Ir.Layout.isMatrixOperand(target)) return false;

    const slice = getRematerializableSlice(
      convert.operands[0],
      target,
      context.oracle,
    );
    if (!slice) return false;

    const created = rewriteSlice(slice, convert, new Map());
    context.trackTransformation({
      type: "replace",
      pass: this.name,
      original: this.locations(convert),
      result: this.locations(...created),
      reason:
        `Rematerialized ${slice.size} value(s) in ` +
        `${Ir.Layout.key(target)} instead of converting`,
    });
    return true;
  }
}
