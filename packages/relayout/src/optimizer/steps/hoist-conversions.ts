import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";
import {
  getRematerializableSlice,
  rewriteSlice,
  type StopPredicate,
} from "../slice.js";

/**
 * Widening and broadcasting operations produce more data than they
 * consume; converting before them is cheaper
 */
export const isExtOrBroadcast: StopPredicate = (op) =>
  (op.kind === "cast" &&
    (op.op === "extf" || op.op === "extsi" || op.op === "extui")) ||
  op.kind === "broadcast" ||
  op.kind === "expand_dims";

/**
 * Moves a conversion above the single widening or broadcasting operation
 * that keeps its source from being rematerialized
 */
export class HoistConversionsStep extends BaseOptimizationStep {
  name = "hoist-conversions";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      for (const convert of this.collect(func, "convert_layout")) {
        if (!convert.dead) {
          this.hoist(convert, context);
        }
      }
    });
    return module;
  }

  hoist(
    convert: Ir.Operation.ConvertLayout,
    context: OptimizationContext,
  ): boolean {
    const { oracle } = context;
    const source = Ir.Value.layout(convert.operands[0]);
    const target = Ir.Value.layout(convert.results[0]);
    if (!source || !target) return false;
    if (Ir.Layout.isStaging(source) || Ir.Layout.isStaging(target)) {
      return false;
    }
    if (Ir.Layout.isMatrixOperand(target)) return false;

    const slice = getRematerializableSlice(
      convert.operands[0],
      target,
      oracle,
      isExtOrBroadcast,
    );
    if (!slice) return false;

    let blocker: Ir.Operation | undefined;
    for (const value of [...slice.values]) {
      const op = Ir.Value.definingOp(value);
      if (!op || !isExtOrBroadcast(op)) continue;

      const layout = slice.layouts.get(value);
      const operandLayout = layout && oracle.inferSourceLayout(op, layout);
      if (!operandLayout) return false;

      const rest = getRematerializableSlice(
        op.operands[0],
        operandLayout,
        oracle,
      );
      if (rest) {
        slice.merge(rest);
        continue;
      }
      // A second blocker would need a second conversion
      if (blocker) return false;
      blocker = op;
    }
    if (!blocker) return false;

    const result = blocker.results[0];
    const layout = slice.layouts.get(result);
    const operandLayout = layout && oracle.inferSourceLayout(blocker, layout);
    if (!layout || !operandLayout) return false;

    const builder = Ir.Builder.before(blocker);
    const converted = builder.convertLayout(
      blocker.operands[0],
      operandLayout,
      convert.debug.loc,
    );
    const copy = builder.clone(
      blocker,
      new Map<Ir.Value, Ir.Value>([[blocker.operands[0], converted]]),
    );
    Ir.Value.setLayout(copy.results[0], layout);

    slice.delete(result);
    const created = rewriteSlice(
      slice,
      convert,
      new Map<Ir.Value, Ir.Value>([[result, copy.results[0]]]),
    );

    context.trackTransformation({
      type: "move",
      pass: this.name,
      original: this.locations(convert),
      result: this.locations(converted.owner, copy, ...created),
      reason:
        `Hoisted conversion to ${Ir.Layout.key(target)} above ` +
        Ir.Operation.name(blocker),
    });
    return true;
  }
}
