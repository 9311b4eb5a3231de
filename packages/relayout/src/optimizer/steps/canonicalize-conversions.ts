import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";

/**
 * Local simplifications of layout conversions:
 *
 * - a conversion into the layout its source already has is dropped
 * - a conversion of a conversion converts the original source once
 * - a conversion of a constant, splat or range re-emits the producer in
 *   the target layout
 *
 * Conversions from or into a staging layout are only dropped when they
 * are identities.
 */
export class CanonicalizeConversionsStep extends BaseOptimizationStep {
  name = "canonicalize-conversions";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      for (const convert of this.collect(func, "convert_layout")) {
        if (!convert.dead) {
          this.canonicalize(convert, context);
        }
      }
    });
    return module;
  }

  private canonicalize(
    convert: Ir.Operation.ConvertLayout,
    context: OptimizationContext,
  ): void {
    const builder = Ir.Builder.before(convert);
    const [source] = convert.operands;
    const [result] = convert.results;

    if (Ir.Type.equals(source.type, result.type)) {
      builder.replaceAllUsesWith(result, source);
      builder.markDead(convert);
      context.trackTransformation({
        type: "delete",
        pass: this.name,
        original: this.locations(convert),
        result: [],
        reason: `Removed identity conversion of ${source.id}`,
      });
      return;
    }

    const sourceLayout = Ir.Value.layout(source);
    const targetLayout = Ir.Value.layout(result);
    if (!sourceLayout || !targetLayout) return;
    if (Ir.Layout.isStaging(sourceLayout) || Ir.Layout.isStaging(targetLayout)) {
      return;
    }

    const producer = Ir.Value.definingOp(source);
    if (!producer) return;

    if (producer.kind === "convert_layout") {
      const [original] = producer.operands;
      const originalLayout = Ir.Value.layout(original);
      if (!originalLayout || Ir.Layout.isStaging(originalLayout)) return;
      const replacement = Ir.Type.equals(original.type, result.type)
        ? original
        : builder.convertLayout(original, targetLayout, convert.debug.loc);
      builder.replaceAllUsesWith(result, replacement);
      builder.markDead(convert);
      context.trackTransformation({
        type: "replace",
        pass: this.name,
        original: this.locations(producer, convert),
        result: replacement === original ? [] : this.locations(convert),
        reason: `Merged chained conversions of ${original.id}`,
      });
      return;
    }

    if (
      producer.kind === "constant" ||
      producer.kind === "splat" ||
      producer.kind === "make_range"
    ) {
      const copy = builder.clone(producer, new Map());
      Ir.Value.setLayout(copy.results[0], targetLayout);
      builder.replaceAllUsesWith(result, copy.results[0]);
      builder.markDead(convert);
      context.trackTransformation({
        type: "replace",
        pass: this.name,
        original: this.locations(producer, convert),
        result: this.locations(copy),
        reason:
          `Re-emitted ${Ir.Operation.name(producer)} in ` +
          Ir.Layout.key(targetLayout),
      });
    }
  }
}
