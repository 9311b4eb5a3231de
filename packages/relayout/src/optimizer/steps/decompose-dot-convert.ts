import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";

/**
 * Moves a loaded accumulator out of a matrix multiply:
 *
 *   convert(dot(a, b, convert(load p)))  =>  add(convert(dot(a, b, 0)), load p)
 *
 * when the outer conversion produces exactly the loaded type, so the
 * loaded value needs no conversion at all.
 */
export class DecomposeDotConvertStep extends BaseOptimizationStep {
  name = "decompose-dot-convert";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      for (const convert of this.collect(func, "convert_layout")) {
        if (!convert.dead) {
          this.decompose(func, convert, context);
        }
      }
    });
    return module;
  }

  private decompose(
    func: Ir.Function,
    convert: Ir.Operation.ConvertLayout,
    context: OptimizationContext,
  ): void {
    const dot = Ir.Value.definingOp(convert.operands[0]);
    if (dot?.kind !== "dot") return;

    const uses = Ir.Utils.useCounts(func);
    if (
      uses.get(convert.results[0]) !== 1 ||
      uses.get(dot.results[0]) !== 1
    ) {
      return;
    }

    const accumulator = Ir.Value.definingOp(dot.operands[2]);
    if (accumulator?.kind !== "convert_layout") return;
    const loaded = accumulator.operands[0];
    const load = Ir.Value.definingOp(loaded);
    if (load?.kind !== "load") return;

    const resultType = convert.results[0].type;
    const dotType = dot.results[0].type;
    if (
      resultType.kind !== "tensor" ||
      dotType.kind !== "tensor" ||
      !Ir.Type.equals(resultType, loaded.type)
    ) {
      return;
    }

    const loc = convert.debug.loc;
    const builder = Ir.Builder.before(convert);
    const zero = builder.create(
      { kind: "constant", value: 0 },
      { operands: [], resultTypes: [Ir.Type.scalar(resultType.element)], loc },
    );
    const splat = builder.create(
      { kind: "splat" },
      { operands: [zero.results[0]], resultTypes: [dotType], loc },
    );
    const newDot = builder.create(
      { kind: "dot", allowTf32: dot.allowTf32 },
      {
        operands: [dot.operands[0], dot.operands[1], splat.results[0]],
        resultTypes: [dotType],
        loc,
      },
    );
    const converted = builder.convertLayout(
      newDot.results[0],
      resultType.layout,
      loc,
    );
    const sum = builder.create(
      { kind: "binary", op: "add" },
      { operands: [converted, loaded], resultTypes: [resultType], loc },
    );

    builder.replaceAllUsesWith(convert.results[0], sum.results[0]);
    builder.markDead(convert);
    context.trackTransformation({
      type: "replace",
      pass: this.name,
      original: this.locations(dot, convert),
      result: this.locations(newDot, sum),
      reason: `Added loaded accumulator ${loaded.id} after the dot`,
    });
  }
}
