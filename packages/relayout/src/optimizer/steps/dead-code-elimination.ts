import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";

export class DeadCodeEliminationStep extends BaseOptimizationStep {
  name = "dead-code-elimination";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    // Process each function separately
    this.processAllFunctions(module, (func) => {
      const uses = Ir.Utils.useCounts(func);

      // Users come after their operands, so walking backwards removes
      // whole chains at once
      const ops = Ir.Utils.collectOperations(func).reverse();
      for (const op of ops) {
        if (!this.isRemovable(op, uses)) continue;

        op.dead = true;
        for (const operand of op.operands) {
          uses.set(operand, (uses.get(operand) ?? 1) - 1);
        }
        context.trackTransformation({
          type: "delete",
          pass: this.name,
          original: this.locations(op),
          result: [],
          reason:
            `Removed unused ${Ir.Operation.name(op)} -> ` +
            op.results.map((result) => result.id).join(", "),
        });
      }
    });
    return module;
  }

  private isRemovable(op: Ir.Operation, uses: Map<Ir.Value, number>): boolean {
    if (op.kind === "for") {
      return (
        op.results.every((result) => (uses.get(result) ?? 0) === 0) &&
        this.hasPureBody(op)
      );
    }
    if (!Ir.Operation.hasTrait(op, "pure") || op.results.length === 0) {
      return false;
    }
    return op.results.every((result) => (uses.get(result) ?? 0) === 0);
  }

  /**
   * Loops always terminate, so one whose body only computes values is dead
   * once nothing reads its results
   */
  private hasPureBody(loop: Ir.Operation.For): boolean {
    let pure = true;
    Ir.Utils.walk(Ir.Operation.For.body(loop), (op) => {
      if (
        !Ir.Operation.hasTrait(op, "pure") &&
        op.kind !== "yield" &&
        op.kind !== "for"
      ) {
        pure = false;
      }
    });
    return pure;
  }
}
