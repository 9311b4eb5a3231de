import * as Ir from "#ir";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../optimizer.js";

/**
 * Operations whose operands are needed whatever their results feed, nested
 * control flow included
 */
function hasSideEffects(op: Ir.Operation): boolean {
  return !Ir.Operation.hasTrait(op, "pure") && op.kind !== "yield";
}

/**
 * Is `value` defined by `loop` or inside it
 */
function isDefinedWithin(value: Ir.Value, loop: Ir.Operation): boolean {
  let region = Ir.Utils.definingRegion(value);
  while (region) {
    const parent = Ir.Region.parentOp(region);
    if (!parent) return false;
    if (parent === loop) return true;
    region = parent.parent;
  }
  return false;
}

/**
 * Makes iteration arguments that feed nothing live pass their value
 * through unchanged, so they can be folded away
 */
export class LoopArgumentEliminationStep extends BaseOptimizationStep {
  name = "loop-argument-elimination";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      for (const loop of this.collect(func, "for")) {
        const dead = this.deadArguments(func, loop);
        if (!dead || dead.length === 0) continue;

        const body = Ir.Operation.For.body(loop);
        const yieldOp = Ir.Region.terminator(body);
        if (!yieldOp) continue;
        for (const index of dead) {
          yieldOp.operands[index] = body.arguments[index + 1];
        }
        context.trackTransformation({
          type: "replace",
          pass: this.name,
          original: this.locations(loop),
          result: this.locations(loop),
          reason: `Forwarded unused iteration argument(s) ${dead.join(", ")}`,
        });
      }
    });
    return module;
  }

  /**
   * Indices of iteration arguments nothing live depends on; undefined when
   * liveness cannot be decided
   */
  private deadArguments(
    func: Ir.Function,
    loop: Ir.Operation.For,
  ): number[] | undefined {
    const body = Ir.Operation.For.body(loop);
    const yieldOp = Ir.Region.terminator(body);
    if (!yieldOp) return undefined;

    const alive = new Set<Ir.Value>();
    const queue: Ir.Value[] = [];
    // Values from outside the loop stay live but are not traced further
    const markLive = (value: Ir.Value | undefined) => {
      if (!value || alive.has(value)) return;
      alive.add(value);
      if (isDefinedWithin(value, loop)) {
        queue.push(value);
      }
    };

    loop.results.forEach((result, index) => {
      if (Ir.Utils.hasUses(func, result)) {
        markLive(yieldOp.operands[index]);
      }
    });
    if (alive.size === loop.results.length) return undefined;

    Ir.Utils.walk(body, (op) => {
      if (hasSideEffects(op)) {
        op.operands.forEach(markLive);
      }
    });

    for (let value = queue.pop(); value; value = queue.pop()) {
      if (value.kind === "result") {
        const def = value.owner;
        if (def.kind === "for") {
          markLive(Ir.Operation.For.inits(def)[value.index]);
          const nested = Ir.Region.terminator(Ir.Operation.For.body(def));
          markLive(nested?.operands[value.index]);
        } else if (def.kind === "if") {
          for (const region of def.regions) {
            markLive(Ir.Region.terminator(region)?.operands[value.index]);
          }
        } else if (def.kind === "while") {
          return undefined;
        } else {
          def.operands.forEach(markLive);
        }
        continue;
      }

      const owner = Ir.Region.parentOp(value.owner);
      if (owner?.kind !== "for" || value.index === 0) continue;
      const slot = value.index - 1;
      const terminator = Ir.Region.terminator(Ir.Operation.For.body(owner));
      markLive(terminator?.operands[slot]);
      markLive(Ir.Operation.For.inits(owner)[slot]);
    }

    const dead: number[] = [];
    yieldOp.operands.forEach((operand, index) => {
      if (alive.has(operand)) return;
      if (operand === body.arguments[index + 1]) return;
      dead.push(index);
    });
    return dead;
  }
}

/**
 * Removes iteration arguments whose value never changes, or that nothing
 * reads: uses of the argument and of the loop result take the initial
 * value instead
 */
export class LoopPassThroughFoldingStep extends BaseOptimizationStep {
  name = "loop-pass-through-folding";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      const builder = new Ir.Builder(func);
      for (const loop of this.collect(func, "for")) {
        const body = Ir.Operation.For.body(loop);
        const yieldOp = Ir.Region.terminator(body);
        if (!yieldOp) continue;

        const inits = Ir.Operation.For.inits(loop);
        const iterArgs = Ir.Operation.For.iterArgs(loop);
        const folded: number[] = [];
        iterArgs.forEach((arg, index) => {
          const init = inits[index];
          const yielded = yieldOp.operands[index];
          const forwarded =
            yielded === arg ||
            (!Ir.Utils.hasUses(func, arg) &&
              (init === yielded ||
                !Ir.Utils.hasUses(func, loop.results[index])));
          if (forwarded) {
            folded.push(index);
          }
        });
        if (folded.length === 0) continue;

        for (const index of folded) {
          builder.replaceAllUsesWith(loop.results[index], inits[index]);
          builder.replaceAllUsesWith(iterArgs[index], inits[index]);
        }
        for (const index of [...folded].reverse()) {
          loop.operands.splice(Ir.Operation.For.INIT_OFFSET + index, 1);
          loop.results.splice(index, 1);
          body.arguments.splice(index + 1, 1);
          yieldOp.operands.splice(index, 1);
        }
        loop.results.forEach((result, index) => {
          result.index = index;
        });
        body.arguments.forEach((arg, index) => {
          arg.index = index;
        });

        context.trackTransformation({
          type: "replace",
          pass: this.name,
          original: this.locations(loop),
          result: this.locations(loop),
          reason: `Folded pass-through iteration argument(s) ${folded.join(", ")}`,
        });
      }
    });
    return module;
  }
}
