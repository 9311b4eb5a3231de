/**
 * Optimization step architecture
 *
 * Steps rewrite a module in place and report every change through the
 * context's transformation log. A step that logs nothing made no change,
 * which is what fixpoint iteration relies on.
 */

import * as Ir from "#ir";
import type { SourceLocation } from "#errors";
import type { LayoutOracle } from "#layouts";

import { OptimizerError, ErrorCode } from "./errors.js";

export type TransformationType = "insert" | "replace" | "move" | "delete";

/**
 * One logged change to the program
 */
export interface Transformation {
  type: TransformationType;
  /** Step that made the change */
  pass: string;
  /** Source locations of the operations affected */
  original: SourceLocation[];
  /** Source locations of the operations produced */
  result: SourceLocation[];
  reason: string;
}

export interface OptimizationContext {
  readonly oracle: LayoutOracle;
  trackTransformation(transformation: Transformation): void;
  getTransformations(): Transformation[];
}

export function createOptimizationContext(
  oracle: LayoutOracle,
): OptimizationContext {
  const transformations: Transformation[] = [];
  return {
    oracle,
    trackTransformation(transformation) {
      transformations.push(transformation);
    },
    getTransformations() {
      return transformations;
    },
  };
}

export interface OptimizationStep {
  name: string;
  run(module: Ir.Module, context: OptimizationContext): Ir.Module;
}

export abstract class BaseOptimizationStep implements OptimizationStep {
  abstract name: string;

  abstract run(module: Ir.Module, context: OptimizationContext): Ir.Module;

  protected processAllFunctions(
    module: Ir.Module,
    processor: (func: Ir.Function) => void,
  ): void {
    for (const func of module.functions) {
      processor(func);
    }
  }

  /**
   * Snapshot of the live operations of one kind, in program order
   */
  protected collect<K extends Ir.Operation.Kind>(
    func: Ir.Function,
    kind: K,
  ): Extract<Ir.Operation, { kind: K }>[] {
    const ops: Extract<Ir.Operation, { kind: K }>[] = [];
    Ir.Utils.walk(func.body, (op) => {
      if (isKind(op, kind)) {
        ops.push(op);
      }
    });
    return ops;
  }

  /**
   * Source locations of operations, for the transformation log
   */
  protected locations(...ops: Ir.Operation[]): SourceLocation[] {
    return ops
      .map((op) => op.debug.loc)
      .filter((loc): loc is SourceLocation => loc !== undefined);
  }
}

function isKind<K extends Ir.Operation.Kind>(
  op: Ir.Operation,
  kind: K,
): op is Extract<Ir.Operation, { kind: K }> {
  return op.kind === kind;
}

/**
 * Runs steps in sequence, dropping operations they marked dead after each
 */
export class OptimizationPipeline {
  constructor(private readonly steps: OptimizationStep[]) {}

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    let current = module;
    for (const step of this.steps) {
      current = step.run(current, context);
      for (const func of current.functions) {
        Ir.Region.compact(func.body);
      }
    }
    return current;
  }

  /**
   * Repeat the steps until a round changes nothing
   */
  runToFixpoint(
    module: Ir.Module,
    context: OptimizationContext,
    maxIterations: number,
  ): Ir.Module {
    let current = module;
    for (let iteration = 0; iteration < maxIterations; iteration++) {
      const before = context.getTransformations().length;
      current = this.run(current, context);
      if (context.getTransformations().length === before) {
        return current;
      }
    }
    throw new OptimizerError(
      ErrorCode.CLEANUP_DID_NOT_CONVERGE,
      `${this.steps.map((step) => step.name).join(", ")} still changing ` +
        `after ${maxIterations} iterations`,
    );
  }
}
