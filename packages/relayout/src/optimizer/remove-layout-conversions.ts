/**
 * The layout conversion removal pipeline
 */

import type * as Ir from "#ir";
import { DefaultLayoutOracle, Target, type LayoutOracle } from "#layouts";

import {
  OptimizationPipeline,
  createOptimizationContext,
  type Transformation,
} from "./optimizer.js";
import { OptimizerError, ErrorCode } from "./errors.js";
import {
  LayoutPropagationStep,
  CanonicalizeConversionsStep,
  DeadCodeEliminationStep,
  BackwardRematerializationStep,
  HoistConversionsStep,
  DecomposeDotConvertStep,
  LoopArgumentEliminationStep,
  LoopPassThroughFoldingStep,
} from "./steps/index.js";

export interface LayoutOptions {
  /** Overrides the module's `num_warps` */
  numWarps?: number;
  /** Overrides the module's `threads_per_warp` */
  threadsPerWarp?: number;
  /** Layout inference to use instead of the bundled rules */
  oracle?: LayoutOracle;
  /** Bound on the rounds of each greedy cleanup phase */
  maxCleanupIterations?: number;
}

export const DEFAULT_MAX_CLEANUP_ITERATIONS = 10;

export interface LayoutResult {
  module: Ir.Module;
  transformations: Transformation[];
}

/**
 * Rewrite a module so that as few layout conversions as possible remain.
 * The module is changed in place.
 *
 * Throws `OptimizerError` when a cleanup phase does not converge.
 */
export function removeLayoutConversions(
  module: Ir.Module,
  options: LayoutOptions = {},
): LayoutResult {
  const maxIterations =
    options.maxCleanupIterations ?? DEFAULT_MAX_CLEANUP_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new OptimizerError(
      ErrorCode.INVALID_OPTIONS,
      `maxCleanupIterations must be a positive integer, got ${maxIterations}`,
    );
  }

  const oracle =
    options.oracle ??
    new DefaultLayoutOracle(Target.fromModule(module, options));
  const context = createOptimizationContext(oracle);

  const propagate = new OptimizationPipeline([new LayoutPropagationStep()]);
  const canonicalize = new OptimizationPipeline([
    new CanonicalizeConversionsStep(),
    new DeadCodeEliminationStep(),
  ]);
  const rematerialize = new OptimizationPipeline([
    new BackwardRematerializationStep(),
  ]);
  const hoist = new OptimizationPipeline([new HoistConversionsStep()]);
  const decompose = new OptimizationPipeline([new DecomposeDotConvertStep()]);
  const cleanup = new OptimizationPipeline([
    new LoopArgumentEliminationStep(),
    new LoopPassThroughFoldingStep(),
    new CanonicalizeConversionsStep(),
    new DeadCodeEliminationStep(),
  ]);

  let current = propagate.run(module, context);
  current = canonicalize.runToFixpoint(current, context, maxIterations);
  current = rematerialize.run(current, context);
  current = hoist.run(current, context);
  current = decompose.runToFixpoint(current, context, maxIterations);
  current = cleanup.runToFixpoint(current, context, maxIterations);

  return { module: current, transformations: context.getTransformations() };
}
