/**
 * Layout conversion removal
 */

export {
  removeLayoutConversions,
  DEFAULT_MAX_CLEANUP_ITERATIONS,
  type LayoutOptions,
  type LayoutResult,
} from "./remove-layout-conversions.js";
export {
  OptimizationPipeline,
  BaseOptimizationStep,
  createOptimizationContext,
  type OptimizationContext,
  type OptimizationStep,
  type Transformation,
  type TransformationType,
} from "./optimizer.js";
export { OptimizerError, ErrorCode as OptimizerErrorCode } from "./errors.js";
export {
  BackwardSlice,
  getConvertBackwardSlice,
  getRematerializableSlice,
  canBeRematerialized,
  rewriteSlice,
  type StopPredicate,
} from "./slice.js";
export * from "./steps/index.js";
export {
  LayoutInfo,
  LayoutMap,
  RegionRewriter,
  initAnchorLayout,
  isLayoutAnchor,
  hasConvertToAcceleratorTransitiveUse,
  propagateLayouts,
  resolveConflicts,
} from "./steps/layout-propagation/index.js";
export { pass } from "./pass.js";
