export {
  LayoutPropagationStep,
  LayoutPropagation,
} from "./layout-propagation/index.js";
export { CanonicalizeConversionsStep } from "./canonicalize-conversions.js";
export { DeadCodeEliminationStep } from "./dead-code-elimination.js";
export { BackwardRematerializationStep } from "./backward-rematerialization.js";
export {
  HoistConversionsStep,
  isExtOrBroadcast,
} from "./hoist-conversions.js";
export { DecomposeDotConvertStep } from "./decompose-dot-convert.js";
export {
  LoopArgumentEliminationStep,
  LoopPassThroughFoldingStep,
} from "./loop-arguments.js";
