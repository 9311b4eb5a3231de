/**
 * Layout propagation: pick one layout per tensor value, starting from the
 * values whose layout is fixed, and rewrite the function accordingly
 */

import * as Ir from "#ir";
import type { LayoutOracle } from "#layouts";

import {
  BaseOptimizationStep,
  type OptimizationContext,
} from "../../optimizer.js";
import { LayoutMap } from "./layout-map.js";
import { initAnchorLayout } from "./anchors.js";
import { propagateLayouts } from "./propagate.js";
import { resolveConflicts } from "./resolve.js";
import { RegionRewriter } from "./rewrite.js";

export { LayoutInfo, LayoutMap } from "./layout-map.js";
export {
  isLayoutAnchor,
  hasConvertToAcceleratorTransitiveUse,
  initAnchorLayout,
} from "./anchors.js";
export { propagateLayouts, propagateToUsers } from "./propagate.js";
export { resolveConflicts } from "./resolve.js";
export { RegionRewriter } from "./rewrite.js";

/**
 * State of one propagation run over one function
 */
export class LayoutPropagation {
  layouts = new LayoutMap();

  constructor(
    private readonly func: Ir.Function,
    private readonly oracle: LayoutOracle,
  ) {}

  initAnchorLayout(): void {
    this.layouts = initAnchorLayout(this.func, this.oracle);
  }

  propagateLayout(): void {
    propagateLayouts(this.func, this.layouts, this.oracle);
  }

  resolveConflicts(): void {
    resolveConflicts(this.layouts);
  }

  rewrite(context: OptimizationContext, pass: string): void {
    new RegionRewriter(this.func, this.layouts, context, pass).run();
  }

  dump(): string {
    return this.layouts.dump();
  }
}

export class LayoutPropagationStep extends BaseOptimizationStep {
  name = "layout-propagation";

  run(module: Ir.Module, context: OptimizationContext): Ir.Module {
    this.processAllFunctions(module, (func) => {
      const propagation = new LayoutPropagation(func, context.oracle);
      propagation.initAnchorLayout();
      propagation.propagateLayout();
      propagation.resolveConflicts();
      propagation.rewrite(context, this.name);
    });
    return module;
  }
}
