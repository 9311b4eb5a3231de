import * as Ir from "#ir";

import type { LayoutOracle, Target } from "./oracle.js";

/**
 * Inference rules for the bundled layout catalogue
 */
export class DefaultLayoutOracle implements LayoutOracle {
  constructor(private readonly target: Target) {}

  inferDestinationLayout(
    op: Ir.Operation,
    source: Ir.Layout,
  ): Ir.Layout | undefined {
    switch (op.kind) {
      case "reduce":
        return Ir.Layout.slice(op.axis, source);
      case "expand_dims":
        return source.kind === "slice" && source.dim === op.axis
          ? source.parent
          : undefined;
      case "reshape":
        return this.reshapeLayout(op, source);
      case "join":
        return appendTrailingDimension(source);
      case "split":
        return dropTrailingDimension(source);
      default:
        return passesLayoutThrough(op) ? source : undefined;
    }
  }

  inferSourceLayout(
    op: Ir.Operation,
    result: Ir.Layout,
  ): Ir.Layout | undefined {
    switch (op.kind) {
      case "reduce":
        return result.kind === "slice" && result.dim === op.axis
          ? result.parent
          : undefined;
      case "expand_dims":
        return Ir.Layout.slice(op.axis, result);
      case "reshape":
        return this.reshapeLayout(op, result);
      case "join":
        return dropTrailingDimension(result);
      case "split":
        return appendTrailingDimension(result);
      default:
        return passesLayoutThrough(op) ? result : undefined;
    }
  }

  canFoldConversionInto(op: Ir.Operation, layout: Ir.Layout): boolean {
    switch (op.kind) {
      case "constant":
      case "splat":
      case "make_range":
        return true;
      case "reshape":
        return op.allowReorder;
      case "convert_layout": {
        // Converting into an accelerator layout only folds when it is the
        // layout the source already has
        if (!Ir.Layout.isAccelerator(layout)) return true;
        const source = Ir.Value.layout(op.operands[0]);
        return source !== undefined && Ir.Layout.equals(source, layout);
      }
      default:
        return false;
    }
  }

  isExpensiveMemoryOp(op: Ir.Operation): boolean {
    if (op.kind !== "load" && op.kind !== "store") {
      return false;
    }
    const pointer = op.operands[0]?.type;
    if (!pointer || pointer.kind !== "tensor") {
      return false;
    }
    const { numWarps, threadsPerWarp } = this.target;
    return Ir.Type.numElements(pointer) >= numWarps * threadsPerWarp;
  }

  /**
   * A reshape that keeps the rank keeps the layout; reordering reshapes
   * and rank changes have no inferable layout
   */
  private reshapeLayout(
    op: Ir.Operation.Reshape,
    layout: Ir.Layout,
  ): Ir.Layout | undefined {
    if (op.allowReorder) return undefined;
    const source = op.operands[0]?.type;
    const result = op.results[0]?.type;
    if (source?.kind !== "tensor" || result?.kind !== "tensor") {
      return undefined;
    }
    return source.shape.length === result.shape.length ? layout : undefined;
  }
}

/**
 * Elementwise, layout-preserving and control-flow operations hand the
 * layout on unchanged
 */
function passesLayoutThrough(op: Ir.Operation): boolean {
  return (
    Ir.Operation.isLayoutTransparent(op) ||
    Ir.Operation.hasTrait(op, "control") ||
    Ir.Operation.hasTrait(op, "terminator")
  );
}

/**
 * Blocked layout with a new innermost dimension of two elements per thread
 */
function appendTrailingDimension(layout: Ir.Layout): Ir.Layout | undefined {
  if (layout.kind !== "blocked") return undefined;
  const rank = layout.order.length;
  return Ir.Layout.blocked(
    [...layout.sizePerThread, 2],
    [...layout.threadsPerWarp, 1],
    [...layout.warpsPerCTA, 1],
    [rank, ...layout.order],
  );
}

/**
 * Inverse of `appendTrailingDimension`
 */
function dropTrailingDimension(layout: Ir.Layout): Ir.Layout | undefined {
  if (layout.kind !== "blocked") return undefined;
  const rank = layout.order.length;
  const last = rank - 1;
  if (
    rank < 2 ||
    layout.order[0] !== last ||
    layout.sizePerThread[last] !== 2 ||
    layout.threadsPerWarp[last] !== 1 ||
    layout.warpsPerCTA[last] !== 1
  ) {
    return undefined;
  }
  return Ir.Layout.blocked(
    layout.sizePerThread.slice(0, last),
    layout.threadsPerWarp.slice(0, last),
    layout.warpsPerCTA.slice(0, last),
    layout.order.slice(1),
  );
}
