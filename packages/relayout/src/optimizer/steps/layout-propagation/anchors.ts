import * as Ir from "#ir";
import type { LayoutOracle } from "#layouts";

import { LayoutMap } from "./layout-map.js";

/**
 * Whether the layout an operation gives its results should be kept
 */
export function isLayoutAnchor(
  op: Ir.Operation,
  oracle: LayoutOracle,
): boolean {
  switch (op.kind) {
    case "load":
    case "store":
      return oracle.isExpensiveMemoryOp(op);
    case "dot":
    case "atomic_rmw":
    case "atomic_cas":
      return true;
    case "reshape":
      return op.allowReorder;
    default:
      return false;
  }
}

/**
 * Whether an accelerator-layout value ends up converted back into an
 * accelerator or matrix-operand layout somewhere downstream, following
 * loop-carried values around `for` back-edges
 */
export function hasConvertToAcceleratorTransitiveUse(
  func: Ir.Function,
  value: Ir.Value,
  layout: Ir.Layout.Mma,
): boolean {
  const order = Ir.Utils.programOrder(func);
  const slice = new Set<Ir.Operation>();
  const seen = new Set<Ir.Value>();
  const queue: Ir.Value[] = [value];

  while (queue.length > 0) {
    const current = queue.pop();
    if (!current || seen.has(current)) continue;
    seen.add(current);
    forwardSlice(func, current, slice);

    const ordered = [...slice].sort(
      (a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0),
    );
    for (const op of ordered) {
      if (op.kind === "convert_layout") {
        const target = Ir.Value.layout(op.results[0]);
        if (target && Ir.Layout.isAccelerator(target)) {
          return (
            target.versionMajor > 1 ||
            Ir.Layout.equals(target, layout)
          );
        }
        if (target && Ir.Layout.isMatrixOperand(target)) {
          return layout.versionMajor > 1;
        }
      }

      if (op.kind === "yield") {
        const parent = op.parent && Ir.Region.parentOp(op.parent);
        if (!parent || parent.kind !== "for") continue;
        const iterArgs = Ir.Operation.For.iterArgs(parent);
        op.operands.forEach((operand, index) => {
          const def = Ir.Value.definingOp(operand);
          const iterArg = iterArgs[index];
          if (def && slice.has(def) && iterArg && !seen.has(iterArg)) {
            queue.push(iterArg);
          }
        });
      }
    }
  }
  return false;
}

/**
 * Add every operation transitively using `value` to `slice`, following the
 * results of each user; a value entering a `for` as its initial value also
 * reaches the matching iteration argument
 */
function forwardSlice(
  func: Ir.Function,
  value: Ir.Value,
  slice: Set<Ir.Operation>,
): void {
  const stack: Ir.Value[] = [value];
  const visited = new Set<Ir.Value>();
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current || visited.has(current)) continue;
    visited.add(current);
    for (const user of Ir.Utils.usersOf(func, current)) {
      if (Ir.Operation.isFor(user)) {
        const iterArgs = Ir.Operation.For.iterArgs(user);
        Ir.Operation.For.inits(user).forEach((init, index) => {
          const iterArg = iterArgs[index];
          if (init === current && iterArg) {
            stack.push(iterArg);
          }
        });
      }
      if (slice.has(user)) continue;
      slice.add(user);
      stack.push(...user.results);
    }
  }
}

/**
 * Seed the layout map with every value whose layout must be kept: tensor
 * parameters, then tensor results of anchor operations in program order
 */
export function initAnchorLayout(
  func: Ir.Function,
  oracle: LayoutOracle,
): LayoutMap {
  const map = new LayoutMap();

  for (const param of Ir.Function.parameters(func)) {
    const layout = Ir.Value.layout(param);
    if (layout) {
      map.infoFor(param).add(layout);
    }
  }

  Ir.Utils.walk(func.body, (op) => {
    if (!isLayoutAnchor(op, oracle)) return;
    for (const result of op.results) {
      const layout = Ir.Value.layout(result);
      if (!layout) continue;
      // Accelerator results only anchor when something converts them back
      if (
        Ir.Layout.isAccelerator(layout) &&
        !hasConvertToAcceleratorTransitiveUse(func, op.results[0], layout)
      ) {
        continue;
      }
      map.infoFor(result).add(layout);
    }
  });

  return map;
}
