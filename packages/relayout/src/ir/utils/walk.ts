import { assert } from "#errors";
import type * as Ir from "#ir/spec";

/**
 * Visit every live operation nested in a region, parents before the
 * operations of their regions
 */
export function walk(region: Ir.Region, visit: (op: Ir.Operation) => void) {
  for (const op of region.operations) {
    if (op.dead) continue;
    visit(op);
    for (const nested of op.regions) {
      walk(nested, visit);
    }
  }
}

/**
 * All live operations of a function in program (pre-)order
 */
export function collectOperations(func: Ir.Function): Ir.Operation[] {
  const ops: Ir.Operation[] = [];
  walk(func.body, (op) => ops.push(op));
  return ops;
}

/**
 * Position of every live operation in program order
 */
export function programOrder(func: Ir.Function): Map<Ir.Operation, number> {
  const order = new Map<Ir.Operation, number>();
  walk(func.body, (op) => order.set(op, order.size));
  return order;
}

/**
 * Function a region ultimately belongs to
 */
export function enclosingFunction(region: Ir.Region): Ir.Function {
  let current = region;
  for (;;) {
    const parent = current.parent;
    if (parent.kind === "function") {
      return parent;
    }
    assert(parent.parent, `${parent.kind} is detached from its function`);
    current = parent.parent;
  }
}

/**
 * Region a value is defined in
 */
export function definingRegion(value: Ir.Value): Ir.Region | undefined {
  return value.kind === "argument" ? value.owner : value.owner.parent;
}

export function functionOf(value: Ir.Value): Ir.Function | undefined {
  const region = definingRegion(value);
  return region ? enclosingFunction(region) : undefined;
}
