import type * as Ir from "#ir/spec";

import { walk } from "./walk.js";

/**
 * One operand slot holding a value
 */
export interface Use {
  owner: Ir.Operation;
  index: number;
}

/**
 * Uses of a value by live operations, in program order
 */
export function usesOf(func: Ir.Function, value: Ir.Value): Use[] {
  const uses: Use[] = [];
  walk(func.body, (op) => {
    op.operands.forEach((operand, index) => {
      if (operand === value) {
        uses.push({ owner: op, index });
      }
    });
  });
  return uses;
}

/**
 * Operations using the value, each listed once, in program order
 */
export function usersOf(func: Ir.Function, value: Ir.Value): Ir.Operation[] {
  const users: Ir.Operation[] = [];
  for (const { owner } of usesOf(func, value)) {
    if (users[users.length - 1] !== owner) {
      users.push(owner);
    }
  }
  return users;
}

export function hasUses(func: Ir.Function, value: Ir.Value): boolean {
  let found = false;
  walk(func.body, (op) => {
    if (!found && op.operands.includes(value)) {
      found = true;
    }
  });
  return found;
}

/**
 * Use count for every value used by a live operation
 */
export function useCounts(func: Ir.Function): Map<Ir.Value, number> {
  const counts = new Map<Ir.Value, number>();
  walk(func.body, (op) => {
    for (const operand of op.operands) {
      counts.set(operand, (counts.get(operand) ?? 0) + 1);
    }
  });
  return counts;
}
