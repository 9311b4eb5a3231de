/**
 * Test Runner
 *
 * Checks an optimized module against the counts a test block expects.
 */

import * as Ir from "#ir";

import type { OptimizedTest } from "./annotations.js";

export interface TestResult {
  passed: boolean;
  message?: string;
  expected?: unknown;
  actual?: unknown;
}

function countOperations(module: Ir.Module): Map<string, number> {
  const counts = new Map<string, number>();
  for (const func of module.functions) {
    for (const op of Ir.Utils.collectOperations(func)) {
      const name = Ir.Operation.name(op);
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }
  return counts;
}

export function runOptimizedTest(
  module: Ir.Module,
  test: OptimizedTest,
): TestResult {
  const counts = countOperations(module);

  const expected: Record<string, number> = { ...test.operations };
  if (test.conversions !== undefined) {
    expected.convert_layout = test.conversions;
  }

  for (const [name, count] of Object.entries(expected)) {
    const actual = counts.get(name) ?? 0;
    if (actual !== count) {
      return {
        passed: false,
        message:
          `Expected ${count} ${name} operation(s), found ${actual}\n\n` +
          Ir.Analysis.format(module),
        expected: count,
        actual,
      };
    }
  }

  return { passed: true };
}
