/**
 * Custom matchers for modules and values
 *
 * Registered for every test file through `setupFiles`.
 */

import { expect } from "vitest";

import * as Ir from "#ir";
import { parse } from "#parser";
import { Result } from "#result";

interface IrMatchers<R = unknown> {
  /** Number of live operations with this textual name, in all functions */
  toHaveOperationCount(name: string, count: number): R;
  /** Layout of a tensor value */
  toHaveLayout(layout: Ir.Layout): R;
  /** Same text as the given source once both are formatted */
  toMatchIr(source: string): R;
}

declare module "vitest" {
  interface Assertion<T> extends IrMatchers<T> {}
  interface AsymmetricMatchersContaining extends IrMatchers {}
}

function isModule(value: unknown): value is Ir.Module {
  return (
    typeof value === "object" &&
    value !== null &&
    "functions" in value &&
    Array.isArray(value.functions) &&
    "layouts" in value &&
    value.layouts instanceof Map
  );
}

function isValue(value: unknown): value is Ir.Value {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    (value.kind === "result" || value.kind === "argument") &&
    "type" in value
  );
}

expect.extend({
  toHaveOperationCount(received: unknown, name: string, count: number) {
    if (!isModule(received)) {
      return { pass: false, message: () => "expected an Ir module" };
    }
    const actual = received.functions
      .flatMap((func) => Ir.Utils.collectOperations(func))
      .filter((op) => Ir.Operation.name(op) === name).length;
    return {
      pass: actual === count,
      message: () =>
        `expected ${this.isNot ? "not " : ""}${count} ${name} ` +
        `operation(s), found ${actual}`,
      actual,
      expected: count,
    };
  },

  toHaveLayout(received: unknown, layout: Ir.Layout) {
    if (!isValue(received)) {
      return { pass: false, message: () => "expected an Ir value" };
    }
    const actual = Ir.Value.layout(received);
    const expected = Ir.Layout.key(layout);
    return {
      pass: actual !== undefined && Ir.Layout.equals(actual, layout),
      message: () =>
        `expected ${received.id} ${this.isNot ? "not " : ""}to have ` +
        `${expected}, found ${actual ? Ir.Layout.key(actual) : "no layout"}`,
      actual: actual && Ir.Layout.key(actual),
      expected,
    };
  },

  toMatchIr(received: unknown, source: string) {
    if (!isModule(received)) {
      return { pass: false, message: () => "expected an Ir module" };
    }
    const parsed = parse(source);
    if (!parsed.success) {
      const error = Result.firstError(parsed);
      return {
        pass: false,
        message: () => `expected IR does not parse: ${error?.message}`,
      };
    }
    const actual = Ir.Analysis.format(received);
    const expected = Ir.Analysis.format(parsed.value);
    return {
      pass: actual === expected,
      message: () =>
        `expected module ${this.isNot ? "not " : ""}to match:\n` +
        `${expected}\n\nfound:\n${actual}`,
      actual,
      expected,
    };
  },
});
