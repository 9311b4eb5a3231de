/**
 * IR Validator - checks IR consistency and correctness
 */

import * as Ir from "#ir/spec";

import { IrError, ErrorCode } from "../errors.js";
import { Formatter } from "./formatter.js";

export interface ValidationResult {
  isValid: boolean;
  errors: IrError[];
  warnings: IrError[];
}

/**
 * Values visible at a point of the region tree
 */
class Scope {
  private values = new Set<Ir.Value>();

  constructor(private readonly parent?: Scope) {}

  add(value: Ir.Value): void {
    this.values.add(value);
  }

  has(value: Ir.Value): boolean {
    return this.values.has(value) || (this.parent?.has(value) ?? false);
  }
}

const EXPECTED_REGIONS: Partial<Record<Ir.Operation.Kind, number>> = {
  for: 1,
  while: 2,
  if: 2,
};

export class Validator {
  private errors: IrError[] = [];
  private warnings: IrError[] = [];
  private formatter = new Formatter();

  validate(module: Ir.Module): ValidationResult {
    this.errors = [];
    this.warnings = [];

    for (const func of module.functions) {
      this.validateFunction(func);
    }

    return {
      isValid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
    };
  }

  validateFunction(func: Ir.Function): void {
    const scope = new Scope();
    for (const param of Ir.Function.parameters(func)) {
      scope.add(param);
    }
    this.validateRegion(func.body, scope, "return");
  }

  private validateRegion(
    region: Ir.Region,
    scope: Scope,
    terminator: Ir.Operation.Kind,
  ): void {
    const terminatorOp = Ir.Region.terminator(region);
    if (!terminatorOp || terminatorOp.kind !== terminator) {
      this.error(ErrorCode.MISSING_TERMINATOR, `expected ${terminator}`);
    }

    for (const op of Ir.Region.live(region)) {
      this.validateOperands(op, scope);
      this.validateOperation(op);

      const regionTerminators = this.regionTerminators(op);
      op.regions.forEach((nested, index) => {
        const inner = new Scope(scope);
        for (const arg of nested.arguments) {
          inner.add(arg);
        }
        this.validateRegion(nested, inner, regionTerminators[index]);
      });

      for (const result of op.results) {
        scope.add(result);
      }
    }
  }

  private regionTerminators(op: Ir.Operation): Ir.Operation.Kind[] {
    switch (op.kind) {
      case "while":
        return ["condition", "yield"];
      default:
        return op.regions.map(() => "yield");
    }
  }

  private validateOperands(op: Ir.Operation, scope: Scope): void {
    op.operands.forEach((operand, index) => {
      if (operand.kind === "result" && operand.owner.dead) {
        this.error(
          ErrorCode.DEAD_OPERAND,
          `operand ${index} of ${Ir.Operation.name(op)}`,
          op,
        );
      } else if (!scope.has(operand)) {
        this.error(
          ErrorCode.UNDEFINED_VALUE,
          `operand ${index} of ${Ir.Operation.name(op)}`,
          op,
        );
      }
    });
  }

  private validateOperation(op: Ir.Operation): void {
    const expectedRegions = EXPECTED_REGIONS[op.kind] ?? 0;
    if (op.regions.length !== expectedRegions) {
      this.error(
        ErrorCode.REGION_COUNT,
        `${Ir.Operation.name(op)} has ${op.regions.length}, ` +
          `expected ${expectedRegions}`,
        op,
      );
      return;
    }

    switch (op.kind) {
      case "convert_layout":
        this.validateConversion(op);
        break;
      case "for":
        this.validateFor(op);
        break;
      case "while":
        this.validateWhile(op);
        break;
      case "if":
        this.validateIf(op);
        break;
    }
  }

  private validateConversion(op: Ir.Operation.ConvertLayout): void {
    const [source] = op.operands;
    const [result] = op.results;
    if (!source || !result) {
      this.error(ErrorCode.CONVERSION_SHAPE, "missing operand or result", op);
      return;
    }
    const from = source.type;
    const to = result.type;
    if (from.kind !== "tensor" || to.kind !== "tensor") {
      this.error(ErrorCode.CONVERSION_SHAPE, "operands must be tensors", op);
      return;
    }
    const sameShape =
      from.element === to.element &&
      from.shape.length === to.shape.length &&
      from.shape.every((dim, i) => dim === to.shape[i]);
    if (!sameShape) {
      this.error(
        ErrorCode.CONVERSION_SHAPE,
        `${this.formatter.formatType(from)} to ${this.formatter.formatType(to)}`,
        op,
      );
    }
  }

  private validateFor(op: Ir.Operation.For): void {
    const inits = Ir.Operation.For.inits(op);
    const iterArgs = Ir.Operation.For.iterArgs(op);

    this.expectTypes(
      op,
      "iteration arguments",
      inits.map((init) => init.type),
      iterArgs.map((arg) => arg.type),
    );
    this.expectTypes(
      op,
      "results",
      iterArgs.map((arg) => arg.type),
      op.results.map((result) => result.type),
    );

    const terminator = Ir.Region.terminator(Ir.Operation.For.body(op));
    if (terminator) {
      this.expectTypes(
        terminator,
        "yield",
        op.results.map((result) => result.type),
        terminator.operands.map((operand) => operand.type),
      );
    }
  }

  private validateWhile(op: Ir.Operation.While): void {
    const before = Ir.Operation.While.before(op);
    const after = Ir.Operation.While.after(op);

    this.expectTypes(
      op,
      "before arguments",
      op.operands.map((operand) => operand.type),
      before.arguments.map((arg) => arg.type),
    );

    const condition = Ir.Region.terminator(before);
    if (condition) {
      const forwarded = condition.operands.slice(1).map((v) => v.type);
      this.expectTypes(
        condition,
        "condition",
        op.results.map((result) => result.type),
        forwarded,
      );
      this.expectTypes(
        condition,
        "after arguments",
        after.arguments.map((arg) => arg.type),
        forwarded,
      );
    }

    const yieldOp = Ir.Region.terminator(after);
    if (yieldOp) {
      this.expectTypes(
        yieldOp,
        "yield",
        before.arguments.map((arg) => arg.type),
        yieldOp.operands.map((operand) => operand.type),
      );
    }
  }

  private validateIf(op: Ir.Operation.If): void {
    for (const region of op.regions) {
      const terminator = Ir.Region.terminator(region);
      if (terminator) {
        this.expectTypes(
          terminator,
          "yield",
          op.results.map((result) => result.type),
          terminator.operands.map((operand) => operand.type),
        );
      }
    }
  }

  private expectTypes(
    op: Ir.Operation,
    what: string,
    expected: Ir.Type[],
    actual: Ir.Type[],
  ): void {
    if (expected.length !== actual.length) {
      this.error(
        ErrorCode.TERMINATOR_ARITY,
        `${what}: expected ${expected.length}, found ${actual.length}`,
        op,
      );
      return;
    }
    expected.forEach((type, index) => {
      if (!Ir.Type.equals(type, actual[index])) {
        this.error(
          ErrorCode.TERMINATOR_TYPE,
          `${what} ${index}: expected ${this.formatter.formatType(type)}, ` +
            `found ${this.formatter.formatType(actual[index])}`,
          op,
        );
      }
    });
  }

  private error(code: ErrorCode, message: string, op?: Ir.Operation): void {
    this.errors.push(new IrError(code, message, op?.debug.loc));
  }
}

/**
 * Validate a module
 */
export function validate(module: Ir.Module): ValidationResult {
  return new Validator().validate(module);
}
