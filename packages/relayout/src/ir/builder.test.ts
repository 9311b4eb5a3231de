import { describe, it, expect } from "vitest";

import { InternalConsistencyError } from "#errors";
import * as Ir from "#ir";
import { parse } from "#parser";
import { Result } from "#result";

const BLOCKED = Ir.Layout.blocked([1, 4], [4, 8], [4, 1], [1, 0]);
const BLOCKED1 = Ir.Layout.blocked([4, 1], [8, 4], [1, 4], [0, 1]);

function parseModule(source: string): Ir.Module {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

function loopKernel(): Ir.Function {
  const module = parseModule(`
module {
  #blocked = ${Ir.Layout.key(BLOCKED)}
  func @kernel(%x: tensor<[64, 64], f32, #blocked>, %lb: i32) {
    %y = exp %x : tensor<[64, 64], f32, #blocked>
    %r = for %lb, %lb, %lb, %y : tensor<[64, 64], f32, #blocked> {
      ^(%i: i32, %acc: tensor<[64, 64], f32, #blocked>)
      %n = neg %acc : tensor<[64, 64], f32, #blocked>
      yield %n
    }
    return
  }
}
`);
  return module.functions[0];
}

describe("Builder", () => {
  it("should insert before and after operations", () => {
    const func = loopKernel();
    const [exp, loop] = func.body.operations;
    const [x] = Ir.Function.parameters(func);

    const builder = Ir.Builder.after(exp);
    const converted = builder.convertLayout(x, BLOCKED1);
    Ir.Builder.before(exp).convertLayout(x, BLOCKED1);

    const ops = func.body.operations;
    expect(ops.map((op) => op.kind)).toEqual([
      "convert_layout",
      "unary",
      "convert_layout",
      "for",
      "return",
    ]);
    expect(ops[2]).toBe(converted.owner);
    expect(ops[3]).toBe(loop);
    expect(converted.owner.parent).toBe(func.body);
    expect(converted).toHaveLayout(BLOCKED1);
  });

  it("should name created values after the last parsed value", () => {
    const func = loopKernel();
    const [x] = Ir.Function.parameters(func);

    const converted = new Ir.Builder(func).convertLayout(x, BLOCKED1);
    expect(converted.id).toBe(`%${func.nextValueId - 1}`);
  });

  it("should insert at the start of a region after a value", () => {
    const func = loopKernel();
    const loop = func.body.operations[1];
    if (!Ir.Operation.isFor(loop)) {
      throw new Error("expected a for loop");
    }
    const body = Ir.Operation.For.body(loop);
    const [, acc] = body.arguments;

    const builder = new Ir.Builder(func);
    builder.setInsertionPointAfterValue(acc);
    const converted = builder.convertLayout(acc, BLOCKED1);

    expect(body.operations[0]).toBe(converted.owner);
    expect(converted.owner.parent).toBe(body);
  });

  it("should clone operations with their regions", () => {
    const func = loopKernel();
    const [exp, loop] = func.body.operations;

    const mapping = new Map<Ir.Value, Ir.Value>();
    const builder = Ir.Builder.before(loop);
    const expCopy = builder.clone(exp, mapping);
    const loopCopy = builder.clone(loop, mapping);

    expect(mapping.get(exp.results[0])).toBe(expCopy.results[0]);
    expect(loopCopy.operands[3]).toBe(expCopy.results[0]);

    const body = loopCopy.regions[0];
    expect(body.parent).toBe(loopCopy);
    expect(body.arguments).toHaveLength(2);
    const [neg, yieldOp] = body.operations;
    expect(neg.operands[0]).toBe(body.arguments[1]);
    expect(yieldOp.operands[0]).toBe(neg.results[0]);
    expect(neg.parent).toBe(body);
    // The original is untouched
    expect(loop.regions[0].operations[0].operands[0]).toBe(
      loop.regions[0].arguments[1],
    );
  });

  it("should redirect uses except the excluded ones", () => {
    const func = loopKernel();
    const [exp, loop] = func.body.operations;
    const [x] = Ir.Function.parameters(func);

    const builder = Ir.Builder.before(loop);
    const converted = builder.convertLayout(exp.results[0], BLOCKED1);
    builder.replaceAllUsesWith(
      exp.results[0],
      x,
      (user) => user === converted.owner,
    );

    expect(loop.operands[3]).toBe(x);
    expect(converted.owner.operands[0]).toBe(exp.results[0]);
  });

  it("should move regions and operations between owners", () => {
    const func = loopKernel();
    const [exp, loop] = func.body.operations;

    const builder = Ir.Builder.before(loop);
    const empty = builder.create(
      { kind: "for" },
      { operands: [...loop.operands], resultTypes: [loop.results[0].type] },
    );
    const body = loop.regions[0];
    builder.moveRegions(loop, empty);

    expect(loop.regions).toHaveLength(0);
    expect(empty.regions[0]).toBe(body);
    expect(body.parent).toBe(empty);

    builder.spliceOperations(func.body, body);
    expect(func.body.operations).toHaveLength(0);
    expect(body.operations[0]).toBe(exp);
    expect(exp.parent).toBe(body);
  });

  it("should refuse to insert next to detached operations", () => {
    const func = loopKernel();
    const [exp] = func.body.operations;
    exp.parent = undefined;

    expect(() => Ir.Builder.before(exp)).toThrow(InternalConsistencyError);
  });

  it("should refuse to convert scalars", () => {
    const func = loopKernel();
    const [, lb] = Ir.Function.parameters(func);

    expect(() => new Ir.Builder(func).convertLayout(lb, BLOCKED1)).toThrow(
      "cannot convert the layout of scalar %lb",
    );
  });
});
