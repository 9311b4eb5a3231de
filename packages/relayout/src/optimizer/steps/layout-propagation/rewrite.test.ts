import { describe, it, expect } from "vitest";

import { InternalConsistencyError } from "#errors";
import * as Ir from "#ir";
import { DefaultLayoutOracle, Target, type LayoutOracle } from "#layouts";
import { parse } from "#parser";
import { Result } from "#result";

import { createOptimizationContext } from "../../optimizer.js";
import { LayoutPropagation, LayoutPropagationStep } from "./index.js";
import { RegionRewriter } from "./rewrite.js";

const BLOCKED = Ir.Layout.blocked([1, 4], [4, 8], [4, 1], [1, 0]);
const BLOCKED1 = Ir.Layout.blocked([4, 1], [8, 4], [1, 4], [0, 1]);
const MMA = Ir.Layout.mma(2, 0, [2, 2], [16, 8]);
const B1D = Ir.Layout.blocked([1], [32], [4], [0]);
const B1D2 = Ir.Layout.blocked([4], [32], [1], [0]);

const HEADER = `
  #blocked = ${Ir.Layout.key(BLOCKED)}
  #blocked1 = ${Ir.Layout.key(BLOCKED1)}
  #mma = ${Ir.Layout.key(MMA)}
  #dota = dot_operand<opIdx = 0, parent = #mma, kWidth = 2>
  #dotb = dot_operand<opIdx = 1, parent = #mma, kWidth = 2>
  #row = ${Ir.Layout.key(B1D)}
  #row2 = ${Ir.Layout.key(B1D2)}`;

function parseModule(source: string): Ir.Module {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

function compact(module: Ir.Module): void {
  for (const func of module.functions) {
    Ir.Region.compact(func.body);
  }
}

describe("RegionRewriter", () => {
  const oracle = new DefaultLayoutOracle(Target.DEFAULT);

  it("should convert a value into a layout only once", () => {
    const module = parseModule(`
module {${HEADER}
  func @f(%x: tensor<[64, 64], f32, #blocked>) {
    %n = neg %x : tensor<[64, 64], f32, #blocked>
    return
  }
}
`);
    const func = module.functions[0];
    const [x] = Ir.Function.parameters(func);
    const propagation = new LayoutPropagation(func, oracle);
    propagation.initAnchorLayout();
    propagation.propagateLayout();
    propagation.resolveConflicts();

    const context = createOptimizationContext(oracle);
    const rewriter = new RegionRewriter(
      func,
      propagation.layouts,
      context,
      "test",
    );

    const first = rewriter.getValueAs(x, BLOCKED1);
    const second = rewriter.getValueAs(x, BLOCKED1);

    expect(second).toBe(first);
    expect(first).toHaveLayout(BLOCKED1);
    expect(rewriter.getValueAs(x, BLOCKED)).toBe(x);
    expect(module).toHaveOperationCount("convert_layout", 1);
    expect(context.getTransformations()).toHaveLength(1);
    expect(context.getTransformations()[0]).toMatchObject({
      type: "insert",
      pass: "test",
    });
  });

  it("should rebuild loops whose carried values change layout", () => {
    const module = parseModule(`
module {${HEADER}
  func @matmul(%a: tensor<[64, 64], f16, #dota>, %b: tensor<[64, 64], f16, #dotb>, %lb: i32, %q: tensor<[64, 64], ptr<f32>, #blocked>) {
    %z = constant[value = 0] : tensor<[64, 64], f32, #blocked>
    %r = for %lb, %lb, %lb, %z : tensor<[64, 64], f32, #blocked> {
      ^(%i: i32, %acc: tensor<[64, 64], f32, #blocked>)
      %c = convert_layout %acc : tensor<[64, 64], f32, #mma>
      %d = dot %a, %b, %c : tensor<[64, 64], f32, #mma>
      %y = convert_layout %d : tensor<[64, 64], f32, #blocked>
      yield %y
    }
    store %q, %r
    return
  }
}
`);
    new LayoutPropagationStep().run(module, createOptimizationContext(oracle));
    compact(module);

    const ops = module.functions[0].body.operations;
    const loop = ops.find(Ir.Operation.isFor);
    if (!loop) {
      throw new Error("expected a for loop");
    }
    expect(loop.results[0]).toHaveLayout(MMA);
    expect(Ir.Operation.For.iterArgs(loop)[0]).toHaveLayout(MMA);
    expect(Ir.Region.terminator(Ir.Operation.For.body(loop))?.operands[0]).toHaveLayout(
      MMA,
    );
    expect(module).toHaveOperationCount("convert_layout", 5);
    expect(Ir.Analysis.validate(module).isValid).toBe(true);
  });

  it("should bring scalar reductions' operands into the picked layout", () => {
    const module = parseModule(`
module {${HEADER}
  func @sum(%x: tensor<[128], f32, #row>) {
    %c = convert_layout %x : tensor<[128], f32, #row2>
    %s = reduce[axis = 0, combine = add] %c : f32
    return
  }
}
`);
    new LayoutPropagationStep().run(module, createOptimizationContext(oracle));
    compact(module);

    const reduce = module.functions[0].body.operations.find(
      (op) => op.kind === "reduce",
    );
    expect(reduce?.operands[0]).toHaveLayout(B1D);
  });

  it("should refuse operations it cannot infer operand layouts for", () => {
    const blind: LayoutOracle = {
      inferDestinationLayout: (_, layout) => layout,
      inferSourceLayout: () => undefined,
      canFoldConversionInto: () => false,
      isExpensiveMemoryOp: () => false,
    };
    const module = parseModule(`
module {${HEADER}
  func @f(%x: tensor<[64, 64], f32, #blocked>) {
    %n = neg %x : tensor<[64, 64], f32, #blocked1>
    return
  }
}
`);

    expect(() =>
      new LayoutPropagationStep().run(
        module,
        createOptimizationContext(blind),
      ),
    ).toThrow(InternalConsistencyError);
  });
});
