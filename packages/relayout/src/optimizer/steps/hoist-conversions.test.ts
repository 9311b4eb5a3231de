import { describe, it, expect } from "vitest";

import * as Ir from "#ir";
import { DefaultLayoutOracle, Target } from "#layouts";
import { parse } from "#parser";
import { Result } from "#result";

import { HoistConversionsStep, isExtOrBroadcast } from "./hoist-conversions.js";
import { createOptimizationContext } from "../optimizer.js";

const HEADER = `
  #blocked = blocked<sizePerThread = [1, 4], threadsPerWarp = [4, 8], warpsPerCTA = [4, 1], order = [1, 0]>
  #blocked1 = blocked<sizePerThread = [4, 1], threadsPerWarp = [8, 4], warpsPerCTA = [1, 4], order = [0, 1]>`;

const T = (layout: string, element = "f32") =>
  `tensor<[64, 64], ${element}, #${layout}>`;

function parseModule(source: string): Ir.Module {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

describe("HoistConversionsStep", () => {
  const step = new HoistConversionsStep();

  function hoist(source: string) {
    const module = parseModule(source);
    const context = createOptimizationContext(
      new DefaultLayoutOracle(Target.DEFAULT),
    );
    step.run(module, context);
    Ir.Region.compact(module.functions[0].body);
    return { module, transformations: context.getTransformations() };
  }

  it("should convert before a widening cast", () => {
    const { module, transformations } = hoist(`
module {${HEADER}
  func @f(%s: tensor<[1, 64], f16, #blocked>, %q: tensor<[64, 64], ptr<f32>, #blocked1>) {
    %b = broadcast %s : ${T("blocked", "f16")}
    %e = extf %b : ${T("blocked")}
    %c = convert_layout %e : ${T("blocked1")}
    store %q, %c
    return
  }
}
`);

    expect(module).toMatchIr(`
module {${HEADER}
  func @f(%s: tensor<[1, 64], f16, #blocked>, %q: tensor<[64, 64], ptr<f32>, #blocked1>) {
    %b = broadcast %s : ${T("blocked", "f16")}
    %cv = convert_layout %b : ${T("blocked1", "f16")}
    %e1 = extf %cv : ${T("blocked1")}
    %e = extf %b : ${T("blocked")}
    store %q, %e1
    return
  }
}
`);
    expect(transformations).toHaveLength(1);
    expect(transformations[0]).toMatchObject({
      type: "move",
      pass: "hoist-conversions",
    });
    expect(transformations[0].reason).toMatch(/ above extf$/);
  });

  it("should not hoist above two widening operations", () => {
    const source = `
module {${HEADER}
  func @f(%s: ${T("blocked", "f16")}, %t: ${T("blocked", "f16")}) {
    %e = extf %s : ${T("blocked")}
    %g = extf %t : ${T("blocked")}
    %a = add %e, %g : ${T("blocked")}
    %c = convert_layout %a : ${T("blocked1")}
    return
  }
}
`;
    const { module, transformations } = hoist(source);

    expect(module).toMatchIr(source);
    expect(transformations).toHaveLength(0);
  });
});

describe("isExtOrBroadcast", () => {
  it("should match widening casts, broadcasts and dimension expansion", () => {
    const module = parseModule(`
module {${HEADER}
  func @f(%x: ${T("blocked", "f16")}, %i: ${T("blocked", "i32")}) {
    %a = extf %x : ${T("blocked")}
    %b = extsi %i : ${T("blocked", "i64")}
    %c = truncf %a : ${T("blocked", "f16")}
    %d = broadcast %x : ${T("blocked", "f16")}
    %e = neg %x : ${T("blocked", "f16")}
    return
  }
}
`);
    const matches = module.functions[0].body.operations
      .filter((op) => op.results.length > 0)
      .map((op) => isExtOrBroadcast(op));

    expect(matches).toEqual([true, true, false, true, false]);
  });
});
