import { describe, it, expect } from "vitest";

import { InternalConsistencyError } from "#errors";
import type * as Ir from "#ir";
import type { LayoutOracle } from "#layouts";
import { parse } from "#parser";
import { Result } from "#result";

import { pass } from "./pass.js";
import { OptimizerError, ErrorCode } from "./errors.js";

const HEADER = `
  #blocked = blocked<sizePerThread = [1, 4], threadsPerWarp = [4, 8], warpsPerCTA = [4, 1], order = [1, 0]>
  #blocked1 = blocked<sizePerThread = [4, 1], threadsPerWarp = [8, 4], warpsPerCTA = [1, 4], order = [0, 1]>`;

function parseModule(source: string): Ir.Module {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

describe("layout pass", () => {
  it("should return the module and what changed", async () => {
    const ir = parseModule(`
module {${HEADER}
  func @f(%x: tensor<[64, 64], f32, #blocked>) {
    %c = convert_layout %x : tensor<[64, 64], f32, #blocked>
    return
  }
}
`);

    const result = await pass.run({ ir });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.ir).toBe(ir);
      expect(result.value.ir).toHaveOperationCount("convert_layout", 0);
      expect(result.value.transformations.length).toBeGreaterThan(0);
    }
  });

  it("should report invalid options as an error", async () => {
    const ir = parseModule(`module {${HEADER}\n}`);

    const result = await pass.run({
      ir,
      layout: { maxCleanupIterations: 0 },
    });

    expect(result.success).toBe(false);
    const error = Result.firstError(result);
    expect(error).toBeInstanceOf(OptimizerError);
    expect(error?.code).toBe(ErrorCode.INVALID_OPTIONS);
  });

  it("should let broken invariants escape", async () => {
    const blind: LayoutOracle = {
      inferDestinationLayout: (_, layout) => layout,
      inferSourceLayout: () => undefined,
      canFoldConversionInto: () => false,
      isExpensiveMemoryOp: () => false,
    };
    const ir = parseModule(`
module {${HEADER}
  func @f(%x: tensor<[64, 64], f32, #blocked>) {
    %n = neg %x : tensor<[64, 64], f32, #blocked1>
    return
  }
}
`);

    await expect(
      pass.run({ ir, layout: { oracle: blind } }),
    ).rejects.toBeInstanceOf(InternalConsistencyError);
  });
});
