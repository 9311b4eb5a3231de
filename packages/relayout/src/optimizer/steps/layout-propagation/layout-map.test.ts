import { describe, it, expect } from "vitest";

import * as Ir from "#ir";

import { LayoutInfo, LayoutMap } from "./layout-map.js";

const BLOCKED = Ir.Layout.blocked([1, 4], [4, 8], [4, 1], [1, 0]);
const MMA = Ir.Layout.mma(2, 0, [2, 2], [16, 8]);

function tensorArgument(id: string, layout: Ir.Layout): Ir.Value {
  const func = Ir.Function.create("f");
  const arg = Ir.Value.argument(
    id,
    Ir.Type.tensor([64, 64], "f32", layout),
    func.body,
    func.body.arguments.length,
  );
  func.body.arguments.push(arg);
  return arg;
}

describe("LayoutInfo", () => {
  it("should keep candidates once, in insertion order", () => {
    const info = new LayoutInfo(BLOCKED);

    expect(info.add(MMA)).toBe(true);
    expect(info.add(Ir.Layout.blocked([1, 4], [4, 8], [4, 1], [1, 0]))).toBe(
      false,
    );
    expect(info.size).toBe(2);
    expect(info.layouts).toEqual([BLOCKED, MMA]);
    expect(info.first()).toBe(BLOCKED);
    expect(info.has(Ir.Layout.mma(2, 0, [2, 2], [16, 8]))).toBe(true);
  });

  it("should collapse to the picked layout", () => {
    const info = new LayoutInfo(BLOCKED);
    info.add(MMA);
    info.pick(MMA);

    expect(info.layouts).toEqual([MMA]);
    expect(new LayoutInfo().first()).toBe(undefined);
  });
});

describe("LayoutMap", () => {
  it("should create candidate sets on first access", () => {
    const map = new LayoutMap();
    const x = tensorArgument("%x", BLOCKED);

    expect(map.has(x)).toBe(false);
    expect(map.picked(x)).toBe(undefined);

    map.infoFor(x).add(MMA);
    map.infoFor(x).add(BLOCKED);

    expect(map.size).toBe(1);
    expect(map.values()).toHaveLength(1);
    expect(map.values()[0]).toBe(x);
    expect(map.picked(x)).toBe(MMA);
  });

  it("should dump one line per value in the order reached", () => {
    const map = new LayoutMap();
    const y = tensorArgument("%y", BLOCKED);
    const x = tensorArgument("%x", BLOCKED);
    map.infoFor(y).add(BLOCKED);
    map.infoFor(x).add(BLOCKED);
    map.infoFor(x).add(MMA);

    expect(map.dump()).toBe(
      [
        `%y: ${Ir.Layout.key(BLOCKED)}`,
        `%x: ${Ir.Layout.key(BLOCKED)} | ${Ir.Layout.key(MMA)}`,
      ].join("\n"),
    );
  });
});
