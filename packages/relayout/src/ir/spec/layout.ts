/**
 * Layout descriptors
 *
 * A layout says how the elements of a tensor are distributed over threads,
 * warps and hardware tiles. The optimizer treats them as opaque values that
 * can be compared (through their canonical key) and sorted into families.
 */
export type Layout =
  | Layout.Blocked
  | Layout.Mma
  | Layout.DotOperand
  | Layout.Slice
  | Layout.Shared;

export namespace Layout {
  /** Generic distributed layout */
  export interface Blocked {
    kind: "blocked";
    sizePerThread: number[];
    threadsPerWarp: number[];
    warpsPerCTA: number[];
    order: number[];
  }

  /** Accumulator layout of the matrix-multiply units */
  export interface Mma {
    kind: "mma";
    versionMajor: number;
    versionMinor: number;
    warpsPerCTA: number[];
    instrShape: number[];
  }

  /** Operand `opIdx` of a matrix multiply whose result uses `parent` */
  export interface DotOperand {
    kind: "dot_operand";
    opIdx: 0 | 1;
    parent: Layout;
    kWidth: number;
  }

  /** `parent` with dimension `dim` removed */
  export interface Slice {
    kind: "slice";
    dim: number;
    parent: Layout;
  }

  /** Staging layout in shared memory */
  export interface Shared {
    kind: "shared";
    vec: number;
    perPhase: number;
    maxPhase: number;
    order: number[];
  }

  export type Family =
    | "generic"
    | "accelerator"
    | "matrix_operand"
    | "slice"
    | "staging";

  export const blocked = (
    sizePerThread: number[],
    threadsPerWarp: number[],
    warpsPerCTA: number[],
    order: number[],
  ): Blocked => ({
    kind: "blocked",
    sizePerThread,
    threadsPerWarp,
    warpsPerCTA,
    order,
  });

  export const mma = (
    versionMajor: number,
    versionMinor: number,
    warpsPerCTA: number[],
    instrShape: number[],
  ): Mma => ({
    kind: "mma",
    versionMajor,
    versionMinor,
    warpsPerCTA,
    instrShape,
  });

  export const dotOperand = (
    opIdx: 0 | 1,
    parent: Layout,
    kWidth: number,
  ): DotOperand => ({ kind: "dot_operand", opIdx, parent, kWidth });

  export const slice = (dim: number, parent: Layout): Slice => ({
    kind: "slice",
    dim,
    parent,
  });

  export const shared = (
    vec: number,
    perPhase: number,
    maxPhase: number,
    order: number[],
  ): Shared => ({ kind: "shared", vec, perPhase, maxPhase, order });

  const list = (values: number[]): string => `[${values.join(", ")}]`;

  /**
   * Canonical textual form; two layouts are equal iff their keys are
   */
  export function key(layout: Layout): string {
    switch (layout.kind) {
      case "blocked":
        return (
          `blocked<sizePerThread = ${list(layout.sizePerThread)}, ` +
          `threadsPerWarp = ${list(layout.threadsPerWarp)}, ` +
          `warpsPerCTA = ${list(layout.warpsPerCTA)}, ` +
          `order = ${list(layout.order)}>`
        );
      case "mma":
        return (
          `mma<versionMajor = ${layout.versionMajor}, ` +
          `versionMinor = ${layout.versionMinor}, ` +
          `warpsPerCTA = ${list(layout.warpsPerCTA)}, ` +
          `instrShape = ${list(layout.instrShape)}>`
        );
      case "dot_operand":
        return (
          `dot_operand<opIdx = ${layout.opIdx}, ` +
          `parent = ${key(layout.parent)}, kWidth = ${layout.kWidth}>`
        );
      case "slice":
        return `slice<dim = ${layout.dim}, parent = ${key(layout.parent)}>`;
      case "shared":
        return (
          `shared<vec = ${layout.vec}, perPhase = ${layout.perPhase}, ` +
          `maxPhase = ${layout.maxPhase}, order = ${list(layout.order)}>`
        );
    }
  }

  export function equals(a: Layout, b: Layout): boolean {
    return a === b || key(a) === key(b);
  }

  /**
   * Number of tensor dimensions the layout describes
   */
  export function rank(layout: Layout): number {
    switch (layout.kind) {
      case "blocked":
        return layout.order.length;
      case "mma":
        return layout.warpsPerCTA.length;
      case "dot_operand":
        return rank(layout.parent);
      case "slice":
        return rank(layout.parent) - 1;
      case "shared":
        return layout.order.length;
    }
  }

  export function family(layout: Layout): Family {
    switch (layout.kind) {
      case "blocked":
        return "generic";
      case "mma":
        return "accelerator";
      case "dot_operand":
        return "matrix_operand";
      case "slice":
        return "slice";
      case "shared":
        return "staging";
    }
  }

  export const isGeneric = (layout: Layout): layout is Blocked =>
    layout.kind === "blocked";

  export const isAccelerator = (layout: Layout): layout is Mma =>
    layout.kind === "mma";

  export const isMatrixOperand = (layout: Layout): layout is DotOperand =>
    layout.kind === "dot_operand";

  export const isStaging = (layout: Layout): layout is Shared =>
    layout.kind === "shared";
}
