import { Type } from "./type.js";
import type { Layout } from "./layout.js";
import type { Operation } from "./operation.js";
import type { Region } from "./region.js";

/**
 * Ir value - either an operation result or a region argument
 *
 * Values are compared by identity; `id` only names them for printing.
 */
export type Value = Value.Result | Value.Argument;

export namespace Value {
  export interface Base {
    id: string;
    type: Type;
  }

  export interface Result extends Value.Base {
    kind: "result";
    owner: Operation;
    index: number;
  }

  export interface Argument extends Value.Base {
    kind: "argument";
    owner: Region;
    index: number;
  }

  export const result = (
    id: string,
    type: Type,
    owner: Operation,
    index: number,
  ): Result => ({ kind: "result", id, type, owner, index });

  export const argument = (
    id: string,
    type: Type,
    owner: Region,
    index: number,
  ): Argument => ({ kind: "argument", id, type, owner, index });

  /**
   * Operation producing the value, if it is a result
   */
  export function definingOp(value: Value): Operation | undefined {
    return value.kind === "result" ? value.owner : undefined;
  }

  export function isTensor(value: Value): boolean {
    return value.type.kind === "tensor";
  }

  export function layout(value: Value): Layout | undefined {
    return Type.layoutOf(value.type);
  }

  /**
   * Retype a tensor value in place with a new layout
   */
  export function setLayout(value: Value, layout: Layout): void {
    if (value.type.kind === "tensor") {
      value.type = Type.withLayout(value.type, layout);
    }
  }
}
