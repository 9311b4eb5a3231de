import { assert, type SourceLocation } from "#errors";
import * as Ir from "#ir/spec";

import { walk, enclosingFunction } from "./utils/index.js";

export interface CreateOptions {
  operands: Ir.Value[];
  resultTypes: Ir.Type[];
  /** Argument types of each nested region to create */
  regions?: Ir.Type[][];
  loc?: SourceLocation;
}

/**
 * Creates, clones and rewires operations of one function at a movable
 * insertion point
 */
export class Builder {
  private region: Ir.Region;
  /** Insert before this operation; at the end of the region if undefined */
  private anchor: Ir.Operation | undefined;

  constructor(public readonly func: Ir.Function) {
    this.region = func.body;
    this.anchor = undefined;
  }

  /**
   * Builder for the function containing an operation, positioned before it
   */
  static before(op: Ir.Operation): Builder {
    assert(op.parent, `${Ir.Operation.name(op)} is detached`);
    const builder = new Builder(enclosingFunction(op.parent));
    builder.setInsertionPointBefore(op);
    return builder;
  }

  static after(op: Ir.Operation): Builder {
    assert(op.parent, `${Ir.Operation.name(op)} is detached`);
    const builder = new Builder(enclosingFunction(op.parent));
    builder.setInsertionPointAfter(op);
    return builder;
  }

  setInsertionPointBefore(op: Ir.Operation): void {
    assert(op.parent, `${Ir.Operation.name(op)} is detached`);
    this.region = op.parent;
    this.anchor = op;
  }

  setInsertionPointAfter(op: Ir.Operation): void {
    assert(op.parent, `${Ir.Operation.name(op)} is detached`);
    const ops = op.parent.operations;
    this.region = op.parent;
    this.anchor = ops[ops.indexOf(op) + 1];
  }

  /**
   * Right after the definition of a value: after its defining operation,
   * or at the start of the region owning the argument
   */
  setInsertionPointAfterValue(value: Ir.Value): void {
    if (value.kind === "result") {
      this.setInsertionPointAfter(value.owner);
    } else {
      this.setInsertionPointToStart(value.owner);
    }
  }

  setInsertionPointToStart(region: Ir.Region): void {
    this.region = region;
    this.anchor = region.operations[0];
  }

  setInsertionPointToEnd(region: Ir.Region): void {
    this.region = region;
    this.anchor = undefined;
  }

  /**
   * Create an operation at the insertion point. Results get fresh values of
   * the given types; regions are created empty with typed arguments.
   */
  create(spec: Ir.Operation.Spec, options: CreateOptions): Ir.Operation {
    const op: Ir.Operation = {
      ...spec,
      operands: [...options.operands],
      results: [],
      regions: [],
      parent: undefined,
      dead: false,
      debug: options.loc ? { loc: options.loc } : {},
    };
    op.results = options.resultTypes.map((type, index) =>
      Ir.Value.result(Ir.Function.freshId(this.func), type, op, index),
    );
    for (const argumentTypes of options.regions ?? []) {
      const region = Ir.Region.create(op);
      region.arguments = argumentTypes.map((type, index) =>
        Ir.Value.argument(Ir.Function.freshId(this.func), type, region, index),
      );
      op.regions.push(region);
    }
    this.insert(op);
    return op;
  }

  /**
   * Copy an operation at the insertion point, replacing operands found in
   * `mapping` and recording each original result against its copy. Nested
   * regions are copied recursively.
   */
  clone(op: Ir.Operation, mapping: Map<Ir.Value, Ir.Value>): Ir.Operation {
    const copy = this.create(op, {
      operands: op.operands.map((operand) => mapping.get(operand) ?? operand),
      resultTypes: op.results.map((result) => result.type),
      regions: op.regions.map((region) =>
        region.arguments.map((argument) => argument.type),
      ),
      loc: op.debug.loc,
    });
    op.results.forEach((result, index) => {
      mapping.set(result, copy.results[index]);
    });

    const nested = new Builder(this.func);
    op.regions.forEach((region, index) => {
      const target = copy.regions[index];
      region.arguments.forEach((argument, i) => {
        mapping.set(argument, target.arguments[i]);
      });
      nested.setInsertionPointToEnd(target);
      for (const inner of Ir.Region.live(region)) {
        nested.clone(inner, mapping);
      }
    });
    return copy;
  }

  /**
   * Insert a `convert_layout` of `value` into `layout`
   */
  convertLayout(
    value: Ir.Value,
    layout: Ir.Layout,
    loc?: SourceLocation,
  ): Ir.Value.Result {
    assert(
      value.type.kind === "tensor",
      `cannot convert the layout of scalar ${value.id}`,
    );
    const op = this.create(
      { kind: "convert_layout" },
      {
        operands: [value],
        resultTypes: [Ir.Type.withLayout(value.type, layout)],
        loc,
      },
    );
    return op.results[0];
  }

  /**
   * Redirect every use of `from` by a live operation of the function to
   * `to`, except in operations `exclude` accepts
   */
  replaceAllUsesWith(
    from: Ir.Value,
    to: Ir.Value,
    exclude?: (user: Ir.Operation) => boolean,
  ): void {
    if (from === to) return;
    walk(this.func.body, (op) => {
      if (exclude?.(op)) return;
      op.operands.forEach((operand, index) => {
        if (operand === from) {
          op.operands[index] = to;
        }
      });
    });
  }

  /**
   * Move the regions of `from` into `to`, replacing any regions `to` had
   */
  moveRegions(from: Ir.Operation, to: Ir.Operation): void {
    to.regions = from.regions;
    for (const region of to.regions) {
      region.parent = to;
    }
    from.regions = [];
  }

  /**
   * Move every operation of `from` to the start of `to`
   */
  spliceOperations(from: Ir.Region, to: Ir.Region): void {
    for (const op of from.operations) {
      op.parent = to;
    }
    to.operations = [...from.operations, ...to.operations];
    from.operations = [];
  }

  markDead(op: Ir.Operation): void {
    op.dead = true;
  }

  private insert(op: Ir.Operation): void {
    const ops = this.region.operations;
    const index = this.anchor ? ops.indexOf(this.anchor) : ops.length;
    assert(index >= 0, "insertion point is no longer in its region");
    ops.splice(index, 0, op);
    op.parent = this.region;
  }
}
