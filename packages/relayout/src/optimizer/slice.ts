/**
 * Backward slices of a conversion's source and their re-emission in the
 * conversion's target layout
 */

import * as Ir from "#ir";
import type { LayoutOracle } from "#layouts";

/**
 * Values to re-emit and the layout each must take, in discovery order
 */
export class BackwardSlice {
  readonly values = new Set<Ir.Value>();
  readonly layouts = new Map<Ir.Value, Ir.Layout>();

  get size(): number {
    return this.values.size;
  }

  has(value: Ir.Value): boolean {
    return this.values.has(value);
  }

  /**
   * Add the values of another slice; layouts already recorded are kept
   */
  merge(other: BackwardSlice): void {
    for (const value of other.values) {
      this.values.add(value);
    }
    for (const [value, layout] of other.layouts) {
      if (!this.layouts.has(value)) {
        this.layouts.set(value, layout);
      }
    }
  }

  delete(value: Ir.Value): void {
    this.values.delete(value);
  }
}

export type StopPredicate = (op: Ir.Operation) => boolean;

/**
 * Collect everything `root` depends on that must change for it to be
 * produced in `layout`. Returns false when some dependency cannot take the
 * layout it would need.
 */
export function getConvertBackwardSlice(
  root: Ir.Value,
  layout: Ir.Layout,
  slice: BackwardSlice,
  oracle: LayoutOracle,
  stop?: StopPredicate,
): boolean {
  const queue: [Ir.Value, Ir.Layout][] = [[root, layout]];

  for (let next = queue.pop(); next; next = queue.pop()) {
    const [value, encoding] = next;
    const declared = Ir.Value.layout(value);
    if (!declared || Ir.Layout.equals(declared, encoding)) continue;

    const def = Ir.Value.definingOp(value);
    // Loop results are not followed
    if (def?.kind === "for") return false;

    const known = slice.layouts.get(value);
    if (known && !Ir.Layout.equals(known, encoding)) return false;
    if (slice.has(value)) continue;
    slice.values.add(value);
    slice.layouts.set(value, encoding);

    if (def) {
      // Sibling results are re-emitted alongside, in the same layout
      for (const sibling of def.results) {
        if (Ir.Value.isTensor(sibling) && !slice.layouts.has(sibling)) {
          slice.layouts.set(sibling, encoding);
        }
      }
      if (oracle.canFoldConversionInto(def, encoding)) continue;
      if (stop?.(def)) continue;

      for (const operand of def.operands) {
        const source = oracle.inferSourceLayout(def, encoding);
        if (!source) return false;
        if (!slice.has(operand)) {
          queue.push([operand, source]);
        }
      }
      continue;
    }

    // Arguments are only followed through `for` iteration arguments
    const parent = value.kind === "argument" && Ir.Region.parentOp(value.owner);
    if (!parent || parent.kind !== "for" || value.index === 0) return false;
    const slot = value.index - 1;
    const yieldOp = Ir.Region.terminator(Ir.Operation.For.body(parent));
    const init = Ir.Operation.For.inits(parent)[slot];
    const yielded = yieldOp?.operands[slot];
    if (!init || !yielded) return false;
    queue.push([init, encoding]);
    queue.push([yielded, encoding]);
  }
  return true;
}

/**
 * Whether an operation can be emitted a second time in another layout
 */
export function canBeRematerialized(
  op: Ir.Operation,
  oracle: LayoutOracle,
): boolean {
  switch (op.kind) {
    case "load":
    case "store":
      return !oracle.isExpensiveMemoryOp(op);
    case "extract_slice":
    case "alloc_tensor":
    case "insert_slice_async":
    case "atomic_rmw":
    case "atomic_cas":
    case "dot":
    case "if":
    case "while":
    case "condition":
      return false;
    default:
      return true;
  }
}

/**
 * Backward slice of `root` in `layout` whose every operation can be
 * re-emitted; undefined when there is none
 */
export function getRematerializableSlice(
  root: Ir.Value,
  layout: Ir.Layout,
  oracle: LayoutOracle,
  stop?: StopPredicate,
): BackwardSlice | undefined {
  const slice = new BackwardSlice();
  if (!getConvertBackwardSlice(root, layout, slice, oracle, stop)) {
    return undefined;
  }
  if (slice.size === 0) {
    return undefined;
  }
  for (const value of slice.values) {
    const def = Ir.Value.definingOp(value);
    if (def && !canBeRematerialized(def, oracle)) {
      return undefined;
    }
  }
  return slice;
}

/**
 * Re-emit every value of the slice in its recorded layout, then make the
 * users of `convert` use the re-emitted source directly. Returns the
 * operations created.
 *
 * `mapping` may already hold replacements for values outside the slice.
 */
export function rewriteSlice(
  slice: BackwardSlice,
  convert: Ir.Operation.ConvertLayout,
  mapping: Map<Ir.Value, Ir.Value>,
): Ir.Operation[] {
  const builder = Ir.Builder.before(convert);
  const func = builder.func;
  const order = Ir.Utils.programOrder(func);

  const opsToRewrite = new Set<Ir.Operation>();
  for (const value of slice.values) {
    if (value.kind === "result") {
      opsToRewrite.add(value.owner);
      continue;
    }
    const parent = Ir.Region.parentOp(value.owner);
    const terminator = Ir.Region.terminator(value.owner);
    if (parent) opsToRewrite.add(parent);
    if (terminator) opsToRewrite.add(terminator);
  }
  const sorted = [...opsToRewrite].sort(
    (a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0),
  );

  const created: Ir.Operation[] = [];
  const deadLoops: Ir.Operation[] = [];
  // Iteration slots added to each rebuilt loop, by original result index
  const addedSlots = new Map<Ir.Operation, number[]>();

  for (const op of sorted) {
    if (op.kind === "for") {
      const slots: number[] = [];
      const argMapping: [number, number][] = [];
      const inits: Ir.Value[] = [];
      const existing = Ir.Operation.For.inits(op);
      Ir.Operation.For.iterArgs(op).forEach((arg, index) => {
        if (!slice.has(arg)) return;
        slots.push(index);
        argMapping.push([index, existing.length + inits.length]);
        inits.push(lookupOrDefault(mapping, existing[index]));
      });

      const newFor = extendLoop(builder, op, inits);
      deadLoops.push(op);
      created.push(newFor);
      addedSlots.set(newFor, slots);

      const body = newFor.regions[0];
      for (const [from, to] of argMapping) {
        mapping.set(newFor.results[from], newFor.results[to]);
        mapping.set(body.arguments[from + 1], body.arguments[to + 1]);
      }
      continue;
    }

    if (op.kind === "yield") {
      const parent = op.parent && Ir.Region.parentOp(op.parent);
      const slots = (parent && addedSlots.get(parent)) ?? [];
      for (const slot of slots) {
        op.operands.push(lookupOrDefault(mapping, op.operands[slot]));
      }
      continue;
    }

    builder.setInsertionPointBefore(op);

    if (op.kind === "constant") {
      const copy = builder.clone(op, new Map());
      const layout = slice.layouts.get(op.results[0]);
      created.push(copy);
      if (layout) {
        const converted = builder.convertLayout(
          copy.results[0],
          layout,
          op.debug.loc,
        );
        mapping.set(op.results[0], converted);
        created.push(converted.owner);
      }
      continue;
    }

    const copy = builder.clone(op, mapping);
    op.results.forEach((result, index) => {
      const layout = slice.layouts.get(result);
      if (layout) {
        Ir.Value.setLayout(copy.results[index], layout);
      }
    });
    created.push(copy);
  }

  builder.replaceAllUsesWith(
    convert.results[0],
    lookupOrDefault(mapping, convert.operands[0]),
  );
  builder.markDead(convert);
  for (const loop of deadLoops) {
    builder.markDead(loop);
  }
  return created;
}

function lookupOrDefault(
  mapping: Map<Ir.Value, Ir.Value>,
  value: Ir.Value,
): Ir.Value {
  return mapping.get(value) ?? value;
}

/**
 * Replace a loop by one carrying `inits` as extra iteration arguments. The
 * existing results, regions and body arguments move to the new loop; the
 * old one is left empty.
 */
function extendLoop(
  builder: Ir.Builder,
  forOp: Ir.Operation.For,
  inits: Ir.Value[],
): Ir.Operation {
  builder.setInsertionPointBefore(forOp);
  const newFor = builder.create(
    { kind: "for" },
    {
      operands: [...forOp.operands, ...inits],
      resultTypes: inits.map((init) => init.type),
      loc: forOp.debug.loc,
    },
  );

  for (const result of forOp.results) {
    result.owner = newFor;
  }
  newFor.results = [...forOp.results, ...newFor.results];
  newFor.results.forEach((result, index) => {
    result.index = index;
  });
  forOp.results = [];

  builder.moveRegions(forOp, newFor);
  const body = newFor.regions[0];
  for (const init of inits) {
    body.arguments.push(
      Ir.Value.argument(
        Ir.Function.freshId(builder.func),
        init.type,
        body,
        body.arguments.length,
      ),
    );
  }
  return newFor;
}
