import * as Ir from "#ir";
import { assert, InternalConsistencyError } from "#errors";
import type { LayoutOracle } from "#layouts";

import type { OptimizationContext } from "../../optimizer.js";
import type { LayoutMap } from "./layout-map.js";

/**
 * Rewrites a function so every value takes the layout picked for it,
 * rebuilding structured control flow whose signature changes and
 * converting wherever a user still needs the declared layout
 */
export class RegionRewriter {
  /** Replacement of a value in a given layout, keyed by layout key */
  private readonly rewriteMapping = new Map<Ir.Value, Map<string, Ir.Value>>();
  /** Conversions already inserted, by converted value and layout key */
  private readonly conversions = new Map<Ir.Value, Map<string, Ir.Value>>();
  /** Superseded operations, in discovery order */
  private readonly pending = new Set<Ir.Operation>();
  private readonly builder: Ir.Builder;
  private readonly oracle: LayoutOracle;

  constructor(
    private readonly func: Ir.Function,
    private readonly layouts: LayoutMap,
    private readonly context: OptimizationContext,
    private readonly pass: string,
  ) {
    this.builder = new Ir.Builder(func);
    this.oracle = context.oracle;
  }

  run(): void {
    const queue: Ir.Region[] = [this.func.body];
    for (let region = queue.pop(); region; region = queue.pop()) {
      for (const op of [...region.operations]) {
        if (op.dead) continue;

        if (this.needsRewrite(op)) {
          const rewritten = this.rewriteOp(op);
          queue.push(...rewritten.regions);
        } else if (op.kind === "yield") {
          this.rewriteYield(op);
        } else if (op.kind === "condition") {
          this.rewriteCondition(op);
        } else if (op.kind === "reduce" && !Ir.Value.isTensor(op.results[0])) {
          this.rewriteReduceToScalar(op);
        } else {
          op.operands.forEach((operand, index) => {
            const declared = Ir.Value.layout(operand);
            if (!this.layouts.has(operand) || !declared) return;
            op.operands[index] = this.getValueAs(operand, declared);
          });
          queue.push(...op.regions);
        }
      }
    }

    for (const op of [...this.pending].reverse()) {
      this.builder.markDead(op);
    }
  }

  /**
   * Value standing for `value` in `layout`, converting if no rewrite of it
   * has that layout already
   */
  getValueAs(value: Ir.Value, layout: Ir.Layout): Ir.Value {
    if (!Ir.Value.isTensor(value)) {
      return value;
    }

    let rewritten: Ir.Value = value;
    const picked = this.layouts.picked(value);
    const declared = Ir.Value.layout(value);
    if (picked && declared && !Ir.Layout.equals(picked, declared)) {
      const mapped = this.lookup(value, picked);
      assert(mapped, `${value.id} has no rewrite in ${Ir.Layout.key(picked)}`);
      rewritten = mapped;
    }

    const current = Ir.Value.layout(rewritten);
    if (current && Ir.Layout.equals(current, layout)) {
      return rewritten;
    }

    const key = Ir.Layout.key(layout);
    let cached = this.conversions.get(rewritten);
    const existing = cached?.get(key);
    if (existing) {
      return existing;
    }

    const loc = Ir.Value.definingOp(value)?.debug.loc;
    this.builder.setInsertionPointAfterValue(rewritten);
    const converted = this.builder.convertLayout(rewritten, layout, loc);
    if (!cached) {
      cached = new Map();
      this.conversions.set(rewritten, cached);
    }
    cached.set(key, converted);
    this.context.trackTransformation({
      type: "insert",
      pass: this.pass,
      original: loc ? [loc] : [],
      result: [],
      reason: `Converted ${value.id} to ${Ir.Layout.key(layout)}`,
    });
    return converted;
  }

  private needsRewrite(op: Ir.Operation): boolean {
    return op.results.some((result) => {
      const picked = this.layouts.picked(result);
      const declared = Ir.Value.layout(result);
      return picked && declared && !Ir.Layout.equals(picked, declared);
    });
  }

  private map(original: Ir.Value, replacement: Ir.Value): void {
    const layout = Ir.Value.layout(replacement);
    assert(layout, `cannot map scalar ${replacement.id}`);
    let byLayout = this.rewriteMapping.get(original);
    if (!byLayout) {
      byLayout = new Map();
      this.rewriteMapping.set(original, byLayout);
    }
    byLayout.set(Ir.Layout.key(layout), replacement);
  }

  private lookup(value: Ir.Value, layout: Ir.Layout): Ir.Value | undefined {
    return this.rewriteMapping.get(value)?.get(Ir.Layout.key(layout));
  }

  /**
   * Map or forward a value superseded by a rebuilt operation
   */
  private remap(original: Ir.Value, replacement: Ir.Value): void {
    if (Ir.Type.equals(original.type, replacement.type)) {
      this.builder.replaceAllUsesWith(original, replacement);
    } else {
      this.map(original, replacement);
    }
  }

  private rewriteOp(op: Ir.Operation): Ir.Operation {
    this.pending.add(op);

    const rewritten = this.rebuild(op);
    this.context.trackTransformation({
      type: "replace",
      pass: this.pass,
      original: op.debug.loc ? [op.debug.loc] : [],
      result: rewritten.debug.loc ? [rewritten.debug.loc] : [],
      reason: `Rewrote ${Ir.Operation.name(op)} in its propagated layout`,
    });
    return rewritten;
  }

  private rebuild(op: Ir.Operation): Ir.Operation {
    switch (op.kind) {
      case "for":
        return this.rewriteFor(op);
      case "while":
        return this.rewriteWhile(op);
      case "if":
        return this.rewriteIf(op);
    }

    const mapped = op.results.find((result) => this.layouts.has(result));
    const layout = mapped && this.layouts.picked(mapped);
    assert(layout, `${Ir.Operation.name(op)} has no picked layout`);

    if (op.kind === "convert_layout") {
      const source = op.operands[0];
      const sourceLayout =
        this.layouts.picked(source) ?? Ir.Value.layout(source);
      assert(sourceLayout, "conversion of a scalar");
      const value = this.getValueAs(source, sourceLayout);
      this.builder.setInsertionPointBefore(op);
      const converted = this.builder.convertLayout(value, layout, op.debug.loc);
      this.map(op.results[0], converted);
      return converted.owner;
    }

    if (this.oracle.canFoldConversionInto(op, layout)) {
      const operands = this.reconcileOperands(op, (operand) =>
        Ir.Value.layout(operand),
      );
      this.builder.setInsertionPointBefore(op);
      const copy = this.builder.clone(op, operands);
      const converted = this.builder.convertLayout(
        copy.results[0],
        layout,
        op.debug.loc,
      );
      this.map(op.results[0], converted);
      return converted.owner;
    }

    if (Ir.Operation.isLayoutTransparent(op)) {
      const copy = this.cloneWithLayout(op, layout);
      op.results.forEach((result, index) => {
        this.map(result, copy.results[index]);
      });
      return copy;
    }

    throw new InternalConsistencyError(
      `unexpected ${Ir.Operation.name(op)} in layout rewrite`,
    );
  }

  /**
   * Copy of an operation whose tensor results all take `layout`, with its
   * operands in the layout the oracle infers back from it
   */
  private cloneWithLayout(op: Ir.Operation, layout: Ir.Layout): Ir.Operation {
    const operandLayout = this.oracle.inferSourceLayout(op, layout);
    assert(
      op.operands.length === 0 || operandLayout,
      `no operand layout for ${Ir.Operation.name(op)} into ` +
        Ir.Layout.key(layout),
    );
    const operands = this.reconcileOperands(op, () => operandLayout);
    this.builder.setInsertionPointBefore(op);
    const copy = this.builder.clone(op, operands);
    for (const result of copy.results) {
      Ir.Value.setLayout(result, layout);
    }
    return copy;
  }

  /**
   * Operand replacements bringing each tensor operand into a layout
   */
  private reconcileOperands(
    op: Ir.Operation,
    layoutFor: (operand: Ir.Value) => Ir.Layout | undefined,
  ): Map<Ir.Value, Ir.Value> {
    const replacements = new Map<Ir.Value, Ir.Value>();
    for (const operand of op.operands) {
      const layout = layoutFor(operand);
      if (layout && !replacements.has(operand)) {
        replacements.set(operand, this.getValueAs(operand, layout));
      }
    }
    return replacements;
  }

  private rewriteFor(forOp: Ir.Operation.For): Ir.Operation {
    const inits = Ir.Operation.For.inits(forOp).map((init, index) => {
      const layout = this.layouts.picked(forOp.results[index]);
      return layout ? this.getValueAs(init, layout) : init;
    });

    this.builder.setInsertionPointBefore(forOp);
    const newFor = this.builder.create(
      { kind: "for" },
      {
        operands: [
          ...forOp.operands.slice(0, Ir.Operation.For.INIT_OFFSET),
          ...inits,
        ],
        resultTypes: inits.map((init) => init.type),
        regions: [
          [
            Ir.Operation.For.body(forOp).arguments[0].type,
            ...inits.map((init) => init.type),
          ],
        ],
        loc: forOp.debug.loc,
      },
    );

    const oldBody = Ir.Operation.For.body(forOp);
    const newBody = Ir.Operation.For.body(newFor);
    this.builder.spliceOperations(oldBody, newBody);

    forOp.results.forEach((result, index) => {
      this.remap(result, newFor.results[index]);
    });
    oldBody.arguments.forEach((argument, index) => {
      this.remap(argument, newBody.arguments[index]);
    });
    return newFor;
  }

  private rewriteWhile(whileOp: Ir.Operation.While): Ir.Operation {
    const before = Ir.Operation.While.before(whileOp);
    const after = Ir.Operation.While.after(whileOp);

    const operands = whileOp.operands.map((operand, index) => {
      const layout = this.layouts.picked(before.arguments[index]);
      return layout ? this.getValueAs(operand, layout) : operand;
    });
    const resultTypes = whileOp.results.map((result) => {
      const layout = this.layouts.picked(result);
      return layout && result.type.kind === "tensor"
        ? Ir.Type.withLayout(result.type, layout)
        : result.type;
    });

    this.builder.setInsertionPointBefore(whileOp);
    const newWhile = this.builder.create(
      { kind: "while" },
      {
        operands,
        resultTypes,
        regions: [operands.map((operand) => operand.type), resultTypes],
        loc: whileOp.debug.loc,
      },
    );
    const newBefore = Ir.Operation.While.before(newWhile);
    const newAfter = Ir.Operation.While.after(newWhile);
    this.builder.spliceOperations(before, newBefore);
    this.builder.spliceOperations(after, newAfter);

    whileOp.results.forEach((result, index) => {
      this.remap(result, newWhile.results[index]);
    });
    before.arguments.forEach((argument, index) => {
      this.remap(argument, newBefore.arguments[index]);
    });
    after.arguments.forEach((argument, index) => {
      this.remap(argument, newAfter.arguments[index]);
    });
    return newWhile;
  }

  private rewriteIf(ifOp: Ir.Operation.If): Ir.Operation {
    const resultTypes = ifOp.results.map((result) => {
      const layout = this.layouts.picked(result);
      return layout && result.type.kind === "tensor"
        ? Ir.Type.withLayout(result.type, layout)
        : result.type;
    });

    this.builder.setInsertionPointBefore(ifOp);
    const newIf = this.builder.create(
      { kind: "if" },
      { operands: [...ifOp.operands], resultTypes, loc: ifOp.debug.loc },
    );
    this.builder.moveRegions(ifOp, newIf);

    ifOp.results.forEach((result, index) => {
      this.remap(result, newIf.results[index]);
    });
    return newIf;
  }

  /**
   * Bring yielded values into the layout the parent expects back
   */
  private rewriteYield(yieldOp: Ir.Operation.Yield): void {
    const parent = yieldOp.parent && Ir.Region.parentOp(yieldOp.parent);
    yieldOp.operands.forEach((operand, index) => {
      let expected = operand.type;
      if (parent?.kind === "for" || parent?.kind === "if") {
        expected = parent.results[index].type;
      } else if (parent?.kind === "while") {
        expected = Ir.Operation.While.before(parent).arguments[index].type;
      }
      if (expected.kind !== "tensor") return;
      yieldOp.operands[index] = this.getValueAs(operand, expected.layout);
    });
  }

  /**
   * Bring forwarded values into the layout of the while's results
   */
  private rewriteCondition(condition: Ir.Operation.Condition): void {
    const parent = condition.parent && Ir.Region.parentOp(condition.parent);
    assert(parent?.kind === "while", "condition outside a while");
    for (let index = 1; index < condition.operands.length; index++) {
      const expected = parent.results[index - 1].type;
      if (expected.kind !== "tensor") continue;
      condition.operands[index] = this.getValueAs(
        condition.operands[index],
        expected.layout,
      );
    }
  }

  /**
   * A reduction to a scalar has no result layout to follow; its operands
   * all take the layout picked for the first one that has one
   */
  private rewriteReduceToScalar(reduce: Ir.Operation.Reduce): void {
    const source = reduce.operands.find((operand) => this.layouts.has(operand));
    const layout = source && this.layouts.picked(source);
    if (!layout) return;
    reduce.operands.forEach((operand, index) => {
      reduce.operands[index] = this.getValueAs(operand, layout);
    });
  }
}
