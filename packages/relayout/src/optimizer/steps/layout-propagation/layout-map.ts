import * as Ir from "#ir";

/**
 * Candidate layouts of one value, in insertion order without duplicates
 */
export class LayoutInfo {
  private readonly candidates = new Map<string, Ir.Layout>();

  constructor(initial?: Ir.Layout) {
    if (initial) {
      this.add(initial);
    }
  }

  /**
   * Add a candidate; returns whether the set grew
   */
  add(layout: Ir.Layout): boolean {
    const key = Ir.Layout.key(layout);
    if (this.candidates.has(key)) {
      return false;
    }
    this.candidates.set(key, layout);
    return true;
  }

  has(layout: Ir.Layout): boolean {
    return this.candidates.has(Ir.Layout.key(layout));
  }

  get size(): number {
    return this.candidates.size;
  }

  get layouts(): Ir.Layout[] {
    return [...this.candidates.values()];
  }

  first(): Ir.Layout | undefined {
    return this.candidates.values().next().value;
  }

  /**
   * Replace every candidate by a single one
   */
  pick(layout: Ir.Layout): void {
    this.candidates.clear();
    this.add(layout);
  }
}

/**
 * Candidate layouts of every value the propagation reached, in the order
 * the values were reached
 */
export class LayoutMap {
  private readonly entries = new Map<Ir.Value, LayoutInfo>();

  get(value: Ir.Value): LayoutInfo | undefined {
    return this.entries.get(value);
  }

  has(value: Ir.Value): boolean {
    return this.entries.has(value);
  }

  /**
   * Candidates of a value, creating an empty set on first access
   */
  infoFor(value: Ir.Value): LayoutInfo {
    let info = this.entries.get(value);
    if (!info) {
      info = new LayoutInfo();
      this.entries.set(value, info);
    }
    return info;
  }

  values(): Ir.Value[] {
    return [...this.entries.keys()];
  }

  [Symbol.iterator](): IterableIterator<[Ir.Value, LayoutInfo]> {
    return this.entries.entries();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Layout picked for a value once conflicts are resolved
   */
  picked(value: Ir.Value): Ir.Layout | undefined {
    return this.entries.get(value)?.first();
  }

  /**
   * One line per value: its name, then its candidates
   */
  dump(formatter: Ir.Analysis.Formatter = new Ir.Analysis.Formatter()): string {
    const lines: string[] = [];
    for (const [value, info] of this.entries) {
      const layouts = info.layouts.map((l) => formatter.formatLayout(l));
      lines.push(`${value.id}: ${layouts.join(" | ")}`);
    }
    return lines.join("\n");
  }
}
