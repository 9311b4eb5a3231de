/**
 * IR formatter for human-readable text output
 *
 * The output is the textual form the parser reads back. Values are
 * renumbered in definition order; layouts equal to a module alias print as
 * that alias.
 */

import * as Ir from "#ir/spec";

export class Formatter {
  private indent = 0;
  private output: string[] = [];
  private names = new Map<Ir.Value, string>();
  private aliases: [string, Ir.Layout][] = [];

  format(module: Ir.Module): string {
    this.reset(module);

    const header = this.moduleAttributes(module);
    const name = module.name ? ` @${module.name}` : "";
    this.line(`module${name}${header} {`);
    this.indent++;

    for (const [alias, layout] of this.aliases) {
      this.line(`#${alias} = ${Ir.Layout.key(layout)}`);
    }

    module.functions.forEach((func, index) => {
      if (index > 0 || this.aliases.length > 0) {
        this.line("");
      }
      this.formatFunction(func);
    });

    this.indent--;
    this.line("}");

    return this.output.join("\n");
  }

  /**
   * Format a single function, using the module's aliases when given
   */
  formatFunction(func: Ir.Function, module?: Ir.Module): string {
    if (module) {
      this.reset(module);
    }
    const start = this.output.length;

    const params = Ir.Function.parameters(func)
      .map((param) => `${this.define(param)}: ${this.formatType(param.type)}`)
      .join(", ");
    this.line(`func @${func.name}(${params}) {`);
    this.indent++;
    this.formatOperations(func.body);
    this.indent--;
    this.line("}");

    return this.output.slice(start).join("\n");
  }

  formatType(type: Ir.Type): string {
    return Ir.Type.format(type, (layout) => this.formatLayout(layout));
  }

  formatLayout(layout: Ir.Layout): string {
    const alias = this.aliases.find(([, known]) =>
      Ir.Layout.equals(known, layout),
    );
    return alias ? `#${alias[0]}` : Ir.Layout.key(layout);
  }

  private reset(module: Ir.Module): void {
    this.output = [];
    this.indent = 0;
    this.names = new Map();
    this.aliases = [...module.layouts.entries()];
  }

  private moduleAttributes(module: Ir.Module): string {
    const attributes: string[] = [];
    if (module.attributes.numWarps !== undefined) {
      attributes.push(`num_warps = ${module.attributes.numWarps}`);
    }
    if (module.attributes.threadsPerWarp !== undefined) {
      attributes.push(`threads_per_warp = ${module.attributes.threadsPerWarp}`);
    }
    return attributes.length > 0 ? `[${attributes.join(", ")}]` : "";
  }

  private formatOperations(region: Ir.Region): void {
    for (const op of Ir.Region.live(region)) {
      this.formatOperation(op);
    }
  }

  private formatOperation(op: Ir.Operation): void {
    // Operands are named before results so loop inits print first
    const operands = op.operands.map((operand) => this.use(operand));
    const results = op.results.map((result) => this.define(result));

    let text = results.length > 0 ? `${results.join(", ")} = ` : "";
    text += Ir.Operation.name(op);

    const attributes = this.formatAttributes(op);
    if (attributes.length > 0) {
      text += `[${attributes.join(", ")}]`;
    }
    if (operands.length > 0) {
      text += ` ${operands.join(", ")}`;
    }
    if (op.results.length > 0) {
      text += ` : ${op.results.map((r) => this.formatType(r.type)).join(", ")}`;
    }

    if (op.regions.length === 0) {
      this.line(text);
      return;
    }

    op.regions.forEach((region, index) => {
      this.line(index === 0 ? `${text} {` : "} {");
      this.indent++;
      if (region.arguments.length > 0) {
        const args = region.arguments
          .map((arg) => `${this.define(arg)}: ${this.formatType(arg.type)}`)
          .join(", ");
        this.line(`^(${args})`);
      }
      this.formatOperations(region);
      this.indent--;
    });
    this.line("}");
  }

  private formatAttributes(op: Ir.Operation): string[] {
    const list = (values: number[]) => `[${values.join(", ")}]`;

    switch (op.kind) {
      case "constant":
        return [`value = ${op.value}`];
      case "make_range":
        return [`start = ${op.start}`, `end = ${op.end}`];
      case "expand_dims":
        return [`axis = ${op.axis}`];
      case "reshape":
        return op.allowReorder ? ["allow_reorder = true"] : [];
      case "reduce":
        return [`axis = ${op.axis}`, `combine = ${op.combine}`];
      case "atomic_rmw":
        return [`op = ${op.op}`];
      case "extract_slice":
        return [`offsets = ${list(op.offsets)}`, `sizes = ${list(op.sizes)}`];
      case "insert_slice_async":
        return [`axis = ${op.axis}`];
      case "dot":
        return op.allowTf32 ? ["allow_tf32 = true"] : [];
      default:
        return [];
    }
  }

  private define(value: Ir.Value): string {
    const name = `%${this.names.size}`;
    this.names.set(value, name);
    return name;
  }

  private use(value: Ir.Value): string {
    // Values defined outside the printed scope keep their own id
    return this.names.get(value) ?? `${value.id}?`;
  }

  private line(content: string): void {
    this.output.push(content ? "  ".repeat(this.indent) + content : "");
  }
}

/**
 * Format a module as text
 */
export function format(module: Ir.Module): string {
  return new Formatter().format(module);
}
