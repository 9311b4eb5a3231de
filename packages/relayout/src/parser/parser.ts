/**
 * Parser for the textual IR
 *
 * Grammar, by example:
 *
 *   module[num_warps = 4] {
 *     #blocked = blocked<sizePerThread = [1, 4], threadsPerWarp = [4, 8],
 *                        warpsPerCTA = [4, 1], order = [1, 0]>
 *     func @kernel(%a: tensor<[128, 64], f16, #blocked>, %n: i32) {
 *       %b = extf %a : tensor<[128, 64], f32, #blocked>
 *       %c = for %lb, %ub, %step, %b : tensor<[128, 64], f32, #blocked> {
 *         ^(%i: i32, %acc: tensor<[128, 64], f32, #blocked>)
 *         yield %acc
 *       }
 *       return
 *     }
 *   }
 */

import * as Ir from "#ir";
import { Result } from "#result";

import { Tokenizer } from "./tokenizer.js";
import { ParseError, ErrorCode } from "./errors.js";

type Token = Tokenizer.Token;

type AttributeValue = number | boolean | string | number[];

type LayoutValue = number | number[] | Ir.Layout;

/**
 * Named attributes of one operation or layout, with typed accessors that
 * report missing or ill-typed entries
 */
class Attributes<V> {
  constructor(
    private readonly owner: string,
    private readonly values: Map<string, V>,
    private readonly at: Token,
  ) {}

  number(key: string, fallback?: number): number {
    const value = this.values.get(key);
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== "number") throw this.invalid(key, "a number");
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.values.get(key);
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") throw this.invalid(key, "a boolean");
    return value;
  }

  list(key: string): number[] {
    const value = this.values.get(key);
    if (!Array.isArray(value)) throw this.invalid(key, "a list of integers");
    return value;
  }

  oneOf<T extends string>(key: string, options: readonly T[]): T {
    const value = this.values.get(key);
    const match = options.find((option) => option === value);
    if (match === undefined) {
      throw this.invalid(key, `one of ${options.join(", ")}`);
    }
    return match;
  }

  get(key: string): V | undefined {
    return this.values.get(key);
  }

  private invalid(key: string, expected: string): ParseError {
    const code = this.values.has(key)
      ? ErrorCode.INVALID_ATTRIBUTE
      : ErrorCode.MISSING_ATTRIBUTE;
    return new ParseError(
      code,
      `${this.owner}.${key} must be ${expected}`,
      Tokenizer.location(this.at),
    );
  }
}

const REDUCE_COMBINES: readonly Ir.Operation.ReduceCombine[] = [
  "add",
  "mul",
  "max",
  "min",
];

const ATOMIC_RMW_OPS: readonly Ir.Operation.AtomicRmwOp[] = [
  "add",
  "max",
  "min",
  "xchg",
];

export class Parser {
  private tokens: Tokenizer.TokenQueue;
  private layouts = new Map<string, Ir.Layout>();
  private values = new Map<string, Ir.Value>();
  private maxValueNumber = -1;

  constructor(source: string) {
    this.tokens = new Tokenizer.TokenQueue(Tokenizer.tokenize(source));
  }

  parseModule(): Ir.Module {
    this.tokens.skipNewlines();
    this.tokens.expect("NAME", "module");

    const module: Ir.Module = {
      functions: [],
      layouts: this.layouts,
      attributes: {},
    };
    if (this.tokens.hasNext("FUNCTION")) {
      module.name = this.tokens.poll().text.slice(1);
    }
    if (this.tokens.hasNextText("[")) {
      const at = this.tokens.peek();
      const attributes = new Attributes("module", this.parseAttributes(), at);
      const numWarps = attributes.get("num_warps");
      const threadsPerWarp = attributes.get("threads_per_warp");
      if (numWarps !== undefined) {
        module.attributes.numWarps = attributes.number("num_warps");
      }
      if (threadsPerWarp !== undefined) {
        module.attributes.threadsPerWarp = attributes.number("threads_per_warp");
      }
    }

    this.tokens.expect("PUNCTUATION", "{");
    this.tokens.skipNewlines();

    while (!this.tokens.hasNextText("}")) {
      if (this.tokens.hasNext("ALIAS")) {
        this.parseAliasDeclaration();
      } else {
        module.functions.push(this.parseFunction());
      }
      this.tokens.skipNewlines();
    }

    this.tokens.expect("PUNCTUATION", "}");
    this.tokens.skipNewlines();
    this.tokens.expect("EOF");

    return module;
  }

  private parseAliasDeclaration(): void {
    const name = this.tokens.expect("ALIAS");
    this.tokens.expect("PUNCTUATION", "=");
    this.layouts.set(name.text.slice(1), this.parseLayout());
    this.endOfLine();
  }

  private parseFunction(): Ir.Function {
    const start = this.tokens.expect("NAME", "func");
    const name = this.tokens.expect("FUNCTION");

    const func = Ir.Function.create(name.text.slice(1), {
      loc: { offset: start.offset, length: name.offset - start.offset },
    });
    this.values = new Map();
    this.maxValueNumber = -1;

    this.tokens.expect("PUNCTUATION", "(");
    func.body.arguments = this.parseArgumentList(func.body, ")");

    this.tokens.expect("PUNCTUATION", "{");
    this.endOfLine();
    this.parseOperations(new Ir.Builder(func), func.body);
    this.tokens.expect("PUNCTUATION", "}");
    this.endOfLine();

    func.nextValueId = this.maxValueNumber + 1;
    return func;
  }

  /**
   * `%a: T, %b: T` up to the closing token
   */
  private parseArgumentList(
    region: Ir.Region,
    close: string,
  ): Ir.Value.Argument[] {
    const args: Ir.Value.Argument[] = [];
    if (this.tokens.pollIfText(close)) {
      return args;
    }
    do {
      const name = this.tokens.expect("VALUE");
      this.tokens.expect("PUNCTUATION", ":");
      const type = this.parseType();
      const arg = Ir.Value.argument(name.text, type, region, args.length);
      this.define(name, arg);
      args.push(arg);
    } while (this.tokens.pollIfText(","));
    this.tokens.expect("PUNCTUATION", close);
    return args;
  }

  private parseOperations(builder: Ir.Builder, region: Ir.Region): void {
    builder.setInsertionPointToEnd(region);
    this.tokens.skipNewlines();
    while (!this.tokens.hasNextText("}")) {
      this.parseOperation(builder);
      this.tokens.skipNewlines();
    }
  }

  private parseOperation(builder: Ir.Builder): void {
    const start = this.tokens.peek();

    const resultNames: Tokenizer.Token<"VALUE">[] = [];
    if (this.tokens.hasNext("VALUE")) {
      do {
        resultNames.push(this.tokens.expect("VALUE"));
      } while (this.tokens.pollIfText(","));
      this.tokens.expect("PUNCTUATION", "=");
    }

    const name = this.tokens.expect("NAME");
    const attributes = new Attributes(
      name.text,
      this.tokens.hasNextText("[")
        ? this.parseAttributes()
        : new Map<string, AttributeValue>(),
      name,
    );
    const spec = this.operationSpec(name, attributes);

    const operands: Ir.Value[] = [];
    if (this.tokens.hasNext("VALUE")) {
      do {
        operands.push(this.use(this.tokens.expect("VALUE")));
      } while (this.tokens.pollIfText(","));
    }

    const resultTypes: Ir.Type[] = [];
    if (this.tokens.pollIfText(":")) {
      do {
        resultTypes.push(this.parseType());
      } while (this.tokens.pollIfText(","));
    }

    if (resultTypes.length !== resultNames.length) {
      throw new ParseError(
        ErrorCode.RESULT_COUNT,
        `${resultNames.length} names, ${resultTypes.length} types`,
        Tokenizer.location(name),
      );
    }

    const end = this.tokens.peek();
    const op = builder.create(spec, {
      operands,
      resultTypes,
      loc: { offset: start.offset, length: end.offset - start.offset },
    });
    op.results.forEach((result, index) => {
      this.define(resultNames[index], result);
    });

    // Nested regions: `{ ... } { ... }`
    const nested = new Ir.Builder(builder.func);
    while (this.tokens.pollIfText("{")) {
      const region = Ir.Region.create(op);
      op.regions.push(region);
      this.tokens.skipNewlines();
      if (this.tokens.pollIfText("^")) {
        this.tokens.expect("PUNCTUATION", "(");
        region.arguments = this.parseArgumentList(region, ")");
        this.endOfLine();
      }
      this.parseOperations(nested, region);
      this.tokens.expect("PUNCTUATION", "}");
    }

    this.endOfLine();
  }

  private operationSpec(
    name: Token,
    attributes: Attributes<AttributeValue>,
  ): Ir.Operation.Spec {
    const text = name.text;

    const binary = Ir.Operation.BINARY_OPS.find((op) => op === text);
    if (binary) return { kind: "binary", op: binary };
    const unary = Ir.Operation.UNARY_OPS.find((op) => op === text);
    if (unary) return { kind: "unary", op: unary };
    const cast = Ir.Operation.CAST_OPS.find((op) => op === text);
    if (cast) return { kind: "cast", op: cast };

    switch (text) {
      case "constant": {
        const value = attributes.get("value");
        if (typeof value !== "number" && typeof value !== "boolean") {
          throw new ParseError(
            ErrorCode.MISSING_ATTRIBUTE,
            "constant.value must be a number or a boolean",
            Tokenizer.location(name),
          );
        }
        return { kind: "constant", value };
      }
      case "make_range":
        return {
          kind: "make_range",
          start: attributes.number("start"),
          end: attributes.number("end"),
        };
      case "expand_dims":
        return { kind: "expand_dims", axis: attributes.number("axis") };
      case "reshape":
        return {
          kind: "reshape",
          allowReorder: attributes.boolean("allow_reorder", false),
        };
      case "reduce":
        return {
          kind: "reduce",
          axis: attributes.number("axis"),
          combine: attributes.oneOf("combine", REDUCE_COMBINES),
        };
      case "atomic_rmw":
        return {
          kind: "atomic_rmw",
          op: attributes.oneOf("op", ATOMIC_RMW_OPS),
        };
      case "extract_slice":
        return {
          kind: "extract_slice",
          offsets: attributes.list("offsets"),
          sizes: attributes.list("sizes"),
        };
      case "insert_slice_async":
        return { kind: "insert_slice_async", axis: attributes.number("axis") };
      case "dot":
        return {
          kind: "dot",
          allowTf32: attributes.boolean("allow_tf32", false),
        };
      case "splat":
      case "select":
      case "broadcast":
      case "join":
      case "split":
      case "load":
      case "store":
      case "atomic_cas":
      case "alloc_tensor":
      case "convert_layout":
      case "for":
      case "while":
      case "if":
      case "yield":
      case "condition":
      case "return":
        return { kind: text };
      default:
        throw new ParseError(
          ErrorCode.UNKNOWN_OPERATION,
          text,
          Tokenizer.location(name),
        );
    }
  }

  /**
   * `[key = value, ...]`
   */
  private parseAttributes(): Map<string, AttributeValue> {
    const attributes = new Map<string, AttributeValue>();
    this.tokens.expect("PUNCTUATION", "[");
    do {
      const key = this.tokens.expect("NAME");
      this.tokens.expect("PUNCTUATION", "=");
      attributes.set(key.text, this.parseAttributeValue());
    } while (this.tokens.pollIfText(","));
    this.tokens.expect("PUNCTUATION", "]");
    return attributes;
  }

  private parseAttributeValue(): AttributeValue {
    if (this.tokens.hasNext("NUMBER")) {
      return Number(this.tokens.poll().text);
    }
    if (this.tokens.hasNextText("[")) {
      return this.parseIntegerList();
    }
    const word = this.tokens.expect("NAME");
    switch (word.text) {
      case "true":
        return true;
      case "false":
        return false;
      default:
        return word.text;
    }
  }

  private parseIntegerList(): number[] {
    const values: number[] = [];
    this.tokens.expect("PUNCTUATION", "[");
    if (this.tokens.pollIfText("]")) {
      return values;
    }
    do {
      const token = this.tokens.expect("NUMBER");
      const value = Number(token.text);
      if (!Number.isInteger(value)) {
        throw new ParseError(
          ErrorCode.INVALID_ATTRIBUTE,
          `expected an integer, found ${token.text}`,
          Tokenizer.location(token),
        );
      }
      values.push(value);
    } while (this.tokens.pollIfText(","));
    this.tokens.expect("PUNCTUATION", "]");
    return values;
  }

  /**
   * `tensor<[dims], element, layout>` or an element type
   */
  private parseType(): Ir.Type {
    if (this.tokens.hasNextText("tensor")) {
      this.tokens.poll();
      this.tokens.expect("PUNCTUATION", "<");
      const shape = this.parseIntegerList();
      this.tokens.expect("PUNCTUATION", ",");
      const element = this.parseElement();
      this.tokens.expect("PUNCTUATION", ",");
      const layout = this.parseLayoutReference();
      this.tokens.expect("PUNCTUATION", ">");
      return Ir.Type.tensor(shape, element, layout);
    }
    return Ir.Type.scalar(this.parseElement());
  }

  private parseElement(): Ir.Type.Element {
    const name = this.tokens.expect("NAME");
    if (name.text === "ptr") {
      this.tokens.expect("PUNCTUATION", "<");
      const pointee = this.numeric(this.tokens.expect("NAME"));
      this.tokens.expect("PUNCTUATION", ">");
      return `ptr<${pointee}>`;
    }
    return this.numeric(name);
  }

  private numeric(token: Token): Ir.Type.Numeric {
    if (!Ir.Type.isNumeric(token.text)) {
      throw new ParseError(
        ErrorCode.INVALID_TYPE,
        token.text,
        Tokenizer.location(token),
      );
    }
    return token.text;
  }

  private parseLayoutReference(): Ir.Layout {
    if (this.tokens.hasNext("ALIAS")) {
      const alias = this.tokens.poll();
      const layout = this.layouts.get(alias.text.slice(1));
      if (!layout) {
        throw new ParseError(
          ErrorCode.UNKNOWN_ALIAS,
          alias.text,
          Tokenizer.location(alias),
        );
      }
      return layout;
    }
    return this.parseLayout();
  }

  /**
   * `name<key = value, ...>` where values are integers, integer lists or
   * nested layouts
   */
  private parseLayout(): Ir.Layout {
    const name = this.tokens.expect("NAME");
    const values = new Map<string, LayoutValue>();
    this.tokens.expect("PUNCTUATION", "<");
    do {
      // Layout text may wrap between entries
      this.tokens.skipNewlines();
      const key = this.tokens.expect("NAME");
      this.tokens.expect("PUNCTUATION", "=");
      values.set(key.text, this.parseLayoutValue());
    } while (this.tokens.pollIfText(","));
    this.tokens.skipNewlines();
    this.tokens.expect("PUNCTUATION", ">");

    const attributes = new Attributes(name.text, values, name);
    switch (name.text) {
      case "blocked":
        return Ir.Layout.blocked(
          attributes.list("sizePerThread"),
          attributes.list("threadsPerWarp"),
          attributes.list("warpsPerCTA"),
          attributes.list("order"),
        );
      case "mma":
        return Ir.Layout.mma(
          attributes.number("versionMajor"),
          attributes.number("versionMinor", 0),
          attributes.list("warpsPerCTA"),
          attributes.list("instrShape"),
        );
      case "dot_operand": {
        const opIdx = attributes.number("opIdx");
        if (opIdx !== 0 && opIdx !== 1) {
          throw new ParseError(
            ErrorCode.INVALID_ATTRIBUTE,
            "dot_operand.opIdx must be 0 or 1",
            Tokenizer.location(name),
          );
        }
        return Ir.Layout.dotOperand(
          opIdx,
          this.parentLayout(name, values),
          attributes.number("kWidth", 0),
        );
      }
      case "slice":
        return Ir.Layout.slice(
          attributes.number("dim"),
          this.parentLayout(name, values),
        );
      case "shared":
        return Ir.Layout.shared(
          attributes.number("vec"),
          attributes.number("perPhase"),
          attributes.number("maxPhase"),
          attributes.list("order"),
        );
      default:
        throw new ParseError(
          ErrorCode.UNKNOWN_LAYOUT,
          name.text,
          Tokenizer.location(name),
        );
    }
  }

  private parseLayoutValue(): LayoutValue {
    if (this.tokens.hasNext("NUMBER")) {
      return Number(this.tokens.poll().text);
    }
    if (this.tokens.hasNextText("[")) {
      return this.parseIntegerList();
    }
    return this.parseLayoutReference();
  }

  private parentLayout(
    name: Token,
    values: Map<string, LayoutValue>,
  ): Ir.Layout {
    const parent = values.get("parent");
    if (parent === undefined || typeof parent === "number") {
      throw new ParseError(
        ErrorCode.MISSING_ATTRIBUTE,
        `${name.text}.parent must be a layout`,
        Tokenizer.location(name),
      );
    }
    if (Array.isArray(parent)) {
      throw new ParseError(
        ErrorCode.INVALID_ATTRIBUTE,
        `${name.text}.parent must be a layout`,
        Tokenizer.location(name),
      );
    }
    return parent;
  }

  private define(name: Token, value: Ir.Value): void {
    if (this.values.has(name.text)) {
      throw new ParseError(
        ErrorCode.DUPLICATE_VALUE,
        name.text,
        Tokenizer.location(name),
      );
    }
    value.id = name.text;
    this.values.set(name.text, value);

    const number = /^%(\d+)$/.exec(name.text);
    if (number) {
      this.maxValueNumber = Math.max(this.maxValueNumber, Number(number[1]));
    }
  }

  private use(name: Token): Ir.Value {
    const value = this.values.get(name.text);
    if (!value) {
      throw new ParseError(
        ErrorCode.UNDEFINED_VALUE,
        name.text,
        Tokenizer.location(name),
      );
    }
    return value;
  }

  private endOfLine(): void {
    if (!this.tokens.hasNextText("}") && !this.tokens.hasNext("EOF")) {
      this.tokens.expect("NEWLINE");
    }
    this.tokens.skipNewlines();
  }
}

/**
 * Parse textual IR into a module
 */
export function parse(source: string): Result<Ir.Module, ParseError> {
  try {
    return Result.ok(new Parser(source).parseModule());
  } catch (error) {
    if (error instanceof ParseError) {
      return Result.err(error);
    }
    throw error;
  }
}
