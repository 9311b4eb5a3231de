/**
 * Tokenizer for the textual IR
 */

import type { SourceLocation } from "#errors";

import { ParseError, ErrorCode } from "./errors.js";

export namespace Tokenizer {
  export type Kind =
    | "VALUE"
    | "FUNCTION"
    | "ALIAS"
    | "NAME"
    | "NUMBER"
    | "PUNCTUATION"
    | "NEWLINE"
    | "EOF";

  export interface Token<K extends Kind = Kind> {
    readonly kind: K;
    readonly text: string;
    readonly offset: number;
  }

  export const location = (token: Token): SourceLocation => ({
    offset: token.offset,
    length: token.text.length,
  });

  // Order matters: comments and whitespace first, numbers before names
  const RULES: [Kind | "SKIP", RegExp][] = [
    ["SKIP", /[ \t\r]+/y],
    ["SKIP", /\/\/[^\n]*/y],
    ["SKIP", /\/\*[\s\S]*?\*\//y],
    ["NEWLINE", /\n/y],
    ["VALUE", /%[A-Za-z0-9_]+/y],
    ["FUNCTION", /@[A-Za-z_][A-Za-z0-9_]*/y],
    ["ALIAS", /#[A-Za-z_][A-Za-z0-9_]*/y],
    ["NUMBER", /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y],
    ["NAME", /[A-Za-z_][A-Za-z0-9_]*/y],
    ["PUNCTUATION", /[{}()[\]<>,:=^]/y],
  ];

  export function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let offset = 0;

    scan: while (offset < source.length) {
      for (const [kind, pattern] of RULES) {
        pattern.lastIndex = offset;
        const match = pattern.exec(source);
        if (!match) continue;

        const text = match[0];
        if (kind === "NEWLINE" || (kind === "SKIP" && text.includes("\n"))) {
          // Blank lines and multi-line comments collapse into one NEWLINE
          const previous = tokens[tokens.length - 1];
          if (previous && previous.kind !== "NEWLINE") {
            tokens.push({ kind: "NEWLINE", text: "\n", offset });
          }
        } else if (kind !== "SKIP") {
          tokens.push({ kind, text, offset });
        }
        offset += text.length;
        continue scan;
      }

      throw new ParseError(
        ErrorCode.UNEXPECTED_TOKEN,
        JSON.stringify(source[offset]),
        { offset, length: 1 },
      );
    }

    tokens.push({ kind: "EOF", text: "", offset: source.length });
    return tokens;
  }

  export class TokenQueue {
    private i = 0;

    constructor(private readonly tokens: readonly Token[]) {}

    peek(): Token {
      return this.tokens[this.i];
    }

    poll(): Token {
      const token = this.tokens[this.i];
      if (token.kind !== "EOF") {
        this.i++;
      }
      return token;
    }

    hasNext(...kinds: Kind[]): boolean {
      return kinds.includes(this.peek().kind);
    }

    hasNextText(...texts: string[]): boolean {
      return texts.includes(this.peek().text);
    }

    pollIf(kind: Kind): boolean {
      return this.hasNext(kind) && (this.poll(), true);
    }

    pollIfText(text: string): boolean {
      return this.hasNextText(text) && (this.poll(), true);
    }

    skipNewlines(): void {
      while (this.pollIf("NEWLINE")) {
        // skip
      }
    }

    /**
     * Consume a token of the given kind, optionally with the given text
     */
    expect<K extends Kind>(kind: K, text?: string): Token<K> {
      const token = this.peek();
      if (token.kind !== kind || (text !== undefined && token.text !== text)) {
        const expected = text ?? kind;
        throw new ParseError(
          ErrorCode.UNEXPECTED_TOKEN,
          `expected ${expected}, found ${describe(token)}`,
          location(token),
          [expected],
        );
      }
      this.poll();
      return { kind, text: token.text, offset: token.offset };
    }
  }

  export function describe(token: Token): string {
    switch (token.kind) {
      case "EOF":
        return "end of input";
      case "NEWLINE":
        return "end of line";
      default:
        return `"${token.text}"`;
    }
  }
}
