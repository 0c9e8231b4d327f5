/**
 * Exact arithmetic for expressions embedded in descriptions,
 * e.g. "Costco (45.50 + 20)".
 *
 * Evaluated over rationals with bigint numerator/denominator, so
 * "(10 / 3 * 3)" is exactly 10. Supports + - * / unary minus and
 * nested parentheses. "$" and thousands separators are ignored.
 */

import type { Ratio } from "@splitledger/ledger";
import { ExpressionError } from "./types.js";

type Token =
  | { readonly kind: "number"; readonly value: Ratio }
  | { readonly kind: "op"; readonly value: "+" | "-" | "*" | "/" }
  | { readonly kind: "paren"; readonly value: "(" | ")" };

const ALLOWED = /^[0-9.+\-*/()\s$,]*$/;

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

function normalize(numerator: bigint, denominator: bigint): Ratio {
  if (denominator === 0n) {
    throw new ExpressionError("DIVISION_BY_ZERO", "Division by zero");
  }
  const sign = denominator < 0n ? -1n : 1n;
  const g = gcd(numerator, denominator);
  return { numerator: (sign * numerator) / g, denominator: (sign * denominator) / g };
}

function tokenize(source: string): Token[] {
  if (!ALLOWED.test(source)) {
    throw new ExpressionError("DISALLOWED_CHARACTER", `Expression "${source}" contains characters other than numbers and operators`);
  }

  const tokens: Token[] = [];
  const text = source.replace(/[$,\s]/g, "");
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === "+" || ch === "-" || ch === "*" || ch === "/") {
      tokens.push({ kind: "op", value: ch });
      i += 1;
      continue;
    }
    if (ch === "(" || ch === ")") {
      tokens.push({ kind: "paren", value: ch });
      i += 1;
      continue;
    }

    const match = /^(\d+)(?:\.(\d+))?/.exec(text.slice(i));
    if (match === null) {
      throw new ExpressionError("PARSE_ERROR", `Unexpected "${ch}" at offset ${String(i)} in "${source}"`);
    }
    const intPart = match[1] ?? "0";
    const fracPart = match[2] ?? "";
    tokens.push({
      kind: "number",
      value: normalize(BigInt(intPart + fracPart), 10n ** BigInt(fracPart.length)),
    });
    i += match[0].length;
  }

  return tokens;
}

/**
 * Recursive-descent parser:
 *
 *   expr   := term (("+" | "-") term)*
 *   term   := factor (("*" | "/") factor)*
 *   factor := "-" factor | number | "(" expr ")"
 */
class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly source: string,
  ) {}

  parse(): Ratio {
    if (this.tokens.length === 0) {
      throw new ExpressionError("PARSE_ERROR", "Empty expression");
    }
    const value = this.expr();
    if (this.pos < this.tokens.length) {
      throw new ExpressionError("PARSE_ERROR", `Unexpected trailing input in "${this.source}"`);
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private expr(): Ratio {
    let left = this.term();
    for (let tok = this.peek(); tok?.kind === "op" && (tok.value === "+" || tok.value === "-"); tok = this.peek()) {
      this.pos += 1;
      const right = this.term();
      left = tok.value === "+"
        ? normalize(left.numerator * right.denominator + right.numerator * left.denominator, left.denominator * right.denominator)
        : normalize(left.numerator * right.denominator - right.numerator * left.denominator, left.denominator * right.denominator);
    }
    return left;
  }

  private term(): Ratio {
    let left = this.factor();
    for (let tok = this.peek(); tok?.kind === "op" && (tok.value === "*" || tok.value === "/"); tok = this.peek()) {
      this.pos += 1;
      const right = this.factor();
      left = tok.value === "*"
        ? normalize(left.numerator * right.numerator, left.denominator * right.denominator)
        : normalize(left.numerator * right.denominator, left.denominator * right.numerator);
    }
    return left;
  }

  private factor(): Ratio {
    const tok = this.peek();
    if (tok === undefined) {
      throw new ExpressionError("PARSE_ERROR", `Unexpected end of "${this.source}"`);
    }

    if (tok.kind === "op" && tok.value === "-") {
      this.pos += 1;
      const inner = this.factor();
      return { numerator: -inner.numerator, denominator: inner.denominator };
    }

    if (tok.kind === "number") {
      this.pos += 1;
      return tok.value;
    }

    if (tok.kind === "paren" && tok.value === "(") {
      this.pos += 1;
      const inner = this.expr();
      const close = this.peek();
      if (close?.kind !== "paren" || close.value !== ")") {
        throw new ExpressionError("PARSE_ERROR", `Missing ")" in "${this.source}"`);
      }
      this.pos += 1;
      return inner;
    }

    throw new ExpressionError("PARSE_ERROR", `Unexpected "${tok.value}" in "${this.source}"`);
  }
}

/**
 * Evaluate an arithmetic expression exactly.
 *
 * @throws {ExpressionError} on disallowed characters, syntax errors or division by zero
 */
export function evaluateExpression(source: string): Ratio {
  return new Parser(tokenize(source), source).parse();
}

/**
 * Parenthesized groups in a description that look like arithmetic:
 * at least one digit and at least one operator.
 */
export function findExpressions(description: string): string[] {
  const found: string[] = [];
  for (const match of description.matchAll(/\(([^()]*)\)/g)) {
    const inner = match[1] ?? "";
    if (/\d/.test(inner) && /[+\-*/]/.test(inner)) {
      found.push(inner.trim());
    }
  }
  return found;
}
