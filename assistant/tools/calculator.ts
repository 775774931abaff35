/**
 * calculate: evaluates arithmetic with a small recursive-descent parser.
 *
 * Supports + - * / %, ^ and ** (right-associative), unary signs, parentheses,
 * the constants pi, e and tau, and a fixed set of math functions. Nothing is
 * ever passed to a JavaScript evaluator.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
};

interface MathFunction {
  minArgs: number;
  maxArgs: number;
  apply: (args: number[]) => number;
}

const unary = (fn: (x: number) => number): MathFunction => ({ minArgs: 1, maxArgs: 1, apply: (a) => fn(a[0]) });

const FUNCTIONS: Readonly<Record<string, MathFunction>> = {
  abs: unary(Math.abs),
  sqrt: unary(Math.sqrt),
  cbrt: unary(Math.cbrt),
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  asin: unary(Math.asin),
  acos: unary(Math.acos),
  atan: unary(Math.atan),
  exp: unary(Math.exp),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  round: unary(Math.round),
  log10: unary(Math.log10),
  log2: unary(Math.log2),
  // log(x) is natural; log(x, base) divides
  log: { minArgs: 1, maxArgs: 2, apply: (a) => (a.length === 2 ? Math.log(a[0]) / Math.log(a[1]) : Math.log(a[0])) },
  pow: { minArgs: 2, maxArgs: 2, apply: (a) => a[0] ** a[1] },
  min: { minArgs: 1, maxArgs: Infinity, apply: (a) => Math.min(...a) },
  max: { minArgs: 1, maxArgs: Infinity, apply: (a) => Math.max(...a) },
};

// ============================================================================
// TOKENIZER
// ============================================================================

type Token =
  | { kind: "number"; value: number }
  | { kind: "ident"; name: string }
  | { kind: "op"; op: "+" | "-" | "*" | "/" | "%" | "^" | "(" | ")" | "," };

const NUMBER_PATTERN = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;
const IDENT_PATTERN = /^[a-z_][a-z0-9_]*/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let rest = source.toLowerCase().replace(/×/g, "*").replace(/÷/g, "/");

  while (rest.length > 0) {
    const ch = rest[0];
    if (/\s/.test(ch)) {
      rest = rest.slice(1);
      continue;
    }
    if (rest.startsWith("**")) {
      tokens.push({ kind: "op", op: "^" });
      rest = rest.slice(2);
      continue;
    }
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/" || ch === "%" || ch === "^" || ch === "(" || ch === ")" || ch === ",") {
      tokens.push({ kind: "op", op: ch });
      rest = rest.slice(1);
      continue;
    }
    const num = NUMBER_PATTERN.exec(rest);
    if (num) {
      tokens.push({ kind: "number", value: Number(num[0]) });
      rest = rest.slice(num[0].length);
      continue;
    }
    const ident = IDENT_PATTERN.exec(rest);
    if (ident) {
      tokens.push({ kind: "ident", name: ident[0] });
      rest = rest.slice(ident[0].length);
      continue;
    }
    throw new ToolError("invalid_arguments", `unexpected character "${ch}" in expression`);
  }

  return tokens;
}

// ============================================================================
// PARSER
// ============================================================================

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw syntaxError("empty expression");
    const value = this.expression();
    if (this.pos < this.tokens.length) throw syntaxError("unexpected input after expression");
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      if (this.acceptOp("+")) value += this.term();
      else if (this.acceptOp("-")) value -= this.term();
      else return value;
    }
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      if (this.acceptOp("*")) {
        value *= this.unary();
      } else if (this.acceptOp("/")) {
        const divisor = this.unary();
        if (divisor === 0) throw new ToolError("out_of_range", "division by zero");
        value /= divisor;
      } else if (this.acceptOp("%")) {
        const divisor = this.unary();
        if (divisor === 0) throw new ToolError("out_of_range", "division by zero");
        value %= divisor;
      } else {
        return value;
      }
    }
  }

  private unary(): number {
    if (this.acceptOp("-")) return -this.unary();
    if (this.acceptOp("+")) return this.unary();
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    // Right-associative, and the exponent may carry its own sign: 2^-1
    if (this.acceptOp("^")) return base ** this.unary();
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.pos];
    if (token === undefined) throw syntaxError("expression ends too early");

    if (token.kind === "number") {
      this.pos++;
      return token.value;
    }

    if (token.kind === "ident") {
      this.pos++;
      if (this.acceptOp("(")) return this.call(token.name);
      const constant = CONSTANTS[token.name];
      if (constant === undefined) throw syntaxError(`unknown name "${token.name}"`);
      return constant;
    }

    if (this.acceptOp("(")) {
      const value = this.expression();
      if (!this.acceptOp(")")) throw syntaxError("missing closing parenthesis");
      return value;
    }

    throw syntaxError(`unexpected "${token.op}"`);
  }

  private call(name: string): number {
    const fn = FUNCTIONS[name];
    if (fn === undefined) throw syntaxError(`unknown function "${name}"`);

    const args: number[] = [];
    if (!this.acceptOp(")")) {
      do {
        args.push(this.expression());
      } while (this.acceptOp(","));
      if (!this.acceptOp(")")) throw syntaxError(`missing closing parenthesis after ${name} arguments`);
    }

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw syntaxError(`${name} takes ${fn.minArgs === fn.maxArgs ? fn.minArgs : `${fn.minArgs} or more`} argument(s)`);
    }
    return fn.apply(args);
  }

  private acceptOp(op: string): boolean {
    const token = this.tokens[this.pos];
    if (token !== undefined && token.kind === "op" && token.op === op) {
      this.pos++;
      return true;
    }
    return false;
  }
}

function syntaxError(message: string): ToolError {
  return new ToolError("invalid_arguments", message);
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Evaluate an arithmetic expression.
 *
 * @throws ToolError invalid_arguments on syntax errors, out_of_range on
 *   division by zero or a result that is not a finite real number
 */
export function evaluateExpression(source: string): number {
  const value = new Parser(tokenize(source)).parse();
  if (!Number.isFinite(value)) {
    throw new ToolError("out_of_range", "the result is not a finite real number");
  }
  return value;
}

/**
 * Render a result without floating point noise (0.1 + 0.2 reads as 0.3).
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e21) return String(value);
  return String(Number(value.toPrecision(12)));
}

export function createCalculatorTool(): ToolDescriptor {
  return {
    name: "calculate",
    description: "Evaluate a math expression. Only when the user asks to compute something.",
    parameters: {
      expression: { type: "string", description: "Arithmetic expression, e.g. (12 + 4) * 3 or sqrt(2)", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "expression",
      prompt:
        "Rewrite the math in this message as a plain arithmetic expression using numbers, + - * / % ^, " +
        "parentheses, pi, e and functions like sqrt, sin, log.",
    },
    handler: async (args) => {
      const expression = String(args.expression).trim();
      return `${expression} = ${formatNumber(evaluateExpression(expression))}`;
    },
  };
}
