/**
 * Calculator Tool
 *
 * Evaluates arithmetic expressions used in financial analysis
 * (ratios, growth rates, valuation multiples) without `eval`.
 *
 * Grammar:
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '%') unary)*
 *   unary      := '-' unary | '+' unary | power
 *   power      := primary ('^' unary)?
 *   primary    := number | '(' expression ')'
 *   number     := digits ('.' digits)? ('k' | 'M' | 'B' | 'T' | '%')?
 */

import { CalculatorOutputSchema, CalculatorParametersSchema } from './types.js';
import type { ToolHandler } from './types.js';

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1e3,
  K: 1e3,
  m: 1e6,
  M: 1e6,
  b: 1e9,
  B: 1e9,
  t: 1e12,
  T: 1e12,
  '%': 0.01,
};

type Token =
  | { type: 'number'; value: number }
  | { type: 'op'; value: '+' | '-' | '*' | '/' | '%' | '^' }
  | { type: 'paren'; value: '(' | ')' };

export class CalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalculationError';
  }
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const source = expression.replace(/[$,_]/g, '');
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (/[0-9.]/.test(ch)) {
      let end = i;
      while (end < source.length && /[0-9.]/.test(source.charAt(end))) {
        end += 1;
      }
      const literal = source.slice(i, end);
      if ((literal.match(/\./g) ?? []).length > 1 || literal === '.') {
        throw new CalculationError(`Invalid number: ${literal}`);
      }
      let value = Number(literal);
      const suffix = source.charAt(end);
      const multiplier = SUFFIX_MULTIPLIERS[suffix];
      // A trailing '%' is a percentage only when no operand follows it.
      if (multiplier !== undefined && (suffix !== '%' || !startsOperand(source, end + 1))) {
        value *= multiplier;
        end += 1;
      }
      tokens.push({ type: 'number', value });
      i = end;
      continue;
    }

    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%' || ch === '^') {
      tokens.push({ type: 'op', value: ch });
      i += 1;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'paren', value: ch });
      i += 1;
      continue;
    }

    throw new CalculationError(`Unexpected character '${ch}' at position ${i}`);
  }

  return tokens;
}

function startsOperand(source: string, index: number): boolean {
  let i = index;
  while (i < source.length && /\s/.test(source.charAt(i))) {
    i += 1;
  }
  return /[0-9.(]/.test(source.charAt(i));
}

class Parser {
  private position = 0;

  constructor(private tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new CalculationError('Empty expression');
    }
    const value = this.expression();
    const extra = this.tokens[this.position];
    if (extra) {
      throw new CalculationError(`Unexpected token '${String(extra.value)}'`);
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      const token = this.peek();
      if (token?.type === 'op' && (token.value === '+' || token.value === '-')) {
        this.position += 1;
        const right = this.term();
        value = token.value === '+' ? value + right : value - right;
      } else {
        return value;
      }
    }
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      const token = this.peek();
      if (token?.type === 'op' && (token.value === '*' || token.value === '/' || token.value === '%')) {
        this.position += 1;
        const right = this.unary();
        if ((token.value === '/' || token.value === '%') && right === 0) {
          throw new CalculationError('Division by zero');
        }
        if (token.value === '*') value *= right;
        else if (token.value === '/') value /= right;
        else value %= right;
      } else {
        return value;
      }
    }
  }

  private power(): number {
    const base = this.primary();
    const token = this.peek();
    if (token?.type === 'op' && token.value === '^') {
      this.position += 1;
      return base ** this.unary();
    }
    return base;
  }

  private unary(): number {
    const token = this.peek();
    if (token?.type === 'op' && (token.value === '-' || token.value === '+')) {
      this.position += 1;
      const value = this.unary();
      return token.value === '-' ? -value : value;
    }
    return this.power();
  }

  private primary(): number {
    const token = this.peek();
    if (!token) {
      throw new CalculationError('Unexpected end of expression');
    }
    if (token.type === 'number') {
      this.position += 1;
      return token.value;
    }
    if (token.type === 'paren' && token.value === '(') {
      this.position += 1;
      const value = this.expression();
      const closing = this.peek();
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw new CalculationError('Missing closing parenthesis');
      }
      this.position += 1;
      return value;
    }
    throw new CalculationError(`Unexpected token '${String(token.value)}'`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }
}

export function evaluateExpression(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new CalculationError('Result is not a finite number');
  }
  return value;
}

/**
 * Round away floating point noise (0.1 + 0.2 -> 0.3).
 */
function normalize(value: number): number {
  return Number.parseFloat(value.toPrecision(12));
}

export const calculatorTool: ToolHandler<'calculator'> = {
  kind: 'calculator',
  description:
    'Evaluate an arithmetic expression for financial metrics, ratios, valuations or portfolio math.',
  parameters: CalculatorParametersSchema,
  output: CalculatorOutputSchema,
  execute: async ({ expression }) => ({ result: normalize(evaluateExpression(expression)) }),
};
