import type { Tool, ToolArgs } from '../types.js';
import { ToolArgumentError } from '../executor.js';

const ALLOWED = /^[\d\s+\-*/().]+$/;

/**
 * Recursive-descent evaluator for + - * / with parentheses and unary signs.
 *
 *   expr   := term (('+' | '-') term)*
 *   term   := factor (('*' | '/') factor)*
 *   factor := ('+' | '-') factor | number | '(' expr ')'
 */
class ArithmeticParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): number {
    const value = this.expr();
    this.skipSpace();
    if (this.pos < this.input.length) {
      throw new ToolArgumentError(`Unexpected "${this.input[this.pos]}" at position ${this.pos}`);
    }
    return value;
  }

  private expr(): number {
    let value = this.term();
    for (;;) {
      const op = this.peek();
      if (op !== '+' && op !== '-') return value;
      this.pos++;
      const rhs = this.term();
      value = op === '+' ? value + rhs : value - rhs;
    }
  }

  private term(): number {
    let value = this.factor();
    for (;;) {
      const op = this.peek();
      if (op !== '*' && op !== '/') return value;
      this.pos++;
      const rhs = this.factor();
      if (op === '/' && rhs === 0) {
        throw new ToolArgumentError('Division by zero');
      }
      value = op === '*' ? value * rhs : value / rhs;
    }
  }

  private factor(): number {
    const ch = this.peek();
    if (ch === '+' || ch === '-') {
      this.pos++;
      const value = this.factor();
      return ch === '-' ? -value : value;
    }
    if (ch === '(') {
      this.pos++;
      const value = this.expr();
      if (this.peek() !== ')') {
        throw new ToolArgumentError(`Missing ")" at position ${this.pos}`);
      }
      this.pos++;
      return value;
    }
    return this.number();
  }

  private number(): number {
    this.skipSpace();
    const match = /^(\d+\.?\d*|\.\d+)/.exec(this.input.slice(this.pos));
    if (!match) {
      throw new ToolArgumentError(
        this.pos >= this.input.length ? 'Unexpected end of expression' : `Expected a number at position ${this.pos}`,
      );
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private peek(): string | undefined {
    this.skipSpace();
    return this.input[this.pos];
  }

  private skipSpace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) this.pos++;
  }
}

export function evaluateArithmetic(expression: string): number {
  if (!ALLOWED.test(expression)) {
    throw new ToolArgumentError('Expression may only contain digits, spaces, + - * / ( ) and .');
  }
  return new ArithmeticParser(expression).parse();
}

export const calculateTool: Tool = {
  name: 'calculate',
  description: 'Evaluate an arithmetic expression using + - * / and parentheses',
  parameters: {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'Expression to evaluate, e.g. "2 + 2 * 3"' },
    },
    required: ['expression'],
  },
  execute: (args: ToolArgs) => {
    const { expression } = args;
    if (typeof expression !== 'string') {
      throw new ToolArgumentError('expression must be a string');
    }
    return { expression, result: evaluateArithmetic(expression) };
  },
};
