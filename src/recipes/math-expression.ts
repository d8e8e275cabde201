/**
 * Arithmetic evaluator for `{{MATH:...}}` recipe placeholders.
 *
 * Grammar:
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/' | '//' | '%') unary)*
 *   unary   := '-' unary | '+' unary | power
 *   power   := primary ('**' unary)?
 *   primary := number | name '(' args ')' | '(' expr ')'
 *
 * Only the functions in FUNCTIONS can be called; there are no variables.
 */

type Token =
  | { type: 'number'; value: number }
  | { type: 'name'; value: string }
  | { type: 'op'; value: string };

const FUNCTIONS = new Map<string, (...args: number[]) => number>([
  ['abs', Math.abs],
  [
    'round',
    (value: number, digits = 0) => {
      const factor = 10 ** digits;
      return Math.round(value * factor) / factor;
    }
  ],
  ['min', Math.min],
  ['max', Math.max],
  ['ceil', Math.ceil],
  ['floor', Math.floor],
  ['pow', Math.pow],
  ['sqrt', Math.sqrt]
]);

export class MathExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MathExpressionError';
  }
}

const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const char = source[pos];

    if (/\s/.test(char)) {
      pos++;
      continue;
    }

    const numberMatch = /^(\d+\.?\d*|\.\d+)/.exec(source.slice(pos));
    if (numberMatch) {
      tokens.push({ type: 'number', value: Number(numberMatch[1]) });
      pos += numberMatch[1].length;
      continue;
    }

    const nameMatch = /^[A-Za-z_]\w*/.exec(source.slice(pos));
    if (nameMatch) {
      tokens.push({ type: 'name', value: nameMatch[0] });
      pos += nameMatch[0].length;
      continue;
    }

    const two = source.slice(pos, pos + 2);
    if (two === '**' || two === '//') {
      tokens.push({ type: 'op', value: two });
      pos += 2;
      continue;
    }

    if ('+-*/%(),'.includes(char)) {
      tokens.push({ type: 'op', value: char });
      pos++;
      continue;
    }

    throw new MathExpressionError(`Unexpected character '${char}' at position ${pos}`);
  }

  return tokens;
};

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.expression();
    if (this.pos < this.tokens.length) {
      throw new MathExpressionError('Unexpected trailing input');
    }
    return value;
  }

  private peekOp(...ops: string[]): string | null {
    const token = this.tokens[this.pos];
    if (token?.type === 'op' && ops.includes(token.value)) {
      return token.value;
    }
    return null;
  }

  private expect(op: string): void {
    if (!this.peekOp(op)) {
      throw new MathExpressionError(`Expected '${op}'`);
    }
    this.pos++;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp('+', '-'); op; op = this.peekOp('+', '-')) {
      this.pos++;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp('*', '/', '//', '%'); op; op = this.peekOp('*', '/', '//', '%')) {
      this.pos++;
      const right = this.unary();
      if (op === '*') {
        value *= right;
        continue;
      }
      if (right === 0) {
        throw new MathExpressionError('Division by zero');
      }
      if (op === '/') {
        value /= right;
      } else if (op === '//') {
        value = Math.floor(value / right);
      } else {
        // Sign follows the divisor
        value = ((value % right) + right) % right;
      }
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp('-', '+');
    if (op) {
      this.pos++;
      const value = this.unary();
      return op === '-' ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp('**')) {
      this.pos++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new MathExpressionError('Unexpected end of expression');
    }

    if (token.type === 'number') {
      this.pos++;
      return token.value;
    }

    if (token.type === 'name') {
      const fn = FUNCTIONS.get(token.value);
      if (!fn) {
        throw new MathExpressionError(`Unknown name '${token.value}'`);
      }
      this.pos++;
      this.expect('(');
      const args: number[] = [];
      if (!this.peekOp(')')) {
        args.push(this.expression());
        while (this.peekOp(',')) {
          this.pos++;
          args.push(this.expression());
        }
      }
      this.expect(')');
      return fn(...args);
    }

    if (token.value === '(') {
      this.pos++;
      const value = this.expression();
      this.expect(')');
      return value;
    }

    throw new MathExpressionError(`Unexpected '${token.value}'`);
  }
}

export const evaluateMathExpression = (expression: string): number => {
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new MathExpressionError(`Expression '${expression}' is not a finite number`);
  }
  return value;
};

