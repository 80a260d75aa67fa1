/**
 * Level formula evaluator.
 *
 * Grammar (the whole language; nothing else is accepted):
 *
 *   expr    := term (('+' | '-') term)*
 *   term    := unary (('*' | '/') unary)*
 *   unary   := ('+' | '-') unary | primary
 *   primary := NUMBER | 'total_earned' | ('sqrt' | 'floor') '(' expr ')' | '(' expr ')'
 */

export const DEFAULT_LEVEL_FORMULA = 'floor(sqrt(total_earned / 100)) + 1';

export class FormulaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormulaError';
  }
}

type Token =
  | { type: 'number'; value: number }
  | { type: 'identifier'; name: string }
  | { type: 'operator'; symbol: '+' | '-' | '*' | '/' }
  | { type: 'paren'; symbol: '(' | ')' };

type Node =
  | { type: 'literal'; value: number }
  | { type: 'variable' }
  | { type: 'call'; fn: 'sqrt' | 'floor'; arg: Node }
  | { type: 'negate'; operand: Node }
  | { type: 'binary'; op: '+' | '-' | '*' | '/'; left: Node; right: Node };

const OPERATORS = new Set(['+', '-', '*', '/']);

const isOperator = (c: string): c is '+' | '-' | '*' | '/' => OPERATORS.has(c);

export const tokenize = (source: string): Token[] => {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    if (/[0-9.]/.test(c)) {
      const match = /^\d*\.?\d+|^\d+\.?/.exec(source.slice(i));
      if (!match) throw new FormulaError(`Malformed number at position ${i}`);
      tokens.push({ type: 'number', value: Number(match[0]) });
      i += match[0].length;
      continue;
    }

    if (/[a-z_]/i.test(c)) {
      const match = /^[a-z_][a-z0-9_]*/i.exec(source.slice(i));
      if (!match) throw new FormulaError(`Malformed identifier at position ${i}`);
      const name = match[0];
      if (name !== 'total_earned' && name !== 'sqrt' && name !== 'floor') {
        throw new FormulaError(`Unknown identifier: ${name}`);
      }
      tokens.push({ type: 'identifier', name });
      i += name.length;
      continue;
    }

    if (isOperator(c)) {
      tokens.push({ type: 'operator', symbol: c });
      i++;
      continue;
    }

    if (c === '(' || c === ')') {
      tokens.push({ type: 'paren', symbol: c });
      i++;
      continue;
    }

    throw new FormulaError(`Invalid character '${c}' at position ${i}`);
  }

  return tokens;
};

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Node {
    if (this.tokens.length === 0) throw new FormulaError('Formula is empty');
    const node = this.expression();
    if (this.position < this.tokens.length) {
      throw new FormulaError('Unexpected trailing input');
    }
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) throw new FormulaError('Unexpected end of formula');
    this.position++;
    return token;
  }

  private expect(symbol: '(' | ')'): void {
    const token = this.next();
    if (token.type !== 'paren' || token.symbol !== symbol) {
      throw new FormulaError(`Expected '${symbol}'`);
    }
  }

  private expression(): Node {
    let left = this.term();
    for (let token = this.peek(); token?.type === 'operator' && (token.symbol === '+' || token.symbol === '-'); token = this.peek()) {
      this.position++;
      left = { type: 'binary', op: token.symbol, left, right: this.term() };
    }
    return left;
  }

  private term(): Node {
    let left = this.unary();
    for (let token = this.peek(); token?.type === 'operator' && (token.symbol === '*' || token.symbol === '/'); token = this.peek()) {
      this.position++;
      left = { type: 'binary', op: token.symbol, left, right: this.unary() };
    }
    return left;
  }

  private unary(): Node {
    const token = this.peek();
    if (token?.type === 'operator' && (token.symbol === '-' || token.symbol === '+')) {
      this.position++;
      const operand = this.unary();
      return token.symbol === '-' ? { type: 'negate', operand } : operand;
    }
    return this.primary();
  }

  private primary(): Node {
    const token = this.next();

    switch (token.type) {
      case 'number':
        return { type: 'literal', value: token.value };
      case 'identifier': {
        if (token.name === 'total_earned') return { type: 'variable' };
        const fn = token.name === 'sqrt' ? 'sqrt' : 'floor';
        this.expect('(');
        const arg = this.expression();
        this.expect(')');
        return { type: 'call', fn, arg };
      }
      case 'paren': {
        if (token.symbol !== '(') throw new FormulaError("Unexpected ')'");
        const inner = this.expression();
        this.expect(')');
        return inner;
      }
      case 'operator':
        throw new FormulaError(`Unexpected operator '${token.symbol}'`);
    }
  }
}

const evaluate = (node: Node, totalEarned: number): number => {
  switch (node.type) {
    case 'literal':
      return node.value;
    case 'variable':
      return totalEarned;
    case 'negate':
      return -evaluate(node.operand, totalEarned);
    case 'call': {
      const arg = evaluate(node.arg, totalEarned);
      return node.fn === 'sqrt' ? Math.sqrt(arg) : Math.floor(arg);
    }
    case 'binary': {
      const left = evaluate(node.left, totalEarned);
      const right = evaluate(node.right, totalEarned);
      switch (node.op) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          return left / right;
      }
    }
  }
};

export type CompiledFormula = (totalEarned: number) => number;

/**
 * Parse once, evaluate many times. Throws FormulaError on malformed input and,
 * at evaluation time, on non-finite results (division by zero, sqrt of a negative).
 */
export const compileLevelFormula = (source: string): CompiledFormula => {
  const ast = new Parser(tokenize(source)).parse();
  return (totalEarned: number) => {
    const value = evaluate(ast, totalEarned);
    if (!Number.isFinite(value)) {
      throw new FormulaError(`Formula produced a non-finite value for total_earned=${totalEarned}`);
    }
    return value;
  };
};

export const fallbackLevel = (totalEarned: number): number =>
  Math.max(1, 1 + Math.floor(totalEarned / 100));

/**
 * Level for a given total. Malformed formulas fall back to the linear rule;
 * the result is truncated to an integer and clamped to at least 1.
 */
export const computeLevel = (formula: string, totalEarned: number): number => {
  try {
    return Math.max(1, Math.floor(compileLevelFormula(formula)(totalEarned)));
  } catch (error) {
    if (error instanceof FormulaError) return fallbackLevel(totalEarned);
    throw error;
  }
};

const SAMPLE_TOTALS = [0, 100, 10000];

/**
 * Check a formula before it is stored: it must parse and give a level >= 1
 * at a few sample totals.
 */
export const validateLevelFormula = (
  formula: string
): { valid: true } | { valid: false; error: string } => {
  try {
    const compiled = compileLevelFormula(formula);
    for (const total of SAMPLE_TOTALS) {
      const value = compiled(total);
      if (value < 1) {
        return { valid: false, error: `Formula must produce level >= 1, got ${value} at total_earned=${total}` };
      }
    }
    return { valid: true };
  } catch (error) {
    if (error instanceof FormulaError) return { valid: false, error: error.message };
    throw error;
  }
};
