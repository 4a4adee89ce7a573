// Expression parser - turns a formula string into an expression tree
//
// Grammar (lowest to highest precedence):
//   additive       := multiplicative (('+' | '-') multiplicative)*
//   multiplicative := unary (('*' | '/' | '%') unary)*
//   unary          := ('+' | '-') unary | power
//   power          := primary (('^' | '**') unary)?
//   primary        := number | identifier | identifier '(' args ')' | '(' additive ')'
//
// Exponentiation is right-associative and binds tighter than unary minus,
// so -x^2 is -(x^2) and 2^3^2 is 2^(3^2).

import { ExpressionError } from '../errors.js';

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '^';

export type ExpressionNode =
  | { type: 'number'; value: number }
  | { type: 'symbol'; name: string; position: number }
  | { type: 'unary'; op: '+' | '-'; operand: ExpressionNode }
  | { type: 'binary'; op: BinaryOperator; left: ExpressionNode; right: ExpressionNode; position: number }
  | { type: 'call'; name: string; args: ExpressionNode[]; position: number };

type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'identifier'; value: string; position: number }
  | { type: 'operator'; value: BinaryOperator; position: number }
  | { type: 'paren'; value: '(' | ')'; position: number }
  | { type: 'comma'; position: number }
  | { type: 'end'; position: number };

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

/**
 * Split a formula into tokens.
 *
 * @throws ExpressionError on characters that cannot start a token
 */
export function tokenize(formula: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < formula.length) {
    const ch = formula[index];

    if (/\s/.test(ch)) {
      index += 1;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'paren', value: ch, position: index });
      index += 1;
      continue;
    }

    if (ch === ',') {
      tokens.push({ type: 'comma', position: index });
      index += 1;
      continue;
    }

    if (ch === '*' && formula[index + 1] === '*') {
      tokens.push({ type: 'operator', value: '^', position: index });
      index += 2;
      continue;
    }

    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%' || ch === '^') {
      tokens.push({ type: 'operator', value: ch, position: index });
      index += 1;
      continue;
    }

    const rest = formula.slice(index);

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), position: index });
      index += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      tokens.push({ type: 'identifier', value: identifier[0], position: index });
      index += identifier[0].length;
      continue;
    }

    throw new ExpressionError(formula, `unexpected character "${ch}"`, index);
  }

  tokens.push({ type: 'end', position: formula.length });
  return tokens;
}

/**
 * Parse a formula into an expression tree.
 *
 * @throws ExpressionError on syntax errors
 */
export function parseExpression(formula: string): ExpressionNode {
  const tokens = tokenize(formula);
  let cursor = 0;

  const peek = (): Token => tokens[cursor];
  const advance = (): Token => tokens[cursor++];

  const fail = (token: Token, reason: string): never => {
    throw new ExpressionError(formula, reason, token.position);
  };

  const describe = (token: Token): string => {
    switch (token.type) {
      case 'end':
        return 'end of expression';
      case 'comma':
        return '","';
      case 'number':
        return `number ${token.value}`;
      default:
        return `"${token.value}"`;
    }
  };

  const isOperator = (token: Token, ...ops: BinaryOperator[]): boolean =>
    token.type === 'operator' && ops.includes(token.value);

  function parseAdditive(): ExpressionNode {
    let left = parseMultiplicative();
    let token = peek();
    while (token.type === 'operator' && (token.value === '+' || token.value === '-')) {
      advance();
      left = { type: 'binary', op: token.value, left, right: parseMultiplicative(), position: token.position };
      token = peek();
    }
    return left;
  }

  function parseMultiplicative(): ExpressionNode {
    let left = parseUnary();
    let token = peek();
    while (token.type === 'operator' && (token.value === '*' || token.value === '/' || token.value === '%')) {
      advance();
      left = { type: 'binary', op: token.value, left, right: parseUnary(), position: token.position };
      token = peek();
    }
    return left;
  }

  function parseUnary(): ExpressionNode {
    const token = peek();
    if (token.type === 'operator' && (token.value === '+' || token.value === '-')) {
      advance();
      return { type: 'unary', op: token.value, operand: parseUnary() };
    }
    return parsePower();
  }

  function parsePower(): ExpressionNode {
    const base = parsePrimary();
    const token = peek();
    if (isOperator(token, '^')) {
      advance();
      return { type: 'binary', op: '^', left: base, right: parseUnary(), position: token.position };
    }
    return base;
  }

  function parsePrimary(): ExpressionNode {
    const token = advance();

    switch (token.type) {
      case 'number':
        return { type: 'number', value: token.value };

      case 'identifier': {
        const next = peek();
        if (next.type === 'paren' && next.value === '(') {
          advance();
          return { type: 'call', name: token.value, args: parseArguments(), position: token.position };
        }
        return { type: 'symbol', name: token.value, position: token.position };
      }

      case 'paren':
        if (token.value === '(') {
          const inner = parseAdditive();
          const close = advance();
          if (close.type !== 'paren' || close.value !== ')') {
            return fail(close, `expected ")" but found ${describe(close)}`);
          }
          return inner;
        }
        return fail(token, 'unexpected ")"');

      default:
        return fail(token, `unexpected ${describe(token)}`);
    }
  }

  function parseArguments(): ExpressionNode[] {
    const args: ExpressionNode[] = [];
    const first = peek();
    if (first.type === 'paren' && first.value === ')') {
      advance();
      return args;
    }

    for (;;) {
      args.push(parseAdditive());
      const token = advance();
      if (token.type === 'comma') {
        continue;
      }
      if (token.type === 'paren' && token.value === ')') {
        return args;
      }
      return fail(token, `expected "," or ")" but found ${describe(token)}`);
    }
  }

  if (formula.trim() === '') {
    throw new ExpressionError(formula, 'expression is empty');
  }

  const tree = parseAdditive();
  const last = peek();
  if (last.type !== 'end') {
    fail(last, `unexpected ${describe(last)}`);
  }
  return tree;
}
