// Expression evaluation - computes derived variables from formulas
//
// Formulas are parsed once into a CompiledExpression and evaluated against a
// mapping of symbol -> value. Evaluation is pure: identical bindings always
// produce identical results.

import { ExpressionError } from '../errors.js';
import { parseExpression, type ExpressionNode } from './parser.js';

/**
 * Symbol name -> current value
 */
export type Bindings = Readonly<Record<string, number>>;

/**
 * A parsed formula, ready to evaluate.
 */
export type CompiledExpression = {
  readonly formula: string;
  readonly tree: ExpressionNode;

  /**
   * Symbols the formula reads, in order of first appearance (constants excluded)
   */
  readonly symbols: readonly string[];

  evaluate(bindings: Bindings): number;
};

type MathFunction = {
  minArgs: number;
  maxArgs: number;
  apply(args: number[]): number;
};

const unary = (fn: (x: number) => number): MathFunction => ({
  minArgs: 1,
  maxArgs: 1,
  apply: (args) => fn(args[0]),
});

const binary = (fn: (x: number, y: number) => number): MathFunction => ({
  minArgs: 2,
  maxArgs: 2,
  apply: (args) => fn(args[0], args[1]),
});

/**
 * Functions available to formulas
 */
export const FUNCTIONS: Readonly<Record<string, MathFunction>> = {
  sqrt: unary(Math.sqrt),
  abs: unary(Math.abs),
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  asin: unary(Math.asin),
  acos: unary(Math.acos),
  atan: unary(Math.atan),
  sinh: unary(Math.sinh),
  cosh: unary(Math.cosh),
  tanh: unary(Math.tanh),
  exp: unary(Math.exp),
  log: unary(Math.log),
  ln: unary(Math.log),
  log10: unary(Math.log10),
  log2: unary(Math.log2),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  round: unary(Math.round),
  sign: unary(Math.sign),
  pow: binary(Math.pow),
  atan2: binary(Math.atan2),
  hypot: binary(Math.hypot),
  min: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.max(...args) },
};

/**
 * Named constants. Bindings with the same name take precedence.
 */
export const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

/**
 * Compile a formula.
 *
 * @throws ExpressionError on syntax errors, unknown functions or wrong argument counts
 */
export function compileExpression(formula: string): CompiledExpression {
  const tree = parseExpression(formula);
  const symbols: string[] = [];

  const visit = (node: ExpressionNode): void => {
    switch (node.type) {
      case 'number':
        return;
      case 'symbol':
        if (!symbols.includes(node.name) && !Object.hasOwn(CONSTANTS, node.name)) {
          symbols.push(node.name);
        }
        return;
      case 'unary':
        visit(node.operand);
        return;
      case 'binary':
        visit(node.left);
        visit(node.right);
        return;
      case 'call': {
        const fn = Object.hasOwn(FUNCTIONS, node.name) ? FUNCTIONS[node.name] : undefined;
        if (!fn) {
          throw new ExpressionError(formula, `unknown function "${node.name}"`, node.position);
        }
        if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
          const expected =
            fn.minArgs === fn.maxArgs
              ? `${fn.minArgs}`
              : fn.maxArgs === Infinity
                ? `at least ${fn.minArgs}`
                : `${fn.minArgs}-${fn.maxArgs}`;
          throw new ExpressionError(
            formula,
            `${node.name}() takes ${expected} argument(s), got ${node.args.length}`,
            node.position
          );
        }
        node.args.forEach(visit);
        return;
      }
      default: {
        const _exhaustive: never = node;
        throw new Error(`Unknown expression node: ${JSON.stringify(_exhaustive)}`);
      }
    }
  };

  visit(tree);

  return {
    formula,
    tree,
    symbols,
    evaluate(bindings: Bindings): number {
      const result = evaluateNode(formula, tree, bindings);
      if (!Number.isFinite(result)) {
        throw new ExpressionError(formula, `result is not a finite number (${result})`);
      }
      return result;
    },
  };
}

function evaluateNode(formula: string, node: ExpressionNode, bindings: Bindings): number {
  switch (node.type) {
    case 'number':
      return node.value;

    case 'symbol': {
      if (Object.hasOwn(bindings, node.name)) {
        return bindings[node.name];
      }
      if (Object.hasOwn(CONSTANTS, node.name)) {
        return CONSTANTS[node.name];
      }
      throw new ExpressionError(formula, `unknown symbol "${node.name}"`, node.position);
    }

    case 'unary': {
      const operand = evaluateNode(formula, node.operand, bindings);
      return node.op === '-' ? -operand : operand;
    }

    case 'binary': {
      const left = evaluateNode(formula, node.left, bindings);
      const right = evaluateNode(formula, node.right, bindings);

      const op = node.op;
      switch (op) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
        case '%':
          if (right === 0) {
            throw new ExpressionError(formula, 'division by zero', node.position);
          }
          return op === '/' ? left / right : left % right;
        case '^':
          return Math.pow(left, right);
        default: {
          const _exhaustive: never = op;
          throw new Error(`Unknown operator: ${String(_exhaustive)}`);
        }
      }
    }

    case 'call': {
      const args = node.args.map((arg) => evaluateNode(formula, arg, bindings));
      return FUNCTIONS[node.name].apply(args);
    }

    default: {
      const _exhaustive: never = node;
      throw new Error(`Unknown expression node: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Cache for compiled formulas to avoid re-parsing on every tick
 */
const compiledExpressionCache = new Map<string, CompiledExpression>();

/**
 * Get a compiled formula, using the cache when possible.
 */
export function getCompiledExpression(formula: string): CompiledExpression {
  const cached = compiledExpressionCache.get(formula);
  if (cached) {
    return cached;
  }

  const compiled = compileExpression(formula);
  compiledExpressionCache.set(formula, compiled);
  return compiled;
}

/**
 * Clear the compiled expression cache (useful for testing)
 */
export function clearCompiledExpressionCache(): void {
  compiledExpressionCache.clear();
}

/**
 * Evaluate a formula against bindings.
 *
 * @throws ExpressionError on unknown symbols, division by zero, syntax errors
 *   or a non-finite result
 */
export function evaluate(formula: string, bindings: Bindings): number {
  return getCompiledExpression(formula).evaluate(bindings);
}
