// Expression evaluation

export {
  compileExpression,
  getCompiledExpression,
  clearCompiledExpressionCache,
  evaluate,
  FUNCTIONS,
  CONSTANTS,
  type Bindings,
  type CompiledExpression,
} from './evaluator.js';

export {
  parseExpression,
  tokenize,
  type ExpressionNode,
  type BinaryOperator,
} from './parser.js';
