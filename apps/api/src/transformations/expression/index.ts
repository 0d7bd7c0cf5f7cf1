export { compileExpression, evaluateExpression, CompiledExpression } from './evaluator';
export { ExprValue, TransformationError, EXPRESSION_LIMITS } from './expression.types';
