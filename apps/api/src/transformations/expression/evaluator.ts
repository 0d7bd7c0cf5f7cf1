import { CONDITIONAL_FUNCTION, ExprFunction, FUNCTIONS, toNumber, toText } from './functions';
import { parseExpression } from './parser';
import {
  BinaryOperator,
  EXPRESSION_LIMITS,
  ExprNode,
  ExprValue,
  TransformationError,
} from './expression.types';

function isTruthy(value: ExprValue): boolean {
  return value !== null && value !== false && value !== 0 && value !== '';
}

function checkLength(value: ExprValue): ExprValue {
  if (typeof value === 'string' && value.length > EXPRESSION_LIMITS.maxStringLength) {
    throw new TransformationError(
      `Result exceeds ${EXPRESSION_LIMITS.maxStringLength} characters`,
    );
  }
  return value;
}

function looseEquals(left: ExprValue, right: ExprValue): boolean {
  if (typeof left === typeof right) return left === right;
  if (typeof left === 'number' && typeof right === 'string') {
    return right.trim() !== '' && Number(right) === left;
  }
  if (typeof left === 'string' && typeof right === 'number') {
    return left.trim() !== '' && Number(left) === right;
  }
  return false;
}

function compare(operator: '<' | '<=' | '>' | '>=', left: ExprValue, right: ExprValue): boolean {
  let order: number;
  if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    order = toNumber(left, `'${operator}'`) - toNumber(right, `'${operator}'`);
  }
  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function arithmetic(operator: BinaryOperator, left: ExprValue, right: ExprValue): ExprValue {
  switch (operator) {
    case '+':
      if (typeof left === 'number' && typeof right === 'number') return left + right;
      if (typeof left === 'string' || typeof right === 'string') {
        return checkLength(toText(left) + toText(right));
      }
      return toNumber(left, "'+'") + toNumber(right, "'+'");
    case '-':
      return toNumber(left, "'-'") - toNumber(right, "'-'");
    case '*':
      return toNumber(left, "'*'") * toNumber(right, "'*'");
    case '/':
    case '%': {
      const divisor = toNumber(right, `'${operator}'`);
      if (divisor === 0) {
        throw new TransformationError('Division by zero');
      }
      const dividend = toNumber(left, `'${operator}'`);
      return operator === '/' ? dividend / divisor : dividend % divisor;
    }
    case '==':
      return looseEquals(left, right);
    case '!=':
      return !looseEquals(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compare(operator, left, right);
  }
}

/**
 * Reject calls to names outside the allow-list, or with the wrong arity,
 * before the expression is ever run.
 */
function validate(node: ExprNode): void {
  switch (node.kind) {
    case 'literal':
    case 'source':
      return;
    case 'unary':
      return validate(node.operand);
    case 'binary':
    case 'logical':
      validate(node.left);
      return validate(node.right);
    case 'conditional':
      validate(node.test);
      validate(node.consequent);
      return validate(node.alternate);
    case 'call': {
      if (node.name === CONDITIONAL_FUNCTION) {
        if (node.args.length !== 3) {
          throw new TransformationError('if() takes exactly 3 arguments');
        }
      } else {
        const fn = FUNCTIONS.get(node.name);
        if (!fn) {
          throw new TransformationError(`Unknown function '${node.name}'`);
        }
        if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
          throw new TransformationError(
            `${node.name}() takes ${fn.minArgs === fn.maxArgs ? fn.minArgs : `${fn.minArgs}-${fn.maxArgs}`} arguments, got ${node.args.length}`,
          );
        }
      }
      node.args.forEach(validate);
      return;
    }
  }
}

// Engine errors thrown inside a builtin, such as RangeError, become TransformationError
function callFunction(name: string, fn: ExprFunction, args: ExprValue[]): ExprValue {
  try {
    return fn.call(args);
  } catch (error) {
    if (error instanceof TransformationError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransformationError(`${name}: ${reason}`);
  }
}

/**
 * A parsed and validated transformation expression.
 *
 * The only bound name is `source`; there is no member access, no loops and no
 * user-defined functions, so evaluation always terminates. A step budget caps
 * the work per call regardless.
 */
export class CompiledExpression {
  private steps = 0;

  constructor(
    readonly text: string,
    private readonly ast: ExprNode,
  ) {}

  evaluate(source: string): ExprValue {
    this.steps = 0;
    return this.visit(this.ast, source);
  }

  private visit(node: ExprNode, source: string): ExprValue {
    if (++this.steps > EXPRESSION_LIMITS.maxSteps) {
      throw new TransformationError('Expression exceeded its evaluation budget');
    }

    switch (node.kind) {
      case 'literal':
        return node.value;
      case 'source':
        return source;
      case 'unary': {
        const operand = this.visit(node.operand, source);
        return node.operator === '!' ? !isTruthy(operand) : -toNumber(operand, "unary '-'");
      }
      case 'logical': {
        const left = this.visit(node.left, source);
        if (node.operator === 'and') {
          return isTruthy(left) ? this.visit(node.right, source) : left;
        }
        return isTruthy(left) ? left : this.visit(node.right, source);
      }
      case 'binary':
        return arithmetic(node.operator, this.visit(node.left, source), this.visit(node.right, source));
      case 'conditional':
        return isTruthy(this.visit(node.test, source))
          ? this.visit(node.consequent, source)
          : this.visit(node.alternate, source);
      case 'call': {
        if (node.name === CONDITIONAL_FUNCTION) {
          const [test, consequent, alternate] = node.args;
          return isTruthy(this.visit(test, source))
            ? this.visit(consequent, source)
            : this.visit(alternate, source);
        }
        const fn = FUNCTIONS.get(node.name);
        if (!fn) {
          throw new TransformationError(`Unknown function '${node.name}'`);
        }
        const args = node.args.map((arg) => this.visit(arg, source));
        return checkLength(callFunction(node.name, fn, args));
      }
    }
  }
}

export function compileExpression(text: string): CompiledExpression {
  const ast = parseExpression(text.trim());
  validate(ast);
  return new CompiledExpression(text, ast);
}

/**
 * Compile and run in one go; use `compileExpression` when the same logic is
 * applied to many rows.
 */
export function evaluateExpression(text: string, source: string): ExprValue {
  return compileExpression(text).evaluate(source);
}
