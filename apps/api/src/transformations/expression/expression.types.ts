export type ExprValue = string | number | boolean | null;

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>=';

export type ExprNode =
  | { kind: 'literal'; value: ExprValue }
  | { kind: 'source' }
  | { kind: 'unary'; operator: '-' | '!'; operand: ExprNode }
  | { kind: 'binary'; operator: BinaryOperator; left: ExprNode; right: ExprNode }
  | { kind: 'logical'; operator: 'and' | 'or'; left: ExprNode; right: ExprNode }
  | { kind: 'conditional'; test: ExprNode; consequent: ExprNode; alternate: ExprNode }
  | { kind: 'call'; name: string; args: ExprNode[] };

export class TransformationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransformationError';
  }
}

export const EXPRESSION_LIMITS = {
  maxLength: 2_000,
  maxDepth: 64,
  maxSteps: 10_000,
  maxStringLength: 65_535,
} as const;
