import { Token, tokenize } from './tokenizer';
import {
  BinaryOperator,
  EXPRESSION_LIMITS,
  ExprNode,
  TransformationError,
} from './expression.types';

const KEYWORD_LITERALS = new Map<string, ExprNode>([
  ['true', { kind: 'literal', value: true }],
  ['True', { kind: 'literal', value: true }],
  ['false', { kind: 'literal', value: false }],
  ['False', { kind: 'literal', value: false }],
  ['null', { kind: 'literal', value: null }],
  ['None', { kind: 'literal', value: null }],
]);

const COMPARISON_OPERATORS = new Map<string, BinaryOperator>([
  ['==', '=='],
  ['!=', '!='],
  ['<', '<'],
  ['<=', '<='],
  ['>', '>'],
  ['>=', '>='],
]);

/**
 * Recursive-descent parser for transformation expressions.
 *
 * Precedence, lowest first: `?:`, `or`/`||`, `and`/`&&`, `not`/`!`,
 * comparison, `+ -`, `* / %`, unary minus, primary.
 */
class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    const node = this.conditional();
    const token = this.peek();
    if (token.type !== 'eof') {
      throw new TransformationError(`Unexpected '${token.value}' at position ${token.position}`);
    }
    return node;
  }

  private conditional(): ExprNode {
    this.enter();
    const test = this.or();
    let node = test;
    if (this.matchOperator('?')) {
      const consequent = this.conditional();
      this.expectOperator(':');
      const alternate = this.conditional();
      node = { kind: 'conditional', test, consequent, alternate };
    }
    this.depth--;
    return node;
  }

  private or(): ExprNode {
    let node = this.and();
    while (this.matchOperator('||') || this.matchKeyword('or')) {
      node = { kind: 'logical', operator: 'or', left: node, right: this.and() };
    }
    return node;
  }

  private and(): ExprNode {
    let node = this.not();
    while (this.matchOperator('&&') || this.matchKeyword('and')) {
      node = { kind: 'logical', operator: 'and', left: node, right: this.not() };
    }
    return node;
  }

  private not(): ExprNode {
    if (this.matchOperator('!') || this.matchKeyword('not')) {
      this.enter();
      const operand = this.not();
      this.depth--;
      return { kind: 'unary', operator: '!', operand };
    }
    return this.comparison();
  }

  private comparison(): ExprNode {
    const left = this.additive();
    const token = this.peek();
    const operator = token.type === 'operator' ? COMPARISON_OPERATORS.get(token.value) : undefined;
    if (operator) {
      this.index++;
      const right = this.additive();
      return { kind: 'binary', operator, left, right };
    }
    return left;
  }

  private additive(): ExprNode {
    let node = this.multiplicative();
    for (;;) {
      if (this.matchOperator('+')) {
        node = { kind: 'binary', operator: '+', left: node, right: this.multiplicative() };
      } else if (this.matchOperator('-')) {
        node = { kind: 'binary', operator: '-', left: node, right: this.multiplicative() };
      } else {
        return node;
      }
    }
  }

  private multiplicative(): ExprNode {
    let node = this.unary();
    for (;;) {
      if (this.matchOperator('*')) {
        node = { kind: 'binary', operator: '*', left: node, right: this.unary() };
      } else if (this.matchOperator('/')) {
        node = { kind: 'binary', operator: '/', left: node, right: this.unary() };
      } else if (this.matchOperator('%')) {
        node = { kind: 'binary', operator: '%', left: node, right: this.unary() };
      } else {
        return node;
      }
    }
  }

  private unary(): ExprNode {
    if (this.matchOperator('-')) {
      this.enter();
      const operand = this.unary();
      this.depth--;
      return { kind: 'unary', operator: '-', operand };
    }
    return this.primary();
  }

  private primary(): ExprNode {
    const token = this.advance();

    switch (token.type) {
      case 'number': {
        const value = Number(token.value);
        if (!Number.isFinite(value)) {
          throw new TransformationError(`Invalid number '${token.value}' at position ${token.position}`);
        }
        return { kind: 'literal', value };
      }
      case 'string':
        return { kind: 'literal', value: token.value };
      case 'identifier':
        return this.identifier(token);
      case 'operator':
        if (token.value === '(') {
          const inner = this.conditional();
          this.expectOperator(')');
          return inner;
        }
        break;
      case 'eof':
        throw new TransformationError('Unexpected end of expression');
    }

    throw new TransformationError(`Unexpected '${token.value}' at position ${token.position}`);
  }

  private identifier(token: Token): ExprNode {
    const literal = KEYWORD_LITERALS.get(token.value);
    if (literal) return literal;

    if (this.matchOperator('(')) {
      const args: ExprNode[] = [];
      if (!this.matchOperator(')')) {
        do {
          args.push(this.conditional());
        } while (this.matchOperator(','));
        this.expectOperator(')');
      }
      return { kind: 'call', name: token.value.toLowerCase(), args };
    }

    if (token.value === 'source') {
      return { kind: 'source' };
    }

    throw new TransformationError(
      `Unknown name '${token.value}' at position ${token.position}; only 'source' is bound`,
    );
  }

  // ─── Token helpers ───────────────────────────────────────────────────────

  private enter() {
    this.depth++;
    if (this.depth > EXPRESSION_LIMITS.maxDepth) {
      throw new TransformationError('Expression is nested too deeply');
    }
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private matchOperator(value: string): boolean {
    const token = this.peek();
    if (token.type === 'operator' && token.value === value) {
      this.index++;
      return true;
    }
    return false;
  }

  private matchKeyword(value: string): boolean {
    const token = this.peek();
    if (token.type === 'identifier' && token.value === value) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectOperator(value: string) {
    const token = this.peek();
    if (!this.matchOperator(value)) {
      throw new TransformationError(
        `Expected '${value}' but found '${token.value || 'end of expression'}' at position ${token.position}`,
      );
    }
  }
}

export function parseExpression(text: string): ExprNode {
  if (text.length > EXPRESSION_LIMITS.maxLength) {
    throw new TransformationError(
      `Expression exceeds ${EXPRESSION_LIMITS.maxLength} characters`,
    );
  }
  return new Parser(tokenize(text)).parse();
}
