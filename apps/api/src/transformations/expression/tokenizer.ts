import { TransformationError } from './expression.types';

export type TokenType = 'number' | 'string' | 'identifier' | 'operator' | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

const OPERATORS = [
  '==', '!=', '<=', '>=', '&&', '||',
  '<', '>', '+', '-', '*', '/', '%', '!', '(', ')', ',', '?', ':',
];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(text[pos + 1] ?? ''))) {
      const match = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/.exec(text.slice(pos));
      const value = match ? match[0] : ch;
      tokens.push({ type: 'number', value, position: pos });
      pos += value.length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = pos;
      let value = '';
      pos++;
      while (pos < text.length && text[pos] !== ch) {
        if (text[pos] === '\\') {
          const next = text[pos + 1];
          if (next === undefined || !(next in ESCAPES)) {
            throw new TransformationError(`Invalid escape sequence at position ${pos}`);
          }
          value += ESCAPES[next];
          pos += 2;
        } else {
          value += text[pos];
          pos++;
        }
      }
      if (pos >= text.length) {
        throw new TransformationError(`Unterminated string starting at position ${start}`);
      }
      pos++; // closing quote
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(pos));
      const value = match ? match[0] : ch;
      tokens.push({ type: 'identifier', value, position: pos });
      pos += value.length;
      continue;
    }

    const operator = OPERATORS.find((op) => text.startsWith(op, pos));
    if (!operator) {
      throw new TransformationError(`Unexpected character '${ch}' at position ${pos}`);
    }
    tokens.push({ type: 'operator', value: operator, position: pos });
    pos += operator.length;
  }

  tokens.push({ type: 'eof', value: '', position: text.length });
  return tokens;
}
