/**
 * Tokenizer for condition expressions.
 *
 * @module expression/tokenizer
 */

import { ExpressionSyntaxError } from '../errors/expression-error';

export type ComparisonOperator = '==' | '!=' | '>=' | '<=' | '>' | '<';

/** Longest operators first so `==` never splits into two tokens. */
const OPERATORS: readonly ComparisonOperator[] = ['!=', '==', '>=', '<=', '>', '<'];

const KEYWORDS = ['and', 'or'] as const;

export type Token =
  | { readonly kind: 'literal'; readonly text: string; readonly quoted: boolean; readonly position: number }
  | { readonly kind: 'operator'; readonly operator: ComparisonOperator; readonly position: number }
  | { readonly kind: 'and'; readonly position: number }
  | { readonly kind: 'or'; readonly position: number }
  | { readonly kind: 'lparen'; readonly position: number }
  | { readonly kind: 'rparen'; readonly position: number };

function isWhitespace(char: string): boolean {
  return /\s/.test(char);
}

function matchOperator(source: string, index: number): ComparisonOperator | null {
  for (const operator of OPERATORS) {
    if (source.startsWith(operator, index)) {
      return operator;
    }
  }
  return null;
}

/**
 * AND/OR count only as whole words: preceded by start, whitespace or `)`,
 * followed by end, whitespace or `(`. Identifiers such as `android` or
 * `order` stay literals.
 */
function matchKeyword(source: string, index: number): (typeof KEYWORDS)[number] | null {
  const previous = index === 0 ? '' : source[index - 1];
  if (previous !== '' && previous !== ')' && !isWhitespace(previous)) {
    return null;
  }

  for (const keyword of KEYWORDS) {
    const end = index + keyword.length;
    if (source.slice(index, end).toLowerCase() !== keyword) {
      continue;
    }
    const next = end >= source.length ? '' : source[end];
    if (next === '' || next === '(' || isWhitespace(next)) {
      return keyword;
    }
  }
  return null;
}

function readQuoted(source: string, start: number): { text: string; end: number } {
  const quote = source[start];
  let text = '';
  let index = start + 1;

  while (index < source.length) {
    const char = source[index];
    if (char === quote) {
      if (source[index + 1] === quote) {
        text += quote;
        index += 2;
        continue;
      }
      return { text, end: index + 1 };
    }
    text += char;
    index += 1;
  }

  throw new ExpressionSyntaxError(`unterminated string literal at position ${start}`, {
    expression: source,
    position: start,
  });
}

function readBare(source: string, start: number): number {
  let index = start;
  while (index < source.length) {
    const char = source[index];
    if (isWhitespace(char) || char === '(' || char === ')' || matchOperator(source, index)) {
      break;
    }
    index += 1;
  }
  return index;
}

/**
 * Split an expression into tokens.
 *
 * @throws ExpressionSyntaxError for an empty expression or an unterminated quote
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (isWhitespace(char)) {
      index += 1;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'lparen' : 'rparen', position: index });
      index += 1;
      continue;
    }

    const operator = matchOperator(source, index);
    if (operator) {
      tokens.push({ kind: 'operator', operator, position: index });
      index += operator.length;
      continue;
    }

    const keyword = matchKeyword(source, index);
    if (keyword) {
      tokens.push({ kind: keyword, position: index });
      index += keyword.length;
      continue;
    }

    if (char === '"' || char === "'") {
      const { text, end } = readQuoted(source, index);
      tokens.push({ kind: 'literal', text, quoted: true, position: index });
      index = end;
      continue;
    }

    const end = readBare(source, index);
    tokens.push({ kind: 'literal', text: source.slice(index, end), quoted: false, position: index });
    index = end;
  }

  if (tokens.length === 0) {
    throw new ExpressionSyntaxError('empty expression', { expression: source });
  }

  return tokens;
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'literal':
      return token.quoted ? `string "${token.text}"` : `'${token.text}'`;
    case 'operator':
      return `operator '${token.operator}'`;
    case 'and':
      return 'AND';
    case 'or':
      return 'OR';
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
  }
}
