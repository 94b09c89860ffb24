/**
 * Recursive-descent parser that evaluates condition expressions directly to
 * a boolean.
 *
 * Grammar, lowest precedence first:
 *
 *   Or         → And (OR And)*
 *   And        → Comparison (AND Comparison)*
 *   Comparison → '(' Or ')' | Literal [Operator Literal]
 *
 * Both operands of AND/OR are always evaluated, so an error on either side
 * surfaces regardless of the other side's value.
 *
 * @module expression/evaluator
 */

import { ExpressionEvaluationError, ExpressionSyntaxError } from '../errors/expression-error';
import { isNumericText, toNumber, valuesEqual } from '../types/value';
import { hasOwn } from '../utils/object';
import { ComparisonOperator, Token, describeToken, tokenize } from './tokenizer';

/**
 * Field values an expression can refer to by name.
 */
export type ExpressionContext = Readonly<Record<string, unknown>>;

type Lookup = { present: true; value: unknown } | { present: false };

type LiteralToken = Extract<Token, { kind: 'literal' }>;

const NULL_WORDS = ['null', 'nil'];

/**
 * Interpret the right-hand side of a comparison.
 */
export function parseOperand(token: LiteralToken): unknown {
  if (token.quoted) {
    return token.text;
  }
  if (NULL_WORDS.includes(token.text)) {
    return null;
  }
  if (token.text === 'true' || token.text === 'false') {
    return token.text === 'true';
  }
  if (isNumericText(token.text)) {
    return Number(token.text);
  }
  return token.text;
}

class ExpressionParser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
    private readonly context: ExpressionContext
  ) {}

  evaluate(): boolean {
    const result = this.parseOr();
    const trailing = this.peek();
    if (trailing) {
      throw this.syntaxError(
        `unexpected ${describeToken(trailing)} at position ${trailing.position}`,
        trailing.position
      );
    }
    return result;
  }

  private parseOr(): boolean {
    let result = this.parseAnd();
    while (this.peek()?.kind === 'or') {
      this.index += 1;
      const right = this.parseAnd();
      result = result || right;
    }
    return result;
  }

  private parseAnd(): boolean {
    let result = this.parseComparison();
    while (this.peek()?.kind === 'and') {
      this.index += 1;
      const right = this.parseComparison();
      result = result && right;
    }
    return result;
  }

  private parseComparison(): boolean {
    const token = this.next();
    if (!token) {
      throw this.syntaxError('unexpected end of expression');
    }

    if (token.kind === 'lparen') {
      const value = this.parseOr();
      const closing = this.next();
      if (!closing || closing.kind !== 'rparen') {
        throw this.syntaxError(
          `missing closing parenthesis for '(' at position ${token.position}`,
          token.position
        );
      }
      return value;
    }

    if (token.kind !== 'literal') {
      throw this.syntaxError(
        `unexpected ${describeToken(token)} at position ${token.position}`,
        token.position
      );
    }

    const operator = this.peek();
    if (!operator || operator.kind !== 'operator') {
      return this.evaluateBare(token);
    }
    this.index += 1;

    const right = this.next();
    if (!right || right.kind !== 'literal') {
      throw this.syntaxError(
        `operator '${operator.operator}' at position ${operator.position} is missing its right operand`,
        operator.position
      );
    }

    return this.evaluateComparison(token, operator.operator, right);
  }

  /**
   * A literal on its own: `true`/`false`, or a field that must be true
   * (booleans) or non-null (anything else). Absent fields are false.
   */
  private evaluateBare(token: LiteralToken): boolean {
    if (!token.quoted && (token.text === 'true' || token.text === 'false')) {
      return token.text === 'true';
    }

    const field = this.lookup(token.text);
    if (!field.present) {
      return false;
    }
    if (typeof field.value === 'boolean') {
      return field.value;
    }
    return field.value !== null;
  }

  private evaluateComparison(
    left: LiteralToken,
    operator: ComparisonOperator,
    right: LiteralToken
  ): boolean {
    const field = this.lookup(left.text);
    if (!field.present) {
      return operator === '==' && NULL_WORDS.includes(right.text);
    }

    const operand = parseOperand(right);
    switch (operator) {
      case '==':
        return valuesEqual(field.value, operand, { coerceNumericStrings: true });
      case '!=':
        return !valuesEqual(field.value, operand, { coerceNumericStrings: true });
      case '>':
      case '<':
      case '>=':
      case '<=':
        return this.compareNumbers(left, field.value, operator, operand);
    }
  }

  private compareNumbers(
    left: LiteralToken,
    value: unknown,
    operator: '>' | '<' | '>=' | '<=',
    operand: unknown
  ): boolean {
    const x = toNumber(value);
    const y = toNumber(operand);
    if (x === null || y === null) {
      throw new ExpressionEvaluationError('cannot compare non-numeric values', {
        expression: this.source,
        position: left.position,
      });
    }

    switch (operator) {
      case '>':
        return x > y;
      case '<':
        return x < y;
      case '>=':
        return x >= y;
      case '<=':
        return x <= y;
    }
  }

  private lookup(name: string): Lookup {
    if (!hasOwn(this.context, name) || this.context[name] === undefined) {
      return { present: false };
    }
    return { present: true, value: this.context[name] };
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) {
      this.index += 1;
    }
    return token;
  }

  private syntaxError(message: string, position?: number): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, { expression: this.source, position });
  }
}

/**
 * Evaluate an expression against a set of field values.
 *
 * @throws ExpressionSyntaxError for malformed expressions
 * @throws ExpressionEvaluationError when an ordering operator meets a non-numeric operand
 */
export function evalExpression(expression: string, context: ExpressionContext): boolean {
  const tokens = tokenize(expression);
  return new ExpressionParser(expression, tokens, context).evaluate();
}
