import { Expression, IExpressionVisitor, ILikeExpression } from './Expression';

/**
 * Backend-native pattern match of a text operand
 * Example: name LIKE '%lap%'
 *
 * Patterns use `%` for any run of characters, `_` for one character and
 * `[...]` for a character set, so `[%]`, `[_]` and `[[]` match the literal characters.
 */
export class LikeExpression extends Expression implements ILikeExpression {
  constructor(
    private readonly operand: Expression,
    private readonly pattern: string,
  ) {
    super();
  }

  /**
   * Gets the tested operand
   */
  getOperand(): Expression {
    return this.operand;
  }

  /**
   * Gets the pattern
   */
  getPattern(): string {
    return this.pattern;
  }

  /**
   * Accepts a visitor
   */
  accept<T>(visitor: IExpressionVisitor<T>): T {
    return visitor.visitLikeExpression(this);
  }
}

/**
 * Escapes the pattern metacharacters of a literal value
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[[%_]/g, char => `[${char}]`);
}

/**
 * Pattern match builder producing LIKE expressions, for providers that translate them natively
 */
export function likePatternMatch(field: Expression, pattern: string): LikeExpression {
  return new LikeExpression(field, pattern);
}
