import { Expression, IContainsExpression, IExpressionVisitor } from './Expression';

/**
 * Substring test of a text operand
 * Example: name contains 'lap'
 */
export class ContainsExpression extends Expression implements IContainsExpression {
  constructor(
    private readonly operand: Expression,
    private readonly value: string,
    private readonly ignoreCase: boolean,
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
   * Gets the searched substring
   */
  getValue(): string {
    return this.value;
  }

  isIgnoreCase(): boolean {
    return this.ignoreCase;
  }

  /**
   * Accepts a visitor
   */
  accept<T>(visitor: IExpressionVisitor<T>): T {
    return visitor.visitContainsExpression(this);
  }
}
