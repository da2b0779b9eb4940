import {
  ComparisonMode,
  Expression,
  ExpressionType,
  IBinaryExpression,
  IExpressionVisitor,
} from './Expression';

/**
 * Represents a binary operation between two expressions
 * Examples: price > 10, name = 'Laptop', a AND b
 */
export class BinaryExpression extends Expression implements IBinaryExpression {
  constructor(
    private readonly type: ExpressionType,
    private readonly left: Expression,
    private readonly right: Expression,
    private readonly mode: ComparisonMode = ComparisonMode.Exact,
  ) {
    super();
    this.validateOperatorType(type);
  }

  /**
   * Validates that the operator type is a binary operator
   */
  private validateOperatorType(type: ExpressionType): void {
    const validOperators = [
      ExpressionType.Equal,
      ExpressionType.NotEqual,
      ExpressionType.GreaterThan,
      ExpressionType.GreaterThanOrEqual,
      ExpressionType.LessThan,
      ExpressionType.LessThanOrEqual,
      ExpressionType.And,
      ExpressionType.Or,
    ];

    if (!validOperators.includes(type)) {
      throw new Error(`Invalid binary operator type: ${ExpressionType[type]}`);
    }
  }

  /**
   * Gets the operator type
   */
  getOperatorType(): ExpressionType {
    return this.type;
  }

  /**
   * Gets the left operand
   */
  getLeft(): Expression {
    return this.left;
  }

  /**
   * Gets the right operand
   */
  getRight(): Expression {
    return this.right;
  }

  /**
   * Gets how the operands are compared
   */
  getComparisonMode(): ComparisonMode {
    return this.mode;
  }

  /**
   * Accepts a visitor
   */
  accept<T>(visitor: IExpressionVisitor<T>): T {
    return visitor.visitBinaryExpression(this);
  }
}
