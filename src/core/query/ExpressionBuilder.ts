import { ComparisonMode, Expression, ExpressionType } from '../expressions/Expression';
import { BinaryExpression } from '../expressions/BinaryExpression';
import { UnaryExpression } from '../expressions/UnaryExpression';
import { FieldExpression } from '../expressions/FieldExpression';
import { ConstantExpression } from '../expressions/ConstantExpression';
import { ContainsExpression } from '../expressions/ContainsExpression';
import { OrderingExpression, QueryExpression } from '../expressions/QueryExpression';
import { PropertyKind } from '../model/ModelSchema';
import { OrderDirection } from './Types';

/**
 * Builds expression trees for predicates and orderings
 */
export class ExpressionBuilder {
  /**
   * Creates a field expression
   */
  createField(path: readonly string[], kind: PropertyKind = PropertyKind.Unknown): FieldExpression {
    return new FieldExpression(path, kind);
  }

  /**
   * Creates a constant expression
   */
  createConstant(value: unknown): ConstantExpression {
    return new ConstantExpression(value);
  }

  /**
   * Creates the constant false, used for leaves that can never match
   */
  createFalse(): ConstantExpression {
    return new ConstantExpression(false);
  }

  /**
   * Creates a binary expression
   */
  createBinary(
    type: ExpressionType,
    left: Expression,
    right: Expression,
    mode: ComparisonMode = ComparisonMode.Exact,
  ): BinaryExpression {
    return new BinaryExpression(type, left, right, mode);
  }

  /**
   * Creates a unary expression
   */
  createUnary(type: ExpressionType, operand: Expression): UnaryExpression {
    return new UnaryExpression(type, operand);
  }

  createEqual(left: Expression, right: Expression, mode?: ComparisonMode): BinaryExpression {
    return this.createBinary(ExpressionType.Equal, left, right, mode);
  }

  createAnd(left: Expression, right: Expression): BinaryExpression {
    return this.createBinary(ExpressionType.And, left, right);
  }

  createOr(left: Expression, right: Expression): BinaryExpression {
    return this.createBinary(ExpressionType.Or, left, right);
  }

  createNot(operand: Expression): UnaryExpression {
    return this.createUnary(ExpressionType.Not, operand);
  }

  createIsNull(operand: Expression): UnaryExpression {
    return this.createUnary(ExpressionType.IsNull, operand);
  }

  createIsNotNull(operand: Expression): UnaryExpression {
    return this.createNot(this.createIsNull(operand));
  }

  /**
   * Creates a substring test
   */
  createContains(operand: Expression, value: string, ignoreCase: boolean): ContainsExpression {
    return new ContainsExpression(operand, value, ignoreCase);
  }

  /**
   * Creates an ORDER BY key
   */
  createOrdering(field: FieldExpression, direction: OrderDirection): OrderingExpression {
    return new OrderingExpression(field, direction);
  }

  /**
   * Creates the query expression handed to a provider
   */
  createQuery(
    source: string,
    whereClause: Expression | null = null,
    orderings: readonly OrderingExpression[] = [],
    offset: number = 0,
    limit: number | null = null,
  ): QueryExpression {
    return new QueryExpression(source, whereClause, orderings, offset, limit);
  }

  /**
   * Joins expressions with AND, left to right. Returns null for an empty list.
   */
  combineAnd(expressions: readonly Expression[]): Expression | null {
    return this.combine(expressions, ExpressionType.And);
  }

  /**
   * Joins expressions with OR, left to right. Returns null for an empty list.
   */
  combineOr(expressions: readonly Expression[]): Expression | null {
    return this.combine(expressions, ExpressionType.Or);
  }

  private combine(expressions: readonly Expression[], type: ExpressionType): Expression | null {
    if (expressions.length === 0) return null;

    return expressions
      .slice(1)
      .reduce<Expression>((acc, expr) => this.createBinary(type, acc, expr), expressions[0]);
  }
}
