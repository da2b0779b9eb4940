import { BinaryExpression } from '../core/expressions/BinaryExpression';
import { UnaryExpression } from '../core/expressions/UnaryExpression';
import { FieldExpression } from '../core/expressions/FieldExpression';
import { ConstantExpression } from '../core/expressions/ConstantExpression';
import { ContainsExpression } from '../core/expressions/ContainsExpression';
import { LikeExpression } from '../core/expressions/LikeExpression';
import { OrderingExpression, QueryExpression } from '../core/expressions/QueryExpression';
import { Expression, ExpressionType } from '../core/expressions/Expression';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON representation of an expression
 */
export type ExpressionJson = { type: string; [key: string]: JsonValue };

/**
 * Lowers expression trees into plain JSON that a data provider can translate
 * into its native query calls
 */
export class ExpressionSerializer {
  /**
   * Serializes an expression to JSON
   * @param expr The expression to serialize
   * @returns The JSON representation, or null when there is no expression
   */
  static serialize(
    expr: Expression | QueryExpression | OrderingExpression | null | undefined,
  ): ExpressionJson | null {
    if (!expr) return null;

    if (expr instanceof QueryExpression) {
      return this.serializeQuery(expr);
    }

    if (expr instanceof OrderingExpression) {
      return this.serializeOrderingExpression(expr);
    }

    if (expr instanceof BinaryExpression) {
      return this.serializeBinaryExpression(expr);
    }

    if (expr instanceof UnaryExpression) {
      return this.serializeUnaryExpression(expr);
    }

    if (expr instanceof FieldExpression) {
      return this.serializeFieldExpression(expr);
    }

    if (expr instanceof ConstantExpression) {
      return this.serializeConstantExpression(expr);
    }

    if (expr instanceof ContainsExpression) {
      return {
        type: 'Contains',
        operand: this.serializeRequired(expr.getOperand()),
        value: expr.getValue(),
        ignoreCase: expr.isIgnoreCase(),
      };
    }

    if (expr instanceof LikeExpression) {
      return {
        type: 'Like',
        operand: this.serializeRequired(expr.getOperand()),
        pattern: expr.getPattern(),
      };
    }

    throw new Error(`Unsupported expression: ${expr.constructor.name}`);
  }

  private static serializeRequired(expr: Expression): ExpressionJson {
    const json = this.serialize(expr);
    if (!json) {
      throw new Error('Expected an expression');
    }
    return json;
  }

  /**
   * Serializes everything accumulated on a queryable
   */
  static serializeQuery(expr: QueryExpression): ExpressionJson {
    return {
      type: 'Query',
      source: expr.getSource(),
      where: this.serialize(expr.getWhereClause()),
      orderBy: expr.getOrderings().map(ordering => this.serializeOrderingExpression(ordering)),
      skip: expr.getOffset(),
      take: expr.getLimit(),
    };
  }

  private static serializeOrderingExpression(expr: OrderingExpression): ExpressionJson {
    return {
      type: 'Ordering',
      field: this.serializeFieldExpression(expr.getField()),
      direction: expr.getDirection(),
    };
  }

  private static serializeBinaryExpression(expr: BinaryExpression): ExpressionJson {
    return {
      type: 'Binary',
      operator: ExpressionType[expr.getOperatorType()],
      comparison: expr.getComparisonMode(),
      left: this.serializeRequired(expr.getLeft()),
      right: this.serializeRequired(expr.getRight()),
    };
  }

  private static serializeUnaryExpression(expr: UnaryExpression): ExpressionJson {
    return {
      type: 'Unary',
      operator: ExpressionType[expr.getOperatorType()],
      operand: this.serializeRequired(expr.getOperand()),
    };
  }

  private static serializeFieldExpression(expr: FieldExpression): ExpressionJson {
    return {
      type: 'Field',
      path: [...expr.getPath()],
      kind: expr.getKind(),
    };
  }

  private static serializeConstantExpression(expr: ConstantExpression): ExpressionJson {
    return {
      type: 'Constant',
      value: this.toJsonValue(expr.getValue()),
      valueType: expr.getValueType(),
    };
  }

  private static toJsonValue(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (value instanceof Date) return value.toISOString();
    return String(value);
  }
}
