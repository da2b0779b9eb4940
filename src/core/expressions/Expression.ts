import { PropertyKind } from '../model/ModelSchema';

/**
 * Base class for all expressions in a predicate tree.
 */
export abstract class Expression {
  /**
   * Accepts a visitor that will process this expression
   */
  abstract accept<T>(visitor: IExpressionVisitor<T>): T;
}

/**
 * Base visitor interface for expression tree traversal
 */
export interface IExpressionVisitor<T> {
  visitBinaryExpression(expr: IBinaryExpression): T;
  visitUnaryExpression(expr: IUnaryExpression): T;
  visitFieldExpression(expr: IFieldExpression): T;
  visitConstantExpression(expr: IConstantExpression): T;
  visitContainsExpression(expr: IContainsExpression): T;
  visitLikeExpression(expr: ILikeExpression): T;
}

/**
 * Enumeration for all expression types
 */
export enum ExpressionType {
  // Binary operators
  Equal,
  NotEqual,
  GreaterThan,
  GreaterThanOrEqual,
  LessThan,
  LessThanOrEqual,
  And,
  Or,

  // Unary operators
  Not,
  IsNull,

  // Special expressions
  Field,
  Constant,
  Contains,
  Like,
}

/**
 * How the operands of a comparison are compared
 */
export enum ComparisonMode {
  /** Strict equality; dates compare by timestamp */
  Exact = 'Exact',
  /** Case-sensitive text comparison */
  Text = 'Text',
  /** Case-insensitive text comparison */
  TextIgnoreCase = 'TextIgnoreCase',
  /** Both operands converted to numbers; dates by timestamp */
  Numeric = 'Numeric',
}

export interface IBinaryExpression extends Expression {
  getOperatorType(): ExpressionType;
  getLeft(): Expression;
  getRight(): Expression;
  getComparisonMode(): ComparisonMode;
}

export interface IUnaryExpression extends Expression {
  getOperatorType(): ExpressionType;
  getOperand(): Expression;
}

export interface IFieldExpression extends Expression {
  getPath(): readonly string[];
  getFieldName(): string;
  getKind(): PropertyKind;
}

export interface IConstantExpression extends Expression {
  getValue(): unknown;
  getValueType(): string;
}

export interface IContainsExpression extends Expression {
  getOperand(): Expression;
  getValue(): string;
  isIgnoreCase(): boolean;
}

export interface ILikeExpression extends Expression {
  getOperand(): Expression;
  getPattern(): string;
}
