// src/core/query/LambdaParser.ts
import * as ts from 'typescript';
import { ComparisonMode, Expression, ExpressionType } from '../expressions/Expression';
import { ConstantExpression } from '../expressions/ConstantExpression';
import { FieldExpression } from '../expressions/FieldExpression';
import { ArgumentError } from '../errors';
import { ExpressionBuilder } from './ExpressionBuilder';
import { FieldReference, MemberSelector, PredicateFunction } from './Types';

type ParsableFunction = (entity: never) => unknown;

const MIRRORED_OPERATORS: Partial<Record<ExpressionType, ExpressionType>> = {
  [ExpressionType.GreaterThan]: ExpressionType.LessThan,
  [ExpressionType.GreaterThanOrEqual]: ExpressionType.LessThanOrEqual,
  [ExpressionType.LessThan]: ExpressionType.GreaterThan,
  [ExpressionType.LessThanOrEqual]: ExpressionType.GreaterThanOrEqual,
};

/**
 * Reads arrow functions into field paths and expression trees.
 *
 * Only the source text of the function is available, so values captured from the
 * surrounding scope must be passed as variables:
 *
 * @example
 * new LambdaParser(builder, { minPrice: 10 }).parsePredicate<Product>(p => p.price > minPrice);
 */
export class LambdaParser {
  private parameterName: string = '';

  /**
   * Creates a new lambda parser
   * @param builder The expression builder to use
   * @param variables Values the lambda may reference by name
   */
  constructor(
    private readonly builder: ExpressionBuilder = new ExpressionBuilder(),
    private readonly variables: Readonly<Record<string, unknown>> = {},
  ) {}

  /**
   * Reads a member selector such as `c => c.address.city` into the dotted path `address.city`
   */
  parseMemberPath<T>(selector: MemberSelector<T>): string {
    const body = this.parseLambda(selector);
    const node = this.unwrap(body);

    if (ts.isPropertyAccessExpression(node)) {
      const path = this.extractPropertyPath(node);
      if (path.length > 1 && path[0] === this.parameterName) {
        return path.slice(1).join('.');
      }
    }

    throw new ArgumentError(`Expected a member access selector, got: ${body.getText()}`);
  }

  /**
   * Reads a predicate such as `p => p.price > 10 && p.name.includes('lap')` into an expression tree
   */
  parsePredicate<T>(predicate: PredicateFunction<T>): Expression {
    return this.processNode(this.parseLambda(predicate));
  }

  /**
   * Parses the function source and returns the expression it returns
   */
  private parseLambda(fn: ParsableFunction): ts.Expression {
    const fnString = fn.toString();
    const sourceFile = ts.createSourceFile(
      'expression.ts',
      `(${fnString})`,
      ts.ScriptTarget.Latest,
      true,
    );

    const statement = sourceFile.statements[0];
    if (!statement || !ts.isExpressionStatement(statement)) {
      throw new ArgumentError(`Could not parse function: ${fnString}`);
    }

    const fnNode = this.unwrap(statement.expression);
    if (!ts.isArrowFunction(fnNode) && !ts.isFunctionExpression(fnNode)) {
      throw new ArgumentError(`Expected an arrow function or function expression: ${fnString}`);
    }

    const parameter = fnNode.parameters[0];
    if (!parameter || !ts.isIdentifier(parameter.name)) {
      throw new ArgumentError(`Expected a single named parameter: ${fnString}`);
    }
    this.parameterName = parameter.name.text;

    const body = fnNode.body;
    if (!ts.isBlock(body)) {
      return body;
    }

    // Function body: use the first return statement
    const returnStatement = body.statements.find(ts.isReturnStatement);
    if (!returnStatement || !returnStatement.expression) {
      throw new ArgumentError(`Function body has no return value: ${fnString}`);
    }
    return returnStatement.expression;
  }

  private unwrap(node: ts.Expression): ts.Expression {
    let current = node;
    while (ts.isParenthesizedExpression(current)) {
      current = current.expression;
    }
    return current;
  }

  /**
   * Converts a boolean-valued node into an expression
   */
  private processNode(node: ts.Expression): Expression {
    const current = this.unwrap(node);

    if (ts.isBinaryExpression(current)) {
      return this.processBinaryExpression(current);
    }

    if (
      ts.isPrefixUnaryExpression(current) &&
      current.operator === ts.SyntaxKind.ExclamationToken
    ) {
      return this.builder.createNot(this.processNode(current.operand));
    }

    if (ts.isCallExpression(current)) {
      return this.processCallExpression(current);
    }

    // A bare boolean member: p => p.isActive
    const operand = this.processOperand(current);
    if (operand instanceof FieldExpression) {
      return this.builder.createEqual(operand, this.builder.createConstant(true));
    }

    throw new ArgumentError(`Unsupported expression in predicate: ${current.getText()}`);
  }

  private processBinaryExpression(node: ts.BinaryExpression): Expression {
    const operator = node.operatorToken.kind;

    if (operator === ts.SyntaxKind.AmpersandAmpersandToken) {
      return this.builder.createAnd(this.processNode(node.left), this.processNode(node.right));
    }

    if (operator === ts.SyntaxKind.BarBarToken) {
      return this.builder.createOr(this.processNode(node.left), this.processNode(node.right));
    }

    const type = this.getComparisonType(operator);
    if (type === null) {
      throw new ArgumentError(`Unsupported operator in predicate: ${node.operatorToken.getText()}`);
    }

    let left = this.processOperand(node.left);
    let right = this.processOperand(node.right);
    let comparison = type;

    // Keep the field on the left: 10 < p.price -> p.price > 10
    if (left instanceof ConstantExpression && right instanceof FieldExpression) {
      [left, right] = [right, left];
      comparison = MIRRORED_OPERATORS[type] ?? type;
    }

    if (right instanceof ConstantExpression && right.getValue() === null) {
      if (comparison === ExpressionType.Equal) return this.builder.createIsNull(left);
      if (comparison === ExpressionType.NotEqual) return this.builder.createIsNotNull(left);
    }

    return this.builder.createBinary(comparison, left, right, this.getComparisonMode(comparison, right));
  }

  private getComparisonType(operator: ts.SyntaxKind): ExpressionType | null {
    switch (operator) {
      case ts.SyntaxKind.EqualsEqualsEqualsToken:
      case ts.SyntaxKind.EqualsEqualsToken:
        return ExpressionType.Equal;
      case ts.SyntaxKind.ExclamationEqualsEqualsToken:
      case ts.SyntaxKind.ExclamationEqualsToken:
        return ExpressionType.NotEqual;
      case ts.SyntaxKind.GreaterThanToken:
        return ExpressionType.GreaterThan;
      case ts.SyntaxKind.GreaterThanEqualsToken:
        return ExpressionType.GreaterThanOrEqual;
      case ts.SyntaxKind.LessThanToken:
        return ExpressionType.LessThan;
      case ts.SyntaxKind.LessThanEqualsToken:
        return ExpressionType.LessThanOrEqual;
      default:
        return null;
    }
  }

  private getComparisonMode(type: ExpressionType, right: Expression): ComparisonMode {
    if (type !== ExpressionType.Equal && type !== ExpressionType.NotEqual) {
      return ComparisonMode.Numeric;
    }
    if (right instanceof ConstantExpression) {
      const value = right.getValue();
      if (typeof value === 'string') return ComparisonMode.Text;
      if (typeof value === 'number') return ComparisonMode.Numeric;
    }
    return ComparisonMode.Exact;
  }

  /**
   * Handles `p.name.includes('lap')`
   */
  private processCallExpression(node: ts.CallExpression): Expression {
    const callee = node.expression;

    if (
      ts.isPropertyAccessExpression(callee) &&
      callee.name.text === 'includes' &&
      node.arguments.length === 1
    ) {
      const target = this.processOperand(callee.expression);
      const argument = this.processOperand(node.arguments[0]);

      if (target instanceof FieldExpression && argument instanceof ConstantExpression) {
        const value = argument.getValue();
        if (typeof value === 'string') {
          return this.builder.createContains(target, value, false);
        }
      }
    }

    throw new ArgumentError(`Unsupported call in predicate: ${node.getText()}`);
  }

  /**
   * Converts a value-producing node into a field or constant expression
   */
  private processOperand(node: ts.Expression): Expression {
    const current = this.unwrap(node);

    if (ts.isPropertyAccessExpression(current)) {
      return this.processPropertyAccess(current);
    }

    if (ts.isIdentifier(current)) {
      return this.processIdentifier(current);
    }

    if (ts.isStringLiteral(current) || ts.isNoSubstitutionTemplateLiteral(current)) {
      return this.builder.createConstant(current.text);
    }

    if (ts.isNumericLiteral(current)) {
      return this.builder.createConstant(Number(current.text));
    }

    if (
      ts.isPrefixUnaryExpression(current) &&
      current.operator === ts.SyntaxKind.MinusToken &&
      ts.isNumericLiteral(current.operand)
    ) {
      return this.builder.createConstant(-Number(current.operand.text));
    }

    switch (current.kind) {
      case ts.SyntaxKind.TrueKeyword:
        return this.builder.createConstant(true);
      case ts.SyntaxKind.FalseKeyword:
        return this.builder.createConstant(false);
      case ts.SyntaxKind.NullKeyword:
        return this.builder.createConstant(null);
      default:
        throw new ArgumentError(`Unsupported operand in predicate: ${current.getText()}`);
    }
  }

  /**
   * Processes a property access, either on the lambda parameter or on a variable
   */
  private processPropertyAccess(node: ts.PropertyAccessExpression): Expression {
    const propPath = this.extractPropertyPath(node);
    const [root, ...rest] = propPath;

    if (root === this.parameterName && rest.length > 0) {
      return this.builder.createField(rest);
    }

    if (root !== undefined && Object.hasOwn(this.variables, root)) {
      let value: unknown = this.variables[root];
      for (const segment of rest) {
        value = typeof value === 'object' && value !== null ? Reflect.get(value, segment) : undefined;
      }
      return this.builder.createConstant(value ?? null);
    }

    throw new ArgumentError(`Unknown reference in predicate: ${node.getText()}`);
  }

  private processIdentifier(node: ts.Identifier): Expression {
    const name = node.text;

    if (name === 'undefined') {
      return this.builder.createConstant(null);
    }

    if (Object.hasOwn(this.variables, name)) {
      return this.builder.createConstant(this.variables[name] ?? null);
    }

    throw new ArgumentError(`Unknown identifier '${name}' in predicate; pass it as a variable`);
  }

  /**
   * Extracts the full property path from a property access expression
   * @returns Every part of the path, e.g. ['c', 'address', 'city']
   */
  private extractPropertyPath(node: ts.PropertyAccessExpression): string[] {
    const path: string[] = [node.name.text];
    let current: ts.Expression = node.expression;

    while (current) {
      if (ts.isPropertyAccessExpression(current)) {
        path.unshift(current.name.text);
        current = current.expression;
      } else if (ts.isIdentifier(current)) {
        path.unshift(current.text);
        break;
      } else {
        // Not a simple property path
        break;
      }
    }

    return path;
  }
}

/**
 * Gets the dotted field name of a reference given by name or by selector
 */
export function getFieldName<T>(field: FieldReference<T>): string {
  return typeof field === 'string' ? field : new LambdaParser().parseMemberPath(field);
}
