import {
  ComparisonMode,
  Expression,
  ExpressionType,
  IBinaryExpression,
  IConstantExpression,
  IContainsExpression,
  IExpressionVisitor,
  IFieldExpression,
  ILikeExpression,
  IUnaryExpression,
} from '../expressions/Expression';
import { OrderingExpression } from '../expressions/QueryExpression';

/**
 * Compiled form of an expression: reads a value off one element
 */
export type Evaluator = (entity: unknown) => unknown;

/**
 * Compiles expression trees into functions evaluated directly over in-memory elements
 */
export class EvaluationVisitor implements IExpressionVisitor<Evaluator> {
  /**
   * Compiles a predicate. Anything but a literal true counts as a non-match.
   */
  static compilePredicate<T>(expr: Expression): (entity: T) => boolean {
    const evaluate = expr.accept(new EvaluationVisitor());
    return entity => evaluate(entity) === true;
  }

  /**
   * Compiles ordering keys into a comparer, primary key first.
   * Missing values sort before present ones.
   */
  static compileComparer<T>(orderings: readonly OrderingExpression[]): (a: T, b: T) => number {
    const visitor = new EvaluationVisitor();
    const keys = orderings.map(ordering => ({
      read: ordering.getField().accept(visitor),
      sign: ordering.isAscending() ? 1 : -1,
    }));

    return (a, b) => {
      for (const key of keys) {
        const result = compareValues(key.read(a), key.read(b));
        if (result !== 0) return result * key.sign;
      }
      return 0;
    };
  }

  visitBinaryExpression(expr: IBinaryExpression): Evaluator {
    const left = expr.getLeft().accept(this);
    const right = expr.getRight().accept(this);
    const mode = expr.getComparisonMode();

    switch (expr.getOperatorType()) {
      case ExpressionType.And:
        return entity => left(entity) === true && right(entity) === true;
      case ExpressionType.Or:
        return entity => left(entity) === true || right(entity) === true;
      case ExpressionType.Equal:
        return entity => areEqual(left(entity), right(entity), mode);
      case ExpressionType.NotEqual:
        return entity => !areEqual(left(entity), right(entity), mode);
      case ExpressionType.GreaterThan:
        return entity => compareNumbers(left(entity), right(entity), diff => diff > 0);
      case ExpressionType.GreaterThanOrEqual:
        return entity => compareNumbers(left(entity), right(entity), diff => diff >= 0);
      case ExpressionType.LessThan:
        return entity => compareNumbers(left(entity), right(entity), diff => diff < 0);
      case ExpressionType.LessThanOrEqual:
        return entity => compareNumbers(left(entity), right(entity), diff => diff <= 0);
      default:
        throw new Error(`Unsupported binary operator: ${ExpressionType[expr.getOperatorType()]}`);
    }
  }

  visitUnaryExpression(expr: IUnaryExpression): Evaluator {
    const operand = expr.getOperand().accept(this);

    switch (expr.getOperatorType()) {
      case ExpressionType.Not:
        return entity => operand(entity) !== true;
      case ExpressionType.IsNull:
        return entity => isMissing(operand(entity));
      default:
        throw new Error(`Unsupported unary operator: ${ExpressionType[expr.getOperatorType()]}`);
    }
  }

  visitFieldExpression(expr: IFieldExpression): Evaluator {
    const path = expr.getPath();

    return entity => {
      let current: unknown = entity;
      for (const segment of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, segment);
      }
      return current;
    };
  }

  visitConstantExpression(expr: IConstantExpression): Evaluator {
    const value = expr.getValue();
    return () => value;
  }

  visitContainsExpression(expr: IContainsExpression): Evaluator {
    const operand = expr.getOperand().accept(this);
    const ignoreCase = expr.isIgnoreCase();
    const needle = ignoreCase ? expr.getValue().toLowerCase() : expr.getValue();

    return entity => {
      const value = operand(entity);
      if (typeof value !== 'string') return false;
      return (ignoreCase ? value.toLowerCase() : value).includes(needle);
    };
  }

  visitLikeExpression(expr: ILikeExpression): Evaluator {
    const operand = expr.getOperand().accept(this);
    const regex = likePatternToRegExp(expr.getPattern());

    return entity => {
      const value = operand(entity);
      return typeof value === 'string' && regex.test(value);
    };
  }
}

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function toComparable(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

function areEqual(left: unknown, right: unknown, mode: ComparisonMode): boolean {
  if (isMissing(left) || isMissing(right)) {
    return isMissing(left) && isMissing(right);
  }

  switch (mode) {
    case ComparisonMode.Text:
      return typeof left === 'string' && typeof right === 'string' && left === right;
    case ComparisonMode.TextIgnoreCase:
      return (
        typeof left === 'string' &&
        typeof right === 'string' &&
        left.toLowerCase() === right.toLowerCase()
      );
    case ComparisonMode.Numeric: {
      const a = toNumber(left);
      const b = toNumber(right);
      return !Number.isNaN(a) && !Number.isNaN(b) && a === b;
    }
    default:
      return toComparable(left) === toComparable(right);
  }
}

function compareNumbers(left: unknown, right: unknown, test: (diff: number) => boolean): boolean {
  const a = toNumber(left);
  const b = toNumber(right);
  if (Number.isNaN(a) || Number.isNaN(b)) return false;
  return test(a - b);
}

/**
 * Three-way comparison used for ordering; null and undefined sort first,
 * NaN before every other number
 */
export function compareValues(left: unknown, right: unknown): number {
  if (isMissing(left) || isMissing(right)) {
    if (isMissing(left) && isMissing(right)) return 0;
    return isMissing(left) ? -1 : 1;
  }

  const a = toComparable(left);
  const b = toComparable(right);

  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number(Number.isNaN(b)) - Number(Number.isNaN(a));
    }
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);

  const textA = String(a);
  const textB = String(b);
  if (textA < textB) return -1;
  if (textA > textB) return 1;
  return 0;
}

/**
 * Translates a LIKE pattern into a case-insensitive regular expression
 */
export function likePatternToRegExp(pattern: string): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === '%') {
      source += '[\\s\\S]*';
    } else if (char === '_') {
      source += '[\\s\\S]';
    } else if (char === '[') {
      const end = pattern.indexOf(']', i + 2);
      if (end === -1) {
        source += '\\[';
        continue;
      }
      const set = pattern.slice(i + 1, end);
      source += set.length === 1 ? escapeRegExp(set) : `[${set.replace(/[\\\]]/g, '\\$&')}]`;
      i = end;
    } else {
      source += escapeRegExp(char);
    }
  }

  return new RegExp(`^${source}$`, 'i');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
