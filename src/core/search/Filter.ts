import { Expression, ExpressionType } from '../expressions/Expression';
import { BinaryExpression } from '../expressions/BinaryExpression';
import { ConstantExpression } from '../expressions/ConstantExpression';
import { ContainsExpression } from '../expressions/ContainsExpression';
import { FieldExpression } from '../expressions/FieldExpression';
import { UnaryExpression } from '../expressions/UnaryExpression';
import { ArgumentError } from '../errors';
import { IFieldMapper } from '../mapping/IFieldMapper';
import { ModelSchema } from '../model/ModelSchema';
import { ExpressionBuilder } from '../query/ExpressionBuilder';
import { LambdaParser } from '../query/LambdaParser';
import { IQueryable, PredicateFunction } from '../query/Types';
import { DefaultFieldNameResolver, resolveField } from '../resolution/FieldNameResolver';
import { QuerySettings } from '../settings/QuerySettings';
import { QueryDictionary } from '../../utils/QueryStringHelpers';
import { CompileOptions } from './CompileOptions';
import { FilterOperator, getOperatorSymbol, isPresenceOperator } from './FilterOperator';
import { FilterPredicateBuilder } from './FilterPredicateBuilder';
import { filterEntrySchema, parseEntry } from './validation';

const COMPARISON_OPERATORS: Partial<Record<ExpressionType, FilterOperator>> = {
  [ExpressionType.Equal]: FilterOperator.Equals,
  [ExpressionType.NotEqual]: FilterOperator.NotEquals,
  [ExpressionType.GreaterThan]: FilterOperator.GreaterThan,
  [ExpressionType.GreaterThanOrEqual]: FilterOperator.GreaterThanOrEquals,
  [ExpressionType.LessThan]: FilterOperator.LessThan,
  [ExpressionType.LessThanOrEqual]: FilterOperator.LessThanOrEquals,
};

interface FilterCondition {
  field: string;
  operator: FilterOperator;
  value: string | null;
}

export interface FilterPredicateOptions {
  caseSensitive?: boolean;
  /** Values the predicate references by name */
  variables?: Record<string, unknown>;
}

/**
 * One filter condition over one or more fields.
 * The fields are ORed; the filters of a SearchParameters are ANDed.
 */
export class Filter {
  readonly fields: readonly string[];

  constructor(
    fields: readonly string[],
    readonly operator: FilterOperator,
    readonly value: string | null = null,
    readonly caseSensitive: boolean = false,
    private readonly mapper: IFieldMapper | null = null,
  ) {
    if (fields.length === 0) {
      throw new ArgumentError('A filter needs at least one field');
    }
    if (fields.some(field => !field.trim())) {
      throw new ArgumentError('Filter field names must not be empty');
    }
    if (fields.some(field => field !== field.trim() || field.includes(','))) {
      throw new ArgumentError('Filter field names must not contain commas or surrounding whitespace');
    }
    this.fields = [...fields];
  }

  /**
   * Builds a filter from a predicate over the model, such as
   * `p => p.name.includes('lap') || p.description.includes('lap')`.
   * Conditions joined with `||` must share the operator and the value.
   */
  static fromPredicate<T>(predicate: PredicateFunction<T>, options: FilterPredicateOptions = {}): Filter {
    const expr = new LambdaParser(new ExpressionBuilder(), options.variables).parsePredicate(predicate);
    const conditions = Filter.flattenOr(expr).map(part => Filter.toCondition(part));

    const [first, ...rest] = conditions;
    const consistent = rest.every(
      condition => condition.operator === first.operator && condition.value === first.value,
    );
    if (!consistent) {
      throw new ArgumentError('All conditions of a filter predicate must use the same operator and value');
    }

    return new Filter(
      conditions.map(condition => condition.field),
      first.operator,
      first.value,
      options.caseSensitive ?? false,
    );
  }

  /**
   * Reads a `filters[i]` entry (`fields`, `op`, `val`, `case`)
   */
  static fromDictionary(entry: Readonly<Record<string, string | undefined>>): Filter {
    const parsed = parseEntry(filterEntrySchema, entry, 'filter');
    return new Filter(parsed.fields, parsed.op, parsed.val ?? null, parsed.case);
  }

  /**
   * Gets the mapper used to resolve the fields, if any
   */
  getMapper(): IFieldMapper | null {
    return this.mapper;
  }

  /**
   * Returns a copy that resolves its fields through the mapper
   */
  withMapper(mapper: IFieldMapper | null): Filter {
    return new Filter(this.fields, this.operator, this.value, this.caseSensitive, mapper);
  }

  /**
   * Compiles the filter into a predicate over the model.
   * Fields that are restricted or cannot be resolved are dropped; returns null when none survive.
   */
  compile<T>(schema: ModelSchema<T>, options: CompileOptions = {}): Expression | null {
    const settings = options.settings ?? QuerySettings.default;
    const resolver = options.resolver ?? new DefaultFieldNameResolver(settings);
    const predicateBuilder = new FilterPredicateBuilder(settings);
    const leaves: Expression[] = [];

    for (const fieldName of this.fields) {
      const field = this.mapper
        ? this.mapper.resolveToEntityField(fieldName)
        : resolveField(resolver, schema, fieldName);

      if (!field.resolved) {
        settings.logger.debug(`Filter field '${fieldName}' dropped: ${field.reason} field`);
        continue;
      }

      if (options.restrictions && !options.restrictions.isFilterAllowed(fieldName, field.path)) {
        settings.logger.debug(`Filter field '${fieldName}' dropped: restricted`);
        continue;
      }

      const transformed =
        this.mapper && this.mapper.hasTransform(fieldName)
          ? { value: this.mapper.transformValue(fieldName, this.value) }
          : undefined;

      leaves.push(
        predicateBuilder.build({
          field,
          operator: this.operator,
          value: this.value,
          caseSensitive: this.caseSensitive,
          transformed,
        }),
      );
    }

    return new ExpressionBuilder().combineOr(leaves);
  }

  /**
   * Applies the filter to a queryable; the query is returned unchanged when no field survives
   */
  applyToQueryable<T>(query: IQueryable<T>, options: CompileOptions = {}): IQueryable<T> {
    const predicate = this.compile(query.schema, options);
    return predicate ? query.where(predicate) : query;
  }

  /**
   * Writes the entry keys of the wire format
   */
  toDictionary(): QueryDictionary {
    const result: QueryDictionary = {
      fields: this.fields.join(','),
      op: this.operator,
    };
    if (this.value !== null) {
      result.val = this.value;
    }
    if (this.caseSensitive) {
      result.case = 'true';
    }
    return result;
  }

  equals(other: Filter): boolean {
    return (
      this.operator === other.operator &&
      this.value === other.value &&
      this.caseSensitive === other.caseSensitive &&
      this.fields.length === other.fields.length &&
      this.fields.every((field, index) => field === other.fields[index])
    );
  }

  toString(): string {
    const symbol = getOperatorSymbol(this.operator);
    const parts = this.fields.map(field =>
      isPresenceOperator(this.operator)
        ? `${field} ${symbol}`
        : `${field} ${symbol} ${this.value ?? 'null'}`,
    );
    return `(${parts.join(' OR ')})`;
  }

  private static flattenOr(expr: Expression): Expression[] {
    if (expr instanceof BinaryExpression && expr.getOperatorType() === ExpressionType.Or) {
      return [...Filter.flattenOr(expr.getLeft()), ...Filter.flattenOr(expr.getRight())];
    }
    return [expr];
  }

  private static toCondition(expr: Expression): FilterCondition {
    if (expr instanceof ContainsExpression) {
      const field = Filter.fieldName(expr.getOperand());
      return { field, operator: FilterOperator.Contains, value: expr.getValue() };
    }

    if (expr instanceof UnaryExpression) {
      const operand = expr.getOperand();

      if (expr.getOperatorType() === ExpressionType.IsNull) {
        return { field: Filter.fieldName(operand), operator: FilterOperator.IsNull, value: null };
      }

      if (operand instanceof UnaryExpression && operand.getOperatorType() === ExpressionType.IsNull) {
        return {
          field: Filter.fieldName(operand.getOperand()),
          operator: FilterOperator.IsNotNull,
          value: null,
        };
      }

      if (operand instanceof ContainsExpression) {
        return {
          field: Filter.fieldName(operand.getOperand()),
          operator: FilterOperator.NotContains,
          value: operand.getValue(),
        };
      }
    }

    if (expr instanceof BinaryExpression) {
      const operator = COMPARISON_OPERATORS[expr.getOperatorType()];
      const right = expr.getRight();

      if (operator !== undefined && right instanceof ConstantExpression) {
        return {
          field: Filter.fieldName(expr.getLeft()),
          operator,
          value: Filter.formatValue(right.getValue()),
        };
      }
    }

    throw new ArgumentError('Filter predicates support comparisons, includes() and null checks only');
  }

  private static fieldName(expr: Expression): string {
    if (expr instanceof FieldExpression) {
      return expr.getFieldName();
    }
    throw new ArgumentError('Filter predicates must compare a member of the model');
  }

  private static formatValue(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return value.toISOString();
    return String(value);
  }
}
