import { ComparisonMode, Expression, ExpressionType } from '../expressions/Expression';
import { FieldExpression } from '../expressions/FieldExpression';
import { escapeLikePattern } from '../expressions/LikeExpression';
import { PropertyKind } from '../model/ModelSchema';
import { ExpressionBuilder } from '../query/ExpressionBuilder';
import { ResolvedField } from '../resolution/FieldResolution';
import { PatternMatchBuilder, QuerySettings } from '../settings/QuerySettings';
import { FilterOperator } from './FilterOperator';

/**
 * Everything needed to build the test of one filter field
 */
export interface FilterLeaf {
  field: ResolvedField;
  operator: FilterOperator;
  value: string | null;
  caseSensitive: boolean;
  /** Present when a mapper transformed the value; undefined inside means "no value" */
  transformed?: { value: unknown };
}

const RELATIONAL_TYPES: Partial<Record<FilterOperator, ExpressionType>> = {
  [FilterOperator.GreaterThan]: ExpressionType.GreaterThan,
  [FilterOperator.GreaterThanOrEquals]: ExpressionType.GreaterThanOrEqual,
  [FilterOperator.LessThan]: ExpressionType.LessThan,
  [FilterOperator.LessThanOrEquals]: ExpressionType.LessThanOrEqual,
};

/**
 * Builds the predicate of one filter field.
 *
 * Values that cannot be parsed for the field kind produce the constant false, so the
 * leaf matches nothing. Nested paths are guarded: each intermediate object must be
 * present or the leaf is false.
 */
export class FilterPredicateBuilder {
  constructor(
    private readonly settings: QuerySettings,
    private readonly builder: ExpressionBuilder = new ExpressionBuilder(),
  ) {}

  build(leaf: FilterLeaf): Expression {
    const segments = leaf.field.segments;
    const path = segments.map(segment => segment.name);
    const field = this.builder.createField(path, segments[segments.length - 1].kind);

    const guards = path
      .slice(0, -1)
      .map((_, index) =>
        this.builder.createIsNotNull(
          this.builder.createField(path.slice(0, index + 1), PropertyKind.Object),
        ),
      );

    const test = this.buildTest(field, leaf);
    return this.builder.combineAnd([...guards, test]) ?? test;
  }

  private buildTest(field: FieldExpression, leaf: FilterLeaf): Expression {
    switch (leaf.operator) {
      case FilterOperator.IsNull:
        return this.builder.createIsNull(field);
      case FilterOperator.IsNotNull:
        return this.builder.createIsNotNull(field);
      case FilterOperator.Equals:
        return this.buildEquality(field, leaf, false);
      case FilterOperator.NotEquals:
        return this.buildEquality(field, leaf, true);
      case FilterOperator.Contains:
        return this.buildContains(field, leaf, false);
      case FilterOperator.NotContains:
        return this.buildContains(field, leaf, true);
      default:
        return this.buildRelational(field, leaf);
    }
  }

  private buildEquality(field: FieldExpression, leaf: FilterLeaf, negate: boolean): Expression {
    const value = leaf.transformed ? leaf.transformed.value : leaf.value;

    if (value === undefined) return this.builder.createFalse();
    if (value === null) {
      return negate ? this.builder.createIsNotNull(field) : this.builder.createIsNull(field);
    }

    if (typeof value === 'string' && !leaf.transformed) {
      switch (field.getKind()) {
        case PropertyKind.Number:
          return this.compareParsed(field, parseNumber(value), negate, ComparisonMode.Numeric);
        case PropertyKind.Boolean:
          return this.compareParsed(field, parseBoolean(value), negate, ComparisonMode.Exact);
        case PropertyKind.Date:
          return this.compareParsed(field, parseDate(value), negate, ComparisonMode.Numeric);
        case PropertyKind.Object:
          return this.builder.createFalse();
        default:
          return this.buildTextEquality(field, value, leaf, negate);
      }
    }

    if (typeof value === 'string') {
      return this.buildTextEquality(field, value, leaf, negate);
    }

    const mode =
      typeof value === 'number' || value instanceof Date ? ComparisonMode.Numeric : ComparisonMode.Exact;
    return this.compareParsed(field, value, negate, mode);
  }

  private buildTextEquality(
    field: FieldExpression,
    value: string,
    leaf: FilterLeaf,
    negate: boolean,
  ): Expression {
    const ignoreCase = this.ignoresCase(leaf);
    const patternMatch = ignoreCase ? this.getPatternMatch() : null;

    if (patternMatch) {
      const match = patternMatch(field, escapeLikePattern(value));
      return negate ? this.builder.createNot(match) : match;
    }

    return this.builder.createBinary(
      negate ? ExpressionType.NotEqual : ExpressionType.Equal,
      field,
      this.builder.createConstant(value),
      ignoreCase ? ComparisonMode.TextIgnoreCase : ComparisonMode.Text,
    );
  }

  private compareParsed(
    field: FieldExpression,
    value: unknown,
    negate: boolean,
    mode: ComparisonMode,
  ): Expression {
    if (value === null || value === undefined) return this.builder.createFalse();

    return this.builder.createBinary(
      negate ? ExpressionType.NotEqual : ExpressionType.Equal,
      field,
      this.builder.createConstant(value),
      mode,
    );
  }

  private buildRelational(field: FieldExpression, leaf: FilterLeaf): Expression {
    const type = RELATIONAL_TYPES[leaf.operator];
    if (type === undefined) {
      throw new Error(`Unsupported filter operator: ${leaf.operator}`);
    }

    const operand = leaf.transformed
      ? toRelationalOperand(leaf.transformed.value, field.getKind())
      : toRelationalOperand(leaf.value, field.getKind());
    if (operand === null) return this.builder.createFalse();

    return this.builder.createBinary(
      type,
      field,
      this.builder.createConstant(operand),
      ComparisonMode.Numeric,
    );
  }

  private buildContains(field: FieldExpression, leaf: FilterLeaf, negate: boolean): Expression {
    const value = leaf.transformed ? leaf.transformed.value : leaf.value;
    if (value === null || value === undefined) return this.builder.createFalse();

    const text = typeof value === 'string' ? value : String(value);
    const ignoreCase = this.ignoresCase(leaf);
    const patternMatch = ignoreCase ? this.getPatternMatch() : null;

    const test = patternMatch
      ? patternMatch(field, `%${escapeLikePattern(text)}%`)
      : this.builder.createContains(field, text, ignoreCase);

    return negate ? this.builder.createNot(test) : test;
  }

  private ignoresCase(leaf: FilterLeaf): boolean {
    return !leaf.caseSensitive && this.settings.ignoreCase;
  }

  private getPatternMatch(): PatternMatchBuilder | null {
    return this.settings.useBackendPatternMatch ? this.settings.patternMatchBuilder : null;
  }
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseBoolean(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return null;
}

function parseDate(value: string): Date | null {
  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

function toRelationalOperand(value: unknown, kind: PropertyKind): number | Date | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value !== 'string') return null;

  return kind === PropertyKind.Date ? parseDate(value) : parseNumber(value);
}
