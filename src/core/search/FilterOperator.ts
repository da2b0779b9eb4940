/**
 * Filter operators, valued by their wire codes
 */
export enum FilterOperator {
  Equals = 'eq',
  NotEquals = 'neq',
  GreaterThan = 'gt',
  LessThan = 'lt',
  GreaterThanOrEquals = 'gte',
  LessThanOrEquals = 'lte',
  Contains = 'contains',
  NotContains = 'ncontains',
  IsNull = 'null',
  IsNotNull = 'notnull',
}

const OPERATOR_SYMBOLS: Readonly<Record<FilterOperator, string>> = {
  [FilterOperator.Equals]: '==',
  [FilterOperator.NotEquals]: '!=',
  [FilterOperator.GreaterThan]: '>',
  [FilterOperator.LessThan]: '<',
  [FilterOperator.GreaterThanOrEquals]: '>=',
  [FilterOperator.LessThanOrEquals]: '<=',
  [FilterOperator.Contains]: 'contains',
  [FilterOperator.NotContains]: 'not contains',
  [FilterOperator.IsNull]: 'is null',
  [FilterOperator.IsNotNull]: 'is not null',
};

/**
 * Gets the symbol used when printing a filter
 */
export function getOperatorSymbol(operator: FilterOperator): string {
  return OPERATOR_SYMBOLS[operator];
}

/**
 * Whether the operator ignores the filter value
 */
export function isPresenceOperator(operator: FilterOperator): boolean {
  return operator === FilterOperator.IsNull || operator === FilterOperator.IsNotNull;
}
