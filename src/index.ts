/**
 * Query criteria
 * Compiles string-encoded filter, sort and paging criteria into expression trees
 * applied to queryable data sources
 *
 * @packageDocumentation
 */

// Search criteria
export { SearchParameters, RestrictionsInput, SearchQueries } from './core/search/SearchParameters';
export { Filter, FilterPredicateOptions } from './core/search/Filter';
export { FilterOperator, getOperatorSymbol } from './core/search/FilterOperator';
export { FilterPredicateBuilder, FilterLeaf } from './core/search/FilterPredicateBuilder';
export { Sorting } from './core/search/Sorting';
export { SortOrder } from './core/search/SortOrder';
export { Paging, STARTING_PAGE } from './core/search/Paging';
export { PagedQueryable, PagedList, withSearchParameters } from './core/search/PagedQueryable';
export { SearchOptionsBuilder } from './core/search/SearchOptionsBuilder';
export { CompileOptions } from './core/search/CompileOptions';

// Field resolution, mapping and restrictions
export { ModelSchema, ModelSchemaBuilder, PropertyDefinition, PropertyKind, defineModel } from './core/model/ModelSchema';
export {
  IFieldNameResolver,
  DefaultFieldNameResolver,
  PassThroughFieldNameResolver,
  resolveField,
} from './core/resolution/FieldNameResolver';
export { FieldResolution, ResolvedField, checkFieldPath } from './core/resolution/FieldResolution';
export { FieldMapper } from './core/mapping/FieldMapper';
export { IFieldMapper, ValueTransformer } from './core/mapping/IFieldMapper';
export { FieldRestrictions } from './core/restrictions/FieldRestrictions';

// Settings
export {
  QuerySettings,
  QuerySettingsInit,
  QuerySettingsOptions,
  QueryLogger,
  PatternMatchBuilder,
  StringComparison,
} from './core/settings/QuerySettings';
export { NamingPolicy, NamingPolicyName, NamingPolicies } from './core/naming/NamingPolicy';

// Queryables
export { Queryable } from './core/query/Queryable';
export { EnumerableQueryable } from './core/query/EnumerableQueryable';
export { DbContext } from './core/context/DbContext';
export { LambdaParser } from './core/query/LambdaParser';
export { ExpressionBuilder } from './core/query/ExpressionBuilder';
export {
  IQueryable,
  IOrderedQueryable,
  IDatabaseProvider,
  OrderDirection,
  FieldReference,
  MemberSelector,
  PredicateFunction,
} from './core/query/Types';

// Expressions - for providers translating the tree
export { Expression, ExpressionType, ComparisonMode, IExpressionVisitor } from './core/expressions/Expression';
export { BinaryExpression } from './core/expressions/BinaryExpression';
export { UnaryExpression } from './core/expressions/UnaryExpression';
export { FieldExpression } from './core/expressions/FieldExpression';
export { ConstantExpression } from './core/expressions/ConstantExpression';
export { ContainsExpression } from './core/expressions/ContainsExpression';
export { LikeExpression, escapeLikePattern, likePatternMatch } from './core/expressions/LikeExpression';
export { OrderingExpression, QueryExpression } from './core/expressions/QueryExpression';
export { EvaluationVisitor } from './core/visitors/EvaluationVisitor';
export { ExpressionSerializer, ExpressionJson, JsonValue } from './utils/ExpressionSerializer';

// Errors
export { ArgumentError, QueryParseError, ConfigurationError } from './core/errors';

// Wire helpers
export {
  QueryDictionary,
  mergeListOfQueryStrings,
  splitQueryStringInList,
  queryStringToDictionary,
  dictionaryToQueryString,
} from './utils/QueryStringHelpers';
