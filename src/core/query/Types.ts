/**
 * Defines common types used in query building
 */

import { Expression } from '../expressions/Expression';
import { OrderingExpression } from '../expressions/QueryExpression';
import { ModelSchema } from '../model/ModelSchema';
import { ExpressionJson } from '../../utils/ExpressionSerializer';

/**
 * Represents the direction of an ORDER BY key
 */
export enum OrderDirection {
  ASC = 'ASC',
  DESC = 'DESC',
}

/**
 * Function type for WHERE predicates written as arrow functions
 */
export type PredicateFunction<T> = (entity: T) => boolean;

/**
 * Function type for selecting a (possibly nested) member
 */
export type MemberSelector<T> = (entity: T) => unknown;

/**
 * A field given by name or by member selector
 */
export type FieldReference<T> = string | MemberSelector<T>;

/**
 * A filterable, orderable sequence of elements.
 * Every operation returns a new queryable and leaves the receiver untouched.
 */
export interface IQueryable<T> {
  /** Schema of the element type */
  readonly schema: ModelSchema<T>;

  /**
   * Keeps the elements matching the predicate; successive calls are ANDed
   */
  where(predicate: Expression): IQueryable<T>;

  /**
   * Orders by a key, replacing any previous ordering
   */
  orderBy(ordering: OrderingExpression): IOrderedQueryable<T>;

  skip(count: number): IQueryable<T>;

  take(count: number): IQueryable<T>;

  /**
   * Counts the elements of the query
   */
  countAsync(): Promise<number>;

  /**
   * Materializes the elements of the query
   */
  toListAsync(): Promise<T[]>;
}

/**
 * A queryable with a primary ordering, which accepts tie-breakers
 */
export interface IOrderedQueryable<T> extends IQueryable<T> {
  thenBy(ordering: OrderingExpression): IOrderedQueryable<T>;
}

/**
 * Executes serialized queries against a data store
 */
export interface IDatabaseProvider {
  execAsync<T>(metadata: ExpressionJson): Promise<T[]>;
  countAsync(metadata: ExpressionJson): Promise<number>;
}
