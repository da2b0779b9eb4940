// src/core/query/Queryable.ts
import { QueryExpression } from '../expressions/QueryExpression';
import { ModelSchema } from '../model/ModelSchema';
import { ExpressionJson, ExpressionSerializer } from '../../utils/ExpressionSerializer';
import { QueryableBase } from './QueryableBase';
import { IDatabaseProvider } from './Types';

/**
 * Represents a query that is built locally and executed by a data provider.
 * The provider receives the query lowered to JSON and translates it to its native calls.
 */
export class Queryable<T> extends QueryableBase<T, Queryable<T>> {
  /**
   * Creates a new queryable
   * @param provider The data provider
   * @param schema The schema of the element type
   * @param query Accumulated query state
   */
  constructor(
    readonly provider: IDatabaseProvider,
    schema: ModelSchema<T>,
    query?: QueryExpression,
  ) {
    super(schema, query);
  }

  protected createWith(query: QueryExpression): Queryable<T> {
    return new Queryable<T>(this.provider, this.schema, query);
  }

  /**
   * Converts the query to its JSON metadata representation
   */
  toMetadata(): ExpressionJson {
    return ExpressionSerializer.serializeQuery(this.query);
  }

  /**
   * Executes the query and returns its elements
   */
  async toListAsync(): Promise<T[]> {
    return await this.provider.execAsync<T>(this.toMetadata());
  }

  /**
   * Executes a count of the query
   */
  async countAsync(): Promise<number> {
    return await this.provider.countAsync(this.toMetadata());
  }
}
