import { QueryExpression } from '../expressions/QueryExpression';
import { ModelSchema } from '../model/ModelSchema';
import { EvaluationVisitor } from '../visitors/EvaluationVisitor';
import { QueryableBase } from './QueryableBase';

/**
 * Queryable over an in-memory array. The expression tree is evaluated directly
 * over the elements when the query is materialized.
 */
export class EnumerableQueryable<T> extends QueryableBase<T, EnumerableQueryable<T>> {
  constructor(
    private readonly source: readonly T[],
    schema: ModelSchema<T>,
    query?: QueryExpression,
  ) {
    super(schema, query);
  }

  protected createWith(query: QueryExpression): EnumerableQueryable<T> {
    return new EnumerableQueryable<T>(this.source, this.schema, query);
  }

  /**
   * Evaluates the query synchronously
   */
  toArray(): T[] {
    const whereClause = this.query.getWhereClause();
    let items = whereClause
      ? this.source.filter(EvaluationVisitor.compilePredicate<T>(whereClause))
      : [...this.source];

    const orderings = this.query.getOrderings();
    if (orderings.length > 0) {
      // Array.prototype.sort is stable, so equal keys keep their source order
      items = items.sort(EvaluationVisitor.compileComparer<T>(orderings));
    }

    const offset = this.query.getOffset();
    const limit = this.query.getLimit();
    return items.slice(offset, limit === null ? undefined : offset + limit);
  }

  async toListAsync(): Promise<T[]> {
    return this.toArray();
  }

  async countAsync(): Promise<number> {
    return this.toArray().length;
  }
}
