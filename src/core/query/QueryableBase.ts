import { Expression } from '../expressions/Expression';
import { OrderingExpression, QueryExpression } from '../expressions/QueryExpression';
import { ModelSchema } from '../model/ModelSchema';
import { ArgumentError } from '../errors';
import { ExpressionBuilder } from './ExpressionBuilder';
import { LambdaParser } from './LambdaParser';
import { IOrderedQueryable, MemberSelector, OrderDirection, PredicateFunction } from './Types';

/**
 * Shared query composition for the queryable implementations.
 * State lives in an immutable QueryExpression; every operation returns a new queryable.
 */
export abstract class QueryableBase<T, TSelf extends IOrderedQueryable<T>>
  implements IOrderedQueryable<T>
{
  protected readonly expressionBuilder: ExpressionBuilder = new ExpressionBuilder();
  protected readonly query: QueryExpression;

  protected constructor(
    readonly schema: ModelSchema<T>,
    query?: QueryExpression,
  ) {
    this.query = query ?? this.expressionBuilder.createQuery(schema.getName());
  }

  /**
   * Creates a queryable of the same kind over the given state
   */
  protected abstract createWith(query: QueryExpression): TSelf;

  abstract countAsync(): Promise<number>;

  abstract toListAsync(): Promise<T[]>;

  /**
   * Gets the accumulated query
   */
  toQueryExpression(): QueryExpression {
    return this.query;
  }

  /**
   * Adds a WHERE condition, ANDed with any previous one
   * @param predicate An expression tree, or an arrow function read by the lambda parser
   * @param variables Values the arrow function references by name
   */
  where(predicate: Expression | PredicateFunction<T>, variables: Record<string, unknown> = {}): TSelf {
    const condition =
      predicate instanceof Expression
        ? predicate
        : new LambdaParser(this.expressionBuilder, variables).parsePredicate(predicate);

    const current = this.query.getWhereClause();
    const whereClause = current ? this.expressionBuilder.createAnd(current, condition) : condition;

    return this.with({ whereClause });
  }

  /**
   * Orders by a key, replacing any previous ordering
   */
  orderBy(ordering: OrderingExpression | MemberSelector<T>, direction: OrderDirection = OrderDirection.ASC): TSelf {
    return this.with({ orderings: [this.toOrdering(ordering, direction)] });
  }

  /**
   * Orders by a key in descending order, replacing any previous ordering
   */
  orderByDescending(selector: MemberSelector<T>): TSelf {
    return this.orderBy(selector, OrderDirection.DESC);
  }

  /**
   * Adds a tie-breaking key after the existing ones
   */
  thenBy(ordering: OrderingExpression | MemberSelector<T>, direction: OrderDirection = OrderDirection.ASC): TSelf {
    return this.with({
      orderings: [...this.query.getOrderings(), this.toOrdering(ordering, direction)],
    });
  }

  thenByDescending(selector: MemberSelector<T>): TSelf {
    return this.thenBy(selector, OrderDirection.DESC);
  }

  /**
   * Skips elements of the current window
   */
  skip(count: number): TSelf {
    this.validateCount('skip', count);
    const limit = this.query.getLimit();

    return this.with({
      offset: this.query.getOffset() + count,
      limit: limit === null ? null : Math.max(0, limit - count),
    });
  }

  /**
   * Limits the number of elements of the current window
   */
  take(count: number): TSelf {
    this.validateCount('take', count);
    const limit = this.query.getLimit();

    return this.with({ limit: limit === null ? count : Math.min(limit, count) });
  }

  private validateCount(operation: string, count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new ArgumentError(`${operation} expects a non-negative integer, got ${count}`);
    }
  }

  private toOrdering(
    ordering: OrderingExpression | MemberSelector<T>,
    direction: OrderDirection,
  ): OrderingExpression {
    if (ordering instanceof OrderingExpression) return ordering;

    const path = new LambdaParser(this.expressionBuilder).parseMemberPath(ordering);
    const segments = this.schema.resolvePath(path);
    if (!segments) {
      throw new ArgumentError(`Field '${path}' does not exist on ${this.schema.getName()}`);
    }

    const field = this.expressionBuilder.createField(
      segments.map(segment => segment.name),
      segments[segments.length - 1].kind,
    );
    return this.expressionBuilder.createOrdering(field, direction);
  }

  private with(changes: {
    whereClause?: Expression | null;
    orderings?: readonly OrderingExpression[];
    offset?: number;
    limit?: number | null;
  }): TSelf {
    const query = this.expressionBuilder.createQuery(
      this.query.getSource(),
      changes.whereClause !== undefined ? changes.whereClause : this.query.getWhereClause(),
      changes.orderings ?? this.query.getOrderings(),
      changes.offset ?? this.query.getOffset(),
      changes.limit !== undefined ? changes.limit : this.query.getLimit(),
    );
    return this.createWith(query);
  }
}
