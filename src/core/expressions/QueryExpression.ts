import { Expression } from './Expression';
import { FieldExpression } from './FieldExpression';
import { OrderDirection } from '../query/Types';

/**
 * Represents an ORDER BY key with field and direction
 */
export class OrderingExpression {
  constructor(
    private readonly field: FieldExpression,
    private readonly direction: OrderDirection,
  ) {}

  /**
   * Gets the ordered field
   */
  getField(): FieldExpression {
    return this.field;
  }

  /**
   * Gets the direction
   */
  getDirection(): OrderDirection {
    return this.direction;
  }

  /**
   * Gets whether the order is ascending
   */
  isAscending(): boolean {
    return this.direction === OrderDirection.ASC;
  }
}

/**
 * Represents everything accumulated on a queryable: the filter, the ordering keys and the page window
 */
export class QueryExpression {
  constructor(
    private readonly source: string,
    private readonly whereClause: Expression | null,
    private readonly orderings: readonly OrderingExpression[],
    private readonly offset: number,
    private readonly limit: number | null,
  ) {}

  /**
   * Gets the name of the queried source
   */
  getSource(): string {
    return this.source;
  }

  /**
   * Gets the WHERE clause expression
   */
  getWhereClause(): Expression | null {
    return this.whereClause;
  }

  /**
   * Gets the ORDER BY keys, primary first
   */
  getOrderings(): readonly OrderingExpression[] {
    return this.orderings;
  }

  /**
   * Gets the number of skipped elements
   */
  getOffset(): number {
    return this.offset;
  }

  /**
   * Gets the maximum number of returned elements, or null when unbounded
   */
  getLimit(): number | null {
    return this.limit;
  }
}
