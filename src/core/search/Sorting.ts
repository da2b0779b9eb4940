import { OrderingExpression } from '../expressions/QueryExpression';
import { ArgumentError } from '../errors';
import { IFieldMapper } from '../mapping/IFieldMapper';
import { ModelSchema } from '../model/ModelSchema';
import { ExpressionBuilder } from '../query/ExpressionBuilder';
import { getFieldName } from '../query/LambdaParser';
import { IOrderedQueryable, IQueryable, MemberSelector, OrderDirection } from '../query/Types';
import { DefaultFieldNameResolver, resolveField } from '../resolution/FieldNameResolver';
import { QuerySettings } from '../settings/QuerySettings';
import { QueryDictionary } from '../../utils/QueryStringHelpers';
import { CompileOptions } from './CompileOptions';
import { SortOrder } from './SortOrder';
import { parseEntry, sortingEntrySchema } from './validation';

/**
 * One ordering key
 */
export class Sorting {
  constructor(
    readonly propertyName: string,
    readonly sortOrder: SortOrder = SortOrder.Ascending,
    private readonly mapper: IFieldMapper | null = null,
  ) {
    if (!propertyName.trim()) {
      throw new ArgumentError('Sorting property name must not be empty');
    }
    if (propertyName !== propertyName.trim()) {
      throw new ArgumentError('Sorting property name must not have surrounding whitespace');
    }
  }

  static fromSelector<T>(selector: MemberSelector<T>, sortOrder: SortOrder = SortOrder.Ascending): Sorting {
    return new Sorting(getFieldName(selector), sortOrder);
  }

  /**
   * Reads a `sortings[i]` entry (`prop`, `ord`)
   */
  static fromDictionary(entry: Readonly<Record<string, string | undefined>>): Sorting {
    const parsed = parseEntry(sortingEntrySchema, entry, 'sorting');
    return new Sorting(parsed.prop, parsed.ord);
  }

  getMapper(): IFieldMapper | null {
    return this.mapper;
  }

  withMapper(mapper: IFieldMapper | null): Sorting {
    return new Sorting(this.propertyName, this.sortOrder, mapper);
  }

  /**
   * Compiles the key into an ordering, or null when the field is restricted or cannot be resolved
   */
  compile<T>(schema: ModelSchema<T>, options: CompileOptions = {}): OrderingExpression | null {
    const settings = options.settings ?? QuerySettings.default;
    const field = this.mapper
      ? this.mapper.resolveToEntityField(this.propertyName)
      : resolveField(options.resolver ?? new DefaultFieldNameResolver(settings), schema, this.propertyName);

    if (!field.resolved) {
      settings.logger.debug(`Sorting on '${this.propertyName}' skipped: ${field.reason} field`);
      return null;
    }

    if (options.restrictions && !options.restrictions.isSortAllowed(this.propertyName, field.path)) {
      settings.logger.debug(`Sorting on '${this.propertyName}' skipped: restricted`);
      return null;
    }

    const builder = new ExpressionBuilder();
    const segments = field.segments;
    return builder.createOrdering(
      builder.createField(
        segments.map(segment => segment.name),
        segments[segments.length - 1].kind,
      ),
      this.sortOrder === SortOrder.Descending ? OrderDirection.DESC : OrderDirection.ASC,
    );
  }

  /**
   * Applies the key as the primary order; the query is returned unchanged when it is skipped
   */
  applyToQueryable<T>(query: IQueryable<T>, options: CompileOptions = {}): IQueryable<T> {
    const ordering = this.compile(query.schema, options);
    return ordering ? query.orderBy(ordering) : query;
  }

  /**
   * Applies the key as a tie-breaker after the existing order
   */
  thenApplyToQueryable<T>(query: IOrderedQueryable<T>, options: CompileOptions = {}): IOrderedQueryable<T> {
    const ordering = this.compile(query.schema, options);
    return ordering ? query.thenBy(ordering) : query;
  }

  toDictionary(): QueryDictionary {
    return { prop: this.propertyName, ord: this.sortOrder };
  }

  equals(other: Sorting): boolean {
    return this.propertyName === other.propertyName && this.sortOrder === other.sortOrder;
  }

  toString(): string {
    return `${this.propertyName} ${this.sortOrder}`;
  }
}
