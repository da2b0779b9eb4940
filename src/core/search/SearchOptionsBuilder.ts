import { IFieldMapper } from '../mapping/IFieldMapper';
import { IQueryable } from '../query/Types';
import { QuerySettings } from '../settings/QuerySettings';
import { PagedQueryable } from './PagedQueryable';
import { RestrictionsInput, SearchParameters } from './SearchParameters';

interface FeatureOptions {
  enabled: boolean;
  mapper: IFieldMapper | null;
}

/**
 * Chooses which parts of an incoming request a search honours.
 * Paging, filtering and sorting are ignored until enabled.
 *
 * @example
 * const page = await SearchOptionsBuilder.fromQueryString<Customer>(request.url.search)
 *   .withPaging()
 *   .withFiltering(customerDtoMapper)
 *   .withSorting()
 *   .build(customers)
 *   .toPagedListAsync();
 */
export class SearchOptionsBuilder<TEntity> {
  private paging: boolean = false;
  private readonly filtering: FeatureOptions = { enabled: false, mapper: null };
  private readonly sorting: FeatureOptions = { enabled: false, mapper: null };
  private restrictions: RestrictionsInput<TEntity> | null = null;
  private settings: QuerySettings | undefined;

  constructor(private readonly parameters: SearchParameters) {}

  static fromDictionary<TEntity>(
    dictionary: Readonly<Record<string, string | undefined>>,
  ): SearchOptionsBuilder<TEntity> {
    return new SearchOptionsBuilder<TEntity>(SearchParameters.fromDictionary(dictionary));
  }

  static fromQueryString<TEntity>(query: string | URLSearchParams): SearchOptionsBuilder<TEntity> {
    return new SearchOptionsBuilder<TEntity>(SearchParameters.fromQueryString(query));
  }

  withPaging(enabled: boolean = true): this {
    this.paging = enabled;
    return this;
  }

  /**
   * Honours the request filters, resolving their fields through the mapper when given
   */
  withFiltering(mapper: IFieldMapper | null = null): this {
    this.filtering.enabled = true;
    this.filtering.mapper = mapper;
    return this;
  }

  /**
   * Honours the request sortings, resolving their fields through the mapper when given
   */
  withSorting(mapper: IFieldMapper | null = null): this {
    this.sorting.enabled = true;
    this.sorting.mapper = mapper;
    return this;
  }

  withRestrictions(restrictions: RestrictionsInput<TEntity>): this {
    this.restrictions = restrictions;
    return this;
  }

  withSettings(settings: QuerySettings): this {
    this.settings = settings;
    return this;
  }

  /**
   * The parameters that will be applied, with the disabled parts removed
   */
  getEffectiveParameters(): SearchParameters {
    const { filtering, sorting } = this;

    return new SearchParameters(
      this.paging ? this.parameters.paging : null,
      filtering.enabled ? this.parameters.filters.map(filter => filter.withMapper(filtering.mapper)) : [],
      sorting.enabled ? this.parameters.sortings.map(item => item.withMapper(sorting.mapper)) : [],
    );
  }

  build(query: IQueryable<TEntity>): PagedQueryable<TEntity> {
    return new PagedQueryable<TEntity>(query, this.getEffectiveParameters(), this.restrictions, this.settings);
  }
}
