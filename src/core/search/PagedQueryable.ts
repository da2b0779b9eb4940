import { IQueryable } from '../query/Types';
import { QuerySettings } from '../settings/QuerySettings';
import { Paging } from './Paging';
import { RestrictionsInput, SearchParameters } from './SearchParameters';

/**
 * One page of results with the total number of matching elements
 */
export interface PagedList<T> {
  totalCount: number;
  items: T[];
  /** Page number, or null when the search was not paged */
  page: number | null;
  pageSize: number | null;
}

/**
 * The count and paged queries of a search, materialized together on demand
 */
export class PagedQueryable<T> {
  readonly countQuery: IQueryable<T>;
  readonly pagedQuery: IQueryable<T>;

  constructor(
    query: IQueryable<T>,
    readonly parameters: SearchParameters,
    restrictions?: RestrictionsInput<T> | null,
    settings?: QuerySettings,
  ) {
    const { countQuery, pagedQuery } = parameters.applyToQueryable(query, restrictions, settings);
    this.countQuery = countQuery;
    this.pagedQuery = pagedQuery;
  }

  get paging(): Paging | null {
    return this.parameters.paging;
  }

  /**
   * Counts all matches and fetches the current page
   */
  async toPagedListAsync(): Promise<PagedList<T>> {
    const [totalCount, items] = await Promise.all([
      this.countQuery.countAsync(),
      this.pagedQuery.toListAsync(),
    ]);

    return {
      totalCount,
      items,
      page: this.paging ? this.paging.page : null,
      pageSize: this.paging ? this.paging.pageSize : null,
    };
  }
}

/**
 * Applies search parameters to a queryable
 */
export function withSearchParameters<T>(
  query: IQueryable<T>,
  parameters: SearchParameters,
  restrictions?: RestrictionsInput<T> | null,
  settings?: QuerySettings,
): PagedQueryable<T> {
  return new PagedQueryable<T>(query, parameters, restrictions, settings);
}
