import { IOrderedQueryable, IQueryable } from '../query/Types';
import { FieldRestrictions } from '../restrictions/FieldRestrictions';
import { QuerySettings } from '../settings/QuerySettings';
import {
  QueryDictionary,
  mergeListOfQueryStrings,
  queryStringToDictionary,
  splitQueryStringInList,
} from '../../utils/QueryStringHelpers';
import { CompileOptions } from './CompileOptions';
import { Filter } from './Filter';
import { Paging } from './Paging';
import { Sorting } from './Sorting';

/**
 * Restrictions given directly or configured through a callback
 */
export type RestrictionsInput<T> = FieldRestrictions<T> | ((restrictions: FieldRestrictions<T>) => void);

/**
 * The two derivatives produced by applying search parameters
 */
export interface SearchQueries<T> {
  /** Filtered and ordered, not paged */
  countQuery: IQueryable<T>;
  /** countQuery with the page window applied */
  pagedQuery: IQueryable<T>;
}

const FILTERS_KEY = 'filters';
const SORTINGS_KEY = 'sortings';

/**
 * Filters, sortings and optional paging of one request
 */
export class SearchParameters {
  readonly filters: readonly Filter[];
  readonly sortings: readonly Sorting[];

  constructor(
    readonly paging: Paging | null = null,
    filters: readonly Filter[] = [],
    sortings: readonly Sorting[] = [],
  ) {
    this.filters = [...filters];
    this.sortings = [...sortings];
  }

  static fromDictionary(dictionary: Readonly<Record<string, string | undefined>>): SearchParameters {
    return new SearchParameters(
      Paging.fromDictionary(dictionary),
      splitQueryStringInList(dictionary, FILTERS_KEY).map(entry => Filter.fromDictionary(entry)),
      splitQueryStringInList(dictionary, SORTINGS_KEY).map(entry => Sorting.fromDictionary(entry)),
    );
  }

  static fromQueryString(query: string | URLSearchParams): SearchParameters {
    return SearchParameters.fromDictionary(queryStringToDictionary(query));
  }

  withPaging(paging: Paging | null): SearchParameters {
    return new SearchParameters(paging, this.filters, this.sortings);
  }

  addFilters(...filters: Filter[]): SearchParameters {
    return new SearchParameters(this.paging, [...this.filters, ...filters], this.sortings);
  }

  addSortings(...sortings: Sorting[]): SearchParameters {
    return new SearchParameters(this.paging, this.filters, [...this.sortings, ...sortings]);
  }

  /**
   * Sortings with repeated property names removed; the first occurrence wins
   */
  getDistinctSortings(): Sorting[] {
    const seen = new Set<string>();
    return this.sortings.filter(sorting => {
      if (seen.has(sorting.propertyName)) return false;
      seen.add(sorting.propertyName);
      return true;
    });
  }

  /**
   * Combines two parameter sets: this paging wins when set, lists are concatenated
   */
  merge(other: SearchParameters): SearchParameters {
    return new SearchParameters(
      this.paging ?? other.paging,
      [...this.filters, ...other.filters],
      [...this.sortings, ...other.sortings],
    );
  }

  /**
   * Applies filters, then ordering, then paging.
   * The count query is taken before paging; neither query is executed here.
   */
  applyToQueryable<T>(
    query: IQueryable<T>,
    restrictions?: RestrictionsInput<T> | null,
    settings?: QuerySettings,
  ): SearchQueries<T> {
    const options: CompileOptions = {
      restrictions: this.toRestrictions(restrictions),
      settings,
    };

    let filtered = query;
    for (const filter of this.filters) {
      filtered = filter.applyToQueryable(filtered, options);
    }

    let ordered: IOrderedQueryable<T> | null = null;
    for (const sorting of this.getDistinctSortings()) {
      const ordering = sorting.compile(query.schema, options);
      if (!ordering) continue;

      ordered = ordered ? ordered.thenBy(ordering) : filtered.orderBy(ordering);
    }

    const countQuery = ordered ?? filtered;
    const pagedQuery = this.paging ? this.paging.applyToQueryable(countQuery) : countQuery;

    return { countQuery, pagedQuery };
  }

  /**
   * Writes the wire dictionary. Repeated sortings are written once.
   */
  toDictionary(): QueryDictionary {
    return {
      ...(this.paging ? this.paging.toDictionary() : {}),
      ...mergeListOfQueryStrings(
        FILTERS_KEY,
        this.filters.map(filter => filter.toDictionary()),
      ),
      ...mergeListOfQueryStrings(
        SORTINGS_KEY,
        this.getDistinctSortings().map(sorting => sorting.toDictionary()),
      ),
    };
  }

  /**
   * Same paging, same filters in order, and the same distinct sortings in order
   */
  equals(other: SearchParameters): boolean {
    const pagingEquals = this.paging ? this.paging.equals(other.paging) : other.paging === null;
    const sortings = this.getDistinctSortings();
    const otherSortings = other.getDistinctSortings();

    return (
      pagingEquals &&
      this.filters.length === other.filters.length &&
      this.filters.every((filter, index) => filter.equals(other.filters[index])) &&
      sortings.length === otherSortings.length &&
      sortings.every((sorting, index) => sorting.equals(otherSortings[index]))
    );
  }

  toString(): string {
    const paging = this.paging ? this.paging.toString() : 'none';
    const sortings = this.getDistinctSortings().map(sorting => sorting.toString()).join(' -> ');
    const filters = this.filters.map(filter => filter.toString()).join(' AND ');
    return `Paging: ${paging}; Sortings: ${sortings}; Filters: ${filters}`;
  }

  private toRestrictions<T>(input: RestrictionsInput<T> | null | undefined): FieldRestrictions<T> | null {
    if (!input) return null;
    if (input instanceof FieldRestrictions) return input;

    const restrictions = new FieldRestrictions<T>();
    input(restrictions);
    return restrictions;
  }
}
