import { ArgumentError } from '../errors';
import { IQueryable } from '../query/Types';
import { QueryDictionary } from '../../utils/QueryStringHelpers';
import { pagingEntrySchema, parseEntry } from './validation';

/**
 * Number of the first page. Pages are numbered from zero.
 */
export const STARTING_PAGE = 0;

/**
 * A skip/take window, navigable by whole pages
 */
export class Paging {
  private constructor(
    readonly skip: number,
    readonly take: number,
  ) {}

  /**
   * Creates the window of a page
   * @param page Page number, starting at STARTING_PAGE
   * @param pageSize Elements per page, at least 1
   */
  static fromPageSize(page: number, pageSize: number): Paging {
    if (!Number.isInteger(page) || page < STARTING_PAGE) {
      throw new ArgumentError(`page must be an integer >= ${STARTING_PAGE}, got ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ArgumentError(`pageSize must be an integer >= 1, got ${pageSize}`);
    }
    return new Paging((page - STARTING_PAGE) * pageSize, pageSize);
  }

  static fromSkipTake(skip: number, take: number): Paging {
    if (!Number.isInteger(skip) || skip < 0) {
      throw new ArgumentError(`skip must be an integer >= 0, got ${skip}`);
    }
    if (!Number.isInteger(take) || take < 0) {
      throw new ArgumentError(`take must be an integer >= 0, got ${take}`);
    }
    return new Paging(skip, take);
  }

  /**
   * Reads the `skip` and `take` keys; returns null when either is absent
   */
  static fromDictionary(dictionary: Readonly<Record<string, string | undefined>>): Paging | null {
    if (dictionary.skip === undefined || dictionary.take === undefined) {
      return null;
    }

    const parsed = parseEntry(
      pagingEntrySchema,
      { skip: dictionary.skip, take: dictionary.take },
      'paging',
    );
    return Paging.fromSkipTake(parsed.skip, parsed.take);
  }

  get page(): number {
    return this.take > 0 ? Math.floor(this.skip / this.take) + STARTING_PAGE : STARTING_PAGE;
  }

  get pageSize(): number {
    return this.take;
  }

  /**
   * Moves forward by whole pages
   */
  next(pages: number = 1): Paging {
    return this.shift(pages);
  }

  /**
   * Moves back by whole pages, stopping at the first element
   */
  previous(pages: number = 1): Paging {
    return this.shift(-pages);
  }

  applyToQueryable<T>(query: IQueryable<T>): IQueryable<T> {
    return query.skip(this.skip).take(this.take);
  }

  toDictionary(): QueryDictionary {
    return { skip: String(this.skip), take: String(this.take) };
  }

  equals(other: Paging | null): boolean {
    return other !== null && this.skip === other.skip && this.take === other.take;
  }

  toString(): string {
    return `Page ${this.page} - Page size: ${this.pageSize}`;
  }

  private shift(pages: number): Paging {
    if (!Number.isInteger(pages)) {
      throw new ArgumentError(`pages must be an integer, got ${pages}`);
    }
    return new Paging(Math.max(0, this.skip + this.take * pages), this.take);
  }
}
