/**
 * Sort directions, valued by their wire codes
 */
export enum SortOrder {
  Ascending = 'asc',
  Descending = 'desc',
}
