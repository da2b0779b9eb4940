import { ArgumentError, QueryParseError } from '../core/errors';
import { Paging, STARTING_PAGE } from '../core/search/Paging';
import { ids, products } from './common/test-utils';

describe('Paging', () => {
  test('should start counting pages at zero', () => {
    expect(STARTING_PAGE).toBe(0);
    expect(Paging.fromPageSize(0, 5).skip).toBe(0);
  });

  test('should compute the window of a page', () => {
    const paging = Paging.fromPageSize(2, 10);

    expect(paging.skip).toBe(20);
    expect(paging.take).toBe(10);
    expect(paging.page).toBe(2);
    expect(paging.pageSize).toBe(10);
  });

  test('should derive the page from skip and take', () => {
    expect(Paging.fromSkipTake(25, 10).page).toBe(2);
    expect(Paging.fromSkipTake(0, 0).page).toBe(0);
  });

  test('should reject invalid arguments', () => {
    expect(() => Paging.fromPageSize(-1, 5)).toThrow(ArgumentError);
    expect(() => Paging.fromPageSize(0, 0)).toThrow(ArgumentError);
    expect(() => Paging.fromPageSize(1.5, 10)).toThrow(ArgumentError);
    expect(() => Paging.fromSkipTake(-1, 10)).toThrow(ArgumentError);
    expect(() => Paging.fromSkipTake(0, -10)).toThrow(ArgumentError);
  });

  test('should move by whole pages', () => {
    const paging = Paging.fromPageSize(1, 10);

    expect(paging.next().skip).toBe(20);
    expect(paging.next(3).skip).toBe(40);
    expect(paging.previous().skip).toBe(0);
    expect(paging.previous(5).skip).toBe(0);
    expect(() => paging.next(1.5)).toThrow(ArgumentError);
  });

  test('should read the skip and take keys', () => {
    const paging = Paging.fromDictionary({ skip: '20', take: '10' });

    expect(paging?.equals(Paging.fromSkipTake(20, 10))).toBe(true);
    expect(Paging.fromDictionary({ skip: '20' })).toBeNull();
    expect(Paging.fromDictionary({})).toBeNull();
  });

  test('should reject malformed skip and take values', () => {
    expect(() => Paging.fromDictionary({ skip: 'abc', take: '10' })).toThrow(QueryParseError);
    expect(() => Paging.fromDictionary({ skip: 'abc', take: '10' })).toThrow(
      'Invalid paging: skip: must be an integer',
    );
    expect(() => Paging.fromDictionary({ skip: '99999999999999999999', take: '10' })).toThrow(
      'Invalid paging: skip: must be a safe integer',
    );
    expect(() => Paging.fromDictionary({ skip: '0', take: '9007199254740993' })).toThrow(QueryParseError);
    expect(() => Paging.fromDictionary({ skip: '-5', take: '10' })).toThrow(
      'skip must be an integer >= 0, got -5',
    );
  });

  test('should write and print the window', () => {
    const paging = Paging.fromSkipTake(20, 10);

    expect(paging.toDictionary()).toEqual({ skip: '20', take: '10' });
    expect(paging.toString()).toBe('Page 2 - Page size: 10');
    expect(paging.equals(null)).toBe(false);
  });

  test('should apply the window to a queryable', async () => {
    expect(await ids(Paging.fromPageSize(1, 2).applyToQueryable(products()))).toEqual([3, 4]);
    expect(await ids(Paging.fromPageSize(2, 2).applyToQueryable(products()))).toEqual([5]);
    expect(await ids(Paging.fromPageSize(5, 2).applyToQueryable(products()))).toEqual([]);
  });
});

describe('skip and take', () => {
  test('should narrow the current window', async () => {
    expect(await ids(products().skip(1).take(2))).toEqual([2, 3]);
    expect(await ids(products().take(4).skip(1))).toEqual([2, 3, 4]);
    expect(await ids(products().take(4).take(10))).toEqual([1, 2, 3, 4]);
  });

  test('should reject negative or fractional counts', () => {
    expect(() => products().take(-1)).toThrow(ArgumentError);
    expect(() => products().skip(1.5)).toThrow(ArgumentError);
  });
});
