import { ArgumentError, QueryParseError } from '../core/errors';
import { FieldRestrictions } from '../core/restrictions/FieldRestrictions';
import { Sorting } from '../core/search/Sorting';
import { SortOrder } from '../core/search/SortOrder';
import { QuerySettings } from '../core/settings/QuerySettings';
import { ExpressionSerializer } from '../utils/ExpressionSerializer';
import { Product, productSchema } from './common/models';
import { createTestSettings, customers, ids, products } from './common/test-utils';

describe('Sorting', () => {
  let settings: QuerySettings;
  let logger: { debug: jest.Mock; warn: jest.Mock };

  beforeEach(() => {
    ({ settings, logger } = createTestSettings());
  });

  test('should order by the key', async () => {
    const sorting = new Sorting('price', SortOrder.Descending);

    expect(await ids(sorting.applyToQueryable(products(), { settings }))).toEqual([3, 1, 5, 2, 4]);
  });

  test('should break ties after an existing order', async () => {
    const ordered = products().orderBy(p => p.category);
    const sorting = new Sorting('Price', SortOrder.Descending);

    expect(await ids(sorting.thenApplyToQueryable(ordered, { settings }))).toEqual([4, 3, 1, 5, 2]);
  });

  test('should sort missing nested values first', async () => {
    const sorting = new Sorting('address.city');

    expect(await ids(sorting.applyToQueryable(customers(), { settings }))).toEqual([3, 4, 1, 2]);
  });

  test('should resolve external names', async () => {
    const sorting = new Sorting('displayName', SortOrder.Descending);

    expect(await ids(sorting.applyToQueryable(customers(), { settings }))).toEqual([4, 3, 2, 1]);
  });

  test('should skip unknown fields', () => {
    const query = products();

    expect(new Sorting('weight').applyToQueryable(query, { settings })).toBe(query);
    expect(logger.debug).toHaveBeenCalledWith("Sorting on 'weight' skipped: unknown field");
  });

  test('should skip restricted fields', () => {
    const restrictions = new FieldRestrictions<Product>().blockSorting('price');

    expect(new Sorting('price').compile(productSchema, { settings, restrictions })).toBeNull();
    expect(logger.debug).toHaveBeenCalledWith("Sorting on 'price' skipped: restricted");
  });

  test('should compile to an ordering on the canonical field', () => {
    const ordering = new Sorting('CREATEDAT', SortOrder.Descending).compile(productSchema, { settings });

    expect(ExpressionSerializer.serialize(ordering)).toEqual({
      type: 'Ordering',
      field: { type: 'Field', path: ['createdAt'], kind: 'date' },
      direction: 'DESC',
    });
  });

  test('should read a dictionary entry', () => {
    const sorting = Sorting.fromDictionary({ prop: ' Price ', ord: 'DESC' });

    expect(sorting.propertyName).toBe('Price');
    expect(sorting.sortOrder).toBe(SortOrder.Descending);
  });

  test('should reject malformed entries', () => {
    expect(() => Sorting.fromDictionary({ prop: 'price' })).toThrow('Invalid sorting: ord: ord is required');
    expect(() => Sorting.fromDictionary({ prop: 'price', ord: 'up' })).toThrow(QueryParseError);
    expect(() => Sorting.fromDictionary({ prop: '', ord: 'asc' })).toThrow(QueryParseError);
  });

  test('should build from a selector', () => {
    const sorting = Sorting.fromSelector<Product>(p => p.createdAt, SortOrder.Descending);

    expect(sorting.toDictionary()).toEqual({ prop: 'createdAt', ord: 'desc' });
    expect(sorting.toString()).toBe('createdAt desc');
  });

  test('should compare by name and order', () => {
    const sorting = new Sorting('price');

    expect(sorting.equals(new Sorting('price', SortOrder.Ascending))).toBe(true);
    expect(sorting.equals(new Sorting('price', SortOrder.Descending))).toBe(false);
    expect(sorting.equals(new Sorting('Price'))).toBe(false);
  });

  test('should reject an empty property name', () => {
    expect(() => new Sorting('  ')).toThrow(ArgumentError);
  });

  test('should reject a property name with surrounding whitespace', () => {
    expect(() => new Sorting(' price')).toThrow(ArgumentError);
    expect(() => new Sorting('price\n', SortOrder.Descending)).toThrow(
      'Sorting property name must not have surrounding whitespace',
    );
  });
});
