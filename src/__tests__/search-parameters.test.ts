import { ArgumentError, QueryParseError } from '../core/errors';
import { FieldRestrictions } from '../core/restrictions/FieldRestrictions';
import { Filter } from '../core/search/Filter';
import { FilterOperator } from '../core/search/FilterOperator';
import { Paging } from '../core/search/Paging';
import { SearchParameters } from '../core/search/SearchParameters';
import { Sorting } from '../core/search/Sorting';
import { SortOrder } from '../core/search/SortOrder';
import { QuerySettings } from '../core/settings/QuerySettings';
import { dictionaryToQueryString } from '../utils/QueryStringHelpers';
import { Product } from './common/models';
import { createTestSettings, ids, products } from './common/test-utils';

describe('SearchParameters', () => {
  let settings: QuerySettings;

  beforeEach(() => {
    ({ settings } = createTestSettings());
  });

  describe('applyToQueryable', () => {
    test('should filter, order and page', async () => {
      const parameters = SearchParameters.fromDictionary({
        'filters[0][fields]': 'category',
        'filters[0][op]': 'eq',
        'filters[0][val]': 'Electronics',
        'sortings[0][prop]': 'price',
        'sortings[0][ord]': 'desc',
        skip: '0',
        take: '2',
      });

      const { countQuery, pagedQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await countQuery.countAsync()).toBe(3);
      expect(await ids(countQuery)).toEqual([3, 1, 5]);
      expect(await ids(pagedQuery)).toEqual([3, 1]);
    });

    test('should match a value across several fields', async () => {
      const parameters = SearchParameters.fromQueryString(
        'filters[0][fields]=name,description&filters[0][op]=contains&filters[0][val]=lap',
      );

      const { countQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await ids(countQuery)).toEqual([1, 3, 4]);
    });

    test('should order by several keys', async () => {
      const parameters = new SearchParameters(null, [], [
        new Sorting('category'),
        new Sorting('price', SortOrder.Descending),
      ]);

      const { pagedQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await ids(pagedQuery)).toEqual([4, 3, 1, 5, 2]);
    });

    test('should AND separate filters', async () => {
      const parameters = new SearchParameters(null, [
        new Filter(['category'], FilterOperator.Equals, 'Electronics'),
        new Filter(['price'], FilterOperator.LessThan, '1000'),
      ]);

      const { countQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await ids(countQuery)).toEqual([5]);
    });

    test('should ignore unknown fields', async () => {
      const parameters = new SearchParameters(
        null,
        [new Filter(['weight'], FilterOperator.GreaterThan, '1')],
        [new Sorting('weight'), new Sorting('price', SortOrder.Descending)],
      );

      const { countQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await ids(countQuery)).toEqual([3, 1, 5, 2, 4]);
    });

    test('should ignore restricted fields', async () => {
      const parameters = new SearchParameters(
        null,
        [new Filter(['secret'], FilterOperator.Equals, 'alpha')],
        [new Sorting('price', SortOrder.Descending)],
      );

      const { countQuery } = parameters.applyToQueryable(
        products(),
        restrictions => restrictions.blockFiltering('secret').blockSorting('price'),
        settings,
      );

      expect(await ids(countQuery)).toEqual([1, 2, 3, 4, 5]);
    });

    test('should return everything when the only filter names a field outside the allowed set', async () => {
      const parameters = new SearchParameters(null, [new Filter(['secret'], FilterOperator.Equals, 'alpha')]);

      const { countQuery } = parameters.applyToQueryable(
        products(),
        restrictions => restrictions.allowFiltering('name'),
        settings,
      );

      expect(await ids(countQuery)).toEqual([1, 2, 3, 4, 5]);
    });

    test('should accept prebuilt restrictions', async () => {
      const parameters = new SearchParameters(null, [new Filter(['name', 'secret'], FilterOperator.Equals, 'alpha')]);
      const restrictions = new FieldRestrictions<Product>().allowFiltering(p => p.name);

      const { countQuery } = parameters.applyToQueryable(products(), restrictions, settings);

      expect(await ids(countQuery)).toEqual([]);
    });

    test('should order by the first distinct sorting of a repeated key', async () => {
      const parameters = new SearchParameters(null, [], [
        new Sorting('inStock'),
        new Sorting('price', SortOrder.Descending),
        new Sorting('inStock', SortOrder.Descending),
      ]);

      const { pagedQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await ids(pagedQuery)).toEqual([3, 1, 5, 2, 4]);
    });

    test('should page within the count query', async () => {
      const parameters = new SearchParameters(Paging.fromPageSize(1, 2), [], [new Sorting('price')]);

      const { countQuery, pagedQuery } = parameters.applyToQueryable(products(), null, settings);
      const all = await ids(countQuery);
      const page = await ids(pagedQuery);

      expect(page).toEqual([5, 1]);
      expect(page.every(id => all.includes(id))).toBe(true);
    });

    test('should return the source query when there are no criteria', () => {
      const query = products();

      const { countQuery, pagedQuery } = new SearchParameters().applyToQueryable(query, null, settings);

      expect(countQuery).toBe(query);
      expect(pagedQuery).toBe(query);
    });

    test('should pass the settings to the filters', async () => {
      ({ settings } = createTestSettings({ stringComparison: 'ordinal' }));
      const parameters = new SearchParameters(null, [new Filter(['category'], FilterOperator.Equals, 'electronics')]);

      const { countQuery } = parameters.applyToQueryable(products(), null, settings);

      expect(await countQuery.countAsync()).toBe(0);
    });
  });

  describe('composition', () => {
    const nameFilter = new Filter(['name'], FilterOperator.Contains, 'lap');
    const priceFilter = new Filter(['price'], FilterOperator.GreaterThan, '100');
    const byPrice = new Sorting('price', SortOrder.Descending);
    const byName = new Sorting('name');

    test('should keep the left paging when merging', () => {
      const left = new SearchParameters(Paging.fromPageSize(0, 10), [nameFilter], [byPrice]);
      const right = new SearchParameters(Paging.fromPageSize(3, 5), [priceFilter], [byName]);

      const merged = left.merge(right);

      expect(merged.paging).toBe(left.paging);
      expect(merged.filters).toEqual([nameFilter, priceFilter]);
      expect(merged.sortings).toEqual([byPrice, byName]);
    });

    test('should take the right paging when the left has none', () => {
      const right = new SearchParameters(Paging.fromPageSize(3, 5));

      expect(new SearchParameters(null, [nameFilter]).merge(right).paging).toBe(right.paging);
    });

    test('should return new parameters from the with and add methods', () => {
      const empty = new SearchParameters();
      const paging = Paging.fromPageSize(1, 20);

      expect(empty.withPaging(paging).paging).toBe(paging);
      expect(empty.addFilters(nameFilter, priceFilter).filters).toEqual([nameFilter, priceFilter]);
      expect(empty.addSortings(byName).sortings).toEqual([byName]);
      expect(empty.paging).toBeNull();
      expect(empty.filters).toEqual([]);
      expect(empty.sortings).toEqual([]);
    });

    test('should keep the first sorting of each property name', () => {
      const parameters = new SearchParameters(null, [], [byPrice, byName, new Sorting('price')]);

      expect(parameters.getDistinctSortings().map(sorting => sorting.toString())).toEqual([
        'price desc',
        'name asc',
      ]);
    });
  });

  describe('wire format', () => {
    const parameters = new SearchParameters(
      Paging.fromSkipTake(10, 5),
      [
        new Filter(['name', 'description'], FilterOperator.Contains, 'lap'),
        new Filter(['category'], FilterOperator.Equals, 'Home', true),
      ],
      [new Sorting('price', SortOrder.Descending), new Sorting('name'), new Sorting('price')],
    );

    test('should write the dictionary', () => {
      expect(parameters.toDictionary()).toEqual({
        skip: '10',
        take: '5',
        'filters[0][fields]': 'name,description',
        'filters[0][op]': 'contains',
        'filters[0][val]': 'lap',
        'filters[1][fields]': 'category',
        'filters[1][op]': 'eq',
        'filters[1][val]': 'Home',
        'filters[1][case]': 'true',
        'sortings[0][prop]': 'price',
        'sortings[0][ord]': 'desc',
        'sortings[1][prop]': 'name',
        'sortings[1][ord]': 'asc',
      });
    });

    test('should read back what it writes', () => {
      expect(SearchParameters.fromDictionary(parameters.toDictionary()).equals(parameters)).toBe(true);
      expect(
        SearchParameters.fromQueryString(dictionaryToQueryString(parameters.toDictionary())).equals(parameters),
      ).toBe(true);
    });

    test('should read back values with commas and surrounding whitespace', () => {
      const written = new SearchParameters(
        Paging.fromSkipTake(0, 3),
        [new Filter(['name', 'category'], FilterOperator.Contains, ' lap, pro ')],
        [new Sorting('createdAt', SortOrder.Descending)],
      );

      expect(SearchParameters.fromDictionary(written.toDictionary()).equals(written)).toBe(true);
    });

    test('should refuse names that would not survive the dictionary', () => {
      expect(() => new Filter([' name'], FilterOperator.Equals, 'x')).toThrow(ArgumentError);
      expect(() => new Filter(['name,category'], FilterOperator.Equals, 'x')).toThrow(ArgumentError);
      expect(() => new Sorting('price ')).toThrow(ArgumentError);
    });

    test('should read entries in index order', () => {
      const read = SearchParameters.fromQueryString(
        '?filters%5B2%5D%5Bfields%5D=category&filters%5B2%5D%5Bop%5D=eq&filters%5B2%5D%5Bval%5D=Home' +
          '&filters[0][fields]=price&filters[0][op]=gt&filters[0][val]=10',
      );

      expect(read.filters.map(filter => filter.toString())).toEqual(['(price > 10)', '(category == Home)']);
      expect(read.paging).toBeNull();
    });

    test('should reject malformed entries', () => {
      expect(() => SearchParameters.fromDictionary({ 'filters[0][fields]': 'name' })).toThrow(QueryParseError);
      expect(() => SearchParameters.fromDictionary({ 'sortings[0][prop]': 'name', 'sortings[0][ord]': 'up' })).toThrow(
        QueryParseError,
      );
    });

    test('should print a summary', () => {
      expect(parameters.toString()).toBe(
        'Paging: Page 2 - Page size: 5; Sortings: price desc -> name asc; ' +
          'Filters: (name contains lap OR description contains lap) AND (category == Home)',
      );
      expect(new SearchParameters().toString()).toBe('Paging: none; Sortings: ; Filters: ');
    });

    test('should compare paging, filters and distinct sortings', () => {
      const same = new SearchParameters(parameters.paging, parameters.filters, parameters.getDistinctSortings());

      expect(parameters.equals(same)).toBe(true);
      expect(parameters.equals(same.withPaging(null))).toBe(false);
      expect(parameters.equals(same.addFilters(new Filter(['id'], FilterOperator.IsNull)))).toBe(false);
    });
  });
});
