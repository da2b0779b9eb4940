import { ArgumentError } from '../core/errors';
import { FieldMapper } from '../core/mapping/FieldMapper';
import { Filter } from '../core/search/Filter';
import { FilterOperator } from '../core/search/FilterOperator';
import { Sorting } from '../core/search/Sorting';
import { SortOrder } from '../core/search/SortOrder';
import { QuerySettings } from '../core/settings/QuerySettings';
import { Customer, CustomerDto, customerDtoSchema, customerSchema } from './common/models';
import { createTestSettings, customers, ids } from './common/test-utils';

describe('FieldMapper', () => {
  let settings: QuerySettings;
  let logger: { debug: jest.Mock; warn: jest.Mock };
  let mapper: FieldMapper<CustomerDto, Customer>;

  beforeEach(() => {
    ({ settings, logger } = createTestSettings());
    mapper = new FieldMapper(customerDtoSchema, customerSchema, settings)
      .map('name', 'fullName')
      .map('city', 'address.city')
      .mapWithTransform(dto => dto.vip, entity => entity.isVip, value => value === 'yes');
  });

  test('should resolve custom mappings ignoring case', () => {
    expect(mapper.resolveToEntityField('name')).toMatchObject({ resolved: true, path: 'fullName' });
    expect(mapper.resolveToEntityField('NAME')).toMatchObject({ resolved: true, path: 'fullName' });
    expect(mapper.resolveToEntityField('City')).toMatchObject({ resolved: true, path: 'address.city' });
  });

  test('should fall back to fields with the same name on both models', () => {
    expect(mapper.resolveToEntityField('email')).toMatchObject({ resolved: true, path: 'email' });
    expect(mapper.resolveToEntityField('ID')).toMatchObject({ resolved: true, path: 'id' });
  });

  test('should report fields that exist on neither model', () => {
    expect(mapper.resolveToEntityField('nickname')).toEqual({
      resolved: false,
      fieldName: 'nickname',
      reason: 'unknown',
    });
    expect(mapper.resolveToEntityField('')).toEqual({ resolved: false, fieldName: '', reason: 'empty' });
  });

  test('should reject mappings to missing entity fields', () => {
    expect(() => mapper.map('name', 'nickname')).toThrow(ArgumentError);
    expect(() => mapper.map('name', 'nickname')).toThrow("Field 'nickname' does not exist on Customer");
  });

  test('should reject mappings from an empty DTO field', () => {
    expect(() => mapper.map(' ', 'email')).toThrow(ArgumentError);
    expect(() => mapper.withTransform('', value => value)).toThrow(ArgumentError);
  });

  test('should transform values of fields with a transformer', () => {
    expect(mapper.hasTransform('vip')).toBe(true);
    expect(mapper.hasTransform('VIP')).toBe(true);
    expect(mapper.hasTransform('name')).toBe(false);

    expect(mapper.transformValue('vip', 'yes')).toBe(true);
    expect(mapper.transformValue('vip', 'no')).toBe(false);
    expect(mapper.transformValue('name', 'Alice')).toBe('Alice');
  });

  test('should log and ignore a failing transformer', () => {
    const failure = new Error('not a number');
    mapper.withTransform('id', () => {
      throw failure;
    });

    expect(mapper.transformValue('id', 'abc')).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      "Value transformer for field 'id' failed; the value is ignored",
      failure,
    );
  });

  test('should list DTO and custom fields once', () => {
    mapper.map('town', 'address.city');

    expect(mapper.getMappedFields()).toEqual(['id', 'name', 'email', 'city', 'vip', 'town']);
  });

  test('should filter on mapped nested fields', async () => {
    const filter = new Filter(['city'], FilterOperator.Equals, 'lisbon').withMapper(mapper);

    expect(await ids(filter.applyToQueryable(customers(), { settings }))).toEqual([1]);
  });

  test('should filter with transformed values', async () => {
    const filter = new Filter(['vip'], FilterOperator.Equals, 'yes').withMapper(mapper);

    expect(await ids(filter.applyToQueryable(customers(), { settings }))).toEqual([1, 3]);
  });

  test('should match nothing when the transformer fails', async () => {
    mapper.withTransform('id', () => {
      throw new Error('not a number');
    });
    const filter = new Filter(['id'], FilterOperator.Equals, '1').withMapper(mapper);

    expect(await ids(filter.applyToQueryable(customers(), { settings }))).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('should sort on mapped fields', async () => {
    const sorting = new Sorting('name', SortOrder.Descending).withMapper(mapper);

    expect(await ids(sorting.applyToQueryable(customers(), { settings }))).toEqual([4, 3, 2, 1]);
  });
});
