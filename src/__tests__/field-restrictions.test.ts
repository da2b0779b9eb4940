import { FieldRestrictions } from '../core/restrictions/FieldRestrictions';
import { Product } from './common/models';

describe('FieldRestrictions', () => {
  let restrictions: FieldRestrictions<Product>;

  beforeEach(() => {
    restrictions = new FieldRestrictions<Product>();
  });

  test('should allow everything when nothing is configured', () => {
    expect(restrictions.isFilterAllowed('anything')).toBe(true);
    expect(restrictions.isSortAllowed('anything')).toBe(true);
  });

  test('should block listed fields ignoring case', () => {
    restrictions.blockFiltering('secret');

    expect(restrictions.isFilterAllowed('SECRET')).toBe(false);
    expect(restrictions.isFilterAllowed('name')).toBe(true);
  });

  test('should only allow listed fields once an allow list exists', () => {
    restrictions.allowFiltering('name', p => p.category);

    expect(restrictions.isFilterAllowed('name')).toBe(true);
    expect(restrictions.isFilterAllowed('Category')).toBe(true);
    expect(restrictions.isFilterAllowed('price')).toBe(false);
  });

  test('should let a block win over an allow', () => {
    restrictions.allowFiltering('name').blockFiltering('name');

    expect(restrictions.isFilterAllowed('name')).toBe(false);
  });

  test('should keep filtering and sorting lists apart', () => {
    restrictions.blockSorting(p => p.price);

    expect(restrictions.isSortAllowed('price')).toBe(false);
    expect(restrictions.isFilterAllowed('price')).toBe(true);
  });

  test('should accept arrays of fields', () => {
    restrictions.allowSorting(['name', p => p.price]);

    expect(restrictions.isSortAllowed('price')).toBe(true);
    expect(restrictions.isSortAllowed('name')).toBe(true);
    expect(restrictions.isSortAllowed('category')).toBe(false);
  });

  test('should check the canonical name alongside the incoming one', () => {
    const blocked = new FieldRestrictions().blockFiltering('fullName');
    const allowed = new FieldRestrictions().allowFiltering('fullName');

    expect(blocked.isFilterAllowed('displayName', 'fullName')).toBe(false);
    expect(allowed.isFilterAllowed('displayName', 'fullName')).toBe(true);
    expect(allowed.isFilterAllowed('displayName')).toBe(false);
  });

  test('should keep the permitted filter fields in order', () => {
    restrictions.blockFiltering('secret');

    expect(restrictions.getAllowedFilterFields(['name', 'secret', 'Price'])).toEqual(['name', 'Price']);
  });

  test('should return the same fields when filtering the permitted list again', () => {
    restrictions.allowFiltering('name', 'price', 'secret').blockFiltering('secret');

    const once = restrictions.getAllowedFilterFields(['name', 'secret', 'Price', 'category']);

    expect(once).toEqual(['name', 'Price']);
    expect(restrictions.getAllowedFilterFields(once)).toEqual(once);
  });

  test('should match nested paths', () => {
    const nested = new FieldRestrictions().blockSorting('address.city');

    expect(nested.isSortAllowed('Address.City')).toBe(false);
    expect(nested.isSortAllowed('address.street')).toBe(true);
  });
});
