import {
  DefaultFieldNameResolver,
  PassThroughFieldNameResolver,
  resolveField,
} from '../core/resolution/FieldNameResolver';
import { NamingPolicies } from '../core/naming/NamingPolicy';
import { QuerySettings } from '../core/settings/QuerySettings';
import { customerSchema, productSchema } from './common/models';

describe('DefaultFieldNameResolver', () => {
  afterEach(() => {
    QuerySettings.resetDefault();
  });

  test('should match property names ignoring case', () => {
    const resolver = new DefaultFieldNameResolver(new QuerySettings());

    expect(resolver.resolvePropertyName(productSchema, 'NAME')).toBe('name');
    expect(resolver.resolvePropertyName(productSchema, 'instock')).toBe('inStock');
  });

  test('should match external names when enabled', () => {
    const resolver = new DefaultFieldNameResolver(new QuerySettings());

    expect(resolver.resolvePropertyName(customerSchema, 'displayName')).toBe('fullName');
    expect(resolver.resolvePropertyName(customerSchema, 'DISPLAYNAME')).toBe('fullName');
    expect(resolver.resolvePropertyName(customerSchema, 'fullName')).toBe('fullName');
  });

  test('should ignore external names when disabled', () => {
    const resolver = new DefaultFieldNameResolver(new QuerySettings({ useExternalNames: false }));

    expect(resolver.resolvePropertyName(customerSchema, 'displayName')).toBe('displayName');
    expect(resolver.resolvePropertyName(customerSchema, 'fullName')).toBe('fullName');
  });

  test('should apply the naming policy to property names', () => {
    const resolver = new DefaultFieldNameResolver(
      new QuerySettings({ propertyNamingPolicy: NamingPolicies.snake_case_lower }),
    );

    expect(resolver.resolvePropertyName(productSchema, 'in_stock')).toBe('inStock');
    expect(resolver.resolvePropertyName(productSchema, 'CREATED_AT')).toBe('createdAt');
  });

  test('should resolve nested paths level by level', () => {
    const resolver = new DefaultFieldNameResolver(new QuerySettings());

    expect(resolver.resolvePropertyName(customerSchema, 'Address.City')).toBe('address.city');
    expect(resolver.resolvePropertyName(customerSchema, 'address.zip')).toBe('address.zip');
  });

  test('should return unknown names unchanged', () => {
    const resolver = new DefaultFieldNameResolver(new QuerySettings());

    expect(resolver.resolvePropertyName(productSchema, 'weight')).toBe('weight');
    expect(resolver.resolvePropertyName(productSchema, 'supplier.name')).toBe('supplier.name');
    expect(resolver.resolvePropertyName(productSchema, '')).toBe('');
  });

  test('should use the process-wide settings when none are given', () => {
    QuerySettings.configureDefault({ propertyNamingPolicy: NamingPolicies.kebab_case_lower });
    const resolver = new DefaultFieldNameResolver();

    expect(resolver.resolvePropertyName(productSchema, 'created-at')).toBe('createdAt');
  });
});

describe('resolveField', () => {
  const resolver = new DefaultFieldNameResolver(new QuerySettings());

  test('should return the canonical path and segments of an existing field', () => {
    const field = resolveField(resolver, customerSchema, 'ADDRESS.city');

    expect(field.resolved).toBe(true);
    if (field.resolved) {
      expect(field.path).toBe('address.city');
      expect(field.segments.map(segment => segment.name)).toEqual(['address', 'city']);
    }
  });

  test('should report unknown fields', () => {
    expect(resolveField(resolver, customerSchema, 'address.zip')).toEqual({
      resolved: false,
      fieldName: 'address.zip',
      reason: 'unknown',
    });
  });

  test('should not walk into scalar properties', () => {
    expect(resolveField(resolver, productSchema, 'name.first')).toEqual({
      resolved: false,
      fieldName: 'name.first',
      reason: 'unknown',
    });
  });

  test('should check paths on the schema', () => {
    expect(customerSchema.hasPath('address.city')).toBe(true);
    expect(customerSchema.hasPath('address.zip')).toBe(false);
  });

  test('should report blank names as empty', () => {
    expect(resolveField(resolver, productSchema, '   ')).toEqual({
      resolved: false,
      fieldName: '   ',
      reason: 'empty',
    });
  });

  test('should only accept canonical names with the pass-through resolver', () => {
    const passThrough = new PassThroughFieldNameResolver();

    expect(resolveField(passThrough, customerSchema, 'displayName').resolved).toBe(false);
    expect(resolveField(passThrough, customerSchema, 'FULLNAME')).toMatchObject({
      resolved: true,
      path: 'fullName',
    });
  });
});
