import { getFieldName } from '../query/LambdaParser';
import { FieldReference } from '../query/Types';

type FieldList<T> = FieldReference<T> | readonly FieldReference<T>[];

function isFieldArray<T>(field: FieldList<T>): field is readonly FieldReference<T>[] {
  return Array.isArray(field);
}

interface RestrictionSet {
  allowed: Set<string> | null;
  blocked: Set<string>;
}

/**
 * Allow and block lists for filtering and sorting.
 *
 * A field is permitted when it is not blocked and either no allow list is configured
 * or the field is on it. Blocking always wins. Names are compared ignoring case.
 *
 * @example
 * const restrictions = new FieldRestrictions<Product>()
 *   .allowFiltering('name', p => p.category)
 *   .blockSorting(p => p.cost);
 */
export class FieldRestrictions<T = unknown> {
  private readonly filtering: RestrictionSet = { allowed: null, blocked: new Set() };
  private readonly sorting: RestrictionSet = { allowed: null, blocked: new Set() };

  allowFiltering(...fields: FieldList<T>[]): this {
    this.allow(this.filtering, fields);
    return this;
  }

  blockFiltering(...fields: FieldList<T>[]): this {
    this.block(this.filtering, fields);
    return this;
  }

  allowSorting(...fields: FieldList<T>[]): this {
    this.allow(this.sorting, fields);
    return this;
  }

  blockSorting(...fields: FieldList<T>[]): this {
    this.block(this.sorting, fields);
    return this;
  }

  /**
   * Checks a filter field. When the canonical path is given too, a block on either
   * name blocks and an allow on either name allows.
   */
  isFilterAllowed(fieldName: string, canonicalName?: string): boolean {
    return this.isAllowed(this.filtering, fieldName, canonicalName);
  }

  /**
   * Checks a sort field, with the same rules as isFilterAllowed
   */
  isSortAllowed(fieldName: string, canonicalName?: string): boolean {
    return this.isAllowed(this.sorting, fieldName, canonicalName);
  }

  /**
   * Keeps the filter fields that are permitted, in their original order
   */
  getAllowedFilterFields(fields: readonly string[]): string[] {
    return fields.filter(field => this.isFilterAllowed(field));
  }

  private allow(set: RestrictionSet, fields: FieldList<T>[]): void {
    const allowed = set.allowed ?? new Set<string>();
    for (const name of this.flatten(fields)) {
      allowed.add(name);
    }
    set.allowed = allowed;
  }

  private block(set: RestrictionSet, fields: FieldList<T>[]): void {
    for (const name of this.flatten(fields)) {
      set.blocked.add(name);
    }
  }

  private isAllowed(set: RestrictionSet, fieldName: string, canonicalName?: string): boolean {
    const names = [fieldName, canonicalName]
      .filter((name): name is string => name !== undefined)
      .map(name => name.toLowerCase());

    if (names.some(name => set.blocked.has(name))) return false;
    if (set.allowed === null) return true;

    const allowed = set.allowed;
    return names.some(name => allowed.has(name));
  }

  private flatten(fields: FieldList<T>[]): string[] {
    return fields
      .flatMap(field => (isFieldArray(field) ? [...field] : [field]))
      .map(field => getFieldName<T>(field).toLowerCase());
  }
}
