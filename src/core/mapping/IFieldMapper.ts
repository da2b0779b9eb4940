import { FieldResolution } from '../resolution/FieldResolution';

/**
 * Converts a raw wire value into the value compared against the entity field.
 * Returning undefined means "no value": the filter leaf then matches nothing.
 */
export type ValueTransformer = (value: string | null) => unknown;

/**
 * Translates DTO-facing field names and values to entity-facing ones
 */
export interface IFieldMapper {
  /**
   * Resolves a DTO field name to a canonical entity path
   */
  resolveToEntityField(fieldName: string): FieldResolution;

  /**
   * Whether a value transformer is registered for the field
   */
  hasTransform(fieldName: string): boolean;

  /**
   * Applies the registered transformer, or returns the raw value unchanged
   */
  transformValue(fieldName: string, rawValue: string | null): unknown;

  /**
   * Lists the DTO fields and custom-mapped names, deduplicated ignoring case
   */
  getMappedFields(): string[];
}
