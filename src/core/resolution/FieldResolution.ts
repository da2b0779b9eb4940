import { ModelSchema, PropertyDefinition } from '../model/ModelSchema';

export type UnresolvedReason = 'empty' | 'unknown';

/**
 * Outcome of resolving an incoming field name against a model.
 * An unresolved field is dropped by the compilers, never reported as an error.
 */
export type FieldResolution =
  | {
      resolved: true;
      /** Canonical dotted path on the target model */
      path: string;
      /** Definition of every path segment, outermost first */
      segments: readonly PropertyDefinition[];
    }
  | {
      resolved: false;
      fieldName: string;
      reason: UnresolvedReason;
    };

export type ResolvedField = Extract<FieldResolution, { resolved: true }>;

export function unresolvedField(fieldName: string, reason: UnresolvedReason): FieldResolution {
  return { resolved: false, fieldName, reason };
}

/**
 * Checks that a canonical path exists on the schema
 */
export function checkFieldPath(schema: ModelSchema<unknown>, path: string): FieldResolution {
  if (!path.trim()) return unresolvedField(path, 'empty');

  const segments = schema.resolvePath(path);
  if (!segments) return unresolvedField(path, 'unknown');

  return {
    resolved: true,
    path: segments.map(segment => segment.name).join('.'),
    segments,
  };
}
