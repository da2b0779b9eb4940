import { ModelSchema, PropertyDefinition, PropertyKind } from '../model/ModelSchema';
import { QuerySettings } from '../settings/QuerySettings';
import { FieldResolution, checkFieldPath, unresolvedField } from './FieldResolution';

/**
 * Resolves incoming field names to canonical property paths of a model
 */
export interface IFieldNameResolver {
  /**
   * Returns the canonical dotted path for the incoming name.
   * Fragments that match nothing are returned unchanged.
   */
  resolvePropertyName(schema: ModelSchema<unknown>, fieldName: string): string;
}

/**
 * Matches each path level against, in order: the external name (when enabled),
 * the property name ignoring case, and the naming policy applied to every property name.
 */
export class DefaultFieldNameResolver implements IFieldNameResolver {
  constructor(private readonly settings?: QuerySettings) {}

  resolvePropertyName(schema: ModelSchema<unknown>, fieldName: string): string {
    if (!fieldName) return fieldName;

    const dot = fieldName.indexOf('.');
    const head = dot === -1 ? fieldName : fieldName.slice(0, dot);
    const tail = dot === -1 ? null : fieldName.slice(dot + 1);

    const property = this.resolveSingle(schema, head);
    if (!property) {
      return fieldName;
    }
    if (tail === null) {
      return property.name;
    }

    const nested = property.kind === PropertyKind.Object ? property.schema : undefined;
    return `${property.name}.${nested ? this.resolvePropertyName(nested, tail) : tail}`;
  }

  private resolveSingle(schema: ModelSchema<unknown>, fragment: string): PropertyDefinition | undefined {
    const settings = this.settings ?? QuerySettings.default;
    const wanted = fragment.toLowerCase();
    const properties = schema.getProperties();

    if (settings.useExternalNames) {
      const byExternalName = properties.find(
        property => property.externalName !== undefined && property.externalName.toLowerCase() === wanted,
      );
      if (byExternalName) return byExternalName;
    }

    const direct = schema.findProperty(fragment);
    if (direct) return direct;

    const policy = settings.propertyNamingPolicy;
    if (policy) {
      return properties.find(property => policy(property.name).toLowerCase() === wanted);
    }

    return undefined;
  }
}

/**
 * Leaves names untouched; only exact (case-insensitive) property paths resolve
 */
export class PassThroughFieldNameResolver implements IFieldNameResolver {
  resolvePropertyName(_schema: ModelSchema<unknown>, fieldName: string): string {
    return fieldName;
  }
}

/**
 * Resolves an incoming name and checks that the result exists on the schema
 */
export function resolveField(
  resolver: IFieldNameResolver,
  schema: ModelSchema<unknown>,
  fieldName: string,
): FieldResolution {
  if (!fieldName.trim()) return unresolvedField(fieldName, 'empty');

  const resolved = checkFieldPath(schema, resolver.resolvePropertyName(schema, fieldName));
  return resolved.resolved ? resolved : unresolvedField(fieldName, 'unknown');
}
