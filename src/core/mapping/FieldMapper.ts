import { ModelSchema } from '../model/ModelSchema';
import { ArgumentError } from '../errors';
import { QuerySettings } from '../settings/QuerySettings';
import { DefaultFieldNameResolver, IFieldNameResolver } from '../resolution/FieldNameResolver';
import { FieldResolution, checkFieldPath, unresolvedField } from '../resolution/FieldResolution';
import { getFieldName } from '../query/LambdaParser';
import { FieldReference } from '../query/Types';
import { IFieldMapper, ValueTransformer } from './IFieldMapper';

interface CustomMapping {
  dtoField: string;
  entityPath: string;
}

/**
 * Maps the fields of a DTO exposed to clients onto the fields of the queried entity.
 *
 * Resolution order: custom mapping, then a one-to-one match through the field name
 * resolver, then an existence check on the entity (nested paths included).
 *
 * @example
 * const mapper = new FieldMapper(customerDtoSchema, customerSchema)
 *   .map(dto => dto.city, entity => entity.address.city)
 *   .withTransform('isVip', value => value === 'yes');
 */
export class FieldMapper<TDto, TEntity> implements IFieldMapper {
  private readonly customMappings: Map<string, CustomMapping> = new Map();
  private readonly transformers: Map<string, ValueTransformer> = new Map();
  private readonly resolver: IFieldNameResolver;

  constructor(
    private readonly dtoSchema: ModelSchema<TDto>,
    private readonly entitySchema: ModelSchema<TEntity>,
    private readonly settings?: QuerySettings,
    resolver?: IFieldNameResolver,
  ) {
    this.resolver = resolver ?? new DefaultFieldNameResolver(settings);
  }

  /**
   * Maps a DTO field onto an entity field. The entity field must exist.
   */
  map(dtoField: FieldReference<TDto>, entityField: FieldReference<TEntity>): this {
    const dtoName = getFieldName(dtoField);
    const entityName = getFieldName(entityField);

    if (!dtoName.trim()) {
      throw new ArgumentError('DTO field name must not be empty');
    }

    const entity = checkFieldPath(
      this.entitySchema,
      this.resolver.resolvePropertyName(this.entitySchema, entityName),
    );
    if (!entity.resolved) {
      throw new ArgumentError(
        `Field '${entityName}' does not exist on ${this.entitySchema.getName()}`,
      );
    }

    this.customMappings.set(dtoName.toLowerCase(), { dtoField: dtoName, entityPath: entity.path });
    return this;
  }

  /**
   * Maps a DTO field onto an entity field and converts its filter values
   */
  mapWithTransform(
    dtoField: FieldReference<TDto>,
    entityField: FieldReference<TEntity>,
    transform: ValueTransformer,
  ): this {
    this.map(dtoField, entityField);
    return this.withTransform(dtoField, transform);
  }

  /**
   * Converts the filter values of a DTO field
   */
  withTransform(dtoField: FieldReference<TDto>, transform: ValueTransformer): this {
    const dtoName = getFieldName(dtoField);
    if (!dtoName.trim()) {
      throw new ArgumentError('DTO field name must not be empty');
    }

    this.transformers.set(dtoName.toLowerCase(), transform);
    return this;
  }

  resolveToEntityField(fieldName: string): FieldResolution {
    if (!fieldName.trim()) return unresolvedField(fieldName, 'empty');

    const direct = this.customMappings.get(fieldName.toLowerCase());
    if (direct) return this.checkEntityPath(fieldName, direct.entityPath);

    const dtoName = this.resolver.resolvePropertyName(this.dtoSchema, fieldName);
    const mapped = this.customMappings.get(dtoName.toLowerCase());
    if (mapped) return this.checkEntityPath(fieldName, mapped.entityPath);

    const entityName = this.resolver.resolvePropertyName(this.entitySchema, dtoName);
    return this.checkEntityPath(fieldName, entityName);
  }

  hasTransform(fieldName: string): boolean {
    return this.findTransformer(fieldName) !== undefined;
  }

  transformValue(fieldName: string, rawValue: string | null): unknown {
    const transform = this.findTransformer(fieldName);
    if (!transform) return rawValue;

    try {
      return transform(rawValue);
    } catch (error) {
      const logger = (this.settings ?? QuerySettings.default).logger;
      logger.warn(`Value transformer for field '${fieldName}' failed; the value is ignored`, error);
      return undefined;
    }
  }

  getMappedFields(): string[] {
    const seen = new Set<string>();
    const fields: string[] = [];

    const names = [
      ...this.dtoSchema.getProperties().map(property => property.name),
      ...[...this.customMappings.values()].map(mapping => mapping.dtoField),
    ];

    for (const name of names) {
      const key = name.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        fields.push(name);
      }
    }

    return fields;
  }

  private findTransformer(fieldName: string): ValueTransformer | undefined {
    const direct = this.transformers.get(fieldName.toLowerCase());
    if (direct) return direct;

    const dtoName = this.resolver.resolvePropertyName(this.dtoSchema, fieldName);
    return this.transformers.get(dtoName.toLowerCase());
  }

  private checkEntityPath(fieldName: string, entityPath: string): FieldResolution {
    const resolution = checkFieldPath(this.entitySchema, entityPath);
    return resolution.resolved ? resolution : unresolvedField(fieldName, 'unknown');
  }
}
