import { ArgumentError } from '../errors';

/**
 * Value kind of a model property, used to parse filter values and to pick a comparison
 */
export enum PropertyKind {
  String = 'string',
  Number = 'number',
  Boolean = 'boolean',
  Date = 'date',
  Object = 'object',
  Unknown = 'unknown',
}

/**
 * Describes a single property of a model type
 */
export interface PropertyDefinition {
  /** Canonical property name, as it appears on the model objects */
  readonly name: string;
  /** Value kind of the property */
  readonly kind: PropertyKind;
  /** External (wire) name that overrides the canonical one when matching */
  readonly externalName?: string;
  /** Schema of the nested model for object properties */
  readonly schema?: ModelSchema<unknown>;
}

export interface PropertyOptions {
  externalName?: string;
}

/**
 * Prebuilt registry of the properties of a model type.
 * Field names are always matched case-insensitively.
 */
export class ModelSchema<T> {
  private readonly byName: Map<string, PropertyDefinition>;

  constructor(
    private readonly name: string,
    private readonly properties: readonly PropertyDefinition[],
  ) {
    this.byName = new Map();
    for (const property of properties) {
      const key = property.name.toLowerCase();
      if (this.byName.has(key)) {
        throw new ArgumentError(`Property '${property.name}' is declared twice on ${name}`);
      }
      this.byName.set(key, property);
    }
  }

  /**
   * Gets the model name
   */
  getName(): string {
    return this.name;
  }

  /**
   * Gets the declared properties, in declaration order
   */
  getProperties(): readonly PropertyDefinition[] {
    return this.properties;
  }

  /**
   * Finds a property by its canonical name, ignoring case
   */
  findProperty(propertyName: string): PropertyDefinition | undefined {
    return this.byName.get(propertyName.toLowerCase());
  }

  /**
   * Walks a dotted path through nested schemas.
   * Returns the definition of every segment, or null when any segment is missing.
   */
  resolvePath(path: string): PropertyDefinition[] | null {
    if (!path) return null;

    const segments: PropertyDefinition[] = [];
    let current: ModelSchema<unknown> | undefined = this;

    for (const part of path.split('.')) {
      if (!current) return null;

      const property: PropertyDefinition | undefined = current.findProperty(part);
      if (!property) return null;

      segments.push(property);
      current = property.kind === PropertyKind.Object ? property.schema : undefined;
    }

    return segments;
  }

  /**
   * Checks that a dotted path exists on this model
   */
  hasPath(path: string): boolean {
    return this.resolvePath(path) !== null;
  }
}

/**
 * Fluent builder for model schemas
 *
 * @example
 * const addressSchema = defineModel<Address>('Address')
 *   .property('city', PropertyKind.String)
 *   .build();
 *
 * const customerSchema = defineModel<Customer>('Customer')
 *   .property('name', PropertyKind.String, { externalName: 'full_name' })
 *   .nested('address', addressSchema)
 *   .build();
 */
export class ModelSchemaBuilder<T> {
  private readonly properties: PropertyDefinition[] = [];

  constructor(private readonly name: string) {}

  /**
   * Declares a scalar property
   */
  property<K extends keyof T & string>(
    propertyName: K,
    kind: PropertyKind,
    options: PropertyOptions = {},
  ): ModelSchemaBuilder<T> {
    if (kind === PropertyKind.Object) {
      throw new ArgumentError(`Use nested() to declare object property '${propertyName}'`);
    }
    this.properties.push({ name: propertyName, kind, externalName: options.externalName });
    return this;
  }

  /**
   * Declares an object property described by its own schema
   */
  nested<K extends keyof T & string>(
    propertyName: K,
    schema: ModelSchema<NonNullable<T[K]>>,
    options: PropertyOptions = {},
  ): ModelSchemaBuilder<T> {
    this.properties.push({
      name: propertyName,
      kind: PropertyKind.Object,
      externalName: options.externalName,
      schema,
    });
    return this;
  }

  build(): ModelSchema<T> {
    return new ModelSchema<T>(this.name, [...this.properties]);
  }
}

/**
 * Starts the definition of a model schema
 */
export function defineModel<T>(name: string): ModelSchemaBuilder<T> {
  return new ModelSchemaBuilder<T>(name);
}
