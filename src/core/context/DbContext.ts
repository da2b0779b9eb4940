import { ModelSchema } from '../model/ModelSchema';
import { Queryable } from '../query/Queryable';
import { IDatabaseProvider } from '../query/Types';

/**
 * Entry point for provider-backed queries.
 * Hands out queryables for the registered model schemas.
 */
export class DbContext {
  private readonly schemas: Map<string, ModelSchema<unknown>> = new Map();

  /**
   * Creates a new data context
   */
  constructor(private readonly provider: IDatabaseProvider) {}

  /**
   * Creates a queryable over the source described by the schema
   * @param schema The model schema; its name is the source name passed to the provider
   */
  set<T>(schema: ModelSchema<T>): Queryable<T> {
    const registered = this.schemas.get(schema.getName());
    if (registered && registered !== schema) {
      throw new Error(`Another schema is already registered as "${schema.getName()}"`);
    }
    this.schemas.set(schema.getName(), schema);

    return new Queryable<T>(this.provider, schema);
  }
}
