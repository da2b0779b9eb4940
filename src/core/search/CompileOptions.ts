import { IFieldNameResolver } from '../resolution/FieldNameResolver';
import { FieldRestrictions } from '../restrictions/FieldRestrictions';
import { QuerySettings } from '../settings/QuerySettings';

/**
 * Collaborators used when compiling filters and sortings
 */
export interface CompileOptions {
  /** Allow and block lists; everything is permitted when absent */
  restrictions?: FieldRestrictions<unknown> | null;
  /** Defaults to QuerySettings.default */
  settings?: QuerySettings;
  /** Defaults to a DefaultFieldNameResolver over the settings */
  resolver?: IFieldNameResolver;
}
