import { z } from 'zod';
import { Expression } from '../expressions/Expression';
import { ConfigurationError } from '../errors';
import { NAMING_POLICY_NAMES, NamingPolicies, NamingPolicy } from '../naming/NamingPolicy';

/**
 * Default string comparison for filters that do not force case sensitivity
 */
export type StringComparison = 'ordinal' | 'ordinalIgnoreCase';

/**
 * Builds a backend-native pattern match (LIKE) of a field against an escaped pattern
 */
export type PatternMatchBuilder = (field: Expression, pattern: string) => Expression;

/**
 * Minimal logger surface, satisfied by the global console
 */
export interface QueryLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export interface QuerySettingsInit {
  propertyNamingPolicy?: NamingPolicy | null;
  useExternalNames?: boolean;
  stringComparison?: StringComparison;
  useBackendPatternMatch?: boolean;
  patternMatchBuilder?: PatternMatchBuilder | null;
  logger?: QueryLogger;
}

const settingsOptionsSchema = z
  .object({
    propertyNamingPolicy: z.enum(NAMING_POLICY_NAMES).nullable().optional(),
    useExternalNames: z.boolean().optional(),
    stringComparison: z.enum(['ordinal', 'ordinalIgnoreCase']).optional(),
    useBackendPatternMatch: z.boolean().optional(),
  })
  .strict();

export type QuerySettingsOptions = z.infer<typeof settingsOptionsSchema>;

/**
 * Settings shared by field resolution and filter compilation
 */
export class QuerySettings {
  private static defaultSettings: QuerySettings = new QuerySettings();

  readonly propertyNamingPolicy: NamingPolicy | null;
  readonly useExternalNames: boolean;
  readonly stringComparison: StringComparison;
  readonly useBackendPatternMatch: boolean;
  readonly patternMatchBuilder: PatternMatchBuilder | null;
  readonly logger: QueryLogger;

  constructor(init: QuerySettingsInit = {}) {
    this.propertyNamingPolicy = init.propertyNamingPolicy ?? null;
    this.useExternalNames = init.useExternalNames ?? true;
    this.stringComparison = init.stringComparison ?? 'ordinalIgnoreCase';
    this.useBackendPatternMatch = init.useBackendPatternMatch ?? true;
    this.patternMatchBuilder = init.patternMatchBuilder ?? null;
    this.logger = init.logger ?? console;
  }

  /**
   * Process-wide settings used when none are passed explicitly
   */
  static get default(): QuerySettings {
    return QuerySettings.defaultSettings;
  }

  /**
   * Replaces the process-wide settings. Call once at startup.
   */
  static configureDefault(settings: QuerySettings | QuerySettingsInit): QuerySettings {
    QuerySettings.defaultSettings =
      settings instanceof QuerySettings ? settings : new QuerySettings(settings);
    return QuerySettings.defaultSettings;
  }

  /**
   * Restores the built-in defaults
   */
  static resetDefault(): void {
    QuerySettings.defaultSettings = new QuerySettings();
  }

  /**
   * Builds settings from untyped options (parsed JSON, environment).
   * Functions such as the pattern match builder and the logger are passed separately.
   */
  static fromOptions(
    options: unknown,
    extras: Pick<QuerySettingsInit, 'patternMatchBuilder' | 'logger'> = {},
  ): QuerySettings {
    const parsed = settingsOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
      throw new ConfigurationError('Invalid query settings', parsed.error.issues);
    }

    const { propertyNamingPolicy, ...rest } = parsed.data;
    return new QuerySettings({
      ...rest,
      ...extras,
      propertyNamingPolicy: propertyNamingPolicy ? NamingPolicies[propertyNamingPolicy] : null,
    });
  }

  /**
   * Whether text comparisons ignore case unless a filter forces case sensitivity
   */
  get ignoreCase(): boolean {
    return this.stringComparison === 'ordinalIgnoreCase';
  }

  clone(overrides: QuerySettingsInit = {}): QuerySettings {
    return new QuerySettings({
      propertyNamingPolicy: this.propertyNamingPolicy,
      useExternalNames: this.useExternalNames,
      stringComparison: this.stringComparison,
      useBackendPatternMatch: this.useBackendPatternMatch,
      patternMatchBuilder: this.patternMatchBuilder,
      logger: this.logger,
      ...overrides,
    });
  }
}
