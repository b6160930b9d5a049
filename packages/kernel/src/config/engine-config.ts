import { computeContentHash, ConfigurationError, isLogLevel, type LogLevel } from '@ican/shared';

/**
 * Engine configuration: default separators and counts for formatting and
 * BCAN conversion, and the log level of the built-in logger.
 */
export interface EngineConfig {
  /** Joins structure groups in `toBcan` */
  readonly bcanSeparator: string;
  /** Inserted every four characters by `printFormat` */
  readonly printSeparator: string;
  /** Placed between head and tail by `shortFormat` */
  readonly shortSeparator: string;
  readonly shortFrontCount: number;
  readonly shortBackCount: number;
  readonly logLevel: LogLevel;
}

/**
 * Defaults used when no override is given.
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  bcanSeparator: ' ',
  printSeparator: ' ',
  shortSeparator: '…',
  shortFrontCount: 4,
  shortBackCount: 4,
  logLevel: 'warn',
});

/**
 * Caller overrides. Unset keys keep their default.
 */
export type EngineOverrides = { -readonly [K in keyof EngineConfig]?: EngineConfig[K] };

type MutableEngineConfig = { -readonly [K in keyof EngineConfig]: EngineConfig[K] };

/**
 * Effective configuration result.
 */
export interface EffectiveEngineConfig {
  config: EngineConfig;
  /** SHA-256 of the merged config */
  configHash: string;
  /** Sources that contributed to this config */
  sources: ('default' | 'overrides')[];
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer`, { [name]: value });
  }
}

/**
 * Merge overrides onto {@link DEFAULT_ENGINE_CONFIG}.
 *
 * @throws ConfigurationError for negative or fractional counts, or an unknown log level
 */
export function buildEngineConfig(overrides?: EngineOverrides): EffectiveEngineConfig {
  const sources: EffectiveEngineConfig['sources'] = ['default'];
  const merged: MutableEngineConfig = { ...DEFAULT_ENGINE_CONFIG };

  if (overrides) {
    sources.push('overrides');
    if (overrides.bcanSeparator !== undefined) {
      merged.bcanSeparator = overrides.bcanSeparator;
    }
    if (overrides.printSeparator !== undefined) {
      merged.printSeparator = overrides.printSeparator;
    }
    if (overrides.shortSeparator !== undefined) {
      merged.shortSeparator = overrides.shortSeparator;
    }
    if (overrides.shortFrontCount !== undefined) {
      assertCount('shortFrontCount', overrides.shortFrontCount);
      merged.shortFrontCount = overrides.shortFrontCount;
    }
    if (overrides.shortBackCount !== undefined) {
      assertCount('shortBackCount', overrides.shortBackCount);
      merged.shortBackCount = overrides.shortBackCount;
    }
    if (overrides.logLevel !== undefined) {
      if (!isLogLevel(overrides.logLevel)) {
        throw new ConfigurationError(`Unknown log level '${String(overrides.logLevel)}'`);
      }
      merged.logLevel = overrides.logLevel;
    }
  }

  const config: EngineConfig = Object.freeze(merged);
  return {
    config,
    configHash: computeContentHash(config),
    sources,
  };
}
