import { createLogger, type Logger, type LoggerOptions } from './logger.js';

export interface ScrubPattern {
  pattern: RegExp;
  replacement: string;
}

/**
 * Account identifier patterns that should be scrubbed from logs
 */
const IDENTIFIER_PATTERNS: (ScrubPattern & { name: string })[] = [
  // ICAN / IBAN, electronic format
  {
    pattern: /\b[A-Z]{2}\d{2}[A-Za-z0-9]{11,40}\b/g,
    replacement: '[ICAN:REDACTED]',
    name: 'ican-electronic',
  },
  // ICAN / IBAN, print format (groups of four)
  {
    pattern: /\b[A-Z]{2}\d{2}(?: [A-Za-z0-9]{1,4}){3,10}\b/g,
    replacement: '[ICAN:REDACTED]',
    name: 'ican-print',
  },
  // Bare 40-digit hex addresses (crypto BCANs)
  {
    pattern: /\b(?:0x)?[0-9A-Fa-f]{40}\b/g,
    replacement: '[ADDRESS:REDACTED]',
    name: 'hex-address',
  },
];

/**
 * Context keys whose values are always redacted (compared lowercase)
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'ican',
  'iban',
  'bcan',
  'address',
  'account',
  'accountnumber',
  'account_number',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
]);

const MAX_DEPTH = 10;

function scrubString(value: string, patterns: readonly ScrubPattern[]): string {
  let result = value;
  for (const { pattern, replacement } of patterns) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(value: unknown, patterns: readonly ScrubPattern[], depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return scrubString(value, patterns);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item, patterns, depth + 1));
  }

  if (typeof value === 'object') {
    return scrubRecord(Object.entries(value), patterns, depth + 1);
  }

  // Functions, symbols, bigints
  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  entries: [string, unknown][],
  patterns: readonly ScrubPattern[],
  depth: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
      ? '[REDACTED]'
      : scrubValue(value, patterns, depth);
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Whether to scrub identifiers from messages and context
   * @default true
   */
  scrubPii?: boolean;

  /**
   * Additional patterns to scrub
   */
  additionalPatterns?: ScrubPattern[];
}

/**
 * Create a logger that scrubs account identifiers before output.
 *
 * ICANs in electronic or print format and bare hex addresses are replaced in
 * the message and in every string of the context; context keys such as
 * `ican`, `bcan` or `address` are redacted whole.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ level: 'debug' });
 *
 * logger.debug('Checksum rejected', { ican: 'DE89370400440532013000' });
 * // ... Checksum rejected {"ican":"[REDACTED]"}
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const { context: baseContext = {}, scrubPii = true, additionalPatterns = [], ...loggerOptions } = options;
  const baseLogger = createLogger(loggerOptions);
  const patterns: readonly ScrubPattern[] = [...IDENTIFIER_PATTERNS, ...additionalPatterns];

  const scrubMessage = (message: string): string => (scrubPii ? scrubString(message, patterns) : message);

  const scrubContext = (context?: Record<string, unknown>): Record<string, unknown> => {
    const merged = { ...baseContext, ...context };
    return scrubPii ? scrubRecord(Object.entries(merged), patterns, 0) : merged;
  };

  return {
    debug(message, context) {
      if (baseLogger.isLevelEnabled('debug')) {
        baseLogger.debug(scrubMessage(message), scrubContext(context));
      }
    },

    info(message, context) {
      if (baseLogger.isLevelEnabled('info')) {
        baseLogger.info(scrubMessage(message), scrubContext(context));
      }
    },

    warn(message, context) {
      if (baseLogger.isLevelEnabled('warn')) {
        baseLogger.warn(scrubMessage(message), scrubContext(context));
      }
    },

    error(message, context) {
      if (baseLogger.isLevelEnabled('error')) {
        baseLogger.error(scrubMessage(message), scrubContext(context));
      }
    },

    isLevelEnabled: (level) => baseLogger.isLevelEnabled(level),

    child(context: Record<string, unknown>): Logger {
      return createSafeLogger({
        ...options,
        context: { ...baseContext, ...context },
      });
    },
  };
}
