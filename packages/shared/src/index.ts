/**
 * @ican/shared
 *
 * Shared utilities for the ICAN toolkit.
 *
 * @packageDocumentation
 */

export { createLogger, isLogLevel, type Logger, type LogLevel, type LoggerOptions } from './logging/logger.js';
export { createSafeLogger, type SafeLoggerOptions, type ScrubPattern } from './logging/safe-logger.js';
export {
  IcanError,
  InvalidStructureError,
  RegistryError,
  ConfigurationError,
  FormatArgumentError,
  ChecksumInputError,
} from './errors/errors.js';
export {
  canonicalStringify,
  computeContentHash,
  shortHash,
} from './crypto/content-hash.js';

// Formatting (electronic / print / short)
export { electronicFormat, printFormat, shortFormat } from './format/index.js';
