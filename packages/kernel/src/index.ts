/**
 * @ican/kernel
 *
 * Validation and conversion of International Crypto Account Numbers (ICAN)
 * and their local payloads (BCAN), driven by a registry of per-country
 * specifications.
 *
 * @packageDocumentation
 */

export { IcanEngine, type IcanEngineOptions } from './engine/ican-engine.js';
export {
  validateWithSpecification,
  validateBcanWithSpecification,
  toBcanWithSpecification,
  fromBcanWithSpecification,
} from './engine/operations.js';

// Module-level API over the bundled registry
export {
  getDefaultEngine,
  isValid,
  validate,
  toBcan,
  fromBcan,
  validateBcan,
  isValidBcan,
  getSpecification,
  countries,
} from './defaults.js';

export { SpecificationRegistry, type RegistryListOptions } from './registry/registry.js';
export {
  DEFAULT_REGISTRY_PATH,
  parseRegistryData,
  loadRegistryData,
  getDefaultRegistry,
} from './registry/loader.js';
export { createSpecification, isValidCode, PREFIX_LENGTH } from './specification/specification.js';

export { compileStructure, isCharInClass, matchStructure, explainMismatch } from './structure/compiler.js';
export { rearrange, mod97, isChecksumValid, computeCheckDigits } from './checksum/mod97.js';
export { parseCryptoFilter, matchesCryptoFilter } from './crypto/crypto-filter.js';

export {
  buildEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineOverrides,
  type EffectiveEngineConfig,
} from './config/engine-config.js';

export { electronicFormat, printFormat, shortFormat } from '@ican/shared';
