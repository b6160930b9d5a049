import type {
  CryptoFilterInput,
  IcanErrorCode,
  IcanFailure,
  IcanResult,
  IcanValidationResult,
  Specification,
} from '@ican/contracts';
import {
  createSafeLogger,
  electronicFormat,
  printFormat,
  shortFormat,
  shortHash,
  type Logger,
} from '@ican/shared';
import { buildEngineConfig, type EngineConfig, type EngineOverrides } from '../config/engine-config.js';
import { parseCryptoFilter } from '../crypto/crypto-filter.js';
import { getDefaultRegistry } from '../registry/loader.js';
import type { SpecificationRegistry } from '../registry/registry.js';
import {
  fromBcanWithSpecification,
  invalidResult,
  toBcanWithSpecification,
  validateBcanWithSpecification,
  validateWithSpecification,
} from './operations.js';

/**
 * Options for {@link IcanEngine}
 */
export interface IcanEngineOptions {
  /** Defaults to the bundled registry */
  registry?: SpecificationRegistry;
  config?: EngineOverrides;
  /** Defaults to a safe logger at `config.logLevel` */
  logger?: Logger;
}

function unknownFilterReason(filter: CryptoFilterInput): string {
  return `Unknown crypto filter '${String(filter)}'`;
}

/**
 * Registry-bound validation and conversion.
 *
 * Looks the specification up by the leading two characters (or by an explicit
 * code for BCAN operations) and delegates to the single-specification
 * operations. Failed operations are logged at debug level with the input
 * scrubbed.
 *
 * @example
 * ```typescript
 * const engine = new IcanEngine();
 *
 * engine.isValid('DE89 3704 0044 0532 0130 00'); // true
 * engine.toBcan('DE89370400440532013000'); // { ok: true, value: '37040044 0532013000' }
 * engine.fromBcan('DE', '370400440532013000'); // { ok: true, value: 'DE89370400440532013000' }
 * ```
 */
export class IcanEngine {
  readonly registry: SpecificationRegistry;
  readonly config: EngineConfig;
  readonly configHash: string;
  private readonly logger: Logger;

  constructor(options: IcanEngineOptions = {}) {
    const effective = buildEngineConfig(options.config);
    this.config = effective.config;
    this.configHash = effective.configHash;
    this.registry = options.registry ?? getDefaultRegistry();
    this.logger = options.logger ?? createSafeLogger({ level: this.config.logLevel });

    this.logger.debug('ICAN engine ready', {
      specifications: this.registry.size(),
      registryHash: shortHash(this.registry.hash),
      configHash: shortHash(this.configHash),
    });
  }

  getSpecification(code: string): IcanResult<Specification> {
    return this.registry.lookup(code);
  }

  /**
   * All specifications, sorted by code.
   */
  countries(): Specification[] {
    return this.registry.list();
  }

  /**
   * Validate an identifier in electronic or print format.
   *
   * `filter` restricts which crypto variants are accepted; `false` (the
   * default) accepts every specification, `true` only crypto ones.
   */
  validate(identifier: string, filter: CryptoFilterInput = false): IcanValidationResult {
    const normalized = electronicFormat(identifier);

    const parsedFilter = parseCryptoFilter(filter);
    if (parsedFilter === undefined) {
      return this.rejected(
        'validate',
        invalidResult(normalized, undefined, 'CRYPTO_VARIANT_MISMATCH', unknownFilterReason(filter)),
      );
    }

    if (normalized.length < 2) {
      const reason = 'Identifier is too short to carry a country code';
      return this.rejected('validate', invalidResult(normalized, undefined, 'REGISTRY_MISS', reason));
    }

    const lookup = this.registry.lookup(normalized.slice(0, 2));
    if (!lookup.ok) {
      return this.rejected(
        'validate',
        invalidResult(normalized, undefined, lookup.errorCode, lookup.reason),
      );
    }

    const result = validateWithSpecification(lookup.value, normalized, parsedFilter);
    return result.valid ? result : this.rejected('validate', result);
  }

  isValid(identifier: string, filter: CryptoFilterInput = false): boolean {
    return this.validate(identifier, filter).valid;
  }

  /**
   * Extract the BCAN, joining structure groups with `separator`
   * (`config.bcanSeparator` when omitted). The checksum is not verified.
   */
  toBcan(identifier: string, separator: string = this.config.bcanSeparator): IcanResult<string> {
    const normalized = electronicFormat(identifier);
    const lookup = this.registry.lookup(normalized.slice(0, 2));
    if (!lookup.ok) {
      return this.failed('toBcan', normalized, lookup);
    }

    const result = toBcanWithSpecification(lookup.value, normalized, separator);
    return result.ok ? result : this.failed('toBcan', normalized, result);
  }

  /**
   * Build a full identifier from a country code and a BCAN. The code must be
   * two uppercase letters.
   */
  fromBcan(code: string, bcan: string): IcanResult<string> {
    const lookup = this.registry.lookup(code);
    if (!lookup.ok) {
      return this.failed('fromBcan', bcan, lookup);
    }

    const result = fromBcanWithSpecification(lookup.value, bcan);
    return result.ok ? result : this.failed('fromBcan', bcan, result);
  }

  validateBcan(code: string, bcan: string, filter: CryptoFilterInput = false): IcanValidationResult {
    const normalized = electronicFormat(bcan);

    const parsedFilter = parseCryptoFilter(filter);
    if (parsedFilter === undefined) {
      return this.rejected(
        'validateBcan',
        invalidResult(normalized, undefined, 'CRYPTO_VARIANT_MISMATCH', unknownFilterReason(filter)),
      );
    }

    const lookup = this.registry.lookup(code);
    if (!lookup.ok) {
      return this.rejected(
        'validateBcan',
        invalidResult(normalized, undefined, lookup.errorCode, lookup.reason),
      );
    }

    const result = validateBcanWithSpecification(lookup.value, normalized, parsedFilter);
    return result.valid ? result : this.rejected('validateBcan', result);
  }

  isValidBcan(code: string, bcan: string, filter: CryptoFilterInput = false): boolean {
    return this.validateBcan(code, bcan, filter).valid;
  }

  electronicFormat(value: string): string {
    return electronicFormat(value);
  }

  printFormat(value: string, separator: string = this.config.printSeparator): string {
    return printFormat(value, separator);
  }

  /**
   * @throws FormatArgumentError when the counts do not fit the value
   */
  shortFormat(
    value: string,
    separator: string = this.config.shortSeparator,
    frontCount: number = this.config.shortFrontCount,
    backCount: number = this.config.shortBackCount,
  ): string {
    return shortFormat(value, separator, frontCount, backCount);
  }

  private rejected(operation: string, result: IcanValidationResult): IcanValidationResult {
    if (result.errorCode !== undefined && result.reason !== undefined) {
      this.logFailure(operation, result.normalized, result.errorCode, result.reason);
    }
    return result;
  }

  private failed(operation: string, input: string, result: IcanFailure): IcanFailure {
    this.logFailure(operation, input, result.errorCode, result.reason);
    return result;
  }

  private logFailure(operation: string, input: string, errorCode: IcanErrorCode, reason: string): void {
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`${operation} failed: ${reason}`, { errorCode, ican: input });
    }
  }
}
