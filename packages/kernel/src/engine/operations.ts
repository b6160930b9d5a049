/**
 * Validation and conversion against a single specification.
 *
 * Every check is a short-circuit step: the first failure ends the run and is
 * reported with its error code. Inputs are normalized to electronic format
 * first, so callers may pass print-formatted or lowercase values.
 */

import {
  failure,
  success,
  type CryptoFilter,
  type IcanErrorCode,
  type IcanFailure,
  type IcanResult,
  type IcanValidationResult,
  type Specification,
} from '@ican/contracts';
import { electronicFormat } from '@ican/shared';
import { computeCheckDigits, isChecksumValid } from '../checksum/mod97.js';
import { matchesCryptoFilter } from '../crypto/crypto-filter.js';
import { PREFIX_LENGTH } from '../specification/specification.js';
import { explainMismatch, matchStructure } from '../structure/compiler.js';

export function invalidResult(
  normalized: string,
  code: string | undefined,
  errorCode: IcanErrorCode,
  reason: string,
): IcanValidationResult {
  return {
    valid: false,
    normalized,
    code,
    bcan: undefined,
    reason,
    errorCode,
  };
}

function validResult(normalized: string, code: string, bcan: string): IcanValidationResult {
  return {
    valid: true,
    normalized,
    code,
    bcan,
    reason: undefined,
    errorCode: undefined,
  };
}

function cryptoMismatchReason(spec: Specification, filter: CryptoFilter): string {
  return `${spec.code} has crypto variant '${spec.crypto}', filter '${filter}' not satisfied`;
}

/**
 * Validate a full identifier.
 *
 * Checks, in order: length, leading code, crypto filter, structure of the
 * part after the prefix, MOD 97-10 checksum.
 *
 * @example
 * ```typescript
 * validateWithSpecification(germany, 'DE89 3704 0044 0532 0130 00');
 * // { valid: true, normalized: 'DE89370400440532013000', code: 'DE', bcan: '370400440532013000', ... }
 * ```
 */
export function validateWithSpecification(
  spec: Specification,
  identifier: string,
  filter: CryptoFilter = 'none',
): IcanValidationResult {
  const normalized = electronicFormat(identifier);

  if (normalized.length !== spec.length) {
    return invalidResult(
      normalized,
      spec.code,
      'LENGTH_MISMATCH',
      `Expected ${spec.length} characters for ${spec.code}, got ${normalized.length}`,
    );
  }

  const code = normalized.slice(0, 2);
  if (code !== spec.code) {
    return invalidResult(normalized, spec.code, 'CODE_MISMATCH', `Expected code ${spec.code}, got ${code}`);
  }

  if (!matchesCryptoFilter(spec.crypto, filter)) {
    return invalidResult(normalized, spec.code, 'CRYPTO_VARIANT_MISMATCH', cryptoMismatchReason(spec, filter));
  }

  const bcan = normalized.slice(PREFIX_LENGTH);
  const mismatch = explainMismatch(spec.matcher, bcan, PREFIX_LENGTH);
  if (mismatch !== undefined) {
    return invalidResult(normalized, spec.code, 'STRUCTURE_MISMATCH', mismatch);
  }

  if (!isChecksumValid(normalized)) {
    return invalidResult(normalized, spec.code, 'CHECKSUM_INVALID', `Checksum of ${spec.code} identifier is invalid`);
  }

  return validResult(normalized, spec.code, bcan);
}

/**
 * Length, crypto and structure checks of a bare BCAN. There are no check
 * digits in a BCAN, so there is no checksum step.
 */
function checkBcan(spec: Specification, bcan: string, filter: CryptoFilter): IcanFailure | undefined {
  const expected = spec.length - PREFIX_LENGTH;
  if (bcan.length !== expected) {
    return failure(
      'INVALID_LOCAL_PAYLOAD',
      `Expected a ${expected}-character BCAN for ${spec.code}, got ${bcan.length}`,
    );
  }

  if (!matchesCryptoFilter(spec.crypto, filter)) {
    return failure('CRYPTO_VARIANT_MISMATCH', cryptoMismatchReason(spec, filter));
  }

  const mismatch = explainMismatch(spec.matcher, bcan);
  if (mismatch !== undefined) {
    return failure('INVALID_LOCAL_PAYLOAD', mismatch);
  }

  return undefined;
}

/**
 * Validate a BCAN (local payload) against the specification.
 */
export function validateBcanWithSpecification(
  spec: Specification,
  bcan: string,
  filter: CryptoFilter = 'none',
): IcanValidationResult {
  const normalized = electronicFormat(bcan);
  const problem = checkBcan(spec, normalized, filter);
  if (problem) {
    return invalidResult(normalized, spec.code, problem.errorCode, problem.reason);
  }
  return validResult(normalized, spec.code, normalized);
}

/**
 * Extract the BCAN from a full identifier, joining structure groups with `separator`.
 *
 * The checksum is not verified here; use {@link validateWithSpecification} for that.
 *
 * @example
 * ```typescript
 * toBcanWithSpecification(germany, 'DE89370400440532013000', ' ');
 * // { ok: true, value: '37040044 0532013000' }
 * ```
 */
export function toBcanWithSpecification(
  spec: Specification,
  identifier: string,
  separator = ' ',
): IcanResult<string> {
  const normalized = electronicFormat(identifier);
  if (normalized.length < PREFIX_LENGTH) {
    return failure('STRUCTURE_MISMATCH', `Identifier is shorter than the ${PREFIX_LENGTH}-character prefix`);
  }

  const rest = normalized.slice(PREFIX_LENGTH);
  const groups = matchStructure(spec.matcher, rest);
  if (!groups) {
    return failure(
      'STRUCTURE_MISMATCH',
      explainMismatch(spec.matcher, rest, PREFIX_LENGTH) ?? `Identifier does not match ${spec.structure}`,
    );
  }

  return success(groups.join(separator));
}

/**
 * Build a full identifier from a BCAN by computing its check digits.
 *
 * @example
 * ```typescript
 * fromBcanWithSpecification(germany, '370400440532013000');
 * // { ok: true, value: 'DE89370400440532013000' }
 * ```
 */
export function fromBcanWithSpecification(spec: Specification, bcan: string): IcanResult<string> {
  const normalized = electronicFormat(bcan);
  const problem = checkBcan(spec, normalized, 'none');
  if (problem) {
    return failure('INVALID_LOCAL_PAYLOAD', problem.reason);
  }

  return success(`${spec.code}${computeCheckDigits(spec.code, normalized)}${normalized}`);
}
