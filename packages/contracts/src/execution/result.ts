/**
 * Error codes reported by ICAN operations.
 *
 * Input errors are returned, not thrown. `INVALID_STRUCTURE` is reported by
 * the structure compiler and is fatal when raised while loading the registry.
 * `INVALID_FORMAT_ARGUMENTS` is a programmer error and is thrown.
 */
export type IcanErrorCode =
  | 'REGISTRY_MISS'
  | 'INVALID_STRUCTURE'
  | 'LENGTH_MISMATCH'
  | 'CODE_MISMATCH'
  | 'CRYPTO_VARIANT_MISMATCH'
  | 'STRUCTURE_MISMATCH'
  | 'CHECKSUM_INVALID'
  | 'INVALID_LOCAL_PAYLOAD'
  | 'INVALID_FORMAT_ARGUMENTS';

/**
 * Failed outcome of a conversion-style operation
 */
export interface IcanFailure {
  readonly ok: false;
  readonly errorCode: IcanErrorCode;
  readonly reason: string;
}

/**
 * Successful outcome of a conversion-style operation
 */
export interface IcanSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export type IcanResult<T> = IcanSuccess<T> | IcanFailure;

/**
 * Detailed result of validating a full identifier or a BCAN.
 */
export interface IcanValidationResult {
  /** Whether every check passed */
  readonly valid: boolean;

  /** Input after normalization (uppercase, alphanumerics only) */
  readonly normalized: string;

  /** Leading two-letter code, when a specification was found */
  readonly code: string | undefined;

  /** Local payload (everything after the 4-character prefix) when valid */
  readonly bcan: string | undefined;

  /** Error reason (if invalid) */
  readonly reason: string | undefined;

  /** Error code for programmatic handling */
  readonly errorCode: IcanErrorCode | undefined;
}

export function success<T>(value: T): IcanSuccess<T> {
  return { ok: true, value };
}

export function failure(errorCode: IcanErrorCode, reason: string): IcanFailure {
  return { ok: false, errorCode, reason };
}
