import type {
  CryptoFilterInput,
  IcanResult,
  IcanValidationResult,
  Specification,
} from '@ican/contracts';
import { IcanEngine } from './engine/ican-engine.js';

let defaultEngine: IcanEngine | undefined;

/**
 * Engine over the bundled registry with default configuration, created on
 * first use.
 */
export function getDefaultEngine(): IcanEngine {
  if (!defaultEngine) {
    defaultEngine = new IcanEngine();
  }
  return defaultEngine;
}

export function isValid(identifier: string, filter: CryptoFilterInput = false): boolean {
  return getDefaultEngine().isValid(identifier, filter);
}

export function validate(identifier: string, filter: CryptoFilterInput = false): IcanValidationResult {
  return getDefaultEngine().validate(identifier, filter);
}

export function toBcan(identifier: string, separator?: string): IcanResult<string> {
  return getDefaultEngine().toBcan(identifier, separator);
}

export function fromBcan(code: string, bcan: string): IcanResult<string> {
  return getDefaultEngine().fromBcan(code, bcan);
}

export function validateBcan(code: string, bcan: string, filter: CryptoFilterInput = false): IcanValidationResult {
  return getDefaultEngine().validateBcan(code, bcan, filter);
}

export function isValidBcan(code: string, bcan: string, filter: CryptoFilterInput = false): boolean {
  return getDefaultEngine().isValidBcan(code, bcan, filter);
}

export function getSpecification(code: string): IcanResult<Specification> {
  return getDefaultEngine().getSpecification(code);
}

/**
 * Every bundled specification, sorted by code.
 */
export function countries(): Specification[] {
  return getDefaultEngine().countries();
}
