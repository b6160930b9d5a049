/**
 * Formatting helpers for ICANs and BCANs.
 *
 * Pure string manipulation: no registry lookups, no checksum validation.
 *
 * @module @ican/shared/format
 */

import { FormatArgumentError } from '../errors/errors.js';

const NON_ALPHANUMERIC = /[^A-Za-z0-9]/g;

/**
 * Every complete group of four characters that is not at the end of the string
 */
const GROUP_OF_FOUR = /.{4}(?!$)/g;

/**
 * Convert to electronic format: drop everything outside `[A-Za-z0-9]`, then uppercase.
 *
 * @example
 * ```typescript
 * electronicFormat('DE89 3704 0044 0532 0130 00') // 'DE89370400440532013000'
 * electronicFormat('de89-3704.0044') // 'DE8937040044'
 * ```
 */
export function electronicFormat(value: string): string {
  if (typeof value !== 'string') {
    return '';
  }
  return value.replace(NON_ALPHANUMERIC, '').toUpperCase();
}

/**
 * Electronic format with `separator` inserted after every fourth character.
 *
 * @example
 * ```typescript
 * printFormat('DE89370400440532013000') // 'DE89 3704 0044 0532 0130 00'
 * printFormat('DE89370400440532013000', '-') // 'DE89-3704-0044-0532-0130-00'
 * ```
 */
export function printFormat(value: string, separator = ' '): string {
  return electronicFormat(value).replace(GROUP_OF_FOUR, (group) => `${group}${separator}`);
}

/**
 * Abbreviate to the first `frontCount` and last `backCount` characters of the
 * electronic format, joined by `separator`.
 *
 * @throws FormatArgumentError when a count is negative or not an integer, or
 * when `frontCount + backCount` exceeds the electronic length
 *
 * @example
 * ```typescript
 * shortFormat('DE89370400440532013000') // 'DE89…3000'
 * shortFormat('DE89370400440532013000', '-', 6, 6) // 'DE8937-013000'
 * ```
 */
export function shortFormat(value: string, separator = '…', frontCount = 4, backCount = 4): string {
  const formatted = electronicFormat(value);

  if (
    !Number.isInteger(frontCount) ||
    !Number.isInteger(backCount) ||
    frontCount < 0 ||
    backCount < 0 ||
    frontCount + backCount > formatted.length
  ) {
    throw new FormatArgumentError('Invalid frontCount or backCount', {
      frontCount,
      backCount,
      length: formatted.length,
    });
  }

  const front = formatted.slice(0, frontCount);
  const back = formatted.slice(formatted.length - backCount);
  return `${front}${separator}${back}`;
}
