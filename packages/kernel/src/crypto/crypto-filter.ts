import type { CryptoFilter, CryptoFilterInput, CryptoVariant } from '@ican/contracts';

/**
 * Accepted textual spellings, compared lowercase.
 */
const CRYPTO_FILTER_SYNONYMS: ReadonlyMap<string, CryptoFilter> = new Map<string, CryptoFilter>([
  ['', 'none'],
  ['none', 'none'],
  ['false', 'none'],
  ['any', 'any'],
  ['true', 'any'],
  ['main', 'main'],
  ['mainnet', 'main'],
  ['test', 'test'],
  ['testnet', 'test'],
  ['enter', 'enterprise'],
  ['enterprise', 'enterprise'],
]);

/**
 * Normalize a loose crypto filter into a {@link CryptoFilter}.
 *
 * `false` means no filtering, `true` means any crypto variant.
 *
 * @returns the filter, or `undefined` for an unrecognized token
 *
 * @example
 * ```typescript
 * parseCryptoFilter('mainnet'); // 'main'
 * parseCryptoFilter(true); // 'any'
 * parseCryptoFilter('mainnett'); // undefined
 * ```
 */
export function parseCryptoFilter(input: CryptoFilterInput): CryptoFilter | undefined {
  if (typeof input === 'boolean') {
    return input ? 'any' : 'none';
  }
  if (typeof input !== 'string') {
    return undefined;
  }
  return CRYPTO_FILTER_SYNONYMS.get(input.trim().toLowerCase());
}

/**
 * Whether a specification's variant satisfies a filter.
 */
export function matchesCryptoFilter(variant: CryptoVariant, filter: CryptoFilter): boolean {
  switch (filter) {
    case 'none':
      return true;
    case 'any':
      return variant !== 'none';
    default:
      return variant === filter;
  }
}
