/**
 * Crypto variant stored on a specification.
 *
 * - `none`: a plain (IBAN-style) country entry
 * - `main`: crypto mainnet addresses
 * - `test`: crypto testnet addresses
 * - `enterprise`: enterprise network addresses
 */
export const CRYPTO_VARIANTS = ['none', 'main', 'test', 'enterprise'] as const;

export type CryptoVariant = (typeof CRYPTO_VARIANTS)[number];

/**
 * Filter applied when validating.
 *
 * `none` accepts every specification, `any` accepts every specification whose
 * variant is not `none`, a concrete variant must match exactly.
 * `any` is query-only and never stored on a specification.
 */
export type CryptoFilter = CryptoVariant | 'any';

/**
 * Loose filter accepted at the public API boundary.
 * Booleans and textual synonyms ("mainnet", "testnet", ...) are normalized
 * into a {@link CryptoFilter} before any engine logic runs.
 */
export type CryptoFilterInput = boolean | string;

export function isCryptoVariant(value: unknown): value is CryptoVariant {
  return CRYPTO_VARIANTS.some((variant) => variant === value);
}

export function isCryptoFilter(value: unknown): value is CryptoFilter {
  return value === 'any' || isCryptoVariant(value);
}
