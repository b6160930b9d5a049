import { isCryptoVariant, type RegistryEntry, type Specification } from '@ican/contracts';
import { InvalidStructureError, RegistryError } from '@ican/shared';
import { compileStructure } from '../structure/compiler.js';

/**
 * Two-letter code plus two check digits
 */
export const PREFIX_LENGTH = 4;

const CODE_PATTERN = /^[A-Z]{2}$/;

/**
 * Whether `code` has the shape of a registry key: exactly two uppercase ASCII letters.
 * Lookups are case-sensitive; callers normalize first.
 */
export function isValidCode(code: unknown): code is string {
  return typeof code === 'string' && CODE_PATTERN.test(code);
}

/**
 * Build an immutable specification from a registry entry.
 *
 * Malformed entries indicate a packaging bug, so this throws instead of
 * returning a result.
 *
 * @throws RegistryError for a bad code, length or crypto variant, or when the
 * declared length disagrees with the structure's total width
 * @throws InvalidStructureError when the structure pattern does not compile
 */
export function createSpecification(code: string, entry: RegistryEntry): Specification {
  if (!isValidCode(code)) {
    throw new RegistryError(`Invalid registry code '${code}'`, { code });
  }

  if (!Number.isInteger(entry.length) || entry.length < PREFIX_LENGTH) {
    throw new RegistryError(`Invalid length ${entry.length} for ${code}`, { code, length: entry.length });
  }

  // `any` is a query-only filter and never a stored variant
  if (!isCryptoVariant(entry.crypto)) {
    throw new RegistryError(`Invalid crypto variant '${String(entry.crypto)}' for ${code}`, { code });
  }

  const compiled = compileStructure(entry.structure);
  if (!compiled.ok) {
    throw new InvalidStructureError(entry.structure, compiled.reason, { code });
  }

  if (compiled.value.totalWidth + PREFIX_LENGTH !== entry.length) {
    throw new RegistryError(
      `Structure ${entry.structure} covers ${compiled.value.totalWidth} characters but ${code} declares length ${entry.length}`,
      { code, length: entry.length, totalWidth: compiled.value.totalWidth },
    );
  }

  return Object.freeze({
    code,
    length: entry.length,
    structure: entry.structure,
    crypto: entry.crypto,
    example: entry.example,
    matcher: compiled.value,
  });
}
