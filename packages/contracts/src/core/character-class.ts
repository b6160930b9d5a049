/**
 * Character class tags used in structure patterns.
 *
 * - `A`: digits, upper and lower letters
 * - `B`: digits, upper letters
 * - `C`: upper and lower letters
 * - `H`: hexadecimal digits (either case)
 * - `F`: digits only
 * - `L`: lower letters
 * - `U`: upper letters
 * - `W`: digits and lower letters
 */
export const CHARACTER_CLASS_TAGS = ['A', 'B', 'C', 'H', 'F', 'L', 'U', 'W'] as const;

export type CharacterClassTag = (typeof CHARACTER_CLASS_TAGS)[number];

/**
 * Inclusive ASCII range, e.g. `['0', '9']`
 */
export type CharacterRange = readonly [first: string, last: string];

const DIGITS: CharacterRange = ['0', '9'];
const UPPER: CharacterRange = ['A', 'Z'];
const LOWER: CharacterRange = ['a', 'z'];

/**
 * Allowed ranges per class tag.
 */
export const CHARACTER_CLASS_RANGES: Readonly<Record<CharacterClassTag, readonly CharacterRange[]>> = {
  A: [DIGITS, UPPER, LOWER],
  B: [DIGITS, UPPER],
  C: [UPPER, LOWER],
  H: [DIGITS, ['A', 'F'], ['a', 'f']],
  F: [DIGITS],
  L: [LOWER],
  U: [UPPER],
  W: [DIGITS, LOWER],
};

export function isCharacterClassTag(value: unknown): value is CharacterClassTag {
  return CHARACTER_CLASS_TAGS.some((tag) => tag === value);
}
