import {
  CHARACTER_CLASS_RANGES,
  failure,
  isCharacterClassTag,
  success,
  type CharacterClassTag,
  type CompiledStructure,
  type IcanResult,
  type StructureSegment,
} from '@ican/contracts';

/**
 * Each segment is one class tag followed by a two-digit width, e.g. `F08`.
 */
const SEGMENT_LENGTH = 3;

const TWO_DIGITS = /^[0-9]{2}$/;

/**
 * Compile a structure pattern such as `U04A20` into ordered fixed-width segments.
 *
 * @returns the compiled structure, or an `INVALID_STRUCTURE` failure describing
 * the first offending triple
 *
 * @example
 * ```typescript
 * compileStructure('F08F10');
 * // { ok: true, value: { pattern: 'F08F10', segments: [{ charClass: 'F', width: 8 }, ...], totalWidth: 18 } }
 *
 * compileStructure('X04');
 * // { ok: false, errorCode: 'INVALID_STRUCTURE', reason: "Unknown character class 'X' at position 0" }
 * ```
 */
export function compileStructure(pattern: string): IcanResult<CompiledStructure> {
  if (typeof pattern !== 'string' || pattern.length === 0) {
    return failure('INVALID_STRUCTURE', 'Structure pattern must be a non-empty string');
  }

  if (pattern.length % SEGMENT_LENGTH !== 0) {
    return failure(
      'INVALID_STRUCTURE',
      `Structure pattern length ${pattern.length} is not a multiple of ${SEGMENT_LENGTH}`,
    );
  }

  const segments: StructureSegment[] = [];
  let totalWidth = 0;

  for (let offset = 0; offset < pattern.length; offset += SEGMENT_LENGTH) {
    const tag = pattern.charAt(offset);
    const widthText = pattern.slice(offset + 1, offset + SEGMENT_LENGTH);

    if (!isCharacterClassTag(tag)) {
      return failure('INVALID_STRUCTURE', `Unknown character class '${tag}' at position ${offset}`);
    }
    if (!TWO_DIGITS.test(widthText)) {
      return failure('INVALID_STRUCTURE', `Width '${widthText}' at position ${offset + 1} is not two digits`);
    }

    const width = Number(widthText);
    segments.push(Object.freeze({ charClass: tag, width }));
    totalWidth += width;
  }

  return success(Object.freeze({ pattern, segments: Object.freeze(segments), totalWidth }));
}

/**
 * Whether a single character belongs to a character class.
 * Anything that is not exactly one UTF-16 code unit is rejected.
 */
export function isCharInClass(charClass: CharacterClassTag, char: string): boolean {
  if (char.length !== 1) {
    return false;
  }
  const code = char.charCodeAt(0);
  return CHARACTER_CLASS_RANGES[charClass].some(
    ([first, last]) => code >= first.charCodeAt(0) && code <= last.charCodeAt(0),
  );
}

/**
 * Match `input` against a compiled structure, left to right.
 *
 * @returns one captured group per segment, or `undefined` when the length
 * differs from the total width or any character falls outside its class
 */
export function matchStructure(matcher: CompiledStructure, input: string): string[] | undefined {
  if (input.length !== matcher.totalWidth) {
    return undefined;
  }

  const groups: string[] = [];
  let offset = 0;
  for (const { charClass, width } of matcher.segments) {
    const group = input.slice(offset, offset + width);
    for (const char of group) {
      if (!isCharInClass(charClass, char)) {
        return undefined;
      }
    }
    groups.push(group);
    offset += width;
  }
  return groups;
}

/**
 * Human-readable reason why `input` does not match, or `undefined` when it does.
 *
 * @param positionOffset - added to reported positions, e.g. 4 when `input`
 * is the part of a full identifier after its prefix
 */
export function explainMismatch(
  matcher: CompiledStructure,
  input: string,
  positionOffset = 0,
): string | undefined {
  if (input.length !== matcher.totalWidth) {
    return `Expected ${matcher.totalWidth} characters after the prefix, got ${input.length}`;
  }

  let offset = 0;
  for (const { charClass, width } of matcher.segments) {
    for (let index = offset; index < offset + width; index++) {
      const char = input.charAt(index);
      if (!isCharInClass(charClass, char)) {
        return `Character '${char}' at position ${index + positionOffset} is not in class ${charClass}`;
      }
    }
    offset += width;
  }
  return undefined;
}
