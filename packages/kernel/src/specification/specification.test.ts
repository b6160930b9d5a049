import { describe, it, expect } from 'vitest';
import type { RegistryEntry } from '@ican/contracts';
import { InvalidStructureError, RegistryError } from '@ican/shared';
import { createSpecification, isValidCode } from './specification.js';

const GERMANY: RegistryEntry = {
  length: 22,
  structure: 'F08F10',
  crypto: 'none',
  example: 'DE89370400440532013000',
};

describe('isValidCode', () => {
  it('should accept two uppercase letters', () => {
    expect(isValidCode('DE')).toBe(true);
    expect(isValidCode('CB')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isValidCode('de')).toBe(false);
    expect(isValidCode('De')).toBe(false);
    expect(isValidCode('D')).toBe(false);
    expect(isValidCode('DEU')).toBe(false);
    expect(isValidCode('D1')).toBe(false);
    expect(isValidCode('')).toBe(false);
    expect(isValidCode(undefined)).toBe(false);
  });
});

describe('createSpecification', () => {
  it('should build a frozen specification with a compiled matcher', () => {
    const spec = createSpecification('DE', GERMANY);

    expect(spec.code).toBe('DE');
    expect(spec.length).toBe(22);
    expect(spec.structure).toBe('F08F10');
    expect(spec.crypto).toBe('none');
    expect(spec.example).toBe('DE89370400440532013000');
    expect(spec.matcher.segments).toEqual([
      { charClass: 'F', width: 8 },
      { charClass: 'F', width: 10 },
    ]);
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('should keep the crypto variant', () => {
    const spec = createSpecification('CB', {
      length: 44,
      structure: 'H40',
      crypto: 'main',
      example: 'CB661234567890ABCDEF1234567890ABCDEF12345678',
    });
    expect(spec.crypto).toBe('main');
    expect(spec.matcher.totalWidth).toBe(40);
  });

  it('should reject malformed codes', () => {
    expect(() => createSpecification('de', GERMANY)).toThrow(RegistryError);
    expect(() => createSpecification('D1', GERMANY)).toThrow("Invalid registry code 'D1'");
  });

  it('should reject lengths below the prefix', () => {
    expect(() => createSpecification('DE', { ...GERMANY, length: 3 })).toThrow(RegistryError);
  });

  it('should reject the query-only any variant', () => {
    const entry = { ...GERMANY, crypto: 'any' } as unknown as RegistryEntry;
    expect(() => createSpecification('DE', entry)).toThrow("Invalid crypto variant 'any' for DE");
  });

  it('should reject malformed structures', () => {
    expect(() => createSpecification('DE', { ...GERMANY, structure: 'F08X10' })).toThrow(InvalidStructureError);
    expect(() => createSpecification('DE', { ...GERMANY, structure: 'F8F10' })).toThrow(InvalidStructureError);
  });

  it('should reject a length that disagrees with the structure', () => {
    expect(() => createSpecification('DE', { ...GERMANY, length: 23 })).toThrow(
      'Structure F08F10 covers 18 characters but DE declares length 23',
    );
  });
});
