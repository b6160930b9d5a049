import { describe, it, expect, vi } from 'vitest';
import type { CharacterClassTag, CryptoFilterInput, Specification } from '@ican/contracts';
import { FormatArgumentError, type Logger } from '@ican/shared';
import { getDefaultRegistry } from '../registry/loader.js';
import { SpecificationRegistry } from '../registry/registry.js';
import { isCharInClass } from '../structure/compiler.js';
import { IcanEngine } from './ican-engine.js';

type LogMethod = (message: string, context?: Record<string, unknown>) => void;

function createFakeLogger() {
  const logger = {
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    isLevelEnabled: vi.fn<Logger['isLevelEnabled']>(() => true),
    child: vi.fn<Logger['child']>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/**
 * Class tag of every position after the prefix
 */
function positionClasses(spec: Specification): CharacterClassTag[] {
  return spec.matcher.segments.flatMap((segment) =>
    Array<CharacterClassTag>(segment.width).fill(segment.charClass),
  );
}

const engine = new IcanEngine({ logger: createFakeLogger() });
const specifications = getDefaultRegistry().list();

describe('IcanEngine', () => {
  describe('validate', () => {
    it('should accept every bundled example', () => {
      const rejected = specifications.filter((spec) => !engine.isValid(spec.example)).map((spec) => spec.code);
      expect(rejected).toEqual([]);
    });

    it('should accept print format and lowercase input', () => {
      expect(engine.isValid('DE89 3704 0044 0532 0130 00')).toBe(true);
      expect(engine.isValid('gb29 nwbk 6016 1331 9268 19')).toBe(true);
    });

    it('should return the detailed result', () => {
      expect(engine.validate('NL91 ABNA 0417 1643 00')).toEqual({
        valid: true,
        normalized: 'NL91ABNA0417164300',
        code: 'NL',
        bcan: 'ABNA0417164300',
        reason: undefined,
        errorCode: undefined,
      });
    });

    it('should reject a character outside its class at every position', () => {
      const failures: string[] = [];
      for (const spec of specifications) {
        positionClasses(spec).forEach((charClass, index) => {
          // `A` admits all three candidates and is skipped
          const replacement = ['0', 'Z', 'G'].find((char) => !isCharInClass(charClass, char));
          if (replacement === undefined) {
            return;
          }
          const position = index + 4;
          const mutated = spec.example.slice(0, position) + replacement + spec.example.slice(position + 1);
          const result = engine.validate(mutated);
          if (result.errorCode !== 'STRUCTURE_MISMATCH') {
            failures.push(`${spec.code}@${position}`);
          }
        });
      }
      expect(failures).toEqual([]);
    });

    it('should detect a changed check digit', () => {
      expect(engine.validate('DE88370400440532013000').errorCode).toBe('CHECKSUM_INVALID');
      expect(engine.validate('NL92ABNA0417164300').errorCode).toBe('CHECKSUM_INVALID');
    });

    it('should detect a swap of adjacent payload digits', () => {
      expect(engine.validate('DE89370400440532013000').valid).toBe(true);
      expect(engine.validate('DE89370400440523013000').errorCode).toBe('CHECKSUM_INVALID');
    });

    it('should report the wrong length', () => {
      const result = engine.validate('DE8937040044053201300');
      expect(result.errorCode).toBe('LENGTH_MISMATCH');
      expect(result.reason).toBe('Expected 22 characters for DE, got 21');
    });

    it('should report unknown and missing codes as registry misses', () => {
      expect(engine.validate('XX89370400440532013000')).toEqual({
        valid: false,
        normalized: 'XX89370400440532013000',
        code: undefined,
        bcan: undefined,
        reason: "Unknown country code 'XX'",
        errorCode: 'REGISTRY_MISS',
      });
      expect(engine.validate('12').errorCode).toBe('REGISTRY_MISS');
      expect(engine.validate('D').errorCode).toBe('REGISTRY_MISS');
      expect(engine.validate('').errorCode).toBe('REGISTRY_MISS');
    });

    it('should not throw on letters where digits are required', () => {
      const result = engine.validate('DE89370400440532013A00');
      expect(result.valid).toBe(false);
      expect(result.errorCode).toBe('STRUCTURE_MISMATCH');
    });
  });

  describe('crypto filters', () => {
    const examples = {
      AB: 'AB841234567890ABCDEF1234567890ABCDEF12345678',
      CB: 'CB661234567890ABCDEF1234567890ABCDEF12345678',
      CE: 'CE571234567890ABCDEF1234567890ABCDEF12345678',
      DE: 'DE89370400440532013000',
    };

    const matrix: [CryptoFilterInput, Record<keyof typeof examples, boolean>][] = [
      [false, { AB: true, CB: true, CE: true, DE: true }],
      ['none', { AB: true, CB: true, CE: true, DE: true }],
      [true, { AB: true, CB: true, CE: true, DE: false }],
      ['any', { AB: true, CB: true, CE: true, DE: false }],
      ['main', { AB: false, CB: true, CE: false, DE: false }],
      ['mainnet', { AB: false, CB: true, CE: false, DE: false }],
      ['test', { AB: true, CB: false, CE: false, DE: false }],
      ['testnet', { AB: true, CB: false, CE: false, DE: false }],
      ['enter', { AB: false, CB: false, CE: true, DE: false }],
      ['Enterprise', { AB: false, CB: false, CE: true, DE: false }],
    ];

    it.each(matrix)('filter %s', (filter, expected) => {
      expect({
        AB: engine.isValid(examples.AB, filter),
        CB: engine.isValid(examples.CB, filter),
        CE: engine.isValid(examples.CE, filter),
        DE: engine.isValid(examples.DE, filter),
      }).toEqual(expected);
    });

    it('should never match an unrecognized filter', () => {
      const result = engine.validate(examples.CB, 'mainnett');
      expect(result.errorCode).toBe('CRYPTO_VARIANT_MISMATCH');
      expect(result.reason).toBe("Unknown crypto filter 'mainnett'");
      expect(engine.isValidBcan('CB', '1234567890ABCDEF1234567890ABCDEF12345678', 'bogus')).toBe(false);
    });
  });

  describe('toBcan', () => {
    it('should split the BCAN into structure groups', () => {
      expect(engine.toBcan('DE89370400440532013000', ' ')).toEqual({ ok: true, value: '37040044 0532013000' });
      expect(engine.toBcan('GB29NWBK60161331926819')).toEqual({ ok: true, value: 'NWBK 601613 31926819' });
    });

    it('should use the configured separator by default', () => {
      const dashed = new IcanEngine({ config: { bcanSeparator: '-' }, logger: createFakeLogger() });
      expect(dashed.toBcan('DE89370400440532013000')).toEqual({ ok: true, value: '37040044-0532013000' });
    });

    it('should fail on unknown codes and short input', () => {
      expect(engine.toBcan('XX89370400440532013000')).toEqual({
        ok: false,
        errorCode: 'REGISTRY_MISS',
        reason: "Unknown country code 'XX'",
      });
      expect(engine.toBcan('D').ok).toBe(false);
      expect(engine.toBcan('DE8')).toEqual({
        ok: false,
        errorCode: 'STRUCTURE_MISMATCH',
        reason: 'Identifier is shorter than the 4-character prefix',
      });
    });
  });

  describe('fromBcan', () => {
    it('should build the full identifier', () => {
      expect(engine.fromBcan('DE', '370400440532013000')).toEqual({ ok: true, value: 'DE89370400440532013000' });
      expect(engine.fromBcan('NL', 'ABNA 0417 1643 00')).toEqual({ ok: true, value: 'NL91ABNA0417164300' });
    });

    it('should round-trip every bundled example through toBcan', () => {
      const mismatches = specifications
        .filter((spec) => {
          const bcan = engine.toBcan(spec.example, '');
          if (!bcan.ok) {
            return true;
          }
          const rebuilt = engine.fromBcan(spec.code, bcan.value);
          return !rebuilt.ok || rebuilt.value !== spec.example;
        })
        .map((spec) => spec.code);
      expect(mismatches).toEqual([]);
    });

    it('should require an exact, known code', () => {
      expect(engine.fromBcan('XX', '370400440532013000')).toEqual({
        ok: false,
        errorCode: 'REGISTRY_MISS',
        reason: "Unknown country code 'XX'",
      });
      expect(engine.fromBcan('de', '370400440532013000')).toEqual({
        ok: false,
        errorCode: 'REGISTRY_MISS',
        reason: "Invalid country code 'de'",
      });
    });

    it('should reject a BCAN that does not fit the structure', () => {
      expect(engine.fromBcan('DE', '37040044053201300A')).toEqual({
        ok: false,
        errorCode: 'INVALID_LOCAL_PAYLOAD',
        reason: "Character 'A' at position 17 is not in class F",
      });
    });
  });

  describe('isValidBcan', () => {
    it('should check length and structure for the code', () => {
      expect(engine.isValidBcan('DE', '370400440532013000')).toBe(true);
      expect(engine.isValidBcan('DE', '3704 0044 0532 0130 00')).toBe(true);
      expect(engine.isValidBcan('DE', '37040044053201300')).toBe(false);
      expect(engine.isValidBcan('XX', '370400440532013000')).toBe(false);
    });

    it('should apply the crypto filter', () => {
      const bcan = '1234567890ABCDEF1234567890ABCDEF12345678';
      expect(engine.isValidBcan('CE', bcan, 'enterprise')).toBe(true);
      expect(engine.isValidBcan('CE', bcan, true)).toBe(true);
      expect(engine.isValidBcan('CE', bcan, 'main')).toBe(false);
    });
  });

  describe('specifications', () => {
    it('should look up a specification by code', () => {
      const result = engine.getSpecification('MU');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.length).toBe(30);
        expect(result.value.example).toBe('MU17BOMM0101101030300200000MUR');
      }
      expect(engine.getSpecification('mu').ok).toBe(false);
    });

    it('should list every specification', () => {
      expect(engine.countries()).toHaveLength(105);
    });
  });

  describe('formatting', () => {
    it('should use the configured defaults', () => {
      expect(engine.electronicFormat('de89 3704-0044')).toBe('DE8937040044');
      expect(engine.printFormat('DE89370400440532013000')).toBe('DE89 3704 0044 0532 0130 00');
      expect(engine.shortFormat('DE89370400440532013000')).toBe('DE89…3000');
    });

    it('should take separators and counts from the config', () => {
      const configured = new IcanEngine({
        config: { printSeparator: '-', shortSeparator: '..', shortFrontCount: 2, shortBackCount: 3 },
        logger: createFakeLogger(),
      });
      expect(configured.printFormat('NL91ABNA0417164300')).toBe('NL91-ABNA-0417-1643-00');
      expect(configured.shortFormat('NL91ABNA0417164300')).toBe('NL..300');
      expect(configured.shortFormat('NL91ABNA0417164300', '/', 4, 0)).toBe('NL91/');
    });

    it('should throw on counts longer than the value', () => {
      expect(() => engine.shortFormat('DE89', '…', 3, 3)).toThrow(FormatArgumentError);
    });
  });

  describe('logging', () => {
    it('should log the loaded registry', () => {
      const logger = createFakeLogger();
      const registry = new SpecificationRegistry({
        NL: { length: 18, structure: 'U04F10', crypto: 'none', example: 'NL91ABNA0417164300' },
      });
      new IcanEngine({ registry, logger });

      expect(logger.debug).toHaveBeenCalledWith('ICAN engine ready', {
        specifications: 1,
        registryHash: expect.stringMatching(/^sha256:[0-9a-f]{12}$/),
        configHash: expect.stringMatching(/^sha256:[0-9a-f]{12}$/),
      });
    });

    it('should log failed operations at debug level', () => {
      const logger = createFakeLogger();
      const logged = new IcanEngine({ logger });

      logged.isValid('DE88370400440532013000');
      logged.fromBcan('XX', '1234');

      expect(logger.debug).toHaveBeenCalledWith('validate failed: Checksum of DE identifier is invalid', {
        errorCode: 'CHECKSUM_INVALID',
        ican: 'DE88370400440532013000',
      });
      expect(logger.debug).toHaveBeenCalledWith("fromBcan failed: Unknown country code 'XX'", {
        errorCode: 'REGISTRY_MISS',
        ican: '1234',
      });
    });

    it('should not log successful operations', () => {
      const logger = createFakeLogger();
      const logged = new IcanEngine({ logger });
      logger.debug.mockClear();

      logged.isValid('DE89370400440532013000');
      logged.toBcan('DE89370400440532013000');

      expect(logger.debug).not.toHaveBeenCalled();
    });

    it('should skip failure logging when debug is disabled', () => {
      const logger = createFakeLogger();
      logger.isLevelEnabled.mockReturnValue(false);
      const quiet = new IcanEngine({ logger });
      logger.debug.mockClear();

      quiet.isValid('DE88370400440532013000');

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });
});
