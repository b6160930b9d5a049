import type { CharacterClassTag } from './character-class.js';
import type { CryptoVariant } from './crypto-variant.js';

/**
 * One fixed-width run of a structure pattern, e.g. `F08` -> 8 digits.
 */
export interface StructureSegment {
  readonly charClass: CharacterClassTag;
  readonly width: number;
}

/**
 * Compiled form of a structure pattern.
 * Segments are in declaration order and are matched left to right.
 */
export interface CompiledStructure {
  /** Source pattern, e.g. `F08F10` */
  readonly pattern: string;

  readonly segments: readonly StructureSegment[];

  /** Sum of all segment widths */
  readonly totalWidth: number;
}

/**
 * Raw registry entry, as stored in the registry data file.
 */
export interface RegistryEntry {
  /** Total length of a full identifier, prefix included */
  readonly length: number;

  /** Structure pattern of the part after the 4-character prefix */
  readonly structure: string;

  readonly crypto: CryptoVariant;

  /** A known-valid identifier */
  readonly example: string;
}

/**
 * Registry data keyed by two-letter country or asset code.
 */
export type RegistryData = Readonly<Record<string, RegistryEntry>>;

/**
 * Immutable specification for one country or crypto asset.
 */
export interface Specification {
  /** Two uppercase letters */
  readonly code: string;
  readonly length: number;
  readonly structure: string;
  readonly crypto: CryptoVariant;
  readonly example: string;
  readonly matcher: CompiledStructure;
}
