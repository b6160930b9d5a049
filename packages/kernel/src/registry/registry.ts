import {
  failure,
  success,
  type CryptoFilter,
  type IcanResult,
  type RegistryData,
  type Specification,
} from '@ican/contracts';
import { computeContentHash } from '@ican/shared';
import { matchesCryptoFilter } from '../crypto/crypto-filter.js';
import { validateWithSpecification } from '../engine/operations.js';
import { createSpecification, isValidCode } from '../specification/specification.js';

/**
 * Options for {@link SpecificationRegistry.list}
 */
export interface RegistryListOptions {
  /** Only specifications satisfying this crypto filter */
  crypto?: CryptoFilter;
}

/**
 * Read-only registry of specifications keyed by two-letter code.
 *
 * Every entry is compiled when the registry is built, so malformed data fails
 * at startup rather than on first use. Nothing is mutated afterwards.
 */
export class SpecificationRegistry {
  private readonly specifications: ReadonlyMap<string, Specification>;

  /** Content hash of the source data, `sha256:<hex>` */
  readonly hash: string;

  /**
   * @throws RegistryError or InvalidStructureError on the first malformed entry
   */
  constructor(data: RegistryData) {
    const specifications = new Map<string, Specification>();
    for (const code of Object.keys(data).sort()) {
      const entry = data[code];
      if (entry !== undefined) {
        specifications.set(code, createSpecification(code, entry));
      }
    }

    this.specifications = specifications;
    this.hash = computeContentHash(data);
  }

  get(code: string): Specification | undefined {
    return this.specifications.get(code);
  }

  has(code: string): boolean {
    return this.specifications.has(code);
  }

  /**
   * Look up a specification, distinguishing malformed codes from unknown ones.
   * Codes are matched exactly; `de` is not `DE`.
   */
  lookup(code: string): IcanResult<Specification> {
    if (!isValidCode(code)) {
      return failure('REGISTRY_MISS', `Invalid country code '${String(code)}'`);
    }
    const specification = this.specifications.get(code);
    if (!specification) {
      return failure('REGISTRY_MISS', `Unknown country code '${code}'`);
    }
    return success(specification);
  }

  /**
   * Specifications sorted by code.
   */
  list(options?: RegistryListOptions): Specification[] {
    const all = Array.from(this.specifications.values());
    const filter = options?.crypto;
    return filter === undefined ? all : all.filter((spec) => matchesCryptoFilter(spec.crypto, filter));
  }

  codes(): string[] {
    return Array.from(this.specifications.keys());
  }

  size(): number {
    return this.specifications.size;
  }

  /**
   * Validate every entry's example against its own specification.
   *
   * @returns codes whose example does not validate, empty when the data is consistent
   */
  selfCheck(): string[] {
    return this.list()
      .filter((spec) => !validateWithSpecification(spec, spec.example).valid)
      .map((spec) => spec.code);
  }
}
