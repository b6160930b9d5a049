import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CRYPTO_VARIANTS, type RegistryData } from '@ican/contracts';
import { RegistryError } from '@ican/shared';
import { SpecificationRegistry } from './registry.js';

/**
 * Bundled registry data. Two levels up from `src/registry` and from
 * `dist/registry` alike, so sources and build output share `kernel/data`.
 */
export const DEFAULT_REGISTRY_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'data',
  'countries.json',
);

const registryEntrySchema = z
  .object({
    length: z.number().int().min(4),
    structure: z.string().regex(/^([ABCHFLUW]\d{2})+$/, 'Must be class/width triples such as F08'),
    crypto: z.enum(CRYPTO_VARIANTS),
    example: z.string().min(4),
  })
  .strict();

const registryDataSchema = z.record(
  z.string().regex(/^[A-Z]{2}$/, 'Must be two uppercase letters'),
  registryEntrySchema,
);

/**
 * Validate raw registry data, e.g. parsed JSON.
 *
 * @throws RegistryError listing every schema issue
 */
export function parseRegistryData(raw: unknown): RegistryData {
  const parsed = registryDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RegistryError(`Invalid registry data: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Read and validate a registry data file.
 *
 * @throws RegistryError when the file cannot be read, is not JSON, or fails the schema
 */
export function loadRegistryData(path: string = DEFAULT_REGISTRY_PATH): RegistryData {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new RegistryError(`Cannot read registry data from ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseRegistryData(raw);
}

/**
 * Registry built from the bundled data, created on first use and reused
 * for the process lifetime.
 */
let defaultRegistry: SpecificationRegistry | undefined;

export function getDefaultRegistry(): SpecificationRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new SpecificationRegistry(loadRegistryData());
  }
  return defaultRegistry;
}
