import { createHash } from 'crypto';

/**
 * Canonical JSON stringification for deterministic hashing.
 * Object keys are sorted, undefined values dropped, no extra whitespace.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(value, (_, node: unknown) => {
    if (node === null || typeof node !== 'object' || Array.isArray(node)) {
      return node;
    }
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(node).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (child !== undefined) {
        sorted[key] = child;
      }
    }
    return sorted;
  });
}

/**
 * SHA-256 of the canonical form, as `sha256:<hex>`.
 * Used to fingerprint engine configuration and registry data.
 */
export function computeContentHash(value: unknown): string {
  const hash = createHash('sha256').update(canonicalStringify(value)).digest('hex');
  return `sha256:${hash}`;
}

/**
 * Short form for log lines: algorithm plus the first 12 hex characters.
 */
export function shortHash(hash: string): string {
  const match = /^(\w+):([a-fA-F0-9]+)$/.exec(hash);
  if (!match?.[1] || !match[2]) {
    return hash.slice(0, 12);
  }
  return `${match[1]}:${match[2].slice(0, 12)}`;
}
