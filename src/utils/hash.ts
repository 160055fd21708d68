/**
 * SHA-256 digests, canonical JSON and run-scoped identifiers.
 */

import { createHash, randomUUID } from 'node:crypto';

export type IdGenerator = () => string;

/** prevHash of the first event in every chain */
export const GENESIS_HASH = 'GENESIS';

export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * JSON with object keys sorted at every depth, so equal values hash equally
 * whatever order their keys were written in.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) =>
    isPlainObject(nested) ? Object.fromEntries(Object.entries(nested).sort(byKey)) : nested
  );
}

/** Random id for things that sit outside the seeded run, such as run ids. */
export function generateId(): string {
  return randomUUID();
}

/**
 * Ids that replay for the same seed: the n-th id is a digest of `seed:n`,
 * laid out in UUID groups.
 */
export function createDeterministicIdGenerator(seed: number): IdGenerator {
  let counter = 0;

  return () => {
    const digest = sha256(`${seed}:${counter++}`);
    return [
      digest.slice(0, 8),
      digest.slice(8, 12),
      digest.slice(12, 16),
      digest.slice(16, 20),
      digest.slice(20, 32),
    ].join('-');
  };
}
