import { randomUUID } from 'node:crypto';

/** Short random hex id for tagging one run's events (8 chars by default, 32 max) */
export function uniqueId(length = 8): string {
  return randomUUID().replaceAll('-', '').slice(0, length);
}
