import { randomUUID } from 'node:crypto';

/**
 * Eight hex characters, used for job ids and branch suffixes
 */
export function shortId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/**
 * Collision-resistant id for directory names
 */
export function uniqueId(): string {
  return randomUUID();
}
