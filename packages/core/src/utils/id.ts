import { randomUUID } from 'node:crypto';

/**
 * Random UUID for new note ids.
 */
export function generateId(): string {
  return randomUUID();
}
