import { randomUUID } from 'node:crypto';

/**
 * Memory ids are bare UUIDs so every vector backend accepts them as point ids.
 * Other ids carry a prefix for readability in logs.
 */
export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}
