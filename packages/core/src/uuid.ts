/**
 * @module uuid
 * Layer id generation.
 */

import { randomUUID } from 'crypto';

/**
 * Generates a UUID v4 string for layers added without an explicit id.
 *
 * @returns A new UUID v4 string (e.g. "550e8400-e29b-41d4-a716-446655440000").
 */
export function generateId(): string {
  return randomUUID();
}
