/**
 * Common Zod Schemas - Shared types used across the engine
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({
  message: 'Must be a valid ISO8601 timestamp',
});

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Importance
// ============================================

/**
 * Importance is a small bounded integer used for ranking and eviction only.
 */
export const ImportanceSchema = z.number().int().min(1).max(10);

export type Importance = z.infer<typeof ImportanceSchema>;

/**
 * Clamp an arbitrary number into the 1..10 importance range.
 */
export function clampImportance(value: number): Importance {
  if (!Number.isFinite(value)) {
    return 1;
  }
  return Math.min(10, Math.max(1, Math.round(value)));
}

// ============================================
// Entity Keys
// ============================================

/**
 * Normalize an entity name into the key used by every memory tier.
 *
 * @example
 * normalizeEntityKey('  ACME   Corp ') // 'acme corp'
 */
export function normalizeEntityKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}
