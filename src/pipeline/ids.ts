/**
 * Execution ID Generation
 *
 * Execution ID Format: YYYYMMDD-HHMMSS-<entity-slug>[-N]
 *
 * IDs always contain a hyphen, so they can never be mistaken for the
 * ordinals `leadscout resume` also accepts.
 *
 * @module pipeline/ids
 */

/**
 * Legal-form suffixes and filler words dropped from slugs
 */
const STOPWORDS = new Set([
  'the', 'a', 'an', 'inc', 'llc', 'ltd', 'corp', 'co', 'gmbh', 'ag', 'plc', 'sa',
]);

/**
 * Maximum slug length in characters
 */
const MAX_SLUG_LENGTH = 40;

/**
 * Generate a file-name-friendly slug from an entity name.
 *
 * Rules applied in order:
 * 1. Lowercase and strip accents
 * 2. Replace anything that is not alphanumeric with hyphens
 * 3. Remove stopwords
 * 4. Truncate to 40 characters at a word boundary
 *
 * @example
 * ```typescript
 * generateEntitySlug('Acme Robotics, Inc.'); // 'acme-robotics'
 * ```
 */
export function generateEntitySlug(entity: string): string {
  let slug = entity
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0 && !STOPWORDS.has(word))
    .join('-');

  if (slug.length > MAX_SLUG_LENGTH) {
    // Don't cut mid-word; a hyphen right after the limit is a clean cut
    const window = slug.substring(0, MAX_SLUG_LENGTH + 1);
    const lastHyphen = window.lastIndexOf('-');
    slug = lastHyphen > 0 ? window.substring(0, lastHyphen) : slug.substring(0, MAX_SLUG_LENGTH);
  }

  return slug || 'entity';
}

/**
 * Format a date as YYYYMMDD-HHMMSS in local time.
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}-${hours}${minutes}${seconds}`;
}

/**
 * Handle ID collision by appending a numeric suffix.
 *
 * @example
 * ```typescript
 * handleCollision('20260107-143512-acme', ['20260107-143512-acme']);
 * // Returns: '20260107-143512-acme-2'
 * ```
 */
export function handleCollision(baseId: string, existingIds: Iterable<string>): string {
  const existingSet = new Set(existingIds);

  if (!existingSet.has(baseId)) {
    return baseId;
  }

  let suffix = 2;
  while (existingSet.has(`${baseId}-${suffix}`)) {
    suffix++;
  }
  return `${baseId}-${suffix}`;
}

/**
 * Generate a unique execution ID.
 */
export function generateExecutionId(
  entity: string,
  existingIds: Iterable<string>,
  now: Date = new Date()
): string {
  return handleCollision(`${formatTimestamp(now)}-${generateEntitySlug(entity)}`, existingIds);
}
