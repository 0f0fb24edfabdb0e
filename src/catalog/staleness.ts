/**
 * Pricewise — Staleness Policy
 */

/**
 * A stored record is stale once strictly more than `ttlMs` has passed since
 * it was last updated. Accepts epoch ms, a Date or an ISO timestamp; an
 * unreadable timestamp counts as stale.
 */
export function isStale(
  updatedAt: number | string | Date,
  ttlMs: number,
  now: number = Date.now()
): boolean {
  const updatedMs =
    typeof updatedAt === 'number'
      ? updatedAt
      : updatedAt instanceof Date
        ? updatedAt.getTime()
        : Date.parse(updatedAt);

  if (Number.isNaN(updatedMs)) return true;
  return now - updatedMs > ttlMs;
}
