/**
 * Canonical string form of a request id, so `12345` and `"12345"` key the
 * same correlation entry.
 */
export function normalizeId(id: unknown): string {
  if (id === null || id === undefined) {
    return 'null';
  }
  if (typeof id === 'string') {
    return id;
  }
  if (typeof id === 'number') {
    return Number.isInteger(id) ? String(id) : id.toFixed(0);
  }
  return String(id);
}

export const INTERNAL_ID_MIN = 90000;
export const INTERNAL_ID_MAX = 90999;
const LEGACY_INTERNAL_ID_MIN = 99000;
const LEGACY_INTERNAL_ID_MAX = 99999;
const INTERNAL_ID_PREFIX = 'autostep_';

/**
 * True for ids the proxy allocates for its own backend requests.
 */
export function isInternalId(id: unknown): boolean {
  const key = normalizeId(id);
  if (key.startsWith(INTERNAL_ID_PREFIX)) {
    return true;
  }
  if (!/^\d+$/.test(key)) {
    return false;
  }
  const value = Number(key);
  return (
    (value >= INTERNAL_ID_MIN && value <= INTERNAL_ID_MAX) ||
    (value >= LEGACY_INTERNAL_ID_MIN && value <= LEGACY_INTERNAL_ID_MAX)
  );
}
