const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Ids that cannot be a UUID never reach a UUID column (Postgres would raise
 * 22P02 instead of returning no rows).
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
