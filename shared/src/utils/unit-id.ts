/**
 * Inventory unit identifiers accepted by the tracking system are exactly
 * sixteen decimal digits.
 */
export const UNIT_ID_PATTERN = /^\d{16}$/;

export function normalizeUnitId(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
  return '';
}

export function isValidUnitId(value: unknown): boolean {
  return UNIT_ID_PATTERN.test(normalizeUnitId(value));
}

/**
 * Splits candidates into well-formed ids (normalized) and rejects (as given).
 */
export function partitionUnitIds<T>(
  items: readonly T[],
  getId: (item: T) => unknown
): { valid: T[]; invalid: T[] } {
  const valid: T[] = [];
  const invalid: T[] = [];

  for (const item of items) {
    if (isValidUnitId(getId(item))) {
      valid.push(item);
    } else {
      invalid.push(item);
    }
  }

  return { valid, invalid };
}
