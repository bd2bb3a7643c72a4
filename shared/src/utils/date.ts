/**
 * Converts a Date to whole Unix seconds.
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function toIsoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
