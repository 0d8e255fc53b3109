export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First string value of a query parameter or header. Repeated parameters
 * resolve to their first occurrence; nested query objects to undefined.
 */
export function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const [first]: unknown[] = value;
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}
