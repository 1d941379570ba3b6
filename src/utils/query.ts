/** Repeated query parameters (`?build=a&build=b`) as a list of strings. */
export function queryList(value: unknown): string[] {
  if (typeof value === 'string') return value ? [value] : [];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string' && v !== '');
  return [];
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
