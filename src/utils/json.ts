// JSON encoding for admin responses

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function hasToJSON(value: object): boolean {
  return typeof Reflect.get(value, 'toJSON') === 'function';
}

function normalize(value: unknown): unknown {
  if (value instanceof Date) {
    return formatDateTime(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value.entries(), ([key, entry]) => [String(key), normalize(entry)]));
  }
  if (value instanceof Set) {
    return Array.from(value, normalize);
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (typeof value === 'object' && value !== null && !hasToJSON(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, normalize(entry)]));
  }
  return value;
}

/**
 * JSON.stringify that also accepts dates (as local date-times), bigints, maps and sets.
 */
export function encodeJson(content: unknown): string {
  return JSON.stringify(normalize(content)) ?? 'null';
}
