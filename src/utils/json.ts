export type JsonObject = { [key: string]: unknown };

/**
 * Parses a JSON string, returning undefined instead of throwing when the text is not JSON.
 */
export function tryParseJson(text: string): unknown {
  if (!text) return undefined;

  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `key` from a JSON object, falling back to an empty array when the key is absent.
 */
export function getOrEmptyArray(object: JsonObject, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(object, key) ? object[key] : [];
}

/**
 * String form of a JSON scalar; null becomes the empty string.
 * Returns undefined for arrays and objects.
 *
 * Numbers have already been through `JSON.parse`, so they come back as
 * JavaScript prints them: `1.0` gives `"1"` and `12345678901234567890`
 * gives `"12345678901234567000"`.
 */
export function jsonScalarToString(value: unknown): string | undefined {
  if (value === null) return '';
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
      return String(value);
    default:
      return undefined;
  }
}
