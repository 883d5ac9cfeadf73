/**
 * json-utils.ts
 * JSON helpers shared by the logger, the terminal feed and the profile store
 */

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Converts a value to a JSON string, returning an empty string when the value
 * cannot be serialized (circular references, BigInt).
 */
export const safeJsonStringify = (value: unknown, space?: number): string => {
  try {
    return JSON.stringify(value, replaceErrors, space) ?? '';
  } catch {
    return '';
  }
};

/**
 * Parses a JSON string, returning undefined on malformed input.
 */
export const safeJsonParse = (text: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serializes with object keys sorted at every depth, two-space indented.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}
