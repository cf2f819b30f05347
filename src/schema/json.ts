import { z } from 'zod';

// ── JSON value ───────────────────────────────────────────────

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

// ── Normalization ────────────────────────────────────────────

export const CIRCULAR_MARKER = '[Circular]';

/**
 * Convert an arbitrary value into a JsonValue.
 * Map key order is kept. Values JSON cannot carry are turned into strings.
 */
export function toJsonValue(value: unknown): JsonValue {
  return normalize(value, new Set<object>());
}

function normalize(value: unknown, ancestors: Set<object>): JsonValue {
  switch (typeof value) {
    case 'undefined':
      return null;
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
    case 'object':
      break;
  }

  if (typeof value !== 'object' || value === null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (ancestors.has(value)) return CIRCULAR_MARKER;

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => normalize(item, ancestors));
    }

    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = normalize(item, ancestors);
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}

// ── Freezing ─────────────────────────────────────────────────

export function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
