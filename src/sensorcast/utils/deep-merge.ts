export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

const BLOCKED_KEYS = new Set(["__proto__", "constructor", "prototype"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively copies `source` onto `target`. Arrays and `null` replace the
 * target value, `undefined` leaves it alone. Nested objects are cloned before
 * being written so defaults shared across calls are never mutated.
 */
export function deepMerge<T extends object>(target: T, source: DeepPartial<T> | undefined): T {
  const base: object = target;
  const out: Record<string, unknown> = { ...base };
  if (!source) {
    return out as T;
  }
  for (const [key, value] of Object.entries(source)) {
    if (BLOCKED_KEYS.has(key) || value === undefined) {
      continue;
    }
    const current = out[key];
    out[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return out as T;
}
