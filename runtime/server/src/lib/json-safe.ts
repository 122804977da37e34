/**
 * Reduce an arbitrary value to JSON-safe primitives for API snapshots.
 * Plain objects and arrays are walked up to `maxDepth` levels; anything
 * else (class instances, functions, buffers, non-finite numbers) and
 * anything deeper is dropped.
 */
export function toJsonSafe(value: unknown, maxDepth = 5): unknown {
  if (maxDepth <= 0 || value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value) || value instanceof Set) {
    const items: unknown[] = [];
    for (const item of value) {
      const safe = toJsonSafe(item, maxDepth - 1);
      if (safe !== null) items.push(safe);
    }
    return items;
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const safe = toJsonSafe(item, maxDepth - 1);
      if (safe !== null) result[key] = safe;
    }
    return result;
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Parse a stored coordinate, falling back to 0 for anything non-numeric
 */
export function safeFloat(value: unknown): number {
  if (value === null || value === undefined || value === '') return 0;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
