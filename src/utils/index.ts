/**
 * Truncate a subject id for display: first 12 chars + "..."
 */
export function formatSubjectId(id: string, len = 12): string {
  if (!id) return '(none)';
  return id.length > len ? `${id.substring(0, len)}...` : id;
}

export function isObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === 'object' && !Array.isArray(v);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Round to a fixed number of decimals, for display and for report output.
 */
export function round(value: number, decimals = 3): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

/**
 * Canonical JSON: deterministic key ordering.
 * Sorts keys alphabetically at every depth.
 */
export function canonicalJson(obj: unknown): string {
  return JSON.stringify(obj, (_key, value) => {
    if (isObject(value)) {
      return Object.keys(value).sort().reduce((sorted: Record<string, unknown>, k) => {
        sorted[k] = value[k];
        return sorted;
      }, {});
    }
    return value;
  });
}

/**
 * Structured log helper with [tag] prefix.
 */
export function log(tag: string, message: string, ...args: unknown[]): void {
  console.log(`[${tag}] ${message}`, ...args);
}

export function logWarn(tag: string, message: string, ...args: unknown[]): void {
  console.warn(`[${tag}] ${message}`, ...args);
}

export function logError(tag: string, message: string, ...args: unknown[]): void {
  console.error(`[${tag}] ${message}`, ...args);
}
