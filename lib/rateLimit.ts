export interface RateLimiter {
  isRateLimited(key: string): boolean;
}

interface Window {
  start: number;
  count: number;
}

// Fixed window per client key.
export function createRateLimiter(
  max: number,
  windowMs: number,
  now: () => number = Date.now,
): RateLimiter {
  const windows = new Map<string, Window>();

  return {
    isRateLimited(key: string): boolean {
      const ts = now();
      const entry = windows.get(key);
      if (!entry || ts - entry.start > windowMs) {
        windows.set(key, { start: ts, count: 1 });
        for (const [k, w] of windows) {
          if (ts - w.start > windowMs) windows.delete(k);
        }
        return false;
      }
      entry.count++;
      return entry.count > max;
    },
  };
}
