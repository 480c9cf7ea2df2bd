// ── Pacing ──────────────────────────────────────────────────
// Every fixed delay in the executor goes through a Pacer so the whole
// timing contract scales from one config value.

export type Pacer = (ms: number) => Promise<void>;

export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createPacer(scale: number): Pacer {
  return (ms: number) => delay(Math.round(ms * scale));
}

/** Format a date as `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
