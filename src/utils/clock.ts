export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** UTC trading day, e.g. "2026-03-14". */
export function tradingDayOf(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}
