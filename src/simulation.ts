// Simulated series for the executive and anomaly panels. Randomness comes
// from Effect's Random service, so a seeded Random makes runs repeatable.

import { Effect, Random } from "effect";

export interface TimePoint {
  readonly date: string; // YYYY-MM-DD
  readonly value: number;
}

/** Normally distributed sample (Box–Muller). */
export const gaussian = (mean: number, sd: number) =>
  Effect.gen(function* () {
    const u1 = 1 - (yield* Random.next); // (0, 1], keeps log finite
    const u2 = yield* Random.next;
    return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  });

const isoDate = (d: Date) => d.toISOString().slice(0, 10);

export function monthEnds(year: number): string[] {
  return Array.from({ length: 12 }, (_, month) =>
    isoDate(new Date(Date.UTC(year, month + 1, 0))),
  );
}

export function daysOfYear(year: number): string[] {
  const days: string[] = [];
  for (
    let d = new Date(Date.UTC(year, 0, 1));
    d.getUTCFullYear() === year;
    d = new Date(d.getTime() + 86_400_000)
  ) {
    days.push(isoDate(d));
  }
  return days;
}

/** Monthly revenue: base × (1 + N(0, 0.05)). */
export const revenueTrend = (baseRevenue: number, year: number) =>
  Effect.forEach(monthEnds(year), (date) =>
    gaussian(0, 0.05).pipe(
      Effect.map((noise): TimePoint => ({ date, value: baseRevenue * (1 + noise) })),
    ),
  );

/** Seasonal baseline, in ms: 100 + 20·sin(2πi/365.25) + N(0, 5). */
export function seasonalBaseline(dayIndex: number): number {
  return 100 + 20 * Math.sin((2 * Math.PI * dayIndex) / 365.25);
}

export const anomalyBaseline = (year: number) =>
  Effect.forEach(daysOfYear(year), (date, i) =>
    gaussian(0, 5).pipe(
      Effect.map((noise): TimePoint => ({ date, value: seasonalBaseline(i) + noise })),
    ),
  );

export interface SimulatedResponse {
  readonly responseTime: number; // seconds
  readonly satisfaction: 4 | 5;
}

/** Response time U(0.5, 2.0) s and a 4- or 5-star rating. */
export const simulatedResponse = Effect.gen(function* () {
  const responseTime = yield* Random.nextRange(0.5, 2.0);
  const coin = yield* Random.next;
  const satisfaction: 4 | 5 = coin < 0.5 ? 4 : 5;
  return { responseTime, satisfaction } satisfies SimulatedResponse;
});
