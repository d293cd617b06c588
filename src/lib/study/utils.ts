const DAY_MS = 24 * 60 * 60 * 1000;

export function toYmd(d: Date): string {
    return d.toISOString().slice(0, 10); // YYYY-MM-DD
}

export function addDays(ymd: string, days: number): string {
    const safeDays = Number.isFinite(days) ? Math.trunc(days) : 0;
    const base = Date.parse(`${ymd}T00:00:00Z`);
    return toYmd(new Date(base + safeDays * DAY_MS));
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

/** Dates compare lexically because both sides are YYYY-MM-DD. */
export function isDue(nextCheckDate: string | null, today: string): boolean {
    return nextCheckDate === null || nextCheckDate <= today;
}
