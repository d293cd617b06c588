import type { ProgressRecord, Score } from "./types";
import { addDays, clamp } from "./utils";

export const MAX_CHECK_INTERVAL_DAYS = 90;

export type ScheduleResult = {
    score: Score;
    check_interval: number;
    next_check_date: string;
};

type SchedulerOptions = {
    maxIntervalDays?: number;
};

export function nextIntervalDays(previousInterval: number, maxIntervalDays = MAX_CHECK_INTERVAL_DAYS): number {
    const safePrevious = Number.isFinite(previousInterval) ? Math.max(0, Math.floor(previousInterval)) : 0;
    if (safePrevious === 0) return 1;
    return clamp(safePrevious * 2, 1, maxIntervalDays);
}

/**
 * Computes the review schedule after an answer.
 * Any used hint counts as "did not know": score 0, back tomorrow.
 */
export function advance(
    previous: Pick<ProgressRecord, "check_interval"> | null,
    score: Score,
    hintUsed: boolean,
    today: string,
    options: SchedulerOptions = {}
): ScheduleResult {
    const maxIntervalDays = options.maxIntervalDays ?? MAX_CHECK_INTERVAL_DAYS;

    if (hintUsed || score === 0) {
        return { score: 0, check_interval: 1, next_check_date: addDays(today, 1) };
    }

    const checkInterval = nextIntervalDays(previous?.check_interval ?? 0, maxIntervalDays);
    return {
        score: 1,
        check_interval: checkInterval,
        next_check_date: addDays(today, checkInterval),
    };
}
