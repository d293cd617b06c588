import type { ProgressStore } from "./progress";
import { advance } from "./scheduler";
import type { ProgressKey, ProgressRecord, Score } from "./types";

export type ScoringDeps = {
    progress: ProgressStore;
    today: () => string;
    maxIntervalDays?: number;
};

/**
 * Scores a word and reschedules it. One read for the previous interval,
 * one upsert for the result; store failures propagate unchanged.
 */
export async function applyScore(
    deps: ScoringDeps,
    key: ProgressKey,
    score: Score,
    hintUsed: boolean
): Promise<ProgressRecord> {
    const previous = await deps.progress.get(key.userId, key.wordId);
    const next = advance(previous, score, hintUsed, deps.today(), {
        maxIntervalDays: deps.maxIntervalDays,
    });

    return deps.progress.upsert(key, next);
}

/** Flips is_skipped and nothing else. */
export async function toggleSkip(
    deps: Pick<ScoringDeps, "progress">,
    key: ProgressKey
): Promise<ProgressRecord> {
    const previous = await deps.progress.get(key.userId, key.wordId);
    return deps.progress.upsert(key, { is_skipped: !(previous?.is_skipped ?? false) });
}
