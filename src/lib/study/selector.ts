import type { WordCatalog } from "./catalog";
import type { ProgressStore } from "./progress";
import { assertValidSettings } from "./settings";
import type { ProgressRecord, UserLanguageSettings, Word } from "./types";
import { isDue } from "./utils";

const LOOKUP_BATCH_SIZE = 50;

export type SelectorDeps = {
    catalog: WordCatalog;
    progress: ProgressStore;
};

export type CandidateOptions = {
    today: string;
    /** Only words with word_number above this one are considered. */
    after?: number | null;
};

export function isEligible(
    record: ProgressRecord | undefined,
    settings: Pick<UserLanguageSettings, "skip_marked" | "use_check_date">,
    today: string
): boolean {
    if (!record) return true;
    if (settings.skip_marked && record.is_skipped) return false;
    if (settings.use_check_date) return isDue(record.next_check_date, today);
    return true;
}

/**
 * Lazily yields the words a user should study next, ascending by word_number.
 * Progress records are fetched one batch at a time, as the consumer pulls.
 */
export async function* nextCandidates(
    deps: SelectorDeps,
    userId: string,
    languageId: string,
    settings: UserLanguageSettings,
    options: CandidateOptions
): AsyncGenerator<Word> {
    assertValidSettings(settings);

    const after = options.after ?? 0;
    const startNumber = Math.max(settings.start_word, after + 1);

    async function* eligibleOf(words: Word[]): AsyncGenerator<Word> {
        const records = await deps.progress.getMany(
            userId,
            words.map((w) => w.id)
        );
        for (const word of words) {
            if (isEligible(records.get(word.id), settings, options.today)) {
                yield word;
            }
        }
    }

    let batch: Word[] = [];
    for await (const word of deps.catalog.wordsFrom(languageId, startNumber)) {
        batch.push(word);
        if (batch.length >= LOOKUP_BATCH_SIZE) {
            const full = batch;
            batch = [];
            yield* eligibleOf(full);
        }
    }
    if (batch.length > 0) yield* eligibleOf(batch);
}

export async function firstCandidate(
    deps: SelectorDeps,
    userId: string,
    languageId: string,
    settings: UserLanguageSettings,
    options: CandidateOptions
): Promise<Word | null> {
    for await (const word of nextCandidates(deps, userId, languageId, settings, options)) {
        return word;
    }
    return null;
}
