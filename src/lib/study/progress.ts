import type { HintType, ProgressFields, ProgressKey, ProgressRecord } from "./types";
import { HINT_FIELD } from "./types";

export interface ProgressStore {
    get(userId: string, wordId: string): Promise<ProgressRecord | null>;
    getMany(userId: string, wordIds: readonly string[]): Promise<Map<string, ProgressRecord>>;
    /** Creates the record with defaults when missing, then merges `fields`. */
    upsert(key: ProgressKey, fields: ProgressFields): Promise<ProgressRecord>;
    /** Records whose next_check_date is on or before `asOf`. Untouched words are not included. */
    dueWordIds(userId: string, languageId: string, asOf: string): Promise<Set<string>>;
    listByLanguage(userId: string, languageId: string): Promise<ProgressRecord[]>;
}

export function readHint(record: ProgressRecord | null, type: HintType): string | null {
    if (!record) return null;
    const text = record[HINT_FIELD[type]];
    return text && text.trim() ? text : null;
}
