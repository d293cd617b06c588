import type { HintType, SessionState, SessionStatus, Word } from "./types";
import { isHintType } from "./types";

/** Keyed by user: a user has at most one live session. */
export interface SessionStore {
    load(userId: string): Promise<SessionState | null>;
    save(state: SessionState): Promise<void>;
    remove(userId: string): Promise<void>;
}

const STATUSES: readonly SessionStatus[] = [
    "studying",
    "viewing_details",
    "creating_hint",
    "editing_hint",
    "completed",
];

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStatus(value: unknown): value is SessionStatus {
    return typeof value === "string" && (STATUSES as readonly string[]).includes(value);
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === "string";
}

function isReturnTo(value: unknown): value is SessionState["return_to"] {
    return value === null || value === "studying" || value === "viewing_details";
}

function isNullableHint(value: unknown): value is HintType | null {
    return value === null || isHintType(value);
}

function isNullableNumber(value: unknown): value is number | null {
    return value === null || typeof value === "number";
}

function readWord(value: unknown): Word | null | undefined {
    if (value === null) return null;
    if (!isObject(value)) return undefined;
    const { id, language_id, word_foreign, translation, transcription, word_number, sound_file_path } = value;
    if (
        typeof id !== "string" ||
        typeof language_id !== "string" ||
        typeof word_foreign !== "string" ||
        typeof translation !== "string" ||
        !isNullableString(transcription) ||
        typeof word_number !== "number" ||
        !isNullableString(sound_file_path)
    ) {
        return undefined;
    }
    return { id, language_id, word_foreign, translation, transcription, word_number, sound_file_path };
}

function readCount(stats: Json, field: string): number | undefined {
    const value = stats[field];
    return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/** Reads a session back from its stored JSON; null when the shape is not a session. */
export function parseSessionState(value: unknown): SessionState | null {
    if (!isObject(value)) return null;

    const { id, user_id, language_id, status, return_to, word_shown, used_hints, hint_draft, cursor } = value;
    const { stats, started_at, updated_at } = value;

    if (typeof id !== "string" || typeof user_id !== "string" || typeof language_id !== "string") return null;
    if (!isStatus(status)) return null;
    if (!isReturnTo(return_to)) return null;
    if (typeof word_shown !== "boolean") return null;
    if (!Array.isArray(used_hints) || !used_hints.every(isHintType)) return null;
    if (!isNullableHint(hint_draft) || !isNullableNumber(cursor)) return null;
    if (typeof started_at !== "string" || typeof updated_at !== "string") return null;

    const currentWord = readWord(value.current_word);
    if (currentWord === undefined) return null;

    if (!isObject(stats)) return null;
    const wordsProcessed = readCount(stats, "words_processed");
    const known = readCount(stats, "known");
    const unknown = readCount(stats, "unknown");
    if (wordsProcessed === undefined || known === undefined || unknown === undefined) return null;

    const hints: HintType[] = used_hints.filter(isHintType);

    return {
        id,
        user_id,
        language_id,
        status,
        return_to,
        current_word: currentWord,
        word_shown,
        used_hints: hints,
        hint_draft,
        cursor,
        stats: { words_processed: wordsProcessed, known, unknown },
        started_at,
        updated_at,
    };
}
