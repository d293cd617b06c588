import { SettingsInvalidError } from "./errors";
import type { HintType, UserLanguageSettings } from "./types";

export interface SettingsProvider {
    get(userId: string, languageId: string): Promise<UserLanguageSettings>;
}

export type RawSettings = {
    start_word?: unknown;
    skip_marked?: unknown;
    use_check_date?: unknown;
    show_hint_meaning?: unknown;
    show_hint_phoneticsound?: unknown;
    show_hint_phoneticassociation?: unknown;
    show_hint_writing?: unknown;
};

export const DEFAULT_SETTINGS = {
    start_word: 1,
    skip_marked: false,
    use_check_date: true,
} as const;

function readBoolean(raw: RawSettings, field: keyof RawSettings, fallback: boolean): boolean {
    const value = raw[field];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "boolean") {
        throw new SettingsInvalidError(`${field} must be a boolean`);
    }
    return value;
}

/** Fills defaults for missing fields; anything present must be well-formed. */
export function resolveSettings(
    userId: string,
    languageId: string,
    raw: RawSettings | null
): UserLanguageSettings {
    const source = raw ?? {};
    const startWord = source.start_word ?? DEFAULT_SETTINGS.start_word;

    if (typeof startWord !== "number" || !Number.isInteger(startWord) || startWord < 1) {
        throw new SettingsInvalidError("start_word must be an integer >= 1");
    }

    const showHints: Record<HintType, boolean> = {
        meaning: readBoolean(source, "show_hint_meaning", true),
        phoneticsound: readBoolean(source, "show_hint_phoneticsound", true),
        phoneticassociation: readBoolean(source, "show_hint_phoneticassociation", true),
        writing: readBoolean(source, "show_hint_writing", true),
    };

    return {
        user_id: userId,
        language_id: languageId,
        start_word: startWord,
        skip_marked: readBoolean(source, "skip_marked", DEFAULT_SETTINGS.skip_marked),
        use_check_date: readBoolean(source, "use_check_date", DEFAULT_SETTINGS.use_check_date),
        show_hints: showHints,
    };
}

export function assertValidSettings(settings: UserLanguageSettings): UserLanguageSettings {
    if (!Number.isInteger(settings.start_word) || settings.start_word < 1) {
        throw new SettingsInvalidError("start_word must be an integer >= 1");
    }
    return settings;
}
