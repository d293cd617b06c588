import type { WordCatalog } from "./catalog";
import { InvalidInputError, InvalidSessionStateError, NotFoundError } from "./errors";
import { advanceTo, assertCanApply, beginHint, finishHint, initSession, reveal, useHint } from "./machine";
import type { ProgressStore } from "./progress";
import { readHint } from "./progress";
import { applyScore, toggleSkip as flipSkip } from "./scoring";
import { firstCandidate } from "./selector";
import type { SessionStore } from "./sessionStore";
import type { SettingsProvider } from "./settings";
import { progressSummary } from "./summary";
import type {
    HintType,
    ProgressFields,
    ProgressKey,
    ProgressRecord,
    ProgressSummary,
    Score,
    SessionCompleted,
    SessionHandle,
    SessionState,
    StudyCard,
    Word,
} from "./types";
import { HINT_FIELD, HINT_TYPES, isHintType } from "./types";
import { toYmd } from "./utils";

export type StudyServiceDeps = {
    catalog: WordCatalog;
    progress: ProgressStore;
    settings: SettingsProvider;
    sessions: SessionStore;
    now?: () => Date;
    newId?: () => string;
    maxIntervalDays?: number;
};

export type StudyView = StudyCard | SessionCompleted;

function hintFields(type: HintType, text: string): ProgressFields {
    const fields: ProgressFields = {};
    fields[HINT_FIELD[type]] = text;
    return fields;
}

function assertScore(value: number): Score {
    if (value !== 0 && value !== 1) {
        throw new InvalidInputError("score must be 0 or 1");
    }
    return value === 1 ? 1 : 0;
}

function assertHintType(value: string): HintType {
    if (!isHintType(value)) {
        throw new InvalidInputError(`Unknown hint type: ${value}`);
    }
    return value;
}

function keyOf(state: SessionState, word: Word): ProgressKey {
    return { userId: state.user_id, wordId: word.id, languageId: state.language_id };
}

export function createStudyService(deps: StudyServiceDeps) {
    const now = deps.now ?? (() => new Date());
    const newId = deps.newId ?? (() => crypto.randomUUID());
    const today = () => toYmd(now());
    const selectorDeps = { catalog: deps.catalog, progress: deps.progress };
    const scoringDeps = { progress: deps.progress, today, maxIntervalDays: deps.maxIntervalDays };

    async function load(handle: SessionHandle): Promise<SessionState> {
        const state = await deps.sessions.load(handle.userId);
        if (!state || state.id !== handle.sessionId) {
            throw new InvalidSessionStateError("No active study session, start a new one");
        }
        return state;
    }

    async function save(state: SessionState): Promise<SessionState> {
        const stamped = { ...state, updated_at: now().toISOString() };
        await deps.sessions.save(stamped);
        return stamped;
    }

    async function view(state: SessionState, known?: ProgressRecord | null): Promise<StudyView> {
        const word = state.current_word;
        if (state.status === "completed" || !word) {
            return { session_id: state.id, status: "completed", stats: state.stats };
        }

        const [record, settings] = await Promise.all([
            known === undefined ? deps.progress.get(state.user_id, word.id) : Promise.resolve(known),
            deps.settings.get(state.user_id, state.language_id),
        ]);

        const hints: Partial<Record<HintType, string>> = {};
        for (const type of HINT_TYPES) {
            if (!state.used_hints.includes(type) && state.hint_draft !== type) continue;
            const text = readHint(record, type);
            if (text) hints[type] = text;
        }

        return {
            session_id: state.id,
            status: state.status,
            word: {
                id: word.id,
                word_number: word.word_number,
                translation: word.translation,
                word_foreign: state.word_shown ? word.word_foreign : null,
                transcription: state.word_shown ? word.transcription : null,
                sound_file_path: state.word_shown ? word.sound_file_path : null,
            },
            word_shown: state.word_shown,
            used_hints: [...state.used_hints],
            available_hints: HINT_TYPES.filter((type) => settings.show_hints[type]),
            hints,
            hint_draft: state.hint_draft,
            progress: record,
            stats: state.stats,
        };
    }

    async function nextWord(state: SessionState, after: number | null): Promise<Word | null> {
        const settings = await deps.settings.get(state.user_id, state.language_id);
        return firstCandidate(selectorDeps, state.user_id, state.language_id, settings, {
            today: today(),
            after,
        });
    }

    return {
        /** Starts a fresh session, replacing whatever session the user had. */
        async beginSession(userId: string, languageId: string): Promise<SessionHandle> {
            const settings = await deps.settings.get(userId, languageId);
            const first = await firstCandidate(selectorDeps, userId, languageId, settings, {
                today: today(),
            });
            const state = initSession({
                id: newId(),
                userId,
                languageId,
                firstWord: first,
                nowIso: now().toISOString(),
            });
            await deps.sessions.save(state);
            return { userId, sessionId: state.id };
        },

        async currentWord(handle: SessionHandle): Promise<StudyView> {
            return view(await load(handle));
        },

        async reveal(handle: SessionHandle): Promise<StudyView> {
            const state = await load(handle);
            return view(await save(reveal(state)));
        },

        /**
         * Scores the current word; any hint used on it turns the answer into a 0.
         * The next word is looked up before the score is written, so a failed
         * lookup leaves the word unscored.
         */
        async recordAnswer(handle: SessionHandle, score: number): Promise<StudyView> {
            const validScore = assertScore(score);
            const state = await load(handle);
            const word = assertCanApply(state, "answer");

            const next = await nextWord(state, word.word_number);
            const record = await applyScore(scoringDeps, keyOf(state, word), validScore, state.used_hints.length > 0);

            return view(await save(advanceTo(state, record.score, next)));
        },

        /** Shows a stored hint; the penalty is charged when the word is answered. */
        async recordHintUse(handle: SessionHandle, hintType: string): Promise<StudyView> {
            const type = assertHintType(hintType);
            const state = await load(handle);
            const word = assertCanApply(state, "use_hint");

            const [record, settings] = await Promise.all([
                deps.progress.get(state.user_id, word.id),
                deps.settings.get(state.user_id, state.language_id),
            ]);
            if (!settings.show_hints[type]) {
                throw new InvalidInputError(`Hint type ${type} is turned off`);
            }
            if (readHint(record, type) === null) {
                throw new NotFoundError(`No ${type} hint for this word`);
            }

            return view(await save(useHint(state, type)), record);
        },

        async toggleSkip(handle: SessionHandle): Promise<StudyView> {
            const state = await load(handle);
            const word = assertCanApply(state, "toggle_skip");
            const record = await flipSkip(deps, keyOf(state, word));
            return view(state, record);
        },

        async beginHint(handle: SessionHandle, hintType: string): Promise<StudyView> {
            const type = assertHintType(hintType);
            const state = await load(handle);
            const word = assertCanApply(state, "begin_hint");
            const record = await deps.progress.get(state.user_id, word.id);
            return view(await save(beginHint(state, type, readHint(record, type) !== null)), record);
        },

        async saveHint(handle: SessionHandle, text: string): Promise<StudyView> {
            const trimmed = text.trim();
            if (!trimmed) {
                throw new InvalidInputError("Hint text must not be empty");
            }
            const state = await load(handle);
            const word = assertCanApply(state, "save_hint");
            if (!state.hint_draft) {
                throw new InvalidSessionStateError("No hint is being edited");
            }

            const record = await deps.progress.upsert(keyOf(state, word), hintFields(state.hint_draft, trimmed));
            return view(await save(finishHint(state, true)), record);
        },

        async cancelHint(handle: SessionHandle): Promise<StudyView> {
            const state = await load(handle);
            return view(await save(finishHint(state, false)));
        },

        async endSession(handle: SessionHandle): Promise<void> {
            await load(handle);
            await deps.sessions.remove(handle.userId);
        },

        async progressSummary(userId: string, languageId: string): Promise<ProgressSummary> {
            return progressSummary(selectorDeps, userId, languageId, today());
        },
    };
}

export type StudyService = ReturnType<typeof createStudyService>;
