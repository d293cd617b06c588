import { InvalidSessionStateError } from "./errors";
import type { HintType, Score, SessionState, SessionStatus, Word } from "./types";

export type SessionAction =
    | "reveal"
    | "answer"
    | "use_hint"
    | "toggle_skip"
    | "begin_hint"
    | "save_hint"
    | "cancel_hint";

const ALLOWED: Record<SessionAction, readonly SessionStatus[]> = {
    reveal: ["studying", "viewing_details"],
    answer: ["viewing_details"],
    use_hint: ["studying", "viewing_details"],
    toggle_skip: ["studying", "viewing_details", "creating_hint", "editing_hint"],
    begin_hint: ["studying", "viewing_details"],
    save_hint: ["creating_hint", "editing_hint"],
    cancel_hint: ["creating_hint", "editing_hint"],
};

/** Returns the current word, or throws when `action` is not allowed right now. */
export function assertCanApply(state: SessionState, action: SessionAction): Word {
    if (!ALLOWED[action].includes(state.status)) {
        throw new InvalidSessionStateError(`Cannot ${action} while ${state.status}`);
    }
    if (!state.current_word) {
        throw new InvalidSessionStateError(`Cannot ${action} without a current word`);
    }
    return state.current_word;
}

export function initSession(params: {
    id: string;
    userId: string;
    languageId: string;
    firstWord: Word | null;
    nowIso: string;
}): SessionState {
    return {
        id: params.id,
        user_id: params.userId,
        language_id: params.languageId,
        status: params.firstWord ? "studying" : "completed",
        return_to: null,
        current_word: params.firstWord,
        word_shown: false,
        used_hints: [],
        hint_draft: null,
        cursor: null,
        stats: { words_processed: 0, known: 0, unknown: 0 },
        started_at: params.nowIso,
        updated_at: params.nowIso,
    };
}

export function reveal(state: SessionState): SessionState {
    assertCanApply(state, "reveal");
    return { ...state, status: "viewing_details", word_shown: true };
}

export function useHint(state: SessionState, type: HintType): SessionState {
    assertCanApply(state, "use_hint");
    if (state.used_hints.includes(type)) return state;
    return { ...state, used_hints: [...state.used_hints, type] };
}

export function beginHint(state: SessionState, type: HintType, hintExists: boolean): SessionState {
    assertCanApply(state, "begin_hint");
    const returnTo = state.status === "viewing_details" ? "viewing_details" : "studying";
    return {
        ...state,
        status: hintExists ? "editing_hint" : "creating_hint",
        return_to: returnTo,
        hint_draft: type,
    };
}

/** Leaves the hint editor. A saved hint counts as used for the current word. */
export function finishHint(state: SessionState, saved: boolean): SessionState {
    assertCanApply(state, saved ? "save_hint" : "cancel_hint");
    const type = state.hint_draft;
    const usedHints =
        saved && type && !state.used_hints.includes(type) ? [...state.used_hints, type] : state.used_hints;

    return {
        ...state,
        status: state.return_to ?? "studying",
        return_to: null,
        hint_draft: null,
        used_hints: usedHints,
    };
}

/** Moves past the answered word to `nextWord`, or completes the session. */
export function advanceTo(state: SessionState, answered: Score, nextWord: Word | null): SessionState {
    const current = assertCanApply(state, "answer");
    return {
        ...state,
        status: nextWord ? "studying" : "completed",
        current_word: nextWord,
        word_shown: false,
        used_hints: [],
        hint_draft: null,
        return_to: null,
        cursor: current.word_number,
        stats: {
            words_processed: state.stats.words_processed + 1,
            known: state.stats.known + (answered === 1 ? 1 : 0),
            unknown: state.stats.unknown + (answered === 0 ? 1 : 0),
        },
    };
}
