export type HintType = "meaning" | "phoneticsound" | "phoneticassociation" | "writing";

export const HINT_TYPES: readonly HintType[] = [
    "meaning",
    "phoneticassociation",
    "phoneticsound",
    "writing",
] as const;

export type HintField =
    | "hint_meaning"
    | "hint_phoneticsound"
    | "hint_phoneticassociation"
    | "hint_writing";

export const HINT_FIELD: Record<HintType, HintField> = {
    meaning: "hint_meaning",
    phoneticsound: "hint_phoneticsound",
    phoneticassociation: "hint_phoneticassociation",
    writing: "hint_writing",
};

export function isHintType(value: unknown): value is HintType {
    return typeof value === "string" && (HINT_TYPES as readonly string[]).includes(value);
}

export type Score = 0 | 1;

export type Word = {
    id: string;
    language_id: string;
    word_foreign: string;
    translation: string;
    transcription: string | null;
    word_number: number;
    sound_file_path: string | null;
};

export type ProgressRecord = {
    user_id: string;
    word_id: string;
    language_id: string;
    score: Score;
    is_skipped: boolean;
    check_interval: number;
    /** YYYY-MM-DD, null until the word is scored for the first time */
    next_check_date: string | null;
    hint_meaning: string | null;
    hint_phoneticsound: string | null;
    hint_phoneticassociation: string | null;
    hint_writing: string | null;
    created_at: string;
    updated_at: string;
};

export type ProgressKey = {
    userId: string;
    wordId: string;
    languageId: string;
};

export type ProgressFields = Partial<
    Pick<
        ProgressRecord,
        | "score"
        | "is_skipped"
        | "check_interval"
        | "next_check_date"
        | "hint_meaning"
        | "hint_phoneticsound"
        | "hint_phoneticassociation"
        | "hint_writing"
    >
>;

export type UserLanguageSettings = {
    user_id: string;
    language_id: string;
    start_word: number;
    skip_marked: boolean;
    use_check_date: boolean;
    show_hints: Record<HintType, boolean>;
};

export type SessionStatus =
    | "studying"
    | "viewing_details"
    | "creating_hint"
    | "editing_hint"
    | "completed";

export type SessionStats = {
    words_processed: number;
    known: number;
    unknown: number;
};

export type SessionState = {
    id: string;
    user_id: string;
    language_id: string;
    status: SessionStatus;
    /** Status to go back to when a hint draft is saved or cancelled. */
    return_to: "studying" | "viewing_details" | null;
    current_word: Word | null;
    word_shown: boolean;
    used_hints: HintType[];
    hint_draft: HintType | null;
    /** word_number of the last word answered in this session */
    cursor: number | null;
    stats: SessionStats;
    started_at: string;
    updated_at: string;
};

export type SessionHandle = {
    userId: string;
    sessionId: string;
};

export type StudyCard = {
    session_id: string;
    status: Exclude<SessionStatus, "completed">;
    word: {
        id: string;
        word_number: number;
        translation: string;
        word_foreign: string | null;
        transcription: string | null;
        sound_file_path: string | null;
    };
    word_shown: boolean;
    used_hints: HintType[];
    available_hints: HintType[];
    hints: Partial<Record<HintType, string>>;
    hint_draft: HintType | null;
    progress: ProgressRecord | null;
    stats: SessionStats;
};

export type SessionCompleted = {
    session_id: string;
    status: "completed";
    stats: SessionStats;
};

export type ProgressSummary = {
    total: number;
    studied: number;
    known: number;
    skipped: number;
    percentage: number;
    due_today: number;
    last_study_date: string | null;
};
