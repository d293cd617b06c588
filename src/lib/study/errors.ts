export type StudyErrorKind =
    | "not_found"
    | "invalid_session_state"
    | "store_unavailable"
    | "settings_invalid"
    | "invalid_input";

export abstract class StudyError extends Error {
    abstract readonly kind: StudyErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class NotFoundError extends StudyError {
    readonly kind = "not_found";
}

/** The session has to be restarted; the action cannot be retried in place. */
export class InvalidSessionStateError extends StudyError {
    readonly kind = "invalid_session_state";
}

export class StoreUnavailableError extends StudyError {
    readonly kind = "store_unavailable";

    constructor(
        message: string,
        readonly code: string | null = null,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class SettingsInvalidError extends StudyError {
    readonly kind = "settings_invalid";
}

/** Caller input the core cannot act on, e.g. a score outside 0/1. */
export class InvalidInputError extends StudyError {
    readonly kind = "invalid_input";
}

export function isStudyError(value: unknown): value is StudyError {
    return value instanceof StudyError;
}
