import { NotFoundError, StoreUnavailableError, type StudyError } from "@/lib/study/errors";

type PostgrestLikeError = {
    message: string;
    code?: string;
    details?: string | null;
    hint?: string | null;
};

const NOT_FOUND_CODES = new Set([
    "PGRST116", // .single() matched no rows
    "23503", // foreign key violation: word, language or user is gone
    "22P02", // malformed uuid: no row can carry that id
]);

export function toStoreError(context: string, error: PostgrestLikeError): StudyError {
    const code = error.code?.trim() || null;
    if (code && NOT_FOUND_CODES.has(code)) {
        return new NotFoundError(`${context}: ${error.message}`, { cause: error });
    }
    return new StoreUnavailableError(`${context}: ${error.message}`, code, { cause: error });
}
