import { NextResponse } from "next/server";
import { isStudyError, type StudyErrorKind } from "@/lib/study/errors";

const STATUS_BY_KIND: Record<StudyErrorKind, number> = {
    not_found: 404,
    invalid_session_state: 409,
    settings_invalid: 422,
    invalid_input: 400,
    store_unavailable: 503,
};

export type JsonBody = Record<string, unknown>;

export function badRequest(message: string) {
    return NextResponse.json({ error: message }, { status: 400 });
}

function isJsonObject(value: unknown): value is JsonBody {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses a JSON object body; null when the body is missing or not an object. */
export async function readJsonBody(req: Request): Promise<JsonBody | null> {
    try {
        const body: unknown = await req.json();
        return isJsonObject(body) ? body : null;
    } catch {
        return null;
    }
}

export function readString(body: JsonBody, field: string): string {
    const value = body[field];
    return typeof value === "string" ? value.trim() : "";
}

export function studyErrorResponse(tag: string, err: unknown) {
    if (isStudyError(err)) {
        if (err.kind === "store_unavailable") {
            console.error(`[${tag}] store unavailable`, err);
        }
        return NextResponse.json(
            { error: err.message, kind: err.kind },
            { status: STATUS_BY_KIND[err.kind] }
        );
    }

    console.error(`[${tag}] unexpected error`, err);
    const message = err instanceof Error ? err.message : "Unknown error";
    return NextResponse.json({ error: message }, { status: 500 });
}
