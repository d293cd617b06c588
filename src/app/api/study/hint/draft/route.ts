import { NextResponse } from "next/server";
import { requireUser } from "@/lib/api/auth";
import { badRequest, readJsonBody, readString, studyErrorResponse } from "@/lib/api/study";
import { getStudyService } from "@/lib/api/studyService";

// POST opens the editor, PUT saves the text, DELETE leaves without saving.

export async function POST(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const body = await readJsonBody(req);
    if (!body) return badRequest("Invalid JSON body");

    const sessionId = readString(body, "sessionId");
    const type = readString(body, "type");
    if (!sessionId || !type) return badRequest("sessionId and type are required");

    try {
        const card = await getStudyService().beginHint({ userId, sessionId }, type);
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/hint/draft", err);
    }
}

export async function PUT(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const body = await readJsonBody(req);
    if (!body) return badRequest("Invalid JSON body");

    const sessionId = readString(body, "sessionId");
    const text = readString(body, "text");
    if (!sessionId || !text) return badRequest("sessionId and text are required");

    try {
        const card = await getStudyService().saveHint({ userId, sessionId }, text);
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/hint/draft", err);
    }
}

export async function DELETE(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const sessionId = new URL(req.url).searchParams.get("sessionId")?.trim();
    if (!sessionId) return badRequest("sessionId is required");

    try {
        const card = await getStudyService().cancelHint({ userId, sessionId });
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/hint/draft", err);
    }
}
