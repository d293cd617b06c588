import { NextResponse } from "next/server";
import { requireUser } from "@/lib/api/auth";
import { badRequest, readJsonBody, readString, studyErrorResponse } from "@/lib/api/study";
import { getStudyService } from "@/lib/api/studyService";

export async function POST(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const body = await readJsonBody(req);
    if (!body) return badRequest("Invalid JSON body");

    const languageId = readString(body, "languageId");
    if (!languageId) return badRequest("languageId is required");

    try {
        const service = getStudyService();
        const handle = await service.beginSession(userId, languageId);
        const card = await service.currentWord(handle);
        return NextResponse.json({ sessionId: handle.sessionId, card });
    } catch (err) {
        return studyErrorResponse("study/session", err);
    }
}

export async function GET(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const sessionId = new URL(req.url).searchParams.get("sessionId")?.trim();
    if (!sessionId) return badRequest("sessionId is required");

    try {
        const card = await getStudyService().currentWord({ userId, sessionId });
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/session", err);
    }
}

export async function DELETE(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const sessionId = new URL(req.url).searchParams.get("sessionId")?.trim();
    if (!sessionId) return badRequest("sessionId is required");

    try {
        await getStudyService().endSession({ userId, sessionId });
        return NextResponse.json({ ok: true });
    } catch (err) {
        return studyErrorResponse("study/session", err);
    }
}
