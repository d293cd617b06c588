import { NextResponse } from "next/server";
import { requireUser } from "@/lib/api/auth";
import { badRequest, readJsonBody, readString, studyErrorResponse } from "@/lib/api/study";
import { getStudyService } from "@/lib/api/studyService";

export async function POST(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const body = await readJsonBody(req);
    if (!body) return badRequest("Invalid JSON body");

    const sessionId = readString(body, "sessionId");
    const type = readString(body, "type");
    if (!sessionId || !type) return badRequest("sessionId and type are required");

    try {
        const card = await getStudyService().recordHintUse({ userId, sessionId }, type);
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/hint", err);
    }
}
