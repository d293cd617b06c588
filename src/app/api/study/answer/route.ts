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
    const score = body.score;

    if (!sessionId || typeof score !== "number" || (score !== 0 && score !== 1)) {
        return badRequest("sessionId and score (0 or 1) are required");
    }

    try {
        const card = await getStudyService().recordAnswer({ userId, sessionId }, score);
        return NextResponse.json({ card });
    } catch (err) {
        return studyErrorResponse("study/answer", err);
    }
}
