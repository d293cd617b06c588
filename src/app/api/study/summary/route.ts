import { NextResponse } from "next/server";
import { requireUser } from "@/lib/api/auth";
import { badRequest, studyErrorResponse } from "@/lib/api/study";
import { getStudyService } from "@/lib/api/studyService";

export async function GET(req: Request) {
    const { userId, response } = await requireUser();
    if (response) return response;

    const languageId = new URL(req.url).searchParams.get("languageId")?.trim();
    if (!languageId) return badRequest("languageId is required");

    try {
        const summary = await getStudyService().progressSummary(userId, languageId);
        return NextResponse.json(summary);
    } catch (err) {
        return studyErrorResponse("study/summary", err);
    }
}
