import { NextResponse } from "next/server";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { requireUser } from "@/lib/api/auth";
import { StoreUnavailableError } from "@/lib/study/errors";
import { createStudyService, type StudyService } from "@/lib/study/service";
import {
    createClock,
    createMemoryCatalog,
    createMemoryProgressStore,
    createMemorySessionStore,
    createMemorySettings,
    makeWords,
} from "@/lib/study/__tests__/helpers/memory";

const holder = vi.hoisted(() => {
    const state: { service: StudyService | null } = { service: null };
    return state;
});

vi.mock("@/lib/api/auth", () => ({ requireUser: vi.fn() }));
vi.mock("@/lib/api/studyService", () => ({
    getStudyService: () => {
        if (!holder.service) throw new Error("study service not set up");
        return holder.service;
    },
}));

import * as answerRoute from "../answer/route";
import * as hintDraftRoute from "../hint/draft/route";
import * as hintRoute from "../hint/route";
import * as revealRoute from "../reveal/route";
import * as sessionRoute from "../session/route";
import * as skipRoute from "../skip/route";
import * as summaryRoute from "../summary/route";

const BASE = "http://localhost/api/study";

function post(path: string, body: unknown, method = "POST") {
    return new Request(`${BASE}${path}`, {
        method,
        headers: { "content-type": "application/json" },
        body: typeof body === "string" ? body : JSON.stringify(body),
    });
}

function get(path: string, method = "GET") {
    return new Request(`${BASE}${path}`, { method });
}

let progress: ReturnType<typeof createMemoryProgressStore>;

beforeEach(() => {
    const clock = createClock("2026-03-10T09:00:00Z");
    progress = createMemoryProgressStore(clock.now);
    let ids = 0;
    holder.service = createStudyService({
        catalog: createMemoryCatalog({ "lang-1": makeWords(2) }),
        progress,
        settings: createMemorySettings(),
        sessions: createMemorySessionStore(),
        now: clock.now,
        newId: () => `session-${++ids}`,
    });
    vi.mocked(requireUser).mockResolvedValue({ userId: "user-1", response: null });
});

afterEach(() => {
    vi.restoreAllMocks();
});

async function startSession() {
    const res = await sessionRoute.POST(post("/session", { languageId: "lang-1" }));
    expect(res.status).toBe(200);
    return "session-1";
}

describe("study routes", () => {
    it("answers 401 without a signed-in user", async () => {
        vi.mocked(requireUser).mockResolvedValue({
            userId: null,
            response: NextResponse.json({ error: "Unauthorized" }, { status: 401 }),
        });

        const res = await sessionRoute.POST(post("/session", { languageId: "lang-1" }));

        expect(res.status).toBe(401);
        expect(await res.json()).toEqual({ error: "Unauthorized" });
    });

    it("rejects a body that is not JSON", async () => {
        const res = await sessionRoute.POST(post("/session", "not json"));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("starts a session and returns the first card", async () => {
        const res = await sessionRoute.POST(post("/session", { languageId: "lang-1" }));
        const json = await res.json();

        expect(res.status).toBe(200);
        expect(json.sessionId).toBe("session-1");
        expect(json.card.status).toBe("studying");
        expect(json.card.word.word_number).toBe(1);
        expect(json.card.word.word_foreign).toBeNull();
    });

    it("maps an unknown language to 404", async () => {
        const res = await sessionRoute.POST(post("/session", { languageId: "lang-9" }));

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: "Language lang-9 not found", kind: "not_found" });
    });

    it("answers 409 when a word is scored before it is revealed", async () => {
        const sessionId = await startSession();

        const res = await answerRoute.POST(post("/answer", { sessionId, score: 1 }));

        expect(res.status).toBe(409);
        expect(await res.json()).toEqual({
            error: "Cannot answer while studying",
            kind: "invalid_session_state",
        });
    });

    it("validates the score before touching the session", async () => {
        const sessionId = await startSession();

        const res = await answerRoute.POST(post("/answer", { sessionId, score: "1" }));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "sessionId and score (0 or 1) are required" });
    });

    it("walks a word from reveal to answer", async () => {
        const sessionId = await startSession();
        await progress.upsert({ userId: "user-1", wordId: "w-1", languageId: "lang-1" }, { hint_meaning: "a small hammer" });

        const revealed = await (await revealRoute.POST(post("/reveal", { sessionId }))).json();
        expect(revealed.card.word.word_foreign).toBe("foreign-1");

        const hinted = await (await hintRoute.POST(post("/hint", { sessionId, type: "meaning" }))).json();
        expect(hinted.card.used_hints).toEqual(["meaning"]);
        expect(hinted.card.hints).toEqual({ meaning: "a small hammer" });

        const answered = await (await answerRoute.POST(post("/answer", { sessionId, score: 1 }))).json();
        expect(answered.card.word.word_number).toBe(2);
        expect(answered.card.stats).toEqual({ words_processed: 1, known: 0, unknown: 1 });
    });

    it("opens and saves a hint", async () => {
        const sessionId = await startSession();

        const opened = await hintDraftRoute.POST(post("/hint/draft", { sessionId, type: "writing" }));
        expect((await opened.json()).card.status).toBe("creating_hint");

        const saved = await hintDraftRoute.PUT(post("/hint/draft", { sessionId, text: "two loops" }, "PUT"));
        const json = await saved.json();

        expect(json.card.status).toBe("studying");
        expect(json.card.hints).toEqual({ writing: "two loops" });
    });

    it("answers 404 for a hint the word does not have", async () => {
        const sessionId = await startSession();

        const res = await hintRoute.POST(post("/hint", { sessionId, type: "meaning" }));

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: "No meaning hint for this word", kind: "not_found" });
    });

    it("toggles the skip flag back and forth", async () => {
        const sessionId = await startSession();

        const first = await (await skipRoute.POST(post("/skip", { sessionId }))).json();
        expect(first.card.status).toBe("studying");
        expect(first.card.progress.is_skipped).toBe(true);

        const second = await (await skipRoute.POST(post("/skip", { sessionId }))).json();
        expect(second.card.progress.is_skipped).toBe(false);
        expect(second.card.progress.next_check_date).toBeNull();
    });

    it("requires a session id to toggle skip", async () => {
        const res = await skipRoute.POST(post("/skip", {}));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "sessionId is required" });
    });

    it("ends a session", async () => {
        const sessionId = await startSession();

        const ended = await sessionRoute.DELETE(get(`/session?sessionId=${sessionId}`, "DELETE"));
        expect(await ended.json()).toEqual({ ok: true });

        const after = await sessionRoute.GET(get(`/session?sessionId=${sessionId}`));
        expect(after.status).toBe(409);
    });

    it("answers 503 and logs when the store is down", async () => {
        const sessionId = await startSession();
        await revealRoute.POST(post("/reveal", { sessionId }));
        const failure = new StoreUnavailableError("progress upsert: connection reset", "08006");
        vi.spyOn(progress, "upsert").mockRejectedValueOnce(failure);
        const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);

        const res = await answerRoute.POST(post("/answer", { sessionId, score: 0 }));

        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({
            error: "progress upsert: connection reset",
            kind: "store_unavailable",
        });
        expect(logged).toHaveBeenCalledWith("[study/answer] store unavailable", failure);
    });

    it("requires a language for the summary", async () => {
        const res = await summaryRoute.GET(get("/summary"));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "languageId is required" });
    });

    it("returns the progress summary", async () => {
        const res = await summaryRoute.GET(get("/summary?languageId=lang-1"));

        expect(await res.json()).toEqual({
            total: 2,
            studied: 0,
            known: 0,
            skipped: 0,
            percentage: 0,
            due_today: 0,
            last_study_date: null,
        });
    });
});
