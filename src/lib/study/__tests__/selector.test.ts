import { describe, expect, it, vi } from "vitest";

import { NotFoundError, SettingsInvalidError } from "../errors";
import { firstCandidate, nextCandidates } from "../selector";
import { resolveSettings } from "../settings";
import type { UserLanguageSettings, Word } from "../types";
import { createMemoryCatalog, createMemoryProgressStore, makeWords } from "./helpers/memory";

const USER = "user-1";
const LANG = "lang-1";
const TODAY = "2026-03-10";

function settings(overrides: Partial<UserLanguageSettings> = {}): UserLanguageSettings {
    return { ...resolveSettings(USER, LANG, null), ...overrides };
}

async function collect(source: AsyncIterable<Word>): Promise<number[]> {
    const numbers: number[] = [];
    for await (const word of source) numbers.push(word.word_number);
    return numbers;
}

function setup(wordCount = 10) {
    const catalog = createMemoryCatalog({ [LANG]: makeWords(wordCount) });
    const progress = createMemoryProgressStore(() => new Date("2026-03-10T08:00:00Z"));
    return { deps: { catalog, progress }, progress };
}

describe("word selector", () => {
    it("starts at start_word, drops skipped words and lets new words through", async () => {
        const { deps, progress } = setup();
        await progress.upsert({ userId: USER, wordId: "w-7", languageId: LANG }, { is_skipped: true });
        await progress.upsert(
            { userId: USER, wordId: "w-3", languageId: LANG },
            { score: 1, check_interval: 4, next_check_date: "2026-03-14" }
        );

        const order = await collect(
            nextCandidates(deps, USER, LANG, settings({ start_word: 5, skip_marked: true, use_check_date: true }), {
                today: TODAY,
            })
        );

        expect(order).toEqual([5, 6, 8, 9, 10]);
    });

    it("yields the same order for the same snapshot", async () => {
        const { deps, progress } = setup();
        await progress.upsert(
            { userId: USER, wordId: "w-2", languageId: LANG },
            { score: 1, check_interval: 2, next_check_date: "2026-03-12" }
        );
        const s = settings();

        const first = await collect(nextCandidates(deps, USER, LANG, s, { today: TODAY }));
        const second = await collect(nextCandidates(deps, USER, LANG, s, { today: TODAY }));

        expect(first).toEqual([1, 3, 4, 5, 6, 7, 8, 9, 10]);
        expect(second).toEqual(first);
    });

    it("includes a word due today and excludes one due tomorrow", async () => {
        const { deps, progress } = setup(3);
        await progress.upsert(
            { userId: USER, wordId: "w-1", languageId: LANG },
            { score: 1, check_interval: 1, next_check_date: "2026-03-10" }
        );
        await progress.upsert(
            { userId: USER, wordId: "w-2", languageId: LANG },
            { score: 1, check_interval: 1, next_check_date: "2026-03-11" }
        );

        expect(await collect(nextCandidates(deps, USER, LANG, settings(), { today: TODAY }))).toEqual([1, 3]);
    });

    it("ignores check dates when use_check_date is off", async () => {
        const { deps, progress } = setup(3);
        await progress.upsert(
            { userId: USER, wordId: "w-2", languageId: LANG },
            { score: 1, check_interval: 8, next_check_date: "2026-03-18" }
        );

        const order = await collect(
            nextCandidates(deps, USER, LANG, settings({ use_check_date: false }), { today: TODAY })
        );

        expect(order).toEqual([1, 2, 3]);
    });

    it("keeps skipped words when skip_marked is off", async () => {
        const { deps, progress } = setup(3);
        await progress.upsert({ userId: USER, wordId: "w-2", languageId: LANG }, { is_skipped: true });

        expect(await collect(nextCandidates(deps, USER, LANG, settings(), { today: TODAY }))).toEqual([1, 2, 3]);
    });

    it("treats a record that was never scheduled as due", async () => {
        const { deps, progress } = setup(2);
        await progress.upsert({ userId: USER, wordId: "w-1", languageId: LANG }, { hint_meaning: "a hint" });

        expect(await collect(nextCandidates(deps, USER, LANG, settings(), { today: TODAY }))).toEqual([1, 2]);
    });

    it("resumes after the cursor", async () => {
        const { deps } = setup(10);

        const order = await collect(nextCandidates(deps, USER, LANG, settings({ start_word: 2 }), { today: TODAY, after: 6 }));

        expect(order).toEqual([7, 8, 9, 10]);
    });

    it("does not go below start_word when the cursor is behind it", async () => {
        const { deps } = setup(5);

        const first = await firstCandidate(deps, USER, LANG, settings({ start_word: 4 }), { today: TODAY, after: 1 });

        expect(first?.word_number).toBe(4);
    });

    it("looks up progress one batch at a time", async () => {
        const { deps, progress } = setup(120);
        const spy = vi.spyOn(progress, "getMany");

        const first = await firstCandidate(deps, USER, LANG, settings(), { today: TODAY });

        expect(first?.word_number).toBe(1);
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy.mock.calls[0]?.[1]).toHaveLength(50);
    });

    it("returns null when nothing is left", async () => {
        const { deps } = setup(3);

        expect(await firstCandidate(deps, USER, LANG, settings({ start_word: 4 }), { today: TODAY })).toBeNull();
    });

    it("rejects settings with a start_word below 1", async () => {
        const { deps } = setup(3);

        await expect(collect(nextCandidates(deps, USER, LANG, settings({ start_word: 0 }), { today: TODAY }))).rejects.toBeInstanceOf(
            SettingsInvalidError
        );
    });

    it("fails with NotFound for an unknown language", async () => {
        const { deps } = setup(3);

        await expect(firstCandidate(deps, USER, "missing", settings(), { today: TODAY })).rejects.toBeInstanceOf(
            NotFoundError
        );
    });
});
