import type { SupabaseClient } from "@supabase/supabase-js";
import { pageThrough, type WordCatalog } from "@/lib/study/catalog";
import { NotFoundError } from "@/lib/study/errors";
import type { Word } from "@/lib/study/types";
import { toStoreError } from "./errors";

const WORD_COLUMNS = "id, language_id, word_foreign, translation, transcription, word_number, sound_file_path";
const PAGE_SIZE = 100;

export type WordRow = {
    id: string;
    language_id: string;
    word_foreign: string | null;
    translation: string | null;
    transcription: string | null;
    word_number: number;
    sound_file_path: string | null;
};

export function toWord(row: WordRow): Word {
    return {
        id: String(row.id),
        language_id: String(row.language_id),
        word_foreign: row.word_foreign ?? "",
        translation: row.translation ?? "",
        transcription: row.transcription ?? null,
        word_number: Number(row.word_number),
        sound_file_path: row.sound_file_path ?? null,
    };
}

export function createSupabaseWordCatalog(db: SupabaseClient): WordCatalog {
    async function assertLanguage(languageId: string) {
        const { data, error } = await db.from("languages").select("id").eq("id", languageId).maybeSingle();
        if (error) throw toStoreError("language lookup", error);
        if (!data) throw new NotFoundError(`Language ${languageId} not found`);
    }

    async function fetchWords(languageId: string, startNumber: number, offset: number, limit: number) {
        const { data, error } = await db
            .from("words")
            .select(WORD_COLUMNS)
            .eq("language_id", languageId)
            .gte("word_number", startNumber)
            .order("word_number", { ascending: true })
            .range(offset, offset + limit - 1);

        if (error) throw toStoreError("words query", error);
        const rows: WordRow[] = data ?? [];
        return rows.map(toWord);
    }

    return {
        async *wordsFrom(languageId, startNumber) {
            await assertLanguage(languageId);
            const pages = pageThrough(
                (offset, limit) => fetchWords(languageId, startNumber, offset, limit),
                PAGE_SIZE
            );
            for await (const page of pages) {
                yield* page;
            }
        },

        async count(languageId) {
            await assertLanguage(languageId);
            const { count, error } = await db
                .from("words")
                .select("id", { count: "exact", head: true })
                .eq("language_id", languageId);

            if (error) throw toStoreError("words count", error);
            return count ?? 0;
        },
    };
}
