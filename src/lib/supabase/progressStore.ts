import type { SupabaseClient } from "@supabase/supabase-js";
import type { ProgressStore } from "@/lib/study/progress";
import type { ProgressRecord } from "@/lib/study/types";
import { toStoreError } from "./errors";

const TABLE = "user_word_progress";
const COLUMNS =
    "user_id, word_id, language_id, score, is_skipped, check_interval, next_check_date, hint_meaning, hint_phoneticsound, hint_phoneticassociation, hint_writing, created_at, updated_at";

export type ProgressRow = Omit<ProgressRecord, "score"> & { score: number | null };

export function toProgressRecord(row: ProgressRow): ProgressRecord {
    return {
        user_id: String(row.user_id),
        word_id: String(row.word_id),
        language_id: String(row.language_id),
        score: row.score === 1 ? 1 : 0,
        is_skipped: row.is_skipped === true,
        check_interval: Number(row.check_interval ?? 0),
        // date columns come back as YYYY-MM-DD; timestamps are cut down to the day
        next_check_date: row.next_check_date ? String(row.next_check_date).slice(0, 10) : null,
        hint_meaning: row.hint_meaning ?? null,
        hint_phoneticsound: row.hint_phoneticsound ?? null,
        hint_phoneticassociation: row.hint_phoneticassociation ?? null,
        hint_writing: row.hint_writing ?? null,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

export function createSupabaseProgressStore(
    db: SupabaseClient,
    now: () => Date = () => new Date()
): ProgressStore {
    return {
        async get(userId, wordId) {
            const { data, error } = await db
                .from(TABLE)
                .select(COLUMNS)
                .eq("user_id", userId)
                .eq("word_id", wordId)
                .maybeSingle();

            if (error) throw toStoreError("progress lookup", error);
            const row: ProgressRow | null = data;
            return row ? toProgressRecord(row) : null;
        },

        async getMany(userId, wordIds) {
            const out = new Map<string, ProgressRecord>();
            if (wordIds.length === 0) return out;

            const { data, error } = await db
                .from(TABLE)
                .select(COLUMNS)
                .eq("user_id", userId)
                .in("word_id", [...wordIds]);

            if (error) throw toStoreError("progress batch lookup", error);
            const rows: ProgressRow[] = data ?? [];
            for (const row of rows) {
                const record = toProgressRecord(row);
                out.set(record.word_id, record);
            }
            return out;
        },

        // Columns left out of the payload keep their stored value on update
        // and take the column default on insert.
        async upsert(key, fields) {
            const { data, error } = await db
                .from(TABLE)
                .upsert(
                    {
                        user_id: key.userId,
                        word_id: key.wordId,
                        language_id: key.languageId,
                        ...fields,
                        updated_at: now().toISOString(),
                    },
                    { onConflict: "user_id,word_id" }
                )
                .select(COLUMNS)
                .single();

            if (error) throw toStoreError("progress upsert", error);
            const row: ProgressRow = data;
            return toProgressRecord(row);
        },

        async dueWordIds(userId, languageId, asOf) {
            const { data, error } = await db
                .from(TABLE)
                .select("word_id")
                .eq("user_id", userId)
                .eq("language_id", languageId)
                .lte("next_check_date", asOf);

            if (error) throw toStoreError("due words query", error);
            const rows: { word_id: string }[] = data ?? [];
            return new Set(rows.map((row) => String(row.word_id)));
        },

        async listByLanguage(userId, languageId) {
            const { data, error } = await db
                .from(TABLE)
                .select(COLUMNS)
                .eq("user_id", userId)
                .eq("language_id", languageId);

            if (error) throw toStoreError("progress list", error);
            const rows: ProgressRow[] = data ?? [];
            return rows.map(toProgressRecord);
        },
    };
}
