import type { SupabaseClient } from "@supabase/supabase-js";
import { parseSessionState, type SessionStore } from "@/lib/study/sessionStore";
import { toStoreError } from "./errors";

const TABLE = "study_sessions";

export function createSupabaseSessionStore(db: SupabaseClient): SessionStore {
    return {
        async load(userId) {
            const { data, error } = await db
                .from(TABLE)
                .select("state")
                .eq("user_id", userId)
                .maybeSingle();

            if (error) throw toStoreError("session load", error);
            const row: { state: unknown } | null = data;
            if (!row) return null;

            const state = parseSessionState(row.state);
            if (!state) {
                console.error("[study/session] discarding unreadable session state", { userId });
            }
            return state;
        },

        async save(state) {
            const { error } = await db.from(TABLE).upsert(
                {
                    user_id: state.user_id,
                    session_id: state.id,
                    state,
                    updated_at: state.updated_at,
                },
                { onConflict: "user_id" }
            );

            if (error) throw toStoreError("session save", error);
        },

        async remove(userId) {
            const { error } = await db.from(TABLE).delete().eq("user_id", userId);
            if (error) throw toStoreError("session remove", error);
        },
    };
}
