import type { SupabaseClient } from "@supabase/supabase-js";
import { resolveSettings, type RawSettings, type SettingsProvider } from "@/lib/study/settings";
import { toStoreError } from "./errors";

const SETTINGS_COLUMNS =
    "start_word, skip_marked, use_check_date, show_hint_meaning, show_hint_phoneticsound, show_hint_phoneticassociation, show_hint_writing";

/** Users without a stored row study with the defaults. */
export function createSupabaseSettingsProvider(db: SupabaseClient): SettingsProvider {
    return {
        async get(userId, languageId) {
            const { data, error } = await db
                .from("user_language_settings")
                .select(SETTINGS_COLUMNS)
                .eq("user_id", userId)
                .eq("language_id", languageId)
                .maybeSingle();

            if (error) throw toStoreError("settings lookup", error);
            const raw: RawSettings | null = data;
            return resolveSettings(userId, languageId, raw);
        },
    };
}
