import { readStudyConfig } from "@/lib/config";
import { createStudyService, type StudyService } from "@/lib/study/service";
import { supabaseService } from "@/lib/supabase/server";
import { createSupabaseProgressStore } from "@/lib/supabase/progressStore";
import { createSupabaseSessionStore } from "@/lib/supabase/sessionStore";
import { createSupabaseSettingsProvider } from "@/lib/supabase/settingsProvider";
import { createSupabaseWordCatalog } from "@/lib/supabase/wordCatalog";

let service: StudyService | null = null;

export function getStudyService(): StudyService {
    if (!service) {
        const db = supabaseService();
        service = createStudyService({
            catalog: createSupabaseWordCatalog(db),
            progress: createSupabaseProgressStore(db),
            settings: createSupabaseSettingsProvider(db),
            sessions: createSupabaseSessionStore(db),
            maxIntervalDays: readStudyConfig().maxCheckIntervalDays,
        });
    }
    return service;
}
