import type { WordCatalog } from "./catalog";
import type { ProgressStore } from "./progress";
import type { ProgressSummary } from "./types";

export async function progressSummary(
    deps: { catalog: WordCatalog; progress: ProgressStore },
    userId: string,
    languageId: string,
    today: string
): Promise<ProgressSummary> {
    const [total, records, due] = await Promise.all([
        deps.catalog.count(languageId),
        deps.progress.listByLanguage(userId, languageId),
        deps.progress.dueWordIds(userId, languageId, today),
    ]);

    let known = 0;
    let skipped = 0;
    let lastStudy: string | null = null;
    for (const r of records) {
        if (r.score === 1) known += 1;
        if (r.is_skipped) skipped += 1;
        if (lastStudy === null || r.updated_at > lastStudy) lastStudy = r.updated_at;
    }

    const percentage = total > 0 ? Math.round((known / total) * 10_000) / 100 : 0;

    return {
        total,
        studied: records.length,
        known,
        skipped,
        percentage,
        due_today: due.size,
        last_study_date: lastStudy,
    };
}
