import { MAX_CHECK_INTERVAL_DAYS } from "./study/scheduler";

type Env = Record<string, string | undefined>;

export type SupabaseConfig = {
    url: string;
    anonKey: string;
    serviceRoleKey: string;
};

export type StudyConfig = {
    maxCheckIntervalDays: number;
};

function requireEnv(env: Env, name: string): string {
    const value = env[name]?.trim();
    if (!value) {
        throw new Error(`Missing environment variable ${name}`);
    }
    return value;
}

export function readSupabaseConfig(env: Env = process.env): SupabaseConfig {
    return {
        url: requireEnv(env, "NEXT_PUBLIC_SUPABASE_URL"),
        anonKey: requireEnv(env, "NEXT_PUBLIC_SUPABASE_ANON_KEY"),
        serviceRoleKey: requireEnv(env, "SUPABASE_SERVICE_ROLE_KEY"),
    };
}

export function readStudyConfig(env: Env = process.env): StudyConfig {
    const raw = env.STUDY_MAX_CHECK_INTERVAL_DAYS?.trim();
    if (!raw) return { maxCheckIntervalDays: MAX_CHECK_INTERVAL_DAYS };

    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`STUDY_MAX_CHECK_INTERVAL_DAYS must be a positive integer, got "${raw}"`);
    }
    return { maxCheckIntervalDays: parsed };
}
