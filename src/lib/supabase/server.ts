import { cookies } from "next/headers";
import { createServerClient } from "@supabase/ssr";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { readSupabaseConfig } from "@/lib/config";

/** Client bound to the caller's auth cookies; used to resolve who is asking. */
export async function supabaseServer() {
    const cookieStore = await cookies();
    const config = readSupabaseConfig();

    return createServerClient(config.url, config.anonKey, {
        cookies: {
            getAll() {
                return cookieStore.getAll();
            },

            // route handlers only read the session
            setAll() {
            },
        },
    });
}

let serviceClient: SupabaseClient | null = null;

/** Service-role client for the study tables, built on first use. */
export function supabaseService(): SupabaseClient {
    if (!serviceClient) {
        const config = readSupabaseConfig();
        serviceClient = createClient(config.url, config.serviceRoleKey, {
            auth: { persistSession: false, autoRefreshToken: false },
        });
    }
    return serviceClient;
}
