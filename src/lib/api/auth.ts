import { NextResponse } from "next/server";
import { supabaseServer } from "@/lib/supabase/server";

type RequireUserResult =
    | { userId: string; response: null }
    | { userId: null; response: NextResponse };

export async function requireUser(): Promise<RequireUserResult> {
    const supabase = await supabaseServer();
    const { data, error } = await supabase.auth.getUser();

    if (error || !data.user) {
        return {
            userId: null,
            response: NextResponse.json({ error: "Unauthorized" }, { status: 401 }),
        };
    }

    return { userId: data.user.id, response: null };
}
