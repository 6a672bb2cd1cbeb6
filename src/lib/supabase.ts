import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import { ConfigError } from "@/lib/errors";

declare global {
  var __jvmatchSupabase__: SupabaseClient | undefined;
}

export function getSupabaseClient(url: string | undefined, serviceKey: string | undefined): SupabaseClient {
  if (!globalThis.__jvmatchSupabase__) {
    if (!url || !serviceKey) {
      throw new ConfigError("Missing SUPABASE_URL or SUPABASE_SERVICE_KEY");
    }

    globalThis.__jvmatchSupabase__ = createClient(url, serviceKey, {
      auth: { persistSession: false, autoRefreshToken: false }
    });
  }

  return globalThis.__jvmatchSupabase__;
}
