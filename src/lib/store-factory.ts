import { loadPipelineConfig, type PipelineConfig } from "@/lib/config";
import type { PipelineStore } from "@/lib/store";
import { InMemoryPipelineStore } from "@/lib/store-memory";
import { getSupabaseClient } from "@/lib/supabase";
import { SupabasePipelineStore } from "@/lib/store-supabase";

declare global {
  var __jvmatchStore__: PipelineStore | undefined;
}

export function createStore(config: Pick<PipelineConfig, "supabaseUrl" | "supabaseServiceKey">): PipelineStore {
  if (config.supabaseUrl && config.supabaseServiceKey) {
    return new SupabasePipelineStore(getSupabaseClient(config.supabaseUrl, config.supabaseServiceKey));
  }

  console.warn("[jvmatch][store] Supabase is not configured; using the in-memory store");
  return new InMemoryPipelineStore();
}

export function getStore(config: PipelineConfig = loadPipelineConfig()): PipelineStore {
  if (!globalThis.__jvmatchStore__) {
    globalThis.__jvmatchStore__ = createStore(config);
  }

  return globalThis.__jvmatchStore__;
}
