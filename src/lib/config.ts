import { z } from "zod";

import { DEFAULT_MAX_CHUNK_CHARS } from "@/lib/chunker";
import { ConfigError } from "@/lib/errors";

export interface PipelineConfig {
  maxChunkChars: number;
  singleChunkThreshold: number;
  maxWorkers: number;
  duplicateThreshold: number;
  topicDuplicateThreshold: number;
  identityThreshold: number;
  autoUpdateThreshold: number;
  autoCreate: boolean;
  profileScanLimit: number;
  maxChunkRetries: number;
  extractionModel: string;
  extractionTimeoutMs: number;
  openaiApiKey?: string;
  supabaseUrl?: string;
  supabaseServiceKey?: string;
}

const ratio = z.coerce.number().min(0).max(1);
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  JV_MAX_CHUNK_CHARS: z.coerce.number().int().positive().default(DEFAULT_MAX_CHUNK_CHARS),
  JV_SINGLE_CHUNK_THRESHOLD: z.coerce.number().int().positive().optional(),
  JV_MAX_WORKERS: z.coerce.number().int().min(1).max(32).default(4),
  JV_DUPLICATE_THRESHOLD: ratio.default(0.85),
  JV_TOPIC_DUPLICATE_THRESHOLD: ratio.default(0.9),
  JV_IDENTITY_THRESHOLD: ratio.default(0.8),
  JV_AUTO_UPDATE_THRESHOLD: z.coerce.number().min(0).max(100).default(90),
  JV_AUTO_CREATE: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
  JV_PROFILE_SCAN_LIMIT: z.coerce.number().int().positive().default(1000),
  JV_MAX_CHUNK_RETRIES: z.coerce.number().int().min(0).default(3),
  JV_EXTRACTION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  JV_EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  OPENAI_API_KEY: optionalSecret,
  SUPABASE_URL: optionalSecret,
  SUPABASE_SERVICE_KEY: optionalSecret
});

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = loadPipelineConfig({});

export function loadPipelineConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  // Blank variables count as unset so defaults apply.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid pipeline configuration: ${detail}`);
  }

  const values = parsed.data;
  return {
    maxChunkChars: values.JV_MAX_CHUNK_CHARS,
    singleChunkThreshold: values.JV_SINGLE_CHUNK_THRESHOLD ?? values.JV_MAX_CHUNK_CHARS,
    maxWorkers: values.JV_MAX_WORKERS,
    duplicateThreshold: values.JV_DUPLICATE_THRESHOLD,
    topicDuplicateThreshold: values.JV_TOPIC_DUPLICATE_THRESHOLD,
    identityThreshold: values.JV_IDENTITY_THRESHOLD,
    autoUpdateThreshold: values.JV_AUTO_UPDATE_THRESHOLD,
    autoCreate: values.JV_AUTO_CREATE,
    profileScanLimit: values.JV_PROFILE_SCAN_LIMIT,
    maxChunkRetries: values.JV_MAX_CHUNK_RETRIES,
    extractionModel: values.JV_EXTRACTION_MODEL,
    extractionTimeoutMs: values.JV_EXTRACTION_TIMEOUT_MS,
    openaiApiKey: values.OPENAI_API_KEY,
    supabaseUrl: values.SUPABASE_URL,
    supabaseServiceKey: values.SUPABASE_SERVICE_KEY
  };
}
