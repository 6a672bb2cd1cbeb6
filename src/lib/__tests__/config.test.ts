import { loadPipelineConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

describe("loadPipelineConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadPipelineConfig({})).toEqual({
      maxChunkChars: 24000,
      singleChunkThreshold: 24000,
      maxWorkers: 4,
      duplicateThreshold: 0.85,
      topicDuplicateThreshold: 0.9,
      identityThreshold: 0.8,
      autoUpdateThreshold: 90,
      autoCreate: false,
      profileScanLimit: 1000,
      maxChunkRetries: 3,
      extractionModel: "gpt-4o-mini",
      extractionTimeoutMs: 60000,
      openaiApiKey: undefined,
      supabaseUrl: undefined,
      supabaseServiceKey: undefined
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadPipelineConfig({
      JV_MAX_CHUNK_CHARS: "8000",
      JV_MAX_WORKERS: "2",
      JV_AUTO_CREATE: "true",
      OPENAI_API_KEY: "test-secret"
    });

    expect(config).toMatchObject({
      maxChunkChars: 8000,
      singleChunkThreshold: 8000,
      maxWorkers: 2,
      autoCreate: true,
      openaiApiKey: "test-secret"
    });
  });

  it("treats blank variables as unset", () => {
    expect(loadPipelineConfig({ JV_MAX_WORKERS: "", SUPABASE_URL: "" })).toMatchObject({
      maxWorkers: 4,
      supabaseUrl: undefined
    });
  });

  it("rejects out-of-range values", () => {
    expect(() => loadPipelineConfig({ JV_DUPLICATE_THRESHOLD: "1.5" })).toThrow(ConfigError);
    expect(() => loadPipelineConfig({ JV_MAX_WORKERS: "zero" })).toThrow(/JV_MAX_WORKERS/);
  });
});
