import { PipelineFailureError } from "@/lib/errors";
import type { ExtractionContext, ExtractionResult, Extractor } from "@/lib/extraction-client";
import { ExtractionOrchestrator, type OrchestratorOptions } from "@/lib/extraction-orchestrator";
import { InMemoryPipelineStore } from "@/lib/store-memory";

const TRANSCRIPT = "Alice: hello there\nBob: hi back\nCarol: greetings\n";

const options: OrchestratorOptions = {
  maxChunkChars: 20,
  singleChunkThreshold: 20,
  maxWorkers: 2,
  maxChunkRetries: 3
};

/** Answers with one speaker named after the chunk's label, or fails for the labels it is told to. */
class LabelExtractor implements Extractor {
  calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly failing: Set<string> = new Set(),
    private readonly delayMs = 0
  ) {}

  async extract(chunkText: string, _context: ExtractionContext): Promise<ExtractionResult> {
    const label = chunkText.split(":")[0];
    this.calls.push(label);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }

      if (this.failing.has(label)) {
        throw new Error(`extraction exploded for ${label}`);
      }

      return {
        ok: true,
        speakers: [{ name: `${label} Example`, whatYouDo: "Consulting", listSize: 0, socialReach: 0 }],
        topics: [],
        signals: [],
        connections: []
      };
    } finally {
      this.active -= 1;
    }
  }
}

async function setup(extractor: Extractor, overrides: Partial<OrchestratorOptions> = {}) {
  const store = new InMemoryPipelineStore();
  const transcript = await store.createTranscript({
    text: TRANSCRIPT,
    eventName: "Spring Mixer",
    contentHash: "hash-1",
    transcriptType: "group"
  });
  const orchestrator = new ExtractionOrchestrator(store, extractor, { ...options, ...overrides });

  return { store, transcript, orchestrator };
}

describe("ExtractionOrchestrator", () => {
  it("keeps short transcripts in one span", async () => {
    const { orchestrator } = await setup(new LabelExtractor());

    expect(orchestrator.planSpans("Alice: hi")).toEqual([{ index: 0, charStart: 0, charEnd: 9, text: "Alice: hi" }]);
  });

  it("records one processing error for a chunk whose worker throws and keeps the rest", async () => {
    const { store, transcript, orchestrator } = await setup(new LabelExtractor(new Set(["Bob"])));

    const run = await orchestrator.run(transcript);

    expect(run.stats).toMatchObject({ chunksTotal: 3, chunksSucceeded: 2, chunksFailed: 1 });
    expect(run.speakers.map((speaker) => speaker.name).sort()).toEqual(["Alice Example", "Carol Example"]);

    const chunks = await store.listChunks(transcript.id);
    expect(chunks.map((chunk) => chunk.status)).toEqual(["success", "failed", "success"]);
    expect(chunks[1]).toMatchObject({ retryCount: 1, errorMessage: "extraction exploded for Bob" });

    const errors = await store.listUnresolvedErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      errorType: "chunk_extraction",
      message: "extraction exploded for Bob",
      transcriptId: transcript.id,
      chunkId: chunks[1].id
    });
  });

  it("attaches provenance and confidence to extracted speakers", async () => {
    const { store, transcript, orchestrator } = await setup(new LabelExtractor());

    const run = await orchestrator.run(transcript);
    const chunks = await store.listChunks(transcript.id);
    const alice = run.speakers.find((speaker) => speaker.name === "Alice Example");

    expect(alice?.confidence).toBe(33.33);
    expect(alice?.appearances).toEqual([
      { eventName: "Spring Mixer", eventDate: undefined, transcriptId: transcript.id, chunkId: chunks[0].id }
    ]);
  });

  it("fails the transcript when every chunk fails", async () => {
    const { store, transcript, orchestrator } = await setup(new LabelExtractor(new Set(["Alice", "Bob", "Carol"])));

    const error = await orchestrator.run(transcript).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineFailureError);
    expect(error instanceof PipelineFailureError && error.failures.map((failure) => failure.chunkIndex).sort()).toEqual([
      0, 1, 2
    ]);
    expect(await store.listUnresolvedErrors()).toHaveLength(3);
  });

  it("never runs more extractions at once than the worker limit", async () => {
    const extractor = new LabelExtractor(new Set(), 5);
    const { transcript, orchestrator } = await setup(extractor, { maxWorkers: 2 });

    await orchestrator.run(transcript);

    expect(extractor.calls).toHaveLength(3);
    expect(extractor.maxActive).toBe(2);
  });

  it("retries failed chunks that are under the retry limit", async () => {
    const failing = new Set(["Bob"]);
    const extractor = new LabelExtractor(failing);
    const { store, transcript, orchestrator } = await setup(extractor);
    await orchestrator.run(transcript);

    failing.clear();
    const retry = await orchestrator.retryChunks(transcript, await store.listChunks(transcript.id));

    expect(retry.stats).toMatchObject({ chunksTotal: 1, chunksSucceeded: 1, chunksFailed: 0 });
    expect(retry.speakers.map((speaker) => speaker.name)).toEqual(["Bob Example"]);
    expect((await store.listChunks(transcript.id)).map((chunk) => chunk.status)).toEqual(["success", "success", "success"]);
  });

  it("skips chunks that used up their retries", async () => {
    const extractor = new LabelExtractor(new Set(["Bob"]));
    const { store, transcript, orchestrator } = await setup(extractor, { maxChunkRetries: 1 });
    await orchestrator.run(transcript);

    const retry = await orchestrator.retryChunks(transcript, await store.listChunks(transcript.id));

    expect(retry.stats.chunksTotal).toBe(0);
    expect(extractor.calls).toHaveLength(3);
  });
});
