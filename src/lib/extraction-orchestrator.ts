import pLimit from "p-limit";

import { type ChunkSpan, planChunks } from "@/lib/chunker";
import { computeExtractionConfidence } from "@/lib/confidence";
import type { PipelineConfig } from "@/lib/config";
import { type ChunkFailure, errorMessage, PipelineFailureError } from "@/lib/errors";
import type { ExtractionContext, ExtractionResult, Extractor } from "@/lib/extraction-client";
import type { RawSpeaker } from "@/lib/extraction-schema";
import type { ErrorLogStore, TranscriptStore } from "@/lib/store";
import type {
  ConnectionSuggestion,
  ExtractedSignal,
  ExtractedSpeaker,
  ExtractedTopic,
  LogProcessingErrorInput,
  Transcript,
  TranscriptChunk
} from "@/lib/types";

export type OrchestratorOptions = Pick<
  PipelineConfig,
  "maxChunkChars" | "singleChunkThreshold" | "maxWorkers" | "maxChunkRetries"
>;

export interface ExtractionStats {
  chunksTotal: number;
  chunksSucceeded: number;
  chunksFailed: number;
  failures: ChunkFailure[];
}

export interface ExtractionRun {
  speakers: ExtractedSpeaker[];
  topics: ExtractedTopic[];
  signals: ExtractedSignal[];
  connections: ConnectionSuggestion[];
  stats: ExtractionStats;
}

interface ChunkOutcome {
  chunk: TranscriptChunk;
  result: ExtractionResult;
}

function toExtractedSpeaker(raw: RawSpeaker, transcript: Transcript, chunk: TranscriptChunk): ExtractedSpeaker {
  return {
    ...raw,
    confidence: computeExtractionConfidence(raw),
    appearances: [
      {
        eventName: transcript.eventName,
        eventDate: transcript.eventDate,
        transcriptId: transcript.id,
        chunkId: chunk.id
      }
    ]
  };
}

/**
 * Fans a transcript's chunks out over a bounded pool of extraction calls. Every chunk ends in
 * `success` or `failed`, and every failure leaves a processing error behind.
 */
export class ExtractionOrchestrator {
  constructor(
    private readonly store: TranscriptStore & ErrorLogStore,
    private readonly extractor: Extractor,
    private readonly options: OrchestratorOptions
  ) {}

  planSpans(text: string): ChunkSpan[] {
    if (text.length <= this.options.singleChunkThreshold) {
      return text ? [{ index: 0, charStart: 0, charEnd: text.length, text }] : [];
    }

    return planChunks(text, this.options.maxChunkChars);
  }

  async run(transcript: Transcript): Promise<ExtractionRun> {
    let spans: ChunkSpan[];
    try {
      spans = this.planSpans(transcript.text);
    } catch (error) {
      throw new PipelineFailureError(`Chunking failed: ${errorMessage(error)}`, transcript.id);
    }

    if (spans.length === 0) {
      throw new PipelineFailureError("Transcript has no text to extract", transcript.id);
    }

    let chunks: TranscriptChunk[];
    try {
      chunks = await this.store.createChunks(
        transcript.id,
        spans.map((span) => ({
          chunkIndex: span.index,
          charStart: span.charStart,
          charEnd: span.charEnd,
          text: span.text
        }))
      );
    } catch (error) {
      throw new PipelineFailureError(`Could not persist chunks: ${errorMessage(error)}`, transcript.id, [], spans.length);
    }

    console.info("[jvmatch][orchestrator] dispatching chunks", {
      transcriptId: transcript.id,
      chunks: chunks.length,
      workers: this.options.maxWorkers
    });

    const run = await this.dispatch(transcript, chunks);

    if (run.stats.chunksSucceeded === 0) {
      throw new PipelineFailureError(
        `All ${run.stats.chunksTotal} chunks failed extraction`,
        transcript.id,
        run.stats.failures,
        run.stats.chunksTotal
      );
    }

    return run;
  }

  /** Re-extracts failed chunks that are still under the retry limit. */
  async retryChunks(transcript: Transcript, chunks: TranscriptChunk[]): Promise<ExtractionRun> {
    const retryable = chunks.filter(
      (chunk) => chunk.status === "failed" && chunk.retryCount < this.options.maxChunkRetries
    );

    return this.dispatch(transcript, retryable);
  }

  private async dispatch(transcript: Transcript, chunks: TranscriptChunk[]): Promise<ExtractionRun> {
    const limit = pLimit(this.options.maxWorkers);
    const run: ExtractionRun = {
      speakers: [],
      topics: [],
      signals: [],
      connections: [],
      stats: { chunksTotal: chunks.length, chunksSucceeded: 0, chunksFailed: 0, failures: [] }
    };

    const inFlight = new Map<string, Promise<ChunkOutcome>>();
    for (const chunk of chunks) {
      const context: ExtractionContext = {
        transcriptType: transcript.transcriptType,
        chunkIndex: chunk.chunkIndex,
        chunkCount: chunks.length,
        eventName: transcript.eventName
      };
      inFlight.set(chunk.id, limit(() => this.attempt(chunk, context)));
    }

    // Single consumer: outcomes are folded in as they settle, one at a time.
    while (inFlight.size > 0) {
      const outcome = await Promise.race(inFlight.values());
      inFlight.delete(outcome.chunk.id);
      await this.record(transcript, outcome, run);
    }

    return run;
  }

  private async attempt(chunk: TranscriptChunk, context: ExtractionContext): Promise<ChunkOutcome> {
    try {
      return { chunk, result: await this.extractor.extract(chunk.text, context) };
    } catch (error) {
      return { chunk, result: { ok: false, cause: "other", message: errorMessage(error, "Extraction worker crashed") } };
    }
  }

  private async record(transcript: Transcript, outcome: ChunkOutcome, run: ExtractionRun): Promise<void> {
    const { chunk, result } = outcome;

    if (result.ok) {
      run.stats.chunksSucceeded += 1;
      run.speakers.push(...result.speakers.map((speaker) => toExtractedSpeaker(speaker, transcript, chunk)));
      run.topics.push(...result.topics);
      run.signals.push(...result.signals);
      run.connections.push(...result.connections);

      await this.guardStoreWrite(transcript, chunk, () =>
        this.store.updateChunk(chunk.id, {
          status: "success",
          profilesExtracted: result.speakers.length,
          errorMessage: null
        })
      );
      return;
    }

    const failure: ChunkFailure = {
      chunkId: chunk.id,
      chunkIndex: chunk.chunkIndex,
      cause: result.cause,
      message: result.message
    };
    run.stats.chunksFailed += 1;
    run.stats.failures.push(failure);

    console.warn("[jvmatch][orchestrator] chunk failed", { transcriptId: transcript.id, ...failure });

    await this.guardStoreWrite(transcript, chunk, () =>
      this.store.updateChunk(chunk.id, {
        status: "failed",
        retryCount: chunk.retryCount + 1,
        errorMessage: result.message
      })
    );
    await this.logError({
      errorType: "chunk_extraction",
      message: result.message,
      details: { cause: result.cause, chunkIndex: chunk.chunkIndex, charStart: chunk.charStart, charEnd: chunk.charEnd },
      transcriptId: transcript.id,
      chunkId: chunk.id
    });
  }

  private async guardStoreWrite(transcript: Transcript, chunk: TranscriptChunk, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      await this.logError({
        errorType: "store_write",
        message: `Chunk status update failed: ${errorMessage(error)}`,
        details: { chunkIndex: chunk.chunkIndex },
        transcriptId: transcript.id,
        chunkId: chunk.id
      });
    }
  }

  private async logError(input: LogProcessingErrorInput): Promise<void> {
    try {
      await this.store.logProcessingError(input);
    } catch (error) {
      // The error log itself is unavailable; the console is all that is left.
      console.error("[jvmatch][orchestrator] could not record processing error", {
        ...input,
        logError: errorMessage(error)
      });
    }
  }
}
