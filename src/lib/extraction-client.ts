import OpenAI from "openai";

import { errorMessage } from "@/lib/errors";
import { parseExtractionPayload, type ParsedExtraction } from "@/lib/extraction-schema";
import type { TranscriptType } from "@/lib/types";

export interface ExtractionContext {
  transcriptType: TranscriptType;
  chunkIndex: number;
  chunkCount: number;
  eventName?: string;
}

export type ExtractionFailureCause = "network" | "timeout" | "rate_limit" | "malformed_response" | "other";

export type ExtractionResult =
  | ({ ok: true } & ParsedExtraction)
  | { ok: false; cause: ExtractionFailureCause; message: string };

export interface Extractor {
  extract(chunkText: string, context: ExtractionContext): Promise<ExtractionResult>;
}

export interface ExtractionClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

const SPEAKER_LABEL = /^([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*):/gm;
const GROUP_WORD_COUNT = 1000;

export function detectTranscriptType(text: string): TranscriptType {
  const speakers = new Set<string>();
  for (const match of text.matchAll(SPEAKER_LABEL)) {
    speakers.add(match[1]);
  }

  if (speakers.size > 1) {
    return "group";
  }

  const wordCount = text.split(/\s+/).filter(Boolean).length;
  return wordCount > GROUP_WORD_COUNT ? "group" : "solo_intro";
}

const SYSTEM_PROMPT =
  "You extract structured business profile data from networking event transcripts. " +
  "Only report what speakers actually say. Respond with a single JSON object.";

const PROFILE_FIELDS = `"what_you_do", "who_you_serve", "seeking", "offering", "current_projects", "company", "email", "contact", "business_focus", "list_size" (number, 0 if not stated), "social_reach" (number, 0 if not stated)`;

export function buildExtractionPrompt(chunkText: string, context: ExtractionContext): string {
  const scope =
    context.transcriptType === "solo_intro"
      ? "This is an individual introduction. Expect one speaker."
      : "This is a group conversation. List every speaker who shares business information.";
  const part = context.chunkCount > 1 ? ` This is part ${context.chunkIndex + 1} of ${context.chunkCount}.` : "";
  const event = context.eventName ? ` Event: ${context.eventName}.` : "";

  return [
    `${scope}${part}${event}`,
    "",
    "Return JSON with these keys:",
    `- "speakers": [{ "name", "speaker_text" (2-3 sentence summary), ${PROFILE_FIELDS} }] using null for anything not mentioned`,
    '- "topics": [{ "topic_name", "topic_category", "relevance_score" (0-100), "mentioned_by": [speaker names] }]',
    '- "signals": [{ "speaker_name", "signal_type" ("need" | "interest" | "offer" | "connection"), "signal_text", "target_speaker", "confidence" (0-100) }]',
    '- "connections": [{ "from_speaker", "to_speaker", "connection_reason", "strength" (0-100) }]',
    "",
    "Use the speaker's full name as said in the transcript. Skip people who only listen.",
    "",
    "TRANSCRIPT:",
    chunkText
  ].join("\n");
}

function classifyError(error: unknown): ExtractionFailureCause {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return "timeout";
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return "network";
  }
  if (error instanceof OpenAI.RateLimitError) {
    return "rate_limit";
  }
  if (error instanceof Error && error.name === "AbortError") {
    return "timeout";
  }

  return "other";
}

/**
 * One chat-completion call per chunk. No retries and no merging: the caller decides what a
 * failure means for the transcript.
 */
export class ExtractionClient implements Extractor {
  private client: OpenAI | undefined;

  constructor(private readonly options: ExtractionClientOptions = {}) {}

  async extract(chunkText: string, context: ExtractionContext): Promise<ExtractionResult> {
    let content: string | null;
    try {
      content = await this.requestCompletion(buildExtractionPrompt(chunkText, context));
    } catch (error) {
      const cause = classifyError(error);
      console.error("[jvmatch][extraction] request failed", { chunkIndex: context.chunkIndex, cause });
      return { ok: false, cause, message: errorMessage(error, "Unknown extraction error") };
    }

    if (!content?.trim()) {
      return { ok: false, cause: "malformed_response", message: "Extraction service returned an empty response" };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      return {
        ok: false,
        cause: "malformed_response",
        message: `Extraction service returned invalid JSON: ${errorMessage(error)}`
      };
    }

    const parsed = parseExtractionPayload(payload);
    if (!parsed.success) {
      return { ok: false, cause: "malformed_response", message: parsed.message };
    }

    return { ok: true, ...parsed.data };
  }

  protected async requestCompletion(prompt: string): Promise<string | null> {
    const completion = await this.getClient().chat.completions.create({
      model: this.options.model ?? "gpt-4o-mini",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt }
      ],
      response_format: { type: "json_object" },
      temperature: 0.2
    });

    return completion.choices[0]?.message.content ?? null;
  }

  private getClient(): OpenAI {
    const apiKey = this.options.apiKey?.trim();
    if (!apiKey) {
      throw new Error("Missing OPENAI_API_KEY");
    }

    if (!this.client) {
      this.client = new OpenAI({
        apiKey,
        maxRetries: 0,
        timeout: this.options.timeoutMs ?? 60000
      });
    }

    return this.client;
  }
}
