import { z } from "zod";

import { normalizeName } from "@/lib/name-matcher";
import type { ConnectionSuggestion, ExtractedSignal, ExtractedTopic, SignalType, SpeakerTextFields } from "@/lib/types";

/** Speaker as returned by the extraction service, before confidence and provenance are attached. */
export interface RawSpeaker extends SpeakerTextFields {
  name: string;
  email?: string;
  listSize: number;
  socialReach: number;
}

export interface ParsedExtraction {
  speakers: RawSpeaker[];
  topics: ExtractedTopic[];
  signals: ExtractedSignal[];
  connections: ConnectionSuggestion[];
}

const EMPTY_TOKENS = new Set(["null", "none", "n/a", "na", "not mentioned", "not specified", "-"]);

const PLACEHOLDER_NAMES = new Set([
  "unknown",
  "unknown speaker",
  "participant",
  "speaker",
  "none",
  "null",
  "n/a",
  "narrator",
  "system",
  "host",
  "guest",
  "everyone",
  "audience"
]);

const SIGNAL_TYPES: readonly SignalType[] = ["need", "interest", "offer", "connection"];

export function isPlaceholderName(name: string): boolean {
  const normalized = normalizeName(name);
  if (!normalized) {
    return true;
  }

  return PLACEHOLDER_NAMES.has(normalized) || /^(speaker|participant|guest|attendee)\s*#?\d+$/.test(normalized);
}

/** Reads self-reported counts such as 1200, "1,200", "10k" or "1.5M". */
export function parseCount(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
  }

  if (typeof value !== "string") {
    return 0;
  }

  const cleaned = value.trim().toLowerCase().replace(/[,\s+]/g, "");
  const multiplier = cleaned.endsWith("k") ? 1000 : cleaned.endsWith("m") ? 1_000_000 : 1;
  const digits = multiplier === 1 ? cleaned : cleaned.slice(0, -1);
  const parsed = Number.parseFloat(digits);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }

  return Math.floor(parsed * multiplier);
}

function parseScore(value: unknown): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    return 0;
  }

  return Math.max(0, Math.min(100, parsed));
}

function textValue(value: unknown): string | undefined {
  if (typeof value !== "string" && typeof value !== "number") {
    return undefined;
  }

  const trimmed = String(value).trim();
  return trimmed && !EMPTY_TOKENS.has(trimmed.toLowerCase()) ? trimmed : undefined;
}

// Lists such as ["affiliates", "podcast guests"] are joined; objects and booleans are dropped.
const text = z.unknown().transform((value) => {
  if (!Array.isArray(value)) {
    return textValue(value);
  }

  const parts = value.map(textValue).filter((part): part is string => part !== undefined);
  return parts.length > 0 ? parts.join("; ") : undefined;
});

const count = z.unknown().transform(parseCount);

const score = z.unknown().transform(parseScore);

const names = z
  .unknown()
  .transform((values) =>
    Array.isArray(values) ? values.filter((item): item is string => typeof item === "string" && item.trim() !== "") : []
  );

/** Parses each element on its own; an element of the wrong shape is skipped rather than failing the list. */
function listOf<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(z.unknown())
    .nullish()
    .transform((items) => {
      const parsed: z.output<T>[] = [];
      for (const item of items ?? []) {
        const result = schema.safeParse(item);
        if (result.success) {
          parsed.push(result.data);
        }
      }

      return parsed;
    });
}

const profileFields = z.object({
  company: text,
  what_you_do: text,
  who_you_serve: text,
  seeking: text,
  offering: text,
  current_projects: text,
  contact: text,
  business_focus: text,
  list_size: count,
  social_reach: count
});

const speakerSchema = profileFields.extend({
  name: text,
  email: text,
  speaker_text: text,
  profile_data: profileFields.nullish().catch(undefined)
});

const topicSchema = z.object({
  topic_name: text,
  name: text,
  topic_category: text,
  relevance_score: score,
  mentioned_by: names
});

const signalSchema = z.object({
  speaker_name: text,
  signal_type: text,
  signal_text: text,
  target_speaker: text,
  confidence: score
});

const connectionSchema = z.object({
  from_speaker: text,
  to_speaker: text,
  connection_reason: text,
  strength: score
});

const payloadSchema = z.object({
  speakers: listOf(speakerSchema),
  topics: listOf(topicSchema),
  signals: listOf(signalSchema),
  connections: listOf(connectionSchema)
});

type SpeakerPayload = z.infer<typeof speakerSchema>;

function toRawSpeaker(entry: SpeakerPayload): RawSpeaker | undefined {
  if (!entry.name || isPlaceholderName(entry.name)) {
    return undefined;
  }

  const nested: Partial<z.infer<typeof profileFields>> = entry.profile_data ?? {};
  return {
    name: entry.name,
    email: entry.email?.toLowerCase(),
    company: entry.company ?? nested.company,
    whatYouDo: entry.what_you_do ?? nested.what_you_do,
    whoYouServe: entry.who_you_serve ?? nested.who_you_serve,
    seeking: entry.seeking ?? nested.seeking,
    offering: entry.offering ?? nested.offering,
    currentProjects: entry.current_projects ?? nested.current_projects,
    contact: entry.contact ?? nested.contact,
    businessFocus: entry.business_focus ?? nested.business_focus,
    speakerText: entry.speaker_text,
    listSize: Math.max(entry.list_size, nested.list_size ?? 0),
    socialReach: Math.max(entry.social_reach, nested.social_reach ?? 0)
  };
}

function isSignalType(value: string): value is SignalType {
  return SIGNAL_TYPES.some((type) => type === value);
}

export type ParseOutcome = { success: true; data: ParsedExtraction } | { success: false; message: string };

/**
 * Validates the JSON object returned by the extraction service. A single-profile object
 * (top-level `name`, no `speakers` list) is accepted as a one-speaker result.
 */
export function parseExtractionPayload(payload: unknown): ParseOutcome {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return { success: false, message: "Extraction response is not a JSON object" };
  }

  const candidate = "speakers" in payload || !("name" in payload) ? payload : { speakers: [payload] };
  const parsed = payloadSchema.safeParse(candidate);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      success: false,
      message: `Extraction response has an unexpected shape at ${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid"}`
    };
  }

  const speakers = (parsed.data.speakers)
    .map(toRawSpeaker)
    .filter((speaker): speaker is RawSpeaker => speaker !== undefined);

  const topics: ExtractedTopic[] = [];
  for (const topic of parsed.data.topics) {
    const name = topic.topic_name ?? topic.name;
    if (name) {
      topics.push({
        name,
        category: topic.topic_category,
        relevanceScore: topic.relevance_score,
        mentionedBy: topic.mentioned_by
      });
    }
  }

  const signals: ExtractedSignal[] = [];
  for (const signal of parsed.data.signals) {
    const signalType = signal.signal_type?.toLowerCase();
    if (!signal.speaker_name || !signal.signal_text || !signalType || !isSignalType(signalType)) {
      continue;
    }

    signals.push({
      speakerName: signal.speaker_name,
      signalType,
      text: signal.signal_text,
      targetSpeaker: signal.target_speaker,
      confidence: signal.confidence
    });
  }

  const connections: ConnectionSuggestion[] = [];
  for (const connection of parsed.data.connections) {
    if (connection.from_speaker && connection.to_speaker) {
      connections.push({
        fromSpeaker: connection.from_speaker,
        toSpeaker: connection.to_speaker,
        reason: connection.connection_reason,
        strength: connection.strength
      });
    }
  }

  return { success: true, data: { speakers, topics, signals, connections } };
}
