import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { NotFoundError, StoreError } from "@/lib/errors";
import { nowIso } from "@/lib/id";
import type { PipelineStore } from "@/lib/store";
import type {
  ChunkStatus,
  ConversationSignal,
  ConversationSpeaker,
  ConversationTopic,
  CreateConversationSignalInput,
  CreateConversationSpeakerInput,
  CreateConversationTopicInput,
  CreateChunkInput,
  CreateReviewEntryInput,
  CreateTranscriptInput,
  LogProcessingErrorInput,
  ProcessingError,
  Profile,
  ProfileFieldHistory,
  ProfileInput,
  ProfileListQuery,
  RecordFieldHistoryInput,
  ReviewQueueEntry,
  Transcript,
  TranscriptChunk
} from "@/lib/types";

const TABLES = {
  profiles: "profiles",
  fieldHistory: "profile_field_history",
  transcripts: "conversation_transcripts",
  chunks: "transcript_chunks",
  reviews: "profile_review_queue",
  errors: "processing_errors",
  speakers: "conversation_speakers",
  topics: "conversation_topics",
  signals: "conversation_signals"
} as const;

// PostgREST code for `.single()` matching zero rows.
const NO_ROWS = "PGRST116";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);
const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);
const count = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

const profileRow = z.object({
  id: z.string(),
  name: z.string(),
  email: optionalText,
  company: optionalText,
  business_focus: optionalText,
  status: optionalText,
  service_provided: optionalText,
  what_you_do: optionalText,
  who_you_serve: optionalText,
  seeking: optionalText,
  offering: optionalText,
  current_projects: optionalText,
  contact: optionalText,
  list_size: count,
  social_reach: count,
  created_at: z.string(),
  updated_at: optionalText
});

const historyRow = z.object({
  id: z.string(),
  profile_id: z.string(),
  field_name: z.string(),
  field_value: z.string(),
  event_name: optionalText,
  event_date: optionalText,
  transcript_id: optionalText,
  chunk_id: optionalText,
  confidence: optionalNumber,
  created_at: z.string()
});

const transcriptRow = z.object({
  id: z.string(),
  transcript_text: z.string(),
  event_name: optionalText,
  event_date: optionalText,
  content_hash: z.string(),
  transcript_type: z.enum(["solo_intro", "group"]),
  processing_status: z.enum(["processing", "success", "failed"]),
  profiles_extracted: count,
  auto_apply_threshold: optionalNumber,
  auto_create: z
    .boolean()
    .nullish()
    .transform((value) => value ?? undefined),
  created_at: z.string(),
  updated_at: optionalText
});

const chunkRow = z.object({
  id: z.string(),
  transcript_id: z.string(),
  chunk_index: z.number().int(),
  char_start: count,
  char_end: count,
  chunk_text: z.string(),
  status: z.enum(["pending", "success", "failed"]),
  profiles_extracted: count,
  retry_count: count,
  error_message: optionalText,
  created_at: z.string(),
  processed_at: optionalText
});

const speakerJson = z.object({
  name: z.string(),
  email: z.string().optional(),
  company: z.string().optional(),
  whatYouDo: z.string().optional(),
  whoYouServe: z.string().optional(),
  seeking: z.string().optional(),
  offering: z.string().optional(),
  currentProjects: z.string().optional(),
  contact: z.string().optional(),
  businessFocus: z.string().optional(),
  speakerText: z.string().optional(),
  listSize: z.number().default(0),
  socialReach: z.number().default(0),
  confidence: z.number().default(0),
  appearances: z
    .array(
      z.object({
        eventName: z.string().optional(),
        eventDate: z.string().optional(),
        transcriptId: z.string().optional(),
        chunkId: z.string().optional()
      })
    )
    .default([])
});

const matchDetailsJson = z.object({
  strategy: z.enum(["email_match", "name_company_match", "exact_name_match", "fuzzy_name_match", "no_match", "missing_name"]),
  profileName: z.string().optional(),
  profileCompany: z.string().optional(),
  similarity: z.number().optional(),
  reason: z.string().optional()
});

const reviewRow = z.object({
  id: z.string(),
  extracted_name: z.string(),
  extracted_data: speakerJson,
  matched_profile_id: optionalText,
  match_confidence: count,
  match_details: matchDetailsJson,
  source_transcript: optionalText,
  transcript_id: optionalText,
  status: z.enum(["pending", "approved", "rejected", "merged"]),
  resolved_by: optionalText,
  resolved_at: optionalText,
  created_at: z.string()
});

const errorRow = z.object({
  id: z.string(),
  error_type: z.enum(["chunk_extraction", "pipeline_failure", "profile_match", "store_write", "review_resolution"]),
  error_message: z.string(),
  error_details: z
    .record(z.unknown())
    .nullish()
    .transform((value) => value ?? {}),
  transcript_id: optionalText,
  chunk_id: optionalText,
  profile_id: optionalText,
  status: z.enum(["new", "acknowledged", "resolved", "ignored"]),
  resolved_by: optionalText,
  resolved_at: optionalText,
  resolution_notes: optionalText,
  created_at: z.string()
});

const conversationSpeakerRow = z.object({
  id: z.string(),
  transcript_id: z.string(),
  speaker_name: z.string(),
  matched_profile_id: optionalText,
  match_confidence: optionalNumber,
  speaker_text: optionalText,
  created_at: z.string()
});

const conversationTopicRow = z.object({
  id: z.string(),
  transcript_id: z.string(),
  topic_name: z.string(),
  topic_category: optionalText,
  relevance_score: count,
  mentioned_by: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  created_at: z.string()
});

const conversationSignalRow = z.object({
  id: z.string(),
  transcript_id: z.string(),
  speaker_id: optionalText,
  profile_id: optionalText,
  signal_type: z.enum(["need", "interest", "offer", "connection"]),
  signal_text: z.string(),
  target_speaker_id: optionalText,
  target_profile_id: optionalText,
  confidence: count,
  created_at: z.string()
});

const idRow = z.object({ id: z.string() });

function toProfile(value: z.infer<typeof profileRow>): Profile {
  return {
    id: value.id,
    name: value.name,
    email: value.email,
    company: value.company,
    businessFocus: value.business_focus,
    status: value.status,
    serviceProvided: value.service_provided,
    whatYouDo: value.what_you_do,
    whoYouServe: value.who_you_serve,
    seeking: value.seeking,
    offering: value.offering,
    currentProjects: value.current_projects,
    contact: value.contact,
    listSize: value.list_size,
    socialReach: value.social_reach,
    createdAt: value.created_at,
    updatedAt: value.updated_at ?? value.created_at
  };
}

function fromProfileInput(input: Partial<ProfileInput>): Record<string, unknown> {
  const columns: Record<string, unknown> = {
    name: input.name,
    email: input.email,
    company: input.company,
    business_focus: input.businessFocus,
    status: input.status,
    service_provided: input.serviceProvided,
    what_you_do: input.whatYouDo,
    who_you_serve: input.whoYouServe,
    seeking: input.seeking,
    offering: input.offering,
    current_projects: input.currentProjects,
    contact: input.contact,
    list_size: input.listSize,
    social_reach: input.socialReach
  };

  // Absent keys must not overwrite columns with null.
  return Object.fromEntries(Object.entries(columns).filter(([, value]) => value !== undefined));
}

function toHistory(value: z.infer<typeof historyRow>): ProfileFieldHistory {
  return {
    id: value.id,
    profileId: value.profile_id,
    fieldName: value.field_name,
    fieldValue: value.field_value,
    eventName: value.event_name,
    eventDate: value.event_date,
    transcriptId: value.transcript_id,
    chunkId: value.chunk_id,
    confidence: value.confidence,
    createdAt: value.created_at
  };
}

function toTranscript(value: z.infer<typeof transcriptRow>): Transcript {
  return {
    id: value.id,
    text: value.transcript_text,
    eventName: value.event_name,
    eventDate: value.event_date,
    contentHash: value.content_hash,
    transcriptType: value.transcript_type,
    status: value.processing_status,
    profilesExtracted: value.profiles_extracted,
    autoApplyThreshold: value.auto_apply_threshold,
    autoCreate: value.auto_create,
    createdAt: value.created_at,
    updatedAt: value.updated_at ?? value.created_at
  };
}

function toChunk(value: z.infer<typeof chunkRow>): TranscriptChunk {
  return {
    id: value.id,
    transcriptId: value.transcript_id,
    chunkIndex: value.chunk_index,
    charStart: value.char_start,
    charEnd: value.char_end,
    text: value.chunk_text,
    status: value.status,
    profilesExtracted: value.profiles_extracted,
    retryCount: value.retry_count,
    errorMessage: value.error_message,
    createdAt: value.created_at,
    processedAt: value.processed_at
  };
}

function toReviewEntry(value: z.infer<typeof reviewRow>): ReviewQueueEntry {
  return {
    id: value.id,
    extractedName: value.extracted_name,
    extractedData: value.extracted_data,
    candidateProfileId: value.matched_profile_id,
    confidence: value.match_confidence,
    matchDetails: value.match_details,
    sourceTranscript: value.source_transcript,
    transcriptId: value.transcript_id,
    status: value.status,
    resolvedBy: value.resolved_by,
    resolvedAt: value.resolved_at,
    createdAt: value.created_at
  };
}

function toProcessingError(value: z.infer<typeof errorRow>): ProcessingError {
  return {
    id: value.id,
    errorType: value.error_type,
    message: value.error_message,
    details: value.error_details,
    transcriptId: value.transcript_id,
    chunkId: value.chunk_id,
    profileId: value.profile_id,
    status: value.status,
    resolvedBy: value.resolved_by,
    resolvedAt: value.resolved_at,
    resolutionNotes: value.resolution_notes,
    createdAt: value.created_at
  };
}

function toConversationSpeaker(value: z.infer<typeof conversationSpeakerRow>): ConversationSpeaker {
  return {
    id: value.id,
    transcriptId: value.transcript_id,
    speakerName: value.speaker_name,
    profileId: value.matched_profile_id,
    matchConfidence: value.match_confidence,
    speakerText: value.speaker_text,
    createdAt: value.created_at
  };
}

function toConversationTopic(value: z.infer<typeof conversationTopicRow>): ConversationTopic {
  return {
    id: value.id,
    transcriptId: value.transcript_id,
    name: value.topic_name,
    category: value.topic_category,
    relevanceScore: value.relevance_score,
    mentionedBy: value.mentioned_by,
    createdAt: value.created_at
  };
}

function toConversationSignal(value: z.infer<typeof conversationSignalRow>): ConversationSignal {
  return {
    id: value.id,
    transcriptId: value.transcript_id,
    speakerId: value.speaker_id,
    profileId: value.profile_id,
    signalType: value.signal_type,
    text: value.signal_text,
    targetSpeakerId: value.target_speaker_id,
    targetProfileId: value.target_profile_id,
    confidence: value.confidence,
    createdAt: value.created_at
  };
}

/** Makes `%`, `_` and `\` match themselves inside a LIKE pattern. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function escapeFilterTerm(term: string): string {
  // PostgREST `or` filters are comma separated; wildcards come from the caller only.
  return term.replace(/[,()%*]/g, " ").trim();
}

export class SupabasePipelineStore implements PipelineStore {
  constructor(private readonly client: SupabaseClient) {}

  async getProfile(id: string): Promise<Profile | undefined> {
    const { data, error } = await this.client.from(TABLES.profiles).select("*").eq("id", id).maybeSingle();
    this.check(error, TABLES.profiles, "select");
    return data ? toProfile(profileRow.parse(data)) : undefined;
  }

  async listProfiles(query: ProfileListQuery = {}): Promise<{ profiles: Profile[]; count: number }> {
    const offset = query.offset ?? 0;
    const limit = query.limit ?? 100;

    let request = this.client
      .from(TABLES.profiles)
      .select("*", { count: "exact" })
      .order("name", { ascending: true })
      .range(offset, offset + limit - 1);

    const term = query.search ? escapeFilterTerm(query.search) : "";
    if (term) {
      request = request.or(
        ["name", "company", "business_focus", "service_provided"].map((column) => `${column}.ilike.%${term}%`).join(",")
      );
    }

    if (query.status) {
      request = request.eq("status", query.status);
    }

    if (query.businessFocus) {
      request = request.ilike("business_focus", `%${escapeLikePattern(query.businessFocus)}%`);
    }

    const { data, error, count: total } = await request;
    this.check(error, TABLES.profiles, "list");

    return {
      profiles: (data ?? []).map((row) => toProfile(profileRow.parse(row))),
      count: total ?? 0
    };
  }

  async listProfilesForMatching(limit: number): Promise<Profile[]> {
    const { data, error } = await this.client.from(TABLES.profiles).select("*").limit(limit);
    this.check(error, TABLES.profiles, "scan");
    return (data ?? []).map((row) => toProfile(profileRow.parse(row)));
  }

  async findProfileByEmail(email: string): Promise<Profile | undefined> {
    // `email_normalized` is a generated lower(btrim(email)) column.
    const { data, error } = await this.client
      .from(TABLES.profiles)
      .select("*")
      .eq("email_normalized", email.trim().toLowerCase())
      .limit(1);
    this.check(error, TABLES.profiles, "select");

    const row = data?.[0];
    return row ? toProfile(profileRow.parse(row)) : undefined;
  }

  async createProfile(input: ProfileInput): Promise<Profile> {
    const { data, error } = await this.client.from(TABLES.profiles).insert(fromProfileInput(input)).select("*").single();
    this.check(error, TABLES.profiles, "insert");
    return toProfile(profileRow.parse(data));
  }

  async updateProfile(id: string, patch: Partial<ProfileInput>): Promise<Profile> {
    const { data, error } = await this.client
      .from(TABLES.profiles)
      .update({ ...fromProfileInput(patch), updated_at: nowIso() })
      .eq("id", id)
      .select("*")
      .single();
    this.check(error, TABLES.profiles, "update");
    return toProfile(profileRow.parse(data));
  }

  async deleteProfile(id: string): Promise<void> {
    const { error } = await this.client.from(TABLES.profiles).delete().eq("id", id);
    this.check(error, TABLES.profiles, "delete");
  }

  async recordFieldHistory(entries: RecordFieldHistoryInput[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const { error } = await this.client.from(TABLES.fieldHistory).insert(
      entries.map((entry) => ({
        profile_id: entry.profileId,
        field_name: entry.fieldName,
        field_value: entry.fieldValue,
        event_name: entry.eventName ?? null,
        event_date: entry.eventDate ?? null,
        transcript_id: entry.transcriptId ?? null,
        chunk_id: entry.chunkId ?? null,
        confidence: entry.confidence ?? null
      }))
    );
    this.check(error, TABLES.fieldHistory, "insert");
  }

  async listFieldHistory(profileId: string): Promise<ProfileFieldHistory[]> {
    const { data, error } = await this.client
      .from(TABLES.fieldHistory)
      .select("*")
      .eq("profile_id", profileId)
      .order("created_at", { ascending: true });
    this.check(error, TABLES.fieldHistory, "list");
    return (data ?? []).map((row) => toHistory(historyRow.parse(row)));
  }

  async createTranscript(input: CreateTranscriptInput): Promise<Transcript> {
    const { data, error } = await this.client
      .from(TABLES.transcripts)
      .insert({
        transcript_text: input.text,
        event_name: input.eventName ?? null,
        event_date: input.eventDate ?? null,
        content_hash: input.contentHash,
        transcript_type: input.transcriptType,
        processing_status: "processing",
        profiles_extracted: 0,
        auto_apply_threshold: input.autoApplyThreshold ?? null,
        auto_create: input.autoCreate ?? null
      })
      .select("*")
      .single();
    this.check(error, TABLES.transcripts, "insert");
    return toTranscript(transcriptRow.parse(data));
  }

  async getTranscript(id: string): Promise<Transcript | undefined> {
    const { data, error } = await this.client.from(TABLES.transcripts).select("*").eq("id", id).maybeSingle();
    this.check(error, TABLES.transcripts, "select");
    return data ? toTranscript(transcriptRow.parse(data)) : undefined;
  }

  async findTranscriptByHash(contentHash: string): Promise<Transcript | undefined> {
    const { data, error } = await this.client
      .from(TABLES.transcripts)
      .select("*")
      .eq("content_hash", contentHash)
      .order("created_at", { ascending: false })
      .limit(1);
    this.check(error, TABLES.transcripts, "select");

    const row = data?.[0];
    return row ? toTranscript(transcriptRow.parse(row)) : undefined;
  }

  async listTranscripts(): Promise<Transcript[]> {
    const { data, error } = await this.client
      .from(TABLES.transcripts)
      .select("*")
      .order("created_at", { ascending: false });
    this.check(error, TABLES.transcripts, "list");
    return (data ?? []).map((row) => toTranscript(transcriptRow.parse(row)));
  }

  async updateTranscript(
    id: string,
    patch: Partial<Pick<Transcript, "status" | "profilesExtracted">>
  ): Promise<Transcript> {
    const { data, error } = await this.client
      .from(TABLES.transcripts)
      .update({
        ...(patch.status ? { processing_status: patch.status } : {}),
        ...(patch.profilesExtracted !== undefined ? { profiles_extracted: patch.profilesExtracted } : {}),
        updated_at: nowIso()
      })
      .eq("id", id)
      .select("*")
      .single();
    this.check(error, TABLES.transcripts, "update");
    return toTranscript(transcriptRow.parse(data));
  }

  async createChunks(transcriptId: string, chunks: CreateChunkInput[]): Promise<TranscriptChunk[]> {
    const { data, error } = await this.client
      .from(TABLES.chunks)
      .insert(
        chunks.map((chunk) => ({
          transcript_id: transcriptId,
          chunk_index: chunk.chunkIndex,
          char_start: chunk.charStart,
          char_end: chunk.charEnd,
          chunk_text: chunk.text,
          status: "pending",
          profiles_extracted: 0,
          retry_count: 0
        }))
      )
      .select("*")
      .order("chunk_index", { ascending: true });
    this.check(error, TABLES.chunks, "insert");
    return (data ?? []).map((row) => toChunk(chunkRow.parse(row)));
  }

  async updateChunk(
    id: string,
    patch: { status: ChunkStatus; profilesExtracted?: number; retryCount?: number; errorMessage?: string | null }
  ): Promise<TranscriptChunk> {
    const { data, error } = await this.client
      .from(TABLES.chunks)
      .update({
        status: patch.status,
        processed_at: nowIso(),
        ...(patch.profilesExtracted !== undefined ? { profiles_extracted: patch.profilesExtracted } : {}),
        ...(patch.retryCount !== undefined ? { retry_count: patch.retryCount } : {}),
        ...(patch.errorMessage !== undefined ? { error_message: patch.errorMessage } : {})
      })
      .eq("id", id)
      .select("*")
      .single();
    this.check(error, TABLES.chunks, "update");
    return toChunk(chunkRow.parse(data));
  }

  async listChunks(transcriptId: string): Promise<TranscriptChunk[]> {
    const { data, error } = await this.client
      .from(TABLES.chunks)
      .select("*")
      .eq("transcript_id", transcriptId)
      .order("chunk_index", { ascending: true });
    this.check(error, TABLES.chunks, "list");
    return (data ?? []).map((row) => toChunk(chunkRow.parse(row)));
  }

  async createReviewEntry(input: CreateReviewEntryInput): Promise<ReviewQueueEntry> {
    const { data, error } = await this.client
      .from(TABLES.reviews)
      .insert({
        extracted_name: input.extractedName,
        extracted_data: input.extractedData,
        matched_profile_id: input.candidateProfileId ?? null,
        match_confidence: input.confidence,
        match_details: input.matchDetails,
        source_transcript: input.sourceTranscript ?? null,
        transcript_id: input.transcriptId ?? null,
        status: "pending"
      })
      .select("*")
      .single();
    this.check(error, TABLES.reviews, "insert");
    return toReviewEntry(reviewRow.parse(data));
  }

  async getReviewEntry(id: string): Promise<ReviewQueueEntry | undefined> {
    const { data, error } = await this.client.from(TABLES.reviews).select("*").eq("id", id).maybeSingle();
    this.check(error, TABLES.reviews, "select");
    return data ? toReviewEntry(reviewRow.parse(data)) : undefined;
  }

  async listPendingReviews(): Promise<ReviewQueueEntry[]> {
    const { data, error } = await this.client
      .from(TABLES.reviews)
      .select("*")
      .eq("status", "pending")
      .order("created_at", { ascending: true });
    this.check(error, TABLES.reviews, "list");
    return (data ?? []).map((row) => toReviewEntry(reviewRow.parse(row)));
  }

  async updateReviewEntry(
    id: string,
    patch: Pick<ReviewQueueEntry, "status"> & Partial<Pick<ReviewQueueEntry, "resolvedBy" | "resolvedAt">>
  ): Promise<ReviewQueueEntry> {
    const { data, error } = await this.client
      .from(TABLES.reviews)
      .update({
        status: patch.status,
        resolved_by: patch.resolvedBy ?? null,
        resolved_at: patch.resolvedAt ?? null
      })
      .eq("id", id)
      .select("*")
      .single();
    this.check(error, TABLES.reviews, "update");
    return toReviewEntry(reviewRow.parse(data));
  }

  async logProcessingError(input: LogProcessingErrorInput): Promise<ProcessingError> {
    const { data, error } = await this.client
      .from(TABLES.errors)
      .insert({
        error_type: input.errorType,
        error_message: input.message,
        error_details: input.details ?? {},
        transcript_id: input.transcriptId ?? null,
        chunk_id: input.chunkId ?? null,
        profile_id: input.profileId ?? null,
        status: "new"
      })
      .select("*")
      .single();
    this.check(error, TABLES.errors, "insert");
    return toProcessingError(errorRow.parse(data));
  }

  async listUnresolvedErrors(): Promise<ProcessingError[]> {
    const { data, error } = await this.client
      .from(TABLES.errors)
      .select("*")
      .in("status", ["new", "acknowledged"])
      .order("created_at", { ascending: false });
    this.check(error, TABLES.errors, "list");
    return (data ?? []).map((row) => toProcessingError(errorRow.parse(row)));
  }

  async updateProcessingError(
    id: string,
    patch: Pick<ProcessingError, "status"> &
      Partial<Pick<ProcessingError, "resolvedBy" | "resolvedAt" | "resolutionNotes">>
  ): Promise<ProcessingError> {
    const { data, error } = await this.client
      .from(TABLES.errors)
      .update({
        status: patch.status,
        resolved_by: patch.resolvedBy ?? null,
        resolved_at: patch.resolvedAt ?? null,
        resolution_notes: patch.resolutionNotes ?? null
      })
      .eq("id", id)
      .select("*")
      .single();
    this.check(error, TABLES.errors, "update");
    return toProcessingError(errorRow.parse(data));
  }

  async createConversationSpeakers(
    transcriptId: string,
    speakers: CreateConversationSpeakerInput[]
  ): Promise<ConversationSpeaker[]> {
    if (speakers.length === 0) {
      return [];
    }

    const { data, error } = await this.client
      .from(TABLES.speakers)
      .insert(
        speakers.map((speaker) => ({
          transcript_id: transcriptId,
          speaker_name: speaker.speakerName,
          matched_profile_id: speaker.profileId ?? null,
          match_confidence: speaker.matchConfidence ?? null,
          speaker_text: speaker.speakerText ?? null
        }))
      )
      .select("*");
    this.check(error, TABLES.speakers, "insert");
    return (data ?? []).map((row) => toConversationSpeaker(conversationSpeakerRow.parse(row)));
  }

  async createConversationTopics(transcriptId: string, topics: CreateConversationTopicInput[]): Promise<ConversationTopic[]> {
    if (topics.length === 0) {
      return [];
    }

    const { data, error } = await this.client
      .from(TABLES.topics)
      .insert(
        topics.map((topic) => ({
          transcript_id: transcriptId,
          topic_name: topic.name,
          topic_category: topic.category ?? null,
          relevance_score: topic.relevanceScore,
          mentioned_by: topic.mentionedBy
        }))
      )
      .select("*");
    this.check(error, TABLES.topics, "insert");
    return (data ?? []).map((row) => toConversationTopic(conversationTopicRow.parse(row)));
  }

  async createConversationSignals(transcriptId: string, signals: CreateConversationSignalInput[]): Promise<ConversationSignal[]> {
    if (signals.length === 0) {
      return [];
    }

    const { data, error } = await this.client
      .from(TABLES.signals)
      .insert(
        signals.map((signal) => ({
          transcript_id: transcriptId,
          speaker_id: signal.speakerId ?? null,
          profile_id: signal.profileId ?? null,
          signal_type: signal.signalType,
          signal_text: signal.text,
          target_speaker_id: signal.targetSpeakerId ?? null,
          target_profile_id: signal.targetProfileId ?? null,
          confidence: signal.confidence
        }))
      )
      .select("*");
    this.check(error, TABLES.signals, "insert");
    return (data ?? []).map((row) => toConversationSignal(conversationSignalRow.parse(row)));
  }

  async linkConversationSpeaker(transcriptId: string, speakerName: string, profileId: string): Promise<void> {
    const { data, error } = await this.client
      .from(TABLES.speakers)
      .update({ matched_profile_id: profileId })
      .eq("transcript_id", transcriptId)
      .eq("speaker_name", speakerName)
      .select("id");
    this.check(error, TABLES.speakers, "link");

    const speakerIds = (data ?? []).map((row) => idRow.parse(row).id);
    if (speakerIds.length === 0) {
      return;
    }

    const sent = await this.client.from(TABLES.signals).update({ profile_id: profileId }).in("speaker_id", speakerIds);
    this.check(sent.error, TABLES.signals, "link");

    const received = await this.client
      .from(TABLES.signals)
      .update({ target_profile_id: profileId })
      .in("target_speaker_id", speakerIds);
    this.check(received.error, TABLES.signals, "link");
  }

  async listConversationSpeakersForProfile(profileId: string): Promise<ConversationSpeaker[]> {
    const { data, error } = await this.client.from(TABLES.speakers).select("*").eq("matched_profile_id", profileId);
    this.check(error, TABLES.speakers, "list");
    return (data ?? []).map((row) => toConversationSpeaker(conversationSpeakerRow.parse(row)));
  }

  async listTopicsMentionedBy(speakerIds: string[]): Promise<ConversationTopic[]> {
    if (speakerIds.length === 0) {
      return [];
    }

    const { data, error } = await this.client.from(TABLES.topics).select("*").overlaps("mentioned_by", speakerIds);
    this.check(error, TABLES.topics, "list");
    return (data ?? []).map((row) => toConversationTopic(conversationTopicRow.parse(row)));
  }

  async listSignalsForProfile(profileId: string): Promise<ConversationSignal[]> {
    const { data, error } = await this.client
      .from(TABLES.signals)
      .select("*")
      .eq("profile_id", profileId)
      .order("created_at", { ascending: true });
    this.check(error, TABLES.signals, "list");
    return (data ?? []).map((row) => toConversationSignal(conversationSignalRow.parse(row)));
  }

  async listConnectionSignalsTargeting(profileId: string): Promise<ConversationSignal[]> {
    const { data, error } = await this.client
      .from(TABLES.signals)
      .select("*")
      .eq("target_profile_id", profileId)
      .eq("signal_type", "connection")
      .order("created_at", { ascending: true });
    this.check(error, TABLES.signals, "list");
    return (data ?? []).map((row) => toConversationSignal(conversationSignalRow.parse(row)));
  }

  async findNeedSignals(keyword: string): Promise<ConversationSignal[]> {
    const { data, error } = await this.client
      .from(TABLES.signals)
      .select("*")
      .eq("signal_type", "need")
      .ilike("signal_text", `%${escapeLikePattern(keyword)}%`)
      .order("confidence", { ascending: false });
    this.check(error, TABLES.signals, "list");
    return (data ?? []).map((row) => toConversationSignal(conversationSignalRow.parse(row)));
  }

  private check(error: PostgrestError | null, table: string, operation: string): void {
    if (error?.code === NO_ROWS) {
      throw new NotFoundError(`No ${table} row for ${operation}`);
    }

    if (error) {
      console.error("[jvmatch][store] supabase request failed", { table, operation, code: error.code });
      throw new StoreError(`${table} ${operation} failed: ${error.message}`, table, operation, error.code);
    }
  }
}
