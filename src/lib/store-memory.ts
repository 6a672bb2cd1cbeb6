import { createId, nowIso } from "@/lib/id";
import { NotFoundError } from "@/lib/errors";
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

function matchesQuery(profile: Profile, query: ProfileListQuery): boolean {
  if (query.search) {
    const term = query.search.toLowerCase();
    const haystack = [profile.name, profile.company, profile.businessFocus, profile.serviceProvided];
    if (!haystack.some((value) => value?.toLowerCase().includes(term))) {
      return false;
    }
  }

  if (query.status && profile.status !== query.status) {
    return false;
  }

  if (query.businessFocus && !profile.businessFocus?.toLowerCase().includes(query.businessFocus.toLowerCase())) {
    return false;
  }

  return true;
}

export class InMemoryPipelineStore implements PipelineStore {
  private profiles = new Map<string, Profile>();
  private fieldHistory: ProfileFieldHistory[] = [];
  private transcripts = new Map<string, Transcript>();
  private chunks = new Map<string, TranscriptChunk>();
  private reviews = new Map<string, ReviewQueueEntry>();
  private errors = new Map<string, ProcessingError>();
  private conversationSpeakers: ConversationSpeaker[] = [];
  private conversationTopics: ConversationTopic[] = [];
  private conversationSignals: ConversationSignal[] = [];

  async getProfile(id: string): Promise<Profile | undefined> {
    return this.profiles.get(id);
  }

  async listProfiles(query: ProfileListQuery = {}): Promise<{ profiles: Profile[]; count: number }> {
    const matching = [...this.profiles.values()]
      .filter((profile) => matchesQuery(profile, query))
      .sort((a, b) => a.name.localeCompare(b.name));
    const offset = query.offset ?? 0;
    const limit = query.limit ?? 100;

    return {
      profiles: matching.slice(offset, offset + limit),
      count: matching.length
    };
  }

  async listProfilesForMatching(limit: number): Promise<Profile[]> {
    return [...this.profiles.values()].slice(0, limit);
  }

  async findProfileByEmail(email: string): Promise<Profile | undefined> {
    const target = email.trim().toLowerCase();
    return [...this.profiles.values()].find((profile) => profile.email?.trim().toLowerCase() === target);
  }

  async createProfile(input: ProfileInput): Promise<Profile> {
    const now = nowIso();
    const profile: Profile = {
      ...input,
      id: createId("prf"),
      createdAt: now,
      updatedAt: now
    };

    this.profiles.set(profile.id, profile);
    return profile;
  }

  async updateProfile(id: string, patch: Partial<ProfileInput>): Promise<Profile> {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new NotFoundError(`Profile ${id} not found`);
    }

    const updated: Profile = {
      ...profile,
      ...patch,
      updatedAt: nowIso()
    };

    this.profiles.set(id, updated);
    return updated;
  }

  async deleteProfile(id: string): Promise<void> {
    if (!this.profiles.delete(id)) {
      throw new NotFoundError(`Profile ${id} not found`);
    }
  }

  async recordFieldHistory(entries: RecordFieldHistoryInput[]): Promise<void> {
    const now = nowIso();
    for (const entry of entries) {
      this.fieldHistory.push({ ...entry, id: createId("pfh"), createdAt: now });
    }
  }

  async listFieldHistory(profileId: string): Promise<ProfileFieldHistory[]> {
    return this.fieldHistory.filter((entry) => entry.profileId === profileId);
  }

  async createTranscript(input: CreateTranscriptInput): Promise<Transcript> {
    const now = nowIso();
    const transcript: Transcript = {
      ...input,
      id: createId("trn"),
      status: "processing",
      profilesExtracted: 0,
      createdAt: now,
      updatedAt: now
    };

    this.transcripts.set(transcript.id, transcript);
    return transcript;
  }

  async getTranscript(id: string): Promise<Transcript | undefined> {
    return this.transcripts.get(id);
  }

  async findTranscriptByHash(hash: string): Promise<Transcript | undefined> {
    return [...this.transcripts.values()]
      .filter((transcript) => transcript.contentHash === hash)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
  }

  async listTranscripts(): Promise<Transcript[]> {
    return [...this.transcripts.values()].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async updateTranscript(
    id: string,
    patch: Partial<Pick<Transcript, "status" | "profilesExtracted">>
  ): Promise<Transcript> {
    const transcript = this.transcripts.get(id);
    if (!transcript) {
      throw new NotFoundError(`Transcript ${id} not found`);
    }

    const updated: Transcript = {
      ...transcript,
      ...patch,
      updatedAt: nowIso()
    };

    this.transcripts.set(id, updated);
    return updated;
  }

  async createChunks(transcriptId: string, inputs: CreateChunkInput[]): Promise<TranscriptChunk[]> {
    if (!this.transcripts.has(transcriptId)) {
      throw new NotFoundError(`Transcript ${transcriptId} not found`);
    }

    const now = nowIso();
    return inputs.map((input) => {
      const chunk: TranscriptChunk = {
        ...input,
        id: createId("chk"),
        transcriptId,
        status: "pending",
        profilesExtracted: 0,
        retryCount: 0,
        createdAt: now
      };

      this.chunks.set(chunk.id, chunk);
      return chunk;
    });
  }

  async updateChunk(
    id: string,
    patch: { status: ChunkStatus; profilesExtracted?: number; retryCount?: number; errorMessage?: string | null }
  ): Promise<TranscriptChunk> {
    const chunk = this.chunks.get(id);
    if (!chunk) {
      throw new NotFoundError(`Chunk ${id} not found`);
    }

    const updated: TranscriptChunk = {
      ...chunk,
      status: patch.status,
      profilesExtracted: patch.profilesExtracted ?? chunk.profilesExtracted,
      retryCount: patch.retryCount ?? chunk.retryCount,
      errorMessage: patch.errorMessage === null ? undefined : patch.errorMessage ?? chunk.errorMessage,
      processedAt: nowIso()
    };

    this.chunks.set(id, updated);
    return updated;
  }

  async listChunks(transcriptId: string): Promise<TranscriptChunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.transcriptId === transcriptId)
      .sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  async createReviewEntry(input: CreateReviewEntryInput): Promise<ReviewQueueEntry> {
    const entry: ReviewQueueEntry = {
      ...input,
      id: createId("rvw"),
      status: "pending",
      createdAt: nowIso()
    };

    this.reviews.set(entry.id, entry);
    return entry;
  }

  async getReviewEntry(id: string): Promise<ReviewQueueEntry | undefined> {
    return this.reviews.get(id);
  }

  async listPendingReviews(): Promise<ReviewQueueEntry[]> {
    return [...this.reviews.values()].filter((entry) => entry.status === "pending");
  }

  async updateReviewEntry(
    id: string,
    patch: Pick<ReviewQueueEntry, "status"> & Partial<Pick<ReviewQueueEntry, "resolvedBy" | "resolvedAt">>
  ): Promise<ReviewQueueEntry> {
    const entry = this.reviews.get(id);
    if (!entry) {
      throw new NotFoundError(`Review entry ${id} not found`);
    }

    const updated: ReviewQueueEntry = { ...entry, ...patch };
    this.reviews.set(id, updated);
    return updated;
  }

  async logProcessingError(input: LogProcessingErrorInput): Promise<ProcessingError> {
    const record: ProcessingError = {
      ...input,
      details: input.details ?? {},
      id: createId("err"),
      status: "new",
      createdAt: nowIso()
    };

    this.errors.set(record.id, record);
    return record;
  }

  async listUnresolvedErrors(): Promise<ProcessingError[]> {
    return [...this.errors.values()].filter((record) => record.status === "new" || record.status === "acknowledged");
  }

  async updateProcessingError(
    id: string,
    patch: Pick<ProcessingError, "status"> &
      Partial<Pick<ProcessingError, "resolvedBy" | "resolvedAt" | "resolutionNotes">>
  ): Promise<ProcessingError> {
    const record = this.errors.get(id);
    if (!record) {
      throw new NotFoundError(`Processing error ${id} not found`);
    }

    const updated: ProcessingError = { ...record, ...patch };
    this.errors.set(id, updated);
    return updated;
  }

  async createConversationSpeakers(
    transcriptId: string,
    inputs: CreateConversationSpeakerInput[]
  ): Promise<ConversationSpeaker[]> {
    const now = nowIso();
    const rows = inputs.map((input) => ({ ...input, id: createId("csp"), transcriptId, createdAt: now }));
    this.conversationSpeakers.push(...rows);
    return rows;
  }

  async createConversationTopics(transcriptId: string, inputs: CreateConversationTopicInput[]): Promise<ConversationTopic[]> {
    const now = nowIso();
    const rows = inputs.map((input) => ({ ...input, id: createId("ctp"), transcriptId, createdAt: now }));
    this.conversationTopics.push(...rows);
    return rows;
  }

  async createConversationSignals(transcriptId: string, inputs: CreateConversationSignalInput[]): Promise<ConversationSignal[]> {
    const now = nowIso();
    const rows = inputs.map((input) => ({ ...input, id: createId("csg"), transcriptId, createdAt: now }));
    this.conversationSignals.push(...rows);
    return rows;
  }

  async linkConversationSpeaker(transcriptId: string, speakerName: string, profileId: string): Promise<void> {
    const linked = new Set<string>();
    this.conversationSpeakers = this.conversationSpeakers.map((speaker) => {
      if (speaker.transcriptId !== transcriptId || speaker.speakerName !== speakerName) {
        return speaker;
      }

      linked.add(speaker.id);
      return { ...speaker, profileId };
    });

    this.conversationSignals = this.conversationSignals.map((signal) => ({
      ...signal,
      profileId: signal.speakerId && linked.has(signal.speakerId) ? profileId : signal.profileId,
      targetProfileId: signal.targetSpeakerId && linked.has(signal.targetSpeakerId) ? profileId : signal.targetProfileId
    }));
  }

  async listConversationSpeakersForProfile(profileId: string): Promise<ConversationSpeaker[]> {
    return this.conversationSpeakers.filter((speaker) => speaker.profileId === profileId);
  }

  async listTopicsMentionedBy(speakerIds: string[]): Promise<ConversationTopic[]> {
    const ids = new Set(speakerIds);
    return this.conversationTopics.filter((topic) => topic.mentionedBy.some((id) => ids.has(id)));
  }

  async listSignalsForProfile(profileId: string): Promise<ConversationSignal[]> {
    return this.conversationSignals.filter((signal) => signal.profileId === profileId);
  }

  async listConnectionSignalsTargeting(profileId: string): Promise<ConversationSignal[]> {
    return this.conversationSignals.filter(
      (signal) => signal.signalType === "connection" && signal.targetProfileId === profileId
    );
  }

  async findNeedSignals(keyword: string): Promise<ConversationSignal[]> {
    const term = keyword.toLowerCase();
    return this.conversationSignals
      .filter((signal) => signal.signalType === "need" && signal.text.toLowerCase().includes(term))
      .sort((a, b) => b.confidence - a.confidence);
  }
}
