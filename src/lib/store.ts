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

export interface ProfileStore {
  getProfile(id: string): Promise<Profile | undefined>;
  listProfiles(query?: ProfileListQuery): Promise<{ profiles: Profile[]; count: number }>;
  /** Unfiltered scan used for fuzzy identity matching, capped at `limit` rows. */
  listProfilesForMatching(limit: number): Promise<Profile[]>;
  findProfileByEmail(email: string): Promise<Profile | undefined>;
  createProfile(input: ProfileInput): Promise<Profile>;
  updateProfile(id: string, patch: Partial<ProfileInput>): Promise<Profile>;
  deleteProfile(id: string): Promise<void>;

  recordFieldHistory(entries: RecordFieldHistoryInput[]): Promise<void>;
  listFieldHistory(profileId: string): Promise<ProfileFieldHistory[]>;
}

export interface TranscriptStore {
  createTranscript(input: CreateTranscriptInput): Promise<Transcript>;
  getTranscript(id: string): Promise<Transcript | undefined>;
  findTranscriptByHash(contentHash: string): Promise<Transcript | undefined>;
  listTranscripts(): Promise<Transcript[]>;
  updateTranscript(id: string, patch: Partial<Pick<Transcript, "status" | "profilesExtracted">>): Promise<Transcript>;

  createChunks(transcriptId: string, chunks: CreateChunkInput[]): Promise<TranscriptChunk[]>;
  updateChunk(
    id: string,
    patch: {
      status: ChunkStatus;
      profilesExtracted?: number;
      retryCount?: number;
      errorMessage?: string | null;
    }
  ): Promise<TranscriptChunk>;
  listChunks(transcriptId: string): Promise<TranscriptChunk[]>;
}

export interface ReviewQueueStore {
  createReviewEntry(input: CreateReviewEntryInput): Promise<ReviewQueueEntry>;
  getReviewEntry(id: string): Promise<ReviewQueueEntry | undefined>;
  listPendingReviews(): Promise<ReviewQueueEntry[]>;
  updateReviewEntry(
    id: string,
    patch: Pick<ReviewQueueEntry, "status"> & Partial<Pick<ReviewQueueEntry, "resolvedBy" | "resolvedAt">>
  ): Promise<ReviewQueueEntry>;
}

export interface ErrorLogStore {
  logProcessingError(input: LogProcessingErrorInput): Promise<ProcessingError>;
  listUnresolvedErrors(): Promise<ProcessingError[]>;
  updateProcessingError(
    id: string,
    patch: Pick<ProcessingError, "status"> & Partial<Pick<ProcessingError, "resolvedBy" | "resolvedAt" | "resolutionNotes">>
  ): Promise<ProcessingError>;
}

export interface ConversationStore {
  createConversationSpeakers(transcriptId: string, speakers: CreateConversationSpeakerInput[]): Promise<ConversationSpeaker[]>;
  createConversationTopics(transcriptId: string, topics: CreateConversationTopicInput[]): Promise<ConversationTopic[]>;
  createConversationSignals(transcriptId: string, signals: CreateConversationSignalInput[]): Promise<ConversationSignal[]>;
  /** Points a transcript's speaker rows, and the signals they sent or received, at a profile. */
  linkConversationSpeaker(transcriptId: string, speakerName: string, profileId: string): Promise<void>;

  listConversationSpeakersForProfile(profileId: string): Promise<ConversationSpeaker[]>;
  listTopicsMentionedBy(speakerIds: string[]): Promise<ConversationTopic[]>;
  listSignalsForProfile(profileId: string): Promise<ConversationSignal[]>;
  listConnectionSignalsTargeting(profileId: string): Promise<ConversationSignal[]>;
  findNeedSignals(keyword: string): Promise<ConversationSignal[]>;
}

export interface PipelineStore extends ProfileStore, TranscriptStore, ReviewQueueStore, ErrorLogStore, ConversationStore {}
