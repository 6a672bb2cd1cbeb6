export type TranscriptStatus = "processing" | "success" | "failed";

export type ChunkStatus = "pending" | "success" | "failed";

export type TranscriptType = "solo_intro" | "group";

export type ReviewStatus = "pending" | "approved" | "rejected" | "merged";

export type ReviewResolution = Exclude<ReviewStatus, "pending">;

export type ProcessingErrorStatus = "new" | "acknowledged" | "resolved" | "ignored";

export type ProcessingErrorType =
  | "chunk_extraction"
  | "pipeline_failure"
  | "profile_match"
  | "store_write"
  | "review_resolution";

export type SignalType = "need" | "interest" | "offer" | "connection";

export interface Transcript {
  id: string;
  text: string;
  eventName?: string;
  eventDate?: string;
  contentHash: string;
  transcriptType: TranscriptType;
  status: TranscriptStatus;
  profilesExtracted: number;
  /** Policy given at submission, reused when failed chunks are retried. */
  autoApplyThreshold?: number;
  autoCreate?: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface TranscriptChunk {
  id: string;
  transcriptId: string;
  chunkIndex: number;
  charStart: number;
  charEnd: number;
  text: string;
  status: ChunkStatus;
  profilesExtracted: number;
  retryCount: number;
  errorMessage?: string;
  createdAt: string;
  processedAt?: string;
}

export interface SpeakerAppearance {
  eventName?: string;
  eventDate?: string;
  transcriptId?: string;
  chunkId?: string;
}

/** Free-text profile fields an extraction can fill. */
export const SPEAKER_TEXT_FIELDS = [
  "company",
  "whatYouDo",
  "whoYouServe",
  "seeking",
  "offering",
  "currentProjects",
  "contact",
  "businessFocus",
  "speakerText"
] as const;

export type SpeakerTextField = (typeof SPEAKER_TEXT_FIELDS)[number];

export type SpeakerTextFields = Partial<Record<SpeakerTextField, string>>;

export interface ExtractedSpeaker extends SpeakerTextFields {
  name: string;
  email?: string;
  listSize: number;
  socialReach: number;
  confidence: number;
  appearances: SpeakerAppearance[];
}

export interface ExtractedTopic {
  name: string;
  category?: string;
  relevanceScore: number;
  mentionedBy: string[];
}

export interface ExtractedSignal {
  speakerName: string;
  signalType: SignalType;
  text: string;
  targetSpeaker?: string;
  confidence: number;
}

export interface ConnectionSuggestion {
  fromSpeaker: string;
  toSpeaker: string;
  reason?: string;
  strength: number;
}

export interface Profile {
  id: string;
  name: string;
  email?: string;
  company?: string;
  businessFocus?: string;
  status?: string;
  serviceProvided?: string;
  whatYouDo?: string;
  whoYouServe?: string;
  seeking?: string;
  offering?: string;
  currentProjects?: string;
  contact?: string;
  listSize: number;
  socialReach: number;
  createdAt: string;
  updatedAt: string;
}

export type ProfileInput = Omit<Profile, "id" | "createdAt" | "updatedAt">;

export interface ProfileListQuery {
  search?: string;
  status?: string;
  businessFocus?: string;
  limit?: number;
  offset?: number;
}

export interface ProfileFieldHistory {
  id: string;
  profileId: string;
  fieldName: string;
  fieldValue: string;
  eventName?: string;
  eventDate?: string;
  transcriptId?: string;
  chunkId?: string;
  confidence?: number;
  createdAt: string;
}

export type MatchStrategy = "email_match" | "name_company_match" | "exact_name_match" | "fuzzy_name_match" | "no_match" | "missing_name";

export interface MatchDetails {
  strategy: MatchStrategy;
  profileName?: string;
  profileCompany?: string;
  similarity?: number;
  reason?: string;
}

export interface ReviewQueueEntry {
  id: string;
  extractedName: string;
  extractedData: ExtractedSpeaker;
  candidateProfileId?: string;
  confidence: number;
  matchDetails: MatchDetails;
  sourceTranscript?: string;
  transcriptId?: string;
  status: ReviewStatus;
  resolvedBy?: string;
  resolvedAt?: string;
  createdAt: string;
}

/** A speaker as heard in one transcript, linked to a directory profile once resolved. */
export interface ConversationSpeaker {
  id: string;
  transcriptId: string;
  speakerName: string;
  profileId?: string;
  matchConfidence?: number;
  speakerText?: string;
  createdAt: string;
}

export interface ConversationTopic {
  id: string;
  transcriptId: string;
  name: string;
  category?: string;
  relevanceScore: number;
  /** Conversation speaker ids. */
  mentionedBy: string[];
  createdAt: string;
}

export interface ConversationSignal {
  id: string;
  transcriptId: string;
  speakerId?: string;
  profileId?: string;
  signalType: SignalType;
  text: string;
  targetSpeakerId?: string;
  targetProfileId?: string;
  confidence: number;
  createdAt: string;
}

export type CreateConversationSpeakerInput = Omit<ConversationSpeaker, "id" | "transcriptId" | "createdAt">;

export type CreateConversationTopicInput = Omit<ConversationTopic, "id" | "transcriptId" | "createdAt">;

export type CreateConversationSignalInput = Omit<ConversationSignal, "id" | "transcriptId" | "createdAt">;

export interface ProfileSignals {
  signals: ConversationSignal[];
  connectionOpportunities: ConversationSignal[];
}

export interface SharedTopics {
  topics: string[];
  sameConversation: boolean;
}

export interface ProcessingError {
  id: string;
  errorType: ProcessingErrorType;
  message: string;
  details: Record<string, unknown>;
  transcriptId?: string;
  chunkId?: string;
  profileId?: string;
  status: ProcessingErrorStatus;
  resolvedBy?: string;
  resolvedAt?: string;
  resolutionNotes?: string;
  createdAt: string;
}

export interface CreateTranscriptInput {
  text: string;
  eventName?: string;
  eventDate?: string;
  contentHash: string;
  transcriptType: TranscriptType;
  autoApplyThreshold?: number;
  autoCreate?: boolean;
}

export interface CreateChunkInput {
  chunkIndex: number;
  charStart: number;
  charEnd: number;
  text: string;
}

export interface CreateReviewEntryInput {
  extractedName: string;
  extractedData: ExtractedSpeaker;
  candidateProfileId?: string;
  confidence: number;
  matchDetails: MatchDetails;
  sourceTranscript?: string;
  transcriptId?: string;
}

export interface LogProcessingErrorInput {
  errorType: ProcessingErrorType;
  message: string;
  details?: Record<string, unknown>;
  transcriptId?: string;
  chunkId?: string;
  profileId?: string;
}

export type RecordFieldHistoryInput = Omit<ProfileFieldHistory, "id" | "createdAt">;

export interface SubmitTranscriptInput {
  text: string;
  eventName?: string;
  eventDate?: string;
  autoApplyThreshold?: number;
  autoCreate?: boolean;
}

export type SpeakerOutcome =
  | { name: string; action: "updated"; profileId: string; confidence: number }
  | { name: string; action: "created"; profileId: string; confidence: number }
  | { name: string; action: "queued_for_review"; reviewId: string; candidateProfileId?: string; confidence: number }
  | { name: string; action: "store_failed"; errorId?: string; message: string };

export interface TranscriptSummary {
  ok: true;
  transcriptId: string;
  transcriptType: TranscriptType;
  duplicate: boolean;
  profilesFound: number;
  profilesUpdated: number;
  profilesCreated: number;
  reviewEntriesCreated: number;
  storeFailures: number;
  conversationRecorded: boolean;
  chunksTotal: number;
  chunksSucceeded: number;
  chunksFailed: number;
  speakers: ExtractedSpeaker[];
  topics: ExtractedTopic[];
  signals: ExtractedSignal[];
  connections: ConnectionSuggestion[];
  outcomes: SpeakerOutcome[];
}

export interface TranscriptFailure {
  ok: false;
  transcriptId?: string;
  error: string;
  chunksTotal: number;
  chunksFailed: number;
}

export type SubmitTranscriptResult = TranscriptSummary | TranscriptFailure;

export interface TranscriptDetails {
  transcript: Transcript;
  chunks: TranscriptChunk[];
}
