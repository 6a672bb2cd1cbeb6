import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig, type PipelineConfig } from "@/lib/config";
import { BadRequestError, errorMessage, NotFoundError, PipelineFailureError } from "@/lib/errors";
import { detectTranscriptType, ExtractionClient, type Extractor } from "@/lib/extraction-client";
import { ExtractionOrchestrator, type ExtractionRun } from "@/lib/extraction-orchestrator";
import { contentHash, nowIso } from "@/lib/id";
import { decideAction, IdentityResolver, type IdentityDecision, type PolicyOptions } from "@/lib/identity-resolver";
import { nameSimilarity, normalizeName } from "@/lib/name-matcher";
import { dedupeConnections, dedupeSignals, dedupeSpeakers, dedupeTopics, mergeText } from "@/lib/speaker-merger";
import type { PipelineStore } from "@/lib/store";
import { getStore } from "@/lib/store-factory";
import type {
  ConnectionSuggestion,
  ConversationSignal,
  ConversationSpeaker,
  ExtractedSignal,
  ExtractedSpeaker,
  ExtractedTopic,
  LogProcessingErrorInput,
  ProcessingError,
  Profile,
  ProfileFieldHistory,
  ProfileInput,
  ProfileListQuery,
  ProfileSignals,
  RecordFieldHistoryInput,
  ReviewQueueEntry,
  ReviewResolution,
  SharedTopics,
  SpeakerAppearance,
  SpeakerOutcome,
  SubmitTranscriptInput,
  SubmitTranscriptResult,
  Transcript,
  TranscriptDetails,
  TranscriptFailure,
  TranscriptSummary
} from "@/lib/types";

const REVIEW_EXCERPT_CHARS = 5000;

/** Profile columns an extracted speaker may write to, in the order history is recorded. */
const PROFILE_TEXT_FIELDS = [
  "company",
  "businessFocus",
  "whatYouDo",
  "whoYouServe",
  "seeking",
  "offering",
  "currentProjects",
  "contact"
] as const;

type ProfileTextField = (typeof PROFILE_TEXT_FIELDS)[number];

// Identifiers and contact details are filled when blank, never appended to.
const FILL_ONLY_FIELDS = new Set<ProfileTextField>(["company", "contact"]);

export interface ReviewResolutionResult {
  entry: ReviewQueueEntry;
  profile?: Profile;
}

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function profileInputFromSpeaker(speaker: ExtractedSpeaker): ProfileInput {
  const input: ProfileInput = {
    name: speaker.name.trim(),
    email: clean(speaker.email),
    listSize: speaker.listSize,
    socialReach: speaker.socialReach
  };

  for (const field of PROFILE_TEXT_FIELDS) {
    input[field] = clean(speaker[field]);
  }

  return input;
}

function profilePatchFromSpeaker(profile: Profile, speaker: ExtractedSpeaker): Partial<ProfileInput> {
  const patch: Partial<ProfileInput> = {};

  for (const field of PROFILE_TEXT_FIELDS) {
    const incoming = clean(speaker[field]);
    if (!incoming) {
      continue;
    }

    const existing = clean(profile[field]);
    const next = FILL_ONLY_FIELDS.has(field) ? existing ?? incoming : mergeText(existing, incoming);
    if (next !== profile[field]) {
      patch[field] = next;
    }
  }

  const email = clean(speaker.email);
  if (email && !clean(profile.email)) {
    patch.email = email;
  }

  if (speaker.listSize > profile.listSize) {
    patch.listSize = speaker.listSize;
  }

  if (speaker.socialReach > profile.socialReach) {
    patch.socialReach = speaker.socialReach;
  }

  return patch;
}

/** One row per field and distinct appearance of the speaker. */
function historyFromSpeaker(profileId: string, speaker: ExtractedSpeaker): RecordFieldHistoryInput[] {
  const appearances: SpeakerAppearance[] = speaker.appearances.length > 0 ? speaker.appearances : [{}];
  const entries: RecordFieldHistoryInput[] = [];

  for (const field of PROFILE_TEXT_FIELDS) {
    const value = clean(speaker[field]);
    if (!value) {
      continue;
    }

    for (const appearance of appearances) {
      entries.push({
        profileId,
        fieldName: field,
        fieldValue: value,
        eventName: appearance.eventName,
        eventDate: appearance.eventDate,
        transcriptId: appearance.transcriptId,
        chunkId: appearance.chunkId,
        confidence: speaker.confidence
      });
    }
  }

  return entries;
}

function outcomeProfileId(outcome: SpeakerOutcome | undefined): string | undefined {
  return outcome?.action === "updated" || outcome?.action === "created" ? outcome.profileId : undefined;
}

function outcomeConfidence(outcome: SpeakerOutcome | undefined): number | undefined {
  return outcome && outcome.action !== "store_failed" ? outcome.confidence : undefined;
}

// Connection suggestions are kept alongside the speakers' own signals, as `connection` signals.
function connectionSignal(connection: ConnectionSuggestion): ExtractedSignal {
  return {
    speakerName: connection.fromSpeaker,
    signalType: "connection",
    text: connection.reason ?? `Suggested introduction to ${connection.toSpeaker}`,
    targetSpeaker: connection.toSpeaker,
    confidence: connection.strength
  };
}

function reviewCandidate(decision: IdentityDecision): string | undefined {
  switch (decision.action.kind) {
    case "update":
      return decision.action.profileId;
    case "review":
      return decision.action.candidateProfileId;
    case "create":
      return undefined;
  }
}

export class TranscriptPipelineService {
  constructor(
    private readonly store: PipelineStore,
    private readonly extractor: Extractor,
    private readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
  ) {}

  async submitTranscript(input: SubmitTranscriptInput): Promise<SubmitTranscriptResult> {
    const text = input.text;
    if (!text.trim()) {
      throw new BadRequestError("Transcript text is required");
    }

    const hash = contentHash(text);
    const existing = await this.store.findTranscriptByHash(hash);
    if (existing?.status === "success") {
      console.info("[jvmatch][pipeline] duplicate transcript skipped", { transcriptId: existing.id });
      return this.duplicateSummary(existing);
    }

    let transcript: Transcript;
    try {
      transcript = await this.store.createTranscript({
        text,
        eventName: clean(input.eventName),
        eventDate: clean(input.eventDate),
        contentHash: hash,
        transcriptType: detectTranscriptType(text),
        autoApplyThreshold: input.autoApplyThreshold,
        autoCreate: input.autoCreate
      });
    } catch (error) {
      return this.fail(undefined, error);
    }

    console.info("[jvmatch][pipeline] transcript accepted", {
      transcriptId: transcript.id,
      transcriptType: transcript.transcriptType,
      chars: text.length
    });

    let run: ExtractionRun;
    try {
      run = await this.createOrchestrator().run(transcript);
    } catch (error) {
      return this.fail(transcript, error);
    }

    return this.applyRun(transcript, run, this.policyFor(input));
  }

  /** Re-extracts a transcript's failed chunks and applies whatever they yield. */
  async retryFailedChunks(transcriptId: string): Promise<TranscriptSummary> {
    const transcript = await this.store.getTranscript(transcriptId);
    if (!transcript) {
      throw new NotFoundError(`Transcript ${transcriptId} not found`);
    }

    const chunks = await this.store.listChunks(transcriptId);
    const run = await this.createOrchestrator().retryChunks(transcript, chunks);

    console.info("[jvmatch][pipeline] retried failed chunks", {
      transcriptId,
      retried: run.stats.chunksTotal,
      succeeded: run.stats.chunksSucceeded
    });

    return this.applyRun(transcript, run, this.policyFor(transcript), run.stats.chunksSucceeded > 0);
  }

  async resolveReview(id: string, action: ReviewResolution, resolvedBy: string): Promise<ReviewResolutionResult> {
    const entry = await this.store.getReviewEntry(id);
    if (!entry) {
      throw new NotFoundError(`Review entry ${id} not found`);
    }

    if (entry.status !== "pending") {
      throw new BadRequestError(`Review entry ${id} is already ${entry.status}`);
    }

    if (action === "merged" && !entry.candidateProfileId) {
      throw new BadRequestError("A merge needs a candidate profile");
    }

    // The entry is closed before any profile write, so a resolution is applied at most once.
    let closed: ReviewQueueEntry;
    try {
      closed = await this.store.updateReviewEntry(id, { status: action, resolvedBy, resolvedAt: nowIso() });
    } catch (error) {
      await this.logError({
        errorType: "store_write",
        message: `Review status update failed: ${errorMessage(error)}`,
        details: { reviewId: id, action },
        transcriptId: entry.transcriptId,
        profileId: entry.candidateProfileId
      });
      throw error;
    }

    if (action === "rejected") {
      return { entry: closed };
    }

    let profile: Profile;
    try {
      profile = entry.candidateProfileId
        ? await this.applyToProfile(entry.candidateProfileId, entry.extractedData)
        : await this.createFromSpeaker(entry.extractedData);
    } catch (error) {
      await this.reopenReview(entry);
      await this.logError({
        errorType: "review_resolution",
        message: `Could not ${action === "merged" ? "merge" : "apply"} review entry: ${errorMessage(error)}`,
        details: { reviewId: id, action },
        transcriptId: entry.transcriptId,
        profileId: entry.candidateProfileId
      });
      throw error;
    }

    if (entry.transcriptId) {
      await this.linkSpeaker(entry.transcriptId, entry.extractedName, profile.id);
    }

    return { entry: closed, profile };
  }

  async getProfileSignals(profileId: string): Promise<ProfileSignals> {
    await this.requireProfile(profileId);

    const [signals, connectionOpportunities] = await Promise.all([
      this.store.listSignalsForProfile(profileId),
      this.store.listConnectionSignalsTargeting(profileId)
    ]);

    return { signals, connectionOpportunities };
  }

  async findProfilesWithNeed(keyword: string): Promise<ConversationSignal[]> {
    const term = keyword.trim();
    if (!term) {
      throw new BadRequestError("A keyword is required");
    }

    return this.store.findNeedSignals(term);
  }

  /** Topics both profiles spoke about in the same conversation, and whether they ever shared one. */
  async getSharedTopics(profileId: string, otherProfileId: string): Promise<SharedTopics> {
    await Promise.all([this.requireProfile(profileId), this.requireProfile(otherProfileId)]);

    const [mine, theirs] = await Promise.all([
      this.store.listConversationSpeakersForProfile(profileId),
      this.store.listConversationSpeakersForProfile(otherProfileId)
    ]);
    if (mine.length === 0 || theirs.length === 0) {
      return { topics: [], sameConversation: false };
    }

    const theirIds = new Set(theirs.map((speaker) => speaker.id));
    const topics = await this.store.listTopicsMentionedBy(mine.map((speaker) => speaker.id));
    const shared = topics
      .filter((topic) => topic.mentionedBy.some((id) => theirIds.has(id)))
      .map((topic) => topic.name);

    const myTranscripts = new Set(mine.map((speaker) => speaker.transcriptId));

    return {
      topics: [...new Set(shared)],
      sameConversation: theirs.some((speaker) => myTranscripts.has(speaker.transcriptId))
    };
  }

  async listPendingReviews(): Promise<ReviewQueueEntry[]> {
    return this.store.listPendingReviews();
  }

  async listUnresolvedErrors(): Promise<ProcessingError[]> {
    return this.store.listUnresolvedErrors();
  }

  async resolveError(id: string, resolvedBy: string, notes?: string): Promise<ProcessingError> {
    return this.store.updateProcessingError(id, {
      status: "resolved",
      resolvedBy,
      resolvedAt: nowIso(),
      resolutionNotes: clean(notes)
    });
  }

  async getTranscriptDetails(id: string): Promise<TranscriptDetails> {
    const transcript = await this.store.getTranscript(id);
    if (!transcript) {
      throw new NotFoundError(`Transcript ${id} not found`);
    }

    return { transcript, chunks: await this.store.listChunks(id) };
  }

  async listTranscripts(): Promise<Transcript[]> {
    return this.store.listTranscripts();
  }

  async listProfiles(query: ProfileListQuery = {}): Promise<{ profiles: Profile[]; count: number }> {
    return this.store.listProfiles(query);
  }

  async getProfileHistory(profileId: string): Promise<ProfileFieldHistory[]> {
    await this.requireProfile(profileId);
    return this.store.listFieldHistory(profileId);
  }

  private async requireProfile(profileId: string): Promise<Profile> {
    const profile = await this.store.getProfile(profileId);
    if (!profile) {
      throw new NotFoundError(`Profile ${profileId} not found`);
    }

    return profile;
  }

  private createOrchestrator(): ExtractionOrchestrator {
    return new ExtractionOrchestrator(this.store, this.extractor, this.config);
  }

  private policyFor(input: Pick<SubmitTranscriptInput, "autoApplyThreshold" | "autoCreate">): PolicyOptions {
    return {
      autoApplyThreshold: input.autoApplyThreshold ?? this.config.autoUpdateThreshold,
      autoCreate: input.autoCreate ?? this.config.autoCreate
    };
  }

  private async applyRun(
    transcript: Transcript,
    run: ExtractionRun,
    policy: PolicyOptions,
    markSuccess = true
  ): Promise<TranscriptSummary> {
    const speakers = dedupeSpeakers(run.speakers, this.config.duplicateThreshold);
    const topics = dedupeTopics(run.topics, this.config.topicDuplicateThreshold);
    const signals = dedupeSignals(run.signals);
    const connections = dedupeConnections(run.connections);

    const resolver = new IdentityResolver(this.store, {
      autoUpdateThreshold: policy.autoApplyThreshold,
      identityThreshold: this.config.identityThreshold,
      profileScanLimit: this.config.profileScanLimit
    });

    // Sequential: a profile created for one speaker must be visible when the next is resolved.
    const outcomes: SpeakerOutcome[] = [];
    for (const speaker of speakers) {
      outcomes.push(await this.applySpeaker(transcript, speaker, resolver, policy));
    }

    const conversationRecorded = await this.recordConversation(transcript, speakers, outcomes, topics, [
      ...signals,
      ...connections.map(connectionSignal)
    ]);

    if (markSuccess) {
      try {
        await this.store.updateTranscript(transcript.id, {
          status: "success",
          profilesExtracted: transcript.profilesExtracted + speakers.length
        });
      } catch (error) {
        await this.logError({
          errorType: "store_write",
          message: `Transcript status update failed: ${errorMessage(error)}`,
          transcriptId: transcript.id
        });
      }
    }

    const summary: TranscriptSummary = {
      ok: true,
      transcriptId: transcript.id,
      transcriptType: transcript.transcriptType,
      duplicate: false,
      profilesFound: speakers.length,
      profilesUpdated: outcomes.filter((outcome) => outcome.action === "updated").length,
      profilesCreated: outcomes.filter((outcome) => outcome.action === "created").length,
      reviewEntriesCreated: outcomes.filter((outcome) => outcome.action === "queued_for_review").length,
      storeFailures: outcomes.filter((outcome) => outcome.action === "store_failed").length,
      conversationRecorded,
      chunksTotal: run.stats.chunksTotal,
      chunksSucceeded: run.stats.chunksSucceeded,
      chunksFailed: run.stats.chunksFailed,
      speakers,
      topics,
      signals,
      connections,
      outcomes
    };

    console.info("[jvmatch][pipeline] transcript processed", {
      transcriptId: transcript.id,
      profilesFound: summary.profilesFound,
      updated: summary.profilesUpdated,
      created: summary.profilesCreated,
      queued: summary.reviewEntriesCreated,
      storeFailures: summary.storeFailures
    });

    return summary;
  }

  private async applySpeaker(
    transcript: Transcript,
    speaker: ExtractedSpeaker,
    resolver: IdentityResolver,
    policy: PolicyOptions
  ): Promise<SpeakerOutcome> {
    let decision: IdentityDecision;
    try {
      decision = await resolver.resolve(speaker);
    } catch (error) {
      const message = `Profile lookup failed for ${speaker.name}: ${errorMessage(error)}`;
      const logged = await this.logError({
        errorType: "profile_match",
        message,
        details: { speakerName: speaker.name },
        transcriptId: transcript.id
      });
      return { name: speaker.name, action: "store_failed", errorId: logged?.id, message };
    }

    const outcome = decideAction(decision, policy);
    const candidateProfileId = reviewCandidate(decision);

    try {
      if (outcome === "apply_update" && decision.action.kind === "update") {
        const profile = await this.applyToProfile(decision.action.profileId, speaker);
        return { name: speaker.name, action: "updated", profileId: profile.id, confidence: decision.confidence };
      }

      if (outcome === "create_profile") {
        const profile = await this.createFromSpeaker(speaker);
        return { name: speaker.name, action: "created", profileId: profile.id, confidence: decision.confidence };
      }

      const entry = await this.store.createReviewEntry({
        extractedName: speaker.name,
        extractedData: speaker,
        candidateProfileId,
        confidence: decision.confidence,
        matchDetails: { ...decision.matchDetails, reason: decision.matchDetails.reason ?? decision.message },
        sourceTranscript: transcript.text.slice(0, REVIEW_EXCERPT_CHARS),
        transcriptId: transcript.id
      });
      return {
        name: speaker.name,
        action: "queued_for_review",
        reviewId: entry.id,
        candidateProfileId,
        confidence: decision.confidence
      };
    } catch (error) {
      const message = `Could not store outcome for ${speaker.name}: ${errorMessage(error)}`;
      console.error("[jvmatch][pipeline] speaker write failed", {
        transcriptId: transcript.id,
        speaker: speaker.name,
        outcome,
        error: errorMessage(error)
      });
      const logged = await this.logError({
        errorType: "store_write",
        message,
        details: { speakerName: speaker.name, outcome },
        transcriptId: transcript.id,
        profileId: candidateProfileId
      });
      return { name: speaker.name, action: "store_failed", errorId: logged?.id, message };
    }
  }

  /** Stores who spoke, what they talked about and what they asked for, keyed to the resolved profiles. */
  private async recordConversation(
    transcript: Transcript,
    speakers: ExtractedSpeaker[],
    outcomes: SpeakerOutcome[],
    topics: ExtractedTopic[],
    signals: ExtractedSignal[]
  ): Promise<boolean> {
    if (speakers.length === 0 && topics.length === 0 && signals.length === 0) {
      return true;
    }

    try {
      const rows = await this.store.createConversationSpeakers(
        transcript.id,
        speakers.map((speaker, index) => ({
          speakerName: speaker.name,
          profileId: outcomeProfileId(outcomes[index]),
          matchConfidence: outcomeConfidence(outcomes[index]),
          speakerText: clean(speaker.speakerText)
        }))
      );
      const speakerFor = (name: string | undefined): ConversationSpeaker | undefined => {
        if (!name) {
          return undefined;
        }

        const normalized = normalizeName(name);
        return (
          rows.find((row) => normalizeName(row.speakerName) === normalized) ??
          rows.find((row) => nameSimilarity(row.speakerName, name) >= this.config.duplicateThreshold)
        );
      };

      await this.store.createConversationTopics(
        transcript.id,
        topics.map((topic) => ({
          name: topic.name,
          category: topic.category,
          relevanceScore: topic.relevanceScore,
          mentionedBy: [
            ...new Set(
              topic.mentionedBy.flatMap((name) => {
                const row = speakerFor(name);
                return row ? [row.id] : [];
              })
            )
          ]
        }))
      );

      await this.store.createConversationSignals(
        transcript.id,
        dedupeSignals(signals).map((signal) => {
          const speaker = speakerFor(signal.speakerName);
          const target = speakerFor(signal.targetSpeaker);
          return {
            speakerId: speaker?.id,
            profileId: speaker?.profileId,
            signalType: signal.signalType,
            text: signal.text,
            targetSpeakerId: target?.id,
            targetProfileId: target?.profileId,
            confidence: signal.confidence
          };
        })
      );

      return true;
    } catch (error) {
      console.error("[jvmatch][pipeline] conversation write failed", {
        transcriptId: transcript.id,
        error: errorMessage(error)
      });
      await this.logError({
        errorType: "store_write",
        message: `Conversation data write failed: ${errorMessage(error)}`,
        details: { speakers: speakers.length, topics: topics.length, signals: signals.length },
        transcriptId: transcript.id
      });
      return false;
    }
  }

  private async linkSpeaker(transcriptId: string, speakerName: string, profileId: string): Promise<void> {
    try {
      await this.store.linkConversationSpeaker(transcriptId, speakerName, profileId);
    } catch (error) {
      await this.logError({
        errorType: "store_write",
        message: `Could not link conversation speaker ${speakerName}: ${errorMessage(error)}`,
        transcriptId,
        profileId
      });
    }
  }

  private async reopenReview(entry: ReviewQueueEntry): Promise<void> {
    try {
      await this.store.updateReviewEntry(entry.id, { status: "pending", resolvedBy: undefined, resolvedAt: undefined });
    } catch (error) {
      await this.logError({
        errorType: "store_write",
        message: `Could not reopen review entry: ${errorMessage(error)}`,
        details: { reviewId: entry.id },
        transcriptId: entry.transcriptId,
        profileId: entry.candidateProfileId
      });
    }
  }

  private async applyToProfile(profileId: string, speaker: ExtractedSpeaker): Promise<Profile> {
    const profile = await this.store.getProfile(profileId);
    if (!profile) {
      throw new NotFoundError(`Profile ${profileId} not found`);
    }

    const patch = profilePatchFromSpeaker(profile, speaker);
    const updated = Object.keys(patch).length > 0 ? await this.store.updateProfile(profileId, patch) : profile;
    await this.recordHistory(updated.id, speaker);
    return updated;
  }

  private async createFromSpeaker(speaker: ExtractedSpeaker): Promise<Profile> {
    const profile = await this.store.createProfile(profileInputFromSpeaker(speaker));
    await this.recordHistory(profile.id, speaker);
    return profile;
  }

  private async recordHistory(profileId: string, speaker: ExtractedSpeaker): Promise<void> {
    const entries = historyFromSpeaker(profileId, speaker);
    if (entries.length === 0) {
      return;
    }

    // The profile write already happened; a missing history row does not undo it.
    try {
      await this.store.recordFieldHistory(entries);
    } catch (error) {
      await this.logError({
        errorType: "store_write",
        message: `Field history write failed: ${errorMessage(error)}`,
        details: { fields: entries.map((entry) => entry.fieldName) },
        transcriptId: speaker.appearances[0]?.transcriptId,
        profileId
      });
    }
  }

  private async duplicateSummary(transcript: Transcript): Promise<TranscriptSummary> {
    const chunks = await this.store.listChunks(transcript.id);

    return {
      ok: true,
      transcriptId: transcript.id,
      transcriptType: transcript.transcriptType,
      duplicate: true,
      profilesFound: transcript.profilesExtracted,
      profilesUpdated: 0,
      profilesCreated: 0,
      reviewEntriesCreated: 0,
      storeFailures: 0,
      conversationRecorded: false,
      chunksTotal: chunks.length,
      chunksSucceeded: chunks.filter((chunk) => chunk.status === "success").length,
      chunksFailed: chunks.filter((chunk) => chunk.status === "failed").length,
      speakers: [],
      topics: [],
      signals: [],
      connections: [],
      outcomes: []
    };
  }

  private async fail(transcript: Transcript | undefined, error: unknown): Promise<TranscriptFailure> {
    const failure = error instanceof PipelineFailureError ? error : undefined;
    const message = errorMessage(error, "Transcript processing failed");

    console.error("[jvmatch][pipeline] transcript failed", { transcriptId: transcript?.id, error: message });

    if (transcript) {
      try {
        await this.store.updateTranscript(transcript.id, { status: "failed" });
      } catch (updateError) {
        console.error("[jvmatch][pipeline] could not mark transcript failed", {
          transcriptId: transcript.id,
          error: errorMessage(updateError)
        });
      }
    }

    await this.logError({
      errorType: "pipeline_failure",
      message,
      details: {
        chunksTotal: failure?.chunksTotal ?? 0,
        failures: failure?.failures ?? []
      },
      transcriptId: transcript?.id
    });

    return {
      ok: false,
      transcriptId: transcript?.id,
      error: message,
      chunksTotal: failure?.chunksTotal ?? 0,
      chunksFailed: failure?.failures.length ?? 0
    };
  }

  private async logError(input: LogProcessingErrorInput): Promise<ProcessingError | undefined> {
    try {
      return await this.store.logProcessingError(input);
    } catch (error) {
      console.error("[jvmatch][pipeline] could not record processing error", {
        ...input,
        logError: errorMessage(error)
      });
      return undefined;
    }
  }
}

declare global {
  var __jvmatchPipelineService__: TranscriptPipelineService | undefined;
}

export function getPipelineService(): TranscriptPipelineService {
  if (!globalThis.__jvmatchPipelineService__) {
    const config = loadPipelineConfig();
    globalThis.__jvmatchPipelineService__ = new TranscriptPipelineService(
      getStore(config),
      new ExtractionClient({
        apiKey: config.openaiApiKey,
        model: config.extractionModel,
        timeoutMs: config.extractionTimeoutMs
      }),
      config
    );
  }

  return globalThis.__jvmatchPipelineService__;
}
