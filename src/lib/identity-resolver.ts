import { clampScore, roundScore } from "@/lib/confidence";
import { nameSimilarity, normalizeName } from "@/lib/name-matcher";
import type { ProfileStore } from "@/lib/store";
import type { ExtractedSpeaker, MatchDetails, MatchStrategy, Profile } from "@/lib/types";

export const IDENTITY_MATCH_THRESHOLD = 0.8;
export const DEFAULT_AUTO_APPLY_THRESHOLD = 90;
export const DEFAULT_PROFILE_SCAN_LIMIT = 1000;

export type IdentityAction =
  | { kind: "update"; profileId: string }
  | { kind: "create" }
  | { kind: "review"; candidateProfileId?: string };

export interface IdentityDecision {
  action: IdentityAction;
  confidence: number;
  strategy: MatchStrategy;
  message: string;
  matchDetails: MatchDetails;
}

export interface IdentityResolverOptions {
  /** Lowest identity confidence at which a name-only match is still treated as an update. */
  autoUpdateThreshold?: number;
  identityThreshold?: number;
  profileScanLimit?: number;
}

export type PolicyOutcome = "apply_update" | "create_profile" | "queue_review";

export interface PolicyOptions {
  autoApplyThreshold: number;
  autoCreate: boolean;
}

/** Whether a resolver decision can be applied without a human looking at it. */
export function decideAction(decision: IdentityDecision, options: PolicyOptions): PolicyOutcome {
  if (decision.action.kind === "update" && decision.confidence >= options.autoApplyThreshold) {
    return "apply_update";
  }

  if (decision.action.kind === "create" && options.autoCreate) {
    return "create_profile";
  }

  return "queue_review";
}

function fuzzyConfidence(similarity: number, threshold: number): number {
  // Similarity in [threshold, 1] maps linearly onto confidence in [50, 70].
  const span = 1 - threshold;
  const scaled = span > 0 ? 50 + ((similarity - threshold) / span) * 20 : 70;
  return clampScore(roundScore(scaled));
}

function companyMatches(extracted: string | undefined, profile: Profile): boolean {
  const company = extracted?.trim().toLowerCase();
  const profileCompany = profile.company?.trim().toLowerCase();
  return Boolean(company && profileCompany && profileCompany.includes(company));
}

/**
 * Maps an extracted speaker onto at most one directory profile. Strategies run in a fixed
 * order and the first one that matches decides, even if a later one would score higher.
 */
export class IdentityResolver {
  private readonly autoUpdateThreshold: number;
  private readonly identityThreshold: number;
  private readonly profileScanLimit: number;

  constructor(
    private readonly profiles: Pick<ProfileStore, "findProfileByEmail" | "listProfilesForMatching">,
    options: IdentityResolverOptions = {}
  ) {
    this.autoUpdateThreshold = options.autoUpdateThreshold ?? DEFAULT_AUTO_APPLY_THRESHOLD;
    this.identityThreshold = options.identityThreshold ?? IDENTITY_MATCH_THRESHOLD;
    this.profileScanLimit = options.profileScanLimit ?? DEFAULT_PROFILE_SCAN_LIMIT;
  }

  async resolve(speaker: Pick<ExtractedSpeaker, "name" | "email" | "company">): Promise<IdentityDecision> {
    const name = normalizeName(speaker.name);
    if (!name) {
      return {
        action: { kind: "review" },
        confidence: 0,
        strategy: "missing_name",
        message: "Cannot match a profile without a name",
        matchDetails: { strategy: "missing_name", reason: "Missing name" }
      };
    }

    const email = speaker.email?.trim();
    if (email) {
      const byEmail = await this.profiles.findProfileByEmail(email);
      if (byEmail) {
        return this.decision({ kind: "update", profileId: byEmail.id }, 100, "email_match", byEmail, {
          message: `Exact email match: ${byEmail.name}`
        });
      }
    }

    const candidates = await this.profiles.listProfilesForMatching(this.profileScanLimit);
    const sameName = candidates.filter((profile) => normalizeName(profile.name) === name);

    const withCompany = sameName.find((profile) => companyMatches(speaker.company, profile));
    if (withCompany) {
      return this.decision({ kind: "update", profileId: withCompany.id }, 90, "name_company_match", withCompany, {
        message: `Name and company match: ${withCompany.name} at ${withCompany.company ?? ""}`
      });
    }

    if (sameName.length > 0) {
      const profile = sameName[0];
      const action: IdentityAction =
        this.autoUpdateThreshold <= 70 ? { kind: "update", profileId: profile.id } : { kind: "review", candidateProfileId: profile.id };
      return this.decision(action, 70, "exact_name_match", profile, {
        message: `Name match without corroborating email or company: ${profile.name}`
      });
    }

    let best: Profile | undefined;
    let bestSimilarity = 0;
    for (const profile of candidates) {
      const similarity = nameSimilarity(speaker.name, profile.name);
      if (similarity >= this.identityThreshold && similarity > bestSimilarity) {
        best = profile;
        bestSimilarity = similarity;
      }
    }

    if (best) {
      const similarityPct = roundScore(bestSimilarity * 100);
      return this.decision(
        { kind: "review", candidateProfileId: best.id },
        fuzzyConfidence(bestSimilarity, this.identityThreshold),
        "fuzzy_name_match",
        best,
        { message: `Possible match: ${best.name} (${similarityPct}% similar)`, similarity: similarityPct }
      );
    }

    return {
      action: { kind: "create" },
      confidence: 0,
      strategy: "no_match",
      message: `No existing profile found for ${speaker.name}`,
      matchDetails: { strategy: "no_match", reason: "No profile cleared the similarity threshold" }
    };
  }

  private decision(
    action: IdentityAction,
    confidence: number,
    strategy: MatchStrategy,
    profile: Profile,
    extra: { message: string; similarity?: number }
  ): IdentityDecision {
    return {
      action,
      confidence,
      strategy,
      message: extra.message,
      matchDetails: {
        strategy,
        profileName: profile.name,
        profileCompany: profile.company,
        similarity: extra.similarity
      }
    };
  }
}
