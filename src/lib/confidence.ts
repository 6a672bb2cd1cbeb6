import type { ExtractedSpeaker } from "@/lib/types";

type ScoredField = keyof Pick<
  ExtractedSpeaker,
  "name" | "whatYouDo" | "whoYouServe" | "email" | "company" | "seeking" | "offering" | "currentProjects" | "contact" | "businessFocus"
>;

const FIELD_TIERS: { fields: ScoredField[]; points: number }[] = [
  { fields: ["name", "whatYouDo", "whoYouServe"], points: 50 },
  { fields: ["email", "company", "seeking", "offering"], points: 30 },
  { fields: ["currentProjects", "contact", "businessFocus"], points: 20 }
];

export function clampScore(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }

  return Math.max(0, Math.min(100, value));
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Completeness of an extraction, 0-100. Each present field earns its tier's share in full. */
export function computeExtractionConfidence(record: Partial<Record<ScoredField, string | undefined>>): number {
  let score = 0;

  for (const tier of FIELD_TIERS) {
    const share = tier.points / tier.fields.length;
    for (const field of tier.fields) {
      if (record[field]?.trim()) {
        score += share;
      }
    }
  }

  return clampScore(roundScore(score));
}
