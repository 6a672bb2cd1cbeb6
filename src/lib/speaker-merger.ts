import { nameSimilarity, normalizeName, sequenceRatio } from "@/lib/name-matcher";
import {
  type ConnectionSuggestion,
  type ExtractedSignal,
  type ExtractedSpeaker,
  type ExtractedTopic,
  SPEAKER_TEXT_FIELDS,
  type SpeakerAppearance
} from "@/lib/types";

export const SPEAKER_DUPLICATE_THRESHOLD = 0.85;
export const TOPIC_DUPLICATE_THRESHOLD = 0.9;

export function mergeText(existing: string | undefined, incoming: string | undefined): string | undefined {
  if (!incoming) {
    return existing;
  }

  if (!existing) {
    return incoming;
  }

  return existing.includes(incoming) ? existing : `${existing} ${incoming}`;
}

function appearanceKey(appearance: SpeakerAppearance): string {
  return [appearance.eventName, appearance.eventDate, appearance.transcriptId, appearance.chunkId]
    .map((part) => part ?? "")
    .join("\u0000");
}

function mergeAppearances(existing: SpeakerAppearance[], incoming: SpeakerAppearance[]): SpeakerAppearance[] {
  const seen = new Set(existing.map(appearanceKey));
  const merged = [...existing];

  for (const appearance of incoming) {
    const key = appearanceKey(appearance);
    if (!seen.has(key)) {
      seen.add(key);
      merged.push({ ...appearance });
    }
  }

  return merged;
}

/** Folds `incoming` into `target`. The target keeps its name and email. */
export function mergeSpeaker(target: ExtractedSpeaker, incoming: ExtractedSpeaker): ExtractedSpeaker {
  const merged: ExtractedSpeaker = {
    ...target,
    email: target.email ?? incoming.email,
    listSize: Math.max(target.listSize, incoming.listSize),
    socialReach: Math.max(target.socialReach, incoming.socialReach),
    confidence: Math.max(target.confidence, incoming.confidence),
    appearances: mergeAppearances(target.appearances, incoming.appearances)
  };

  for (const field of SPEAKER_TEXT_FIELDS) {
    merged[field] = mergeText(target[field], incoming[field]);
  }

  return merged;
}

/**
 * Collapses speakers that refer to the same person. Records are taken in arrival order and
 * each one joins the first existing group whose name scores at or above `threshold`; there is
 * no search for the best group, so a different arrival order can produce different groups.
 */
export function dedupeSpeakers(
  speakers: ExtractedSpeaker[],
  threshold = SPEAKER_DUPLICATE_THRESHOLD
): ExtractedSpeaker[] {
  const unique: ExtractedSpeaker[] = [];

  for (const speaker of speakers) {
    if (!normalizeName(speaker.name)) {
      continue;
    }

    const idx = unique.findIndex((existing) => nameSimilarity(existing.name, speaker.name) >= threshold);
    if (idx === -1) {
      unique.push({ ...speaker, appearances: mergeAppearances([], speaker.appearances) });
    } else {
      unique[idx] = mergeSpeaker(unique[idx], speaker);
    }
  }

  return unique;
}

function topicKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

function unionNames(existing: string[], incoming: string[]): string[] {
  const seen = new Set(existing.map(normalizeName));
  const merged = [...existing];

  for (const name of incoming) {
    const key = normalizeName(name);
    if (key && !seen.has(key)) {
      seen.add(key);
      merged.push(name);
    }
  }

  return merged;
}

export function dedupeTopics(topics: ExtractedTopic[], threshold = TOPIC_DUPLICATE_THRESHOLD): ExtractedTopic[] {
  const unique: ExtractedTopic[] = [];

  for (const topic of topics) {
    const key = topicKey(topic.name);
    if (!key) {
      continue;
    }

    const idx = unique.findIndex((existing) => {
      const existingKey = topicKey(existing.name);
      return existingKey === key || sequenceRatio(existingKey, key) >= threshold;
    });

    if (idx === -1) {
      unique.push({ ...topic, mentionedBy: unionNames([], topic.mentionedBy) });
      continue;
    }

    const existing = unique[idx];
    unique[idx] = {
      ...existing,
      category: existing.category ?? topic.category,
      relevanceScore: Math.max(existing.relevanceScore, topic.relevanceScore),
      mentionedBy: unionNames(existing.mentionedBy, topic.mentionedBy)
    };
  }

  return unique;
}

/** A→B and B→A are the same suggestion; the first one seen is kept as is. */
export function dedupeConnections(connections: ConnectionSuggestion[]): ConnectionSuggestion[] {
  const seen = new Set<string>();
  const unique: ConnectionSuggestion[] = [];

  for (const connection of connections) {
    const from = normalizeName(connection.fromSpeaker);
    const to = normalizeName(connection.toSpeaker);
    if (!from || !to || from === to) {
      continue;
    }

    const key = [from, to].sort().join("|");
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(connection);
    }
  }

  return unique;
}

export function dedupeSignals(signals: ExtractedSignal[]): ExtractedSignal[] {
  const byKey = new Map<string, ExtractedSignal>();

  for (const signal of signals) {
    const key = [normalizeName(signal.speakerName), signal.signalType, topicKey(signal.text)].join("|");
    const existing = byKey.get(key);

    if (!existing) {
      byKey.set(key, signal);
    } else if (signal.confidence > existing.confidence) {
      byKey.set(key, { ...existing, confidence: signal.confidence });
    }
  }

  return [...byKey.values()];
}
