import {
  dedupeConnections,
  dedupeSignals,
  dedupeSpeakers,
  dedupeTopics,
  mergeText
} from "@/lib/speaker-merger";
import type { ExtractedSpeaker } from "@/lib/types";

function speaker(name: string, overrides: Partial<ExtractedSpeaker> = {}): ExtractedSpeaker {
  return {
    name,
    listSize: 0,
    socialReach: 0,
    confidence: 50,
    appearances: [{ transcriptId: "trn_1", chunkId: `chk_${name}` }],
    ...overrides
  };
}

describe("mergeText", () => {
  it("fills, keeps or appends", () => {
    expect(mergeText(undefined, "Coaching")).toBe("Coaching");
    expect(mergeText("Coaching", undefined)).toBe("Coaching");
    expect(mergeText("Executive coaching", "coaching")).toBe("Executive coaching");
    expect(mergeText("Coaching", "Workshops")).toBe("Coaching Workshops");
  });
});

describe("dedupeSpeakers", () => {
  it("merges decorated variants of one name into the first record", () => {
    const merged = dedupeSpeakers([
      speaker("John Smith (Host)", { whatYouDo: "Runs retreats", listSize: 500, confidence: 40 }),
      speaker("john smith - Zoom", { email: "john@example.com", whatYouDo: "Hosts podcasts", listSize: 2000 })
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0]).toMatchObject({
      name: "John Smith (Host)",
      email: "john@example.com",
      whatYouDo: "Runs retreats Hosts podcasts",
      listSize: 2000,
      confidence: 50
    });
    expect(merged[0].appearances.map((appearance) => appearance.chunkId)).toEqual([
      "chk_John Smith (Host)",
      "chk_john smith - Zoom"
    ]);
  });

  it("keeps an initial-only name apart from the full name", () => {
    const merged = dedupeSpeakers([speaker("John Smith"), speaker("J. Smith")]);

    expect(merged.map((record) => record.name)).toEqual(["John Smith", "J. Smith"]);
  });

  it("drops records without a usable name", () => {
    expect(dedupeSpeakers([speaker("  "), speaker("Ana Lima")]).map((record) => record.name)).toEqual(["Ana Lima"]);
  });

  it("is idempotent", () => {
    const once = dedupeSpeakers([
      speaker("Ana Lima", { company: "Lima Co" }),
      speaker("Bob Johnson"),
      speaker("ana lima (guest)", { seeking: "Affiliates" }),
      speaker("Bob Jonson", { listSize: 300 })
    ]);

    expect(once.map((record) => record.name)).toEqual(["Ana Lima", "Bob Johnson"]);
    expect(dedupeSpeakers(once)).toEqual(once);
  });
});

describe("dedupeTopics", () => {
  it("merges case and spelling variants", () => {
    const topics = dedupeTopics([
      { name: "Email Marketing", relevanceScore: 40, mentionedBy: ["Ana Lima"] },
      { name: "email marketing", category: "marketing", relevanceScore: 70, mentionedBy: ["Bob Johnson"] },
      { name: "Email Marketng", relevanceScore: 10, mentionedBy: ["ana lima"] },
      { name: "Book Launches", relevanceScore: 55, mentionedBy: [] }
    ]);

    expect(topics).toEqual([
      { name: "Email Marketing", category: "marketing", relevanceScore: 70, mentionedBy: ["Ana Lima", "Bob Johnson"] },
      { name: "Book Launches", relevanceScore: 55, mentionedBy: [] }
    ]);
  });
});

describe("dedupeConnections", () => {
  it("treats both directions as one pair and skips self pairs", () => {
    const connections = dedupeConnections([
      { fromSpeaker: "Ana Lima", toSpeaker: "Bob Johnson", strength: 80 },
      { fromSpeaker: "bob johnson", toSpeaker: "Ana Lima", strength: 95 },
      { fromSpeaker: "Ana Lima", toSpeaker: "ana lima (guest)", strength: 60 }
    ]);

    expect(connections).toEqual([{ fromSpeaker: "Ana Lima", toSpeaker: "Bob Johnson", strength: 80 }]);
  });
});

describe("dedupeSignals", () => {
  it("keeps the highest confidence per speaker, type and text", () => {
    const signals = dedupeSignals([
      { speakerName: "Ana Lima", signalType: "need", text: "A video editor", confidence: 40 },
      { speakerName: "ana lima", signalType: "need", text: "a video  editor", confidence: 85 },
      { speakerName: "Ana Lima", signalType: "offer", text: "A video editor", confidence: 20 }
    ]);

    expect(signals).toEqual([
      { speakerName: "Ana Lima", signalType: "need", text: "A video editor", confidence: 85 },
      { speakerName: "Ana Lima", signalType: "offer", text: "A video editor", confidence: 20 }
    ]);
  });
});
