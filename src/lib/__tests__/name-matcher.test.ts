import { nameSimilarity, normalizeName, sequenceRatio } from "@/lib/name-matcher";

describe("normalizeName", () => {
  it("lowercases, drops parentheticals and collapses whitespace", () => {
    expect(normalizeName("  John  Smith (Host) ")).toBe("john smith");
  });

  it("strips a trailing meeting platform suffix", () => {
    expect(normalizeName("Jane Doe - Zoom")).toBe("jane doe");
    expect(normalizeName("Jane Doe - Google Meet")).toBe("jane doe");
  });

  it("keeps hyphenated names intact", () => {
    expect(normalizeName("Mary-Kate Olsen")).toBe("mary-kate olsen");
  });
});

describe("sequenceRatio", () => {
  it("returns 1 for two empty strings", () => {
    expect(sequenceRatio("", "")).toBe(1);
  });

  it("scores matched characters over combined length", () => {
    expect(sequenceRatio("abcd", "bcde")).toBe(0.75);
  });

  it("counts repeated characters in long strings", () => {
    expect(sequenceRatio("a".repeat(250), `${"a".repeat(250)}b`)).toBeCloseTo(500 / 501, 10);
  });

  it("is symmetric", () => {
    expect(sequenceRatio("bob jonson", "bob johnson")).toBe(sequenceRatio("bob johnson", "bob jonson"));
  });
});

describe("nameSimilarity", () => {
  it("treats decorated variants of the same name as identical", () => {
    expect(nameSimilarity("John Smith (Host)", "john smith - Zoom")).toBe(1);
  });

  it("returns 0 when either name is empty after normalization", () => {
    expect(nameSimilarity("", "Alice")).toBe(0);
    expect(nameSimilarity("(Guest)", "Alice")).toBe(0);
  });

  it("scores a one-letter spelling difference just under 1", () => {
    expect(nameSimilarity("Bob Jonson", "Bob Johnson")).toBeCloseTo(20 / 21, 10);
  });

  it("keeps an initial-only first name below the merge threshold", () => {
    expect(nameSimilarity("J. Smith", "John Smith")).toBeCloseTo(14 / 18, 10);
  });
});
