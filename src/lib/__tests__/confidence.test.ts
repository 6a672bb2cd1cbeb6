import { clampScore, computeExtractionConfidence, roundScore } from "@/lib/confidence";

describe("computeExtractionConfidence", () => {
  it("gives full marks when every scored field is present", () => {
    expect(
      computeExtractionConfidence({
        name: "Alice",
        whatYouDo: "Coaching",
        whoYouServe: "Founders",
        email: "alice@example.com",
        company: "Acme",
        seeking: "Partners",
        offering: "Workshops",
        currentProjects: "A book",
        contact: "@alice",
        businessFocus: "Leadership"
      })
    ).toBe(100);
  });

  it("weights the core identity fields most", () => {
    expect(computeExtractionConfidence({ name: "Alice", whatYouDo: "Coaching", whoYouServe: "Founders" })).toBe(50);
    expect(computeExtractionConfidence({ name: "Alice" })).toBe(16.67);
    expect(computeExtractionConfidence({ name: "Alice", email: "alice@example.com" })).toBe(24.17);
  });

  it("ignores blank values", () => {
    expect(computeExtractionConfidence({ name: "Alice", company: "   " })).toBe(16.67);
  });
});

describe("score helpers", () => {
  it("clamps to 0-100 and maps NaN to 0", () => {
    expect(clampScore(140)).toBe(100);
    expect(clampScore(-3)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
  });

  it("rounds to two decimals", () => {
    expect(roundScore(65.23809)).toBe(65.24);
  });
});
