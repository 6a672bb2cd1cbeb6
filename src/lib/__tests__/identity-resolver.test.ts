import { decideAction, IdentityResolver, type IdentityDecision } from "@/lib/identity-resolver";
import { InMemoryPipelineStore } from "@/lib/store-memory";
import type { Profile, ProfileInput } from "@/lib/types";

function profile(name: string, overrides: Partial<ProfileInput> = {}): ProfileInput {
  return { name, listSize: 0, socialReach: 0, ...overrides };
}

async function seededStore(...inputs: ProfileInput[]) {
  const store = new InMemoryPipelineStore();
  const profiles: Profile[] = [];
  for (const input of inputs) {
    profiles.push(await store.createProfile(input));
  }

  return { store, profiles };
}

describe("IdentityResolver", () => {
  it("prefers an email match over everything else", async () => {
    const { store, profiles } = await seededStore(
      profile("Dana Reyes", { company: "Reyes Media" }),
      profile("D. Reyes-Holt", { email: "dana@example.com" })
    );
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "Dana Reyes", email: " DANA@example.com ", company: "Reyes Media" });

    expect(decision.action).toEqual({ kind: "update", profileId: profiles[1].id });
    expect(decision.confidence).toBe(100);
    expect(decision.strategy).toBe("email_match");
  });

  it("matches name plus company at 90", async () => {
    const { store, profiles } = await seededStore(profile("Dana Reyes", { company: "Reyes Media LLC" }));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "dana reyes (guest)", company: "reyes media" });

    expect(decision).toMatchObject({
      action: { kind: "update", profileId: profiles[0].id },
      confidence: 90,
      strategy: "name_company_match"
    });
  });

  it("sends a name-only match to review under the default threshold", async () => {
    const { store, profiles } = await seededStore(profile("Dana Reyes", { company: "Other Co" }));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "Dana Reyes", company: "Reyes Media" });

    expect(decision.action).toEqual({ kind: "review", candidateProfileId: profiles[0].id });
    expect(decision.confidence).toBe(70);
    expect(decision.strategy).toBe("exact_name_match");
  });

  it("updates on a name-only match when the threshold allows it", async () => {
    const { store, profiles } = await seededStore(profile("Dana Reyes"));
    const resolver = new IdentityResolver(store, { autoUpdateThreshold: 70 });

    const decision = await resolver.resolve({ name: "Dana Reyes" });

    expect(decision.action).toEqual({ kind: "update", profileId: profiles[0].id });
  });

  it("scales fuzzy similarity into the 50-70 band and asks for review", async () => {
    const { store, profiles } = await seededStore(profile("Ana Lima"), profile("Bob Johnson"));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "Bob Jonson" });

    expect(decision.action).toEqual({ kind: "review", candidateProfileId: profiles[1].id });
    expect(decision.confidence).toBe(65.24);
    expect(decision.strategy).toBe("fuzzy_name_match");
    expect(decision.matchDetails).toEqual({
      strategy: "fuzzy_name_match",
      profileName: "Bob Johnson",
      profileCompany: undefined,
      similarity: 95.24
    });
  });

  it("keeps the first profile when fuzzy scores tie", async () => {
    const { store, profiles } = await seededStore(profile("Bob Johnson"), profile("bob johnson (host)"));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "Bob Jonson" });

    expect(decision.action).toEqual({ kind: "review", candidateProfileId: profiles[0].id });
  });

  it("proposes a new profile when nothing is close", async () => {
    const { store } = await seededStore(profile("Ana Lima"));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "Grace Okafor" });

    expect(decision.action).toEqual({ kind: "create" });
    expect(decision.confidence).toBe(0);
  });

  it("sends a nameless speaker to review", async () => {
    const { store } = await seededStore(profile("Ana Lima"));
    const resolver = new IdentityResolver(store);

    const decision = await resolver.resolve({ name: "  " });

    expect(decision.action).toEqual({ kind: "review" });
    expect(decision.strategy).toBe("missing_name");
  });
});

describe("decideAction", () => {
  const base: Omit<IdentityDecision, "action" | "confidence"> = {
    strategy: "no_match",
    message: "",
    matchDetails: { strategy: "no_match" }
  };

  it("applies updates at or above the threshold", () => {
    const decision = { ...base, action: { kind: "update" as const, profileId: "prf_1" }, confidence: 90 };

    expect(decideAction(decision, { autoApplyThreshold: 90, autoCreate: false })).toBe("apply_update");
    expect(decideAction(decision, { autoApplyThreshold: 95, autoCreate: false })).toBe("queue_review");
  });

  it("creates only when auto-create is on", () => {
    const decision = { ...base, action: { kind: "create" as const }, confidence: 0 };

    expect(decideAction(decision, { autoApplyThreshold: 90, autoCreate: true })).toBe("create_profile");
    expect(decideAction(decision, { autoApplyThreshold: 90, autoCreate: false })).toBe("queue_review");
  });

  it("never applies a review decision", () => {
    const decision = { ...base, action: { kind: "review" as const }, confidence: 99 };

    expect(decideAction(decision, { autoApplyThreshold: 0, autoCreate: true })).toBe("queue_review");
  });
});
