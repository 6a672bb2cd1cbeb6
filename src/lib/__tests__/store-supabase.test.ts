import { createClient } from "@supabase/supabase-js";

import { NotFoundError, StoreError } from "@/lib/errors";
import { escapeLikePattern, SupabasePipelineStore } from "@/lib/store-supabase";

interface RecordedRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  body: unknown;
}

interface Reply {
  status: number;
  body?: unknown;
}

/** Answers PostgREST calls from a queue of canned replies and records what was asked. */
class FakePostgrest {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: Reply[] = [];

  reply(status: number, body?: unknown): this {
    this.replies.push({ status, body });
    return this;
  }

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const rawBody = typeof init?.body === "string" ? init.body : undefined;
    const parsedBody: unknown = rawBody ? JSON.parse(rawBody) : undefined;
    this.requests.push({ method: init?.method ?? "GET", path: url.pathname, params: url.searchParams, body: parsedBody });

    const next = this.replies.shift() ?? { status: 200, body: [] };
    if (next.body === undefined) {
      return new Response(null, { status: next.status });
    }

    return new Response(JSON.stringify(next.body), {
      status: next.status,
      headers: { "Content-Type": "application/json" }
    });
  };
}

function storeWith(postgrest: FakePostgrest): SupabasePipelineStore {
  const client = createClient("http://supabase.test", "test-service-key", {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    global: { fetch: postgrest.fetch }
  });
  return new SupabasePipelineStore(client);
}

const PROFILE_ROW = {
  id: "p-1",
  name: "Jo Doe",
  email: "j_doe@example.com",
  email_normalized: "j_doe@example.com",
  company: null,
  business_focus: "Coaching",
  status: null,
  service_provided: null,
  what_you_do: "Launch strategy",
  who_you_serve: null,
  seeking: null,
  offering: null,
  current_projects: null,
  contact: null,
  list_size: 1200,
  social_reach: null,
  created_at: "2026-01-05T10:00:00.000Z",
  updated_at: null
};

describe("SupabasePipelineStore", () => {
  it("maps a profile row onto a profile", async () => {
    const postgrest = new FakePostgrest().reply(200, [PROFILE_ROW]);
    const store = storeWith(postgrest);

    const profile = await store.getProfile("p-1");

    expect(profile).toEqual({
      id: "p-1",
      name: "Jo Doe",
      email: "j_doe@example.com",
      businessFocus: "Coaching",
      whatYouDo: "Launch strategy",
      listSize: 1200,
      socialReach: 0,
      createdAt: "2026-01-05T10:00:00.000Z",
      updatedAt: "2026-01-05T10:00:00.000Z"
    });
    expect(postgrest.requests[0]).toMatchObject({ method: "GET", path: "/rest/v1/profiles" });
    expect(postgrest.requests[0].params.get("id")).toBe("eq.p-1");
  });

  it("returns undefined for a missing profile", async () => {
    const store = storeWith(new FakePostgrest().reply(200, []));

    expect(await store.getProfile("p-404")).toBeUndefined();
  });

  it("matches emails exactly, so LIKE wildcards in an address match only themselves", async () => {
    const postgrest = new FakePostgrest().reply(200, []).reply(200, [PROFILE_ROW]);
    const store = storeWith(postgrest);

    expect(await store.findProfileByEmail("  J_Doe@Example.com ")).toBeUndefined();
    expect((await store.findProfileByEmail("j_doe@example.com"))?.id).toBe("p-1");

    const [first] = postgrest.requests;
    expect(first.params.get("email_normalized")).toBe("eq.j_doe@example.com");
    expect(first.params.has("email")).toBe(false);
    expect(first.params.get("limit")).toBe("1");
  });

  it("writes only the profile columns that were given", async () => {
    const postgrest = new FakePostgrest().reply(201, { ...PROFILE_ROW, email: null, email_normalized: null });
    const store = storeWith(postgrest);

    await store.createProfile({ name: "Jo Doe", listSize: 0, socialReach: 0 });

    expect(postgrest.requests[0]).toMatchObject({ method: "POST", path: "/rest/v1/profiles" });
    expect(postgrest.requests[0].body).toEqual({ name: "Jo Doe", list_size: 0, social_reach: 0 });
  });

  it("turns a zero-row single update into NotFoundError", async () => {
    const postgrest = new FakePostgrest().reply(406, {
      code: "PGRST116",
      message: "JSON object requested, multiple (or no) rows returned",
      details: "The result contains 0 rows",
      hint: null
    });
    const store = storeWith(postgrest);

    await expect(store.updateProfile("p-404", { whatYouDo: "Coaching" })).rejects.toBeInstanceOf(NotFoundError);
    expect(postgrest.requests[0].method).toBe("PATCH");
    expect(postgrest.requests[0].body).toMatchObject({ what_you_do: "Coaching" });
  });

  it("wraps other request failures in StoreError", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = storeWith(
      new FakePostgrest().reply(409, {
        code: "23505",
        message: "duplicate key value violates unique constraint",
        details: null,
        hint: null
      })
    );

    const error = await store.createProfile({ name: "Jo Doe", listSize: 0, socialReach: 0 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      message: "profiles insert failed: duplicate key value violates unique constraint",
      table: "profiles",
      operation: "insert",
      code: "23505"
    });
    consoleError.mockRestore();
  });

  it("reads review entries with their JSON payloads", async () => {
    const postgrest = new FakePostgrest().reply(201, {
      id: "r-1",
      extracted_name: "Bob Jonson",
      extracted_data: { name: "Bob Jonson", whatYouDo: "Paid ads", listSize: 300 },
      matched_profile_id: "p-1",
      match_confidence: 65.24,
      match_details: { strategy: "fuzzy_name_match", profileName: "Bob Johnson", similarity: 95.24 },
      source_transcript: "Bob Jonson: hi",
      transcript_id: "t-1",
      status: "pending",
      resolved_by: null,
      resolved_at: null,
      created_at: "2026-01-05T10:00:00.000Z"
    });
    const store = storeWith(postgrest);

    const entry = await store.createReviewEntry({
      extractedName: "Bob Jonson",
      extractedData: { name: "Bob Jonson", whatYouDo: "Paid ads", listSize: 300, socialReach: 0, confidence: 0, appearances: [] },
      candidateProfileId: "p-1",
      confidence: 65.24,
      matchDetails: { strategy: "fuzzy_name_match", profileName: "Bob Johnson", similarity: 95.24 },
      sourceTranscript: "Bob Jonson: hi",
      transcriptId: "t-1"
    });

    expect(entry).toMatchObject({
      id: "r-1",
      candidateProfileId: "p-1",
      confidence: 65.24,
      status: "pending",
      extractedData: { name: "Bob Jonson", whatYouDo: "Paid ads", listSize: 300, socialReach: 0, confidence: 0, appearances: [] },
      matchDetails: { strategy: "fuzzy_name_match", similarity: 95.24 }
    });
    expect(postgrest.requests[0].body).toMatchObject({ matched_profile_id: "p-1", match_confidence: 65.24, status: "pending" });
  });

  it("links a conversation speaker and the signals it sent or received", async () => {
    const postgrest = new FakePostgrest().reply(200, [{ id: "s-1" }]).reply(204).reply(204);
    const store = storeWith(postgrest);

    await store.linkConversationSpeaker("t-1", "Bob Jonson", "p-1");

    const [speakers, sent, received] = postgrest.requests;
    expect(speakers).toMatchObject({ method: "PATCH", path: "/rest/v1/conversation_speakers", body: { matched_profile_id: "p-1" } });
    expect(speakers.params.get("transcript_id")).toBe("eq.t-1");
    expect(speakers.params.get("speaker_name")).toBe("eq.Bob Jonson");
    expect(sent).toMatchObject({ path: "/rest/v1/conversation_signals", body: { profile_id: "p-1" } });
    expect(sent.params.get("speaker_id")).toBe("in.(s-1)");
    expect(received).toMatchObject({ path: "/rest/v1/conversation_signals", body: { target_profile_id: "p-1" } });
    expect(received.params.get("target_speaker_id")).toBe("in.(s-1)");
  });

  it("skips signal updates when no speaker row matched", async () => {
    const postgrest = new FakePostgrest().reply(200, []);
    const store = storeWith(postgrest);

    await store.linkConversationSpeaker("t-1", "Nobody", "p-1");

    expect(postgrest.requests).toHaveLength(1);
  });

  it("searches need signals with the keyword escaped", async () => {
    const postgrest = new FakePostgrest().reply(200, [
      {
        id: "g-1",
        transcript_id: "t-1",
        speaker_id: "s-1",
        profile_id: null,
        signal_type: "need",
        signal_text: "Need a 50%_off code",
        target_speaker_id: null,
        target_profile_id: null,
        confidence: 75,
        created_at: "2026-01-05T10:00:00.000Z"
      }
    ]);
    const store = storeWith(postgrest);

    const signals = await store.findNeedSignals("50%_off");

    expect(signals).toEqual([
      {
        id: "g-1",
        transcriptId: "t-1",
        speakerId: "s-1",
        signalType: "need",
        text: "Need a 50%_off code",
        confidence: 75,
        createdAt: "2026-01-05T10:00:00.000Z"
      }
    ]);
    expect(postgrest.requests[0].params.get("signal_type")).toBe("eq.need");
    expect(postgrest.requests[0].params.get("signal_text")).toBe("ilike.%50\\%\\_off%");
  });
});

describe("escapeLikePattern", () => {
  it("escapes LIKE wildcards and the escape character", () => {
    expect(escapeLikePattern("a_b%c\\d")).toBe("a\\_b\\%c\\\\d");
  });
});
