import { z } from "zod";

import { BadRequestError, NotFoundError } from "@/lib/errors";
import { jsonError } from "@/lib/http";

describe("jsonError", () => {
  it("maps domain errors to HTTP statuses", async () => {
    const notFound = jsonError(new NotFoundError("Transcript trn_1 not found"));
    expect(notFound.status).toBe(404);
    expect(await notFound.json()).toEqual({ error: "Transcript trn_1 not found" });

    expect(jsonError(new BadRequestError("Transcript text is required")).status).toBe(400);
  });

  it("reports validation failures as bad requests", async () => {
    const parsed = z.object({ resolvedBy: z.string() }).safeParse({});
    if (parsed.success) {
      throw new Error("expected validation to fail");
    }

    const response = jsonError(parsed.error);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "resolvedBy: Required" });
  });

  it("falls back to 500", async () => {
    const response = jsonError("nope");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Unknown server error" });
  });
});
