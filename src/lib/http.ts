import { NextResponse } from "next/server";
import { ZodError } from "zod";

import { BadRequestError, NotFoundError } from "@/lib/errors";

export function jsonError(error: unknown): NextResponse {
  if (error instanceof NotFoundError) {
    return NextResponse.json({ error: error.message }, { status: 404 });
  }

  if (error instanceof BadRequestError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    return NextResponse.json({ error: message }, { status: 400 });
  }

  const message = error instanceof Error ? error.message : "Unknown server error";
  console.error("[jvmatch][api] unhandled error", { error: message });
  return NextResponse.json({ error: message }, { status: 500 });
}
