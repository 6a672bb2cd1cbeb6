import { NextResponse } from "next/server";

import { jsonError } from "@/lib/http";
import { getPipelineService } from "@/lib/pipeline-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(): Promise<NextResponse> {
  try {
    const service = getPipelineService();
    const errors = await service.listUnresolvedErrors();

    return NextResponse.json({ errors });
  } catch (error) {
    return jsonError(error);
  }
}
