import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";

import { jsonError } from "@/lib/http";
import { getPipelineService } from "@/lib/pipeline-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const needsSchema = z.object({
  keyword: z.string().trim().min(1)
});

export async function GET(request: NextRequest): Promise<NextResponse> {
  try {
    const { keyword } = needsSchema.parse({ keyword: request.nextUrl.searchParams.get("keyword") ?? undefined });

    const service = getPipelineService();
    const signals = await service.findProfilesWithNeed(keyword);

    return NextResponse.json({ signals });
  } catch (error) {
    return jsonError(error);
  }
}
