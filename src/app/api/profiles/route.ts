import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";

import { jsonError } from "@/lib/http";
import { getPipelineService } from "@/lib/pipeline-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const listProfilesSchema = z.object({
  search: z.string().optional(),
  status: z.string().optional(),
  businessFocus: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

export async function GET(request: NextRequest): Promise<NextResponse> {
  try {
    const params = request.nextUrl.searchParams;
    const query = listProfilesSchema.parse({
      search: params.get("search") ?? undefined,
      status: params.get("status") ?? undefined,
      businessFocus: params.get("businessFocus") ?? undefined,
      limit: params.get("limit") ?? undefined,
      offset: params.get("offset") ?? undefined
    });

    const service = getPipelineService();
    const result = await service.listProfiles(query);

    return NextResponse.json(result);
  } catch (error) {
    return jsonError(error);
  }
}
