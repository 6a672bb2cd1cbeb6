import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";

import { jsonError } from "@/lib/http";
import { getPipelineService } from "@/lib/pipeline-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const submitTranscriptSchema = z.object({
  text: z.string().min(1),
  eventName: z.string().max(200).optional(),
  eventDate: z.string().max(40).optional(),
  autoApplyThreshold: z.number().min(0).max(100).optional(),
  autoCreate: z.boolean().optional()
});

export async function GET(): Promise<NextResponse> {
  try {
    const service = getPipelineService();
    const transcripts = await service.listTranscripts();

    return NextResponse.json({
      transcripts: transcripts.map(({ text, ...transcript }) => ({ ...transcript, chars: text.length }))
    });
  } catch (error) {
    return jsonError(error);
  }
}

export async function POST(request: NextRequest): Promise<NextResponse> {
  try {
    const body = await request.json();
    const parsed = submitTranscriptSchema.parse(body);

    const service = getPipelineService();
    const result = await service.submitTranscript(parsed);

    if (!result.ok) {
      return NextResponse.json(result, { status: 422 });
    }

    return NextResponse.json(result, { status: result.duplicate ? 200 : 201 });
  } catch (error) {
    return jsonError(error);
  }
}
