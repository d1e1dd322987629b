import { NextResponse } from "next/server";
import { z } from "zod";
import { submitJob } from "../../../src/application/jobService";
import { getDependencies } from "../../../src/infrastructure/container";
import { InsufficientCreditsError, InvalidSourceError } from "../../../src/domain/errors";

export const runtime = "nodejs";

const schema = z.object({
  url: z.string().trim().min(1).max(2000)
});

export async function POST(request: Request) {
  const userId = request.headers.get("x-user-id")?.trim();
  if (!userId) {
    return NextResponse.json({ error: "Authentication required" }, { status: 401 });
  }

  const payload: unknown = await request.json().catch(() => null);
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    return NextResponse.json({ error: "Please provide a YouTube URL." }, { status: 400 });
  }

  try {
    const job = await submitJob({ userId, sourceUrl: parsed.data.url }, getDependencies());
    return NextResponse.json({ jobId: job.id, status: job.status }, { status: 202 });
  } catch (error) {
    if (error instanceof InvalidSourceError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    if (error instanceof InsufficientCreditsError) {
      return NextResponse.json({ error: error.message }, { status: 402 });
    }
    console.error("Failed to submit job", error);
    return NextResponse.json({ error: "Failed to start video processing." }, { status: 500 });
  }
}
