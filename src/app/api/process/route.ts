import { NextRequest, NextResponse } from 'next/server';
import { config, errorResponse, jobRunner } from '@/lib/api';
import { parseProcessRequest } from '@/lib/requests';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'request body must be valid JSON' }, { status: 400 });
  }

  try {
    const { tracklist, options } = parseProcessRequest(body, config);

    // Processing continues in the background after the response is sent
    const job = jobRunner.start(tracklist, options);

    return NextResponse.json({ message: 'Processing started', jobId: job.id }, { status: 202 });
  } catch (error) {
    return errorResponse(error, 'Failed to start processing');
  }
}
