import { NextRequest, NextResponse } from 'next/server';
import { jobStore, serializeJob } from '@/lib/api';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const { searchParams } = request.nextUrl;
  // Missing or malformed values fall back to the store's defaults
  const page = jobStore.listJobs(Number(searchParams.get('page') ?? 1), Number(searchParams.get('pageSize') ?? 0));

  return NextResponse.json({ ...page, jobs: page.jobs.map(serializeJob) });
}
