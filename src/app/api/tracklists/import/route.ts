import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/api';
import { importTracklistCsv } from '@/lib/csv-import';

export const runtime = 'nodejs';

// Body is the raw CSV export; responds with the reconciled tracklist
export async function POST(request: NextRequest) {
  try {
    const tracklist = importTracklistCsv(await request.text());
    return NextResponse.json(tracklist);
  } catch (error) {
    return errorResponse(error, 'Failed to import tracklist');
  }
}
