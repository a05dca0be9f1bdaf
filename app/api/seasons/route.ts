import { NextResponse } from 'next/server';
import { errorResponse, readJsonBody } from '@/lib/http';
import { parseSeasonInput } from '@/lib/schemas';
import { createSeason, listSeasons } from '@/lib/seasons';
import { getStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const store = await getStore();
    return NextResponse.json(await listSeasons(store));
  } catch (error) {
    return errorResponse(error, 'Unable to load seasons.');
  }
}

export async function POST(req: Request) {
  try {
    const input = parseSeasonInput(await readJsonBody(req));
    const store = await getStore();
    return NextResponse.json(await createSeason(store, input));
  } catch (error) {
    return errorResponse(error, 'Unable to create season.');
  }
}
