import { NextResponse } from 'next/server';
import { createEpisode, listEpisodes } from '@/lib/episodes';
import { errorResponse, readJsonBody } from '@/lib/http';
import { parseEpisodeInput, parseEpisodeQuery } from '@/lib/schemas';
import { getStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export async function GET(req: Request) {
  try {
    const query = parseEpisodeQuery(new URL(req.url).searchParams);
    const store = await getStore();
    return NextResponse.json(await listEpisodes(store, query));
  } catch (error) {
    return errorResponse(error, 'Unable to load episodes.');
  }
}

export async function POST(req: Request) {
  try {
    const input = parseEpisodeInput(await readJsonBody(req));
    const store = await getStore();
    return NextResponse.json(await createEpisode(store, input));
  } catch (error) {
    return errorResponse(error, 'Unable to create episode.');
  }
}
