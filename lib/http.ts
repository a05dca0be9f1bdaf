import { NextResponse } from 'next/server';
import { ApiError, ValidationError } from '@/lib/errors';

export async function readJsonBody(req: Request): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new ValidationError([{ field: 'body', message: 'Request body must be valid JSON.' }]);
  }
}

export function errorResponse(error: unknown, fallbackMessage: string) {
  if (error instanceof ValidationError) {
    return NextResponse.json({ message: error.message, detail: error.detail }, { status: error.status });
  }

  if (error instanceof ApiError) {
    return NextResponse.json({ message: error.message }, { status: error.status });
  }

  console.error('[api] error', error);
  return NextResponse.json(
    { message: error instanceof Error ? error.message : fallbackMessage },
    { status: 500 }
  );
}
