import { NextResponse } from 'next/server';
import { describeResourceSchemas } from '@/lib/schemas';

export function GET() {
  return NextResponse.json(describeResourceSchemas());
}
