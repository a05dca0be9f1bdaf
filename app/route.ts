import { NextResponse } from 'next/server';

export function GET() {
  return NextResponse.json({ message: 'LifeStory Backend is running' });
}
