import type { NextRequest } from 'next/server';
import { createTranslateHandler } from './handler';
import { getTranslationAppContext } from './context';

export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  return createTranslateHandler(getTranslationAppContext())(request);
}
