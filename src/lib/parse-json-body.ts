/**
 * JSON body parser with a discriminated union return type.
 *
 *   const parsed = await parseJsonBody(request);
 *   if ('error' in parsed) return parsed.error;
 */

import { NextResponse } from 'next/server';

type ParseSuccess = { data: unknown };
type ParseError = { error: NextResponse };

export async function parseJsonBody(request: Request): Promise<ParseSuccess | ParseError> {
  try {
    const data: unknown = await request.json();
    return { data };
  } catch {
    return {
      error: NextResponse.json(
        { error: 'Invalid request body: expected valid JSON' },
        { status: 400 },
      ),
    };
  }
}
