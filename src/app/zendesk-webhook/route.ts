import { NextRequest, NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard-service';
import { MalformedPayloadError, errorMessage } from '@/lib/errors';
import { createRequestLogger } from '@/lib/logger';
import { parseJsonBody } from '@/lib/parse-json-body';

export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request);
  if ('error' in parsed) return parsed.error;

  try {
    const ack = getDashboardService().ingestWebhook(parsed.data);
    return NextResponse.json(ack);
  } catch (err) {
    if (err instanceof MalformedPayloadError) {
      return NextResponse.json({ error: err.message, issues: err.issues }, { status: 400 });
    }
    const log = createRequestLogger('api:webhook', request.headers.get('x-request-id') ?? crypto.randomUUID());
    log.error({ err }, 'Error processing webhook');
    return NextResponse.json(
      { error: errorMessage(err, 'Error processing webhook') },
      { status: 500 },
    );
  }
}
