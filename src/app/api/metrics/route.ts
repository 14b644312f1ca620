/**
 * GET /api/metrics: Prometheus text format endpoint.
 * Updates cache size gauges before each scrape.
 */

import { NextResponse } from 'next/server';
import { getDashboardService, recordCacheGauges } from '@/lib/dashboard-service';
import { registry } from '@/lib/metrics';

export const dynamic = 'force-dynamic';

export async function GET() {
  recordCacheGauges(getDashboardService());

  const metrics = await registry.metrics();
  return new NextResponse(metrics, {
    status: 200,
    headers: {
      'Content-Type': registry.contentType,
      'Cache-Control': 'no-store',
    },
  });
}
