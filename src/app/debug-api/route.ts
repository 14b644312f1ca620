/**
 * GET /debug-api: connection diagnostics: configured domain and user, key
 * presence, one live probe request, and cache statistics.
 */

import { NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard-service';

export const dynamic = 'force-dynamic';

export async function GET() {
  const report = await getDashboardService().debugReport();
  return NextResponse.json(report, { headers: { 'Cache-Control': 'no-store' } });
}
