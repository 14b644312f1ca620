import { NextResponse } from "next/server";
import { getDashboardService } from "@/lib/dashboard-service";

export const dynamic = "force-dynamic";

interface HealthCheck {
  status: "ok" | "error" | "not_configured";
  missing?: string[];
  entries?: number;
  hitRate?: number;
}

export async function GET() {
  const service = getDashboardService();
  const checks: Record<string, HealthCheck> = {};

  // Zendesk credentials
  checks.zendesk = service.config.zendesk
    ? { status: "ok" }
    : { status: "not_configured", missing: service.config.missing };

  // Cache sizes
  for (const [name, stats] of Object.entries(service.cacheStats())) {
    checks[`cache:${name}`] = { status: "ok", entries: stats.size, hitRate: stats.hitRate };
  }

  const overallStatus = service.config.zendesk ? "ok" : "degraded";

  return NextResponse.json({
    service: "zendesk-pulse",
    status: overallStatus,
    timestamp: new Date().toISOString(),
    checks,
  });
}
