import AutoRefresh from "@/components/AutoRefresh";
import TicketCard from "@/components/TicketCard";
import { getDashboardService } from "@/lib/dashboard-service";
import { NotConfiguredError, SourceUnavailableError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import type { AppConfig } from "@/lib/config";
import type { CacheStatus, Ticket } from "@/lib/zendesk/types";

export const dynamic = "force-dynamic";

const logger = createLogger("page:home");

type TicketsView =
  | { kind: "ok"; tickets: readonly Ticket[]; cacheStatus: CacheStatus }
  | { kind: "not_configured"; missing: string[] }
  | { kind: "error"; message: string };

async function loadTickets(): Promise<TicketsView> {
  try {
    const { tickets, cacheStatus } = await getDashboardService().recentTickets();
    return { kind: "ok", tickets, cacheStatus };
  } catch (err) {
    if (err instanceof NotConfiguredError) {
      return { kind: "not_configured", missing: err.missing };
    }
    if (err instanceof SourceUnavailableError) {
      logger.error({ err }, "Recent tickets unavailable");
      return { kind: "error", message: err.message };
    }
    throw err;
  }
}

export default async function Home() {
  const { config } = getDashboardService();
  const view = await loadTickets();

  return (
    <main className="mx-auto min-h-screen w-full max-w-6xl px-6 py-12 text-zinc-950">
      <header className="border-2 border-zinc-950 bg-white p-8">
        <p className="font-mono text-xs font-bold uppercase tracking-[0.2em] text-zinc-950">
          Support Dashboard
        </p>
        <div className="mt-4 flex flex-wrap items-end justify-between gap-4">
          <h1 className="text-4xl font-bold">Recent Tickets</h1>
          <AutoRefresh />
        </div>
      </header>

      <ConfigPanel config={config} />

      {view.kind === "not_configured" && (
        <section className="mt-8 border-2 border-zinc-950 bg-white p-8">
          <h2 className="text-xl font-bold">Zendesk is not configured</h2>
          <p className="mt-3 text-sm font-medium text-zinc-600">
            Set the missing settings to load tickets:
          </p>
          <pre className="mt-4 overflow-x-auto bg-zinc-950 p-4 font-mono text-sm text-emerald-400">
            {view.missing.join("\n")}
          </pre>
        </section>
      )}

      {view.kind === "error" && (
        <section className="mt-8 border-2 border-red-500 bg-white p-8">
          <h2 className="text-xl font-bold text-red-600">Could not load tickets</h2>
          <p className="mt-3 font-mono text-sm text-zinc-600">{view.message}</p>
        </section>
      )}

      {view.kind === "ok" && (
        <section className="mt-8">
          <div className="flex items-center justify-between">
            <h2 className="text-lg font-bold">
              {view.tickets.length} ticket{view.tickets.length === 1 ? "" : "s"}
            </h2>
            <span className="border border-zinc-300 bg-zinc-100 px-2 py-0.5 font-mono text-xs">
              cache {view.cacheStatus}
            </span>
          </div>
          {view.cacheStatus === "stale" && (
            <p className="mt-2 font-mono text-xs text-amber-600">
              Zendesk is unreachable; showing the last fetched tickets.
            </p>
          )}
          {view.tickets.length === 0 ? (
            <p className="mt-4 border-2 border-zinc-950 bg-white p-8 text-sm font-medium text-zinc-600">
              No tickets found
            </p>
          ) : (
            <div className="mt-4 space-y-4">
              {view.tickets.map((ticket) => (
                <TicketCard key={ticket.id} ticket={ticket} />
              ))}
            </div>
          )}
        </section>
      )}
    </main>
  );
}

function ConfigPanel({ config }: { config: AppConfig }) {
  const ready = config.missing.length === 0;
  const rows: Array<[string, string]> = [
    ["Domain", config.domain ?? "Not set"],
    ["User", config.user ?? "Not set"],
    ["API key", config.apiKeyLength > 0 ? `Configured (${config.apiKeyLength} chars)` : "Not set"],
  ];

  return (
    <section className="mt-8 border-2 border-zinc-950 bg-white p-6">
      <div className="flex items-center justify-between">
        <h2 className="text-lg font-bold">Configuration</h2>
        <span
          className={`px-3 py-1 font-mono text-xs font-bold uppercase ${
            ready ? "bg-emerald-400 text-black" : "bg-red-500 text-white"
          }`}
        >
          {ready ? "Ready" : "Incomplete"}
        </span>
      </div>
      <dl className="mt-4 grid gap-3 sm:grid-cols-3">
        {rows.map(([label, value]) => (
          <div key={label} className="border border-zinc-200 px-4 py-2">
            <dt className="font-mono text-xs font-bold uppercase text-zinc-500">{label}</dt>
            <dd className="mt-1 font-mono text-sm">{value}</dd>
          </div>
        ))}
      </dl>
    </section>
  );
}
