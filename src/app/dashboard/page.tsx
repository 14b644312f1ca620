import Link from "next/link";
import { STATUS_LABELS, StatusBadge } from "@/components/StatusBadge";
import { getDashboardService } from "@/lib/dashboard-service";
import { InvalidDateRangeError, NotConfiguredError, SourceUnavailableError } from "@/lib/errors";
import { SUBJECT_SUMMARY_LENGTH, truncate } from "@/lib/format";
import { createLogger } from "@/lib/logger";
import { resolveDateRange, type DateRange, type TicketStats } from "@/lib/zendesk/stats";
import { TICKET_STATUSES } from "@/lib/zendesk/types";

export const dynamic = "force-dynamic";

const logger = createLogger("page:dashboard");

type SearchParams = Record<string, string | string[] | undefined>;

type StatsView =
  | { kind: "ok"; stats: TicketStats }
  | { kind: "invalid"; message: string }
  | { kind: "not_configured"; missing: string[] }
  | { kind: "error"; message: string };

function first(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

async function loadStats(params: SearchParams): Promise<{ range: DateRange | null; view: StatsView }> {
  let range: DateRange;
  try {
    range = resolveDateRange(first(params.start_date), first(params.end_date));
  } catch (err) {
    if (err instanceof InvalidDateRangeError) {
      return { range: null, view: { kind: "invalid", message: err.message } };
    }
    throw err;
  }

  try {
    const { stats } = await getDashboardService().ticketStats(range);
    return { range, view: { kind: "ok", stats } };
  } catch (err) {
    if (err instanceof NotConfiguredError) {
      return { range, view: { kind: "not_configured", missing: err.missing } };
    }
    if (err instanceof SourceUnavailableError) {
      logger.error({ err, range }, "Ticket statistics unavailable");
      return { range, view: { kind: "error", message: err.message } };
    }
    throw err;
  }
}

export default async function DashboardPage({
  searchParams,
}: {
  searchParams: Promise<SearchParams>;
}) {
  const params = await searchParams;
  const { range, view } = await loadStats(params);

  return (
    <main className="mx-auto min-h-screen w-full max-w-6xl px-6 py-12 text-zinc-950">
      <header className="border-2 border-zinc-950 bg-white p-8 sm:p-12">
        <p className="font-mono text-xs font-bold uppercase tracking-[0.2em] text-zinc-950">
          Dashboard
        </p>
        <h1 className="mt-4 text-4xl font-bold">Ticket KPIs</h1>
        <form method="get" className="mt-8 flex flex-wrap items-end gap-4">
          <label className="flex flex-col font-mono text-xs font-bold uppercase">
            Start date
            <input
              type="date"
              name="start_date"
              defaultValue={range?.startDate ?? first(params.start_date)}
              className="mt-1 border-2 border-zinc-950 px-3 py-2 font-mono text-sm"
            />
          </label>
          <label className="flex flex-col font-mono text-xs font-bold uppercase">
            End date
            <input
              type="date"
              name="end_date"
              defaultValue={range?.endDate ?? first(params.end_date)}
              className="mt-1 border-2 border-zinc-950 px-3 py-2 font-mono text-sm"
            />
          </label>
          <button
            type="submit"
            className="border-2 border-zinc-950 bg-zinc-950 px-6 py-3 font-mono text-sm font-bold uppercase text-white transition-colors hover:bg-zinc-800"
          >
            Apply
          </button>
          <Link
            href="/"
            className="border-2 border-zinc-950 bg-white px-6 py-3 font-mono text-sm font-bold uppercase text-zinc-950 transition-colors hover:bg-zinc-100"
          >
            Recent tickets
          </Link>
        </form>
      </header>

      {view.kind === "invalid" && (
        <section className="mt-8 border-2 border-red-500 bg-white p-8">
          <h2 className="text-xl font-bold text-red-600">Invalid date range</h2>
          <p className="mt-3 font-mono text-sm text-zinc-600">{view.message}</p>
        </section>
      )}

      {view.kind === "not_configured" && (
        <section className="mt-8 border-2 border-zinc-950 bg-white p-8">
          <h2 className="text-xl font-bold">Zendesk is not configured</h2>
          <p className="mt-3 font-mono text-sm text-zinc-600">
            Missing: {view.missing.join(", ")}
          </p>
        </section>
      )}

      {view.kind === "error" && (
        <section className="mt-8 border-2 border-red-500 bg-white p-8">
          <h2 className="text-xl font-bold text-red-600">Could not load statistics</h2>
          <p className="mt-3 font-mono text-sm text-zinc-600">{view.message}</p>
        </section>
      )}

      {view.kind === "ok" && <StatsSections stats={view.stats} />}
    </main>
  );
}

function StatsSections({ stats }: { stats: TicketStats }) {
  return (
    <>
      <section className="mt-8 grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
        <StatCard label="Total Tickets" value={stats.total} />
        {TICKET_STATUSES.map((status) => (
          <StatCard
            key={status}
            label={STATUS_LABELS[status]}
            value={stats.counts[status]}
            detail={`${stats.percentages[status].toFixed(1)}%`}
          />
        ))}
      </section>

      {stats.total === 0 && (
        <p className="mt-8 border-2 border-zinc-950 bg-white p-8 text-sm font-medium text-zinc-600">
          No tickets created between {stats.range.startDate} and {stats.range.endDate}
        </p>
      )}

      {TICKET_STATUSES.filter((status) => stats.tickets[status].length > 0).map((status) => (
        <section key={status} className="mt-8 border-2 border-zinc-950 bg-white">
          <div className="flex items-center justify-between border-b-2 border-zinc-950 p-6">
            <h2 className="text-lg font-bold">{STATUS_LABELS[status]} tickets</h2>
            <StatusBadge status={status} />
          </div>
          <div className="overflow-x-auto">
            <table className="w-full text-sm">
              <thead>
                <tr className="border-b-2 border-zinc-200 bg-zinc-50 text-left">
                  {["ID", "Subject", "Requester", "Assignee", "Created"].map((h) => (
                    <th key={h} className="px-4 py-3 font-mono text-xs font-bold uppercase text-zinc-500">
                      {h}
                    </th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {stats.tickets[status].map((t) => (
                  <tr key={t.id} className="border-b border-zinc-100 transition-colors hover:bg-zinc-50">
                    <td className="px-4 py-3 font-mono text-xs font-bold">{t.id}</td>
                    <td className="max-w-xs truncate px-4 py-3 font-medium" title={t.subject}>
                      {truncate(t.subject, SUBJECT_SUMMARY_LENGTH)}
                    </td>
                    <td className="px-4 py-3 text-zinc-600">{t.requesterName}</td>
                    <td className="px-4 py-3 text-zinc-600">{t.assigneeName}</td>
                    <td className="px-4 py-3 font-mono text-xs text-zinc-500">{t.createdAtFormatted}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </section>
      ))}
    </>
  );
}

function StatCard({
  label,
  value,
  detail,
}: {
  label: string;
  value: number;
  detail?: string;
}) {
  return (
    <div className="border-2 border-zinc-950 bg-white p-6">
      <p className="font-mono text-xs font-bold uppercase tracking-wider text-zinc-500">
        {label}
      </p>
      <p className="mt-2 text-3xl font-bold text-zinc-950">{value}</p>
      {detail && <p className="mt-1 font-mono text-xs text-zinc-500">{detail}</p>}
    </div>
  );
}
