import type { TicketPriority, TicketStatus } from "@/lib/zendesk/types";

export const STATUS_LABELS: Record<TicketStatus, string> = {
  new: "New",
  open: "Open",
  pending: "Pending",
  hold: "On hold",
  solved: "Solved",
  closed: "Closed",
};

const statusColor: Record<TicketStatus, string> = {
  new: "bg-sky-400 text-black",
  open: "bg-blue-500 text-white",
  pending: "bg-amber-400 text-black",
  hold: "bg-violet-500 text-white",
  solved: "bg-emerald-500 text-white",
  closed: "bg-zinc-500 text-white",
};

const priorityColor: Record<TicketPriority, string> = {
  urgent: "bg-red-500 text-white",
  high: "bg-orange-400 text-black",
  normal: "bg-yellow-300 text-black",
  low: "bg-zinc-300 text-black",
};

export function StatusBadge({ status }: { status: TicketStatus }) {
  return (
    <span
      className={`inline-block px-2 py-0.5 font-mono text-xs font-bold uppercase ${statusColor[status]}`}
    >
      {STATUS_LABELS[status]}
    </span>
  );
}

export function PriorityBadge({ priority }: { priority: TicketPriority | null }) {
  if (!priority) return null;
  return (
    <span
      className={`inline-block px-2 py-0.5 font-mono text-xs font-bold uppercase ${priorityColor[priority]}`}
    >
      {priority}
    </span>
  );
}
