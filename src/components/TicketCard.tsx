"use client";

import { useState } from "react";
import {
  COMMENT_SUMMARY_LENGTH,
  DESCRIPTION_SUMMARY_LENGTH,
  SUBJECT_SUMMARY_LENGTH,
  truncate,
} from "@/lib/format";
import type { CommentsResponse } from "@/lib/zendesk/comments";
import type { Ticket } from "@/lib/zendesk/types";
import { PriorityBadge, StatusBadge } from "./StatusBadge";

type CommentsState =
  | { state: "idle" }
  | { state: "loading" }
  | { state: "loaded"; data: CommentsResponse }
  | { state: "error"; message: string };

function readError(data: unknown): string | null {
  if (data && typeof data === "object" && "error" in data && typeof data.error === "string") {
    return data.error;
  }
  return null;
}

function isCommentsResponse(data: unknown): data is CommentsResponse {
  return (
    !!data &&
    typeof data === "object" &&
    "comments" in data &&
    Array.isArray(data.comments) &&
    "count" in data &&
    typeof data.count === "number"
  );
}

function CommentBody({ body }: { body: string }) {
  const [expanded, setExpanded] = useState(false);
  const long = body.length > COMMENT_SUMMARY_LENGTH;

  return (
    <div className="mt-2 whitespace-pre-wrap text-sm text-zinc-700">
      {expanded || !long ? body : truncate(body, COMMENT_SUMMARY_LENGTH)}
      {long && (
        <button
          type="button"
          onClick={() => setExpanded(!expanded)}
          className="ml-2 font-mono text-xs font-bold uppercase text-blue-600 hover:underline"
        >
          {expanded ? "less" : "more"}
        </button>
      )}
    </div>
  );
}

export default function TicketCard({ ticket }: { ticket: Ticket }) {
  const [open, setOpen] = useState(false);
  const [comments, setComments] = useState<CommentsState>({ state: "idle" });

  const loadComments = async () => {
    setComments({ state: "loading" });
    try {
      const res = await fetch(`/api/ticket/${ticket.id}/comments`);
      const data: unknown = await res.json().catch(() => null);
      const error = readError(data);
      if (!res.ok || error) {
        throw new Error(error || `Request failed with status ${res.status}`);
      }
      if (!isCommentsResponse(data)) {
        throw new Error("Unexpected comments response");
      }
      setComments({ state: "loaded", data });
    } catch (err) {
      setComments({
        state: "error",
        message: err instanceof Error ? err.message : "Failed to load comments",
      });
    }
  };

  const onToggle = async () => {
    const opening = !open;
    setOpen(opening);
    if (opening && (comments.state === "idle" || comments.state === "error")) {
      await loadComments();
    }
  };

  return (
    <article className="border-2 border-zinc-950 bg-white p-6">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div className="flex items-center gap-3">
          <span className="font-mono text-xs font-bold text-zinc-500">#{ticket.id}</span>
          <h3 className="text-lg font-bold" title={ticket.subject}>
            {truncate(ticket.subject, SUBJECT_SUMMARY_LENGTH)}
          </h3>
        </div>
        <div className="flex items-center gap-2">
          <StatusBadge status={ticket.status} />
          <PriorityBadge priority={ticket.priority} />
        </div>
      </div>

      {ticket.description && (
        <p className="mt-3 text-sm text-zinc-600">
          {truncate(ticket.description, DESCRIPTION_SUMMARY_LENGTH)}
        </p>
      )}

      <dl className="mt-4 grid gap-2 font-mono text-xs sm:grid-cols-2">
        <div>
          <dt className="inline font-bold uppercase text-zinc-500">Requester: </dt>
          <dd className="inline">{ticket.requesterName}</dd>
        </div>
        <div>
          <dt className="inline font-bold uppercase text-zinc-500">Assignee: </dt>
          <dd className="inline">{ticket.assigneeName}</dd>
        </div>
        <div>
          <dt className="inline font-bold uppercase text-zinc-500">Created: </dt>
          <dd className="inline">{ticket.createdAtFormatted}</dd>
        </div>
        <div>
          <dt className="inline font-bold uppercase text-zinc-500">Updated: </dt>
          <dd className="inline">{ticket.updatedAtFormatted}</dd>
        </div>
      </dl>

      <button
        type="button"
        onClick={onToggle}
        aria-expanded={open}
        className="mt-4 border-2 border-zinc-950 bg-white px-4 py-2 font-mono text-xs font-bold uppercase text-zinc-950 hover:bg-zinc-100"
      >
        {open ? "Hide comments" : "Show comments"}
      </button>

      {open && (
        <section className="mt-4 border-t-2 border-zinc-200 pt-4">
          {comments.state === "loading" && (
            <p className="font-mono text-xs text-zinc-500">Loading comments...</p>
          )}
          {comments.state === "error" && (
            <p className="font-mono text-xs text-red-600">{comments.message}</p>
          )}
          {comments.state === "loaded" && (
            <>
              <div className="flex items-center justify-between">
                <h4 className="font-mono text-xs font-bold uppercase">
                  {comments.data.count} comment{comments.data.count === 1 ? "" : "s"}
                </h4>
                <span className="border border-zinc-300 bg-zinc-100 px-2 py-0.5 font-mono text-xs">
                  cache {comments.data.cache_status}
                </span>
              </div>
              {comments.data.count === 0 ? (
                <p className="mt-2 text-sm text-zinc-500">No comments</p>
              ) : (
                <ol className="mt-2 space-y-3">
                  {comments.data.comments.map((c) => (
                    <li key={c.id} className="border border-zinc-200 p-3">
                      <div className="flex flex-wrap justify-between gap-2 font-mono text-xs">
                        <span className="font-bold">{c.author_name}</span>
                        <span className="text-zinc-500">{c.created_at_formatted}</span>
                      </div>
                      <CommentBody body={c.body} />
                    </li>
                  ))}
                </ol>
              )}
            </>
          )}
        </section>
      )}
    </article>
  );
}
