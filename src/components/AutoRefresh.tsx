"use client";

import { useEffect, useReducer, useState } from "react";
import { useRouter } from "next/navigation";

export const DEFAULT_REFRESH_SECONDS = 60;

/** Delay between showing "Refreshing..." and restarting the countdown. */
const REFRESH_SETTLE_MS = 500;

export interface CountdownState {
  secondsLeft: number;
  refreshing: boolean;
}

export type CountdownAction = { type: "tick" } | { type: "reset"; seconds: number };

export function countdownReducer(state: CountdownState, action: CountdownAction): CountdownState {
  switch (action.type) {
    case "tick":
      if (state.refreshing) return state;
      if (state.secondsLeft <= 1) return { secondsLeft: 0, refreshing: true };
      return { secondsLeft: state.secondsLeft - 1, refreshing: false };
    case "reset":
      return { secondsLeft: action.seconds, refreshing: false };
  }
}

export default function AutoRefresh({
  intervalSeconds = DEFAULT_REFRESH_SECONDS,
}: {
  intervalSeconds?: number;
}) {
  const router = useRouter();
  const [visible, setVisible] = useState(true);
  const [state, dispatch] = useReducer(countdownReducer, {
    secondsLeft: intervalSeconds,
    refreshing: false,
  });

  // Paused while the tab is hidden; a full interval again once it is visible
  useEffect(() => {
    const onVisibilityChange = () => {
      if (document.hidden) {
        setVisible(false);
      } else {
        dispatch({ type: "reset", seconds: intervalSeconds });
        setVisible(true);
      }
    };
    document.addEventListener("visibilitychange", onVisibilityChange);
    return () => document.removeEventListener("visibilitychange", onVisibilityChange);
  }, [intervalSeconds]);

  useEffect(() => {
    if (!visible || state.refreshing) return;
    const id = setInterval(() => dispatch({ type: "tick" }), 1000);
    return () => clearInterval(id);
  }, [visible, state.refreshing]);

  useEffect(() => {
    if (!state.refreshing) return;
    router.refresh();
    const id = setTimeout(() => dispatch({ type: "reset", seconds: intervalSeconds }), REFRESH_SETTLE_MS);
    return () => clearTimeout(id);
  }, [state.refreshing, router, intervalSeconds]);

  const refreshNow = () => {
    router.refresh();
    dispatch({ type: "reset", seconds: intervalSeconds });
  };

  return (
    <div className="flex items-center gap-3 font-mono text-xs text-zinc-500">
      <span role="status">
        {state.refreshing ? "Refreshing..." : `Auto-refresh in ${state.secondsLeft}s`}
      </span>
      <button
        type="button"
        onClick={refreshNow}
        className="border border-zinc-950 px-2 py-1 font-bold uppercase text-zinc-950 hover:bg-zinc-100"
      >
        Refresh now
      </button>
    </div>
  );
}
