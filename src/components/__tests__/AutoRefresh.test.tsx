// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { render, screen, fireEvent, act } from '@testing-library/react';

const { router } = vi.hoisted(() => ({ router: { refresh: vi.fn() } }));

vi.mock('next/navigation', () => ({
  useRouter: () => router,
}));

import AutoRefresh, { countdownReducer } from '../AutoRefresh';

function setHidden(hidden: boolean) {
  Object.defineProperty(document, 'hidden', { configurable: true, get: () => hidden });
  act(() => {
    document.dispatchEvent(new Event('visibilitychange'));
  });
}

describe('countdownReducer', () => {
  it('counts down one second per tick', () => {
    expect(countdownReducer({ secondsLeft: 5, refreshing: false }, { type: 'tick' })).toEqual({
      secondsLeft: 4,
      refreshing: false,
    });
  });

  it('switches to refreshing on the last tick', () => {
    expect(countdownReducer({ secondsLeft: 1, refreshing: false }, { type: 'tick' })).toEqual({
      secondsLeft: 0,
      refreshing: true,
    });
  });

  it('ignores ticks while refreshing', () => {
    const state = { secondsLeft: 0, refreshing: true };
    expect(countdownReducer(state, { type: 'tick' })).toBe(state);
  });

  it('reset restores the full interval', () => {
    expect(countdownReducer({ secondsLeft: 0, refreshing: true }, { type: 'reset', seconds: 60 })).toEqual({
      secondsLeft: 60,
      refreshing: false,
    });
  });
});

describe('AutoRefresh', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    router.refresh.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
    Reflect.deleteProperty(document, 'hidden');
  });

  it('counts down from the interval', () => {
    render(<AutoRefresh />);
    expect(screen.getByText('Auto-refresh in 60s')).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByText('Auto-refresh in 59s')).toBeInTheDocument();
  });

  it('refreshes the route when the countdown runs out, then starts over', () => {
    render(<AutoRefresh />);

    act(() => {
      vi.advanceTimersByTime(60_000);
    });
    expect(screen.getByText('Refreshing...')).toBeInTheDocument();
    expect(router.refresh).toHaveBeenCalledTimes(1);

    act(() => {
      vi.advanceTimersByTime(500);
    });
    expect(screen.getByText('Auto-refresh in 60s')).toBeInTheDocument();
  });

  it('pauses while hidden and restarts from the full interval when visible', () => {
    render(<AutoRefresh />);
    act(() => {
      vi.advanceTimersByTime(10_000);
    });
    expect(screen.getByText('Auto-refresh in 50s')).toBeInTheDocument();

    setHidden(true);
    act(() => {
      vi.advanceTimersByTime(120_000);
    });
    expect(screen.getByText('Auto-refresh in 50s')).toBeInTheDocument();
    expect(router.refresh).not.toHaveBeenCalled();

    setHidden(false);
    expect(screen.getByText('Auto-refresh in 60s')).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByText('Auto-refresh in 59s')).toBeInTheDocument();
  });

  it('refreshes immediately on demand', () => {
    render(<AutoRefresh intervalSeconds={30} />);
    act(() => {
      vi.advanceTimersByTime(5000);
    });

    fireEvent.click(screen.getByText('Refresh now'));

    expect(router.refresh).toHaveBeenCalledTimes(1);
    expect(screen.getByText('Auto-refresh in 30s')).toBeInTheDocument();
  });
});
