// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { render, screen, fireEvent, waitFor } from '@testing-library/react';
import TicketCard from '../TicketCard';
import type { Ticket } from '@/lib/zendesk/types';

function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: 1,
    subject: 'Printer on fire',
    description: 'The office printer is emitting smoke.',
    status: 'open',
    priority: 'high',
    requesterId: 11,
    assigneeId: 12,
    requesterName: 'Ada Lovelace',
    assigneeName: 'Grace Hopper',
    createdAt: '2026-01-15T12:00:00Z',
    updatedAt: null,
    createdAtFormatted: '2026-01-15 08:00:00 EST',
    updatedAtFormatted: 'N/A',
    ...overrides,
  };
}

function commentsPayload(bodies: string[], cacheStatus: 'hit' | 'miss' = 'miss') {
  return {
    comments: bodies.map((body, i) => ({
      id: i + 1,
      author_name: 'Grace Hopper',
      created_at: '2026-01-15T14:00:00Z',
      created_at_formatted: '2026-01-15 10:00:00 EST',
      body,
      html_body: `<p>${body}</p>`,
    })),
    count: bodies.length,
    cache_status: cacheStatus,
  };
}

function okResponse(data: unknown) {
  return { ok: true, status: 200, json: async () => data };
}

const mockFetch = vi.fn();

describe('TicketCard', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('renders the ticket summary', () => {
    render(<TicketCard ticket={makeTicket()} />);

    expect(screen.getByText('#1')).toBeInTheDocument();
    expect(screen.getByText('Printer on fire')).toBeInTheDocument();
    expect(screen.getByText('Open')).toBeInTheDocument();
    expect(screen.getByText('high')).toBeInTheDocument();
    expect(screen.getByText('Ada Lovelace')).toBeInTheDocument();
    expect(screen.getByText('Grace Hopper')).toBeInTheDocument();
    expect(screen.getByText('2026-01-15 08:00:00 EST')).toBeInTheDocument();
  });

  it('truncates a long subject and keeps the full text in the title', () => {
    const subject = 'S'.repeat(100);
    render(<TicketCard ticket={makeTicket({ subject })} />);

    const heading = screen.getByText(`${'S'.repeat(80)}...`);
    expect(heading).toHaveAttribute('title', subject);
  });

  it('does not fetch comments until expanded', () => {
    render(<TicketCard ticket={makeTicket()} />);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('loads and shows comments with the cache status', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(commentsPayload(['Rebooted the printer'])));
    render(<TicketCard ticket={makeTicket()} />);

    fireEvent.click(screen.getByText('Show comments'));

    await waitFor(() => {
      expect(screen.getByText('Rebooted the printer')).toBeInTheDocument();
    });
    expect(mockFetch).toHaveBeenCalledWith('/api/ticket/1/comments');
    expect(screen.getByText('1 comment')).toBeInTheDocument();
    expect(screen.getByText('cache miss')).toBeInTheDocument();
    expect(screen.getByText('2026-01-15 10:00:00 EST')).toBeInTheDocument();
  });

  it('does not refetch when collapsed and expanded again', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(commentsPayload(['First reply'])));
    render(<TicketCard ticket={makeTicket()} />);

    fireEvent.click(screen.getByText('Show comments'));
    await waitFor(() => {
      expect(screen.getByText('First reply')).toBeInTheDocument();
    });
    fireEvent.click(screen.getByText('Hide comments'));
    fireEvent.click(screen.getByText('Show comments'));

    expect(screen.getByText('First reply')).toBeInTheDocument();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('says so when the ticket has no comments', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(commentsPayload([], 'hit')));
    render(<TicketCard ticket={makeTicket()} />);

    fireEvent.click(screen.getByText('Show comments'));

    await waitFor(() => {
      expect(screen.getByText('No comments')).toBeInTheDocument();
    });
    expect(screen.getByText('cache hit')).toBeInTheDocument();
  });

  it('shows the error instead of an empty list when loading fails', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 502,
      json: async () => ({ error: 'Could not reach Zendesk: fetch failed' }),
    });
    render(<TicketCard ticket={makeTicket()} />);

    fireEvent.click(screen.getByText('Show comments'));

    await waitFor(() => {
      expect(screen.getByText('Could not reach Zendesk: fetch failed')).toBeInTheDocument();
    });
    expect(screen.queryByText('No comments')).not.toBeInTheDocument();
  });

  it('truncates long comments to 200 characters with a toggle', async () => {
    const body = 'x'.repeat(250);
    mockFetch.mockResolvedValueOnce(okResponse(commentsPayload([body])));
    render(<TicketCard ticket={makeTicket()} />);

    fireEvent.click(screen.getByText('Show comments'));
    await waitFor(() => {
      expect(screen.getByText(`${'x'.repeat(200)}...`)).toBeInTheDocument();
    });

    fireEvent.click(screen.getByText('more'));
    expect(screen.getByText(body)).toBeInTheDocument();

    fireEvent.click(screen.getByText('less'));
    expect(screen.getByText(`${'x'.repeat(200)}...`)).toBeInTheDocument();
  });
});
