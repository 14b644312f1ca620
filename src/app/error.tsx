'use client';

import Link from 'next/link';

export default function ErrorPage({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  return (
    <main className="mx-auto w-full max-w-3xl px-6 py-12 text-zinc-950">
      <section className="border-2 border-red-500 bg-white p-8">
        <p className="font-mono text-xs font-bold uppercase tracking-[0.2em] text-red-600">
          Render failed
        </p>
        <h1 className="mt-4 text-2xl font-bold">The dashboard hit an unexpected error</h1>
        <p className="mt-4 font-mono text-sm text-zinc-600">
          {error.message || 'No error message was provided.'}
        </p>
        {error.digest && (
          <p className="mt-2 font-mono text-xs text-zinc-400">Digest: {error.digest}</p>
        )}
        <div className="mt-8 flex gap-4">
          <button
            type="button"
            onClick={reset}
            className="border-2 border-zinc-950 bg-zinc-950 px-6 py-3 font-mono text-sm font-bold uppercase text-white hover:bg-zinc-800"
          >
            Retry
          </button>
          <Link
            href="/debug-api"
            className="border-2 border-zinc-950 bg-white px-6 py-3 font-mono text-sm font-bold uppercase text-zinc-950 hover:bg-zinc-100"
          >
            Connection check
          </Link>
        </div>
      </section>
    </main>
  );
}
