import Link from 'next/link';

export default function NotFound() {
  return (
    <main className="mx-auto w-full max-w-3xl px-6 py-12 text-zinc-950">
      <section className="border-2 border-zinc-950 bg-white p-8">
        <p className="font-mono text-6xl font-bold">404</p>
        <h1 className="mt-4 font-mono text-xl uppercase tracking-widest">Page not found</h1>
        <p className="mt-4 border-t-2 border-zinc-200 pt-4 text-sm text-zinc-600">
          Only the ticket list, the KPI dashboard and the connection check live here.
        </p>
        <Link
          href="/"
          className="mt-8 inline-block border-2 border-zinc-950 bg-zinc-950 px-6 py-3 font-mono text-sm font-bold uppercase text-white hover:bg-zinc-800"
        >
          Back to recent tickets
        </Link>
      </section>
    </main>
  );
}
