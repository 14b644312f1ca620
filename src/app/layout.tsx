import type { Metadata, Viewport } from "next";
import Link from "next/link";
import "./globals.css";

export const metadata: Metadata = {
  title: "Zendesk Pulse",
  description: "Recent Zendesk tickets, comments and KPIs at a glance.",
};

export const viewport: Viewport = {
  themeColor: "#09090b",
};

const navLinks = [
  { href: "/", label: "Tickets" },
  { href: "/dashboard", label: "KPIs" },
  { href: "/debug-api", label: "Debug" },
];

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        <nav className="border-b-2 border-zinc-950 bg-white">
          <div className="mx-auto flex w-full max-w-6xl items-center justify-between px-6 py-4">
            <Link href="/" className="font-mono text-sm font-bold uppercase tracking-[0.2em]">
              Zendesk Pulse
            </Link>
            <div className="flex gap-6">
              {navLinks.map((l) => (
                <Link
                  key={l.href}
                  href={l.href}
                  className="font-mono text-xs font-bold uppercase text-zinc-600 hover:text-zinc-950"
                >
                  {l.label}
                </Link>
              ))}
            </div>
          </div>
        </nav>
        {children}
      </body>
    </html>
  );
}
