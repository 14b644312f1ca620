import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  reactStrictMode: true,
  poweredByHeader: false,
  compress: true,
  // pino resolves its transports at runtime; keep it out of the server bundle
  serverExternalPackages: ["pino", "pino-pretty"],
  async headers() {
    return [
      {
        // Dashboard and comment data must always reflect the server-side cache
        source: "/api/ticket/:path*",
        headers: [{ key: "Cache-Control", value: "no-store" }],
      },
    ];
  },
};

export default nextConfig;
