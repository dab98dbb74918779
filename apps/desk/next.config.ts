import type { NextConfig } from "next";
import { readFileSync } from "fs";
import { join } from "path";

// Read version from package.json at build time
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, "package.json"), "utf-8"));
const APP_VERSION = pkg.version;

// ---------------------------------------------------------------------------
// Security Headers
// ---------------------------------------------------------------------------

// API-only service: nothing is framed, sniffed or loaded cross-origin
const securityHeaders = [
  { key: "X-Frame-Options", value: "DENY" },
  { key: "X-Content-Type-Options", value: "nosniff" },
  { key: "Referrer-Policy", value: "no-referrer" },
  { key: "Strict-Transport-Security", value: "max-age=63072000; includeSubDomains; preload" },
  { key: "Content-Security-Policy", value: "default-src 'none'; frame-ancestors 'none'" },
];

// ---------------------------------------------------------------------------
// Next.js Config
// ---------------------------------------------------------------------------

const nextConfig: NextConfig = {
  output: "standalone",
  env: {
    NEXT_PUBLIC_APP_VERSION: APP_VERSION,
  },
  // The core package ships TypeScript sources
  transpilePackages: ["@support-desk/core"],
  serverExternalPackages: ["pg"],
  devIndicators: false,
  // Exclude logs folder from file watching to prevent HMR loops
  webpack: (config: { watchOptions?: Record<string, unknown> }, { dev }: { dev: boolean }) => {
    if (dev) {
      config.watchOptions = {
        ...config.watchOptions,
        ignored: ["**/node_modules/**", "**/logs/**", "**/*.jsonl"],
      };
    }
    return config;
  },
  async headers() {
    return [
      {
        source: "/(.*)",
        headers: securityHeaders,
      },
    ];
  },
};

export default nextConfig;
