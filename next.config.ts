import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Loaded at run time from node_modules; the browser driver cannot be bundled.
  serverExternalPackages: ["playwright-core"],
  turbopack: {
    root: process.cwd(),
  },
};

export default nextConfig;
