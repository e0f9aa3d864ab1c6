import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Keep pdfjs-dist and xlsx resolved at runtime in Node functions to avoid worker/module bundling issues.
  serverExternalPackages: ["pdfjs-dist", "xlsx"],
};

export default nextConfig;
