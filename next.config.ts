import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // API paths end in "/" (e.g. /api/recipes/1/).
  trailingSlash: true,
  output: "standalone",
  serverExternalPackages: ["better-sqlite3"],
};

export default nextConfig;
