import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // cheerio pulls in undici on the server; keep it out of the bundle
  serverExternalPackages: ['cheerio'],
};

export default nextConfig;
