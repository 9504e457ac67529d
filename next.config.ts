import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  output: 'standalone',

  // Performance optimizations
  compress: true,
  reactStrictMode: true,
};

export default nextConfig;
