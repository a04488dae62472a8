import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // mariadb opens raw sockets; keep it out of the server bundle.
  serverExternalPackages: ['mariadb'],
  async redirects() {
    return [
      { source: '/backoffice/audit', destination: '/backoffice/inventory/audit', permanent: false },
    ];
  },
};

export default nextConfig;
