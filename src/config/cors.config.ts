import { env } from './env.config';

/**
 * Normalize an origin by stripping trailing slashes.
 */
function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Build the production origin allowlist from FRONTEND_URL and FRONTEND_URLS.
 */
export function buildAllowlist(frontendUrl?: string, frontendUrls?: string): string[] {
  const origins: string[] = [];

  if (frontendUrl) {
    origins.push(normalizeOrigin(frontendUrl));
  }

  if (frontendUrls) {
    const extra = frontendUrls
      .split(',')
      .map((s) => normalizeOrigin(s.trim()))
      .filter(Boolean);
    origins.push(...extra);
  }

  return origins;
}

const allowlist = buildAllowlist(env.FRONTEND_URL, env.FRONTEND_URLS);

/**
 * Check if a production origin is in the allowlist.
 */
export function isAllowedOrigin(origin: string): boolean {
  return allowlist.includes(normalizeOrigin(origin));
}

/**
 * Check if an origin matches common development patterns.
 */
export function isAllowedDevOrigin(origin: string): boolean {
  return (
    origin.startsWith('http://localhost:') ||
    origin.startsWith('http://127.0.0.1:') ||
    origin.startsWith('https://localhost:')
  );
}
