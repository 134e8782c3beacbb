export type Env = {
  port: number;
  host: string;
  publicBaseUrl: string;
  serviceVersion: string;
  logLevel: string;

  upstreamBaseUrl: string;
  upstreamTimeoutMs: number;

  rateLimitMax: number;
  rateLimitWindowMs: number;
};

function parseIntStrict(value: string | undefined, fallback: number) {
  if (value == null || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.trunc(parsed);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const port = parseIntStrict(source.PORT, 3001);
  const host = source.HOST ?? '::';
  const publicBaseUrl = source.PUBLIC_BASE_URL ?? `http://localhost:${port}`;
  const serviceVersion = source.SERVICE_VERSION ?? '1.0.0';
  const logLevel = source.LOG_LEVEL ?? 'debug';

  const upstreamBaseUrl = source.UPSTREAM_BASE_URL ?? 'https://pokeapi.co/api/v2/';
  // 0 disables the timeout; the upstream client then waits as long as fetch does.
  const upstreamTimeoutMs = Math.max(0, Math.min(120_000, parseIntStrict(source.UPSTREAM_TIMEOUT_MS, 0)));

  const rateLimitMax = Math.max(1, parseIntStrict(source.RATE_LIMIT_MAX, 120));
  const rateLimitWindowMs = Math.max(1000, parseIntStrict(source.RATE_LIMIT_WINDOW_MS, 60_000));

  return {
    port,
    host,
    publicBaseUrl,
    serviceVersion,
    logLevel,
    upstreamBaseUrl,
    upstreamTimeoutMs,
    rateLimitMax,
    rateLimitWindowMs
  };
}
