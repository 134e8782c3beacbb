/**
 * Raised while building the upstream client. Startup-fatal: the process
 * must not begin listening with an unusable base URL.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: 'INVALID_BASE_URL',
    public readonly value: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type UpstreamErrorKind = 'transport' | 'http' | 'decode';

/**
 * A failed upstream list fetch. `status` and `detail` are set for `http`;
 * `cause` holds the underlying fetch or parse error where there is one.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly kind: UpstreamErrorKind,
    public readonly url: string,
    public readonly status?: number,
    public readonly detail?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}
