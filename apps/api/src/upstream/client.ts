import {
  UPSTREAM_LIST_RESOURCE,
  UpstreamListPageSchema,
  toUpstreamListPage,
  type UpstreamListPage
} from '@pokedex-gateway/shared';
import { ConfigError, UpstreamError } from '../errors.js';

export type FetchLike = (input: URL, init?: RequestInit) => Promise<Response>;

export type PokedexClientOptions = {
  fetch?: FetchLike;
  timeoutMs?: number;
};

export type UpstreamResult = { ok: true; page: UpstreamListPage } | { ok: false; error: UpstreamError };

const ERROR_DETAIL_MAX = 200;

/** True when nothing but an opaque path follows the scheme (`mailto:`, `data:`). */
export function hasOpaquePath(url: URL): boolean {
  return !url.href.slice(url.protocol.length).startsWith('/');
}

function describe(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

function fail(error: UpstreamError): UpstreamResult {
  return { ok: false, error };
}

export class PokedexClient {
  readonly base: URL;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, options: PokedexClientOptions = {}) {
    let base: URL;
    try {
      base = new URL(baseUrl);
    } catch {
      throw new ConfigError(`Invalid base url: ${baseUrl}`, 'INVALID_BASE_URL', baseUrl);
    }
    if (hasOpaquePath(base)) {
      throw new ConfigError(`Invalid base url (cannot be a base): ${baseUrl}`, 'INVALID_BASE_URL', baseUrl);
    }
    if (base.protocol !== 'http:' && base.protocol !== 'https:') {
      throw new ConfigError(`Invalid base url (scheme must be http or https): ${baseUrl}`, 'INVALID_BASE_URL', baseUrl);
    }
    this.base = base;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = Math.max(0, options.timeoutMs ?? 0);
  }

  listUrl(limit: number, offset: number): URL {
    const url = new URL(UPSTREAM_LIST_RESOURCE, this.base);
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('offset', String(offset));
    return url;
  }

  async fetchPage(limit: number, offset: number, signal?: AbortSignal): Promise<UpstreamResult> {
    const url = this.listUrl(limit, offset);
    const href = url.toString();

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    else signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutMs = this.timeoutMs;
    const t =
      timeoutMs > 0
        ? setTimeout(() => controller.abort(new Error(`Upstream request timed out after ${timeoutMs}ms`)), timeoutMs)
        : null;

    try {
      let resp: Response;
      try {
        resp = await this.fetchImpl(url, {
          headers: { accept: 'application/json' },
          signal: controller.signal
        });
      } catch (err) {
        return fail(
          new UpstreamError(`Upstream request failed: ${describe(err)}`, 'transport', href, undefined, undefined, {
            cause: err
          })
        );
      }

      if (!resp.ok) {
        const text = await resp.text().catch(() => '');
        return fail(
          new UpstreamError(
            `Upstream responded with ${resp.status}`,
            'http',
            href,
            resp.status,
            text.slice(0, ERROR_DETAIL_MAX)
          )
        );
      }

      let json: unknown;
      try {
        json = await resp.json();
      } catch (err) {
        if (err instanceof SyntaxError) {
          return fail(
            new UpstreamError(`Upstream body is not valid JSON: ${err.message}`, 'decode', href, resp.status, undefined, {
              cause: err
            })
          );
        }
        return fail(
          new UpstreamError(`Upstream body could not be read: ${describe(err)}`, 'transport', href, resp.status, undefined, {
            cause: err
          })
        );
      }

      const parsed = UpstreamListPageSchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown';
        return fail(
          new UpstreamError(`Upstream response did not match expected shape (${where})`, 'decode', href, resp.status, undefined, {
            cause: parsed.error
          })
        );
      }
      return { ok: true, page: toUpstreamListPage(parsed.data) };
    } finally {
      if (t) clearTimeout(t);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
