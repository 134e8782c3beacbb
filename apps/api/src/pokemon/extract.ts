import { U32_MAX, type Pokemon, type UpstreamRecord } from '@pokedex-gateway/shared';
import { hasOpaquePath } from '../upstream/client.js';

export type ExtractErrorKind = 'malformed_url' | 'no_path_segments' | 'empty_segments' | 'non_numeric_id';

export class ExtractError extends Error {
  constructor(
    public readonly kind: ExtractErrorKind,
    public readonly reference: string
  ) {
    super(`Invalid url in pokemon response (${kind}): expecting url with numeric id in last segment`);
    this.name = 'ExtractError';
  }
}

export type ExtractResult = { ok: true; item: Pokemon } | { ok: false; error: ExtractError };

const DECIMAL = /^[0-9]+$/;

function fail(kind: ExtractErrorKind, reference: string): ExtractResult {
  return { ok: false, error: new ExtractError(kind, reference) };
}

/**
 * Path segments of a hierarchical URL. One trailing empty segment (from a
 * trailing slash) is dropped, so `/pokemon/25/` and `/pokemon/25` agree.
 */
export function pathSegments(url: URL): string[] {
  const segments = url.pathname.replace(/^\//, '').split('/');
  if (segments[segments.length - 1] === '') segments.pop();
  return segments;
}

export function extractPokemon(record: UpstreamRecord): ExtractResult {
  let url: URL;
  try {
    url = new URL(record.reference);
  } catch {
    return fail('malformed_url', record.reference);
  }
  if (hasOpaquePath(url)) return fail('no_path_segments', record.reference);

  const last = pathSegments(url).at(-1);
  if (last === undefined) return fail('empty_segments', record.reference);
  if (!DECIMAL.test(last)) return fail('non_numeric_id', record.reference);

  const id = Number(last);
  if (id > U32_MAX) return fail('non_numeric_id', record.reference);

  return { ok: true, item: { id, name: record.displayName } };
}
