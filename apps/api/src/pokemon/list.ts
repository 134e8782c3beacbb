import type { FastifyBaseLogger } from 'fastify';
import { DEFAULT_LIST_LIMIT, DEFAULT_LIST_OFFSET, type Pokemon } from '@pokedex-gateway/shared';
import type { PokedexClient } from '../upstream/client.js';
import { extractPokemon } from './extract.js';

export type PokemonPageSource = Pick<PokedexClient, 'fetchPage'>;

export type ListPokemonResult = { ok: true; items: Pokemon[] } | { ok: false };

// Failure detail goes to the log only.
export async function listPokemon(params: {
  client: PokemonPageSource;
  log: FastifyBaseLogger;
  limit?: number;
  offset?: number;
  signal?: AbortSignal;
}): Promise<ListPokemonResult> {
  const limit = params.limit ?? DEFAULT_LIST_LIMIT;
  const offset = params.offset ?? DEFAULT_LIST_OFFSET;
  params.log.info({ limit, offset }, 'listing pokemon');

  const fetched = await params.client.fetchPage(limit, offset, params.signal);
  if (!fetched.ok) {
    const { error } = fetched;
    params.log.error(
      { err: error, kind: error.kind, status: error.status, detail: error.detail, url: error.url },
      'upstream pokemon list failed'
    );
    return { ok: false };
  }

  const items: Pokemon[] = [];
  for (const [index, record] of fetched.page.results.entries()) {
    const extracted = extractPokemon(record);
    if (!extracted.ok) {
      params.log.error(
        { err: extracted.error, kind: extracted.error.kind, reference: record.reference, index },
        'invalid url in pokemon response'
      );
      return { ok: false };
    }
    items.push(extracted.item);
  }
  return { ok: true, items };
}
