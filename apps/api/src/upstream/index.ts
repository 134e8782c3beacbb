import type { Env } from '../env.js';
import { PokedexClient } from './client.js';

export function createPokedexClient(env: Env): PokedexClient {
  return new PokedexClient(env.upstreamBaseUrl, { timeoutMs: env.upstreamTimeoutMs });
}
