import 'dotenv/config';
import { loadEnv } from './env.js';
import { createPokedexClient } from './upstream/index.js';
import { buildApp } from './app.js';

const env = loadEnv();
// Throws ConfigError on a bad UPSTREAM_BASE_URL, before anything listens.
const pokedex = createPokedexClient(env);
const app = await buildApp({ env, pokedex });

await app.listen({ port: env.port, host: env.host });
app.log.info(`pokedex gateway listening on :${env.port}, upstream ${pokedex.base.href}`);
