import Fastify, { type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { z } from 'zod';
import { DEFAULT_LIST_LIMIT, DEFAULT_LIST_OFFSET, ListPokemonQuerySchema, U32_MAX } from '@pokedex-gateway/shared';
import type { Env } from './env.js';
import { listPokemon, type PokemonPageSource } from './pokemon/list.js';

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, reply: FastifyReply) {
  const result = schema.safeParse(input);
  if (!result.success) {
    reply.code(400).send({ error: 'Invalid request', issues: result.error.flatten() });
    return null;
  }
  return result.data;
}

const listPokemonRouteSchema = {
  summary: 'List pokemon',
  description: 'One page of pokemon from the upstream API, reduced to numeric id and name.',
  tags: ['pokemon'],
  querystring: {
    type: 'object',
    properties: {
      limit: {
        type: 'integer',
        minimum: 0,
        maximum: U32_MAX,
        description: `Page size (default ${DEFAULT_LIST_LIMIT})`
      },
      offset: {
        type: 'integer',
        minimum: 0,
        maximum: U32_MAX,
        description: `Records to skip (default ${DEFAULT_LIST_OFFSET})`
      }
    }
  },
  response: {
    200: {
      description: 'Pokemon in upstream order',
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name'],
        properties: {
          id: { type: 'integer', minimum: 0 },
          name: { type: 'string' }
        }
      }
    },
    500: {
      description: 'Upstream request or response transformation failed',
      type: 'null'
    }
  }
};

export async function buildApp(params: { env: Env; pokedex: PokemonPageSource }) {
  const fastify = Fastify({
    logger: { level: params.env.logLevel },
    trustProxy: true,
    routerOptions: { ignoreTrailingSlash: true }
  });

  await fastify.register(cors, { origin: true });
  await fastify.register(rateLimit, { global: false });

  await fastify.register(swagger, {
    mode: 'dynamic',
    openapi: {
      info: {
        title: 'Pokedex gateway',
        description: 'Read-only pokemon listing backed by a paginated upstream API.',
        version: params.env.serviceVersion
      },
      servers: [{ url: params.env.publicBaseUrl }]
    }
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list'
    }
  });

  fastify.get('/', { schema: { hide: true } }, async (_request, reply) => reply.redirect('/docs'));

  fastify.get('/api/openapi.json', { schema: { hide: true } }, async () => fastify.swagger());

  fastify.get('/health', { schema: { hide: true } }, async () => ({
    status: 'ok',
    service: 'pokedex-gateway-api',
    version: params.env.serviceVersion,
    upstream: params.env.upstreamBaseUrl,
    ts: new Date().toISOString()
  }));

  fastify.get(
    '/api/pokemon',
    {
      schema: listPokemonRouteSchema,
      // querystring schema is for the OpenAPI document; zod below checks the raw strings
      validatorCompiler: () => () => true,
      config: {
        rateLimit: { max: params.env.rateLimitMax, timeWindow: params.env.rateLimitWindowMs }
      }
    },
    async (request, reply) => {
      const query = parse(ListPokemonQuerySchema, request.query, reply);
      if (!query) return reply;

      const controller = new AbortController();
      reply.raw.on('close', () => {
        if (!reply.raw.writableFinished) controller.abort(new Error('client disconnected'));
      });

      const result = await listPokemon({
        client: params.pokedex,
        log: request.log,
        limit: query.limit,
        offset: query.offset,
        signal: controller.signal
      });
      if (!result.ok) return reply.code(500).send();
      return result.items;
    }
  );

  return fastify;
}
