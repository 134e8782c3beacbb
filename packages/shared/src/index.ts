import { z } from 'zod';

export const UPSTREAM_LIST_RESOURCE = 'pokemon';
export const DEFAULT_LIST_LIMIT = 20;
export const DEFAULT_LIST_OFFSET = 0;
export const U32_MAX = 4_294_967_295;

export const UpstreamRecordSchema = z
  .object({
    url: z.string(),
    name: z.string()
  })
  .passthrough();

export const UpstreamListPageSchema = z
  .object({
    count: z.number().int().nonnegative(),
    next: z.string().nullable().optional(),
    previous: z.string().nullable().optional(),
    results: z.array(UpstreamRecordSchema)
  })
  .passthrough();

export type UpstreamListPageWire = z.infer<typeof UpstreamListPageSchema>;

export type UpstreamRecord = {
  reference: string;
  displayName: string;
};

export type UpstreamListPage = {
  count: number;
  next: string | null;
  previous: string | null;
  results: UpstreamRecord[];
};

export function toUpstreamListPage(wire: UpstreamListPageWire): UpstreamListPage {
  return {
    count: wire.count,
    next: wire.next ?? null,
    previous: wire.previous ?? null,
    results: wire.results.map((r) => ({ reference: r.url, displayName: r.name }))
  };
}

export const PokemonSchema = z.object({
  id: z.number().int().min(0).max(U32_MAX),
  name: z.string()
});

export type Pokemon = z.infer<typeof PokemonSchema>;

const U32Param = z
  .string()
  .regex(/^[0-9]+$/, 'Expected an unsigned base-10 integer')
  .transform(Number)
  .pipe(z.number().int().max(U32_MAX));

export const ListPokemonQuerySchema = z.object({
  limit: U32Param.optional(),
  offset: U32Param.optional()
});
