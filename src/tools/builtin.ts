import { z } from 'zod';
import type { MemoryStore } from '../repository/memory-store.js';
import { normalizeCode, type ReferenceDataset } from '../repository/reference-dataset.js';
import type { Tool, ToolContext } from './types.js';

async function cached(ctx: ToolContext, key: string, load: () => Promise<unknown>): Promise<unknown> {
  if (ctx.cache.has(key)) {
    return ctx.cache.get(key);
  }
  const value = await load();
  ctx.cache.set(key, value);
  return value;
}

const checkMemoryArgs = z.object({
  product_description: z.string().min(1).describe('Product description to look up')
});

export function checkMemoryTool(memory: MemoryStore): Tool<z.infer<typeof checkMemoryArgs>> {
  return {
    name: 'check_memory',
    description:
      'Look up a previously confirmed classification for a product description. Cheap; call it first for every item.',
    schema: checkMemoryArgs,
    invoke: (args, ctx) =>
      cached(ctx, `memory:${args.product_description.toLowerCase()}`, async () => {
        const match = await memory.lookup(args.product_description);
        return match ? { found: true, ...match } : { found: false };
      })
  };
}

const verifyCodeArgs = z.object({
  code: z.string().min(2).describe('Tariff code, with or without dots')
});

export function verifyCodeTool(dataset: ReferenceDataset): Tool<z.infer<typeof verifyCodeArgs>> {
  return {
    name: 'verify_code',
    description: 'Check whether a tariff code exists in the reference dataset and return its official description.',
    schema: verifyCodeArgs,
    invoke: (args, ctx) =>
      cached(ctx, `code:${normalizeCode(args.code)}`, async () => {
        const record = await dataset.lookupByCode(args.code);
        return record ? { found: true, ...record } : { found: false, code: normalizeCode(args.code) };
      })
  };
}

const searchCodesArgs = z.object({
  prefix: z
    .string()
    .transform(normalizeCode)
    .pipe(z.string().regex(/^\d{2,10}$/, 'prefix must be 2-10 digits'))
    .describe('Leading digits of the code (chapter, heading or subheading)'),
  limit: z.number().int().min(1).max(50).default(20)
});

export function searchCodesTool(dataset: ReferenceDataset): Tool<z.infer<typeof searchCodesArgs>> {
  return {
    name: 'search_codes',
    description: 'List reference dataset codes under a chapter, heading or subheading prefix.',
    schema: searchCodesArgs,
    invoke: (args, ctx) =>
      cached(ctx, `prefix:${args.prefix}:${args.limit}`, async () => {
        const records = await dataset.searchPrefix(args.prefix, args.limit);
        return { found: records.length > 0, prefix: args.prefix, records };
      })
  };
}
