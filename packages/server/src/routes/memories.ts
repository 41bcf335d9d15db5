import { Hono, type Context } from 'hono';
import type { ZodError } from 'zod';
import {
  ValidationError,
  userQuerySchema,
  factsRequestSchema,
  ingestRequestSchema,
  listQuerySchema,
  reindexRequestSchema,
  searchQuerySchema,
} from '@tempora/shared';
import type { TemporalMemory } from '@tempora/core';

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError('request body is not valid JSON');
  }
}

function invalid(c: Context, error: ZodError) {
  return c.json(
    {
      error: 'Invalid request',
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    },
    400,
  );
}

export function memoriesRoutes(memory: TemporalMemory) {
  const router = new Hono();

  // Extract facts from a conversation and write them
  router.post('/', async (c) => {
    const parsed = ingestRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);

    const { userId, messages, sourceTurnId } = parsed.data;
    return c.json(await memory.add(messages, userId, sourceTurnId ?? null), 201);
  });

  // Write already-extracted candidates
  router.post('/facts', async (c) => {
    const parsed = factsRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);

    const { userId, candidates, sourceTurnId } = parsed.data;
    return c.json(await memory.writeFacts(candidates, userId, sourceTurnId ?? null), 201);
  });

  router.post('/reindex', async (c) => {
    const parsed = reindexRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json(await memory.reindex(parsed.data.ids));
  });

  router.get('/search', async (c) => {
    const parsed = searchQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return invalid(c, parsed.error);

    const { userId, q, limit, type, slot } = parsed.data;
    const result = await memory.search(userId, q, { limit, type, slot });
    return c.json({ degraded: result.degraded, reason: result.reason, results: result.results });
  });

  router.get('/', async (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json({ results: await memory.list(parsed.data.userId, parsed.data.status) });
  });

  router.get('/:id/history', async (c) => {
    const parsed = userQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json({ results: await memory.history(parsed.data.userId, c.req.param('id')) });
  });

  router.get('/:id', async (c) => {
    const parsed = userQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json(await memory.get(parsed.data.userId, c.req.param('id')));
  });

  router.delete('/:id', async (c) => {
    const parsed = userQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json(await memory.delete(parsed.data.userId, c.req.param('id')));
  });

  return router;
}
