import type { Context, Next } from 'hono';

/** Static bearer-token check. There are no users or roles behind it. */
export function apiKeyMiddleware(apiKey: string) {
  return async (c: Context, next: Next) => {
    const authHeader = c.req.header('Authorization');

    if (!authHeader) {
      return c.json({ error: 'Authentication required' }, 401);
    }
    if (!authHeader.startsWith('Bearer ') || authHeader.slice(7) !== apiKey) {
      return c.json({ error: 'Invalid API key' }, 401);
    }

    return next();
  };
}
