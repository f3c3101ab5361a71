import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { Env } from './types';
import { AppError } from './errors';
import ai from './routes/ai';
import analytics from './routes/analytics';
import packs from './routes/packs';
import practice from './routes/practice';
import review from './routes/review';
import session from './routes/session';
import sync from './routes/sync';
import vocab from './routes/vocab';
import writing from './routes/writing';

const app = new Hono<{ Bindings: Env }>();

app.use('/api/*', cors({
  origin: (origin) => {
    // Allow localhost for development
    if (origin.includes('localhost') || origin.includes('127.0.0.1')) {
      return origin;
    }
    return null;
  },
}));

// Health check
app.get('/api/health', (c) => c.json({ status: 'ok' }));

app.route('/api/vocab', vocab);
app.route('/api/review', review);
app.route('/api/session', session);
app.route('/api/sync', sync);
app.route('/api/ai', ai);
app.route('/api/practice', practice);
app.route('/api/analytics', analytics);
app.route('/api/packs', packs);
app.route('/api/writing', writing);

app.notFound((c) => c.json({ error: 'Not found' }, 404));

app.onError((err, c) => {
  if (err instanceof AppError) {
    return c.json(err.toJSON(), err.status);
  }
  if (err instanceof ZodError) {
    const [first] = err.issues;
    return c.json(
      {
        error: first ? first.message : 'Invalid request',
        field: first ? first.path.join('.') : undefined,
        details: err.issues,
      },
      400
    );
  }
  if (err instanceof SyntaxError) {
    return c.json({ error: 'Request body is not valid JSON' }, 400);
  }
  if (err instanceof HTTPException) {
    return err.getResponse();
  }
  console.error(`[Server] ${c.req.method} ${c.req.path} failed:`, err);
  return c.json({ error: 'Internal server error' }, 500);
});

export default app;
