import { Hono } from 'hono';
import type { Env } from '../types';
import { addWritingError, deleteWritingError, getWritingDeck, listWritingErrors } from '../services/writing';
import { writingDeckQuerySchema, writingErrorQuerySchema, writingErrorSchema } from './schemas';

const writing = new Hono<{ Bindings: Env }>();

/**
 * POST /api/writing/error-bank
 *
 * Records a mistake with its correction. Repeats of a known mistake bump
 * its count instead of adding a row.
 */
writing.post('/error-bank', async (c) => {
  const input = writingErrorSchema.parse(await c.req.json());
  return c.json(addWritingError(c.env.DB, input));
});

writing.get('/error-bank', (c) => {
  const query = writingErrorQuerySchema.parse(c.req.query());
  return c.json(listWritingErrors(c.env.DB, query));
});

writing.get('/error-bank/deck', (c) => {
  const { limit } = writingDeckQuerySchema.parse(c.req.query());
  return c.json({ items: getWritingDeck(c.env.DB, limit) });
});

writing.delete('/error-bank/:id', (c) => {
  deleteWritingError(c.env.DB, c.req.param('id'));
  return c.json({ deleted: true });
});

export default writing;
