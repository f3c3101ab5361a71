import { Hono } from 'hono';
import type { Env } from '../types';
import { addCardToPack, createPack, getPack, getPackSession, listPacks } from '../services/packs';
import { createPackSchema, packCardSchema, packSessionQuerySchema, pageQuerySchema } from './schemas';

const packs = new Hono<{ Bindings: Env }>();

packs.post('/', async (c) => {
  const input = createPackSchema.parse(await c.req.json());
  return c.json(createPack(c.env.DB, input), 201);
});

packs.get('/', (c) => {
  const { page, limit } = pageQuerySchema.parse(c.req.query());
  return c.json(listPacks(c.env.DB, page, limit));
});

packs.get('/:id', (c) => {
  return c.json(getPack(c.env.DB, c.req.param('id')));
});

packs.post('/:id/cards', async (c) => {
  const { cardId } = packCardSchema.parse(await c.req.json());
  return c.json(addCardToPack(c.env.DB, c.req.param('id'), cardId));
});

// GET /api/packs/:id/session?limit=20 -> { pack, cards } earliest due first
packs.get('/:id/session', (c) => {
  const { limit } = packSessionQuerySchema.parse(c.req.query());
  return c.json(getPackSession(c.env.DB, c.req.param('id'), limit));
});

export default packs;
