import { Hono } from 'hono';
import type { Env } from '../types';
import { generateCloze, submitCloze } from '../services/practice';
import { clozeGenerateSchema, clozeSubmitSchema } from './schemas';

const practice = new Hono<{ Bindings: Env }>();

// POST /api/practice/cloze/generate { cardIds?, topic?, limit? } -> { items }
practice.post('/cloze/generate', async (c) => {
  const input = clozeGenerateSchema.parse(await c.req.json());
  return c.json({ items: generateCloze(c.env.DB, input) });
});

// POST /api/practice/cloze/submit { cardId, userAnswer } -> { correct, nearCorrect, expected }
practice.post('/cloze/submit', async (c) => {
  const input = clozeSubmitSchema.parse(await c.req.json());
  return c.json(submitCloze(c.env.DB, input));
});

export default practice;
