import { Hono } from 'hono';
import type { Env } from '../types';
import { getContentProvider } from '../services/ai';
import { enrichTerm, judgeAnswer, speakingFeedback } from '../services/enrichment';
import { recordSpeakingFeedback } from '../services/practice';
import { enrichSchema, judgeSchema, speakingFeedbackSchema } from './schemas';

const ai = new Hono<{ Bindings: Env }>();

ai.post('/enrich', async (c) => {
  const input = enrichSchema.parse(await c.req.json());
  return c.json(await enrichTerm(c.env.DB, getContentProvider(c.env), input));
});

ai.post('/judge', async (c) => {
  const input = judgeSchema.parse(await c.req.json());
  return c.json(await judgeAnswer(c.env.DB, getContentProvider(c.env), input));
});

ai.post('/speaking-feedback', async (c) => {
  const input = speakingFeedbackSchema.parse(await c.req.json());
  const feedback = await speakingFeedback(getContentProvider(c.env), input);
  const log = recordSpeakingFeedback(c.env.DB, input, feedback);
  return c.json({ ...feedback, createdAt: log.createdAt });
});

export default ai;
