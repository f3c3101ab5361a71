import { Hono } from 'hono';
import type { Env } from '../types';
import { submitReview } from '../services/cards';
import { reviewSchema } from './schemas';

const review = new Hono<{ Bindings: Env }>();

/**
 * POST /api/review
 *
 * Request body: { cardId, mode, questionType, grade, userAnswer?, expectedUpdatedAt? }
 * Response: { card, nextDueAt, intervalDays, easeFactor, repetitions, lapses }
 *
 * 409 when the card changed after the client loaded it.
 */
review.post('/', async (c) => {
  const input = reviewSchema.parse(await c.req.json());
  return c.json(submitReview(c.env.DB, input));
});

export default review;
