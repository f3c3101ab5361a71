import { Hono } from 'hono';
import type { CreateCardRequest, Env } from '../types';
import { RejectedEntryError, ValidationError } from '../errors';
import { getContentProvider } from '../services/ai';
import { upsertWithContent } from '../services/enrichment';
import { createCard, deleteCard, getCard, getCardReviews, listCards, updateCard } from '../services/cards';
import { validateTypedEntry } from '../services/vocab-guard';
import { normalizeTerm } from '../utils/normalize';
import { createCardSchema, listCardsQuerySchema, updateCardSchema, upsertCardSchema } from './schemas';

const vocab = new Hono<{ Bindings: Env }>();

// Typed entries that fail the lexical check are rejected with 422
async function guardEntry(env: Env, input: CreateCardRequest): Promise<void> {
  if (!normalizeTerm(input.term)) {
    throw new ValidationError('Term is empty after normalization', 'term');
  }

  const check = await validateTypedEntry(env.DB, getContentProvider(env), input);
  if (!check.accepted) {
    throw new RejectedEntryError('Input looks incorrect. Please review spelling/meaning before saving.', check);
  }
}

/**
 * POST /api/vocab
 *
 * Creates a card. When the normalized term already exists the stored card
 * is re-added instead: content is merged and its schedule penalized.
 *
 * Response: the card, 201 when created, 200 when re-added.
 */
vocab.post('/', async (c) => {
  const input = createCardSchema.parse(await c.req.json());
  await guardEntry(c.env, input);

  const outcome = createCard(c.env.DB, input);
  return c.json(outcome.card, outcome.action === 'created' ? 201 : 200);
});

/**
 * POST /api/vocab/upsert-with-ai
 *
 * Saves a card by term without the re-add penalty, then tops up its content.
 * Body: card fields plus overwriteExisting, useAi, forceAi.
 * Response: { action, overwritten, card, ai, suggestions }, 201 when created.
 */
vocab.post('/upsert-with-ai', async (c) => {
  const input = upsertCardSchema.parse(await c.req.json());
  await guardEntry(c.env, input);

  const result = await upsertWithContent(c.env.DB, getContentProvider(c.env), input);
  return c.json(result, result.action === 'created' ? 201 : 200);
});

vocab.get('/', (c) => {
  const query = listCardsQuerySchema.parse(c.req.query());
  return c.json(listCards(c.env.DB, query));
});

vocab.get('/:id', (c) => {
  return c.json(getCard(c.env.DB, c.req.param('id')));
});

vocab.get('/:id/reviews', (c) => {
  return c.json(getCardReviews(c.env.DB, c.req.param('id')));
});

vocab.put('/:id', async (c) => {
  const patch = updateCardSchema.parse(await c.req.json());
  return c.json(updateCard(c.env.DB, c.req.param('id'), patch));
});

vocab.delete('/:id', (c) => {
  deleteCard(c.env.DB, c.req.param('id'));
  return c.json({ success: true });
});

export default vocab;
