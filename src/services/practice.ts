import type { Card, ClozeItem, ClozeResult, Database, PracticeLog, SpeakingFeedback } from '../types';
import { getCardsByIds, insertPracticeLog, listCardsByDue, listCards } from '../db/queries';
import { ValidationError } from '../errors';
import type { SpeakingInput } from './ai';
import { getCard, isNearCorrect } from './cards';

export const CLOZE_BLANK = '____';

export interface ClozeRequest {
  cardIds?: string[];
  topic?: string;
  limit?: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function pickClozeCards(db: Database, request: ClozeRequest, limit: number): Card[] {
  const ids = request.cardIds ?? [];
  const topic = request.topic?.trim();

  let cards: Card[];
  if (ids.length > 0) {
    cards = getCardsByIds(db, ids, limit);
  } else {
    cards = listCards(db, { topic: topic || undefined, page: 1, limit }).cards;
  }
  return cards.length > 0 ? cards : listCardsByDue(db, limit);
}

/**
 * Build a fill-in-the-blank question from a card: its example sentence with
 * the term blanked out, or a question about its first meaning.
 */
export function buildClozeItem(card: Card): ClozeItem | null {
  const term = card.term.trim();
  if (!term) return null;

  const meaning = card.meanings[0] ?? null;
  const example = card.exampleEn?.trim() ?? '';
  const pattern = new RegExp(escapeRegExp(term), 'i');

  let question: string;
  let hint: string | null = null;
  if (example && pattern.test(example)) {
    question = example.replace(pattern, CLOZE_BLANK);
    hint = meaning ? `Meaning: ${meaning}` : null;
  } else {
    question = `Fill in the blank: ${CLOZE_BLANK} means '${meaning ?? ''}'.`;
  }

  return {
    cardId: card.id,
    term,
    ipa: card.ipa,
    question,
    hint,
    acceptableAnswers: [term, ...card.phrases],
  };
}

export function generateCloze(db: Database, request: ClozeRequest): ClozeItem[] {
  const limit = request.limit ?? 5;
  if (!Number.isInteger(limit) || limit < 1 || limit > 30) {
    throw new ValidationError('limit must be between 1 and 30', 'limit');
  }

  return pickClozeCards(db, request, limit)
    .map(buildClozeItem)
    .filter((item): item is ClozeItem => item !== null);
}

/**
 * Check a cloze answer and log the attempt. The card's schedule is not
 * touched.
 */
export function submitCloze(
  db: Database,
  input: { cardId: string; userAnswer: string },
  now: Date = new Date()
): ClozeResult {
  const card = getCard(db, input.cardId);
  const answer = input.userAnswer.trim().toLowerCase();

  const correct = answer === card.term.trim().toLowerCase();
  const nearCorrect = isNearCorrect(input.userAnswer, [card.term, ...card.phrases]);

  insertPracticeLog(
    db,
    'cloze_submit',
    card.id,
    { correct, nearCorrect, userAnswer: input.userAnswer },
    now.toISOString()
  );

  return { correct, nearCorrect, expected: card.term };
}

export function recordSpeakingFeedback(
  db: Database,
  input: SpeakingInput,
  feedback: SpeakingFeedback & { provider: string },
  now: Date = new Date()
): PracticeLog {
  return insertPracticeLog(
    db,
    'speaking_feedback',
    null,
    {
      prompt: input.prompt,
      responseText: input.responseText,
      targetWords: input.targetWords,
      feedback,
    },
    now.toISOString()
  );
}
