import { z } from 'zod';

// Request bodies shared by the route modules

const cefrLevel = z.enum(['A1', 'A2', 'B1', 'B2', 'C1', 'C2']);
const stringList = z.array(z.string());

export const cardFieldsSchema = z.object({
  term: z.string().min(1),
  meanings: stringList.optional(),
  ipa: z.string().nullish(),
  exampleEn: z.string().nullish(),
  exampleVi: z.string().nullish(),
  mnemonic: z.string().nullish(),
  tags: stringList.optional(),
  collocations: stringList.optional(),
  phrases: stringList.optional(),
  wordFamily: z.record(stringList).optional(),
  topics: stringList.optional(),
  cefrLevel: cefrLevel.nullish(),
  ieltsBand: z.number().min(1).max(9).nullish(),
});

export const createCardSchema = cardFieldsSchema.extend({
  inputMethod: z.enum(['typed', 'pasted']).optional(),
});

export const updateCardSchema = cardFieldsSchema.partial();

export const listCardsQuerySchema = z.object({
  search: z.string().optional(),
  tag: z.string().optional(),
  topic: z.string().optional(),
  cefrLevel: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const reviewSchema = z.object({
  cardId: z.string().min(1),
  mode: z.enum(['flip', 'mcq', 'typing']),
  questionType: z.enum(['term_to_meaning', 'meaning_to_term']),
  grade: z.number().int().min(0).max(5),
  userAnswer: z.string().nullish(),
  expectedUpdatedAt: z.string().optional(),
});

export const sessionQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(30),
});

export const enrichSchema = z.object({
  term: z.string().min(1),
  meaningsExisting: stringList.default([]),
});

export const judgeSchema = z.object({
  term: z.string().min(1),
  userAnswer: z.string().min(1),
  meanings: stringList.default([]),
});

export const speakingFeedbackSchema = z.object({
  prompt: z.string().min(1),
  responseText: z.string().min(1),
  targetWords: stringList.default([]),
});

export const upsertCardSchema = createCardSchema.extend({
  overwriteExisting: z.boolean().default(true),
  useAi: z.boolean().default(true),
  forceAi: z.boolean().default(false),
});

export const clozeGenerateSchema = z.object({
  cardIds: z.array(z.string()).default([]),
  topic: z.string().optional(),
  limit: z.number().int().min(1).max(30).default(5),
});

export const clozeSubmitSchema = z.object({
  cardId: z.string().min(1),
  userAnswer: z.string().min(1),
});

export const analyticsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export const createPackSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().nullish(),
  topics: stringList.default([]),
  targetBand: z.number().min(1).max(9).nullish(),
  cardIds: stringList.default([]),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export const packCardSchema = z.object({
  cardId: z.string().min(1),
});

export const packSessionQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const writingCategory = z.enum(['grammar', 'word_choice', 'collocation', 'spelling', 'cohesion', 'task_response']);

export const writingErrorSchema = z.object({
  sentence: z.string().trim().min(1),
  correctedSentence: z.string().trim().min(1),
  category: writingCategory,
  notes: z.string().nullish(),
  topic: z.string().nullish(),
});

export const writingErrorQuerySchema = pageQuerySchema.extend({
  category: writingCategory.optional(),
  topic: z.string().optional(),
});

export const writingDeckQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});
