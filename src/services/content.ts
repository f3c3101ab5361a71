import { z } from 'zod';
import type {
  ContentBundle,
  EntryValidation,
  ExamplePair,
  JudgeVerdict,
  SpeakingFeedback,
} from '../types';
import { isRecord, optionalText, uniqueStrings } from '../utils/normalize';
import { clamp } from './sm2';

// ============ Content shapes ============
// Model output is loosely typed; each field falls back instead of failing
// the whole object.

const stringList = z.unknown().transform((value) => uniqueStrings(value));

const examplePairSchema = z.object({
  en: z.string().trim().min(1),
  vi: z.string().trim().min(1),
});

export const judgeVerdictSchema = z.object({
  isEquivalent: z.boolean().catch(false),
  reasonShort: z.string().trim().catch(''),
});

export const entryValidationSchema = z.object({
  isTermValid: z.boolean().catch(true),
  isMeaningPlausible: z.boolean().catch(true),
  suggestedTerm: z.string().trim().catch(''),
  suggestedMeanings: stringList,
  reasonShort: z.string().trim().catch(''),
});

export const speakingFeedbackSchema = z.object({
  estimatedBand: z.coerce
    .number()
    .catch(5)
    .transform((band) => clamp(Math.round(band * 10) / 10, 1, 9)),
  targetCoverage: z.coerce.number().catch(0),
  usedTargetWords: stringList,
  strengths: stringList,
  improvements: stringList,
  reasonShort: z.string().trim().catch(''),
});

export function normalizeExamples(value: unknown): ExamplePair[] {
  if (!Array.isArray(value)) return [];
  const examples: ExamplePair[] = [];
  for (const item of value) {
    const parsed = examplePairSchema.safeParse(item);
    if (parsed.success) examples.push(parsed.data);
  }
  return examples;
}

export function normalizeSynonymGroups(value: unknown): string[][] {
  if (!Array.isArray(value)) return [];
  return value.map((group) => uniqueStrings(group)).filter((group) => group.length > 0);
}

export function parseJudgeVerdict(value: unknown): JudgeVerdict | null {
  const parsed = judgeVerdictSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseEntryValidation(value: unknown): EntryValidation | null {
  const parsed = entryValidationSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseSpeakingFeedback(value: unknown): SpeakingFeedback | null {
  const parsed = speakingFeedbackSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Read a content bundle from untrusted JSON (stored cache rows, model
 * output). Only keys present in the input appear in the result.
 */
export function parseContentBundle(value: unknown): ContentBundle {
  if (!isRecord(value)) return {};
  const bundle: ContentBundle = {};

  if ('examples' in value) bundle.examples = normalizeExamples(value.examples);
  if ('mnemonics' in value) bundle.mnemonics = uniqueStrings(value.mnemonics);
  if ('meaningVariants' in value) bundle.meaningVariants = uniqueStrings(value.meaningVariants);
  if ('synonymGroups' in value) bundle.synonymGroups = normalizeSynonymGroups(value.synonymGroups);
  if ('distractors' in value) bundle.distractors = uniqueStrings(value.distractors);
  if ('ipa' in value) bundle.ipa = optionalText(value.ipa);

  if ('judge' in value) {
    const judge = parseJudgeVerdict(value.judge);
    if (judge) bundle.judge = judge;
  }
  if ('validate' in value) {
    const validate = parseEntryValidation(value.validate);
    if (validate) bundle.validate = validate;
  }

  return bundle;
}

/**
 * Pull the first JSON object out of a model reply that may be wrapped in
 * prose or a code fence.
 */
export function extractJsonObject(text: string): Record<string, unknown> {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return {};
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return isRecord(parsed) ? parsed : {};
  } catch (err) {
    if (err instanceof SyntaxError) return {};
    throw err;
  }
}
