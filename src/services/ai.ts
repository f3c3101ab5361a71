import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBundle,
  EntryValidation,
  Env,
  JudgeVerdict,
  SpeakingFeedback,
} from '../types';
import { uniqueStrings } from '../utils/normalize';
import {
  entryValidationSchema,
  extractJsonObject,
  judgeVerdictSchema,
  normalizeExamples,
  speakingFeedbackSchema,
} from './content';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

export interface EnrichMissing {
  needExamples: boolean;
  needMnemonics: boolean;
  needMeaningVariants: boolean;
  needIpa: boolean;
}

export function needsAnything(missing: EnrichMissing): boolean {
  return missing.needExamples || missing.needMnemonics || missing.needMeaningVariants || missing.needIpa;
}

export interface EnrichInput {
  term: string;
  meanings: string[];
  missing: EnrichMissing;
}

export interface JudgeInput {
  term: string;
  userAnswer: string;
  meanings: string[];
}

export interface ValidateInput {
  term: string;
  meanings: string[];
}

export interface SpeakingInput {
  prompt: string;
  responseText: string;
  targetWords: string[];
}

/**
 * Source of learning content. Callers only rely on the returned shapes,
 * never on which implementation answered.
 */
export interface ContentProvider {
  readonly name: string;
  enrich(input: EnrichInput): Promise<ContentBundle>;
  judgeEquivalence(input: JudgeInput): Promise<JudgeVerdict>;
  validateEntry(input: ValidateInput): Promise<EntryValidation>;
  speakingFeedback(input: SpeakingInput): Promise<SpeakingFeedback>;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// ============ Deterministic local provider ============

export class StubContentProvider implements ContentProvider {
  readonly name = 'stub';

  async enrich({ term, meanings, missing }: EnrichInput): Promise<ContentBundle> {
    const data: ContentBundle = {};
    if (missing.needExamples) {
      data.examples = [
        {
          en: `I used '${term}' in a sentence today.`,
          vi: `Hom nay toi da dung tu '${term}' trong mot cau.`,
        },
      ];
    }
    if (missing.needMnemonics) {
      data.mnemonics = [`Think of '${term}' as a keyword tied to a memorable scene.`];
    }
    if (missing.needMeaningVariants) {
      const seed = meanings[0] ?? term;
      data.meaningVariants = [seed, `${seed} (alternate)`];
    }
    if (missing.needIpa) {
      const cleaned = term.trim().toLowerCase();
      data.ipa = cleaned ? `/${cleaned}/` : null;
    }
    return data;
  }

  async judgeEquivalence({ userAnswer, meanings }: JudgeInput): Promise<JudgeVerdict> {
    const answer = userAnswer.trim().toLowerCase();
    const isEquivalent = answer !== '' && meanings.some((meaning) => meaning.toLowerCase().includes(answer));
    return { isEquivalent, reasonShort: 'stub semantic check' };
  }

  async validateEntry({ term, meanings }: ValidateInput): Promise<EntryValidation> {
    const rawTerm = term.trim();
    const looksInvalidTerm = rawTerm.length < 2 || /\d/.test(rawTerm);
    const cleanedMeanings = meanings.map((meaning) => meaning.trim()).filter(Boolean);
    const looksInvalidMeanings = cleanedMeanings.some((meaning) => meaning.length < 2);

    return {
      isTermValid: !looksInvalidTerm,
      isMeaningPlausible: !looksInvalidMeanings,
      suggestedTerm: looksInvalidTerm ? rawTerm.toLowerCase() : rawTerm,
      suggestedMeanings: cleanedMeanings,
      reasonShort: 'stub lexical check',
    };
  }

  async speakingFeedback({ responseText, targetWords }: SpeakingInput): Promise<SpeakingFeedback> {
    const words = responseText.trim().split(/\s+/).filter(Boolean);
    const uniqueRatio = new Set(words.map((word) => word.toLowerCase())).size / Math.max(words.length, 1);
    const lowered = responseText.toLowerCase();
    const usedTargetWords = targetWords.filter((word) => lowered.includes(word.toLowerCase()));

    return {
      estimatedBand: round(Math.min(9, Math.max(3, 4.5 + uniqueRatio * 4)), 1),
      targetCoverage: targetWords.length > 0 ? round(usedTargetWords.length / targetWords.length, 2) : 0,
      usedTargetWords,
      strengths: words.length > 0 ? ['clear response'] : [],
      improvements: [
        'use more precise IELTS topic vocabulary',
        'add one collocation and one complex sentence',
      ],
      reasonShort: 'stub speaking feedback',
    };
  }
}

// ============ Anthropic provider ============

const SYSTEM_PROMPT = `You are an English vocabulary tutor for Vietnamese-speaking IELTS learners.
Answer with a single JSON object and nothing else. No markdown.`;

export class AnthropicContentProvider implements ContentProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string = DEFAULT_ANTHROPIC_MODEL
  ) {
    this.client = new Anthropic({ apiKey });
  }

  private async completeJson(prompt: string, maxTokens: number): Promise<Record<string, unknown>> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
    });

    const textContent = response.content.find((c) => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in AI response');
    }
    return extractJsonObject(textContent.text);
  }

  async enrich({ term, meanings, missing }: EnrichInput): Promise<ContentBundle> {
    const prompt = `term=${JSON.stringify(term)}; meanings=${JSON.stringify(meanings)}
need_examples=${missing.needExamples}; need_mnemonics=${missing.needMnemonics}; need_meaning_variants=${missing.needMeaningVariants}; need_ipa=${missing.needIpa}

Allowed keys: examples, mnemonics, meaningVariants, ipa.
- examples: array of {"en": English sentence, "vi": Vietnamese translation}
- mnemonics: array of strings
- meaningVariants: array of Vietnamese meanings
- ipa: string`;

    const parsed = await this.completeJson(prompt, 400);

    const result: ContentBundle = {};
    if (missing.needExamples) {
      const examples = normalizeExamples(parsed.examples);
      result.examples =
        examples.length > 0 ? examples : [{ en: `I used '${term}' in a sentence today.`, vi: `Hom nay toi da dung tu '${term}'.` }];
    }
    if (missing.needMnemonics) {
      result.mnemonics = uniqueStrings(parsed.mnemonics);
    }
    if (missing.needMeaningVariants) {
      result.meaningVariants = uniqueStrings(parsed.meaningVariants);
    }
    if (missing.needIpa) {
      const ipa = typeof parsed.ipa === 'string' ? parsed.ipa.trim() : '';
      result.ipa = ipa || null;
    }
    return result;
  }

  async judgeEquivalence({ term, userAnswer, meanings }: JudgeInput): Promise<JudgeVerdict> {
    const prompt = `Does the learner's answer mean the same as one of the reference meanings?
term=${JSON.stringify(term)}; userAnswer=${JSON.stringify(userAnswer)}; referenceMeanings=${JSON.stringify(meanings)}

Respond in this exact format: {"isEquivalent": boolean, "reasonShort": string}`;

    const verdict = judgeVerdictSchema.parse(await this.completeJson(prompt, 150));
    return { ...verdict, reasonShort: verdict.reasonShort || 'ai semantic check' };
  }

  async validateEntry({ term, meanings }: ValidateInput): Promise<EntryValidation> {
    const prompt = `Check whether the term is a correctly spelled English word or phrase and whether the meanings are plausible for it.
term=${JSON.stringify(term)}; meanings=${JSON.stringify(meanings)}

Respond in this exact format:
{"isTermValid": boolean, "isMeaningPlausible": boolean, "suggestedTerm": string, "suggestedMeanings": string[], "reasonShort": string}`;

    const validation = entryValidationSchema.parse(await this.completeJson(prompt, 250));
    return {
      ...validation,
      suggestedTerm: validation.suggestedTerm || term.trim(),
      reasonShort: validation.reasonShort || 'ai vocab validation',
    };
  }

  async speakingFeedback({ prompt, responseText, targetWords }: SpeakingInput): Promise<SpeakingFeedback> {
    const request = `Score the lexical resource of an IELTS speaking answer.
prompt=${JSON.stringify(prompt)}; userResponse=${JSON.stringify(responseText)}; targetWords=${JSON.stringify(targetWords)}

Respond in this exact format:
{"estimatedBand": number, "targetCoverage": number, "usedTargetWords": string[], "strengths": string[], "improvements": string[], "reasonShort": string}`;

    const feedback = speakingFeedbackSchema.parse(await this.completeJson(request, 400));
    return { ...feedback, reasonShort: feedback.reasonShort || 'ai speaking feedback' };
  }
}

/**
 * Pick the provider for a request: an injected one first, then Anthropic
 * when a key is configured, else the local stub.
 */
export function getContentProvider(env: Env): ContentProvider {
  if (env.AI) return env.AI;
  if (env.ANTHROPIC_API_KEY) {
    return new AnthropicContentProvider(env.ANTHROPIC_API_KEY, env.ANTHROPIC_MODEL || DEFAULT_ANTHROPIC_MODEL);
  }
  return new StubContentProvider();
}
