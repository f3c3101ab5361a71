import type BetterSqlite3 from 'better-sqlite3';
import type { ContentProvider } from './services/ai';

export type Database = BetterSqlite3.Database;

// Process bindings handed to every request
export interface Env {
  DB: Database;
  LOCAL_TZ: string;
  ENVIRONMENT: string;
  ANTHROPIC_API_KEY?: string;
  ANTHROPIC_MODEL?: string;
  // Injected provider (tests, alternative backends); overrides key-based selection
  AI?: ContentProvider;
}

// Review modes
export type ReviewMode = 'flip' | 'mcq' | 'typing';
export type QuestionType = 'term_to_meaning' | 'meaning_to_term';

export const REVIEW_MODES: readonly ReviewMode[] = ['flip', 'mcq', 'typing'];
export const QUESTION_TYPES: readonly QuestionType[] = ['term_to_meaning', 'meaning_to_term'];

export type CefrLevel = 'A1' | 'A2' | 'B1' | 'B2' | 'C1' | 'C2';
export const CEFR_LEVELS: readonly CefrLevel[] = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'];

export type InputMethod = 'typed' | 'pasted';

// Part of speech / role -> related words
export type WordFamily = Record<string, string[]>;

// Audit event types written by the app itself
export type EventType = 'RE_ADD' | 'EXPORT' | 'IMPORT';

// ============ Database models ============

export interface CardContent {
  term: string;
  termNormalized: string;
  meanings: string[];
  ipa: string | null;
  exampleEn: string | null;
  exampleVi: string | null;
  mnemonic: string | null;
  tags: string[];
  collocations: string[];
  phrases: string[];
  wordFamily: WordFamily;
  topics: string[];
  cefrLevel: CefrLevel | null;
  ieltsBand: number | null;
}

export interface CardSchedule {
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  lapses: number;
  dueAt: string;
  lastReviewedAt: string | null;
  readdCount: number;
  lastReaddAt: string | null;
}

export interface Card extends CardContent, CardSchedule {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export interface ReviewLog {
  id: string;
  cardId: string;
  mode: ReviewMode;
  questionType: QuestionType;
  grade: number;
  userAnswer: string | null;
  isNearCorrect: boolean | null;
  createdAt: string;
}

export interface AuditEvent {
  id: string;
  type: string;
  payload: Record<string, unknown>;
  createdAt: string;
}

export type PracticeType = 'cloze_submit' | 'speaking_feedback';

export interface PracticeLog {
  id: string;
  type: PracticeType;
  cardId: string | null;
  payload: Record<string, unknown>;
  createdAt: string;
}

export interface TopicPack {
  id: string;
  name: string;
  description: string | null;
  topics: string[];
  targetBand: number | null;
  cardIds: string[];
  createdAt: string;
  updatedAt: string;
}

export type WritingErrorCategory =
  | 'grammar'
  | 'word_choice'
  | 'collocation'
  | 'spelling'
  | 'cohesion'
  | 'task_response';

export const WRITING_ERROR_CATEGORIES: readonly WritingErrorCategory[] = [
  'grammar',
  'word_choice',
  'collocation',
  'spelling',
  'cohesion',
  'task_response',
];

export interface WritingError {
  id: string;
  sentence: string;
  correctedSentence: string;
  category: WritingErrorCategory;
  notes: string | null;
  topic: string | null;
  count: number;
  createdAt: string;
  updatedAt: string;
}

export interface AICacheEntry {
  key: string;
  termNormalized: string;
  version: string;
  provider: string;
  data: ContentBundle;
  createdAt: string;
  updatedAt: string;
}

// ============ AI content ============

export interface ExamplePair {
  en: string;
  vi: string;
}

export interface JudgeVerdict {
  isEquivalent: boolean;
  reasonShort: string;
}

export interface EntryValidation {
  isTermValid: boolean;
  isMeaningPlausible: boolean;
  suggestedTerm: string;
  suggestedMeanings: string[];
  reasonShort: string;
}

export interface SpeakingFeedback {
  estimatedBand: number;
  targetCoverage: number;
  usedTargetWords: string[];
  strengths: string[];
  improvements: string[];
  reasonShort: string;
}

export interface ContentBundle {
  examples?: ExamplePair[];
  mnemonics?: string[];
  meaningVariants?: string[];
  synonymGroups?: string[][];
  distractors?: string[];
  judge?: JudgeVerdict;
  validate?: EntryValidation;
  ipa?: string | null;
}

// ============ API request/response types ============

export interface CreateCardRequest {
  term: string;
  meanings?: string[];
  ipa?: string | null;
  exampleEn?: string | null;
  exampleVi?: string | null;
  mnemonic?: string | null;
  tags?: string[];
  collocations?: string[];
  phrases?: string[];
  wordFamily?: WordFamily;
  topics?: string[];
  cefrLevel?: CefrLevel | null;
  ieltsBand?: number | null;
  inputMethod?: InputMethod;
}

export type UpdateCardRequest = Partial<Omit<CreateCardRequest, 'inputMethod'>>;

export interface UpsertCardRequest extends CreateCardRequest {
  // Replace differing stored content instead of merging into it
  overwriteExisting?: boolean;
  useAi?: boolean;
  forceAi?: boolean;
}

export interface ListCardsQuery {
  search?: string;
  tag?: string;
  topic?: string;
  cefrLevel?: string;
  page: number;
  limit: number;
}

export interface ReviewSubmission {
  cardId: string;
  mode: ReviewMode;
  questionType: QuestionType;
  grade: number;
  userAnswer?: string | null;
  // Card version the client graded against; a mismatch rejects the review
  expectedUpdatedAt?: string;
}

export interface ReviewResult {
  card: Card;
  nextDueAt: string;
  intervalDays: number;
  easeFactor: number;
  repetitions: number;
  lapses: number;
}

export interface TodaySession {
  todayNew: Card[];
  review: Card[];
}

export interface SyncSnapshot {
  schemaVersion: 'v1';
  exportedAt: string;
  vocabs: Card[];
  review_logs: ReviewLog[];
  events: AuditEvent[];
}

export interface SyncImportReport {
  addedVocabs: number;
  updatedVocabs: number;
  addedLogs: number;
  conflicts: number;
}

// ============ Practice ============

export interface ClozeItem {
  cardId: string;
  term: string;
  ipa: string | null;
  question: string;
  hint: string | null;
  acceptableAnswers: string[];
}

export interface ClozeResult {
  correct: boolean;
  nearCorrect: boolean;
  expected: string;
}

// ============ Analytics ============

export interface AnalyticsOverview {
  days: number;
  totalVocabs: number;
  dueNow: number;
  reviewedCount: number;
  avgGrade: number;
  accuracyRate: number;
  typingAccuracy: number;
}

export interface TopicStat {
  topic: string;
  vocabCount: number;
  reviewedCount: number;
  avgGrade: number;
}

// ============ Packs and writing ============

export interface CreatePackRequest {
  name: string;
  description?: string | null;
  topics?: string[];
  targetBand?: number | null;
  cardIds?: string[];
}

export interface WritingErrorInput {
  sentence: string;
  correctedSentence: string;
  category: WritingErrorCategory;
  notes?: string | null;
  topic?: string | null;
}
