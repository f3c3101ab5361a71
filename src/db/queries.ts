import type {
  AICacheEntry,
  AuditEvent,
  Card,
  ContentBundle,
  Database,
  ListCardsQuery,
  PracticeLog,
  PracticeType,
  QuestionType,
  ReviewLog,
  ReviewMode,
  TopicPack,
  WritingError,
  WritingErrorCategory,
} from '../types';
import { QUESTION_TYPES, REVIEW_MODES, WRITING_ERROR_CATEGORIES } from '../types';
import { parseContentBundle } from '../services/content';
import { generateId } from '../utils/id';
import { isRecord, normalizeWordFamily, toCefrLevel, uniqueStrings } from '../utils/normalize';

// ============ Rows ============

interface CardRow {
  id: string;
  term: string;
  term_normalized: string;
  meanings: string;
  ipa: string | null;
  example_en: string | null;
  example_vi: string | null;
  mnemonic: string | null;
  tags: string;
  collocations: string;
  phrases: string;
  word_family: string;
  topics: string;
  cefr_level: string | null;
  ielts_band: number | null;
  ease_factor: number;
  interval_days: number;
  repetitions: number;
  lapses: number;
  due_at: string;
  last_reviewed_at: string | null;
  readd_count: number;
  last_readd_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ReviewLogRow {
  id: string;
  card_id: string;
  mode: string;
  question_type: string;
  grade: number;
  user_answer: string | null;
  is_near_correct: number | null;
  created_at: string;
}

interface EventRow {
  id: string;
  type: string;
  payload: string;
  created_at: string;
}

interface CacheRow {
  key: string;
  term_normalized: string;
  version: string;
  provider: string;
  data: string;
  created_at: string;
  updated_at: string;
}

interface PracticeLogRow {
  id: string;
  type: string;
  card_id: string | null;
  payload: string;
  created_at: string;
}

interface PackRow {
  id: string;
  name: string;
  description: string | null;
  topics: string;
  target_band: number | null;
  card_ids: string;
  created_at: string;
  updated_at: string;
}

interface WritingErrorRow {
  id: string;
  key: string;
  sentence: string;
  corrected_sentence: string;
  category: string;
  notes: string | null;
  topic: string | null;
  count: number;
  created_at: string;
  updated_at: string;
}

const CARD_COLUMNS = [
  'id',
  'term',
  'term_normalized',
  'meanings',
  'ipa',
  'example_en',
  'example_vi',
  'mnemonic',
  'tags',
  'collocations',
  'phrases',
  'word_family',
  'topics',
  'cefr_level',
  'ielts_band',
  'ease_factor',
  'interval_days',
  'repetitions',
  'lapses',
  'due_at',
  'last_reviewed_at',
  'readd_count',
  'last_readd_at',
  'created_at',
  'updated_at',
] as const;

type CardParams = Record<(typeof CARD_COLUMNS)[number], string | number | null>;

function parseJson(text: string, column: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    console.warn(`[DB] Unreadable JSON in column ${column}, treating as empty`);
    return null;
  }
}

function rowToCard(row: CardRow): Card {
  return {
    id: row.id,
    term: row.term,
    termNormalized: row.term_normalized,
    meanings: uniqueStrings(parseJson(row.meanings, 'meanings')),
    ipa: row.ipa,
    exampleEn: row.example_en,
    exampleVi: row.example_vi,
    mnemonic: row.mnemonic,
    tags: uniqueStrings(parseJson(row.tags, 'tags')),
    collocations: uniqueStrings(parseJson(row.collocations, 'collocations')),
    phrases: uniqueStrings(parseJson(row.phrases, 'phrases')),
    wordFamily: normalizeWordFamily(parseJson(row.word_family, 'word_family')),
    topics: uniqueStrings(parseJson(row.topics, 'topics')),
    cefrLevel: toCefrLevel(row.cefr_level),
    ieltsBand: row.ielts_band,
    easeFactor: row.ease_factor,
    intervalDays: row.interval_days,
    repetitions: row.repetitions,
    lapses: row.lapses,
    dueAt: row.due_at,
    lastReviewedAt: row.last_reviewed_at,
    readdCount: row.readd_count,
    lastReaddAt: row.last_readd_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function cardToParams(card: Card): CardParams {
  return {
    id: card.id,
    term: card.term,
    term_normalized: card.termNormalized,
    meanings: JSON.stringify(card.meanings),
    ipa: card.ipa,
    example_en: card.exampleEn,
    example_vi: card.exampleVi,
    mnemonic: card.mnemonic,
    tags: JSON.stringify(card.tags),
    collocations: JSON.stringify(card.collocations),
    phrases: JSON.stringify(card.phrases),
    word_family: JSON.stringify(card.wordFamily),
    topics: JSON.stringify(card.topics),
    cefr_level: card.cefrLevel,
    ielts_band: card.ieltsBand,
    ease_factor: card.easeFactor,
    interval_days: card.intervalDays,
    repetitions: card.repetitions,
    lapses: card.lapses,
    due_at: card.dueAt,
    last_reviewed_at: card.lastReviewedAt,
    readd_count: card.readdCount,
    last_readd_at: card.lastReaddAt,
    created_at: card.createdAt,
    updated_at: card.updatedAt,
  };
}

function toReviewMode(value: string): ReviewMode {
  return REVIEW_MODES.find((mode) => mode === value) ?? 'flip';
}

function toQuestionType(value: string): QuestionType {
  return QUESTION_TYPES.find((type) => type === value) ?? 'term_to_meaning';
}

function rowToReviewLog(row: ReviewLogRow): ReviewLog {
  return {
    id: row.id,
    cardId: row.card_id,
    mode: toReviewMode(row.mode),
    questionType: toQuestionType(row.question_type),
    grade: row.grade,
    userAnswer: row.user_answer,
    isNearCorrect: row.is_near_correct === null ? null : row.is_near_correct === 1,
    createdAt: row.created_at,
  };
}

function rowToEvent(row: EventRow): AuditEvent {
  const payload = parseJson(row.payload, 'payload');
  return {
    id: row.id,
    type: row.type,
    payload: isRecord(payload) ? payload : {},
    createdAt: row.created_at,
  };
}

function rowToCacheEntry(row: CacheRow): AICacheEntry {
  return {
    key: row.key,
    termNormalized: row.term_normalized,
    version: row.version,
    provider: row.provider,
    data: parseContentBundle(parseJson(row.data, 'data')),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToPracticeLog(row: PracticeLogRow): PracticeLog {
  const payload = parseJson(row.payload, 'payload');
  const type: PracticeType = row.type === 'speaking_feedback' ? 'speaking_feedback' : 'cloze_submit';
  return {
    id: row.id,
    type,
    cardId: row.card_id,
    payload: isRecord(payload) ? payload : {},
    createdAt: row.created_at,
  };
}

function rowToPack(row: PackRow): TopicPack {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    topics: uniqueStrings(parseJson(row.topics, 'topics')),
    targetBand: row.target_band,
    cardIds: uniqueStrings(parseJson(row.card_ids, 'card_ids')),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toWritingCategory(value: string): WritingErrorCategory {
  return WRITING_ERROR_CATEGORIES.find((category) => category === value) ?? 'grammar';
}

function rowToWritingError(row: WritingErrorRow): WritingError {
  return {
    id: row.id,
    sentence: row.sentence,
    correctedSentence: row.corrected_sentence,
    category: toWritingCategory(row.category),
    notes: row.notes,
    topic: row.topic,
    count: row.count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ============ Cards ============

export type InsertCardResult =
  | { status: 'inserted'; card: Card }
  | { status: 'duplicate_term'; termNormalized: string };

/**
 * Insert a card. A clash on term_normalized is reported as a result value
 * rather than thrown, so callers can branch into the re-add path.
 */
export function insertCard(db: Database, card: Card): InsertCardResult {
  const info = db
    .prepare<[CardParams]>(`
      INSERT INTO cards (${CARD_COLUMNS.join(', ')})
      VALUES (${CARD_COLUMNS.map((column) => `@${column}`).join(', ')})
      ON CONFLICT(term_normalized) DO NOTHING
    `)
    .run(cardToParams(card));

  if (info.changes === 0) {
    return { status: 'duplicate_term', termNormalized: card.termNormalized };
  }
  return { status: 'inserted', card };
}

export function getCardById(db: Database, id: string): Card | null {
  const row = db.prepare<[string], CardRow>('SELECT * FROM cards WHERE id = ?').get(id);
  return row ? rowToCard(row) : null;
}

export function getCardByTermNormalized(db: Database, termNormalized: string): Card | null {
  const row = db
    .prepare<[string], CardRow>('SELECT * FROM cards WHERE term_normalized = ?')
    .get(termNormalized);
  return row ? rowToCard(row) : null;
}

/**
 * Overwrite every column of an existing card. Returns false when the id is
 * unknown.
 */
export function replaceCard(db: Database, card: Card): boolean {
  const assignments = CARD_COLUMNS.filter((column) => column !== 'id')
    .map((column) => `${column} = @${column}`)
    .join(', ');
  const info = db
    .prepare<[CardParams]>(`UPDATE cards SET ${assignments} WHERE id = @id`)
    .run(cardToParams(card));
  return info.changes > 0;
}

export interface ScheduleUpdate {
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  lapses: number;
  dueAt: string;
  lastReviewedAt: string;
  updatedAt: string;
}

/**
 * Compare-and-swap write of the scheduling fields: applies only while the
 * row still carries `expectedUpdatedAt`. Returns whether the swap happened.
 */
export function updateCardSchedule(
  db: Database,
  id: string,
  expectedUpdatedAt: string,
  update: ScheduleUpdate
): boolean {
  const info = db
    .prepare(`
      UPDATE cards
      SET ease_factor = ?, interval_days = ?, repetitions = ?, lapses = ?,
          due_at = ?, last_reviewed_at = ?, updated_at = ?
      WHERE id = ? AND updated_at = ?
    `)
    .run(
      update.easeFactor,
      update.intervalDays,
      update.repetitions,
      update.lapses,
      update.dueAt,
      update.lastReviewedAt,
      update.updatedAt,
      id,
      expectedUpdatedAt
    );
  return info.changes > 0;
}

export function deleteCard(db: Database, id: string): boolean {
  const info = db.prepare('DELETE FROM cards WHERE id = ?').run(id);
  return info.changes > 0;
}

const SEARCHABLE_LIST_COLUMNS = ['meanings', 'tags', 'collocations', 'phrases', 'topics'] as const;

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, '\\$&');
}

/**
 * Filtered, paginated card listing, most recently updated first.
 */
export function listCards(db: Database, query: ListCardsQuery): { cards: Card[]; total: number } {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  const search = query.search?.trim();
  if (search) {
    const pattern = `%${escapeLike(search)}%`;
    const listMatches = SEARCHABLE_LIST_COLUMNS.map(
      (column) =>
        `EXISTS (SELECT 1 FROM json_each(c.${column}) WHERE json_each.value LIKE ? ESCAPE '\\')`
    );
    conditions.push(`(c.term LIKE ? ESCAPE '\\' OR ${listMatches.join(' OR ')})`);
    params.push(pattern, ...SEARCHABLE_LIST_COLUMNS.map(() => pattern));
  }

  const tag = query.tag?.trim();
  if (tag) {
    conditions.push('EXISTS (SELECT 1 FROM json_each(c.tags) WHERE json_each.value = ?)');
    params.push(tag);
  }

  const topic = query.topic?.trim();
  if (topic) {
    conditions.push('EXISTS (SELECT 1 FROM json_each(c.topics) WHERE json_each.value = ?)');
    params.push(topic);
  }

  const cefrLevel = query.cefrLevel?.trim();
  if (cefrLevel) {
    conditions.push('c.cefr_level = ?');
    params.push(cefrLevel.toUpperCase());
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const offset = (query.page - 1) * query.limit;

  const rows = db
    .prepare<(string | number)[], CardRow>(`
      SELECT c.* FROM cards c
      ${where}
      ORDER BY c.updated_at DESC, c.id ASC
      LIMIT ? OFFSET ?
    `)
    .all(...params, query.limit, offset);

  const count = db
    .prepare<(string | number)[], { total: number }>(`SELECT COUNT(*) AS total FROM cards c ${where}`)
    .get(...params);

  return { cards: rows.map(rowToCard), total: count?.total ?? 0 };
}

export function listAllCards(db: Database): Card[] {
  return db
    .prepare<[], CardRow>('SELECT * FROM cards ORDER BY term_normalized ASC, created_at ASC')
    .all()
    .map(rowToCard);
}

/**
 * Cards among `ids`, most recently updated first. Unknown ids are skipped.
 */
export function getCardsByIds(db: Database, ids: string[], limit: number): Card[] {
  if (ids.length === 0) return [];
  return db
    .prepare<[string, number], CardRow>(`
      SELECT * FROM cards
      WHERE id IN (SELECT value FROM json_each(?))
      ORDER BY updated_at DESC, id ASC
      LIMIT ?
    `)
    .all(JSON.stringify(ids), limit)
    .map(rowToCard);
}

export function listCardsByDue(db: Database, limit: number): Card[] {
  return db
    .prepare<[number], CardRow>('SELECT * FROM cards ORDER BY due_at ASC, id ASC LIMIT ?')
    .all(limit)
    .map(rowToCard);
}

export function getCardsInOrderOfDue(db: Database, ids: string[], limit: number): Card[] {
  if (ids.length === 0) return [];
  return db
    .prepare<[string, number], CardRow>(`
      SELECT * FROM cards
      WHERE id IN (SELECT value FROM json_each(?))
      ORDER BY due_at ASC, id ASC
      LIMIT ?
    `)
    .all(JSON.stringify(ids), limit)
    .map(rowToCard);
}

// ============ Session buckets ============
// Bounds are ISO strings; stored timestamps share the same format, so
// string comparison is chronological.

export interface TimeRange {
  start: string;
  end: string;
}

export function getCardsCreatedBetween(db: Database, range: TimeRange): Card[] {
  return db
    .prepare<[string, string], CardRow>(`
      SELECT * FROM cards
      WHERE created_at >= ? AND created_at < ?
      ORDER BY created_at ASC, id ASC
    `)
    .all(range.start, range.end)
    .map(rowToCard);
}

export function getDueCards(db: Database, now: string, excludeCreated: TimeRange, limit: number): Card[] {
  return db
    .prepare<[string, string, string, number], CardRow>(`
      SELECT * FROM cards
      WHERE due_at <= ?
        AND NOT (created_at >= ? AND created_at < ?)
      ORDER BY due_at ASC, id ASC
      LIMIT ?
    `)
    .all(now, excludeCreated.start, excludeCreated.end, limit)
    .map(rowToCard);
}

/**
 * Cards reviewed yesterday that were not mastered: failed a review
 * yesterday, have been re-added, or lapsed and were touched yesterday.
 */
export function getYesterdayNotMasteredCards(
  db: Database,
  yesterday: TimeRange,
  excludeCreated: TimeRange,
  limit: number
): Card[] {
  return db
    .prepare<[string, string, string, string, string, string, string, string, number], CardRow>(`
      SELECT c.* FROM cards c
      WHERE c.last_reviewed_at >= ? AND c.last_reviewed_at < ?
        AND NOT (c.created_at >= ? AND c.created_at < ?)
        AND (
          EXISTS (
            SELECT 1 FROM review_logs r
            WHERE r.card_id = c.id
              AND r.created_at >= ? AND r.created_at < ?
              AND r.grade < 3
          )
          OR c.readd_count > 0
          OR (c.lapses > 0 AND c.updated_at >= ? AND c.updated_at < ?)
        )
      ORDER BY c.last_reviewed_at ASC, c.id ASC
      LIMIT ?
    `)
    .all(
      yesterday.start,
      yesterday.end,
      excludeCreated.start,
      excludeCreated.end,
      yesterday.start,
      yesterday.end,
      yesterday.start,
      yesterday.end,
      limit
    )
    .map(rowToCard);
}

export function getStruggleCards(db: Database, excludeCreated: TimeRange, limit: number): Card[] {
  return db
    .prepare<[string, string, number], CardRow>(`
      SELECT * FROM cards
      WHERE readd_count > 0
        AND NOT (created_at >= ? AND created_at < ?)
      ORDER BY readd_count DESC, due_at ASC, id ASC
      LIMIT ?
    `)
    .all(excludeCreated.start, excludeCreated.end, limit)
    .map(rowToCard);
}

// ============ Review logs ============

export function insertReviewLog(db: Database, log: ReviewLog): void {
  db.prepare(`
    INSERT INTO review_logs (id, card_id, mode, question_type, grade, user_answer, is_near_correct, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    log.id,
    log.cardId,
    log.mode,
    log.questionType,
    log.grade,
    log.userAnswer,
    log.isNearCorrect === null ? null : log.isNearCorrect ? 1 : 0,
    log.createdAt
  );
}

export function insertReviewLogs(db: Database, logs: ReviewLog[]): number {
  const insertAll = db.transaction((batch: ReviewLog[]) => {
    for (const log of batch) insertReviewLog(db, log);
    return batch.length;
  });
  return insertAll(logs);
}

export function listReviewLogs(db: Database): ReviewLog[] {
  return db
    .prepare<[], ReviewLogRow>('SELECT * FROM review_logs ORDER BY created_at ASC, rowid ASC')
    .all()
    .map(rowToReviewLog);
}

export function getReviewLogsForCard(db: Database, cardId: string): ReviewLog[] {
  return db
    .prepare<[string], ReviewLogRow>(
      'SELECT * FROM review_logs WHERE card_id = ? ORDER BY created_at DESC, rowid DESC'
    )
    .all(cardId)
    .map(rowToReviewLog);
}

// ============ Events ============

export function appendEvent(
  db: Database,
  type: string,
  payload: Record<string, unknown>,
  createdAt: string
): AuditEvent {
  const event: AuditEvent = { id: generateId(), type, payload, createdAt };
  insertEvent(db, event);
  return event;
}

function insertEvent(db: Database, event: AuditEvent): void {
  db.prepare('INSERT INTO events (id, type, payload, created_at) VALUES (?, ?, ?, ?)').run(
    event.id,
    event.type,
    JSON.stringify(event.payload),
    event.createdAt
  );
}

export function appendEvents(db: Database, events: AuditEvent[]): number {
  const insertAll = db.transaction((batch: AuditEvent[]) => {
    for (const event of batch) insertEvent(db, event);
    return batch.length;
  });
  return insertAll(events);
}

export function listEvents(db: Database): AuditEvent[] {
  return db
    .prepare<[], EventRow>('SELECT * FROM events ORDER BY created_at ASC, rowid ASC')
    .all()
    .map(rowToEvent);
}

// ============ AI cache ============

export function getCacheEntry(db: Database, key: string): AICacheEntry | null {
  const row = db.prepare<[string], CacheRow>('SELECT * FROM ai_cache WHERE key = ?').get(key);
  return row ? rowToCacheEntry(row) : null;
}

export interface CacheWrite {
  key: string;
  termNormalized: string;
  version: string;
  provider: string;
  data: ContentBundle;
  now: string;
}

/**
 * Insert or update a cache entry by key. created_at is kept from the first
 * write.
 */
export function upsertCacheEntry(db: Database, entry: CacheWrite): AICacheEntry {
  db.prepare(`
    INSERT INTO ai_cache (key, term_normalized, version, provider, data, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET
      term_normalized = excluded.term_normalized,
      version = excluded.version,
      provider = excluded.provider,
      data = excluded.data,
      updated_at = excluded.updated_at
  `).run(
    entry.key,
    entry.termNormalized,
    entry.version,
    entry.provider,
    JSON.stringify(entry.data),
    entry.now,
    entry.now
  );

  const stored = getCacheEntry(db, entry.key);
  if (!stored) throw new Error('Failed to upsert AI cache entry');
  return stored;
}

// ============ Practice logs ============

export function insertPracticeLog(
  db: Database,
  type: PracticeType,
  cardId: string | null,
  payload: Record<string, unknown>,
  createdAt: string
): PracticeLog {
  const log: PracticeLog = { id: generateId(), type, cardId, payload, createdAt };
  db.prepare('INSERT INTO practice_logs (id, type, card_id, payload, created_at) VALUES (?, ?, ?, ?, ?)').run(
    log.id,
    log.type,
    log.cardId,
    JSON.stringify(log.payload),
    log.createdAt
  );
  return log;
}

export function listPracticeLogs(db: Database): PracticeLog[] {
  return db
    .prepare<[], PracticeLogRow>('SELECT * FROM practice_logs ORDER BY created_at ASC, rowid ASC')
    .all()
    .map(rowToPracticeLog);
}

// ============ Analytics ============

export interface ReviewAggregate {
  reviewedCount: number;
  gradeSum: number;
  passedCount: number;
  typingCount: number;
  typingPassedCount: number;
}

export function aggregateReviews(db: Database, since: string): ReviewAggregate {
  const row = db
    .prepare<[string], ReviewAggregate>(`
      SELECT
        COUNT(*) AS reviewedCount,
        COALESCE(SUM(grade), 0) AS gradeSum,
        COALESCE(SUM(CASE WHEN grade >= 3 THEN 1 ELSE 0 END), 0) AS passedCount,
        COALESCE(SUM(CASE WHEN mode = 'typing' THEN 1 ELSE 0 END), 0) AS typingCount,
        COALESCE(SUM(CASE WHEN mode = 'typing' AND grade >= 3 THEN 1 ELSE 0 END), 0) AS typingPassedCount
      FROM review_logs
      WHERE created_at >= ?
    `)
    .get(since);
  return row ?? { reviewedCount: 0, gradeSum: 0, passedCount: 0, typingCount: 0, typingPassedCount: 0 };
}

export function countCards(db: Database): number {
  return db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM cards').get()?.total ?? 0;
}

export function countDueCards(db: Database, now: string): number {
  return (
    db.prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM cards WHERE due_at <= ?').get(now)
      ?.total ?? 0
  );
}

export interface TopicCardCount {
  topic: string;
  vocabCount: number;
}

export function countCardsByTopic(db: Database): TopicCardCount[] {
  return db
    .prepare<[], TopicCardCount>(`
      SELECT t.value AS topic, COUNT(DISTINCT c.id) AS vocabCount
      FROM cards c, json_each(c.topics) t
      GROUP BY t.value
    `)
    .all();
}

export interface TopicReviewAggregate {
  topic: string;
  reviewedCount: number;
  gradeSum: number;
}

export function aggregateReviewsByTopic(db: Database, since: string): TopicReviewAggregate[] {
  return db
    .prepare<[string], TopicReviewAggregate>(`
      SELECT t.value AS topic, COUNT(*) AS reviewedCount, SUM(r.grade) AS gradeSum
      FROM review_logs r
      JOIN cards c ON c.id = r.card_id, json_each(c.topics) t
      WHERE r.created_at >= ?
      GROUP BY t.value
    `)
    .all(since);
}

// ============ Topic packs ============

export type InsertPackResult = { status: 'inserted'; pack: TopicPack } | { status: 'duplicate_name' };

export function insertPack(db: Database, pack: TopicPack): InsertPackResult {
  const info = db
    .prepare(`
      INSERT INTO topic_packs (id, name, description, topics, target_band, card_ids, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(name) DO NOTHING
    `)
    .run(
      pack.id,
      pack.name,
      pack.description,
      JSON.stringify(pack.topics),
      pack.targetBand,
      JSON.stringify(pack.cardIds),
      pack.createdAt,
      pack.updatedAt
    );
  return info.changes === 0 ? { status: 'duplicate_name' } : { status: 'inserted', pack };
}

export function getPackById(db: Database, id: string): TopicPack | null {
  const row = db.prepare<[string], PackRow>('SELECT * FROM topic_packs WHERE id = ?').get(id);
  return row ? rowToPack(row) : null;
}

export function listPacks(db: Database, page: number, limit: number): { packs: TopicPack[]; total: number } {
  const rows = db
    .prepare<[number, number], PackRow>(
      'SELECT * FROM topic_packs ORDER BY updated_at DESC, id ASC LIMIT ? OFFSET ?'
    )
    .all(limit, (page - 1) * limit);
  const count = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM topic_packs').get();
  return { packs: rows.map(rowToPack), total: count?.total ?? 0 };
}

export function updatePackCards(db: Database, id: string, cardIds: string[], updatedAt: string): void {
  db.prepare('UPDATE topic_packs SET card_ids = ?, updated_at = ? WHERE id = ?').run(
    JSON.stringify(cardIds),
    updatedAt,
    id
  );
}

// ============ Writing errors ============

export interface WritingErrorWrite {
  key: string;
  sentence: string;
  correctedSentence: string;
  category: WritingErrorCategory;
  notes: string | null;
  topic: string | null;
  now: string;
}

/**
 * Insert a writing error, or bump the count of the entry with the same key.
 * Notes and topic follow the latest write.
 */
export function upsertWritingError(db: Database, entry: WritingErrorWrite): WritingError {
  db.prepare(`
    INSERT INTO writing_errors (id, key, sentence, corrected_sentence, category, notes, topic, count, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?)
    ON CONFLICT(key) DO UPDATE SET
      notes = excluded.notes,
      topic = excluded.topic,
      count = writing_errors.count + 1,
      updated_at = excluded.updated_at
  `).run(
    generateId(),
    entry.key,
    entry.sentence,
    entry.correctedSentence,
    entry.category,
    entry.notes,
    entry.topic,
    entry.now,
    entry.now
  );

  const row = db.prepare<[string], WritingErrorRow>('SELECT * FROM writing_errors WHERE key = ?').get(entry.key);
  if (!row) throw new Error('Failed to upsert writing error');
  return rowToWritingError(row);
}

export interface WritingErrorQuery {
  category?: WritingErrorCategory;
  topic?: string;
  page: number;
  limit: number;
}

export function listWritingErrors(
  db: Database,
  query: WritingErrorQuery
): { items: WritingError[]; total: number } {
  const conditions: string[] = [];
  const params: string[] = [];
  if (query.category) {
    conditions.push('category = ?');
    params.push(query.category);
  }
  const topic = query.topic?.trim();
  if (topic) {
    conditions.push('topic = ?');
    params.push(topic);
  }
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  const rows = db
    .prepare<(string | number)[], WritingErrorRow>(`
      SELECT * FROM writing_errors
      ${where}
      ORDER BY count DESC, updated_at DESC, id ASC
      LIMIT ? OFFSET ?
    `)
    .all(...params, query.limit, (query.page - 1) * query.limit);
  const count = db
    .prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM writing_errors ${where}`)
    .get(...params);

  return { items: rows.map(rowToWritingError), total: count?.total ?? 0 };
}

export function deleteWritingError(db: Database, id: string): boolean {
  return db.prepare('DELETE FROM writing_errors WHERE id = ?').run(id).changes > 0;
}
