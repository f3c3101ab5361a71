import Database from 'better-sqlite3';

// Applied on every startup; every statement is idempotent
const SCHEMA = `
CREATE TABLE IF NOT EXISTS cards (
  id TEXT PRIMARY KEY,
  term TEXT NOT NULL,
  term_normalized TEXT NOT NULL,
  meanings TEXT NOT NULL DEFAULT '[]',
  ipa TEXT,
  example_en TEXT,
  example_vi TEXT,
  mnemonic TEXT,
  tags TEXT NOT NULL DEFAULT '[]',
  collocations TEXT NOT NULL DEFAULT '[]',
  phrases TEXT NOT NULL DEFAULT '[]',
  word_family TEXT NOT NULL DEFAULT '{}',
  topics TEXT NOT NULL DEFAULT '[]',
  cefr_level TEXT,
  ielts_band REAL,
  ease_factor REAL NOT NULL DEFAULT 2.5,
  interval_days INTEGER NOT NULL DEFAULT 0,
  repetitions INTEGER NOT NULL DEFAULT 0,
  lapses INTEGER NOT NULL DEFAULT 0,
  due_at TEXT NOT NULL,
  last_reviewed_at TEXT,
  readd_count INTEGER NOT NULL DEFAULT 0,
  last_readd_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS uq_cards_term_normalized ON cards(term_normalized);
CREATE INDEX IF NOT EXISTS idx_cards_due_at ON cards(due_at);
CREATE INDEX IF NOT EXISTS idx_cards_created_at ON cards(created_at);
CREATE INDEX IF NOT EXISTS idx_cards_last_reviewed_at ON cards(last_reviewed_at);
CREATE INDEX IF NOT EXISTS idx_cards_updated_at ON cards(updated_at);

CREATE TABLE IF NOT EXISTS review_logs (
  id TEXT PRIMARY KEY,
  card_id TEXT NOT NULL REFERENCES cards(id) ON DELETE CASCADE,
  mode TEXT NOT NULL,
  question_type TEXT NOT NULL,
  grade INTEGER NOT NULL,
  user_answer TEXT,
  is_near_correct INTEGER,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_review_logs_card_created ON review_logs(card_id, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_review_logs_created ON review_logs(created_at);

CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  payload TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_created ON events(created_at);

CREATE TABLE IF NOT EXISTS practice_logs (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  card_id TEXT REFERENCES cards(id) ON DELETE CASCADE,
  payload TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_practice_logs_created ON practice_logs(created_at);
CREATE INDEX IF NOT EXISTS idx_practice_logs_card_created ON practice_logs(card_id, created_at DESC);

CREATE TABLE IF NOT EXISTS topic_packs (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  description TEXT,
  topics TEXT NOT NULL DEFAULT '[]',
  target_band REAL,
  card_ids TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS writing_errors (
  id TEXT PRIMARY KEY,
  key TEXT NOT NULL UNIQUE,
  sentence TEXT NOT NULL,
  corrected_sentence TEXT NOT NULL,
  category TEXT NOT NULL,
  notes TEXT,
  topic TEXT,
  count INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_writing_errors_count_updated ON writing_errors(count DESC, updated_at DESC);

CREATE TABLE IF NOT EXISTS ai_cache (
  key TEXT PRIMARY KEY,
  term_normalized TEXT NOT NULL,
  version TEXT NOT NULL,
  provider TEXT NOT NULL,
  data TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export function migrate(db: Database.Database): void {
  db.exec(SCHEMA);
}

/**
 * Open (or create) the SQLite store and bring its schema up to date.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  migrate(db);
  return db;
}
