/**
 * SQLite schema
 *
 * debates/topics/speeches mirror the ingestion store; the classifier only
 * writes debate_classifications and the topic_* columns on speeches.
 */

export const SQLITE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS debates (
  debate_id TEXT PRIMARY KEY,
  date TEXT NOT NULL,
  file_name TEXT,
  major_heading_text TEXT,
  colnum TEXT,
  time TEXT,
  url TEXT
);

CREATE TABLE IF NOT EXISTS topics (
  topic_id TEXT PRIMARY KEY,
  debate_id TEXT NOT NULL,
  minor_heading_text TEXT,
  colnum TEXT,
  time TEXT,
  url TEXT
);

CREATE TABLE IF NOT EXISTS speeches (
  speech_id TEXT PRIMARY KEY,
  topic_id TEXT,
  debate_id TEXT NOT NULL,
  speaker_name TEXT,
  person_id TEXT,
  speaker_office TEXT,
  speech_type TEXT,
  oral_qnum TEXT,
  colnum TEXT,
  time TEXT,
  url TEXT,
  speech_text TEXT,
  paragraph_count INTEGER
);

CREATE INDEX IF NOT EXISTS idx_debates_date ON debates(date, debate_id);
CREATE INDEX IF NOT EXISTS idx_speeches_debate ON speeches(debate_id, speech_id);

CREATE TABLE IF NOT EXISTS debate_classifications (
  debate_id TEXT PRIMARY KEY,
  related INTEGER NOT NULL DEFAULT 0,
  combined_confidence REAL NOT NULL DEFAULT 0,
  lexical_confidence REAL NOT NULL DEFAULT 0,
  oracle_confidence REAL NOT NULL DEFAULT 0,
  matched_terms TEXT,
  reasoning TEXT,
  classified_at INTEGER DEFAULT (strftime('%s', 'now'))
);
`;

/**
 * Outcome columns added to speeches (name, SQLite type)
 */
export const SPEECH_OUTCOME_COLUMNS: ReadonlyArray<readonly [string, string]> = [
  ["topic_related", "INTEGER DEFAULT 0"],
  ["topic_confidence", "REAL DEFAULT 0"],
  ["topic_keyword_confidence", "REAL DEFAULT 0"],
  ["topic_llm_confidence", "REAL DEFAULT 0"],
  ["topic_keywords_found", "TEXT"],
  ["topic_llm_reasoning", "TEXT"],
];
