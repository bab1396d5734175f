/**
 * PostgreSQL Schema Definitions
 *
 * Same tables as the SQLite schema. Flags stay INTEGER (0/1) so both drivers
 * bind the same parameters.
 */

export const POSTGRES_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS debates (
  debate_id TEXT PRIMARY KEY,
  date DATE NOT NULL,
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
  combined_confidence DOUBLE PRECISION NOT NULL DEFAULT 0,
  lexical_confidence DOUBLE PRECISION NOT NULL DEFAULT 0,
  oracle_confidence DOUBLE PRECISION NOT NULL DEFAULT 0,
  matched_terms TEXT,
  reasoning TEXT,
  classified_at INTEGER DEFAULT EXTRACT(EPOCH FROM NOW())::INTEGER
);
`;

/**
 * Outcome columns on speeches, added in place when the table predates them
 */
export const POSTGRES_SPEECH_OUTCOME_SQL = `
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_related INTEGER DEFAULT 0;
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_confidence DOUBLE PRECISION DEFAULT 0;
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_keyword_confidence DOUBLE PRECISION DEFAULT 0;
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_llm_confidence DOUBLE PRECISION DEFAULT 0;
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_keywords_found TEXT;
ALTER TABLE speeches ADD COLUMN IF NOT EXISTS topic_llm_reasoning TEXT;
`;
