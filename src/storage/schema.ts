export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS descriptions (
  fingerprint TEXT PRIMARY KEY,
  description TEXT NOT NULL,
  stale INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  fingerprint_history TEXT NOT NULL DEFAULT '[]',
  revision INTEGER NOT NULL DEFAULT 1
);

CREATE INDEX IF NOT EXISTS idx_descriptions_stale ON descriptions(stale);

CREATE TABLE IF NOT EXISTS identities (
  identity_key TEXT PRIMARY KEY,
  scope TEXT NOT NULL,
  name TEXT NOT NULL,
  file_path TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_identities_fingerprint ON identities(fingerprint);
CREATE INDEX IF NOT EXISTS idx_identities_file ON identities(file_path);

CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
