/**
 * SQL used by the local store
 */

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS records (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    data TEXT NOT NULL,
    revision INTEGER NOT NULL,
    PRIMARY KEY (collection, id)
  );
  CREATE TABLE IF NOT EXISTS revisions (
    collection TEXT PRIMARY KEY,
    revision INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS quarantine (
    collection TEXT NOT NULL,
    id TEXT NOT NULL,
    raw TEXT NOT NULL,
    reason TEXT NOT NULL,
    quarantined_at INTEGER NOT NULL
  );
`;

/** Row holding the store-wide revision in `revisions` */
export const GLOBAL_REVISION_KEY = '';

export const SELECT_RECORD = `SELECT data FROM records WHERE collection = ? AND id = ?`;

export const UPSERT_RECORD = `
  INSERT INTO records (collection, id, data, revision) VALUES (?, ?, ?, ?)
  ON CONFLICT (collection, id) DO UPDATE SET data = excluded.data, revision = excluded.revision
`;

export const DELETE_RECORD = `DELETE FROM records WHERE collection = ? AND id = ?`;

/** Page through a collection in insertion order (rowid survives upserts) */
export const SCAN_PAGE = `
  SELECT rowid, id, data FROM records
  WHERE collection = ? AND rowid > ?
  ORDER BY rowid
  LIMIT ?
`;

export const COUNT_RECORDS = `SELECT COUNT(*) FROM records WHERE collection = ?`;

export const SELECT_REVISIONS = `SELECT collection, revision FROM revisions`;

export const UPSERT_REVISION = `
  INSERT INTO revisions (collection, revision) VALUES (?, ?)
  ON CONFLICT (collection) DO UPDATE SET revision = excluded.revision
`;

export const INSERT_QUARANTINE = `
  INSERT INTO quarantine (collection, id, raw, reason, quarantined_at) VALUES (?, ?, ?, ?, ?)
`;

export const SELECT_QUARANTINE = `
  SELECT collection, id, raw, reason, quarantined_at FROM quarantine ORDER BY rowid
`;
