import Database from 'better-sqlite3';
import { z } from 'zod';
import { PersistenceError, describeCause } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { SuggestionSchema } from '../shared/schemas.js';
import type { HistoryEntry, HistoryRecord, HistoryStore, Suggestion } from '../shared/types.js';

interface HistoryRow {
  id: number;
  code_hash: string;
  code_snippet: string | null;
  suggestions: string;
  analysis_time_ms: number;
  language_version: string | null;
  created_at: string;
}

type InsertParams = [string, string | null, string, number, string | null, string];

const SuggestionListSchema = z.array(SuggestionSchema);

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS analysis_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    code_hash TEXT NOT NULL,
    code_snippet TEXT,
    suggestions TEXT NOT NULL,
    analysis_time_ms REAL NOT NULL,
    language_version TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_analysis_history_code_hash ON analysis_history (code_hash);
  CREATE INDEX IF NOT EXISTS idx_analysis_history_created_at ON analysis_history (created_at);
`;

export interface SqliteHistoryOptions {
  /** File path, or `:memory:` */
  path: string;
  logger?: Logger;
}

/**
 * Append-only analysis history in SQLite. Writes are synchronous under the
 * hood; the async interface lets callers treat every store the same way.
 */
export class SqliteHistoryStore implements HistoryStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly stmtInsert: Database.Statement<InsertParams>;
  private readonly stmtLatest: Database.Statement<[string], HistoryRow>;
  private readonly stmtRecent: Database.Statement<[number], HistoryRow>;
  private closed = false;

  constructor(options: SqliteHistoryOptions) {
    this.logger = options.logger ?? silentLogger;
    try {
      this.db = new Database(options.path);
      if (options.path !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new PersistenceError(`Could not open history database ${options.path}: ${describeCause(error)}`, error);
    }

    this.stmtInsert = this.db.prepare<InsertParams>(`
      INSERT INTO analysis_history
        (code_hash, code_snippet, suggestions, analysis_time_ms, language_version, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.stmtLatest = this.db.prepare<[string], HistoryRow>(`
      SELECT * FROM analysis_history
      WHERE code_hash = ?
      ORDER BY created_at DESC, id DESC
      LIMIT 1
    `);
    this.stmtRecent = this.db.prepare<[number], HistoryRow>(`
      SELECT * FROM analysis_history
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `);

    this.logger.debug(`History store ready at ${options.path}`);
  }

  async record(record: HistoryRecord): Promise<void> {
    try {
      this.stmtInsert.run(
        record.fingerprint,
        record.sourceText,
        JSON.stringify(record.suggestions),
        record.analysisTimeMs,
        record.languageVersion,
        record.timestamp.toISOString()
      );
    } catch (error) {
      throw new PersistenceError(`History write failed: ${describeCause(error)}`, error);
    }
  }

  async findLatest(fingerprint: string): Promise<HistoryEntry | undefined> {
    const row = this.read(() => this.stmtLatest.get(fingerprint));
    return row ? toEntry(row) : undefined;
  }

  async listRecent(limit: number): Promise<HistoryEntry[]> {
    const bounded = Math.max(0, Math.floor(limit));
    return this.read(() => this.stmtRecent.all(bounded)).map(toEntry);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private read<T>(query: () => T): T {
    try {
      return query();
    } catch (error) {
      throw new PersistenceError(`History read failed: ${describeCause(error)}`, error);
    }
  }
}

function toEntry(row: HistoryRow): HistoryEntry {
  return {
    id: row.id,
    fingerprint: row.code_hash,
    sourceText: row.code_snippet,
    suggestions: parseSuggestions(row.suggestions),
    analysisTimeMs: row.analysis_time_ms,
    languageVersion: row.language_version,
    timestamp: new Date(row.created_at)
  };
}

function parseSuggestions(raw: string): Suggestion[] {
  try {
    const parsed = SuggestionListSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch (error) {
    throw new PersistenceError(`Stored suggestions are not valid JSON: ${describeCause(error)}`, error);
  }
}
