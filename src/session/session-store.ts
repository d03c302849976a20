/**
 * Durable staged-session records.
 *
 * One `sessions` table keyed by session id. The full record is kept as
 * canonical JSON in `record_json`; the indexed columns beside it exist for
 * filtering and pruning. Rows are re-validated with StagedSessionSchema on
 * the way out, so a hand-edited or truncated row is reported instead of
 * flowing into a checkout.
 */

import Database from "better-sqlite3";
import { canonicalJson } from "../core/canonical.js";
import {
  StagedSessionSchema,
  type SessionStatus,
  type StagedSession,
} from "../core/schemas.js";

// ---------------------------------------------------------------------------
// Minimal statement interface (same approach as elsewhere: sidestep the
// conditional generics in @types/better-sqlite3).
// ---------------------------------------------------------------------------

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

export interface SessionFilter {
  repoRoot?: string;
  status?: SessionStatus;
}

export interface SessionStore {
  get(sessionId: string): StagedSession | undefined;
  /** Insert or replace. */
  put(session: StagedSession): void;
  /** Oldest first. */
  list(filter?: SessionFilter): StagedSession[];
  delete(sessionId: string): boolean;
  close(): void;
}

export class SessionRecordError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string, problem: string) {
    super(`Stored session ${sessionId} is corrupt: ${problem}`);
    this.name = "SessionRecordError";
    this.sessionId = sessionId;
  }
}

interface SessionRow {
  session_id: string;
  record_json: string;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id   TEXT PRIMARY KEY,
  repo_root    TEXT NOT NULL,
  status       TEXT NOT NULL,
  created_at   TEXT NOT NULL,
  updated_at   TEXT NOT NULL,
  closed_at    TEXT,
  record_json  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_repo_root ON sessions(repo_root);
CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status);
`;

function rowToSession(row: SessionRow): StagedSession {
  let raw: unknown;
  try {
    raw = JSON.parse(row.record_json);
  } catch (e: unknown) {
    throw new SessionRecordError(row.session_id, (e as Error).message);
  }
  const parsed = StagedSessionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SessionRecordError(
      row.session_id,
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    );
  }
  return parsed.data;
}

export class SqliteSessionStore implements SessionStore {
  private readonly db: InstanceType<typeof Database>;

  private readonly stmtGet: Stmt;
  private readonly stmtUpsert: Stmt;
  private readonly stmtDelete: Stmt;
  private readonly stmtAll: Stmt;
  private readonly stmtByRepo: Stmt;
  private readonly stmtByStatus: Stmt;
  private readonly stmtByRepoAndStatus: Stmt;

  private readonly txnPut: (session: StagedSession) => void;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);

    this.stmtGet = this.db.prepare(
      "SELECT session_id, record_json FROM sessions WHERE session_id = ?",
    ) as Stmt;

    this.stmtUpsert = this.db.prepare(
      `INSERT INTO sessions
         (session_id, repo_root, status, created_at, updated_at, closed_at, record_json)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(session_id) DO UPDATE SET
         repo_root   = excluded.repo_root,
         status      = excluded.status,
         updated_at  = excluded.updated_at,
         closed_at   = excluded.closed_at,
         record_json = excluded.record_json`,
    ) as Stmt;

    this.stmtDelete = this.db.prepare(
      "DELETE FROM sessions WHERE session_id = ?",
    ) as Stmt;

    const select = "SELECT session_id, record_json FROM sessions";
    const order = "ORDER BY created_at ASC, session_id ASC";
    this.stmtAll = this.db.prepare(`${select} ${order}`) as Stmt;
    this.stmtByRepo = this.db.prepare(
      `${select} WHERE repo_root = ? ${order}`,
    ) as Stmt;
    this.stmtByStatus = this.db.prepare(
      `${select} WHERE status = ? ${order}`,
    ) as Stmt;
    this.stmtByRepoAndStatus = this.db.prepare(
      `${select} WHERE repo_root = ? AND status = ? ${order}`,
    ) as Stmt;

    this.txnPut = this.db.transaction((session: StagedSession): void => {
      const record = StagedSessionSchema.parse(session);
      this.stmtUpsert.run(
        record.sessionId,
        record.repoRoot,
        record.status,
        record.createdAt,
        record.updatedAt,
        record.closedAt ?? null,
        canonicalJson(record),
      );
    });
  }

  get(sessionId: string): StagedSession | undefined {
    const row = this.stmtGet.get(sessionId) as SessionRow | undefined;
    return row ? rowToSession(row) : undefined;
  }

  put(session: StagedSession): void {
    this.txnPut(session);
  }

  list(filter: SessionFilter = {}): StagedSession[] {
    let rows: unknown[];
    if (filter.repoRoot !== undefined && filter.status !== undefined) {
      rows = this.stmtByRepoAndStatus.all(filter.repoRoot, filter.status);
    } else if (filter.repoRoot !== undefined) {
      rows = this.stmtByRepo.all(filter.repoRoot);
    } else if (filter.status !== undefined) {
      rows = this.stmtByStatus.all(filter.status);
    } else {
      rows = this.stmtAll.all();
    }
    return (rows as SessionRow[]).map(rowToSession);
  }

  delete(sessionId: string): boolean {
    return this.stmtDelete.run(sessionId).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
