/**
 * Engine facade: wires config, store, lock and VCS for one process and
 * turns expected failures into Result values.
 *
 *   const engine = createEngine({ config: resolveConfig() });
 *   const res = await engine.write("/srv/repo", { path: "a.txt", ... });
 *   if (!res.ok) console.error(res.error.code);
 *
 * Errors that are not CommitFsError (git failing for an unexpected reason,
 * a corrupt session row) are contract violations and still throw.
 */

import {
  authorizerFor,
  runWritePipeline,
  type CommitResult,
  type PipelineSettings,
} from "./commit/pipeline.js";
import {
  DEFAULT_TEMPLATE,
  lintTemplate,
  type TemplateLint,
  type TemplateValues,
} from "./commit/template.js";
import type { CommitFsConfig } from "./config.js";
import { createLogger, type Logger } from "./core/logger.js";
import { openRepo, type RepoRef } from "./core/repo.js";
import { capture, type Result } from "./core/result.js";
import {
  CommitTemplateSchema,
  parseRequest,
  RawPatternListsSchema,
  type CommitTemplate,
  type RawPatternLists,
  type StagedSession,
  type UniquenessMode,
} from "./core/schemas.js";
import {
  DEFAULT_HISTORY_LIMIT,
  findCommittedFile,
  readCommittedFile,
  readWithHistory,
  type CommittedFile,
  type FileEdit,
  type FileWithHistory,
} from "./history/history-reader.js";
import { authorizePath } from "./policy/path-authorizer.js";
import { parsePatternLists } from "./policy/policy-source.js";
import { FileRepoLock, withRepoLock, type RepoLock } from "./session/repo-lock.js";
import {
  SessionManager,
  type FinalizeResult,
  type Preview,
} from "./session/session-manager.js";
import {
  SqliteSessionStore,
  type SessionFilter,
  type SessionStore,
} from "./session/session-store.js";
import { gitVcsFactory } from "./vcs/git-vcs.js";
import type { VcsFactory } from "./vcs/vcs.js";

export interface EngineOptions {
  config: CommitFsConfig;
  /** Call-site path patterns; replace the environment lists of the same kind. */
  authorization?: RawPatternLists;
  template?: CommitTemplate;
  uniqueness?: UniquenessMode;
  logger?: Logger;
  /** Defaults to a FileRepoLock under `config.lockDir`. */
  lock?: RepoLock;
  /** Defaults to a SqliteSessionStore at `config.dbPath`. */
  store?: SessionStore;
  vcsFactory?: VcsFactory;
}

/** Where a file read should look: a repository's HEAD or a session's work branch. */
export type ReadTarget = { repo: RepoRef | string } | { sessionId: string };

export type FileContent = CommittedFile;

export class Engine {
  private readonly lock: RepoLock;
  private readonly store: SessionStore;
  private readonly vcsFactory: VcsFactory;
  private readonly settings: PipelineSettings;
  private readonly sessions: SessionManager;
  private readonly lockTimeoutMs: number;
  readonly logger: Logger;

  constructor(options: EngineOptions) {
    const { config } = options;
    this.logger = options.logger ?? createLogger("commitfs", config.logLevel);
    this.lock =
      options.lock ?? new FileRepoLock(config.lockDir, { logger: this.logger.child("lock") });
    this.store = options.store ?? new SqliteSessionStore(config.dbPath);
    this.vcsFactory = options.vcsFactory ?? gitVcsFactory;
    this.lockTimeoutMs = config.lockTimeoutMs;

    const authorization = options.authorization
      ? parseRequest(RawPatternListsSchema, options.authorization, "authorization")
      : undefined;
    this.settings = {
      template: options.template
        ? parseRequest(CommitTemplateSchema, options.template, "commit template")
        : DEFAULT_TEMPLATE,
      uniqueness: options.uniqueness ?? "reject",
      uniquenessWindow: config.uniquenessWindow,
      callSitePatterns: authorization ? parsePatternLists(authorization, "call-site") : undefined,
      environmentPatterns: config.environmentPatterns,
      logger: this.logger.child("pipeline"),
    };
    this.sessions = new SessionManager({
      store: this.store,
      lock: this.lock,
      vcsFactory: this.vcsFactory,
      lockTimeoutMs: this.lockTimeoutMs,
      pipeline: this.settings,
      logger: this.logger.child("session"),
    });
  }

  private async repo(repo: RepoRef | string): Promise<RepoRef> {
    return openRepo(typeof repo === "string" ? repo : repo.root);
  }

  /** Canonical RepoRef for a directory, as sessions record it. */
  resolveRepo(repo: RepoRef | string): Promise<Result<RepoRef>> {
    return capture(() => this.repo(repo));
  }

  // -----------------------------------------------------------------------
  // Direct mode
  // -----------------------------------------------------------------------

  write(repo: RepoRef | string, request: unknown): Promise<Result<CommitResult>> {
    return capture(async () => {
      const ref = await this.repo(repo);
      const vcs = this.vcsFactory(ref);
      return withRepoLock(this.lock, ref.root, this.lockTimeoutMs, () =>
        runWritePipeline(ref, vcs, this.settings, request),
      );
    });
  }

  /**
   * Read `path` (at HEAD, or at the tip of a session's work branch) and
   * commit the write `edit` derives from it. The repository lock is held
   * from the read to the commit.
   */
  editFile(target: ReadTarget, path: string, edit: FileEdit): Promise<Result<CommitResult>> {
    if ("sessionId" in target) {
      return capture(() => this.sessions.stagedEdit(target.sessionId, path, edit));
    }
    return capture(async () => {
      const ref = await this.repo(target.repo);
      const vcs = this.vcsFactory(ref);
      return withRepoLock(this.lock, ref.root, this.lockTimeoutMs, async () => {
        const relPath = authorizePath(ref.root, path, authorizerFor(this.settings));
        const current = await findCommittedFile(vcs, "HEAD", relPath);
        return runWritePipeline(ref, vcs, this.settings, edit(current, "HEAD"));
      });
    });
  }

  // -----------------------------------------------------------------------
  // Staged mode
  // -----------------------------------------------------------------------

  startSession(repo: RepoRef | string, ticket?: string): Promise<Result<StagedSession>> {
    return capture(async () => this.sessions.start(await this.repo(repo), ticket));
  }

  stagedWrite(sessionId: string, request: unknown): Promise<Result<CommitResult>> {
    return capture(() => this.sessions.stagedWrite(sessionId, request));
  }

  preview(sessionId: string): Promise<Result<Preview>> {
    return capture(() => this.sessions.preview(sessionId));
  }

  finalize(sessionId: string, options: unknown): Promise<Result<FinalizeResult>> {
    return capture(() => this.sessions.finalize(sessionId, options));
  }

  abort(sessionId: string): Promise<Result<StagedSession>> {
    return capture(() => this.sessions.abort(sessionId));
  }

  getSession(sessionId: string): Promise<Result<StagedSession>> {
    return capture(async () => this.sessions.getSession(sessionId));
  }

  listSessions(filter: SessionFilter = {}): Promise<Result<StagedSession[]>> {
    return capture(async () => this.sessions.listSessions(filter));
  }

  pruneSessions(options: { olderThanMs: number }): Promise<Result<string[]>> {
    return capture(async () => this.sessions.pruneSessions(options));
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  readWithHistory(
    repo: RepoRef | string,
    path: string,
    limit: number = DEFAULT_HISTORY_LIMIT,
  ): Promise<Result<FileWithHistory>> {
    return capture(async () => {
      const ref = await this.repo(repo);
      const vcs = this.vcsFactory(ref);
      return withRepoLock(this.lock, ref.root, this.lockTimeoutMs, () =>
        readWithHistory(ref, vcs, authorizerFor(this.settings), path, limit),
      );
    });
  }

  /** Committed content of `path` at HEAD, or at the tip of a session's work branch. */
  readFile(target: ReadTarget, path: string): Promise<Result<FileContent>> {
    return capture(async () => {
      let ref: RepoRef;
      let rev: string;
      if ("sessionId" in target) {
        const session = this.sessions.getSession(target.sessionId);
        ref = await this.repo(session.repoRoot);
        rev = `refs/heads/${session.workBranch}`;
      } else {
        ref = await this.repo(target.repo);
        rev = "HEAD";
      }
      const relPath = authorizePath(ref.root, path, authorizerFor(this.settings));
      const vcs = this.vcsFactory(ref);
      return withRepoLock(this.lock, ref.root, this.lockTimeoutMs, () =>
        readCommittedFile(vcs, rev, relPath),
      );
    });
  }

  lintTemplate(template: CommitTemplate, values: TemplateValues): TemplateLint {
    return lintTemplate(template, values);
  }

  close(): void {
    this.store.close();
  }
}

export function createEngine(options: EngineOptions): Engine {
  return new Engine(options);
}
