/**
 * commitfs public API.
 */

export { createEngine, Engine } from "./engine.js";
export type { EngineOptions, FileContent, ReadTarget } from "./engine.js";
export { resolveConfig, ensureDataDirs } from "./config.js";
export type { CommitFsConfig } from "./config.js";

export { CommitFsError, isCommitFsError } from "./core/errors.js";
export type { CommitFsErrorCode } from "./core/errors.js";
export { ok, fail, capture, unwrap } from "./core/result.js";
export type { ErrorRecord, Result } from "./core/result.js";
export { createLogger, silentLogger } from "./core/logger.js";
export type { Logger, LogLevel } from "./core/logger.js";
export { openRepo } from "./core/repo.js";
export type { RepoRef } from "./core/repo.js";
export type {
  CommitTemplate,
  FinalizeOptions,
  FinalizeStrategy,
  Operation,
  RawPatternLists,
  SessionStatus,
  StagedSession,
  UniquenessMode,
  WriteRequest,
} from "./core/schemas.js";

export type { CommitResult } from "./commit/pipeline.js";
export { DEFAULT_TEMPLATE, lintTemplate, renderTemplate } from "./commit/template.js";
export type { FinalizeResult, Preview } from "./session/session-manager.js";
export { MemoryRepoLock, FileRepoLock } from "./session/repo-lock.js";
export type { RepoLock } from "./session/repo-lock.js";
export { SqliteSessionStore } from "./session/session-store.js";
export type { SessionStore, SessionFilter } from "./session/session-store.js";
export type {
  CommittedFile,
  FileEdit,
  FileWithHistory,
  HistoryEntry,
} from "./history/history-reader.js";
export { PathAuthorizer, isWithinRoot } from "./policy/path-authorizer.js";
export { GitVcs, createGitVcs, initRepository } from "./vcs/git-vcs.js";
export type { IndexEntry, Vcs, VcsFactory } from "./vcs/vcs.js";

export { replaceInFile } from "./adapters/replace.js";
export { applyPatch } from "./adapters/patch.js";
