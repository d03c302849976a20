/**
 * Atomic single-file writes with undo.
 *
 * snapshotFile() records what is at the target before anything changes;
 * writeFileAtomic() / removeFile() mutate it; restoreSnapshot() puts the
 * recorded state back, including removing directories the write created.
 */

import { randomBytes } from "node:crypto";
import {
  existsSync,
  lstatSync,
  mkdirSync,
  readFileSync,
  readlinkSync,
  renameSync,
  rmSync,
  symlinkSync,
  writeFileSync,
  type Stats,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { CommitFsError } from "../core/errors.js";

export type FileSnapshot =
  | { absPath: string; kind: "absent"; createdDir?: string }
  | { absPath: string; kind: "file"; bytes: Buffer; mode: number; createdDir?: string }
  | { absPath: string; kind: "symlink"; target: string; createdDir?: string };

export function snapshotFile(absPath: string): FileSnapshot {
  let stat: Stats;
  try {
    stat = lstatSync(absPath);
  } catch (e: unknown) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      return { absPath, kind: "absent" };
    }
    throw e;
  }

  if (stat.isSymbolicLink()) {
    return { absPath, kind: "symlink", target: readlinkSync(absPath) };
  }
  if (!stat.isFile()) {
    throw new CommitFsError(
      `Target is not a regular file: ${absPath}`,
      "INVALID_REQUEST",
      { path: absPath },
    );
  }
  return {
    absPath,
    kind: "file",
    bytes: readFileSync(absPath),
    mode: stat.mode & 0o7777,
  };
}

function tempPathFor(absPath: string): string {
  return join(
    dirname(absPath),
    `.${basename(absPath)}.${randomBytes(6).toString("hex")}.tmp`,
  );
}

function replaceAtomically(absPath: string, bytes: Uint8Array, mode: number): void {
  const tmpPath = tempPathFor(absPath);
  try {
    writeFileSync(tmpPath, bytes, { mode });
    renameSync(tmpPath, absPath);
  } catch (e: unknown) {
    rmSync(tmpPath, { force: true });
    throw e;
  }
}

/**
 * Write `bytes` through a temp file in the target directory and a rename.
 * Missing parent directories are created; the top-most one is recorded on
 * the snapshot so a restore can remove it.
 */
export function writeFileAtomic(snapshot: FileSnapshot, bytes: Uint8Array): void {
  const dir = dirname(snapshot.absPath);
  if (!existsSync(dir)) {
    snapshot.createdDir = mkdirSync(dir, { recursive: true });
  }
  const mode = snapshot.kind === "file" ? snapshot.mode : 0o644;
  replaceAtomically(snapshot.absPath, bytes, mode);
}

export function removeFile(snapshot: FileSnapshot): void {
  rmSync(snapshot.absPath, { force: true });
}

/** Put the target back exactly as snapshotted. */
export function restoreSnapshot(snapshot: FileSnapshot): void {
  switch (snapshot.kind) {
    case "file":
      replaceAtomically(snapshot.absPath, snapshot.bytes, snapshot.mode);
      break;
    case "symlink":
      rmSync(snapshot.absPath, { force: true });
      symlinkSync(snapshot.target, snapshot.absPath);
      break;
    case "absent":
      rmSync(snapshot.absPath, { force: true });
      break;
  }
  if (snapshot.createdDir) {
    rmSync(snapshot.createdDir, { recursive: true, force: true });
    delete snapshot.createdDir;
  }
}
