/**
 * Repository reference: the canonical root of a local git work tree.
 */

import { existsSync, realpathSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { simpleGit } from "simple-git";
import { CommitFsError } from "./errors.js";

export interface RepoRef {
  readonly root: string;
}

/**
 * Canonicalize `root` and check that it is the top level of a git work tree.
 *
 * @throws CommitFsError NOT_A_REPOSITORY
 */
export async function openRepo(root: string): Promise<RepoRef> {
  const abs = resolve(root);
  if (!existsSync(abs) || !statSync(abs).isDirectory()) {
    throw new CommitFsError(
      `Repository root is not a directory: ${abs}`,
      "NOT_A_REPOSITORY",
      { root: abs },
    );
  }
  const canonical = realpathSync(abs);

  let topLevel: string;
  try {
    topLevel = (await simpleGit(canonical).revparse(["--show-toplevel"])).trim();
  } catch (e: unknown) {
    throw new CommitFsError(
      `Not a git repository: ${canonical}`,
      "NOT_A_REPOSITORY",
      { root: canonical, cause: (e as Error).message },
    );
  }

  if (realpathSync(topLevel) !== canonical) {
    throw new CommitFsError(
      `Not the top level of a git work tree: ${canonical} (top level is ${topLevel})`,
      "NOT_A_REPOSITORY",
      { root: canonical, topLevel },
    );
  }
  return Object.freeze({ root: canonical });
}
