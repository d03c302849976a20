/**
 * Command dispatch for the `commitfs` CLI. Kept apart from index.ts so it
 * can be driven in-process.
 */

import { resolveConfig, type CommitFsConfig } from "../config.js";
import { CommitFsError } from "../core/errors.js";
import { parseArgs } from "./args.js";
import {
  cmdConfigShow,
  cmdHistory,
  cmdInit,
  cmdLint,
  cmdPatch,
  cmdReplace,
  cmdWrite,
} from "./commands.js";
import {
  cmdStagedAbort,
  cmdStagedFinalize,
  cmdStagedList,
  cmdStagedPreview,
  cmdStagedPrune,
  cmdStagedStart,
  cmdStagedWrite,
} from "./staged-commands.js";

export const USAGE = `commitfs — every file write is a git commit

Usage:
  commitfs init <dir>
  commitfs config show [--json]
  commitfs write --repo <dir> --path <p> [--file <f>|-] [--op add|edit|delete] [--summary <s>] [--reason <r>]
                 [--subject <tpl>] [--body <tpl>] [--unique reject|suffix|off] [--allow <list>] [--deny <list>]
                 [--allow-dirty] [--json]
  commitfs staged start --repo <dir> [--ticket <t>] [--json]
  commitfs staged write --session <id> --path <p> [--file <f>|-] [--op ...] [--summary <s>] [--reason <r>] [--json]
  commitfs staged preview --session <id> [--json]
  commitfs staged finalize --session <id> [--strategy merge|merge-ff|rebase-merge|squash] [--target <branch>] [--json]
  commitfs staged abort --session <id> [--json]
  commitfs staged list [--repo <dir>] [--status <s>] [--json]
  commitfs staged prune --older-than-days <n> [--json]
  commitfs replace --repo <dir> --path <p> --search <s> --replace <r> [--regex] [--summary <s>] [--session <id>] [--json]
  commitfs patch --repo <dir> --path <p> [--file <f>|-] [--summary <s>] [--session <id>] [--json]
  commitfs history --repo <dir> --path <p> [--limit <n>] [--json]
  commitfs lint --subject <tpl> [--body <tpl>] --op <op> --path <p> --summary <s> [--json]

Environment:
  COMMITFS_HOME               State directory (default ~/.commitfs)
  COMMITFS_DB_PATH            Session store file
  COMMITFS_LOCK_DIR           Lock file directory
  COMMITFS_LOCK_TIMEOUT_MS    Lock wait bound in ms (default 10000)
  COMMITFS_UNIQUENESS_WINDOW  Recent subjects checked for uniqueness (default 100)
  COMMITFS_ALLOWED_PATHS      Comma-separated allow patterns ("!" marks deny)
  COMMITFS_DENIED_PATHS       Comma-separated deny patterns
  COMMITFS_LOG_LEVEL          debug | info | warn | error
`;

export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (argv.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(argv);
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: CommitFsConfig;
  try {
    config = resolveConfig(env);
  } catch (e: unknown) {
    if (!(e instanceof CommitFsError)) throw e;
    process.stderr.write(`error[${e.code}]: ${e.message}\n`);
    return 1;
  }
  const command = positional[0];

  switch (command) {
    case "init": {
      const dir = positional[1];
      if (!dir) {
        process.stderr.write("Usage: commitfs init <dir>\n");
        return 1;
      }
      return cmdInit(dir, config);
    }

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    case "write":
      return cmdWrite(flags, config, json);

    case "staged":
      switch (positional[1]) {
        case "start":
          return cmdStagedStart(flags, config, json);
        case "write":
          return cmdStagedWrite(flags, config, json);
        case "preview":
          return cmdStagedPreview(flags, config, json);
        case "finalize":
          return cmdStagedFinalize(flags, config, json);
        case "abort":
          return cmdStagedAbort(flags, config, json);
        case "list":
          return cmdStagedList(flags, config, json);
        case "prune":
          return cmdStagedPrune(flags, config, json);
        default:
          process.stderr.write(
            "Unknown staged subcommand. Use: start, write, preview, finalize, abort, list, prune\n",
          );
          return 1;
      }

    case "replace":
      return cmdReplace(flags, config, json);

    case "patch":
      return cmdPatch(flags, config, json);

    case "history":
      return cmdHistory(flags, config, json);

    case "lint":
      return cmdLint(flags, json);

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
