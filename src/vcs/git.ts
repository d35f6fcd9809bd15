import { type SimpleGit, simpleGit } from "simple-git";
import { ProcessError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("git");

/** Diffs longer than this are cut before being sent to the backend */
export const MAX_DIFF_CHARS = 8000;

export interface DiffRequest {
  ref?: string;
  staged?: boolean;
  cwd?: string;
  timeoutMs?: number;
}

export interface GitDiff {
  text: string;
  /** e.g. "staged changes", "changes from HEAD~1" */
  description: string;
  /** ref, "--staged" or "working tree" */
  label: string;
}

export interface DiffStats {
  files: number;
  additions: number;
  deletions: number;
}

/** `git diff [--staged | <ref>]` in the given directory. */
export async function getGitDiff(req: DiffRequest = {}): Promise<GitDiff> {
  const args: string[] = [];
  let description = "unstaged changes";
  let label = "working tree";

  if (req.staged) {
    args.push("--staged");
    description = "staged changes";
    label = "--staged";
  } else if (req.ref) {
    args.push(req.ref);
    description = `changes from ${req.ref}`;
    label = req.ref;
  }

  log.debug({ args, cwd: req.cwd }, "Running git diff");

  let text: string;
  try {
    const git: SimpleGit = simpleGit({
      baseDir: req.cwd ?? process.cwd(),
      timeout: { block: req.timeoutMs ?? 30_000 },
    });
    text = await git.diff(args);
  } catch (err) {
    const message = errorMessage(err);
    if (message.includes("ENOENT")) {
      throw new ProcessError("git is not installed or not in PATH", err);
    }
    throw new ProcessError(`Git error: ${message.trim() || "Failed to run git diff"}`, err);
  }

  return { text: text.trim(), description, label };
}

export function diffStats(diff: string): DiffStats {
  const lines = diff.split("\n");
  return {
    files: diff.split("diff --git").length - 1,
    additions: lines.filter((l) => l.startsWith("+") && !l.startsWith("+++")).length,
    deletions: lines.filter((l) => l.startsWith("-") && !l.startsWith("---")).length,
  };
}

export function truncateDiff(diff: string, maxChars: number = MAX_DIFF_CHARS): { text: string; truncated: boolean } {
  if (diff.length <= maxChars) return { text: diff, truncated: false };
  return { text: `${diff.slice(0, maxChars)}\n\n... (truncated)`, truncated: true };
}
