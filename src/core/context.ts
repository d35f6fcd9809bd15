import type { DevExplainConfig } from "../config.js";
import { GitHubModelsBackend } from "../backend/github-models.js";
import { BackendSelector } from "../backend/selector.js";
import { TokenResolver } from "../backend/token.js";
import { type CommandRunner, ShellExecutor } from "../shell/executor.js";
import { readLastCommand } from "../shell/shell-history.js";
import { HistoryStore } from "../storage/history.js";
import { type InputSource, stdinSource } from "../ui/input.js";
import type { Renderer } from "../ui/renderer.js";
import { type DiffRequest, type GitDiff, getGitDiff } from "../vcs/git.js";

/**
 * Everything a command handler needs for one invocation.
 * Built once per process; nothing here is module-level state.
 */
export interface RunContext {
  config: DevExplainConfig;
  backends: BackendSelector;
  history: HistoryStore;
  renderer: Renderer;
  input: InputSource;
  runner: CommandRunner;
  /** Most recent shell-history command */
  lastCommand: () => Promise<string | null>;
  diff: (req: DiffRequest) => Promise<GitDiff>;
  cwd: string;
  /** One-sentence answers */
  tldr: boolean;
  /** Every rendered explanation is also written here */
  outputPath?: string;
}

export interface RunContextOptions {
  renderer: Renderer;
  env?: NodeJS.ProcessEnv;
  model?: string;
  tldr?: boolean;
  outputPath?: string;
  input?: InputSource;
}

export function createRunContext(config: DevExplainConfig, opts: RunContextOptions): RunContext {
  const env = opts.env ?? process.env;
  const cwd = process.cwd();
  const tokens = new TokenResolver(env);
  const backends = new BackendSelector(config.model, (model) => new GitHubModelsBackend({ model, tokens }));
  if (opts.model) {
    backends.setModel(opts.model);
  }

  return {
    config,
    backends,
    history: new HistoryStore(config.history_file),
    renderer: opts.renderer,
    input: opts.input ?? stdinSource(),
    runner: new ShellExecutor(cwd),
    lastCommand: () => readLastCommand({ histFile: config.shell_history_file, shell: env.SHELL }),
    diff: (req) => getGitDiff({ ...req, cwd: req.cwd ?? cwd }),
    cwd,
    tldr: opts.tldr ?? false,
    outputPath: opts.outputPath,
  };
}
