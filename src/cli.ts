import { Command, InvalidArgumentError } from "commander";
import { runChat } from "./commands/chat.js";
import { runCmd } from "./commands/cmd.js";
import { type CodeOptions, runCode } from "./commands/code.js";
import { type DiffOptions, runDiff } from "./commands/diff.js";
import { type ErrorOptions, runError } from "./commands/error.js";
import { type HistoryOptions, runHistory } from "./commands/history.js";
import { type ConfigOptions, runCheck, runConfig, runLangs, runModels, runVersion } from "./commands/info.js";
import { type PipeOptions, runPipe } from "./commands/pipe.js";
import { runWtf } from "./commands/wtf.js";
import { loadConfig } from "./config.js";
import { type RunContext, createRunContext } from "./core/context.js";
import type { LangOption } from "./core/explain.js";
import { Renderer } from "./ui/renderer.js";
import { BackendError, DevExplainError, errorMessage } from "./utils/errors.js";
import { logger, setLogLevel } from "./utils/logger.js";
import { packageVersion } from "./version.js";

/** Options accepted before (or after) any subcommand */
export type GlobalOptions = {
  output?: string;
  color: boolean;
  model?: string;
  tldr?: boolean;
  verbose?: boolean;
};

export type ContextFactory = (globals: GlobalOptions, renderer: Renderer) => RunContext;
export type RendererFactory = (globals: GlobalOptions) => Renderer;

export interface ProgramDeps {
  makeContext?: ContextFactory;
  makeRenderer?: RendererFactory;
}

export const defaultContext: ContextFactory = (globals, renderer) => {
  const config = loadConfig();
  if (globals.verbose || config.verbose) {
    setLogLevel("debug");
  }
  return createRunContext(config, {
    renderer,
    model: globals.model,
    tldr: globals.tldr,
    outputPath: globals.output,
  });
};

/** Top-level rendering of a failed command. */
export function reportError(renderer: Renderer, err: unknown, verbose = false): void {
  logger.debug({ err }, "Command failed");

  if (err instanceof BackendError) {
    renderer.printError(err.message, "Backend Error");
  } else if (err instanceof DevExplainError) {
    renderer.printError(err.message);
  } else {
    renderer.printError(`Unexpected error: ${errorMessage(err)}`);
    if (verbose && err instanceof Error && err.stack) {
      renderer.status(err.stack);
    }
  }
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const makeContext = deps.makeContext ?? defaultContext;
  const makeRenderer = deps.makeRenderer ?? ((globals: GlobalOptions) => new Renderer({ color: globals.color }));
  const program = new Command();

  // Every handler failure ends here: rendered once, exit code 1.
  const execute = async (body: (ctx: RunContext) => Promise<void>): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const renderer = makeRenderer(globals);
    try {
      await body(makeContext(globals, renderer));
    } catch (err) {
      reportError(renderer, err, globals.verbose);
      process.exitCode = 1;
    }
  };

  program
    .name("devexplain")
    .description("Explain shell commands, errors, code and diffs with an AI model")
    .version(packageVersion(), "-V, --version")
    .option("-o, --output <path>", "also write every explanation to this file (.md, .json or text)")
    .option("--no-color", "disable colored output")
    .option("-m, --model <id>", "model to use (see: devexplain models)")
    .option("--tldr", "one-sentence answers")
    .option("-v, --verbose", "debug logging on stderr");

  program
    .command("cmd")
    .alias("c")
    .description("explain a shell command")
    .argument("<command>", "the command, quoted")
    .option("-l, --lang <code>", "response language")
    .action((command: string, opts: LangOption) => execute((ctx) => runCmd(ctx, command, opts)));

  program
    .command("error")
    .alias("e")
    .description("diagnose an error message and suggest fixes")
    .argument("<message>", "the error message, quoted")
    .option("-c, --context <text>", "extra context such as a code snippet")
    .option("-f, --file <path>", "file to include as context")
    .option("-l, --lang <code>", "response language")
    .action((message: string, opts: ErrorOptions) => execute((ctx) => runError(ctx, message, opts)));

  program
    .command("code")
    .description("explain a file, an inline snippet, or code on stdin")
    .argument("[source]", "file path, code snippet, or - for stdin")
    .option("--code-lang <lang>", "syntax of the code, detected from the file name otherwise")
    .option("--lines <range>", "line range of a file, e.g. 10-20")
    .option("-l, --lang <code>", "response language")
    .action((source: string | undefined, opts: CodeOptions) => execute((ctx) => runCode(ctx, source, opts)));

  program
    .command("diff")
    .alias("d")
    .description("explain git changes")
    .argument("[ref]", "commit, branch or range to diff against")
    .option("-s, --staged", "explain staged changes")
    .option("-l, --lang <code>", "response language")
    .action((ref: string | undefined, opts: DiffOptions) => execute((ctx) => runDiff(ctx, ref, opts)));

  program
    .command("chat")
    .description("interactive chat about code and the terminal")
    .option("-l, --lang <code>", "response language")
    .action((opts: LangOption) => execute((ctx) => runChat(ctx, opts)));

  program
    .command("pipe")
    .description("explain whatever is piped in: <command> | devexplain pipe")
    .option("-t, --type <type>", "skip detection: error, code or auto")
    .option("-l, --lang <code>", "response language")
    .action((opts: PipeOptions) => execute((ctx) => runPipe(ctx, opts)));

  program
    .command("wtf")
    .description("re-run the last shell command and explain what went wrong")
    .option("-l, --lang <code>", "response language")
    .action((opts: LangOption) => execute((ctx) => runWtf(ctx, opts)));

  program
    .command("history")
    .description("list, search or show past explanations")
    .option("-s, --search <query>", "search queries and explanations")
    .option("--show <n>", "show entry N in full (1 = most recent)", parseInteger)
    .option("-n, --limit <n>", "number of entries to list", parseInteger, 20)
    .option("-t, --type <type>", "only entries of this command type")
    .option("--clear", "delete all history")
    .action((opts: HistoryOptions) => execute((ctx) => runHistory(ctx, opts)));

  program
    .command("check")
    .description("check that gh, a token and git are available")
    .action(() => execute((ctx) => runCheck(ctx)));

  program
    .command("config")
    .description("show the current configuration")
    .option("-l, --lang <code>", "print how to make this the default language")
    .action((opts: ConfigOptions) => execute((ctx) => runConfig(ctx, opts)));

  program
    .command("models")
    .description("list available models")
    .action(() => execute((ctx) => runModels(ctx)));

  program
    .command("langs")
    .description("list supported response languages")
    .action(() => execute((ctx) => runLangs(ctx)));

  program
    .command("version")
    .description("show version, backend and model")
    .action(() => execute((ctx) => runVersion(ctx)));

  return program;
}
