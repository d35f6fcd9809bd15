import { LANGUAGE_NAMES } from "../config.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { commandPrompt, failurePrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("wtf");

export const RERUN_TIMEOUT_MS = 15_000;

const NO_HISTORY_HELP =
  "Could not read your shell history.\n\n" +
  "Make sure your shell saves history:\n" +
  "  zsh:  HISTFILE=~/.zsh_history\n" +
  "  bash: HISTFILE=~/.bash_history";

/**
 * devexplain wtf
 *
 * Re-runs the last command from shell history. A success is explained as a
 * plain command; a failure gets the diagnostic prompt with its exit code
 * and error output.
 */
export async function runWtf(ctx: RunContext, opts: LangOption = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);
  const { renderer } = ctx;
  const { c } = renderer;

  const lastCmd = await ctx.lastCommand();
  if (!lastCmd) {
    throw new ValidationError(NO_HISTORY_HELP);
  }
  if (lastCmd.startsWith("devexplain")) {
    throw new ValidationError(
      "Last command in history is a devexplain command itself.\nTry running a command first, then use `devexplain wtf`",
    );
  }

  renderer.line();
  renderer.line(`${c.bold.yellow("Last command:")} ${c.dim(lastCmd)}`);
  renderer.printInfo("Re-running command to capture output...");

  const result = await ctx.runner.execute(lastCmd, RERUN_TIMEOUT_MS);
  const stderr = result.timedOut ? `(command timed out after ${RERUN_TIMEOUT_MS / 1000}s)` : result.stderr.trim();
  const stdout = result.timedOut ? "" : result.stdout.trim();
  log.debug({ exitCode: result.exitCode, timedOut: result.timedOut }, "Command re-run finished");

  if (result.exitCode === 0) {
    renderer.printSuccess("The command succeeded this time!");
    renderer.printInfo("Explaining what it does anyway...");
    renderer.status(`Analyzing command ${languageFlag(lang)}...`);
    const explanation = await askBackend(ctx, commandPrompt(lastCmd, LANGUAGE_NAMES[lang]));

    await presentExplanation(ctx, explanation, "Command Explanation", languageLabel(lang));
    await ctx.history.add("wtf", lastCmd, explanation, lang, { exitCode: 0 });
    return;
  }

  const errorOutput = stderr || stdout || "(no output captured)";
  renderer.line(c.bold.red(`✗ Exit code ${result.exitCode}`));
  if (stderr) {
    renderer.line(c.dim(stderr.slice(0, 300)));
  }

  renderer.status(`Diagnosing failure ${languageFlag(lang)}...`);
  const explanation = await askBackend(
    ctx,
    failurePrompt(lastCmd, result.exitCode, errorOutput, LANGUAGE_NAMES[lang]),
  );

  await presentExplanation(ctx, explanation, "WTF: What The Failure", languageLabel(lang));
  await ctx.history.add("wtf", `${lastCmd} (exit ${result.exitCode})`, explanation, lang, {
    exitCode: result.exitCode,
  });
}
