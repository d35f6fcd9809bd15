import { LANGUAGE_NAMES } from "../config.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { commandPrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";

/** devexplain cmd "<command>" */
export async function runCmd(ctx: RunContext, command: string, opts: LangOption = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);

  ctx.renderer.printCommand(command);
  ctx.renderer.status(`Analyzing command ${languageFlag(lang)}...`);
  const explanation = await askBackend(ctx, commandPrompt(command, LANGUAGE_NAMES[lang]));

  await presentExplanation(ctx, explanation, "Command Explanation", languageLabel(lang));
  await ctx.history.add("cmd", command, explanation, lang);
}
