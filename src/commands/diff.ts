import { LANGUAGE_NAMES } from "../config.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { diffPrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";
import { MAX_DIFF_CHARS, diffStats, truncateDiff } from "../vcs/git.js";

export interface DiffOptions extends LangOption {
  staged?: boolean;
}

/** devexplain diff [ref] [--staged] */
export async function runDiff(ctx: RunContext, ref: string | undefined, opts: DiffOptions = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);
  const { renderer } = ctx;
  const { c } = renderer;

  const diff = await ctx.diff({ ref, staged: opts.staged });
  if (!diff.text) {
    renderer.printInfo("No changes found. The diff is empty.");
    return;
  }

  const stats = diffStats(diff.text);
  renderer.printInfo(
    `Analyzing ${diff.description}: ${c.bold(String(stats.files))} file(s), ` +
      `${c.green(`+${stats.additions}`)} additions, ${c.red(`-${stats.deletions}`)} deletions`,
  );

  const { text, truncated } = truncateDiff(diff.text);
  if (truncated) {
    renderer.printWarning(`Diff is large (${diff.text.length} chars), truncating to ${MAX_DIFF_CHARS} chars`);
  }

  renderer.status(`Analyzing diff ${languageFlag(lang)}...`);
  const explanation = await askBackend(ctx, diffPrompt(text, diff.label, LANGUAGE_NAMES[lang]));

  await presentExplanation(ctx, explanation, "Diff Explanation", languageLabel(lang));
  await ctx.history.add("diff", `git diff ${diff.label}`, explanation, lang, { ...stats, truncated });
}
