import fs from "node:fs/promises";
import path from "node:path";
import { LANGUAGE_NAMES } from "../config.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { errorPrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";
import { ValidationError, errorMessage } from "../utils/errors.js";

export interface ErrorOptions extends LangOption {
  /** Free-form context: code snippet, environment notes */
  context?: string;
  /** File whose content is appended to the context */
  file?: string;
}

async function readContextFile(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ValidationError(`Context file not found: ${file}`, err);
    }
    throw new ValidationError(`Error reading file: ${errorMessage(err)}`, err);
  }
}

/** devexplain error "<message>" [-c context] [-f file] */
export async function runError(ctx: RunContext, message: string, opts: ErrorOptions = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);

  let fullContext = opts.context ?? "";
  if (opts.file) {
    const content = await readContextFile(opts.file);
    fullContext += `\n\nFrom file ${path.basename(opts.file)}:\n${content}`;
  }

  const { c } = ctx.renderer;
  ctx.renderer.printInfo(`Analyzing error: ${c.bold.red(message)}`);
  ctx.renderer.status(`Diagnosing error ${languageFlag(lang)}...`);
  const explanation = await askBackend(ctx, errorPrompt(message, fullContext || undefined, LANGUAGE_NAMES[lang]));

  await presentExplanation(ctx, explanation, "Error Analysis & Solutions", languageLabel(lang));
  await ctx.history.add("error", message, explanation, lang);
}
