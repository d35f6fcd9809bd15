import { type SupportedLang, LANGUAGE_NAMES, SUPPORTED_LANGS, isSupportedLang } from "../config.js";
import { exportExplanation } from "../storage/export.js";
import { languageFlag } from "../ui/languages.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type { RunContext } from "./context.js";
import { SYSTEM_PROMPT, SYSTEM_PROMPT_TLDR } from "./prompts.js";

const log = createChildLogger("explain");

export interface LangOption {
  /** Response language code, overriding the configured one */
  lang?: string;
}

/** `--lang` if given, else the configured language; rejects anything unsupported. */
export function resolveLanguage(ctx: RunContext, lang?: string): SupportedLang {
  const requested = lang ?? ctx.config.language;
  if (!isSupportedLang(requested)) {
    throw new ValidationError(`Unsupported language: ${requested}\nSupported: ${SUPPORTED_LANGS.join(", ")}`);
  }
  return requested;
}

/** "🇺🇸 English" */
export function languageLabel(lang: SupportedLang): string {
  return `${languageFlag(lang)} ${LANGUAGE_NAMES[lang]}`;
}

/** Single prompt to the selected backend, shaped by TL;DR mode. */
export async function askBackend(ctx: RunContext, prompt: string): Promise<string> {
  const backend = await ctx.backends.getBackend();
  log.debug({ backend: backend.name, tldr: ctx.tldr, chars: prompt.length }, "Asking backend");
  return backend.ask(prompt, { systemPrompt: ctx.tldr ? SYSTEM_PROMPT_TLDR : SYSTEM_PROMPT });
}

/** Render an explanation and, with --output, export it. */
export async function presentExplanation(
  ctx: RunContext,
  content: string,
  title: string,
  subtitle?: string,
): Promise<void> {
  ctx.renderer.printExplanation(content, title, subtitle);
  if (ctx.outputPath) {
    const saved = await exportExplanation(content, ctx.outputPath, title);
    ctx.renderer.line();
    ctx.renderer.line(ctx.renderer.c.dim(`Saved to ${saved}`));
  }
}
