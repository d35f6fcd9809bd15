import { LANGUAGE_NAMES } from "../config.js";
import { type ContentType, classifyContent, contentTypeLabel } from "../core/classifier.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { autoPrompt, codePrompt, errorPrompt } from "../core/prompts.js";
import { languageFlag } from "../ui/languages.js";
import { ValidationError } from "../utils/errors.js";

export interface PipeOptions extends LangOption {
  /** Skip detection: error, code or auto */
  type?: string;
}

const FORCEABLE_TYPES = ["error", "code", "auto"] as const;

const NO_INPUT_HELP =
  "No piped input detected.\n\n" +
  "Usage: <command> | devexplain pipe\n\n" +
  "Examples:\n" +
  "  python app.py 2>&1 | devexplain pipe\n" +
  "  cat error.log | devexplain pipe\n" +
  "  npm test 2>&1 | devexplain pipe --type error";

/** Longest query text kept in history for piped input */
const QUERY_PREVIEW_CHARS = 200;
const PREVIEW_CHARS = 500;

/** First 15 and last 5 lines of long input, capped at 500 chars. */
export function inputPreview(content: string): string {
  const lines = content.split("\n");
  const preview =
    lines.length > 30
      ? `${lines.slice(0, 15).join("\n")}\n\n... (${lines.length} lines total) ...\n\n${lines.slice(-5).join("\n")}`
      : content;
  return preview.slice(0, PREVIEW_CHARS);
}

function forcedType(type: string | undefined): ContentType | undefined {
  if (type === undefined) return undefined;
  const match = FORCEABLE_TYPES.find((t) => t === type);
  if (!match) {
    throw new ValidationError(`Unknown content type: ${type}\nUse one of: ${FORCEABLE_TYPES.join(", ")}`);
  }
  return match;
}

/** <command> | devexplain pipe [--type t] */
export async function runPipe(ctx: RunContext, opts: PipeOptions = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);
  const forced = forcedType(opts.type);

  if (ctx.input.isTTY) {
    throw new ValidationError(NO_INPUT_HELP);
  }
  const content = (await ctx.input.readAll()).trim();
  if (!content) {
    throw new ValidationError("Received empty input from stdin");
  }

  const { renderer } = ctx;
  const contentType = forced ?? classifyContent(content);
  renderer.printInfo(`Detected content type: ${renderer.c.bold(contentTypeLabel(contentType))}`);
  renderer.printInfo(`Input preview:\n${renderer.c.dim(inputPreview(content))}`);

  const languageName = LANGUAGE_NAMES[lang];
  const prompt =
    contentType === "error"
      ? errorPrompt(content, undefined, languageName)
      : contentType === "code"
        ? codePrompt(content, undefined, languageName)
        : autoPrompt(content, languageName);

  renderer.status(`Analyzing input ${languageFlag(lang)}...`);
  const explanation = await askBackend(ctx, prompt);

  await presentExplanation(ctx, explanation, "Analysis", languageLabel(lang));
  await ctx.history.add("pipe", content.slice(0, QUERY_PREVIEW_CHARS), explanation, lang, { contentType });
}
