import fs from "node:fs/promises";
import path from "node:path";
import { LANGUAGE_NAMES } from "../config.js";
import type { RunContext } from "../core/context.js";
import { type LangOption, askBackend, languageLabel, presentExplanation, resolveLanguage } from "../core/explain.js";
import { codePrompt } from "../core/prompts.js";
import { detectCodeLanguage, languageFlag } from "../ui/languages.js";
import { ValidationError, errorMessage } from "../utils/errors.js";

export interface CodeOptions extends LangOption {
  /** Syntax used for display; detected from the file name otherwise */
  codeLang?: string;
  /** "START-END", 1-based and inclusive */
  lines?: string;
}

const DISPLAY_MAX_LINES = 50;
const DISPLAY_HEAD = 25;
const DISPLAY_TAIL = 10;

const NO_SOURCE_HELP =
  "Please provide a file path, code snippet, or pipe code via stdin\n\n" +
  "Examples:\n" +
  "  devexplain code ./myfile.py\n" +
  "  devexplain code \"print('hello')\"\n" +
  "  cat myfile.py | devexplain code -";

interface CodeInput {
  code: string;
  /** Display name, with the line range when one was selected */
  filename?: string;
  syntax: string;
}

export function parseLineRange(range: string): { start: number; end: number } {
  const match = range.trim().match(/^(\d+)-(\d+)$/);
  const start = match ? Number(match[1]) : NaN;
  const end = match ? Number(match[2]) : NaN;
  if (!match || start < 1 || end < start) {
    throw new ValidationError("Invalid line range format. Use: --lines START-END (e.g., --lines 10-20)");
  }
  return { start, end };
}

/** Keep the head and tail of long code so the terminal is not flooded. */
export function displayExcerpt(code: string): string {
  const lines = code.split("\n");
  if (lines.length <= DISPLAY_MAX_LINES) return code;
  return (
    lines.slice(0, DISPLAY_HEAD).join("\n") +
    "\n\n... (truncated for display) ...\n\n" +
    lines.slice(-DISPLAY_TAIL).join("\n")
  );
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch {
    return false;
  }
}

async function gatherCode(ctx: RunContext, source: string | undefined, opts: CodeOptions): Promise<CodeInput> {
  const fallbackSyntax = opts.codeLang ?? "text";

  if (source === undefined) {
    if (ctx.input.isTTY) {
      throw new ValidationError(NO_SOURCE_HELP);
    }
    return { code: await ctx.input.readAll(), syntax: fallbackSyntax };
  }

  if (source === "-") {
    return { code: await ctx.input.readAll(), syntax: fallbackSyntax };
  }

  const filePath = path.resolve(ctx.cwd, source);
  if (!(await isFile(filePath))) {
    return { code: source, syntax: fallbackSyntax };
  }

  let code: string;
  try {
    code = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new ValidationError(`Error reading file: ${errorMessage(err)}`, err);
  }

  let filename = path.basename(filePath);
  const syntax = opts.codeLang ?? detectCodeLanguage(filename);

  if (opts.lines) {
    const { start, end } = parseLineRange(opts.lines);
    code = code.split("\n").slice(start - 1, end).join("\n");
    filename = `${filename} (lines ${start}-${end})`;
  }

  return { code, filename, syntax };
}

/** devexplain code [file | snippet | -] */
export async function runCode(ctx: RunContext, source: string | undefined, opts: CodeOptions = {}): Promise<void> {
  const lang = resolveLanguage(ctx, opts.lang);
  const input = await gatherCode(ctx, source, opts);

  if (!input.code.trim()) {
    throw new ValidationError("No code content provided");
  }

  ctx.renderer.printCode(displayExcerpt(input.code), input.syntax, input.filename);
  ctx.renderer.status(`Analyzing code ${languageFlag(lang)}...`);
  const explanation = await askBackend(ctx, codePrompt(input.code, input.filename, LANGUAGE_NAMES[lang]));

  await presentExplanation(ctx, explanation, "Code Explanation", languageLabel(lang));

  const query = input.filename ?? (source === undefined || source === "-" ? "stdin" : source);
  await ctx.history.add("code", query, explanation, lang);
}
