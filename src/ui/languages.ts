import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

const LANGUAGE_FLAGS: Record<string, string> = {
  en: "🇺🇸",
  vi: "🇻🇳",
  zh: "🇨🇳",
  ja: "🇯🇵",
  ko: "🇰🇷",
  es: "🇪🇸",
  fr: "🇫🇷",
  de: "🇩🇪",
  pt: "🇧🇷",
  ru: "🇷🇺",
};

export function languageFlag(lang: string): string {
  return LANGUAGE_FLAGS[lang] ?? "🌐";
}

const CodeLanguageTableSchema = z.object({
  extensions: z.record(z.string()),
  filenames: z.record(z.string()),
});

type CodeLanguageTable = z.infer<typeof CodeLanguageTableSchema>;

// Resolves from both src/ui and dist/ui
const TABLE_URL = new URL("../../data/code-languages.json", import.meta.url);

let table: CodeLanguageTable | null = null;

function codeLanguageTable(): CodeLanguageTable {
  if (!table) {
    table = CodeLanguageTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, "utf-8")));
  }
  return table;
}

/** Syntax name for a file, from its extension or a well-known file name; "text" otherwise. */
export function detectCodeLanguage(filename: string): string {
  const { extensions, filenames } = codeLanguageTable();
  const base = path.basename(filename);
  return extensions[path.extname(base).toLowerCase()] ?? filenames[base] ?? "text";
}
