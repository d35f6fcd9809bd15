export type ContentType = "error" | "code" | "auto" | "unknown";

/** Matched case-insensitively anywhere in a line. */
export const ERROR_PATTERNS: readonly string[] = [
  "Traceback (most recent call last)",
  "Error:",
  "Exception:",
  "error:",
  "FATAL",
  "FAIL",
  "panic:",
  "Segmentation fault",
  "ECONNREFUSED",
  "ENOENT",
  "EPERM",
  "errno",
  "SyntaxError",
  "TypeError",
  "ValueError",
  "KeyError",
  "IndexError",
  "AttributeError",
  "ImportError",
  "ModuleNotFoundError",
  "FileNotFoundError",
  "PermissionError",
  "RuntimeError",
  "NullPointerException",
  "ClassNotFoundException",
  "ArrayIndexOutOfBoundsException",
  "undefined is not a function",
  "Cannot read propert",
  "is not defined",
  "command not found",
  "No such file or directory",
  "Permission denied",
];

/** Matched case-sensitively. */
export const CODE_INDICATORS: readonly string[] = [
  // Python
  "def ", "class ", "import ", "from ",
  // JavaScript
  "function ", "const ", "let ", "var ",
  // Go
  "func ", "package ",
  // Java / C#
  "public ", "private ", "static ",
  // C / C++
  "#include", "int main",
];

export const ERROR_LINE_RATIO = 0.05;
export const CODE_LINE_RATIO = 0.1;

const LOWERED_ERROR_PATTERNS = ERROR_PATTERNS.map((p) => p.toLowerCase());

/**
 * Guess what a block of piped text is.
 *
 * Scores are the share of lines that match at least one pattern; a line
 * matching several patterns still counts once. Error wins over code.
 */
export function classifyContent(text: string): ContentType {
  const trimmed = text.trim();
  if (!trimmed) return "unknown";

  const lines = trimmed.split(/\r?\n/);

  const errorLines = lines.filter((line) => {
    const lower = line.toLowerCase();
    return LOWERED_ERROR_PATTERNS.some((p) => lower.includes(p));
  }).length;
  if (errorLines > 0 && errorLines / lines.length > ERROR_LINE_RATIO) {
    return "error";
  }

  const codeLines = lines.filter((line) => CODE_INDICATORS.some((ind) => line.includes(ind))).length;
  if (codeLines > 0 && codeLines / lines.length > CODE_LINE_RATIO) {
    return "code";
  }

  return "auto";
}

export function contentTypeLabel(type: string): string {
  switch (type) {
    case "error":
      return "Error/Traceback";
    case "code":
      return "Code";
    case "auto":
      return "General Output";
    default:
      return "Unknown";
  }
}
