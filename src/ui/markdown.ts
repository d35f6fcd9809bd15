import type { ChalkInstance } from "chalk";

/**
 * Render the markdown subset models actually send (headings, lists,
 * fenced code, quotes, rules, inline emphasis) as styled terminal text.
 */
export function renderMarkdown(text: string, c: ChalkInstance): string {
  const lines = text.split("\n");
  const out: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    // Fenced code block
    if (line.startsWith("```")) {
      const lang = detectHighlightLang(line.slice(3).trim());
      i++;
      while (i < lines.length && !lines[i].startsWith("```")) {
        out.push(`${c.dim("│")} ${highlightLine(lines[i], lang, c)}`);
        i++;
      }
      // Skip closing fence
      if (i < lines.length) i++;
      continue;
    }

    if (/^---+$/.test(line.trim())) {
      out.push(c.dim("─".repeat(40)));
      i++;
      continue;
    }

    const heading = line.match(/^(#{1,6})\s+(.+)$/);
    if (heading) {
      const content = renderInline(heading[2], c);
      out.push(heading[1].length === 1 ? c.bold.cyan(content) : heading[1].length === 2 ? c.bold(content) : c.underline(content));
      i++;
      continue;
    }

    const bullet = line.match(/^(\s*)[-*+]\s+(.+)$/);
    if (bullet) {
      const indent = "  ".repeat(Math.floor(bullet[1].length / 2));
      out.push(`${indent}• ${renderInline(bullet[2], c)}`);
      i++;
      continue;
    }

    const numbered = line.match(/^(\s*)(\d+)\.\s+(.+)$/);
    if (numbered) {
      const indent = "  ".repeat(Math.floor(numbered[1].length / 2));
      out.push(`${indent}${c.bold(`${numbered[2]}.`)} ${renderInline(numbered[3], c)}`);
      i++;
      continue;
    }

    const quote = line.match(/^>\s?(.*)$/);
    if (quote) {
      out.push(c.dim(`│ ${quote[1]}`));
      i++;
      continue;
    }

    out.push(renderInline(line, c));
    i++;
  }

  return out.join("\n");
}

/** `code`, **bold**, ~~strike~~, [text](url), *italic* */
export function renderInline(line: string, c: ChalkInstance): string {
  const pattern = /`([^`]+)`|\*\*(.+?)\*\*|~~(.+?)~~|\[([^\]]+)\]\(([^)]+)\)|\*(.+?)\*/g;
  return line.replace(
    pattern,
    (match: string, code?: string, bold?: string, strike?: string, linkText?: string, url?: string, italic?: string) => {
      if (code !== undefined) return c.cyan(code);
      if (bold !== undefined) return c.bold(bold);
      if (strike !== undefined) return c.strikethrough.dim(strike);
      if (linkText !== undefined) return `${c.underline.blue(linkText)}${c.dim(` (${url ?? ""})`)}`;
      if (italic !== undefined) return c.italic(italic);
      return match;
    },
  );
}

type HighlightLang = "js" | "py" | "bash" | "none";

const KEYWORDS: Record<Exclude<HighlightLang, "none">, RegExp> = {
  js: /\b(const|let|var|function|return|if|else|for|while|class|import|export|from|default|async|await|new|throw|try|catch|finally|typeof|instanceof|switch|case|break|continue|type|interface|extends|implements)\b/g,
  py: /\b(def|class|return|if|elif|else|for|while|import|from|as|with|try|except|finally|raise|yield|lambda|pass|break|continue|and|or|not|in|is|True|False|None|self|async|await)\b/g,
  bash: /\b(if|then|else|elif|fi|for|while|do|done|case|esac|function|return|exit|export|source|echo|cd|sudo)\b/g,
};

export function detectHighlightLang(language: string | undefined): HighlightLang {
  switch ((language ?? "").toLowerCase()) {
    case "js":
    case "javascript":
    case "ts":
    case "typescript":
    case "jsx":
    case "tsx":
      return "js";
    case "py":
    case "python":
      return "py";
    case "sh":
    case "bash":
    case "zsh":
    case "shell":
      return "bash";
    default:
      return "none";
  }
}

export function highlightLine(line: string, lang: HighlightLang, c: ChalkInstance): string {
  if (lang === "none") return line;

  // Park strings so keywords inside them stay plain
  const strings: string[] = [];
  let result = line.replace(/(["'])(?:\\.|(?!\1).)*\1/g, (m) => {
    strings.push(m);
    return `\x00S${strings.length - 1}\x00`;
  });

  const commentIdx = lang === "js" ? result.indexOf("//") : result.indexOf("#");
  let comment = "";
  if (commentIdx >= 0) {
    comment = result.slice(commentIdx);
    result = result.slice(0, commentIdx);
  }

  result = result.replace(KEYWORDS[lang], (m) => c.magenta(m));
  result = result.replace(/\b(\d+\.?\d*)\b/g, (m) => c.yellow(m));
  const restore = (text: string, style: (s: string) => string) =>
    text.replace(/\x00S(\d+)\x00/g, (_m, idx: string) => style(strings[Number.parseInt(idx, 10)] ?? ""));

  result = restore(result, (s) => c.green(s));
  return comment ? result + c.dim(restore(comment, (s) => s)) : result;
}
