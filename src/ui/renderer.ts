import chalk, { Chalk, type ChalkInstance } from "chalk";
import { renderMarkdown, detectHighlightLang, highlightLine } from "./markdown.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RendererOptions {
  /** false forces plain output; otherwise chalk's detected level is used */
  color?: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Width of panel rules */
  width?: number;
}

export interface TableColumn {
  header: string;
  width: number;
  align?: "left" | "right";
  style?: (s: string) => string;
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/**
 * Terminal output for every command. Explanations and listings go to
 * stdout, errors and progress lines to stderr.
 */
export class Renderer {
  readonly c: ChalkInstance;
  private readonly out: OutputStream;
  private readonly err: OutputStream;
  private readonly width: number;

  constructor(opts: RendererOptions = {}) {
    this.c = new Chalk({ level: opts.color === false ? 0 : chalk.level });
    this.out = opts.stdout ?? process.stdout;
    this.err = opts.stderr ?? process.stderr;
    this.width = opts.width ?? Math.min(process.stdout.columns || 80, 100);
  }

  line(text: string = ""): void {
    this.out.write(`${text}\n`);
  }

  private rule(title: string | undefined, style: (s: string) => string): string {
    const head = title ? `── ${title} ` : "";
    return style(head + "─".repeat(Math.max(4, this.width - stripAnsi(head).length)));
  }

  printBanner(): void {
    this.line();
    this.line(this.c.bold.cyan("  devexplain"));
    this.line(this.c.dim("  AI-powered code & command explainer"));
    this.line();
  }

  /** Markdown answer framed by a titled rule, with an optional subtitle under it. */
  printExplanation(content: string, title: string = "Explanation", subtitle?: string): void {
    this.line();
    this.line(this.rule(title, (s) => this.c.bold.cyan(s)));
    this.line(renderMarkdown(content, this.c));
    this.line(this.rule(subtitle, (s) => this.c.cyan(s)));
  }

  printCommand(command: string): void {
    this.line();
    this.line(this.rule("Command", (s) => this.c.bold.magenta(s)));
    this.line(highlightLine(command, "bash", this.c));
    this.line(this.rule(undefined, (s) => this.c.magenta(s)));
  }

  printCode(code: string, language: string = "text", filename?: string): void {
    const lang = detectHighlightLang(language);
    const lines = code.split("\n");
    const gutter = String(lines.length).length;
    this.line();
    this.line(this.rule(filename ?? "Code", (s) => this.c.bold.green(s)));
    lines.forEach((text, i) => {
      this.line(`${this.c.dim(String(i + 1).padStart(gutter))} ${highlightLine(text, lang, this.c)}`);
    });
    this.line(this.rule(language, (s) => this.c.green(s)));
  }

  printError(message: string, title: string = "Error"): void {
    this.err.write("\n");
    this.err.write(`${this.c.bold.red(`✗ ${title}`)}\n`);
    for (const text of message.split("\n")) {
      this.err.write(`  ${this.c.red(text)}\n`);
    }
  }

  printWarning(message: string): void {
    this.line(this.c.yellow(`⚠ ${message}`));
  }

  printSuccess(message: string): void {
    this.line(this.c.bold.green(`✓ ${message}`));
  }

  printInfo(message: string): void {
    this.line(this.c.cyan(`ℹ ${message}`));
  }

  /** Progress line for a pending backend call */
  status(message: string): void {
    this.err.write(`${this.c.dim(message)}\n`);
  }

  printTable(title: string, columns: TableColumn[], rows: string[][]): void {
    const cell = (text: string, col: TableColumn): string => {
      const clipped = text.length > col.width ? `${text.slice(0, col.width - 1)}…` : text;
      return col.align === "right" ? clipped.padStart(col.width) : clipped.padEnd(col.width);
    };

    this.line(this.c.bold(title));
    this.line(this.c.bold(columns.map((col) => cell(col.header, col)).join(" ")));
    for (const row of rows) {
      this.line(
        columns
          .map((col, i) => {
            const text = cell(row[i] ?? "", col);
            return col.style ? col.style(text) : text;
          })
          .join(" ")
          .trimEnd(),
      );
    }
  }
}
