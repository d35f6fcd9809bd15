import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { BackendSelector } from "../src/backend/selector.js";
import type { AIBackend, AskOptions, ChatMessage } from "../src/backend/types.js";
import type { DevExplainConfig } from "../src/config.js";
import type { RunContext } from "../src/core/context.js";
import type { CommandRunner, ExecResult } from "../src/shell/executor.js";
import { HistoryStore } from "../src/storage/history.js";
import type { InputSource, LinePrompter } from "../src/ui/input.js";
import { Renderer } from "../src/ui/renderer.js";
import type { DiffRequest, GitDiff } from "../src/vcs/git.js";

/** Records every conversation it receives and answers from a reply queue; the last reply repeats. */
export class FakeBackend implements AIBackend {
  readonly calls: ChatMessage[][] = [];
  private readonly replies: Array<string | Error>;

  constructor(
    readonly model: string = "test/model",
    replies: Array<string | Error> = ["Fake explanation"],
    private readonly available: boolean = true,
  ) {
    this.replies = [...replies];
  }

  get name(): string {
    return `Fake (${this.model})`;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });
    return this.askMessages(messages);
  }

  async askMessages(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages.map((m) => ({ ...m })));
    const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (next instanceof Error) throw next;
    return next ?? "";
  }

  /** Content of the final message of the most recent call */
  get lastPrompt(): string {
    const call = this.calls[this.calls.length - 1] ?? [];
    return call[call.length - 1]?.content ?? "";
  }
}

export interface CapturedStream {
  write(chunk: string): boolean;
  text(): string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  return {
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    text(): string {
      return chunks.join("");
    },
  };
}

export interface FakeInput extends InputSource {
  readonly prompts: string[];
  closed: boolean;
}

export function fakeInput(opts: { isTTY?: boolean; stdin?: string; lines?: string[] } = {}): FakeInput {
  const pending = [...(opts.lines ?? [])];
  const input: FakeInput = {
    isTTY: opts.isTTY ?? true,
    prompts: [],
    closed: false,
    async readAll(): Promise<string> {
      return opts.stdin ?? "";
    },
    prompter(): LinePrompter {
      return {
        async ask(prompt: string): Promise<string | null> {
          input.prompts.push(prompt);
          return pending.shift() ?? null;
        },
        close(): void {
          input.closed = true;
        },
      };
    },
  };
  return input;
}

export interface FakeRunner extends CommandRunner {
  readonly commands: Array<{ command: string; timeoutMs?: number }>;
}

export function fakeRunner(respond: (command: string) => Partial<ExecResult> = () => ({})): FakeRunner {
  const commands: Array<{ command: string; timeoutMs?: number }> = [];
  return {
    commands,
    async execute(command: string, timeoutMs?: number): Promise<ExecResult> {
      commands.push({ command, timeoutMs });
      return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...respond(command) };
    },
  };
}

export interface TestContextOptions {
  backend?: FakeBackend;
  input?: InputSource;
  runner?: CommandRunner;
  lastCommand?: string | null;
  diff?: (req: DiffRequest) => Promise<GitDiff>;
  language?: string;
  tldr?: boolean;
  outputPath?: string;
  cwd?: string;
}

export interface TestHarness {
  ctx: RunContext;
  backend: FakeBackend;
  stdout: CapturedStream;
  stderr: CapturedStream;
  /** Temporary directory holding config and history; remove with cleanup() */
  dir: string;
  cleanup(): Promise<void>;
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "devexplain-test-"));
}

export const FIXED_TIME = 1_700_000_000;

export async function createTestContext(opts: TestContextOptions = {}): Promise<TestHarness> {
  const dir = await makeTempDir();
  const backend = opts.backend ?? new FakeBackend();
  const stdout = captureStream();
  const stderr = captureStream();

  const config: DevExplainConfig = {
    language: opts.language ?? "en",
    model: backend.model,
    verbose: false,
    config_dir: path.join(dir, "config"),
    cache_dir: path.join(dir, "cache"),
    config_file: path.join(dir, "config", "config.json"),
    history_file: path.join(dir, "cache", "history.json"),
  };

  const ctx: RunContext = {
    config,
    backends: new BackendSelector(config.model, () => backend),
    history: new HistoryStore(config.history_file, () => FIXED_TIME),
    renderer: new Renderer({ color: false, stdout, stderr, width: 40 }),
    input: opts.input ?? fakeInput(),
    runner: opts.runner ?? fakeRunner(),
    lastCommand: async () => opts.lastCommand ?? null,
    diff: opts.diff ?? (async () => ({ text: "", description: "unstaged changes", label: "working tree" })),
    cwd: opts.cwd ?? dir,
    tldr: opts.tldr ?? false,
    outputPath: opts.outputPath,
  };

  return {
    ctx,
    backend,
    stdout,
    stderr,
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}
