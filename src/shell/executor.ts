import { spawn } from "node:child_process";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("executor");

/** Bytes of each stream kept; earlier output is dropped */
export const MAX_OUTPUT_BYTES = 1024 * 1024;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export interface CommandRunner {
  execute(command: string, timeoutMs?: number): Promise<ExecResult>;
}

/** Keeps the last `limit` bytes written to it. */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head === undefined) break;
      const excess = this.size - this.limit;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }
}

/**
 * Run a command line through the user's shell and capture its output.
 * Never rejects: a failure to start is reported as exit code 1.
 * The exit code always comes from the process; output size never changes it.
 */
export class ShellExecutor implements CommandRunner {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly maxOutputBytes: number = MAX_OUTPUT_BYTES,
  ) {}

  async execute(command: string, timeoutMs: number = 15_000): Promise<ExecResult> {
    log.debug({ command, timeoutMs }, "Running command");

    return new Promise<ExecResult>((resolve) => {
      const stdout = new OutputTail(this.maxOutputBytes);
      const stderr = new OutputTail(this.maxOutputBytes);
      let settled = false;

      const finish = (result: ExecResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = spawn(command, { cwd: this.cwd, shell: true, stdio: ["ignore", "pipe", "pipe"] });

      const timer = setTimeout(() => {
        log.debug({ command, timeoutMs }, "Command timed out");
        child.kill("SIGKILL");
        finish({ stdout: stdout.toString(), stderr: stderr.toString(), exitCode: 1, timedOut: true });
      }, timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (err) => {
        finish({ stdout: stdout.toString(), stderr: stderr.toString() || err.message, exitCode: 1, timedOut: false });
      });

      child.on("close", (code, signal) => {
        const exitCode = code ?? 1;
        const errText = stderr.toString();
        finish({
          stdout: stdout.toString(),
          stderr: errText || (signal ? `Command terminated by ${signal}` : ""),
          exitCode,
          timedOut: false,
        });
      });
    });
  }
}
