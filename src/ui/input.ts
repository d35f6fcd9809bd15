import { createInterface } from "node:readline";

/** Reads one line after showing a prompt; null once input is closed (EOF or Ctrl-C). */
export interface LinePrompter {
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

export interface InputSource {
  readonly isTTY: boolean;
  /** Everything piped on stdin */
  readAll(): Promise<string>;
  prompter(): LinePrompter;
}

/** A readable stream that may be attached to a terminal */
export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

export function stdinSource(
  stdin: InputStream = process.stdin,
  stdout: NodeJS.WritableStream = process.stdout,
): InputSource {
  return {
    isTTY: Boolean(stdin.isTTY),

    async readAll(): Promise<string> {
      const chunks: Buffer[] = [];
      for await (const chunk of stdin) {
        const data: unknown = chunk;
        chunks.push(typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data instanceof Uint8Array ? data : []));
      }
      return Buffer.concat(chunks).toString("utf-8");
    },

    prompter(): LinePrompter {
      const rl = createInterface({ input: stdin, output: stdout, terminal: Boolean(stdin.isTTY) });
      // Ctrl-C ends the session the same way EOF does
      rl.on("SIGINT", () => rl.close());
      const lines = rl[Symbol.asyncIterator]();

      return {
        async ask(prompt: string): Promise<string | null> {
          stdout.write(prompt);
          const next = await lines.next();
          return next.done ? null : next.value;
        },
        close(): void {
          rl.close();
        },
      };
    },
  };
}
