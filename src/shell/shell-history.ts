import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("shell-history");

/** Only the tail of a zsh history file is read */
const ZSH_TAIL_BYTES = 8192;

export interface ShellHistoryOptions {
  /** HISTFILE override */
  histFile?: string;
  /** $SHELL */
  shell?: string;
  home?: string;
}

/**
 * Last command from a zsh history, which may use the extended
 * `: <epoch>:<duration>;<command>` format.
 */
export async function lastZshCommand(histFile: string): Promise<string | null> {
  let data: Buffer;
  try {
    const handle = await fs.open(histFile, "r");
    try {
      const { size } = await handle.stat();
      const length = Math.min(size, ZSH_TAIL_BYTES);
      data = Buffer.alloc(length);
      await handle.read(data, 0, length, size - length);
    } finally {
      await handle.close();
    }
  } catch (err) {
    log.debug({ err, histFile }, "zsh history not readable");
    return null;
  }

  const lines = data.toString("utf-8").trim().split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line) continue;
    if (line.startsWith(": ") && line.includes(";")) {
      return line.slice(line.indexOf(";") + 1).trim();
    }
    return line;
  }
  return null;
}

export async function lastBashCommand(histFile: string): Promise<string | null> {
  let content: string;
  try {
    content = await fs.readFile(histFile, "utf-8");
  } catch (err) {
    log.debug({ err, histFile }, "bash history not readable");
    return null;
  }

  const lines = content.split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (line) return line;
  }
  return null;
}

/**
 * Most recent command from the user's shell history.
 * zsh first when $SHELL is zsh, then bash, then zsh as a fallback.
 */
export async function readLastCommand(opts: ShellHistoryOptions = {}): Promise<string | null> {
  const home = opts.home ?? os.homedir();
  const zshFile = opts.histFile ?? path.join(home, ".zsh_history");
  const bashFile = opts.histFile ?? path.join(home, ".bash_history");

  if ((opts.shell ?? "").includes("zsh")) {
    const cmd = await lastZshCommand(zshFile);
    if (cmd) return cmd;
  }

  const cmd = await lastBashCommand(bashFile);
  if (cmd) return cmd;

  return lastZshCommand(zshFile);
}
