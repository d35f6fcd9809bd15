import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StorageError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("history");

export const COMMAND_TYPES = ["cmd", "error", "code", "diff", "pipe", "chat", "wtf"] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value);
}

/** Oldest entries beyond this are dropped on the next write */
export const MAX_ENTRIES = 500;

export interface HistoryEntry {
  /** Seconds since the Unix epoch */
  readonly timestamp: number;
  readonly commandType: CommandType;
  readonly query: string;
  readonly explanation: string;
  readonly language: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** On-disk shape of one entry */
const StoredEntrySchema = z.object({
  timestamp: z.number(),
  command_type: z.enum(COMMAND_TYPES),
  query: z.string(),
  explanation: z.string(),
  language: z.string().default("en"),
  metadata: z.record(z.unknown()).default({}),
});

const HistoryFileSchema = z.array(StoredEntrySchema);

type StoredEntry = z.infer<typeof StoredEntrySchema>;

function fromStored(stored: StoredEntry): HistoryEntry {
  return Object.freeze({
    timestamp: stored.timestamp,
    commandType: stored.command_type,
    query: stored.query,
    explanation: stored.explanation,
    language: stored.language,
    metadata: stored.metadata,
  });
}

function toStored(entry: HistoryEntry): StoredEntry {
  return {
    timestamp: entry.timestamp,
    command_type: entry.commandType,
    query: entry.query,
    explanation: entry.explanation,
    language: entry.language,
    metadata: { ...entry.metadata },
  };
}

/**
 * Read the history document. Anything other than a valid document
 * (missing, unreadable, bad JSON, wrong shape) reads as an empty history.
 */
async function readHistoryFile(filePath: string): Promise<HistoryEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      log.debug({ err, filePath }, "History file unreadable, treating as empty");
    }
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    log.debug({ err, filePath }, "History file is not JSON, treating as empty");
    return [];
  }

  const result = HistoryFileSchema.safeParse(raw);
  if (!result.success) {
    log.debug({ filePath, issues: result.error.issues.length }, "History file failed validation, treating as empty");
    return [];
  }
  return result.data.map(fromStored);
}

/**
 * Append-only log of past explanations, kept in one JSON document.
 *
 * The document is loaded on first access and cached; every mutation
 * rewrites it in full. There is no cross-process locking.
 */
export class HistoryStore {
  private entries: HistoryEntry[] | null = null;

  constructor(
    private readonly filePath: string,
    private readonly now: () => number = () => Date.now() / 1000,
    private readonly maxEntries: number = MAX_ENTRIES,
  ) {}

  get file(): string {
    return this.filePath;
  }

  private async load(): Promise<HistoryEntry[]> {
    if (this.entries === null) {
      this.entries = await readHistoryFile(this.filePath);
    }
    return this.entries;
  }

  /** Write `next` and adopt it as the cached list; the cache is untouched when the write fails. */
  private async save(next: HistoryEntry[]): Promise<void> {
    let entries = next;
    if (entries.length > this.maxEntries) {
      log.debug({ dropped: entries.length - this.maxEntries }, "Trimming oldest history entries");
      entries = entries.slice(-this.maxEntries);
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(entries.map(toStored), null, 2), "utf-8");
    } catch (err) {
      throw new StorageError(`Failed to write ${this.filePath}`, err);
    }
    this.entries = entries;
  }

  async add(
    commandType: CommandType,
    query: string,
    explanation: string,
    language: string = "en",
    metadata: Record<string, unknown> = {},
  ): Promise<HistoryEntry> {
    const entries = await this.load();
    const entry: HistoryEntry = Object.freeze({
      timestamp: this.now(),
      commandType,
      query,
      explanation,
      language,
      metadata: { ...metadata },
    });
    await this.save([...entries, entry]);
    return entry;
  }

  /** The newest `limit` entries (optionally of one type), oldest first. */
  async list(limit: number = 20, commandType?: CommandType): Promise<HistoryEntry[]> {
    const entries = await this.load();
    const selected = commandType ? entries.filter((e) => e.commandType === commandType) : entries;
    return newest(selected, limit);
  }

  /** Case-insensitive substring match on query or explanation; newest `limit` matches, oldest first. */
  async search(query: string, limit: number = 20): Promise<HistoryEntry[]> {
    const entries = await this.load();
    const needle = query.toLowerCase();
    const matches = entries.filter(
      (e) => e.query.toLowerCase().includes(needle) || e.explanation.toLowerCase().includes(needle),
    );
    return newest(matches, limit);
  }

  /** 1-based position counting back from the most recent entry. */
  async get(index: number): Promise<HistoryEntry | undefined> {
    const entries = await this.load();
    if (!Number.isInteger(index) || index < 1 || index > entries.length) {
      return undefined;
    }
    return entries[entries.length - index];
  }

  async clear(): Promise<void> {
    await this.save([]);
  }

  async count(): Promise<number> {
    return (await this.load()).length;
  }
}

function newest<T>(items: T[], limit: number): T[] {
  if (limit <= 0) return [];
  return items.slice(-limit);
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatEntryTime(entry: HistoryEntry): string {
  const d = new Date(entry.timestamp * 1000);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

const SHORT_QUERY_LENGTH = 80;

export function shortQuery(entry: HistoryEntry): string {
  const q = entry.query.replace(/\n/g, " ").trim();
  return q.length > SHORT_QUERY_LENGTH ? `${q.slice(0, SHORT_QUERY_LENGTH)}...` : q;
}
