import type { RunContext } from "../core/context.js";
import { COMMAND_TYPES, type CommandType, type HistoryEntry, formatEntryTime, isCommandType, shortQuery } from "../storage/history.js";
import { languageFlag } from "../ui/languages.js";
import type { TableColumn } from "../ui/renderer.js";
import { ValidationError } from "../utils/errors.js";

export interface HistoryOptions {
  search?: string;
  /** 1-based position, newest first */
  show?: number;
  limit?: number;
  type?: string;
  clear?: boolean;
}

const QUERY_DETAIL_CHARS = 200;

function showEntry(ctx: RunContext, entry: HistoryEntry, position: number): void {
  const { renderer } = ctx;
  const { c } = renderer;
  const time = formatEntryTime(entry);

  renderer.line();
  renderer.line(c.bold(`History Entry #${position}`));
  renderer.line(`${c.dim("Time:")}     ${time}`);
  renderer.line(`${c.dim("Type:")}     ${entry.commandType}`);
  renderer.line(`${c.dim("Language:")} ${languageFlag(entry.language)} ${entry.language}`);
  renderer.line(`${c.dim("Query:")}    ${entry.query.slice(0, QUERY_DETAIL_CHARS)}`);
  renderer.printExplanation(entry.explanation, `Explanation (${entry.commandType})`, time);
}

/** devexplain history [--search q] [--show n] [--limit n] [--type t] [--clear] */
export async function runHistory(ctx: RunContext, opts: HistoryOptions = {}): Promise<void> {
  const { history, renderer } = ctx;
  const { c } = renderer;

  if (opts.clear) {
    const count = await history.count();
    await history.clear();
    renderer.printSuccess(`Cleared ${count} history entries`);
    return;
  }

  if (opts.show !== undefined) {
    const entry = await history.get(opts.show);
    if (!entry) {
      throw new ValidationError(`No history entry at position ${opts.show}`);
    }
    showEntry(ctx, entry, opts.show);
    return;
  }

  let commandType: CommandType | undefined;
  if (opts.type !== undefined) {
    if (!isCommandType(opts.type)) {
      throw new ValidationError(`Unknown history type: ${opts.type}\nKnown types: ${COMMAND_TYPES.join(", ")}`);
    }
    commandType = opts.type;
  }
  const limit = opts.limit ?? 20;

  const entries = opts.search ? await history.search(opts.search, limit) : await history.list(limit, commandType);
  if (entries.length === 0) {
    renderer.printInfo("No history entries found.");
    if (opts.search) {
      renderer.printInfo("Try a different search term or remove the filter.");
    }
    return;
  }

  const title = opts.search ? `History: "${opts.search}"` : "Explanation History";
  const columns: TableColumn[] = [
    { header: "#", width: 4, align: "right", style: c.dim },
    { header: "Time", width: 19 },
    { header: "Type", width: 6, style: c.cyan },
    { header: "Lang", width: 4 },
    { header: "Query", width: 60 },
  ];
  const rows = [...entries]
    .reverse()
    .map((entry, i) => [String(i + 1), formatEntryTime(entry), entry.commandType, languageFlag(entry.language), shortQuery(entry)]);

  renderer.line();
  renderer.printTable(title, columns, rows);
  renderer.line();
  renderer.line(c.dim(`Showing ${entries.length} of ${await history.count()} total entries`));
  renderer.line(c.dim("Use --show N to view full details of an entry"));
}
