import fs from "node:fs/promises";
import path from "node:path";
import { StorageError } from "../utils/errors.js";

/**
 * Write an explanation to a file. The format follows the extension:
 * .json gets { title, content }, .md/.markdown a heading, anything else the raw text.
 */
export async function exportExplanation(
  content: string,
  filePath: string,
  title: string = "Explanation",
): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();

  let body: string;
  if (ext === ".json") {
    body = JSON.stringify({ title, content }, null, 2);
  } else if (ext === ".md" || ext === ".markdown") {
    body = `# ${title}\n\n${content}\n`;
  } else {
    body = `${content}\n`;
  }

  try {
    await fs.writeFile(filePath, body, "utf-8");
  } catch (err) {
    throw new StorageError(`Failed to write ${filePath}`, err);
  }
  return filePath;
}
