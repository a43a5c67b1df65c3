import fs from "fs";
import path from "path";
import { decodeUtf8, errorMessage } from "./text";

export const MAX_SEARCH_RESULTS = 50;

export interface SearchCodeOptions {
  directory?: string;
  extension?: string;
}

/**
 * Case-insensitive substring search over every line of every text file
 * under `directory`. Hidden files and directories are skipped, as are
 * files that are not valid UTF-8 (those are not counted as scanned).
 *
 * Each match renders as `<relative path>:<line>: <trimmed line>`.
 */
export function searchCode(
  pattern: string,
  options: SearchCodeOptions = {}
): string {
  const directory = options.directory || ".";
  const extension = options.extension ?? "";

  try {
    if (!fs.existsSync(directory)) {
      return `Error: Directory '${directory}' does not exist`;
    }
    if (!fs.statSync(directory).isDirectory()) {
      return `Error: '${directory}' is not a directory`;
    }

    const needle = pattern.toLowerCase();
    const matches: string[] = [];
    let searchedFiles = 0;

    for (const filePath of walkFiles(directory)) {
      if (extension && !path.basename(filePath).endsWith(extension)) continue;

      const lines = readTextLines(filePath);
      if (!lines) continue;
      searchedFiles++;

      const relative = path.relative(directory, filePath);
      lines.forEach((line, index) => {
        if (line.toLowerCase().includes(needle)) {
          matches.push(`${relative}:${index + 1}: ${line.trim()}`);
        }
      });
    }

    if (matches.length === 0) {
      return `No matches found for '${pattern}' in ${searchedFiles} files`;
    }

    if (matches.length > MAX_SEARCH_RESULTS) {
      const remaining = matches.length - MAX_SEARCH_RESULTS;
      return (
        matches.slice(0, MAX_SEARCH_RESULTS).join("\n") +
        `\n... (${remaining} more matches)`
      );
    }

    return matches.join("\n");
  } catch (err) {
    return `Error searching code: ${errorMessage(err)}`;
  }
}

function* walkFiles(directory: string): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch {
    // Unreadable directories are left out of the search.
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(entryPath);
    } else if (entry.isFile() || (entry.isSymbolicLink() && isLinkToFile(entryPath))) {
      yield entryPath;
    }
  }
}

// Links to directories are not followed.
function isLinkToFile(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isFile();
  } catch {
    return false;
  }
}

/** Lines of a UTF-8 file, or undefined when it cannot be read as text. */
function readTextLines(filePath: string): string[] | undefined {
  let content: string;
  try {
    content = decodeUtf8(fs.readFileSync(filePath));
  } catch {
    return undefined;
  }
  if (content === "") return [];

  const lines = content.split("\n");
  if (content.endsWith("\n")) lines.pop();
  return lines;
}
