import fs from "fs";
import path from "path";
import { decodeUtf8, errorMessage } from "./text";

/**
 * Read a file's contents as UTF-8 text.
 * Zero-length files report "(Empty file)" so the model can tell them apart
 * from a missing result.
 */
export function readFile(filePath: string): string {
  try {
    if (!fs.existsSync(filePath)) {
      return `Error: File '${filePath}' does not exist`;
    }
    if (!fs.statSync(filePath).isFile()) {
      return `Error: '${filePath}' is not a file`;
    }

    const content = decodeUtf8(fs.readFileSync(filePath));
    return content || "(Empty file)";
  } catch (err) {
    return `Error reading file: ${errorMessage(err)}`;
  }
}

/**
 * Create or overwrite a file, creating missing parent directories first.
 * The reported count is in characters (code points), not bytes.
 */
export function writeFile(filePath: string, content: string): string {
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, content, "utf-8");
    return `Successfully wrote ${Array.from(content).length} characters to '${filePath}'`;
  } catch (err) {
    return `Error writing file: ${errorMessage(err)}`;
  }
}

export function createDirectory(directoryPath: string): string {
  try {
    if (fs.existsSync(directoryPath)) {
      if (fs.statSync(directoryPath).isDirectory()) {
        return `Directory '${directoryPath}' already exists`;
      }
      return `Error: '${directoryPath}' exists but is not a directory`;
    }

    fs.mkdirSync(directoryPath, { recursive: true });
    return `Successfully created directory '${directoryPath}'`;
  } catch (err) {
    return `Error creating directory: ${errorMessage(err)}`;
  }
}

/**
 * List the immediate children of a directory, sorted by name.
 *
 *   [DIR]  src/
 *   [FILE] package.json (812 bytes)
 */
export function listFiles(directoryPath = "."): string {
  try {
    if (!fs.existsSync(directoryPath)) {
      return `Error: Directory '${directoryPath}' does not exist`;
    }
    if (!fs.statSync(directoryPath).isDirectory()) {
      return `Error: '${directoryPath}' is not a directory`;
    }

    const names = fs.readdirSync(directoryPath).sort();
    if (names.length === 0) {
      return `Directory '${directoryPath}' is empty`;
    }

    return names
      .map((name) => {
        const stats = statEntry(path.join(directoryPath, name));
        return stats.isDirectory()
          ? `[DIR]  ${name}/`
          : `[FILE] ${name} (${stats.size} bytes)`;
      })
      .join("\n");
  } catch (err) {
    return `Error listing directory: ${errorMessage(err)}`;
  }
}

// Broken symlinks fall back to the link itself.
function statEntry(entryPath: string): fs.Stats {
  try {
    return fs.statSync(entryPath);
  } catch {
    return fs.lstatSync(entryPath);
  }
}
