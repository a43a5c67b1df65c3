import fs from "fs";
import path from "path";
import os from "os";
import { searchCode } from "../tools/search";

function write(root: string, relative: string, content: string | Buffer): void {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

describe("searchCode", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stepwise-search-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports relative path, 1-based line number and trimmed line", () => {
    write(tmpDir, "main.py", "import os\n    # TODO: handle errors   \nprint(1)\n");
    write(tmpDir, "lib/util.py", "def f():\n    pass  # todo later\n");

    expect(searchCode("TODO", { directory: tmpDir })).toBe(
      [
        "lib/util.py:2: pass  # todo later",
        "main.py:2: # TODO: handle errors",
      ].join("\n")
    );
  });

  it("filters by file-name suffix", () => {
    write(tmpDir, "a.py", "TODO in python\n");
    write(tmpDir, "b.js", "TODO in js\n");

    expect(searchCode("todo", { directory: tmpDir, extension: ".py" })).toBe(
      "a.py:1: TODO in python"
    );
  });

  it("skips hidden files and hidden directories", () => {
    write(tmpDir, ".env", "TODO secret\n");
    write(tmpDir, ".git/HEAD", "TODO ref\n");
    write(tmpDir, "visible.txt", "TODO shown\n");

    expect(searchCode("TODO", { directory: tmpDir })).toBe(
      "visible.txt:1: TODO shown"
    );
  });

  it("truncates past 50 matches and counts the rest", () => {
    const many = Array.from({ length: 40 }, (_, i) => `# TODO ${i}`).join("\n");
    write(tmpDir, "a.py", many + "\n");
    write(tmpDir, "b.py", many + "\n");
    write(tmpDir, "notes.txt", "TODO not python\n");

    const lines = searchCode("TODO", { directory: tmpDir, extension: ".py" }).split("\n");

    expect(lines).toHaveLength(51);
    expect(lines[0]).toBe("a.py:1: # TODO 0");
    expect(lines[39]).toBe("a.py:40: # TODO 39");
    expect(lines[40]).toBe("b.py:1: # TODO 0");
    expect(lines[49]).toBe("b.py:10: # TODO 9");
    expect(lines[50]).toBe("... (30 more matches)");
  });

  it("reports how many files were scanned when nothing matches", () => {
    write(tmpDir, "one.txt", "alpha\n");
    write(tmpDir, "sub/two.txt", "beta\n");

    expect(searchCode("gamma", { directory: tmpDir })).toBe(
      "No matches found for 'gamma' in 2 files"
    );
  });

  it("silently skips files that are not UTF-8 and does not count them", () => {
    write(tmpDir, "text.txt", "nothing here\n");
    write(tmpDir, "image.bin", Buffer.from([0x89, 0x50, 0xff, 0xfe, 0x00]));

    expect(searchCode("zzz", { directory: tmpDir })).toBe(
      "No matches found for 'zzz' in 1 files"
    );
  });

  // Permission bits do not apply to root.
  const itWithoutRoot = process.getuid?.() === 0 ? it.skip : it;

  itWithoutRoot("skips directories it cannot read and keeps other matches", () => {
    write(tmpDir, "a.txt", "TODO here\n");
    write(tmpDir, "locked/b.txt", "TODO hidden\n");
    const locked = path.join(tmpDir, "locked");
    fs.chmodSync(locked, 0o000);
    try {
      expect(searchCode("TODO", { directory: tmpDir })).toBe("a.txt:1: TODO here");
    } finally {
      fs.chmodSync(locked, 0o755);
    }
  });

  it("searches files reached through a symbolic link", () => {
    write(tmpDir, "real/notes.txt", "TODO linked\n");
    fs.mkdirSync(path.join(tmpDir, "src"));
    fs.symlinkSync(
      path.join(tmpDir, "real", "notes.txt"),
      path.join(tmpDir, "src", "link.txt")
    );

    expect(searchCode("TODO", { directory: path.join(tmpDir, "src") })).toBe(
      "link.txt:1: TODO linked"
    );
  });

  it("ignores dangling symbolic links", () => {
    write(tmpDir, "kept.txt", "TODO kept\n");
    fs.symlinkSync(path.join(tmpDir, "gone.txt"), path.join(tmpDir, "dangling.txt"));

    expect(searchCode("TODO", { directory: tmpDir })).toBe("kept.txt:1: TODO kept");
  });

  it("reports a missing directory", () => {
    const dir = path.join(tmpDir, "absent");
    expect(searchCode("x", { directory: dir })).toBe(
      `Error: Directory '${dir}' does not exist`
    );
  });
});
