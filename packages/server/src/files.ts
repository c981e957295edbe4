import fs from "node:fs";
import path from "node:path";

const IGNORE_DIRS = new Set([
  "node_modules", ".git", "dist", "build", ".next",
  ".nuxt", "vendor", "__pycache__", ".venv", "target",
]);

/** Every `.txt` file under `dir`, as paths relative to `base`. Unreadable directories are skipped. */
export function findTxtFiles(dir: string, base: string = dir): string[] {
  const results: string[] = [];
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return results;
  }
  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (IGNORE_DIRS.has(entry.name) || entry.name.startsWith(".")) continue;
      results.push(...findTxtFiles(path.join(dir, entry.name), base));
    } else if (entry.isFile() && entry.name.endsWith(".txt")) {
      results.push(path.relative(base, path.join(dir, entry.name)).split(path.sep).join("/"));
    }
  }
  return results;
}

/** Where diagram text is read from and written to. */
export interface DiagramStore {
  list(): string[];
  /** File contents, or null when missing. Throws on an invalid name. */
  read(name: string): string | null;
  write(name: string, text: string): void;
}

export class InvalidNameError extends Error {
  constructor(name: string) {
    super(`Invalid filename: ${name}`);
    this.name = "InvalidNameError";
  }
}

/** Diagrams stored as `.txt` files inside one directory. */
export class DirectoryStore implements DiagramStore {
  readonly root: string;

  constructor(dir: string) {
    // Resolve symlinks so path comparisons in resolve() are consistent
    this.root = fs.realpathSync(path.resolve(dir));
  }

  /** Absolute path for a diagram name, or null if it escapes the root or is not a `.txt` file. */
  resolve(name: string): string | null {
    if (!name.endsWith(".txt")) return null;
    const resolved = path.resolve(this.root, name);
    if (!resolved.startsWith(this.root + path.sep)) return null;
    return resolved;
  }

  list(): string[] {
    return findTxtFiles(this.root).sort();
  }

  read(name: string): string | null {
    const filePath = this.resolve(name);
    if (!filePath) throw new InvalidNameError(name);
    if (!fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, "utf-8");
  }

  write(name: string, text: string): void {
    const filePath = this.resolve(name);
    if (!filePath) throw new InvalidNameError(name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text, "utf-8");
  }
}
