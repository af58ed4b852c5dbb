import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";
import type { PortsProject, StateDecl } from "./types.js";
import { parsePortsFile } from "./schema.js";

export const PORTS_EXT = ".ports";

const SKIPPED_DIRS = new Set(["node_modules", ".git", "dist", ".tickwise"]);

export class StateDeclCache {
  private _data: PortsProject | undefined;
  private _mtimeKey = "";

  constructor(private readonly _projectRoot: string) {}

  /** Get cached declarations, re-reading if any .ports file has changed. */
  get(): PortsProject {
    const files = this.listPortsFiles();
    const key = mtimeKey(files);
    if (this._data && this._mtimeKey === key) {
      return this._data;
    }
    this._data = this.read(files);
    this._mtimeKey = key;
    return this._data;
  }

  /** Force invalidation; the next `get()` re-reads every file. */
  invalidate(): void {
    this._mtimeKey = "";
    this._data = undefined;
  }

  private read(files: readonly PortsFileStat[]): PortsProject {
    const out: Record<string, readonly StateDecl[]> = {};
    for (const { path } of files) {
      const rel = relative(this._projectRoot, path).split(sep).join("/");
      out[rel] = parsePortsFile(readFileSync(path, "utf-8"), rel);
    }
    return { projectRoot: this._projectRoot, files: out };
  }

  private listPortsFiles(): PortsFileStat[] {
    const found: PortsFileStat[] = [];
    if (existsSync(this._projectRoot)) {
      walk(this._projectRoot, found);
    }
    return found.sort((a, b) => a.path.localeCompare(b.path));
  }
}

interface PortsFileStat {
  readonly path: string;
  readonly mtimeMs: number;
}

/**
 * Key on the file count and newest mtime.  Only stats, no reads.
 */
function mtimeKey(files: readonly PortsFileStat[]): string {
  const newest = files.reduce((max, f) => Math.max(max, f.mtimeMs), 0);
  return `${files.length}:${newest}`;
}

function walk(dir: string, found: PortsFileStat[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRS.has(entry.name)) {
        walk(full, found);
      }
    } else if (entry.isFile() && entry.name.endsWith(PORTS_EXT)) {
      found.push({ path: full, mtimeMs: statSync(full).mtimeMs });
    }
  }
}
