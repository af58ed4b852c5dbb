import { resolve, isAbsolute, dirname, relative, sep } from "node:path";
import { existsSync } from "node:fs";
import type { PortsPluginOptions } from "./types.js";
import { PORTS_EXT, StateDeclCache } from "./cache.js";
import { DEFAULT_CORE_MODULE, generateModule } from "./generator.js";
import { generateSidecars, cleanSidecars } from "./sidecar.js";

/** Id prefix of loaded `.ports` modules. */
export const PORTS_PREFIX = "\0ports:";

export interface PortsLoadResult {
  readonly code: string;
  /** Set when the file declares no components. */
  readonly warning?: string;
}

/**
 * State behind the plugin hooks: the declaration cache and the sidecars
 * written from it.
 */
export class PortsHost {
  readonly coreModule: string;
  private readonly _options: PortsPluginOptions;
  private _projectRoot = "";
  private _cache: StateDeclCache | undefined;
  private _sidecarPaths: string[] = [];

  constructor(options?: PortsPluginOptions) {
    this._options = options ?? {};
    this.coreModule = this._options.coreModule ?? DEFAULT_CORE_MODULE;
  }

  get projectRoot(): string {
    return this._projectRoot;
  }

  get sidecarPaths(): readonly string[] {
    return this._sidecarPaths;
  }

  /** Point the host at a project; `viteRoot` is used unless `projectRoot` was given. */
  configure(viteRoot: string): void {
    this._projectRoot = resolve(this._options.projectRoot ?? viteRoot);
    this._cache = new StateDeclCache(this._projectRoot);
  }

  /** Rewrite every sidecar from the current declarations. */
  regenerate(): void {
    const project = this.declarations().get();
    cleanSidecars(this._sidecarPaths);
    this._sidecarPaths = generateSidecars(project, this.coreModule);
  }

  /** Module id for an existing `.ports` file, or undefined. */
  resolve(source: string, importer?: string): string | undefined {
    if (!source.endsWith(PORTS_EXT)) return undefined;

    let absPath: string;
    if (isAbsolute(source)) {
      absPath = source;
    } else if (importer) {
      absPath = resolve(dirname(importer), source);
    } else {
      absPath = resolve(source);
    }

    if (!existsSync(absPath)) return undefined;
    return PORTS_PREFIX + absPath;
  }

  load(id: string): PortsLoadResult | undefined {
    if (!id.startsWith(PORTS_PREFIX)) return undefined;

    const absPath = id.slice(PORTS_PREFIX.length);
    const relPath = relative(this._projectRoot, absPath).split(sep).join("/");
    const decls = this.declarations().get().files[relPath];

    if (!decls || decls.length === 0) {
      return { code: "export {};", warning: `No components declared in ${relPath}` };
    }
    return { code: generateModule(decls, this.coreModule) };
  }

  /** Re-read declarations after `file` changed. Returns whether it was a `.ports` file. */
  hotUpdate(file: string): boolean {
    if (!file.endsWith(PORTS_EXT)) return false;

    this.declarations().invalidate();
    this.regenerate();
    return true;
  }

  private declarations(): StateDeclCache {
    if (!this._cache) {
      throw new Error("vite-plugin-tickwise-ports: configResolved has not run");
    }
    return this._cache;
  }
}
