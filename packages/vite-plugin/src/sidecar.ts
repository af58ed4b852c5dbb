import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { PortsProject } from "./types.js";
import { DEFAULT_CORE_MODULE, generateDeclarations } from "./generator.js";

/** Default directory (relative to project root) for generated sidecar files. */
export const SIDECAR_DIR = ".tickwise";

/**
 * Generate `.d.ports.ts` sidecar files in the sidecar directory,
 * mirroring the source tree structure.
 *
 * TypeScript picks these up via `allowArbitraryExtensions` + `rootDirs`
 * in tsconfig.  For example, `src/counter.ports` produces
 * `.tickwise/src/counter.d.ports.ts`.
 */
export function generateSidecars(
  project: PortsProject,
  coreModule: string = DEFAULT_CORE_MODULE,
): string[] {
  const outDir = join(resolve(project.projectRoot), SIDECAR_DIR);
  const written: string[] = [];

  for (const [rel, decls] of Object.entries(project.files)) {
    if (decls.length === 0) continue;

    const sidecarPath = sidecarPathFor(join(outDir, rel));
    mkdirSync(dirname(sidecarPath), { recursive: true });
    writeFileSync(sidecarPath, generateDeclarations(decls, coreModule), "utf-8");
    written.push(sidecarPath);
  }

  return written;
}

/**
 * Remove sidecar files that were previously generated.  Missing files are
 * not an error.
 */
export function cleanSidecars(paths: readonly string[]): void {
  for (const p of paths) {
    rmSync(p, { force: true });
  }
}

/**
 * Given `/path/to/.tickwise/src/counter.ports`, returns
 * `/path/to/.tickwise/src/counter.d.ports.ts`.
 */
export function sidecarPathFor(portsPath: string): string {
  return portsPath.replace(/\.ports$/, ".d.ports.ts");
}
