import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { StateDeclCache } from "./cache.js";
import { SIDECAR_DIR, cleanSidecars, generateSidecars, sidecarPathFor } from "./sidecar.js";
import { generateDeclarations } from "./generator.js";

const COUNTER = JSON.stringify({
  Counter: { input: ["bool", "b8"], output: "b8", state: "b8" },
});
const TOGGLE = JSON.stringify({
  Toggle: { input: "unit", output: "bool", state: "bool" },
});

let root: string;

function write(rel: string, text: string): void {
  const full = join(root, rel);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, text, "utf-8");
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "tickwise-ports-"));
  write("src/counter.ports", COUNTER);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// StateDeclCache
// ---------------------------------------------------------------------------

describe("StateDeclCache", () => {
  test("reads every .ports file under the root", () => {
    write("lib/toggle.ports", TOGGLE);
    const project = new StateDeclCache(root).get();

    expect(Object.keys(project.files).sort()).toEqual(["lib/toggle.ports", "src/counter.ports"]);
    expect(project.files["src/counter.ports"]?.map((d) => d.name)).toEqual(["Counter"]);
  });

  test("skips node_modules", () => {
    write("node_modules/dep/x.ports", TOGGLE);
    const project = new StateDeclCache(root).get();
    expect(Object.keys(project.files)).toEqual(["src/counter.ports"]);
  });

  test("returns the cached result while nothing changes", () => {
    const cache = new StateDeclCache(root);
    expect(cache.get()).toBe(cache.get());
  });

  test("re-reads when a file is added", () => {
    const cache = new StateDeclCache(root);
    const first = cache.get();
    write("src/toggle.ports", TOGGLE);
    const second = cache.get();

    expect(second).not.toBe(first);
    expect(Object.keys(second.files)).toHaveLength(2);
  });

  test("invalidate forces a re-read", () => {
    const cache = new StateDeclCache(root);
    const first = cache.get();
    cache.invalidate();
    expect(cache.get()).not.toBe(first);
  });

  test("a missing root has no files", () => {
    expect(new StateDeclCache(join(root, "absent")).get().files).toEqual({});
  });

  test("parse errors name the relative path", () => {
    write("src/bad.ports", "{");
    expect(() => new StateDeclCache(root).get()).toThrow("src/bad.ports: ");
  });
});

// ---------------------------------------------------------------------------
// Sidecars
// ---------------------------------------------------------------------------

describe("sidecars", () => {
  test("sidecarPathFor swaps the extension", () => {
    expect(sidecarPathFor("/p/.tickwise/src/counter.ports")).toBe("/p/.tickwise/src/counter.d.ports.ts");
  });

  test("mirror the source tree under the sidecar directory", () => {
    const project = new StateDeclCache(root).get();
    const written = generateSidecars(project);
    const expected = join(root, SIDECAR_DIR, "src", "counter.d.ports.ts");

    expect(written).toEqual([expected]);
    const decls = project.files["src/counter.ports"] ?? [];
    expect(readFileSync(expected, "utf-8")).toBe(generateDeclarations(decls));
  });

  test("are not picked up as sources", () => {
    const cache = new StateDeclCache(root);
    generateSidecars(cache.get());
    cache.invalidate();
    expect(Object.keys(cache.get().files)).toEqual(["src/counter.ports"]);
  });

  test("cleanSidecars removes them and tolerates missing files", () => {
    const written = generateSidecars(new StateDeclCache(root).get());
    cleanSidecars(written);
    expect(written.every((p) => !existsSync(p))).toBe(true);
    expect(() => cleanSidecars(written)).not.toThrow();
  });
});
