import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { build } from "vite";
import {
  Simulator,
  bv,
  defineComponent,
  isRepresentable,
  type ClockReset,
  type Representable,
} from "@tickwise/core";
import portsPlugin, { PORTS_PREFIX, PortsHost } from "./index.js";
import { generateModule } from "./generator.js";
import { parsePortsFile } from "./schema.js";
import { SIDECAR_DIR } from "./sidecar.js";

const COUNTER = JSON.stringify({
  Counter: { input: ["bool", "b8"], output: "b8", state: "b8" },
});
const TOGGLE = JSON.stringify({
  Toggle: { input: "unit", output: "bool", state: "bool" },
});

const CORE_ENTRY = fileURLToPath(new URL("../../core/src/index.ts", import.meta.url));

let root: string;

function write(rel: string, text: string): string {
  const full = join(root, rel);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, text, "utf-8");
  return full;
}

function sidecar(rel: string): string {
  return join(root, SIDECAR_DIR, rel.replace(/\.ports$/, ".d.ports.ts"));
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "tickwise-plugin-"));
  write("src/counter.ports", COUNTER);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Hook logic
// ---------------------------------------------------------------------------

describe("PortsHost", () => {
  function configured(): PortsHost {
    const host = new PortsHost();
    host.configure(root);
    return host;
  }

  test("needs a project before reading declarations", () => {
    const host = new PortsHost();
    expect(() => host.regenerate()).toThrow(
      "vite-plugin-tickwise-ports: configResolved has not run",
    );
  });

  test("projectRoot overrides the Vite root", () => {
    const host = new PortsHost({ projectRoot: join(root, "src") });
    host.configure(root);
    expect(host.projectRoot).toBe(join(root, "src"));
  });

  test("regenerate writes one sidecar per declaring file", () => {
    const host = configured();
    host.regenerate();
    expect(host.sidecarPaths).toEqual([sidecar("src/counter.ports")]);
    expect(existsSync(sidecar("src/counter.ports"))).toBe(true);
  });

  test("resolves existing .ports files relative to the importer", () => {
    const host = configured();
    const importer = join(root, "src/main.ts");

    expect(host.resolve("./counter.ports", importer)).toBe(
      PORTS_PREFIX + join(root, "src/counter.ports"),
    );
    expect(host.resolve(join(root, "src/counter.ports"))).toBe(
      PORTS_PREFIX + join(root, "src/counter.ports"),
    );
    expect(host.resolve("./missing.ports", importer)).toBeUndefined();
    expect(host.resolve("./main.ts", importer)).toBeUndefined();
  });

  test("loads the generated module for a resolved id", () => {
    const host = configured();
    const id = host.resolve("./counter.ports", join(root, "src/main.ts"));

    expect(id).toBeDefined();
    expect(host.load(id ?? "")).toEqual({
      code: generateModule(parsePortsFile(COUNTER, "src/counter.ports")),
    });
    expect(host.load(join(root, "src/counter.ports"))).toBeUndefined();
  });

  test("warns about a file without components", () => {
    const host = configured();
    write("src/empty.ports", "{}");
    expect(host.load(PORTS_PREFIX + join(root, "src/empty.ports"))).toEqual({
      code: "export {};",
      warning: "No components declared in src/empty.ports",
    });
  });

  test("hot update of a .ports file rewrites the sidecars", () => {
    const host = configured();
    host.regenerate();

    const toggle = write("lib/toggle.ports", TOGGLE);
    write("src/counter.ports", "{}");

    expect(host.hotUpdate(toggle)).toBe(true);
    expect(host.sidecarPaths).toEqual([sidecar("lib/toggle.ports")]);
    expect(existsSync(sidecar("lib/toggle.ports"))).toBe(true);
    expect(existsSync(sidecar("src/counter.ports"))).toBe(false);
  });

  test("hot update ignores other files", () => {
    const host = configured();
    host.regenerate();
    write("lib/toggle.ports", TOGGLE);

    expect(host.hotUpdate(join(root, "src/main.ts"))).toBe(false);
    expect(host.sidecarPaths).toEqual([sidecar("src/counter.ports")]);
  });
});

// ---------------------------------------------------------------------------
// Plugin in a Vite build
// ---------------------------------------------------------------------------

describe("portsPlugin", () => {
  test("bundles an imported .ports file and writes its sidecar", async () => {
    const entry = write("src/main.js", 'export { Counter } from "./counter.ports";\n');

    const result = await build({
      root,
      configFile: false,
      logLevel: "silent",
      plugins: [portsPlugin()],
      build: {
        write: false,
        minify: false,
        lib: { entry, formats: ["es"], fileName: "main" },
        rollupOptions: { external: ["@tickwise/core"] },
      },
    });
    if (Array.isArray(result) || !("output" in result)) {
      throw new Error("expected a single build output");
    }

    const [chunk] = result.output;
    expect(chunk.code).toContain("@tickwise/core");
    expect(chunk.code).toContain('name: "Counter"');
    expect(chunk.code).toContain("input: tuple(bool(), bitsType(8))");
    expect(existsSync(sidecar("src/counter.ports"))).toBe(true);
  }, 30_000);
});

// ---------------------------------------------------------------------------
// Generated declarations at run time
// ---------------------------------------------------------------------------

interface Declaration {
  readonly name: string;
  readonly input: Representable<unknown>;
  readonly output: Representable<unknown>;
  readonly state: Representable<unknown>;
}

function declarationOf(loaded: unknown, name: string): Declaration {
  const decl: unknown =
    typeof loaded === "object" && loaded !== null ? Reflect.get(loaded, name) : undefined;
  if (typeof decl !== "object" || decl === null) {
    throw new Error(`${name} is not exported`);
  }
  const member = (key: string): Representable<unknown> => {
    const value: unknown = Reflect.get(decl, key);
    if (!isRepresentable(value)) throw new Error(`${name}.${key} is not a descriptor`);
    return value;
  };
  return { name, input: member("input"), output: member("output"), state: member("state") };
}

describe("generated module", () => {
  test("spreads into defineComponent", async () => {
    const file = write(
      "counter.generated.mjs",
      generateModule(parsePortsFile(COUNTER, "counter.ports"), CORE_ENTRY),
    );
    const loaded: unknown = await import(file);

    const counter = defineComponent({
      ...declarationOf(loaded, "Counter"),
      evaluate: (_cr: ClockReset, _input: unknown, state: unknown): [unknown, unknown] => [
        state,
        state,
      ],
    });

    expect(counter.name).toBe("Counter");
    expect(counter.input.name).toBe("(bool, b8)");
    expect(counter.describe().ports.i.width).toBe(9);
    expect(counter.describe().stateWidth).toBe(8);
    expect(counter.init()).toEqual(bv(8, 0));

    const sim = Simulator.create(counter, { resetCycles: 1 });
    expect(sim.tick([true, bv(8, 5)])).toEqual(bv(8, 0));
  });
});
