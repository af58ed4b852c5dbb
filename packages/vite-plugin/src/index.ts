import type { Plugin } from "vite";
import type { PortsPluginOptions } from "./types.js";
import { PortsHost } from "./host.js";

export type { PortType, PortsPluginOptions, PortsProject, StateDecl } from "./types.js";
export { PortTypeSchema, PortsFileError, PortsFileSchema, parsePortsFile } from "./schema.js";
export {
  DEFAULT_CORE_MODULE,
  descriptorExpr,
  generateDeclarations,
  generateModule,
  valueTypeExpr,
} from "./generator.js";
export { StateDeclCache } from "./cache.js";
export { PORTS_PREFIX, PortsHost, type PortsLoadResult } from "./host.js";
export { SIDECAR_DIR, cleanSidecars, generateSidecars, sidecarPathFor } from "./sidecar.js";

/**
 * Vite plugin for importing `.ports` files as component declarations.
 *
 * ```ts
 * // vitest.config.ts
 * import ports from "@tickwise/vite-plugin";
 * export default defineConfig({ plugins: [ports()] });
 *
 * // test file
 * import { Counter } from "./counter.ports";
 * const counter = defineComponent({ ...Counter, evaluate(cr, input, state) { ... } });
 * ```
 */
export default function portsPlugin(options?: PortsPluginOptions): Plugin {
  const host = new PortsHost(options);

  return {
    name: "vite-plugin-tickwise-ports",
    enforce: "pre",

    configResolved(config) {
      host.configure(config.root);
    },

    buildStart() {
      host.regenerate();
    },

    resolveId(source, importer) {
      return host.resolve(source, importer);
    },

    load(id) {
      const result = host.load(id);
      if (!result) return;
      if (result.warning) this.warn(result.warning);
      return result.code;
    },

    handleHotUpdate({ file }) {
      host.hotUpdate(file);
    },
  };
}
