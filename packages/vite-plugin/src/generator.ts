import type { PortType, StateDecl } from "./types.js";

/** Default module the generated code imports from. */
export const DEFAULT_CORE_MODULE = "@tickwise/core";

const IDENT_RE = /^[A-Za-z_$][\w$]*$/;

function propertyKey(name: string): string {
  return IDENT_RE.test(name) ? name : JSON.stringify(name);
}

// ---------------------------------------------------------------------------
// Runtime descriptors
// ---------------------------------------------------------------------------

/** Descriptor constructor used for each kind. */
const CONSTRUCTORS = {
  unit: "unit",
  bool: "bool",
  bits: "bitsType",
  tuple: "tuple",
  array: "array",
  struct: "struct",
} as const satisfies Record<PortType["kind"], string>;

/** Build the expression that constructs `type`'s descriptor, recording the constructors used. */
export function descriptorExpr(type: PortType, used: Set<string> = new Set()): string {
  used.add(CONSTRUCTORS[type.kind]);
  switch (type.kind) {
    case "unit":
      return "unit()";
    case "bool":
      return "bool()";
    case "bits":
      return `bitsType(${type.width})`;
    case "tuple":
      return `tuple(${type.items.map((t) => descriptorExpr(t, used)).join(", ")})`;
    case "array":
      return `array(${descriptorExpr(type.item, used)}, ${type.length})`;
    case "struct": {
      const fields = type.fields.map(([k, t]) => `${propertyKey(k)}: ${descriptorExpr(t, used)}`);
      return `struct({ ${fields.join(", ")} })`;
    }
  }
}

/**
 * ESM source exporting one declaration object per component:
 *
 * ```ts
 * export const Counter = {
 *   name: "Counter",
 *   input: tuple(bool(), bitsType(8)),
 *   ...
 * };
 * ```
 *
 * The objects spread straight into `defineComponent`.
 */
export function generateModule(
  decls: readonly StateDecl[],
  coreModule: string = DEFAULT_CORE_MODULE,
): string {
  if (decls.length === 0) {
    return "export {};\n";
  }

  const used = new Set<string>();
  const bodies = decls.map((decl) => {
    const input = descriptorExpr(decl.input, used);
    const output = descriptorExpr(decl.output, used);
    const state = descriptorExpr(decl.state, used);
    return [
      `export const ${decl.name} = {`,
      `  name: ${JSON.stringify(decl.name)},`,
      `  input: ${input},`,
      `  output: ${output},`,
      `  state: ${state},`,
      `};`,
    ].join("\n");
  });

  const imports = [...used].sort().join(", ");
  return `import { ${imports} } from ${JSON.stringify(coreModule)};\n\n${bodies.join("\n\n")}\n`;
}

// ---------------------------------------------------------------------------
// Type declarations
// ---------------------------------------------------------------------------

/** The TypeScript value type of a descriptor of `type`. */
export function valueTypeExpr(type: PortType): string {
  switch (type.kind) {
    case "unit":
      return "null";
    case "bool":
      return "boolean";
    case "bits":
      return `BitVector<${type.width}>`;
    case "tuple":
      return `[${type.items.map(valueTypeExpr).join(", ")}]`;
    case "array":
      return `Array<${valueTypeExpr(type.item)}>`;
    case "struct":
      return `{ ${type.fields.map(([k, t]) => `${propertyKey(k)}: ${valueTypeExpr(t)}`).join("; ")} }`;
  }
}

function usesBits(type: PortType): boolean {
  switch (type.kind) {
    case "bits":
      return true;
    case "tuple":
      return type.items.some(usesBits);
    case "array":
      return usesBits(type.item);
    case "struct":
      return type.fields.some(([, t]) => usesBits(t));
    default:
      return false;
  }
}

/** Contents of the `.d.ports.ts` sidecar matching `generateModule`. */
export function generateDeclarations(
  decls: readonly StateDecl[],
  coreModule: string = DEFAULT_CORE_MODULE,
): string {
  if (decls.length === 0) {
    return "export {};\n";
  }

  const needsBits = decls.some((d) => usesBits(d.input) || usesBits(d.output) || usesBits(d.state));
  const imports = needsBits ? "BitVector, Representable" : "Representable";

  const bodies = decls.map((decl) =>
    [
      `export declare const ${decl.name}: {`,
      `  readonly name: ${JSON.stringify(decl.name)};`,
      `  readonly input: Representable<${valueTypeExpr(decl.input)}>;`,
      `  readonly output: Representable<${valueTypeExpr(decl.output)}>;`,
      `  readonly state: Representable<${valueTypeExpr(decl.state)}>;`,
      `};`,
    ].join("\n"),
  );

  return `import type { ${imports} } from ${JSON.stringify(coreModule)};\n\n${bodies.join("\n\n")}\n`;
}
