/**
 * A port or state type read from a `.ports` file, normalised from its JSON
 * spelling.
 */
export type PortType =
  | { readonly kind: "unit" }
  | { readonly kind: "bool" }
  | { readonly kind: "bits"; readonly width: number }
  | { readonly kind: "tuple"; readonly items: readonly PortType[] }
  | { readonly kind: "array"; readonly item: PortType; readonly length: number }
  | { readonly kind: "struct"; readonly fields: readonly (readonly [string, PortType])[] };

/** The declared types of one component. */
export interface StateDecl {
  readonly name: string;
  readonly input: PortType;
  readonly output: PortType;
  readonly state: PortType;
}

/** Every `.ports` file of a project, keyed by path relative to the root. */
export interface PortsProject {
  readonly projectRoot: string;
  readonly files: Record<string, readonly StateDecl[]>;
}

/** Plugin options. */
export interface PortsPluginOptions {
  /** Root searched for `.ports` files. Defaults to Vite's `root`. */
  projectRoot?: string;
  /** Module the generated code imports descriptors from. */
  coreModule?: string;
}
