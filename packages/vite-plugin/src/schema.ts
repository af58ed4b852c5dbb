import { readFileSync } from "node:fs";
import { z } from "zod";
import type { PortType, StateDecl } from "./types.js";

// ---------------------------------------------------------------------------
// Type expressions
//
//   "unit" | "bool" | "b<N>"          scalars
//   [T, ...]                          tuple
//   { "array": T, "length": N }       array
//   { "field": T, ... }               struct
// ---------------------------------------------------------------------------

const unitType: PortType = { kind: "unit" };
const boolType: PortType = { kind: "bool" };
const bitsOf = (width: number): PortType => ({ kind: "bits", width });
const tupleOf = (items: PortType[]): PortType => ({ kind: "tuple", items });
const arrayOf = (item: PortType, length: number): PortType => ({ kind: "array", item, length });
const structOf = (fields: Record<string, PortType>): PortType => ({
  kind: "struct",
  fields: Object.entries(fields),
});

const BITS_RE = /^b([1-9][0-9]*)$/;

const ScalarSchema = z.string().transform((name, ctx): PortType => {
  if (name === "unit") return unitType;
  if (name === "bool") return boolType;
  const match = BITS_RE.exec(name);
  if (match?.[1] !== undefined) {
    return bitsOf(Number(match[1]));
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Unknown type '${name}' (expected unit, bool or b<N>)`,
  });
  return z.NEVER;
});

export const PortTypeSchema: z.ZodType<PortType, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    ScalarSchema,
    z.array(PortTypeSchema).transform(tupleOf),
    z
      .object({ array: PortTypeSchema, length: z.number().int().nonnegative() })
      .strict()
      .transform(({ array, length }) => arrayOf(array, length)),
    z.record(PortTypeSchema).transform((fields, ctx): PortType => {
      if (Object.keys(fields).length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "A struct needs at least one field" });
        return z.NEVER;
      }
      return structOf(fields);
    }),
  ]),
);

// ---------------------------------------------------------------------------
// File schema
// ---------------------------------------------------------------------------

// Words that cannot be bound by `export const` in a module, and the names
// the generated code imports.
const RESERVED_NAMES: ReadonlySet<string> = new Set(
  readReservedNames(new URL("./reserved-names.txt", import.meta.url)),
);

function readReservedNames(url: URL): string[] {
  return readFileSync(url, "utf8")
    .split(/\s+/)
    .filter((word) => word !== "");
}

const ComponentNameSchema = z
  .string()
  .regex(/^[A-Za-z_$][\w$]*$/, "Component names must be identifiers")
  .refine((name) => !RESERVED_NAMES.has(name), (name) => ({
    message: `Component name '${name}' is reserved`,
  }));

export const PortsFileSchema = z.record(
  ComponentNameSchema,
  z
    .object({
      input: PortTypeSchema,
      output: PortTypeSchema,
      state: PortTypeSchema,
    })
    .strict(),
);

/** Thrown when a `.ports` file cannot be read as component declarations. */
export class PortsFileError extends Error {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`${file}: ${detail}`);
    this.name = "PortsFileError";
    this.file = file;
  }
}

/**
 * Parse the text of a `.ports` file.
 *
 * @throws PortsFileError naming `file` when the text is not JSON or does not
 *         match the schema.
 */
export function parsePortsFile(text: string, file: string): StateDecl[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new PortsFileError(file, err instanceof Error ? err.message : String(err));
  }

  const result = PortsFileSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    const issue = first && (specificIssue(first) ?? first);
    const path = issue?.path.join(".") ?? "";
    throw new PortsFileError(file, `${path ? `${path}: ` : ""}${issue?.message ?? "invalid"}`);
  }
  return Object.entries(result.data).map(([name, decl]) => ({ name, ...decl }));
}

// A union reports every branch's failure under one "Invalid input" issue.
// Find the first branch issue that says more than "wrong type".
function specificIssue(issue: z.ZodIssue): z.ZodIssue | undefined {
  if (issue.code === z.ZodIssueCode.invalid_type) return undefined;
  if (issue.code !== z.ZodIssueCode.invalid_union) return issue;
  for (const branch of issue.unionErrors) {
    for (const inner of branch.issues) {
      const found = specificIssue(inner);
      if (found) return found;
    }
  }
  return undefined;
}
