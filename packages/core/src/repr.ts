/**
 * Representable type descriptors.
 *
 * A descriptor is the static side of a value type: it knows the width
 * without needing an instance, encodes values into bit symbols and
 * produces the canonical reset instance.  Only values with a descriptor may
 * cross into component state or ports, and composite descriptors can only
 * be built from other descriptors.
 */

import { BitVector } from "./bits.js";
import type { BitSymbol } from "./types.js";
import { X } from "./types.js";

export interface Representable<T> {
  readonly kind: "unit" | "bool" | "bits" | "tuple" | "array" | "struct" | "tagged";
  /** Type name, e.g. `b8`, `(bool, b4)`, `[b8; 4]`. */
  readonly name: string;
  readonly width: number;
  /** Encode a value, most significant symbol first; length is `width`. */
  bits(value: T): BitSymbol[];
  /** The canonical reset / don't-care instance. */
  reset(): T;
  equals(a: T, b: T): boolean;
  clone(value: T): T;
  validate(value: unknown): value is T;
}

/** The value type described by a descriptor. */
export type ValueOf<R> = R extends Representable<infer T> ? T : never;

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const UNIT: Representable<null> = {
  kind: "unit",
  name: "()",
  width: 0,
  bits: () => [],
  reset: () => null,
  equals: () => true,
  clone: () => null,
  validate: (value): value is null => value === null,
};

const BOOL: Representable<boolean> = {
  kind: "bool",
  name: "bool",
  width: 1,
  bits: (value) => [value ? 1 : 0],
  reset: () => false,
  equals: (a, b) => a === b,
  clone: (value) => value,
  validate: (value): value is boolean => typeof value === "boolean",
};

/** Zero-width type, for components without inputs or state. */
export function unit(): Representable<null> {
  return UNIT;
}

export function bool(): Representable<boolean> {
  return BOOL;
}

/** Descriptor for `BitVector<W>`. */
export function bitsType<W extends number>(width: W): Representable<BitVector<W>> {
  const reset = BitVector.reset(width);
  return {
    kind: "bits",
    name: `b${width}`,
    width,
    bits: (value) => value.bits(),
    reset: () => reset,
    equals: (a, b) => a.equals(b),
    clone: (value) => value,
    validate: (value): value is BitVector<W> =>
      value instanceof BitVector && value.width === width,
  };
}

// ---------------------------------------------------------------------------
// Composites
//
// Composite values are assembled from `unknown` parts; `checked` runs the
// descriptor's own validation to recover the precise value type.
// ---------------------------------------------------------------------------

type Descriptors = readonly Representable<unknown>[];

function sumWidths(items: Descriptors): number {
  return items.reduce((acc, r) => acc + r.width, 0);
}

function checked<T>(
  validate: (value: unknown) => value is T,
  name: string,
): (value: unknown) => T {
  return (value) => {
    if (!validate(value)) {
      throw new TypeError(`Value does not match ${name}`);
    }
    return value;
  };
}

export type TupleOf<R extends Descriptors> = { -readonly [K in keyof R]: ValueOf<R[K]> };

/** Fixed-length heterogeneous product; item 0 encodes first (highest). */
export function tuple<R extends Descriptors>(...items: R): Representable<TupleOf<R>> {
  const name = `(${items.map((r) => r.name).join(", ")})`;
  const validate = (value: unknown): value is TupleOf<R> =>
    Array.isArray(value) &&
    value.length === items.length &&
    items.every((r, i) => r.validate(value[i]));
  const check = checked(validate, name);
  return {
    kind: "tuple",
    name,
    width: sumWidths(items),
    bits: (value: readonly unknown[]) => items.flatMap((r, i) => r.bits(value[i])),
    reset: () => check(items.map((r) => r.reset())),
    equals: (a: readonly unknown[], b: readonly unknown[]) =>
      items.every((r, i) => r.equals(a[i], b[i])),
    clone: (value: readonly unknown[]) => check(items.map((r, i) => r.clone(value[i]))),
    validate,
  };
}

/** Fixed-length homogeneous sequence; element 0 encodes first (highest). */
export function array<T>(item: Representable<T>, length: number): Representable<T[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Array length must be a non-negative integer, got ${length}`);
  }
  return {
    kind: "array",
    name: `[${item.name}; ${length}]`,
    width: item.width * length,
    bits: (value) => value.flatMap((v) => item.bits(v)),
    reset: () => Array.from({ length }, () => item.reset()),
    equals: (a, b) =>
      a.length === b.length &&
      a.every((v, i) => {
        const w = b[i];
        return w !== undefined && item.equals(v, w);
      }),
    clone: (value) => value.map((v) => item.clone(v)),
    validate: (value): value is T[] =>
      Array.isArray(value) &&
      value.length === length &&
      value.every((v) => item.validate(v)),
  };
}

type FieldDescriptors = Record<string, Representable<unknown>>;

export type StructOf<F extends FieldDescriptors> = { [K in keyof F]: ValueOf<F[K]> };

/** Named product; fields encode in declaration order, first field highest. */
export function struct<F extends FieldDescriptors>(
  fields: F,
  name?: string,
): Representable<StructOf<F>> {
  const entries = Object.entries(fields);
  const typeName = name ?? `{ ${entries.map(([k, r]) => `${k}: ${r.name}`).join(", ")} }`;
  const validate = (value: unknown): value is StructOf<F> =>
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    entries.every(([key, r]) => r.validate(Reflect.get(value, key)));
  const check = checked(validate, typeName);
  const build = (fn: (r: Representable<unknown>, key: string) => unknown) =>
    check(Object.fromEntries(entries.map(([key, r]) => [key, fn(r, key)])));
  return {
    kind: "struct",
    name: typeName,
    width: sumWidths(entries.map(([, r]) => r)),
    bits: (value: object) => entries.flatMap(([key, r]) => r.bits(Reflect.get(value, key))),
    reset: () => build((r) => r.reset()),
    equals: (a: object, b: object) =>
      entries.every(([key, r]) => r.equals(Reflect.get(a, key), Reflect.get(b, key))),
    clone: (value: object) => build((r, key) => r.clone(Reflect.get(value, key))),
    validate,
  };
}

// ---------------------------------------------------------------------------
// Tagged union
// ---------------------------------------------------------------------------

export type TaggedOf<V extends FieldDescriptors> = {
  [K in keyof V & string]: { readonly tag: K; readonly value: ValueOf<V[K]> };
}[keyof V & string];

/** Bits needed to number `count` variants. */
export function discriminantWidth(count: number): number {
  return count <= 1 ? 0 : Math.ceil(Math.log2(count));
}

/**
 * Tagged union.  Width is the discriminant width plus the widest payload.
 * The discriminant (variant index in declaration order) encodes first;
 * payload bits not used by the active variant encode as X.
 */
export function tagged<V extends FieldDescriptors>(
  variants: V,
  name?: string,
): Representable<TaggedOf<V>> {
  const entries = Object.entries(variants);
  const first = entries[0];
  if (!first) {
    throw new RangeError("A tagged union needs at least one variant");
  }
  const typeName = name ?? entries.map(([k, r]) => `${k}(${r.name})`).join(" | ");
  const tagWidth = discriminantWidth(entries.length);
  const payloadWidth = Math.max(...entries.map(([, r]) => r.width));

  const variantOf = (value: object): [number, Representable<unknown>] => {
    const tag: unknown = Reflect.get(value, "tag");
    const index = entries.findIndex(([key]) => key === tag);
    const entry = entries[index];
    if (!entry) {
      throw new RangeError(`Unknown variant '${String(tag)}' of ${typeName}`);
    }
    return [index, entry[1]];
  };
  const payloadOf = (value: object): unknown => Reflect.get(value, "value");

  const validate = (value: unknown): value is TaggedOf<V> => {
    if (typeof value !== "object" || value === null) return false;
    const tag: unknown = Reflect.get(value, "tag");
    const entry = entries.find(([key]) => key === tag);
    return entry !== undefined && entry[1].validate(payloadOf(value));
  };
  const check = checked(validate, typeName);

  return {
    kind: "tagged",
    name: typeName,
    width: tagWidth + payloadWidth,
    bits: (value: object) => {
      const [index, r] = variantOf(value);
      const out: BitSymbol[] = [];
      for (let i = tagWidth - 1; i >= 0; i--) {
        out.push((index >> i) & 1 ? 1 : 0);
      }
      for (let i = r.width; i < payloadWidth; i++) {
        out.push(X);
      }
      out.push(...r.bits(payloadOf(value)));
      return out;
    },
    reset: () => check({ tag: first[0], value: first[1].reset() }),
    equals: (a: object, b: object) => {
      const [ia, r] = variantOf(a);
      const [ib] = variantOf(b);
      return ia === ib && r.equals(payloadOf(a), payloadOf(b));
    },
    clone: (value: object) =>
      check({ tag: Reflect.get(value, "tag"), value: variantOf(value)[1].clone(payloadOf(value)) }),
    validate,
  };
}

const REPRESENTABLE_METHODS = ["bits", "reset", "equals", "clone", "validate"] as const;

/** Duck check used when registering components. */
export function isRepresentable(value: unknown): value is Representable<unknown> {
  if (typeof value !== "object" || value === null) return false;
  return (
    typeof Reflect.get(value, "kind") === "string" &&
    typeof Reflect.get(value, "name") === "string" &&
    Number.isInteger(Reflect.get(value, "width")) &&
    REPRESENTABLE_METHODS.every((method) => typeof Reflect.get(value, method) === "function")
  );
}
