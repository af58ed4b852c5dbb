/**
 * vitest custom matchers for encoded values.
 *
 * Usage:
 *   import { setupMatchers } from "@tickwise/core/matchers";
 *   setupMatchers();
 *
 *   expect(repr.bits(value)).toBeX();
 *   expect(bv(4, 5)).toMatchBits("0101");
 */

import { expect } from "vitest";
import type { BitSymbol } from "./types.js";
import { X, packSymbols } from "./types.js";
import { BitVector } from "./bits.js";

// ---------------------------------------------------------------------------
// Matcher declarations (augment vitest's Assertion interface)
// ---------------------------------------------------------------------------

declare module "vitest" {
  // Type parameter matches vitest's own declaration of Assertion.
  interface Assertion<T> {
    /** Assert that the value has any X bits (mask !== 0). */
    toBeX(): void;
    /** Assert that the value is all-X (mask === all-ones). */
    toBeAllX(): void;
    /** Assert that the value has no X bits (mask === 0). */
    toBeNotX(): void;
    /** Assert the encoded bits, MSB first, e.g. `"10x1"`; `_` is ignored. */
    toMatchBits(pattern: string): void;
  }

  interface AsymmetricMatchersContaining {
    toBeX(): void;
    toBeAllX(): void;
    toBeNotX(): void;
    toMatchBits(pattern: string): void;
  }
}

// ---------------------------------------------------------------------------
// Received-value handling
// ---------------------------------------------------------------------------

function isSymbol(v: unknown): v is BitSymbol {
  return v === 0 || v === 1 || v === X;
}

function symbolsOf(received: unknown): BitSymbol[] {
  if (received instanceof BitVector) {
    return received.bits();
  }
  if (Array.isArray(received) && received.every(isSymbol)) {
    return received;
  }
  throw new TypeError(
    "Bit matchers require a BitVector or a bit-symbol array. " +
      "Use repr.bits(value) to encode other values.",
  );
}

/** Render symbols as a string, MSB first, X as `x`. */
export function formatBits(symbols: readonly BitSymbol[]): string {
  return symbols.map((s) => (s === X ? "x" : String(s))).join("");
}

function maskOf(received: unknown): { mask: bigint; width: number } {
  const symbols = symbolsOf(received);
  return { mask: packSymbols(symbols).mask, width: symbols.length };
}

// ---------------------------------------------------------------------------
// Matcher implementations
// ---------------------------------------------------------------------------

const customMatchers = {
  toBeX(received: unknown) {
    const { mask } = maskOf(received);
    const pass = mask !== 0n;
    return {
      pass,
      message: () =>
        pass
          ? `expected value NOT to have X bits, but mask = ${mask}`
          : `expected value to have X bits, but mask = 0`,
    };
  },

  toBeAllX(received: unknown) {
    const { mask, width } = maskOf(received);
    const allOnes = (1n << BigInt(width)) - 1n;
    const pass = width > 0 && mask === allOnes;
    return {
      pass,
      message: () =>
        pass
          ? `expected value NOT to be all-X`
          : `expected value to be all-X, but mask = ${mask}`,
    };
  },

  toBeNotX(received: unknown) {
    const { mask } = maskOf(received);
    const pass = mask === 0n;
    return {
      pass,
      message: () =>
        pass
          ? `expected value to have X bits, but mask = 0`
          : `expected value NOT to have X bits, but mask = ${mask}`,
    };
  },

  toMatchBits(received: unknown, pattern: string) {
    const actual = formatBits(symbolsOf(received));
    const expected = pattern.replace(/_/g, "").toLowerCase();
    const pass = actual === expected;
    return {
      pass,
      message: () =>
        pass
          ? `expected bits NOT to be ${expected}`
          : `expected bits ${expected}, received ${actual}`,
    };
  },
};

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Register custom matchers with vitest.
 * Call once in a setup file or at the top of your test:
 *
 * ```ts
 * import { setupMatchers } from "@tickwise/core/matchers";
 * setupMatchers();
 * ```
 */
export function setupMatchers(): void {
  expect.extend(customMatchers);
}
