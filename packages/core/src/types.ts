/**
 * @tickwise/core — Core type definitions
 *
 * These types define the contract between:
 *   - component authors (kernels, declared port/state types)
 *   - the runtime (expander, runner, sampler, Simulator/Simulation)
 *   - external collaborators that only consume width metadata
 */

// ---------------------------------------------------------------------------
// Bit symbols
// ---------------------------------------------------------------------------

/** Sentinel representing an unknown / don't-care bit. */
export const X = Symbol.for("tickwise:X");

/** One position of an encoded value, most significant first. */
export type BitSymbol = 0 | 1 | typeof X;

/** A 4-state value with explicit bit-level mask. */
export interface FourStateValue {
  readonly __fourState: true;
  readonly value: bigint;
  readonly mask: bigint;
}

/** Construct a 4-state value. Mask bits set to 1 indicate X. */
export function FourState(
  value: number | bigint,
  mask: number | bigint,
): FourStateValue {
  return { __fourState: true, value: BigInt(value), mask: BigInt(mask) };
}

/**
 * Pack an MSB-first symbol sequence into value + mask.
 * X positions contribute 0 to `value` and 1 to `mask`.
 */
export function packSymbols(symbols: readonly BitSymbol[]): FourStateValue {
  let value = 0n;
  let mask = 0n;
  for (const s of symbols) {
    value <<= 1n;
    mask <<= 1n;
    if (s === X) {
      mask |= 1n;
    } else if (s === 1) {
      value |= 1n;
    }
  }
  return FourState(value, mask);
}

// ---------------------------------------------------------------------------
// Clock / reset
// ---------------------------------------------------------------------------

/**
 * The clock and reset levels of the sample being evaluated.
 * Valid for a single evaluation only; the runtime never keeps one around.
 */
export interface ClockReset {
  readonly clock: boolean;
  readonly reset: boolean;
}

export function clockReset(clock: boolean, reset: boolean): ClockReset {
  return { clock, reset };
}

/** The three samples of every expanded clock cycle, in order. */
export type ClockPhase = "low" | "rising-edge" | "high-lookahead";

// ---------------------------------------------------------------------------
// Width metadata (consumed by external collaborators)
// ---------------------------------------------------------------------------

/** Metadata for a single port of a component. */
export interface PortInfo {
  readonly direction: "input" | "output";
  readonly type: "clock" | "reset" | "logic";
  readonly width: number;
  /** Type name of the port's Representable, e.g. `(bool, b8)`. */
  readonly typeName: string;
}

/**
 * Everything a hardware-text generator is owed by the core:
 * the component name, per-port widths and the state width.
 */
export interface ComponentDescriptor {
  readonly name: string;
  readonly ports: Record<"clk" | "rst" | "i" | "o", PortInfo>;
  readonly stateWidth: number;
  readonly stateTypeName: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when two values of incompatible width meet in an operation that
 * needs equal (or explicitly related) widths.
 */
export class WidthMismatchError extends Error {
  readonly operation: string;
  readonly expected: number;
  readonly actual: number;

  constructor(operation: string, expected: number, actual: number) {
    super(`${operation}: expected width ${expected}, got ${actual}`);
    this.name = "WidthMismatchError";
    this.operation = operation;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown at registration when a component definition does not have the
 * `(clockReset, input, state) -> [output, nextState]` shape.
 */
export class ShapeError extends Error {
  readonly component: string;
  readonly reason: string;

  constructor(component: string, reason: string) {
    super(`Component '${component}': ${reason}`);
    this.name = "ShapeError";
    this.component = component;
    this.reason = reason;
  }
}

/**
 * Thrown when a simulation helper exceeds its step budget.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly steps: number;

  constructor(message: string, time: number, steps: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.steps = steps;
  }
}
