/**
 * @tickwise/core
 *
 * Cycle-accurate simulation of synchronous circuits in TypeScript.
 * Fixed-width values, typed component ports and state, and a clock/reset
 * expander whose output reduces to one authoritative sample per cycle.
 */

// Core types and errors
export type {
  BitSymbol,
  ClockPhase,
  ClockReset,
  ComponentDescriptor,
  FourStateValue,
  PortInfo,
} from "./types.js";
export {
  X,
  FourState,
  packSymbols,
  clockReset,
  WidthMismatchError,
  ShapeError,
  SimulationTimeoutError,
} from "./types.js";

// Values
export { BitVector, bv, concat, slice, zeroExtend } from "./bits.js";
export type { B1, B4, B8, B16, B32, B64 } from "./bits.js";

// Representable descriptors
export {
  unit,
  bool,
  bitsType,
  tuple,
  array,
  struct,
  tagged,
  discriminantWidth,
  isRepresentable,
} from "./repr.js";
export type { Representable, ValueOf, TupleOf, StructOf, TaggedOf } from "./repr.js";

// Component contract
export { defineComponent } from "./component.js";
export type {
  Component,
  ComponentDefinition,
  CurrentState,
  Evaluation,
  InputOf,
  Kernel,
  NextState,
  OutputOf,
  PortInterface,
  StateInterface,
} from "./component.js";

// Clock/reset expansion, runner, sampler
export { EVENTS_PER_CYCLE, cycleEvents, drivenInput, expand } from "./clock.js";
export type { ClockEvent } from "./clock.js";
export { RISING_EDGE_INDEX, run, sample, sampleEntries, simulate } from "./trace.js";
export type { Trace, TraceEntry } from "./trace.js";

// Options
export { DEFAULT_MAX_STEPS, DEFAULT_PERIOD } from "./config.js";
export type { ClockOptions, StepBudget } from "./config.js";

// Simulator (event-based)
export { Simulator } from "./simulator.js";

// Simulation (time-based)
export { Simulation } from "./simulation.js";

// Example components
export * from "./components/index.js";
