/**
 * Clock/reset expander.
 *
 * Turns a sequence of logical inputs into the samples a clocked testbench
 * observes.  Every cycle expands into three events:
 *
 *   low             clock=0  input = this cycle's input
 *   rising-edge     clock=1  input = this cycle's input   (authoritative)
 *   high-lookahead  clock=1  next  = next cycle's input   (setup before next edge)
 *
 * `resetCycles` cycles with reset asserted come first, driven with the
 * input type's don't-care instance.
 */

import type { ClockPhase } from "./types.js";
import type { Representable } from "./repr.js";
import { resolveClockOptions, type ClockOptions } from "./config.js";

/** Number of samples per expanded cycle. */
export const EVENTS_PER_CYCLE = 3;

export interface ClockEvent<I> {
  readonly time: number;
  /** Zero-based logical cycle, reset cycles included. */
  readonly cycle: number;
  readonly phase: ClockPhase;
  readonly clock: boolean;
  readonly reset: boolean;
  /** The input of this event's cycle. */
  readonly input: I;
  /** On `high-lookahead`, the input of the following cycle, if there is one. */
  readonly next?: I;
}

/** The value presented to the component at this sample. */
export function drivenInput<I>(event: ClockEvent<I>): I {
  return event.next !== undefined ? event.next : event.input;
}

/** The three events of one cycle. */
export function cycleEvents<I>(
  cycle: number,
  period: number,
  reset: boolean,
  input: I,
  next?: I,
): [ClockEvent<I>, ClockEvent<I>, ClockEvent<I>] {
  const start = cycle * period;
  const lookahead: ClockEvent<I> = {
    time: start + period - 1,
    cycle,
    phase: "high-lookahead",
    clock: true,
    reset,
    input,
    ...(next !== undefined ? { next } : {}),
  };
  return [
    { time: start, cycle, phase: "low", clock: false, reset, input },
    { time: start + Math.floor(period / 2), cycle, phase: "rising-edge", clock: true, reset, input },
    lookahead,
  ];
}

/**
 * Expand `inputs` into clock events.
 *
 * The returned iterable is lazy and restartable: each iteration regenerates
 * the same sequence from the captured arguments.
 *
 * @throws RangeError for invalid options.
 */
export function expand<I>(
  inputType: Representable<I>,
  inputs: readonly I[],
  options?: ClockOptions,
): Iterable<ClockEvent<I>> {
  const { resetCycles, period } = resolveClockOptions(options);
  const captured = inputs.slice();

  return {
    *[Symbol.iterator]() {
      const total = resetCycles + captured.length;
      const inputAt = (cycle: number): I =>
        cycle < resetCycles ? inputType.reset() : at(captured, cycle - resetCycles);

      for (let cycle = 0; cycle < total; cycle++) {
        const next = cycle + 1 < total ? inputAt(cycle + 1) : undefined;
        yield* cycleEvents(cycle, period, cycle < resetCycles, inputAt(cycle), next);
      }
    },
  };
}

function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`No input at index ${index}`);
  }
  return item;
}
