/**
 * Runner and synchronous sampler.
 *
 * `run` applies a component to a clock event stream and yields one trace
 * entry per event.  `sample` reduces a full trace to one output per cycle,
 * keeping the rising-edge sample.  Tests should go through `sample`:
 * indexing the raw trace means accounting for three events per cycle.
 */

import type { Component } from "./component.js";
import type { ClockEvent } from "./clock.js";
import { EVENTS_PER_CYCLE, drivenInput, expand } from "./clock.js";
import type { ClockOptions } from "./config.js";
import { clockReset } from "./types.js";

export interface TraceEntry<I, O, S> {
  readonly event: ClockEvent<I>;
  readonly output: O;
  /** The current state the component was evaluated against. */
  readonly state: S;
}

export type Trace<I, O, S> = Iterable<TraceEntry<I, O, S>>;

/** Index of the authoritative sample within each cycle. */
export const RISING_EDGE_INDEX = 1;

/**
 * Holds the single live reference to a component's state between events.
 *
 * On a rising clock the current state takes the next state produced by the
 * previous evaluation; every event is then evaluated against the current
 * state.
 * @internal
 */
export class Stepper<I, O, S> {
  private _state: S;
  private _pending: S;
  private _clock = false;

  constructor(private readonly _component: Component<I, O, S>) {
    this._state = _component.init();
    this._pending = this._state;
  }

  get state(): S {
    return this._state;
  }

  apply(event: ClockEvent<I>): TraceEntry<I, O, S> {
    if (event.clock && !this._clock) {
      this._state = this._pending;
    }
    this._clock = event.clock;

    const [output, next] = this._component.step(
      clockReset(event.clock, event.reset),
      drivenInput(event),
      this._state,
    );
    this._pending = next;
    return { event, output, state: this._state };
  }
}

/**
 * Run `component` over `events`.  Lazy and restartable: each iteration
 * starts again from `component.init()`.
 */
export function run<I, O, S>(
  component: Component<I, O, S>,
  events: Iterable<ClockEvent<I>>,
): Trace<I, O, S> {
  return {
    *[Symbol.iterator]() {
      const stepper = new Stepper(component);
      for (const event of events) {
        yield stepper.apply(event);
      }
    },
  };
}

/** The rising-edge entry of every cycle. */
export function sampleEntries<I, O, S>(trace: Trace<I, O, S>): TraceEntry<I, O, S>[] {
  const out: TraceEntry<I, O, S>[] = [];
  let index = 0;
  for (const entry of trace) {
    if (index % EVENTS_PER_CYCLE === RISING_EDGE_INDEX) {
      out.push(entry);
    }
    index++;
  }
  return out;
}

/** One output per cycle: element `i` is the output at trace index `3*i + 1`. */
export function sample<I, O, S>(trace: Trace<I, O, S>): O[] {
  return sampleEntries(trace).map((entry) => entry.output);
}

/** `sample(run(component, expand(component.input, inputs, options)))`. */
export function simulate<I, O, S>(
  component: Component<I, O, S>,
  inputs: readonly I[],
  options?: ClockOptions,
): O[] {
  return sample(run(component, expand(component.input, inputs, options)));
}
