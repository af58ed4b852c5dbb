/**
 * Time-based Simulation.
 *
 * Pulls events from an expanded clock/reset stream one at a time and
 * provides a high-level API for running to a time, to a condition or for a
 * number of cycles.
 */

import type { Component } from "./component.js";
import type { ClockEvent } from "./clock.js";
import { EVENTS_PER_CYCLE, expand } from "./clock.js";
import type { ClockOptions, StepBudget } from "./config.js";
import { resolveClockOptions, resolveCycleCount, resolveMaxSteps } from "./config.js";
import { SimulationTimeoutError } from "./types.js";
import { Stepper, sample, type TraceEntry } from "./trace.js";
import { createLogger, simLog } from "./logger.js";

const log = createLogger("simulation");

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export class Simulation<I, O, S> {
  private readonly _component: Component<I, O, S>;
  private readonly _events: Iterator<ClockEvent<I>>;
  private readonly _stepper: Stepper<I, O, S>;
  private readonly _trace: TraceEntry<I, O, S>[] = [];
  private _peeked: IteratorResult<ClockEvent<I>> | undefined;
  private _output: O;
  private _time = 0;
  private _disposed = false;

  private constructor(component: Component<I, O, S>, events: Iterable<ClockEvent<I>>) {
    this._component = component;
    this._events = events[Symbol.iterator]();
    this._stepper = new Stepper(component);
    this._output = component.resetOutput ?? component.output.reset();
  }

  /**
   * Create a Simulation over `inputs`.
   *
   * ```ts
   * const sim = Simulation.create(shiftRegister(8), bits, { resetCycles: 2 });
   * sim.runUntil(500);
   * ```
   */
  static create<I, O, S>(
    component: Component<I, O, S>,
    inputs: readonly I[],
    options?: ClockOptions,
  ): Simulation<I, O, S> {
    const resolved = resolveClockOptions(options);
    simLog.runStarted(log, component.name, resolved.resetCycles, inputs.length);
    return new Simulation(component, expand(component.input, inputs, resolved));
  }

  /** Output of the most recently processed event. */
  get output(): O {
    this.ensureAlive();
    return this._output;
  }

  /** The component's current state. */
  get state(): S {
    this.ensureAlive();
    return this._stepper.state;
  }

  /**
   * Process the next event.
   *
   * @returns The time of the processed event, or `null` if no events remain.
   */
  step(): number | null {
    this.ensureAlive();
    const next = this.pull();
    if (next.done) return null;

    const entry = this._stepper.apply(next.value);
    this._trace.push(entry);
    this._output = entry.output;
    this._time = next.value.time;
    return this._time;
  }

  /** Time of the most recently processed event. */
  time(): number {
    this.ensureAlive();
    return this._time;
  }

  /**
   * Peek at the time of the next event without advancing.
   *
   * @returns The time of the next event, or `null` if the stream is exhausted.
   */
  nextEventTime(): number | null {
    this.ensureAlive();
    const next = this.peek();
    return next.done ? null : next.value.time;
  }

  /**
   * Process every event with a time up to and including `endTime`.
   *
   * @throws SimulationTimeoutError if `maxSteps` events are processed
   *         before `endTime` is reached.
   */
  runUntil(endTime: number, opts?: StepBudget): void {
    this.ensureAlive();
    const max = resolveMaxSteps(opts);
    let steps = 0;
    for (;;) {
      const t = this.nextEventTime();
      if (t === null || t > endTime) break;
      this.step();
      steps++;
      if (steps >= max && this.hasEventUpTo(endTime)) {
        throw this.timeout(
          "runUntil",
          `runUntil: exceeded ${max} steps at time ${this._time} (target ${endTime})`,
          steps,
        );
      }
    }
  }

  /**
   * Step until `condition()` returns true.
   *
   * @returns The time when the condition became true (or the stream ended).
   * @throws SimulationTimeoutError if `maxSteps` is exceeded.
   */
  waitUntil(condition: () => boolean, opts?: StepBudget): number {
    this.ensureAlive();
    const max = resolveMaxSteps(opts);
    let steps = 0;
    while (!condition()) {
      if (this.step() === null) break;
      steps++;
      if (steps >= max && !condition()) {
        throw this.timeout(
          "waitUntil",
          `waitUntil: condition not met after ${max} steps at time ${this._time}`,
          steps,
        );
      }
    }
    return this._time;
  }

  /**
   * Advance `count` clock cycles, three events each.
   *
   * @returns The time after the cycles complete.
   * @throws SimulationTimeoutError if `maxSteps` is exceeded.
   * @throws RangeError if `count` is not a non-negative integer.
   */
  waitForCycles(count: number, opts?: StepBudget): number {
    this.ensureAlive();
    const totalSteps = resolveCycleCount(count, "cycle count") * EVENTS_PER_CYCLE;
    const max = resolveMaxSteps(opts);
    for (let stepped = 0; stepped < totalSteps; ) {
      if (this.step() === null) break;
      stepped++;
      if (stepped >= max && stepped < totalSteps) {
        throw this.timeout(
          "waitForCycles",
          `waitForCycles: exceeded ${max} steps at time ${this._time}`,
          stepped,
        );
      }
    }
    return this._time;
  }

  /** Every event processed so far, with its output. */
  trace(): readonly TraceEntry<I, O, S>[] {
    this.ensureAlive();
    return this._trace.slice();
  }

  /** One output per completed rising edge so far. */
  samples(): O[] {
    this.ensureAlive();
    return sample(this._trace);
  }

  /** Discard the state and recorded trace; further calls throw. */
  dispose(): void {
    if (!this._disposed) {
      this._disposed = true;
      const cycles = Math.floor(this._trace.length / EVENTS_PER_CYCLE);
      this._trace.length = 0;
      simLog.disposed(log, this._component.name, cycles);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private peek(): IteratorResult<ClockEvent<I>> {
    if (this._peeked === undefined) {
      this._peeked = this._events.next();
    }
    return this._peeked;
  }

  private pull(): IteratorResult<ClockEvent<I>> {
    const next = this.peek();
    if (!next.done) {
      this._peeked = undefined;
    }
    return next;
  }

  private hasEventUpTo(endTime: number): boolean {
    const t = this.nextEventTime();
    return t !== null && t <= endTime;
  }

  private timeout(helper: string, message: string, steps: number): SimulationTimeoutError {
    simLog.budgetExhausted(log, this._component.name, helper, this._time, steps);
    return new SimulationTimeoutError(message, this._time, steps);
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulation has been disposed");
    }
  }
}
