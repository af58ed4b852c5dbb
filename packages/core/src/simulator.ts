/**
 * Event-based Simulator.
 *
 * Drives a component one clock cycle at a time with `tick()`.  Each tick
 * expands into the usual low / rising-edge / high-lookahead samples and
 * returns the rising-edge output.
 */

import type { Component } from "./component.js";
import { cycleEvents } from "./clock.js";
import { resolveClockOptions, resolveCycleCount, type ClockOptions } from "./config.js";
import { Stepper, type TraceEntry } from "./trace.js";
import { createLogger, simLog } from "./logger.js";

const log = createLogger("simulator");

// ---------------------------------------------------------------------------
// Simulator
// ---------------------------------------------------------------------------

export class Simulator<I, O, S> {
  private readonly _component: Component<I, O, S>;
  private readonly _period: number;
  private readonly _stepper: Stepper<I, O, S>;
  private readonly _trace: TraceEntry<I, O, S>[] = [];
  private _output: O;
  private _cycle = 0;
  private _disposed = false;

  private constructor(component: Component<I, O, S>, period: number) {
    this._component = component;
    this._period = period;
    this._stepper = new Stepper(component);
    this._output = component.resetOutput ?? component.output.reset();
  }

  /**
   * Create a Simulator for the given component.
   *
   * ```ts
   * const sim = Simulator.create(accumulator(8), { resetCycles: 1 });
   * sim.tick([true, bv(8, 5)]);
   * ```
   *
   * `resetCycles` reset cycles are driven before `create` returns.
   */
  static create<I, O, S>(
    component: Component<I, O, S>,
    options?: ClockOptions,
  ): Simulator<I, O, S> {
    const { resetCycles, period } = resolveClockOptions(options);
    const sim = new Simulator(component, period);
    if (resetCycles > 0) {
      sim.reset(resetCycles);
    }
    return sim;
  }

  /** Output observed at the most recent rising edge. */
  get output(): O {
    this.ensureAlive();
    return this._output;
  }

  /** The component's current state. */
  get state(): S {
    this.ensureAlive();
    return this._stepper.state;
  }

  /** Number of cycles driven so far. */
  get cycle(): number {
    return this._cycle;
  }

  /** Start time of the next cycle. */
  time(): number {
    return this._cycle * this._period;
  }

  /**
   * Drive `count` cycles (default 1) with `input` and reset released.
   *
   * @returns The rising-edge output of the last cycle.
   * @throws RangeError if `count` is not a non-negative integer.
   */
  tick(input: I, count = 1): O {
    this.ensureAlive();
    const cycles = resolveCycleCount(count, "tick count");
    for (let i = 0; i < cycles; i++) {
      this.driveCycle(false, input);
    }
    return this._output;
  }

  /**
   * Drive `cycles` cycles (default 1) with reset asserted and the input
   * type's don't-care value.
   *
   * @throws RangeError if `cycles` is not a non-negative integer.
   */
  reset(cycles = 1): O {
    this.ensureAlive();
    resolveCycleCount(cycles, "reset cycle count");
    const idle = this._component.input.reset();
    for (let i = 0; i < cycles; i++) {
      this.driveCycle(true, idle);
    }
    simLog.resetApplied(log, this._component.name, cycles);
    return this._output;
  }

  /** Every event driven so far, with its output. */
  trace(): readonly TraceEntry<I, O, S>[] {
    this.ensureAlive();
    return this._trace.slice();
  }

  /** Discard the state and recorded trace. */
  dispose(): void {
    if (!this._disposed) {
      this._disposed = true;
      this._trace.length = 0;
      simLog.disposed(log, this._component.name, this._cycle);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private driveCycle(reset: boolean, input: I): void {
    const events = cycleEvents(this._cycle, this._period, reset, input);
    for (const event of events) {
      const entry = this._stepper.apply(event);
      this._trace.push(entry);
      if (event.phase === "rising-edge") {
        this._output = entry.output;
      }
    }
    this._cycle++;
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulator has been disposed");
    }
  }
}
