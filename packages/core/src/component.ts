/**
 * Component contract.
 *
 * A component declares its input, output and state types and implements
 * exactly one evaluation function:
 *
 *   evaluate(clockReset, input, state) -> [output, nextState]
 *
 * The same state descriptor types both the current state passed in and the
 * next state handed back; the runner latches one into the other on each
 * rising clock edge.
 */

import type { ClockReset, ComponentDescriptor, PortInfo } from "./types.js";
import { ShapeError, clockReset } from "./types.js";
import type { Representable } from "./repr.js";
import { isRepresentable } from "./repr.js";
import { createLogger, simLog } from "./logger.js";

const log = createLogger("component");

/** Result of one evaluation: the output and the next state. */
export type Evaluation<O, S> = readonly [output: O, nextState: S];

/** The single capability every component implements. */
export interface Kernel<I, O, S> {
  evaluate(cr: ClockReset, input: I, state: S): Evaluation<O, S>;
}

/**
 * Next- and current-state declarations of a stateful unit.  Both are typed
 * by `state`; `reset` overrides the descriptor's reset instance.
 */
export interface StateInterface<S> {
  readonly state: Representable<S>;
  readonly reset?: S;
}

/** Port declarations on top of the state declarations. */
export interface PortInterface<I, O, S> extends StateInterface<S> {
  readonly input: Representable<I>;
  readonly output: Representable<O>;
  /** Output produced while reset is asserted; defaults to `output.reset()`. */
  readonly resetOutput?: O;
}

/** What a component author writes. */
export interface ComponentDefinition<I, O, S> extends PortInterface<I, O, S>, Kernel<I, O, S> {
  readonly name: string;
}

/** A validated component, ready for the runner. */
export interface Component<I, O, S> extends PortInterface<I, O, S> {
  readonly name: string;
  /** A fresh copy of the reset state. */
  init(): S;
  /**
   * Pure, total evaluation of one sample.  With reset asserted the result is
   * always the declared reset output and a copy of the reset state.
   */
  step(cr: ClockReset, input: I, state: S): Evaluation<O, S>;
  /** Width metadata for external collaborators. */
  describe(): ComponentDescriptor;
}

export type InputOf<C> = C extends Component<infer I, unknown, unknown> ? I : never;
export type OutputOf<C> = C extends Component<unknown, infer O, unknown> ? O : never;
export type CurrentState<C> = C extends Component<unknown, unknown, infer S> ? S : never;
export type NextState<C> = CurrentState<C>;

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Validate a definition and turn it into a `Component`.
 *
 * @throws ShapeError when the declared types or the evaluation function do
 *         not have the required shape.  Checked once, here, so that `step`
 *         never has to.
 */
export function defineComponent<I, O, S>(
  definition: ComponentDefinition<I, O, S>,
): Component<I, O, S> {
  const name = typeof definition.name === "string" && definition.name !== ""
    ? definition.name
    : "<anonymous>";

  for (const key of ["input", "output", "state"] as const) {
    if (!isRepresentable(definition[key])) {
      throw new ShapeError(name, `'${key}' is not a Representable type`);
    }
  }
  const { input, output, state } = definition;

  if (typeof definition.evaluate !== "function") {
    throw new ShapeError(name, "evaluate is not a function");
  }
  if (definition.evaluate.length !== 3) {
    throw new ShapeError(
      name,
      `evaluate must take (clockReset, input, state), got ${definition.evaluate.length} parameter(s)`,
    );
  }

  const resetState = definition.reset ?? state.reset();
  if (!state.validate(resetState)) {
    throw new ShapeError(name, `declared reset state is not a ${state.name}`);
  }
  const resetOutput = definition.resetOutput ?? output.reset();
  if (!output.validate(resetOutput)) {
    throw new ShapeError(name, `declared reset output is not a ${output.name}`);
  }

  // Evaluate once with reset asserted to check the returned pair.
  const probe: unknown = definition.evaluate(
    clockReset(false, true),
    input.reset(),
    state.clone(resetState),
  );
  if (!Array.isArray(probe) || probe.length !== 2) {
    throw new ShapeError(name, "evaluate must return [output, nextState]");
  }
  if (!output.validate(probe[0])) {
    throw new ShapeError(name, `evaluate returned an output that is not a ${output.name}`);
  }
  if (!state.validate(probe[1])) {
    throw new ShapeError(name, `evaluate returned a next state that is not a ${state.name}`);
  }

  const component: Component<I, O, S> = Object.freeze({
    name,
    input,
    output,
    state,
    reset: resetState,
    resetOutput,
    init: () => state.clone(resetState),
    step: (cr: ClockReset, i: I, s: S): Evaluation<O, S> =>
      cr.reset ? [resetOutput, state.clone(resetState)] : definition.evaluate(cr, i, s),
    describe: () => describeComponent(name, input, output, state),
  });

  simLog.componentRegistered(log, name, input.width, output.width, state.width);
  return component;
}

function describeComponent(
  name: string,
  input: Representable<unknown>,
  output: Representable<unknown>,
  state: Representable<unknown>,
): ComponentDescriptor {
  const port = (
    direction: PortInfo["direction"],
    type: PortInfo["type"],
    width: number,
    typeName: string,
  ): PortInfo => ({ direction, type, width, typeName });

  return {
    name,
    ports: {
      clk: port("input", "clock", 1, "clock"),
      rst: port("input", "reset", 1, "reset"),
      i: port("input", "logic", input.width, input.name),
      o: port("output", "logic", output.width, output.name),
    },
    stateWidth: state.width,
    stateTypeName: state.name,
  };
}
