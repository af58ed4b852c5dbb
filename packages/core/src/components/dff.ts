import type { ClockReset } from "../types.js";
import type { Representable } from "../repr.js";
import type { Component, ComponentDefinition, Evaluation } from "../component.js";
import { defineComponent } from "../component.js";

/**
 * D flip-flop.  Outputs the current state; the input becomes the next
 * state.  Reset forces the reset value onto both.
 */
export class Dff<T> implements ComponentDefinition<T, T, T> {
  readonly name: string;
  readonly input: Representable<T>;
  readonly output: Representable<T>;
  readonly state: Representable<T>;
  readonly reset: T;
  readonly resetOutput: T;

  constructor(type: Representable<T>, reset?: T) {
    this.name = `Dff<${type.name}>`;
    this.input = type;
    this.output = type;
    this.state = type;
    this.reset = reset ?? type.reset();
    this.resetOutput = this.reset;
  }

  evaluate(cr: ClockReset, input: T, state: T): Evaluation<T, T> {
    if (cr.reset) {
      return [this.reset, this.reset];
    }
    return [state, input];
  }
}

export function dff<T>(type: Representable<T>, reset?: T): Component<T, T, T> {
  return defineComponent(new Dff(type, reset));
}
