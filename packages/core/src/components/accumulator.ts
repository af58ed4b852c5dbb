import type { ClockReset } from "../types.js";
import { BitVector } from "../bits.js";
import type { Representable } from "../repr.js";
import { bitsType, bool, tuple } from "../repr.js";
import type { Component, ComponentDefinition, Evaluation } from "../component.js";
import { defineComponent } from "../component.js";

/** `[enable, value]` */
export type AccumulatorInput<W extends number> = [enable: boolean, value: BitVector<W>];

/**
 * Running sum.  Outputs the current sum; when enabled the next sum is
 * `sum + value` (wrapping), otherwise it holds.  Reset clears it.
 */
export class Accumulator<W extends number>
  implements ComponentDefinition<AccumulatorInput<W>, BitVector<W>, BitVector<W>>
{
  readonly name: string;
  readonly input: Representable<AccumulatorInput<W>>;
  readonly output: Representable<BitVector<W>>;
  readonly state: Representable<BitVector<W>>;
  private readonly _zero: BitVector<W>;

  constructor(width: W) {
    this.name = `Accumulator<${width}>`;
    this.input = tuple(bool(), bitsType(width));
    this.output = bitsType(width);
    this.state = bitsType(width);
    this._zero = BitVector.reset(width);
  }

  evaluate(
    cr: ClockReset,
    input: AccumulatorInput<W>,
    state: BitVector<W>,
  ): Evaluation<BitVector<W>, BitVector<W>> {
    if (cr.reset) {
      return [this._zero, this._zero];
    }
    const [enable, value] = input;
    return [state, enable ? state.add(value) : state];
  }
}

export function accumulator<W extends number>(
  width: W,
): Component<AccumulatorInput<W>, BitVector<W>, BitVector<W>> {
  return defineComponent(new Accumulator(width));
}
