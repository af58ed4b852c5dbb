import type { ClockReset } from "../types.js";
import { BitVector } from "../bits.js";
import type { Representable } from "../repr.js";
import { bitsType, bool, tuple } from "../repr.js";
import type { Component, ComponentDefinition, Evaluation } from "../component.js";
import { defineComponent } from "../component.js";

/** `[enable, serialIn]` */
export type ShiftRegisterInput = [enable: boolean, serialIn: boolean];

/**
 * Serial-in, parallel-out shift register.
 *
 * The output is the register.  When enabled the register shifts left by one
 * and `serialIn` fills the LSB; otherwise it holds.
 */
export class ShiftRegister<W extends number>
  implements ComponentDefinition<ShiftRegisterInput, BitVector<W>, BitVector<W>>
{
  readonly name: string;
  readonly input: Representable<ShiftRegisterInput>;
  readonly output: Representable<BitVector<W>>;
  readonly state: Representable<BitVector<W>>;
  private readonly _zero: BitVector<W>;
  private readonly _one: BitVector<W>;

  constructor(width: W) {
    this.name = `ShiftRegister<${width}>`;
    this.input = tuple(bool(), bool());
    this.output = bitsType(width);
    this.state = bitsType(width);
    this._zero = BitVector.reset(width);
    this._one = BitVector.from(width, 1);
  }

  evaluate(
    cr: ClockReset,
    input: ShiftRegisterInput,
    state: BitVector<W>,
  ): Evaluation<BitVector<W>, BitVector<W>> {
    if (cr.reset) {
      return [this._zero, this._zero];
    }
    const [enable, serialIn] = input;
    if (!enable) {
      return [state, state];
    }
    const shifted = state.shl(1);
    return [state, serialIn ? shifted.or(this._one) : shifted];
  }
}

export function shiftRegister<W extends number>(
  width: W,
): Component<ShiftRegisterInput, BitVector<W>, BitVector<W>> {
  return defineComponent(new ShiftRegister(width));
}
