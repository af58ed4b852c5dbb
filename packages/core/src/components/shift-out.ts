import type { ClockReset } from "../types.js";
import { BitVector } from "../bits.js";
import type { Representable } from "../repr.js";
import { bitsType, bool, tuple } from "../repr.js";
import type { Component, ComponentDefinition, Evaluation } from "../component.js";
import { defineComponent } from "../component.js";

/** `[enable, load, dataIn]` */
export type ShiftOutInput<W extends number> = [enable: boolean, load: boolean, dataIn: BitVector<W>];

/**
 * Parallel-in, serial-out shift register.
 *
 * The output is the register's MSB.  `load` copies `dataIn` into the
 * register and wins over `enable`; `enable` shifts left, filling with 0.
 */
export class ShiftOut<W extends number>
  implements ComponentDefinition<ShiftOutInput<W>, boolean, BitVector<W>>
{
  readonly name: string;
  readonly input: Representable<ShiftOutInput<W>>;
  readonly output: Representable<boolean>;
  readonly state: Representable<BitVector<W>>;
  private readonly _zero: BitVector<W>;

  constructor(width: W) {
    this.name = `ShiftOut<${width}>`;
    this.input = tuple(bool(), bool(), bitsType(width));
    this.output = bool();
    this.state = bitsType(width);
    this._zero = BitVector.reset(width);
  }

  evaluate(
    cr: ClockReset,
    input: ShiftOutInput<W>,
    state: BitVector<W>,
  ): Evaluation<boolean, BitVector<W>> {
    if (cr.reset) {
      return [false, this._zero];
    }
    const [enable, load, dataIn] = input;
    const serialOut = state.msb();
    if (load) {
      return [serialOut, dataIn];
    }
    return [serialOut, enable ? state.shl(1) : state];
  }
}

export function shiftOut<W extends number>(
  width: W,
): Component<ShiftOutInput<W>, boolean, BitVector<W>> {
  return defineComponent(new ShiftOut(width));
}
