import { describe, test, expect } from "vitest";
import { shiftRegister, simulate, type ShiftRegisterInput } from "@tickwise/core";
import { setupMatchers } from "@tickwise/core/matchers";

setupMatchers();

describe("ShiftRegister", () => {
  test("assembles serial bits MSB first", () => {
    const inputs: ShiftRegisterInput[] = [
      [true, true],
      [true, false],
      [true, true],
      [true, false],
      [true, true],
      [true, true],
      [true, false],
      [true, false],
      [false, true],
    ];

    const out = simulate(shiftRegister(8), inputs, { resetCycles: 2 });

    expect(out.map((v) => v.toNumber())).toEqual([
      0x00, 0x00, 0x01, 0x02, 0x05, 0x0a, 0x15, 0x2b, 0x56, 0xac, 0xac,
    ]);
    expect(out[out.length - 1]).toMatchBits("1010_1100");
  });

  test("holds while disabled", () => {
    const out = simulate(shiftRegister(4), [
      [true, true],
      [false, true],
      [false, false],
      [true, true],
    ]);
    expect(out.map((v) => v.toNumber())).toEqual([1, 1, 1, 3]);
  });
});
