import { describe, test, expect, afterEach } from "vitest";
import {
  Simulation,
  Simulator,
  accumulator,
  bv,
  simulate,
  type AccumulatorInput,
  type BitVector,
} from "@tickwise/core";

function adds(...values: number[]): AccumulatorInput<8>[] {
  return values.map((v): AccumulatorInput<8> => [true, bv(8, v)]);
}

describe("Accumulator", () => {
  let sim: Simulation<AccumulatorInput<8>, BitVector<8>, BitVector<8>> | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  test("sums its inputs after one reset cycle", () => {
    const out = simulate(accumulator(8), adds(1, 2, 3), { resetCycles: 1 });
    expect(out.map((v) => v.toNumber())).toEqual([0, 1, 3, 6]);
  });

  test("wraps at its width", () => {
    const out = simulate(accumulator(4), [
      [true, bv(4, 9)],
      [true, bv(4, 9)],
    ]);
    expect(out.map((v) => v.toNumber())).toEqual([9, 2]);
  });

  test("time-based run reaches the same sum", () => {
    sim = Simulation.create(accumulator(8), adds(10, 20, 30), { resetCycles: 2, period: 10 });
    expect(sim.time()).toBe(0);

    sim.runUntil(20);
    expect(sim.output.value).toBe(0n);

    sim.runUntil(100);
    expect(sim.output.value).toBe(60n);
    expect(sim.time()).toBe(49);
  });

  test("event-based run matches the batch run", () => {
    const ticked = Simulator.create(accumulator(8), { resetCycles: 1 });
    const outputs = adds(4, 5, 6).map((input) => ticked.tick(input).toNumber());
    ticked.dispose();

    const batch = simulate(accumulator(8), adds(4, 5, 6), { resetCycles: 1 });
    expect([0, ...outputs]).toEqual(batch.map((v) => v.toNumber()));
    expect(outputs).toEqual([4, 9, 15]);
  });
});
