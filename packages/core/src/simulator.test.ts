import { describe, test, expect } from "vitest";
import { bv } from "./bits.js";
import { Simulator } from "./simulator.js";
import { accumulator, shiftOut } from "./components/index.js";

// ---------------------------------------------------------------------------
// Creation and reset
// ---------------------------------------------------------------------------

describe("Simulator.create", () => {
  test("drives the reset cycles before returning", () => {
    const sim = Simulator.create(accumulator(8), { resetCycles: 1 });
    expect(sim.cycle).toBe(1);
    expect(sim.time()).toBe(100);
    expect(sim.output.value).toBe(0n);
    expect(sim.trace()).toHaveLength(3);
  });

  test("without reset cycles nothing is driven", () => {
    const sim = Simulator.create(accumulator(8));
    expect(sim.cycle).toBe(0);
    expect(sim.trace()).toEqual([]);
    expect(sim.output.value).toBe(0n);
  });

  test("validates options", () => {
    expect(() => Simulator.create(accumulator(8), { period: 1 })).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// tick
// ---------------------------------------------------------------------------

describe("Simulator.tick", () => {
  test("returns the rising-edge output of each cycle", () => {
    const sim = Simulator.create(accumulator(8), { resetCycles: 1 });
    expect(sim.tick([true, bv(8, 5)]).value).toBe(5n);
    expect(sim.tick([true, bv(8, 3)]).value).toBe(8n);
    expect(sim.tick([false, bv(8, 9)]).value).toBe(8n);
    expect(sim.state.value).toBe(8n);
    expect(sim.cycle).toBe(4);
  });

  test("repeats the same input for count cycles", () => {
    const sim = Simulator.create(accumulator(8));
    expect(sim.tick([true, bv(8, 1)], 3).value).toBe(3n);
    expect(sim.cycle).toBe(3);
  });

  test("advances time by one period per cycle", () => {
    const sim = Simulator.create(accumulator(8), { resetCycles: 2, period: 10 });
    expect(sim.time()).toBe(20);
    sim.tick([true, bv(8, 1)]);
    expect(sim.time()).toBe(30);
    expect(sim.trace().map((e) => e.event.time).slice(-3)).toEqual([20, 25, 29]);
  });

  test("records three events per cycle", () => {
    const sim = Simulator.create(accumulator(8), { resetCycles: 1 });
    sim.tick([true, bv(8, 1)], 2);
    const trace = sim.trace();
    expect(trace).toHaveLength(9);
    expect(trace.map((e) => e.event.reset)).toEqual([
      true, true, true,
      false, false, false,
      false, false, false,
    ]);
  });

  test("parallel-in serial-out shows the loaded MSB at the load edge", () => {
    const sim = Simulator.create(shiftOut(8), { resetCycles: 1 });
    expect(sim.output).toBe(false);
    expect(sim.tick([false, true, bv(8, 0xab)])).toBe(true);
    expect(sim.tick([true, false, bv(8, 0)])).toBe(false);
    expect(sim.tick([true, false, bv(8, 0)])).toBe(true);
    expect(sim.state.value).toBe(0xacn);
  });

  test("rejects counts that are not whole numbers of cycles", () => {
    const sim = Simulator.create(accumulator(8));
    expect(() => sim.tick([true, bv(8, 1)], -1)).toThrow(
      "Invalid tick count: Number must be greater than or equal to 0",
    );
    expect(() => sim.tick([true, bv(8, 1)], 1.5)).toThrow(
      "Invalid tick count: Expected integer, received float",
    );
    expect(sim.cycle).toBe(0);
    expect(sim.trace()).toEqual([]);
  });

  test("a count of zero drives nothing", () => {
    const sim = Simulator.create(accumulator(8));
    expect(sim.tick([true, bv(8, 1)], 0).value).toBe(0n);
    expect(sim.cycle).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// reset
// ---------------------------------------------------------------------------

describe("Simulator.reset", () => {
  test("returns to the reset state mid-run", () => {
    const sim = Simulator.create(accumulator(8));
    sim.tick([true, bv(8, 8)]);
    expect(sim.reset().value).toBe(0n);
    expect(sim.state.value).toBe(0n);
    expect(sim.tick([true, bv(8, 2)]).value).toBe(2n);
  });

  test("drives the requested number of cycles", () => {
    const sim = Simulator.create(accumulator(8));
    sim.reset(3);
    expect(sim.cycle).toBe(3);
    expect(sim.trace().every((e) => e.event.reset)).toBe(true);
  });

  test("rejects negative and fractional cycle counts", () => {
    const sim = Simulator.create(accumulator(8));
    expect(() => sim.reset(-2)).toThrow(RangeError);
    expect(() => sim.reset(0.5)).toThrow(RangeError);
    expect(sim.cycle).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// dispose
// ---------------------------------------------------------------------------

describe("Simulator.dispose", () => {
  test("further use throws", () => {
    const sim = Simulator.create(accumulator(8));
    sim.dispose();
    expect(() => sim.tick([true, bv(8, 1)])).toThrow("Simulator has been disposed");
    expect(() => sim.output).toThrow("Simulator has been disposed");
  });

  test("is idempotent", () => {
    const sim = Simulator.create(accumulator(8));
    sim.dispose();
    expect(() => sim.dispose()).not.toThrow();
  });
});
