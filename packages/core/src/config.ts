/**
 * Option schemas for the expander and the simulation drivers.
 *
 * Options arrive as plain objects from test code; they are validated here
 * once, before any event is produced, so the hot loops can trust them.
 */

import { z } from "zod";

/** Default clock period, in time units. */
export const DEFAULT_PERIOD = 100;

/** Default step budget for `Simulation` helpers. */
export const DEFAULT_MAX_STEPS = 100_000;

export const ClockOptionsSchema = z.object({
  /** Number of cycles driven with reset asserted before the first input. */
  resetCycles: z.number().int().nonnegative().default(0),
  /**
   * Clock period.  Each cycle needs three distinct timestamps, so the
   * smallest usable period is 3.
   */
  period: z.number().int().min(3).default(DEFAULT_PERIOD),
});

export const StepBudgetSchema = z.object({
  maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
});

/** Cycle counts passed to `tick`, `reset` and `waitForCycles`. */
export const CycleCountSchema = z.number().int().nonnegative();

export type ClockOptions = z.input<typeof ClockOptionsSchema>;
export type ResolvedClockOptions = z.output<typeof ClockOptionsSchema>;
export type StepBudget = z.input<typeof StepBudgetSchema>;

/**
 * Parse `input` with `schema`, rethrowing the first issue as a RangeError.
 */
function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") ?? "";
    throw new RangeError(`Invalid ${what}${path ? ` '${path}'` : ""}: ${issue?.message ?? "unknown issue"}`);
  }
  return result.data;
}

export function resolveClockOptions(options?: ClockOptions): ResolvedClockOptions {
  return parseOptions(ClockOptionsSchema, options, "clock option");
}

export function resolveMaxSteps(budget?: StepBudget): number {
  return parseOptions(StepBudgetSchema, budget, "step budget").maxSteps;
}

export function resolveCycleCount(count: number, what: string): number {
  return parseOptions(CycleCountSchema, count, what);
}
