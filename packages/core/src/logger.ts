/**
 * Structured logging for the simulation runtime.
 *
 * Per-event evaluation never logs; these helpers are called at registration
 * and around driver activities only.
 */

import { pino, type Logger } from "pino";

const level = process.env.LOG_LEVEL ?? "info";

export const logger = pino({
  name: "tickwise",
  level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Structured log helpers for common simulation events
 */
export const simLog = {
  componentRegistered: (
    log: Logger,
    name: string,
    inputWidth: number,
    outputWidth: number,
    stateWidth: number,
  ) => {
    log.debug({ name, inputWidth, outputWidth, stateWidth, msg: "Component registered" });
  },

  runStarted: (log: Logger, name: string, resetCycles: number, inputs: number) => {
    log.debug({ name, resetCycles, inputs, msg: "Run started" });
  },

  resetApplied: (log: Logger, name: string, cycles: number) => {
    log.debug({ name, cycles, msg: "Reset applied" });
  },

  disposed: (log: Logger, name: string, cycles: number) => {
    log.debug({ name, cycles, msg: "Driver disposed" });
  },

  budgetExhausted: (
    log: Logger,
    name: string,
    helper: string,
    time: number,
    steps: number,
  ) => {
    log.warn({ name, helper, time, steps, msg: "Step budget exhausted" });
  },
};
