export { Dff, dff } from "./dff.js";
export { Accumulator, accumulator, type AccumulatorInput } from "./accumulator.js";
export { ShiftRegister, shiftRegister, type ShiftRegisterInput } from "./shift-register.js";
export { ShiftOut, shiftOut, type ShiftOutInput } from "./shift-out.js";
