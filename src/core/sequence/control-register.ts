import { BUS_MASK } from '../constants';
import type { ControlRegister } from './hardware';

// Gray-coded destination ids written onto the control register outputs.

export function grayEncode(id: number): number {
  return id ^ (id >> 1);
}

export function grayDecode(gray: number): number {
  let id = gray;
  for (let shift = gray >> 1; shift !== 0; shift >>= 1) id ^= shift;
  return id;
}

export function registerWidth(register: ControlRegister): number {
  return register.bits.length;
}

/** Largest number of destination ids the register can carry (id 0 is reserved for reset). */
export function registerCapacity(register: ControlRegister): number {
  return 2 ** register.bits.length - 1;
}

/** Register width needed to carry ids 1..ids. */
export function requiredWidth(ids: number): number {
  return Math.ceil(Math.log2(ids + 1));
}

/** Bus bits driven by the register. */
export function registerMask(register: ControlRegister): number {
  let mask = 0;
  for (const b of register.bits) mask |= 1 << b.output;
  return mask;
}

/** Bus bits not driven by the register. */
export function negativeMask(register: ControlRegister): number {
  return BUS_MASK & ~registerMask(register);
}

/** TDC inputs the register is read back on. */
export function inputMask(register: ControlRegister): number {
  let mask = 0;
  for (const b of register.bits) mask |= 1 << b.input;
  return mask;
}

/** Spread a register value onto the bus: bit i goes to the output of bit i. */
export function valueToState(register: ControlRegister, value: number): number {
  let state = 0;
  for (const b of register.bits) {
    if ((value >> b.bit) & 1) state |= 1 << b.output;
  }
  return state;
}

/** Gather a register value back from a bus state. */
export function stateToValue(register: ControlRegister, state: number): number {
  let value = 0;
  for (const b of register.bits) {
    if ((state >> b.output) & 1) value |= 1 << b.bit;
  }
  return value;
}

/** Register value from a set of TDC inputs seen during one control pulse. */
export function controlPulseToValue(register: ControlRegister, inputs: Iterable<number>): number {
  const seen = new Set(inputs);
  let value = 0;
  for (const b of register.bits) {
    if (seen.has(b.input)) value |= 1 << b.bit;
  }
  return value;
}

/** Destination id encoded by a control pulse. */
export function controlPulseToId(register: ControlRegister, inputs: Iterable<number>): number {
  return grayDecode(controlPulseToValue(register, inputs));
}
