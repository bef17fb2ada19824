/**
 * IPU instructions as scheduled by the compiler, and their 32-bit encoding.
 *
 * Every instruction has a tick, an optional block and, once the list is final,
 * a 1-based address. `reachedBy` lists the jumps that target it; a jump's
 * `target` always lists the jump back.
 */
import {
  BUS_MASK, JUMP_ADDRESS_MASK, JUMP_ALWAYS_BIT, JUMP_CHANNEL_MASK, JUMP_CHANNEL_SHIFT,
  JUMP_THRESHOLD_MASK, JUMP_THRESHOLD_SHIFT, OPCODE_SHIFT, OPCODES, WAIT_DURATION_MAX,
} from '../constants';
import { CompilerErrorKind, CompilerFault, Opcode } from '../types';
import type { Warning, Word32 } from '../types';

interface InstructionBase {
  time: number;
  block: string | null;
  address: number | null;
  reachedBy: JumpInstruction[];
}

export interface WaitInstruction extends InstructionBase {
  op: typeof Opcode.WAIT;
  duration: number;
}

export interface SetInstruction extends InstructionBase {
  op: typeof Opcode.SET;
  /** Logical bus value; only bits inside `mask` are meaningful */
  logicValue: number;
  mask: number;
  /** Bits inverted on the wire */
  polarityMask: number;
  /** Control register write or reset */
  controlMarker: boolean;
}

export interface JumpInstruction extends InstructionBase {
  op: typeof Opcode.JUMP;
  always: boolean;
  channelId: number;
  threshold: number;
  target: Instruction;
}

export interface EndInstruction extends InstructionBase {
  op: typeof Opcode.END;
}

export type Instruction = WaitInstruction | SetInstruction | JumpInstruction | EndInstruction;

// ---- Constructors ----

export function createWait(time: number, duration: number, block: string | null = null): WaitInstruction {
  return { op: Opcode.WAIT, time, block, address: null, reachedBy: [], duration };
}

export function createSet(
  time: number, logicValue: number, mask: number,
  block: string | null = null, controlMarker = false,
): SetInstruction {
  if ((logicValue & ~mask) !== 0) {
    throw new CompilerFault(CompilerErrorKind.INTERNAL,
      `SET at tick ${time} has value ${hex(logicValue)} outside its mask ${hex(mask)}`);
  }
  return {
    op: Opcode.SET, time, block, address: null, reachedBy: [],
    logicValue, mask, polarityMask: 0, controlMarker,
  };
}

export interface JumpOptions {
  always: boolean;
  channelId: number;
  threshold: number;
  block: string | null;
}

/** Unconditional jumps carry channel 0 and threshold 0. */
export function createJump(time: number, target: Instruction, options: JumpOptions): JumpInstruction {
  const jump: JumpInstruction = {
    op: Opcode.JUMP, time, block: options.block, address: null, reachedBy: [],
    always: options.always,
    channelId: options.always ? 0 : options.channelId,
    threshold: options.always ? 0 : options.threshold,
    target,
  };
  target.reachedBy.push(jump);
  return jump;
}

export function createEnd(time: number, block: string | null = null): EndInstruction {
  return { op: Opcode.END, time, block, address: null, reachedBy: [] };
}

export function isSet(instruction: Instruction): instruction is SetInstruction {
  return instruction.op === Opcode.SET;
}

// ---- Set merging ----

/**
 * Merge SETs of one tick into a single SET.
 * Overlapping bits must agree, except control register bits, where the first
 * value wins and a warning is recorded. Jumps to any of the inputs are
 * redirected to the result.
 */
export function combineSets(sets: SetInstruction[], controlMask: number, warnings: Warning[]): SetInstruction {
  const first = sets[0];
  if (first === undefined) throw new CompilerFault(CompilerErrorKind.INTERNAL, 'No SETs to combine');
  const time = first.time;

  let block: string | null = null;
  for (const set of sets) {
    if (set.time !== time) {
      throw new CompilerFault(CompilerErrorKind.INTERNAL, `Cannot combine SETs at ticks ${time} and ${set.time}`);
    }
    if (set.block === null) continue;
    if (block === set.block) {
      throw new CompilerFault(CompilerErrorKind.INTERNAL, `Two SETs of block '${block}' at tick ${time}`, block);
    }
    if (block !== null) {
      throw new CompilerFault(CompilerErrorKind.INTERNAL,
        `SETs of blocks '${block}' and '${set.block}' at tick ${time}`, set.block);
    }
    block = set.block;
  }

  let value = 0;
  let mask = 0;
  let polarityMask = 0;
  let controlMarker = false;
  const reachedBy: JumpInstruction[] = [];
  for (const set of sets) {
    const conflict = (value ^ set.logicValue) & mask & set.mask;
    if ((conflict & ~controlMask) !== 0) {
      throw new CompilerFault(CompilerErrorKind.INTERNAL,
        `Conflicting SET values on bits ${hex(conflict)} at tick ${time}`);
    }
    if (conflict !== 0) {
      warnings.push({ message: `Control register writes collide at tick ${time}, keeping ${hex(value & controlMask)}` });
    }
    value |= set.logicValue & ~mask;
    mask |= set.mask;
    polarityMask |= set.polarityMask;
    controlMarker ||= set.controlMarker;
    reachedBy.push(...set.reachedBy);
  }

  const combined = createSet(time, value, mask, block, controlMarker);
  combined.polarityMask = polarityMask;
  combined.reachedBy = reachedBy;
  for (const jump of reachedBy) jump.target = combined;
  return combined;
}

/** Take the bits of `inheritanceMask` this SET leaves open from the previous SET. */
export function inheritFrom(set: SetInstruction, previous: SetInstruction, inheritanceMask: number): void {
  const bits = inheritanceMask & ~set.mask & previous.mask;
  set.logicValue |= previous.logicValue & bits;
  set.mask |= bits;
}

// ---- Encoding ----

function overflow(instruction: Instruction, field: string, value: number): never {
  throw new CompilerFault(CompilerErrorKind.FIELD_OVERFLOW,
    `${OPCODES[instruction.op]} at tick ${instruction.time}: ${field} ${value} does not fit`);
}

function word(opcode: Opcode, payload: number): Word32 {
  return ((opcode << OPCODE_SHIFT) | payload) >>> 0;
}

export function encodeInstruction(instruction: Instruction): Word32 {
  switch (instruction.op) {
    case Opcode.WAIT: {
      const { duration } = instruction;
      if (!Number.isInteger(duration) || duration < 1 || duration > WAIT_DURATION_MAX) {
        overflow(instruction, 'duration', duration);
      }
      return word(Opcode.WAIT, duration);
    }
    case Opcode.SET: {
      const physical = (instruction.logicValue ^ instruction.polarityMask) >>> 0;
      if (physical > BUS_MASK) overflow(instruction, 'value', physical);
      return word(Opcode.SET, physical);
    }
    case Opcode.JUMP: {
      const { channelId, threshold, target } = instruction;
      if (!target.reachedBy.includes(instruction)) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL,
          `JUMP at tick ${instruction.time} is not registered with its target`);
      }
      const address = target.address;
      if (address === null) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL,
          `JUMP at tick ${instruction.time} targets an instruction without an address`);
      }
      if (channelId < 0 || channelId > JUMP_CHANNEL_MASK) overflow(instruction, 'channel', channelId);
      if (threshold < 0 || threshold > JUMP_THRESHOLD_MASK) overflow(instruction, 'threshold', threshold);
      if (address < 1 || address > JUMP_ADDRESS_MASK) overflow(instruction, 'address', address);
      return word(Opcode.JUMP,
        (instruction.always ? 1 << JUMP_ALWAYS_BIT : 0)
        | (channelId << JUMP_CHANNEL_SHIFT)
        | (threshold << JUMP_THRESHOLD_SHIFT)
        | address);
    }
    case Opcode.END:
      return word(Opcode.END, 0);
  }
}

// ---- Listing ----

export function hex(value: number, digits = 6): string {
  return '0x' + value.toString(16).toUpperCase().padStart(digits, '0');
}

export function describeInstruction(instruction: Instruction): string {
  const where = `@${instruction.time}`;
  const block = instruction.block === null ? '' : ` [${instruction.block}]`;
  switch (instruction.op) {
    case Opcode.WAIT:
      return `${where} WAIT ${instruction.duration}${block}`;
    case Opcode.SET:
      return `${where} SET ${hex(instruction.logicValue)}/${hex(instruction.mask)}${block}`;
    case Opcode.JUMP: {
      const condition = instruction.always ? 'always' : `spc${instruction.channelId} >= ${instruction.threshold}`;
      return `${where} JUMP ${condition} → @${instruction.target.time}${block}`;
    }
    case Opcode.END:
      return `${where} END${block}`;
  }
}
