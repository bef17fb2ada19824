import { Opcode } from './types';

// Opcode mnemonics indexed by the 2-bit opcode field
export const OPCODES: string[] = ['WAIT', 'JUMP', 'SET', 'END'];

export const OPCODE_SHIFT = 30;

// ---- Field layout ----

export const WAIT_DURATION_BITS = 30;
export const WAIT_DURATION_MAX = 2 ** WAIT_DURATION_BITS - 1;

export const BUS_WIDTH = 24;
export const BUS_MASK = 2 ** BUS_WIDTH - 1;

export const JUMP_ALWAYS_BIT = 29;
export const JUMP_CHANNEL_SHIFT = 26;
export const JUMP_CHANNEL_MASK = 0x7;
export const JUMP_THRESHOLD_SHIFT = 10;
export const JUMP_THRESHOLD_MASK = 0xFFFF;
export const JUMP_ADDRESS_MASK = 0x3FF;

// Counts are 16-bit; conditions cover [0, COUNT_LIMIT)
export const COUNT_LIMIT = 0x10000;

// ---- Hardware ranges ----

export const FPGA_CHANNELS = BUS_WIDTH;
export const SPC_CHANNELS = 8;
export const TDC_CHANNELS = 8;

// ---- Compiler defaults ----

export const DEFAULT_FPGA_DELAY_UNIT = 0.01; // µs per tick
export const CONTROL_REGISTER_HIGH_TIME = 350; // ticks
export const MAX_JUMP_CONDITIONS = 10;

export const START_BLOCK = '_START';
export const END_BLOCK = '_END';

// ---- Verifier limits ----

export const MAX_TREE_DEPTH = 100;

// Minimum length of a control window, in µs
export const MIN_CONTROL_WINDOW = 1;

// Relative tolerance when quantizing times to ticks
export const TICK_TOLERANCE = 1e-9;

// Collision priority during block placement: the weaker instruction is displaced
export const PLACEMENT_PRIORITY: Record<Opcode, number> = {
  [Opcode.WAIT]: -1,
  [Opcode.SET]: 0,
  [Opcode.JUMP]: 1,
  [Opcode.END]: 2,
};
