/**
 * IPU emulator - executes compiled words one tick at a time.
 *
 * A SET, JUMP or END takes one tick; a WAIT takes 1 + duration ticks.
 * Addresses are 1-based.
 */
import { decodeWord } from './disassembler';
import { Opcode } from './types';
import type { Word32 } from './types';

export const HaltReason = {
  END: 'end',
  JUMP_LIMIT: 'jump-limit',
  TICK_LIMIT: 'tick-limit',
} as const;
export type HaltReason = typeof HaltReason[keyof typeof HaltReason];

export interface IpuOptions {
  /** Count of SPC `channelId` at the tick a JUMP tests it */
  counts?: (channelId: number, tick: number) => number;
  /** Bus value before the first SET */
  idleState?: number;
  maxJumps?: number;
  maxTicks?: number;
}

export interface BusChange {
  tick: number;
  value: number;
}

export interface Executed {
  tick: number;
  address: number;
}

export interface IpuTrace {
  changes: BusChange[];
  executed: Executed[];
  /** Ticks elapsed, including the one the END ran on */
  ticks: number;
  jumps: number;
  halt: HaltReason;
}

export class IpuError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IpuError';
  }
}

export class Ipu {
  private words: Word32[];
  private counts: (channelId: number, tick: number) => number;
  private maxJumps: number;
  private maxTicks: number;

  // Execution state
  private pc = 1;
  private delay = 0;
  private bus: number;
  private tick = 0;
  private jumps = 0;
  private halted: HaltReason | null = null;

  private changes: BusChange[] = [];
  private executed: Executed[] = [];

  constructor(words: Word32[], options: IpuOptions = {}) {
    this.words = words;
    this.counts = options.counts ?? (() => 0);
    this.bus = options.idleState ?? 0;
    this.maxJumps = options.maxJumps ?? 100;
    this.maxTicks = options.maxTicks ?? 10_000_000;
  }

  get busValue(): number {
    return this.bus;
  }

  get haltReason(): HaltReason | null {
    return this.halted;
  }

  /** Advance one tick. Returns false once halted. */
  step(): boolean {
    if (this.halted !== null) return false;
    if (this.tick >= this.maxTicks) {
      this.halted = HaltReason.TICK_LIMIT;
      return false;
    }

    if (this.delay > 0) {
      this.delay--;
      this.tick++;
      return true;
    }

    const word = this.words[this.pc - 1];
    if (word === undefined) {
      throw new IpuError(`Program counter ${this.pc} outside 1..${this.words.length} at tick ${this.tick}`);
    }
    this.executed.push({ tick: this.tick, address: this.pc });

    const ins = decodeWord(word);
    switch (ins.op) {
      case Opcode.WAIT:
        this.delay = ins.duration;
        this.pc++;
        break;
      case Opcode.SET:
        if (ins.value !== this.bus) this.changes.push({ tick: this.tick, value: ins.value });
        this.bus = ins.value;
        this.pc++;
        break;
      case Opcode.JUMP:
        if (ins.always || this.counts(ins.channelId, this.tick) >= ins.threshold) {
          this.jumps++;
          if (this.jumps > this.maxJumps) {
            this.halted = HaltReason.JUMP_LIMIT;
            this.tick++;
            return false;
          }
          this.pc = ins.address;
        } else {
          this.pc++;
        }
        break;
      case Opcode.END:
        this.halted = HaltReason.END;
        this.tick++;
        return false;
    }
    this.tick++;
    return true;
  }

  run(): IpuTrace {
    while (this.step()) { /* run until halted */ }
    return {
      changes: this.changes,
      executed: this.executed,
      ticks: this.tick,
      jumps: this.jumps,
      halt: this.halted ?? HaltReason.TICK_LIMIT,
    };
  }
}

/** Run a program once with a fixed count per SPC channel. */
export function simulate(words: Word32[], counts: Record<number, number> = {}, options: IpuOptions = {}): IpuTrace {
  return new Ipu(words, { ...options, counts: channelId => counts[channelId] ?? 0 }).run();
}
