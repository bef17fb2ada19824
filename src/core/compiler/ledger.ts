import { CompilerErrorKind, CompilerFault, Opcode } from '../types';
import type { Warning, Word32 } from '../types';
import {
  combineSets, createSet, createWait, describeInstruction, encodeInstruction, inheritFrom, isSet,
} from './instructions';
import type { Instruction, SetInstruction } from './instructions';

const byTimeThenOpcode = (a: Instruction, b: Instruction): number => a.time - b.time || a.op - b.op;

/**
 * The instructions of one compile. Every pass replaces the list and keeps the
 * previous one on an undo stack.
 */
export class InstructionLedger {
  private list: Instruction[] = [];
  private stack: Instruction[][] = [];

  get instructions(): readonly Instruction[] {
    return this.list;
  }

  get history(): readonly (readonly Instruction[])[] {
    return this.stack;
  }

  get length(): number {
    return this.list.length;
  }

  add(...instructions: Instruction[]): void {
    this.list.push(...instructions);
  }

  replace(instructions: Instruction[]): void {
    this.stack.push(this.list);
    this.list = instructions;
  }

  /** Restore the list before the last pass. Instruction objects are shared, not copied. */
  undo(): boolean {
    const previous = this.stack.pop();
    if (previous === undefined) return false;
    this.list = previous;
    return true;
  }

  sort(): void {
    this.replace([...this.list].sort(byTimeThenOpcode));
  }

  sets(): SetInstruction[] {
    return this.list.filter(isSet);
  }

  /**
   * Merge SETs that share a tick. SETs of different blocks stay apart so
   * that block placement can separate them; free SETs join the first block.
   */
  compress(controlMask: number, warnings: Warning[]): void {
    const groups = new Map<string, SetInstruction[]>();
    const free = new Map<number, SetInstruction[]>();
    const firstBlock = new Map<number, string>();
    const rest: Instruction[] = [];
    const push = <K>(map: Map<K, SetInstruction[]>, key: K, set: SetInstruction): void => {
      const group = map.get(key);
      if (group === undefined) map.set(key, [set]);
      else group.push(set);
    };

    for (const instruction of this.list) {
      if (!isSet(instruction)) {
        rest.push(instruction);
      } else if (instruction.block === null) {
        push(free, instruction.time, instruction);
      } else {
        if (!firstBlock.has(instruction.time)) firstBlock.set(instruction.time, instruction.block);
        push(groups, `${instruction.time}:${instruction.block}`, instruction);
      }
    }
    for (const [time, sets] of free) {
      const block = firstBlock.get(time);
      if (block === undefined) groups.set(`${time}:`, sets);
      else for (const set of sets) push(groups, `${time}:${block}`, set);
    }
    for (const group of groups.values()) {
      rest.push(group.length === 1 ? group[0] : combineSets(group, controlMask, warnings));
    }
    this.replace(rest.sort(byTimeThenOpcode));
  }

  /** Walk SETs in time order; each takes the bits of `mask` it leaves open from its predecessor. */
  inheritOutputs(mask: number): void {
    this.sort();
    let previous: SetInstruction | null = null;
    for (const set of this.sets()) {
      if (previous === null) {
        if (set.time !== 0) {
          throw new CompilerFault(CompilerErrorKind.INTERNAL, `First SET is at tick ${set.time}, not 0`);
        }
      } else {
        inheritFrom(set, previous, mask);
      }
      previous = set;
    }
  }

  applyPolarity(polarityMask: number): void {
    for (const set of this.sets()) set.polarityMask = polarityMask;
  }

  /**
   * Fill empty ticks: a WAIT covering the gap when it is two ticks or longer,
   * a SET holding the current bus value for a single tick.
   */
  fillGaps(): void {
    const filled: Instruction[] = [];
    let last = -1;
    let lastSet: SetInstruction | null = null;
    for (const instruction of [...this.list].sort(byTimeThenOpcode)) {
      const empty = instruction.time - last - 1;
      if (empty < 0) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL, `Two instructions at tick ${instruction.time}`);
      }
      if (empty >= 2) {
        filled.push(createWait(last + 1, empty - 1));
      } else if (empty === 1) {
        if (lastSet === null) {
          throw new CompilerFault(CompilerErrorKind.INTERNAL, `No SET before the gap at tick ${last + 1}`);
        }
        const hold = createSet(last + 1, lastSet.logicValue, lastSet.mask);
        hold.polarityMask = lastSet.polarityMask;
        filled.push(hold);
      }
      filled.push(instruction);
      last = instruction.time;
      if (isSet(instruction)) lastSet = instruction;
    }
    this.replace(filled);
  }

  assignAddresses(): void {
    this.sort();
    let previous = -1;
    this.list.forEach((instruction, i) => {
      if (instruction.time <= previous) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL, `Two instructions at tick ${instruction.time}`);
      }
      previous = instruction.time;
      instruction.address = i + 1;
    });
  }

  encode(): Word32[] {
    return this.list.map(encodeInstruction);
  }

  count(op: Opcode): number {
    return this.list.filter(i => i.op === op).length;
  }

  describe(): string {
    return this.list.map(describeInstruction).join('\n');
  }
}
