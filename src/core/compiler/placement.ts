/**
 * Block placement.
 *
 * Blocks are kept contiguous: overlapping blocks are shifted later as a whole,
 * then every free-standing instruction is fitted around them, latest first.
 * On a collision the weaker instruction (SET < JUMP < END) is displaced
 * towards earlier ticks; an instruction inside a block is moved out of it on
 * the side closer to where it belongs relative to the block's anchor.
 */
import { END_BLOCK, PLACEMENT_PRIORITY } from '../constants';
import { CompilerErrorKind, CompilerFault } from '../types';
import type { Warning } from '../types';
import { isSet } from './instructions';
import type { Instruction } from './instructions';

export interface BlockRange {
  name: string;
  start: number;
  end: number;
  /** Tick the block is attached to: its jump, or its first member for marker-only blocks */
  anchor: number;
  members: Instruction[];
}

function anchorOf(name: string, members: Instruction[]): number {
  if (name === END_BLOCK) return members[members.length - 1].time;
  for (let i = members.length - 1; i >= 0; i--) {
    const member = members[i];
    if (!(isSet(member) && member.controlMarker)) return member.time;
  }
  return members[0].time;
}

export function blockRanges(instructions: readonly Instruction[]): BlockRange[] {
  const groups = new Map<string, Instruction[]>();
  for (const instruction of instructions) {
    if (instruction.block === null) continue;
    const group = groups.get(instruction.block);
    if (group === undefined) groups.set(instruction.block, [instruction]);
    else group.push(instruction);
  }

  const ranges: BlockRange[] = [];
  for (const [name, members] of groups) {
    members.sort((a, b) => a.time - b.time);
    ranges.push({
      name,
      start: members[0].time,
      end: members[members.length - 1].time,
      anchor: anchorOf(name, members),
      members,
    });
  }
  return ranges.sort((a, b) => a.start - b.start || a.end - b.end || a.name.localeCompare(b.name));
}

/** Shift blocks later until none overlaps its predecessor. */
export function separateBlocks(ranges: BlockRange[], warnings: Warning[]): void {
  for (let i = 1; i < ranges.length; i++) {
    const previous = ranges[i - 1];
    const range = ranges[i];
    if (range.start > previous.end) continue;
    if (range.name === END_BLOCK) {
      throw new CompilerFault(CompilerErrorKind.SEQUENCE_TOO_SHORT,
        `Block '${previous.name}' runs into the end of the sequence`, previous.name);
    }
    const offset = previous.end - range.start + 1;
    warnings.push({
      message: `Moving block '${range.name}' by ${offset} ticks to avoid block '${previous.name}'`,
      subject: range.name,
    });
    range.start += offset;
    range.end += offset;
    range.anchor += offset;
    for (const member of range.members) member.time += offset;
  }
}

const Direction = { EARLIER: -1, LATER: 1 } as const;
type Direction = typeof Direction[keyof typeof Direction];

class TickMap {
  readonly slots: (Instruction | null)[];
  private ranges: BlockRange[];

  constructor(length: number, ranges: BlockRange[]) {
    this.slots = new Array<Instruction | null>(length).fill(null);
    this.ranges = ranges;
  }

  inRange(tick: number): boolean {
    return tick >= 0 && tick < this.slots.length;
  }

  blockAt(tick: number): BlockRange | undefined {
    return this.ranges.find(r => tick >= r.start && tick <= r.end);
  }

  put(tick: number, instruction: Instruction): void {
    this.slots[tick] = instruction;
    instruction.time = tick;
  }
}

function placeBlocks(map: TickMap, ranges: BlockRange[]): void {
  for (const range of ranges) {
    for (const member of range.members) {
      if (!map.inRange(member.time)) {
        throw new CompilerFault(CompilerErrorKind.SEQUENCE_TOO_SHORT,
          `Block '${range.name}' does not fit before the end of the sequence`, range.name);
      }
      if (map.slots[member.time] !== null) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL,
          `Block '${range.name}' has two instructions at tick ${member.time}`, range.name);
      }
      map.put(member.time, member);
    }
  }
}

function placeFree(map: TickMap, instruction: Instruction, warnings: Warning[]): void {
  const limit = map.slots.length * 4 + 16;
  let moving = instruction;
  let tick = instruction.time;
  let direction: Direction = Direction.EARLIER;
  let leavingBlock = false;

  for (let steps = 0; ; steps++) {
    if (steps > limit) {
      throw new CompilerFault(CompilerErrorKind.INTERNAL, `Placement around tick ${tick} does not settle`);
    }
    if (!map.inRange(tick)) {
      throw new CompilerFault(CompilerErrorKind.NOT_ENOUGH_ROOM,
        `No free tick for an instruction at tick ${instruction.time}: ran past tick ${tick - direction}`);
    }

    const block = map.blockAt(tick);
    if (block !== undefined) {
      if (leavingBlock) {
        throw new CompilerFault(CompilerErrorKind.NOT_ENOUGH_ROOM,
          `Not enough room next to block '${block.name}' at tick ${tick}`, block.name);
      }
      direction = tick >= block.anchor ? Direction.LATER : Direction.EARLIER;
      const to = direction === Direction.LATER ? block.end + 1 : block.start - 1;
      warnings.push({ message: `Moving instruction at tick ${tick} out of block '${block.name}' to tick ${to}`, subject: block.name });
      tick = to;
      leavingBlock = true;
      continue;
    }

    const occupant = map.slots[tick];
    if (occupant === null) {
      map.put(tick, moving);
      return;
    }

    if (!leavingBlock) {
      const stronger = PLACEMENT_PRIORITY[occupant.op] > PLACEMENT_PRIORITY[moving.op];
      const weaker = PLACEMENT_PRIORITY[occupant.op] < PLACEMENT_PRIORITY[moving.op];
      const keepLooking = direction === Direction.EARLIER ? stronger : weaker;
      if (keepLooking) {
        tick += direction;
        continue;
      }
    }
    map.put(tick, moving);
    moving = occupant;
    tick += direction;
  }
}

/**
 * Place every instruction on its own tick of [0, length).
 * Returns the instructions in tick order; their `time` fields are updated.
 */
export function placeInstructions(instructions: readonly Instruction[], length: number, warnings: Warning[]): Instruction[] {
  const ranges = blockRanges(instructions);
  separateBlocks(ranges, warnings);

  const map = new TickMap(length, ranges);
  placeBlocks(map, ranges);

  const free = instructions
    .filter(i => i.block === null)
    .sort((a, b) => b.time - a.time || b.op - a.op);
  for (const instruction of free) placeFree(map, instruction, warnings);

  return map.slots.filter((i): i is Instruction => i !== null);
}
