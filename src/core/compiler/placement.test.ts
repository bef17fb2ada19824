import { describe, it, expect } from 'vitest';
import { CompilerFault } from '../types';
import type { Warning } from '../types';
import { createEnd, createJump, createSet } from './instructions';
import type { Instruction } from './instructions';
import { blockRanges, placeInstructions } from './placement';

const OUTPUTS = 0x3FFFFF;
const CONTROL = 0xC00000;

function goto(time: number, target: Instruction, block: string | null = null) {
  return createJump(time, target, { always: true, channelId: 0, threshold: 0, block });
}

function faultOf(fn: () => unknown): CompilerFault | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof CompilerFault) return e;
    throw e;
  }
  return null;
}

describe('blockRanges', () => {
  it('anchors a block on its last instruction that is not a control marker', () => {
    const end = createEnd(99, '_END');
    const ranges = blockRanges([
      goto(15, end, 'gate'),
      createSet(16, 0xC00000, CONTROL, 'gate', true),
      createSet(18, 0, CONTROL, 'gate', true),
      createSet(0, 0x400000, CONTROL, '_START', true),
      createSet(2, 0, CONTROL, '_START', true),
      end,
    ]);
    expect(ranges.map(r => [r.name, r.start, r.end, r.anchor])).toEqual([
      ['_START', 0, 2, 0],
      ['gate', 15, 18, 15],
      ['_END', 99, 99, 99],
    ]);
  });
});

describe('placeInstructions', () => {
  it('displaces a SET that collides with a JUMP to the tick before', () => {
    const s0 = createSet(0, 0, OUTPUTS);
    const set5 = createSet(5, 1, OUTPUTS);
    const jump = goto(5, s0);
    const end = createEnd(9, '_END');
    const warnings: Warning[] = [];

    const placed = placeInstructions([s0, set5, jump, end], 10, warnings);
    expect(placed).toHaveLength(4);
    [s0, set5, jump, end].forEach((instruction, i) => expect(placed[i]).toBe(instruction));
    expect([s0.time, set5.time, jump.time, end.time]).toEqual([0, 4, 5, 9]);
    expect(warnings).toEqual([]);
  });

  it('moves an instruction inside a block past the block when it lies after the anchor', () => {
    const end = createEnd(19, '_END');
    const chain = goto(10, end, 'b');
    const write = createSet(11, 0x400000, CONTROL, 'b', true);
    const reset = createSet(13, 0, CONTROL, 'b', true);
    const free = createSet(12, 1, 0x1);
    const warnings: Warning[] = [];

    placeInstructions([chain, write, reset, free, end], 20, warnings);
    expect(free.time).toBe(14);
    expect(warnings).toEqual([{ message: "Moving instruction at tick 12 out of block 'b' to tick 14", subject: 'b' }]);
  });

  it('moves an instruction inside a block before the block when it lies before the anchor', () => {
    const end = createEnd(19, '_END');
    const first = createJump(8, end, { always: false, channelId: 1, threshold: 5, block: 'b' });
    const second = goto(9, end, 'b');
    const free = createSet(8, 1, 0x1);

    placeInstructions([first, second, free, end], 20, []);
    expect(free.time).toBe(7);
  });

  it('shifts an overlapping block and all of its instructions', () => {
    const end = createEnd(19, '_END');
    const a1 = goto(5, end, 'a');
    const a2 = goto(6, end, 'a');
    const b1 = goto(6, end, 'b');
    const b2 = goto(7, end, 'b');
    const warnings: Warning[] = [];

    placeInstructions([a1, a2, b1, b2, end], 20, warnings);
    expect([a1.time, a2.time, b1.time, b2.time]).toEqual([5, 6, 7, 8]);
    expect(warnings).toEqual([{ message: "Moving block 'b' by 1 ticks to avoid block 'a'", subject: 'b' }]);
  });

  it('refuses to shift the end of the sequence', () => {
    const end = createEnd(10, '_END');
    const chain = goto(8, end, 'a');
    const marker = createSet(10, 0, CONTROL, 'a', true);
    const fault = faultOf(() => placeInstructions([chain, marker, end], 11, []));
    expect(fault?.kind).toBe('sequence-too-short');
    expect(fault?.subject).toBe('a');
  });

  it('fails when nothing fits before tick 0', () => {
    const end = createEnd(5, '_END');
    const fault = faultOf(() => placeInstructions([createSet(0, 0, OUTPUTS), goto(0, end), end], 6, []));
    expect(fault?.kind).toBe('not-enough-room');
  });

  it('fails when an instruction pushed out of a block lands in another', () => {
    const end = createEnd(29, '_END');
    const a = [goto(10, end, 'a'), goto(11, end, 'a')];
    const b = [goto(12, end, 'b'), createSet(14, 0, CONTROL, 'b', true)];
    const free = createSet(11, 1, 0x1);
    const fault = faultOf(() => placeInstructions([...a, ...b, free, end], 30, []));
    expect(fault?.kind).toBe('not-enough-room');
    expect(fault?.subject).toBe('b');
  });
});
