import { describe, it, expect } from 'vitest';
import { Ipu, IpuError, simulate } from './ipu';

// SET 0, WAIT 3, SET 1, WAIT 13, SET 0, WAIT 7, END
const PULSE = [0x80000000, 0x00000003, 0x80000001, 0x0000000D, 0x80000000, 0x00000007, 0xC0000000];

describe('IPU emulator', () => {
  it('runs a straight program tick by tick', () => {
    const trace = simulate(PULSE);
    expect(trace.halt).toBe('end');
    expect(trace.ticks).toBe(30);
    expect(trace.changes).toEqual([{ tick: 5, value: 1 }, { tick: 20, value: 0 }]);
    expect(trace.executed.map(e => e.tick)).toEqual([0, 1, 5, 6, 20, 21, 29]);
  });

  it('takes a conditional jump when the count reaches the threshold', () => {
    // JUMP 3 if spc2 >= 10, SET 1, END
    const words = [0x48002803, 0x80000001, 0xC0000000];
    expect(simulate(words, { 2: 12 })).toMatchObject({ ticks: 2, changes: [], jumps: 1 });
    expect(simulate(words, { 2: 9 })).toMatchObject({ ticks: 3, changes: [{ tick: 1, value: 1 }], jumps: 0 });
    expect(simulate(words, { 3: 50 })).toMatchObject({ ticks: 3, jumps: 0 });
  });

  it('stops endless loops at the jump limit', () => {
    const trace = new Ipu([0x60000001], { maxJumps: 3 }).run();
    expect(trace.halt).toBe('jump-limit');
    expect(trace.jumps).toBe(4);
    expect(trace.ticks).toBe(4);
  });

  it('stops at the tick limit', () => {
    const trace = new Ipu([0x00000010, 0xC0000000], { maxTicks: 5 }).run();
    expect(trace.halt).toBe('tick-limit');
    expect(trace.ticks).toBe(5);
  });

  it('starts from the idle state', () => {
    const trace = simulate([0x80000001, 0xC0000000], {}, { idleState: 1 });
    expect(trace.changes).toEqual([]);
  });

  it('rejects running off the end of the program', () => {
    expect(() => simulate([0x80000001])).toThrow(IpuError);
  });
});
