import { describe, it, expect } from 'vitest';
import { Ipu, simulate } from '../ipu';
import { benchHardware, branchSequence, gateSequence, retrySequence, staticSequence } from '../test-fixtures';
import { idleState } from '../sequence/hardware';
import { controlChannel, outputChannel } from '../sequence/channels';
import { conditionalJump, destination, otherwise, TERMINATE, whenValue } from '../sequence/jumps';
import { createSequence } from '../sequence/sequence';
import { at, fromVariable, startRef, timeWindow } from '../sequence/timing';
import { Compiler, compileSequence } from './compiler';
import type { CompileResult } from './compiler';
import { summarizeReport } from './report';

function expectOk(result: CompileResult) {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result;
}

function expectError(result: CompileResult) {
  if (result.ok) throw new Error('expected compilation to fail');
  return result;
}

const STATIC_WORDS = [0x80000000, 0x00000003, 0x80000001, 0x0000000D, 0x80000000, 0x00000007, 0xC0000000];

// ============================================================================
// Static sequences
// ============================================================================

describe('compileSequence without jumps', () => {
  it('compiles a single pulse', () => {
    const result = expectOk(compileSequence(staticSequence(), 0));
    expect(result.words).toEqual(STATIC_WORDS);
    expect(result.warnings).toEqual([
      { message: 'No jumps in sequence, not using the control register', subject: 'static' },
    ]);
  });

  it('produces the pulse on the bus', () => {
    const trace = simulate(expectOk(compileSequence(staticSequence(), 0)).words);
    expect(trace.changes).toEqual([{ tick: 5, value: 1 }, { tick: 20, value: 0 }]);
    expect(trace.ticks).toBe(30);
    expect(trace.halt).toBe('end');
  });

  it('reports the compilation', () => {
    const { report } = expectOk(compileSequence(staticSequence(), 0));
    expect(report).toEqual({
      flags: { truncate: false, controlRegisterHighTime: 350 },
      constants: { maxJumpConditions: 10 },
      controlValues: {},
      variant: 0,
      fpgaDelayUnit: 1,
      length: 30,
      containsJumps: false,
      compiled: STATIC_WORDS,
    });
    expect(summarizeReport(report)).toBe(
      'variant 0: 7 instructions, 30 ticks of 1 µs\njumps: no, truncate: false, control high time: 350');
  });

  it('inverts active-low outputs once', () => {
    const hardware = benchHardware({
      outputs: [
        { name: 'laser', channelId: 0, polarity: true, idleState: false },
        { name: 'shutter', channelId: 3, polarity: false, idleState: true },
      ],
    });
    const sequence = createSequence({
      name: 'shuttered',
      length: 30,
      hardware,
      channels: [
        outputChannel('laser', [timeWindow('pulse', 7, 20)]),
        outputChannel('shutter', [timeWindow('open', 5, 6)]),
      ],
    });
    const result = expectOk(compileSequence(sequence, 0));
    expect(result.words).toEqual([
      0x80000008, 0x00000003, 0x80000000, 0x80000008, 0x80000009, 0x0000000B, 0x80000008, 0x00000007, 0xC0000000,
    ]);

    const trace = simulate(result.words, {}, { idleState: idleState(hardware) });
    expect(trace.changes).toEqual([
      { tick: 5, value: 0 }, { tick: 6, value: 8 }, { tick: 7, value: 9 }, { tick: 20, value: 8 },
    ]);
    expect(trace.ticks).toBe(30);
  });

  it('truncates to two ticks past the latest event', () => {
    const result = expectOk(compileSequence(staticSequence(), 0, { truncate: true }));
    expect(result.report.length).toBe(22);
    expect(result.words).toEqual([0x80000000, 0x00000003, 0x80000001, 0x0000000D, 0x80000000, 0xC0000000]);
  });

  it('truncates windows that reach the end', () => {
    const sequence = createSequence({
      name: 'long',
      length: 30,
      hardware: benchHardware(),
      channels: [outputChannel('laser', [timeWindow('pulse', 5, 30)])],
    });
    const result = expectOk(compileSequence(sequence, 0));
    expect(result.warnings).toContainEqual({ message: "Window 'pulse' truncated to end at tick 28", subject: 'pulse' });
    expect(simulate(result.words).changes).toEqual([{ tick: 5, value: 1 }, { tick: 28, value: 0 }]);
  });

  it('rejects variants outside the sequence', () => {
    const result = expectError(compileSequence(staticSequence(), 1));
    expect(result.error.kind).toBe('invalid-definition');
  });

  it('rejects bad options before compiling', () => {
    expect(() => compileSequence(staticSequence(), 0, { controlRegisterHighTime: 0 })).toThrow(RangeError);
    expect(() => new Compiler({ maxJumpConditions: 1.5 })).toThrow(RangeError);
  });
});

// ============================================================================
// Jumps
// ============================================================================

describe('compileSequence with jumps', () => {
  const BRANCH_WORDS = [
    0x80400000, 0x80400000, 0x80000000, 0x00000006, 0x80000002, 0x00000008, 0x80000000, 0x00000001,
    0x4801901B, 0x48002815, 0x6000000D, 0x0000000D, 0x80C00001, 0x80C00001, 0x80000001, 0x00000006,
    0x80000000, 0x00000003, 0x6000001B, 0x00000003, 0x80800001, 0x80800001, 0x80000001, 0x00000006,
    0x80000000, 0x0000001B, 0xC0000000,
  ];

  it('compiles a three-way branch', () => {
    const result = expectOk(compileSequence(branchSequence(), 0, { controlRegisterHighTime: 2 }));
    expect(result.words).toEqual(BRANCH_WORDS);
    expect(result.warnings).toEqual([]);
    expect(result.report.containsJumps).toBe(true);
  });

  it('runs pulseA for counts below 10', () => {
    const { words } = expectOk(compileSequence(branchSequence(), 0, { controlRegisterHighTime: 2 }));
    const expected = [
      { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 10, value: 2 }, { tick: 20, value: 0 },
      { tick: 26, value: 0xC00001 }, { tick: 28, value: 1 }, { tick: 36, value: 0 },
    ];
    for (const count of [5, 9]) {
      const trace = simulate(words, { 2: count });
      expect(trace.changes).toEqual(expected);
      expect(trace.ticks).toBe(43);
      expect(trace.jumps).toBe(2);
    }
  });

  it('runs pulseB for counts from 10 to 99', () => {
    const { words } = expectOk(compileSequence(branchSequence(), 0, { controlRegisterHighTime: 2 }));
    for (const count of [10, 50, 99]) {
      const trace = simulate(words, { 2: count });
      expect(trace.changes).toEqual([
        { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 10, value: 2 }, { tick: 20, value: 0 },
        { tick: 25, value: 0x800001 }, { tick: 27, value: 1 }, { tick: 35, value: 0 },
      ]);
      expect(trace.ticks).toBe(65);
    }
  });

  it('terminates for 100 counts', () => {
    const { words } = expectOk(compileSequence(branchSequence(), 0, { controlRegisterHighTime: 2 }));
    const trace = simulate(words, { 2: 100 });
    expect(trace.changes).toEqual([
      { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 10, value: 2 }, { tick: 20, value: 0 },
    ]);
    expect(trace.ticks).toBe(25);
  });

  it('passes to the following instructions below the threshold', () => {
    const result = expectOk(compileSequence(gateSequence(), 0, { controlRegisterHighTime: 2 }));
    expect(result.words).toEqual([
      0x80400000, 0x80400000, 0x80000000, 0x00000001, 0x80000002, 0x00000003, 0x80000000, 0x00000003,
      0x48001412, 0x80C00000, 0x80C00000, 0x80000000, 0x80000000, 0x80000001, 0x00000008, 0x80000000,
      0x00000007, 0xC0000000,
    ]);

    const stopped = simulate(result.words, { 2: 7 });
    expect(stopped.changes).toEqual([
      { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 5, value: 2 }, { tick: 10, value: 0 },
    ]);
    expect(stopped.ticks).toBe(17);

    const passed = simulate(result.words, { 2: 3 });
    expect(passed.changes).toEqual([
      { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 5, value: 2 }, { tick: 10, value: 0 },
      { tick: 16, value: 0xC00000 }, { tick: 18, value: 0 }, { tick: 20, value: 1 }, { tick: 30, value: 0 },
    ]);
    expect(passed.ticks).toBe(40);
  });

  it('counts again until the retry succeeds', () => {
    const { words } = expectOk(compileSequence(retrySequence(), 0, { controlRegisterHighTime: 2 }));
    const trace = new Ipu(words, { counts: (_, tick) => (tick < 30 ? 0 : 9) }).run();
    expect(trace.changes).toEqual([
      { tick: 0, value: 0x400000 }, { tick: 2, value: 0 }, { tick: 10, value: 0xC00002 }, { tick: 12, value: 2 },
      { tick: 20, value: 0 }, { tick: 26, value: 0xC00002 }, { tick: 28, value: 2 }, { tick: 36, value: 0 },
    ]);
    expect(trace.jumps).toBe(2);
    expect(trace.ticks).toBe(42);
    expect(trace.halt).toBe('end');
  });

  it('fails when the control register runs out of ids', () => {
    const hardware = benchHardware({ controlRegister: { bits: [{ bit: 0, output: 22, input: 6 }] } });
    const result = expectError(compileSequence(branchSequence(hardware), 0, { controlRegisterHighTime: 2 }));
    expect(result.error).toEqual({
      kind: 'control-register-overflow',
      message: 'Control register of 1 bits cannot carry destination id 2; 2 bits are needed',
    });
  });

  it('fails when a jump needs more conditions than the hardware tests', () => {
    const windows = Array.from({ length: 10 }, (_, i) => timeWindow(`w${i}`, 40 + 2 * i, 41 + 2 * i));
    const sequence = createSequence({
      name: 'sorter',
      length: 100,
      hardware: benchHardware(),
      channels: [
        outputChannel('laser', windows),
        controlChannel('detector', [timeWindow('count', 10, 20)], [
          conditionalJump('sort', at(25), 'count', [
            ...windows.map((w, i) => whenValue(i, destination(startRef(w.name)))),
            otherwise(TERMINATE),
          ]),
        ]),
      ],
    });
    const result = expectError(compileSequence(sequence, 0, { controlRegisterHighTime: 2 }));
    expect(result.error.kind).toBe('too-many-conditions');
    expect(result.error.subject).toBe('sort');
  });

  it('runs out of room when the control write outlasts the sequence', () => {
    const result = expectError(compileSequence(branchSequence(), 0));
    expect(result.error.kind).toBe('sequence-too-short');
  });
});

// ============================================================================
// Variants
// ============================================================================

describe('Compiler', () => {
  const sweep = () => createSequence({
    name: 'sweep',
    length: 30,
    variants: 3,
    hardware: benchHardware(),
    controlVariables: [{ kind: 'linear', name: 'delay', start: 5, stop: 9 }],
    channels: [outputChannel('laser', [timeWindow('pulse', fromVariable('delay'), 20)])],
  });

  it('compiles one variant with its control values', () => {
    const result = expectOk(new Compiler().compile(sweep(), 1));
    expect(result.report.controlValues).toEqual({ delay: 7 });
    expect(result.report.variant).toBe(1);
    expect(result.words).toEqual([0x80000000, 0x00000005, 0x80000001, 0x0000000B, 0x80000000, 0x00000007, 0xC0000000]);
  });

  it('compiles every variant in order', () => {
    const results = new Compiler().compileAll(sweep());
    expect(results).toHaveLength(3);
    expect(results.map(r => expectOk(r).words[1])).toEqual([3, 5, 7]);
  });
});
