import { describe, it, expect } from 'vitest';
import { SequenceFault } from '../types';
import { benchHardware } from '../test-fixtures';
import { controlChannel, counterChannel, outputChannel } from './channels';
import { endJump } from './jumps';
import { createSequence, latestTime, TimeResolver } from './sequence';
import type { Sequence } from './sequence';
import {
  afterJump, at, describeReference, endOf, endRef, fromVariable, sameReference, startRef, timeWindow, toTicks,
  windowWithLength,
} from './timing';
import { controlValues, linspace, variableValue } from './variables';
import type { ControlVariable } from './variables';

function chained(): Sequence {
  return createSequence({
    name: 'chained',
    length: 50,
    hardware: benchHardware(),
    controlVariables: [{ kind: 'constant', name: 'gap', value: 3 }],
    channels: [
      outputChannel('laser', [
        timeWindow('a', 10, endOf('a', 0)),
        windowWithLength('b', at(10), 'gap'),
        windowWithLength('c', afterJump('mark', 1), 4),
      ]),
      counterChannel('apd', [timeWindow('record', endOf('b'), fromVariable('gap'))]),
      controlChannel('detector', [], [endJump('mark', endOf('b', 2))]),
    ],
  });
}

// ============================================================================
// Time resolution
// ============================================================================

describe('TimeResolver', () => {
  it('resolves windows relative to other windows and jumps', () => {
    const resolver = new TimeResolver(chained(), 0);
    expect(resolver.windowStart('b')).toBe(10);
    expect(resolver.windowEnd('b')).toBe(13);
    expect(resolver.jumpTime('mark')).toBe(15);
    expect(resolver.windowStart('c')).toBe(16);
    expect(resolver.windowEnd('c')).toBe(20);
    expect(resolver.windowStart('record')).toBe(13);
    expect(resolver.windowEnd('record')).toBe(3);
  });

  it('resolves references and time points for an owner', () => {
    const resolver = new TimeResolver(chained(), 0);
    expect(resolver.reference(endRef('c'), 'x')).toBe(20);
    expect(resolver.resolve(fromVariable('gap'), 'x')).toBe(3);
    expect(resolver.values).toEqual(new Map([['gap', 3]]));
  });

  it('names what depends on itself', () => {
    const resolver = new TimeResolver(chained(), 0);
    try {
      resolver.windowEnd('a');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SequenceFault);
      expect(e).toMatchObject({ kind: 'recursive-reference', subject: 'a' });
    }
  });

  it('names the owner of an unknown reference', () => {
    const resolver = new TimeResolver(chained(), 0);
    expect(() => resolver.reference(startRef('nowhere'), 'c')).toThrow("'c' refers to unknown start of 'nowhere'");
    expect(() => resolver.resolve(fromVariable('nothing'), 'c')).toThrow("'c' refers to unknown variable 'nothing'");
  });
});

describe('latestTime', () => {
  it('takes the latest window end or jump time', () => {
    const sequence = createSequence({
      name: 'late',
      length: 100,
      hardware: benchHardware(),
      channels: [
        outputChannel('laser', [timeWindow('pulse', 5, 20)]),
        controlChannel('detector', [], [endJump('stop', at(42))]),
      ],
    });
    expect(latestTime(sequence, new TimeResolver(sequence, 0))).toBe(42);
  });

  it('is 0 for an empty sequence', () => {
    const sequence = createSequence({ name: 'empty', length: 10, hardware: benchHardware() });
    expect(latestTime(sequence, new TimeResolver(sequence, 0))).toBe(0);
  });
});

// ============================================================================
// References and quantization
// ============================================================================

describe('references', () => {
  it('describes and compares references', () => {
    expect(describeReference(startRef('a'))).toBe("start of 'a'");
    expect(describeReference(endRef('a'))).toBe("end of 'a'");
    expect(sameReference(startRef('a'), startRef('a'))).toBe(true);
    expect(sameReference(startRef('a'), endRef('a'))).toBe(false);
  });
});

describe('toTicks', () => {
  it('rounds half to even', () => {
    expect(toTicks(2.5, 1)).toBe(2);
    expect(toTicks(3.5, 1)).toBe(4);
    expect(toTicks(2.6, 1)).toBe(3);
  });

  it('ignores float noise around ties', () => {
    expect(toTicks(0.025, 0.01)).toBe(2);
    expect(toTicks(0.035, 0.01)).toBe(4);
    expect(toTicks(0.05, 0.01)).toBe(5);
  });
});

// ============================================================================
// Control variables
// ============================================================================

describe('control variables', () => {
  it('spaces linear values evenly over the variants', () => {
    expect(linspace(0, 10, 5, 2)).toBe(5);
    expect(linspace(3, 9, 1, 0)).toBe(3);
    const sweep: ControlVariable = { kind: 'linear', name: 'delay', start: 5, stop: 9 };
    expect([0, 1, 2].map(v => variableValue(sweep, v, 3))).toEqual([5, 7, 9]);
  });

  it('evaluates expressions over their sample range', () => {
    const square: ControlVariable = { kind: 'expression', name: 'sq', expression: x => x * x, from: 1, to: 3 };
    expect(controlValues([square], 2, 3)).toEqual(new Map([['sq', 9]]));
  });

  it('rejects expressions that are not finite', () => {
    const inverse: ControlVariable = { kind: 'expression', name: 'inv', expression: x => 1 / x, from: 0, to: 1 };
    expect(() => variableValue(inverse, 0, 2)).toThrow(SequenceFault);
    expect(variableValue(inverse, 1, 2)).toBe(1);
  });
});
