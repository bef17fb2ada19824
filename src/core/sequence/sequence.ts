import { SequenceErrorKind, SequenceFault } from '../types';
import type { ControlChannel, SequenceChannel } from './channels';
import type { FpgaChannel, HardwareConfig, SpcChannel, TdcChannel } from './hardware';
import type { Jump } from './jumps';
import { describeReference } from './timing';
import type { Offset, Reference, TimePoint, TimeWindow } from './timing';
import { controlValues } from './variables';
import type { ControlVariable } from './variables';

export interface Sequence {
  name: string;
  /** µs */
  length: number;
  shots: number;
  variants: number;
  hardware: HardwareConfig;
  controlVariables: ControlVariable[];
  channels: SequenceChannel[];
}

export function createSequence(sequence: Partial<Sequence> & Pick<Sequence, 'name' | 'length' | 'hardware'>): Sequence {
  return {
    shots: 1,
    variants: 1,
    controlVariables: [],
    channels: [],
    ...sequence,
  };
}

// ---- Lookup ----

export interface WindowEntry {
  window: TimeWindow;
  channel: SequenceChannel;
}

export interface JumpEntry {
  jump: Jump;
  channel: ControlChannel;
}

export interface SequenceIndex {
  windows: Map<string, WindowEntry>;
  jumps: Map<string, JumpEntry>;
}

/** Windows and jumps by name; on duplicate names the first one wins. */
export function indexSequence(sequence: Sequence): SequenceIndex {
  const windows = new Map<string, WindowEntry>();
  const jumps = new Map<string, JumpEntry>();
  for (const channel of sequence.channels) {
    for (const window of channel.windows) {
      if (!windows.has(window.name)) windows.set(window.name, { window, channel });
    }
    if (channel.kind === 'control') {
      for (const jump of channel.jumps) {
        if (!jumps.has(jump.name)) jumps.set(jump.name, { jump, channel });
      }
    }
  }
  return { windows, jumps };
}

export function allJumps(sequence: Sequence): JumpEntry[] {
  const jumps: JumpEntry[] = [];
  for (const channel of sequence.channels) {
    if (channel.kind === 'control') {
      for (const jump of channel.jumps) jumps.push({ jump, channel });
    }
  }
  return jumps;
}

export function containsJumps(sequence: Sequence): boolean {
  return allJumps(sequence).length > 0;
}

// ---- Hardware mapping ----

function unmapped(channel: SequenceChannel, what: string): never {
  throw new SequenceFault(SequenceErrorKind.INVALID_DEFINITION, channel.name,
    `Channel '${channel.name}' has no matching ${what} in the hardware configuration`);
}

export function fpgaChannelFor(hardware: HardwareConfig, channel: SequenceChannel): FpgaChannel {
  return hardware.outputs.find(o => o.name === channel.name) ?? unmapped(channel, 'FPGA output');
}

export function tdcChannelFor(hardware: HardwareConfig, channel: SequenceChannel): TdcChannel {
  return hardware.counters.find(c => c.name === channel.name) ?? unmapped(channel, 'TDC input');
}

export function spcChannelFor(hardware: HardwareConfig, channel: SequenceChannel): SpcChannel {
  return hardware.spcs.find(s => s.name === channel.name) ?? unmapped(channel, 'SPC');
}

// ---- Time resolution ----

/**
 * Resolves time points of one variant to µs.
 * Results are cached; a reference that leads back to itself is a recursive-reference fault.
 */
export class TimeResolver {
  readonly values: Map<string, number>;
  private index: SequenceIndex;
  private cache = new Map<string, number>();
  private active = new Set<string>();

  constructor(sequence: Sequence, variant: number, index: SequenceIndex = indexSequence(sequence)) {
    this.index = index;
    this.values = controlValues(sequence.controlVariables, variant, sequence.variants);
  }

  resolve(point: TimePoint, owner: string): number {
    switch (point.kind) {
      case 'absolute':
        return point.value;
      case 'variable':
        return this.variable(point.variable, owner);
      case 'relative':
        return this.reference(point.reference, owner) + this.offset(point.offset, owner);
    }
  }

  windowStart(name: string): number {
    return this.reference({ kind: 'start', window: name }, name);
  }

  windowEnd(name: string): number {
    return this.reference({ kind: 'end', window: name }, name);
  }

  jumpTime(name: string): number {
    return this.reference({ kind: 'jump', jump: name }, name);
  }

  reference(reference: Reference, owner: string): number {
    if (reference.kind === 'variable') return this.variable(reference.variable, owner);

    const key = `${reference.kind}:${reference.kind === 'jump' ? reference.jump : reference.window}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;
    if (this.active.has(key)) {
      throw new SequenceFault(SequenceErrorKind.RECURSIVE_REFERENCE, owner,
        `Time of '${owner}' depends on itself through ${describeReference(reference)}`);
    }

    this.active.add(key);
    try {
      const time = this.lookup(reference, owner);
      this.cache.set(key, time);
      return time;
    } finally {
      this.active.delete(key);
    }
  }

  private lookup(reference: Exclude<Reference, { kind: 'variable' }>, owner: string): number {
    if (reference.kind === 'jump') {
      const entry = this.index.jumps.get(reference.jump);
      if (!entry) return this.unresolved(reference, owner);
      return this.resolve(entry.jump.time, reference.jump);
    }
    const entry = this.index.windows.get(reference.window);
    if (!entry) return this.unresolved(reference, owner);
    const point = reference.kind === 'start' ? entry.window.start : entry.window.end;
    return this.resolve(point, reference.window);
  }

  private offset(offset: Offset, owner: string): number {
    return offset.kind === 'absolute' ? offset.value : this.variable(offset.variable, owner);
  }

  private variable(name: string, owner: string): number {
    const value = this.values.get(name);
    if (value === undefined) return this.unresolved({ kind: 'variable', variable: name }, owner);
    return value;
  }

  private unresolved(reference: Reference, owner: string): never {
    throw new SequenceFault(SequenceErrorKind.UNRESOLVED_REFERENCE, owner,
      `'${owner}' refers to unknown ${describeReference(reference)}`);
  }
}

/** Latest window end or jump time of a variant; 0 for an empty sequence. */
export function latestTime(sequence: Sequence, resolver: TimeResolver): number {
  let latest = 0;
  for (const channel of sequence.channels) {
    for (const window of channel.windows) latest = Math.max(latest, resolver.windowEnd(window.name));
    if (channel.kind === 'control') {
      for (const jump of channel.jumps) latest = Math.max(latest, resolver.jumpTime(jump.name));
    }
  }
  return latest;
}
