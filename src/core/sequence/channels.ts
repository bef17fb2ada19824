import type { Jump } from './jumps';
import type { TimeWindow } from './timing';

export interface OutputChannel {
  kind: 'output';
  name: string;
  windows: TimeWindow[];
}

/** TDC input; its windows are only recorded, never compiled. */
export interface CounterChannel {
  kind: 'counter';
  name: string;
  windows: TimeWindow[];
}

/** Gates an SPC and owns the jumps that test its count. */
export interface ControlChannel {
  kind: 'control';
  name: string;
  windows: TimeWindow[];
  jumps: Jump[];
}

export type SequenceChannel = OutputChannel | CounterChannel | ControlChannel;

export function outputChannel(name: string, windows: TimeWindow[] = []): OutputChannel {
  return { kind: 'output', name, windows };
}

export function counterChannel(name: string, windows: TimeWindow[] = []): CounterChannel {
  return { kind: 'counter', name, windows };
}

export function controlChannel(name: string, windows: TimeWindow[] = [], jumps: Jump[] = []): ControlChannel {
  return { kind: 'control', name, windows, jumps };
}
