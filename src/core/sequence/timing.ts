import { TICK_TOLERANCE } from '../constants';

// ---- Time points ----

export type Reference =
  | { kind: 'start'; window: string }
  | { kind: 'end'; window: string }
  | { kind: 'jump'; jump: string }
  | { kind: 'variable'; variable: string };

export type Offset =
  | { kind: 'absolute'; value: number }
  | { kind: 'variable'; variable: string };

export type TimePoint =
  | { kind: 'absolute'; value: number }
  | { kind: 'variable'; variable: string }
  | { kind: 'relative'; reference: Reference; offset: Offset };

/** Half-open interval [start, end) in µs. */
export interface TimeWindow {
  name: string;
  start: TimePoint;
  end: TimePoint;
}

export const startRef = (window: string): Reference => ({ kind: 'start', window });
export const endRef = (window: string): Reference => ({ kind: 'end', window });
export const jumpRef = (jump: string): Reference => ({ kind: 'jump', jump });

export function at(value: number): TimePoint {
  return { kind: 'absolute', value };
}

export function fromVariable(variable: string): TimePoint {
  return { kind: 'variable', variable };
}

function offsetOf(offset: number | string): Offset {
  return typeof offset === 'number'
    ? { kind: 'absolute', value: offset }
    : { kind: 'variable', variable: offset };
}

export function startOf(window: string, offset: number | string = 0): TimePoint {
  return { kind: 'relative', reference: { kind: 'start', window }, offset: offsetOf(offset) };
}

export function endOf(window: string, offset: number | string = 0): TimePoint {
  return { kind: 'relative', reference: { kind: 'end', window }, offset: offsetOf(offset) };
}

export function afterJump(jump: string, offset: number | string = 0): TimePoint {
  return { kind: 'relative', reference: { kind: 'jump', jump }, offset: offsetOf(offset) };
}

export function timeWindow(name: string, start: TimePoint | number, end: TimePoint | number): TimeWindow {
  return {
    name,
    start: typeof start === 'number' ? at(start) : start,
    end: typeof end === 'number' ? at(end) : end,
  };
}

/** Window whose end is its own start plus a fixed or variable length. */
export function windowWithLength(name: string, start: TimePoint | number, length: number | string): TimeWindow {
  return timeWindow(name, start, startOf(name, length));
}

export function referenceName(reference: Reference): string {
  switch (reference.kind) {
    case 'start': return reference.window;
    case 'end': return reference.window;
    case 'jump': return reference.jump;
    case 'variable': return reference.variable;
  }
}

export function describeReference(reference: Reference): string {
  switch (reference.kind) {
    case 'start': return `start of '${reference.window}'`;
    case 'end': return `end of '${reference.window}'`;
    case 'jump': return `jump '${reference.jump}'`;
    case 'variable': return `variable '${reference.variable}'`;
  }
}

export function sameReference(a: Reference, b: Reference): boolean {
  return a.kind === b.kind && referenceName(a) === referenceName(b);
}

// ---- Quantization ----

/**
 * Convert a time in µs to FPGA ticks, rounding half to even.
 * Float noise below TICK_TOLERANCE does not move a value off a tie or onto one.
 */
export function toTicks(time: number, delayUnit: number): number {
  const exact = time / delayUnit;
  const floor = Math.floor(exact);
  const fraction = exact - floor;
  const tolerance = TICK_TOLERANCE * Math.max(1, Math.abs(exact));
  if (Math.abs(fraction - 0.5) <= tolerance) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(exact);
}
