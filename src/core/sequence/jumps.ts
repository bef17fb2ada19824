import { COUNT_LIMIT } from '../constants';
import { SequenceErrorKind, SequenceFault } from '../types';
import type { Warning } from '../types';
import { describeReference, sameReference } from './timing';
import type { Reference, TimePoint } from './timing';

// ---- Targets ----

export type Target =
  | { kind: 'destination'; reference: Reference }
  | { kind: 'terminate' }
  | { kind: 'pass' };

export const PASS: Target = { kind: 'pass' };
export const TERMINATE: Target = { kind: 'terminate' };

export function destination(reference: Reference): Target {
  return { kind: 'destination', reference };
}

export function sameTarget(a: Target, b: Target): boolean {
  if (a.kind === 'destination' && b.kind === 'destination') {
    return sameReference(a.reference, b.reference);
  }
  return a.kind === b.kind;
}

export function describeTarget(target: Target): string {
  switch (target.kind) {
    case 'destination': return describeReference(target.reference);
    case 'terminate': return 'terminate';
    case 'pass': return 'pass';
  }
}

// ---- Conditions ----

export type Condition =
  | { kind: 'value'; value: number; target: Target }
  | { kind: 'threshold'; threshold: number; target: Target }
  | { kind: 'range'; from: number; to: number; target: Target }
  | { kind: 'else'; target: Target };

export const whenValue = (value: number, target: Target): Condition => ({ kind: 'value', value, target });
export const whenAtLeast = (threshold: number, target: Target): Condition => ({ kind: 'threshold', threshold, target });
export const whenInRange = (from: number, to: number, target: Target): Condition => ({ kind: 'range', from, to, target });
export const otherwise = (target: Target): Condition => ({ kind: 'else', target });

/** Count interval [from, to) a non-else condition covers. */
export function conditionRange(condition: Exclude<Condition, { kind: 'else' }>): [number, number] {
  switch (condition.kind) {
    case 'value': return [condition.value, condition.value + 1];
    case 'threshold': return [condition.threshold, COUNT_LIMIT];
    case 'range': return [condition.from, condition.to];
  }
}

// ---- Jumps ----

export type Jump =
  | { kind: 'conditional'; name: string; time: TimePoint; window: string; conditions: Condition[] }
  | { kind: 'goto'; name: string; time: TimePoint; destination: Reference }
  | { kind: 'end'; name: string; time: TimePoint };

export function conditionalJump(name: string, time: TimePoint, window: string, conditions: Condition[]): Jump {
  return { kind: 'conditional', name, time, window, conditions };
}

export function goTo(name: string, time: TimePoint, to: Reference): Jump {
  return { kind: 'goto', name, time, destination: to };
}

export function endJump(name: string, time: TimePoint): Jump {
  return { kind: 'end', name, time };
}

/**
 * The conditions a jump evaluates, with exactly one `else`.
 * A conditional jump without one gets `else → pass` and a warning.
 */
export function effectiveConditions(jump: Jump, warnings?: Warning[]): Condition[] {
  switch (jump.kind) {
    case 'goto':
      return [otherwise(destination(jump.destination))];
    case 'end':
      return [otherwise(TERMINATE)];
    case 'conditional': {
      const elses = jump.conditions.filter(c => c.kind === 'else');
      if (elses.length > 1) {
        throw new SequenceFault(SequenceErrorKind.INVALID_DEFINITION, jump.name,
          `Jump '${jump.name}' has ${elses.length} else conditions`);
      }
      if (elses.length === 1) return jump.conditions;
      warnings?.push({ message: `Jump '${jump.name}' has no else condition, adding else → pass`, subject: jump.name });
      return [...jump.conditions, otherwise(PASS)];
    }
  }
}
