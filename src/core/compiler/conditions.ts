/**
 * Jump condition compiler.
 * Count-range conditions → descending threshold chain → compressed chain,
 * plus the tick ordering of jumps that quantize onto the same tick.
 */
import { COUNT_LIMIT } from '../constants';
import { CompilerErrorKind, CompilerFault, SequenceErrorKind, SequenceFault } from '../types';
import type { Warning } from '../types';
import { conditionRange, describeTarget, effectiveConditions, sameTarget } from '../sequence/jumps';
import type { Jump, Target } from '../sequence/jumps';

export interface ThresholdEntry {
  /** Taken when count >= threshold */
  threshold: number;
  target: Target;
}

interface CountRange {
  from: number;
  to: number;
  target: Target;
}

/**
 * Threshold chain in descending order. Gaps between ranges, and everything
 * below the lowest range, fall to the else target.
 */
export function thresholdChain(jump: Jump, warnings?: Warning[]): ThresholdEntry[] {
  const conditions = effectiveConditions(jump, warnings);
  const ranges: CountRange[] = [];
  let elseTarget: Target | null = null;

  for (const condition of conditions) {
    if (condition.kind === 'else') {
      elseTarget = condition.target;
      continue;
    }
    const [from, to] = conditionRange(condition);
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to > COUNT_LIMIT || from >= to) {
      throw new SequenceFault(SequenceErrorKind.INVALID_DEFINITION, jump.name,
        `Jump '${jump.name}' has an invalid count range [${from}, ${to})`);
    }
    ranges.push({ from, to, target: condition.target });
  }
  if (elseTarget === null) {
    throw new CompilerFault(CompilerErrorKind.INTERNAL, `Jump '${jump.name}' has no else condition`, jump.name);
  }

  ranges.sort((a, b) => b.to - a.to);
  const chain: ThresholdEntry[] = [];
  let current = COUNT_LIMIT;
  for (const range of ranges) {
    if (range.to > current) {
      throw new SequenceFault(SequenceErrorKind.OVERLAPPING_CONDITIONS, jump.name,
        `Jump '${jump.name}' has overlapping conditions at [${range.from}, ${range.to})`);
    }
    if (range.to < current) chain.push({ threshold: range.to, target: elseTarget });
    chain.push({ threshold: range.from, target: range.target });
    current = range.from;
  }
  if (current > 0) chain.push({ threshold: 0, target: elseTarget });
  return chain;
}

/** Merge neighbours with the same target; the merged entry keeps the lower threshold. */
export function compressChain(chain: ThresholdEntry[]): ThresholdEntry[] {
  const compressed: ThresholdEntry[] = [];
  for (const entry of chain) {
    const last = compressed[compressed.length - 1];
    if (last !== undefined && sameTarget(last.target, entry.target)) {
      compressed[compressed.length - 1] = { threshold: Math.min(last.threshold, entry.threshold), target: last.target };
    } else {
      compressed.push(entry);
    }
  }
  return compressed;
}

export function compiledConditions(jump: Jump, warnings?: Warning[]): ThresholdEntry[] {
  return compressChain(thresholdChain(jump, warnings));
}

/** Target selected by a compressed or uncompressed descending chain for a count. */
export function selectTarget(chain: ThresholdEntry[], count: number): Target {
  for (const entry of chain) {
    if (count >= entry.threshold) return entry.target;
  }
  throw new CompilerFault(CompilerErrorKind.INTERNAL, `No condition covers count ${count}`);
}

export function formatChain(chain: ThresholdEntry[]): string {
  return chain.map(e => `>=${e.threshold} → ${describeTarget(e.target)}`).join(', ');
}

// ---- Jump time ordering ----

export interface ScheduledJump {
  jump: Jump;
  /** SPC channel the jump tests */
  channelId: number;
  /** Un-quantized time, µs */
  time: number;
  tick: number;
}

/**
 * Give every jump its own tick. On a collision the jump that comes later in
 * sequence time keeps the tick and the earlier one moves one tick back,
 * repeating until it finds a free tick.
 */
export function orderJumpTimes(jumps: ScheduledJump[], warnings: Warning[]): Map<number, ScheduledJump> {
  const byTick = new Map<number, ScheduledJump>();
  for (const scheduled of jumps) {
    let moving = scheduled;
    let tick = scheduled.tick;
    for (;;) {
      if (tick < 0) {
        throw new CompilerFault(CompilerErrorKind.NOT_ENOUGH_ROOM,
          `No free tick before jump '${moving.jump.name}'`, moving.jump.name);
      }
      const other = byTick.get(tick);
      if (other === undefined) {
        moving.tick = tick;
        byTick.set(tick, moving);
        break;
      }
      if (other.time === moving.time) {
        throw new CompilerFault(CompilerErrorKind.INTERNAL,
          `Jumps '${other.jump.name}' and '${moving.jump.name}' happen at the same time`, moving.jump.name);
      }
      const [keep, shift] = other.time > moving.time ? [other, moving] : [moving, other];
      keep.tick = tick;
      byTick.set(tick, keep);
      warnings.push({
        message: `Shifting jump '${shift.jump.name}' to tick ${tick - 1} so that it happens before '${keep.jump.name}'`,
        subject: shift.jump.name,
      });
      moving = shift;
      tick -= 1;
    }
  }
  return byTick;
}
