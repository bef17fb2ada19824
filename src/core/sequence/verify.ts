/**
 * Sequence verification. Checks the description, then every variant; the
 * first failure is returned with the entity at fault.
 */
import { MIN_CONTROL_WINDOW } from '../constants';
import { runPhase, SequenceErrorKind, SequenceFault } from '../types';
import type { PhaseResult, Warning } from '../types';
import { thresholdChain } from '../compiler/conditions';
import { verifyHardware } from './hardware';
import type { ControlChannel, SequenceChannel } from './channels';
import { effectiveConditions } from './jumps';
import type { Jump, Target } from './jumps';
import { buildReachabilityTree, checkReachability } from './reachability';
import {
  allJumps, fpgaChannelFor, indexSequence, spcChannelFor, tdcChannelFor, TimeResolver,
} from './sequence';
import type { Sequence, SequenceIndex } from './sequence';
import { describeReference } from './timing';
import type { Reference } from './timing';
import { verifyVariable } from './variables';

function invalid(subject: string, message: string): never {
  throw new SequenceFault(SequenceErrorKind.INVALID_DEFINITION, subject, message);
}

// ---- Description checks ----

function checkCounts(sequence: Sequence): void {
  if (!(sequence.length > 0)) invalid(sequence.name, `Sequence length must be positive, got ${sequence.length}`);
  if (!Number.isInteger(sequence.variants) || sequence.variants < 1) {
    invalid(sequence.name, `Sequence needs at least one variant, got ${sequence.variants}`);
  }
  if (!Number.isInteger(sequence.shots) || sequence.shots < 1) {
    invalid(sequence.name, `Sequence needs at least one shot, got ${sequence.shots}`);
  }
}

function checkVariables(sequence: Sequence): void {
  const names = new Set<string>();
  for (const variable of sequence.controlVariables) {
    if (names.has(variable.name)) {
      throw new SequenceFault(SequenceErrorKind.INVALID_VARIABLE, variable.name,
        `Duplicate control variable '${variable.name}'`);
    }
    names.add(variable.name);
    verifyVariable(variable, sequence.variants);
  }
}

function checkNames(sequence: Sequence): void {
  const channels = new Set<string>();
  const windows = new Set<string>();
  const jumps = new Set<string>();
  for (const channel of sequence.channels) {
    if (channels.has(channel.name)) invalid(channel.name, `Duplicate channel '${channel.name}'`);
    channels.add(channel.name);
    for (const window of channel.windows) {
      if (window.name.startsWith('_')) invalid(window.name, `Window name '${window.name}' must not start with '_'`);
      if (windows.has(window.name)) invalid(window.name, `Duplicate window '${window.name}'`);
      windows.add(window.name);
    }
    if (channel.kind !== 'control') continue;
    for (const jump of channel.jumps) {
      if (jump.name.startsWith('_')) invalid(jump.name, `Jump name '${jump.name}' must not start with '_'`);
      if (jumps.has(jump.name)) invalid(jump.name, `Duplicate jump '${jump.name}'`);
      jumps.add(jump.name);
    }
  }
  for (const name of jumps) {
    if (windows.has(name)) invalid(name, `'${name}' names both a window and a jump`);
  }
}

function checkChannelMapping(sequence: Sequence, channel: SequenceChannel): void {
  switch (channel.kind) {
    case 'output': fpgaChannelFor(sequence.hardware, channel); break;
    case 'counter': tdcChannelFor(sequence.hardware, channel); break;
    case 'control': spcChannelFor(sequence.hardware, channel); break;
  }
}

function targetsOf(jump: Jump, warnings: Warning[]): Target[] {
  return effectiveConditions(jump, warnings).map(c => c.target);
}

function checkDestination(jump: Jump, reference: Reference, index: SequenceIndex): void {
  switch (reference.kind) {
    case 'variable':
      return invalid(jump.name, `Jump '${jump.name}' must go to a window boundary or a jump, not ${describeReference(reference)}`);
    case 'start':
    case 'end':
      if (!index.windows.has(reference.window)) {
        throw new SequenceFault(SequenceErrorKind.UNRESOLVED_REFERENCE, jump.name,
          `Jump '${jump.name}' goes to unknown window '${reference.window}'`);
      }
      return;
    case 'jump': {
      const entry = index.jumps.get(reference.jump);
      if (entry === undefined) {
        throw new SequenceFault(SequenceErrorKind.UNRESOLVED_REFERENCE, jump.name,
          `Jump '${jump.name}' goes to unknown jump '${reference.jump}'`);
      }
      if (entry.jump.kind === 'conditional') {
        invalid(jump.name, `Jump '${jump.name}' must not go to conditional jump '${reference.jump}'`);
      }
      return;
    }
  }
}

function checkJump(jump: Jump, channel: ControlChannel, index: SequenceIndex, warnings: Warning[]): void {
  if (jump.kind === 'conditional') {
    if (!channel.windows.some(w => w.name === jump.window)) {
      invalid(jump.name, `Jump '${jump.name}' tests window '${jump.window}', which is not in channel '${channel.name}'`);
    }
  }

  const targets = targetsOf(jump, warnings);
  thresholdChain(jump);

  if (jump.kind === 'conditional') {
    if (targets.every(t => t.kind === 'pass')) invalid(jump.name, `Jump '${jump.name}' always passes`);
    if (targets.every(t => t.kind === 'terminate')) invalid(jump.name, `Jump '${jump.name}' always terminates`);
  }
  for (const target of targets) {
    if (target.kind === 'destination') checkDestination(jump, target.reference, index);
  }
}

// ---- Per-variant checks ----

function checkInside(sequence: Sequence, subject: string, time: number): void {
  if (!(time >= 0 && time <= sequence.length)) {
    invalid(subject, `Time ${time} of '${subject}' is outside the sequence [0, ${sequence.length}]`);
  }
}

export function checkVariant(sequence: Sequence, index: SequenceIndex, variant: number): void {
  const resolver = new TimeResolver(sequence, variant, index);
  const boundaries = new Map<number, string>();

  for (const channel of sequence.channels) {
    const spans: { name: string; start: number; end: number }[] = [];
    for (const window of channel.windows) {
      const start = resolver.windowStart(window.name);
      const end = resolver.windowEnd(window.name);
      checkInside(sequence, window.name, start);
      checkInside(sequence, window.name, end);
      if (start > end) invalid(window.name, `Window '${window.name}' ends before it starts`);
      if (channel.kind === 'control' && end - start < MIN_CONTROL_WINDOW) {
        invalid(window.name, `Control window '${window.name}' is shorter than ${MIN_CONTROL_WINDOW} µs`);
      }
      spans.push({ name: window.name, start, end });
      boundaries.set(start, window.name);
      boundaries.set(end, window.name);
    }
    if (channel.kind === 'output') {
      spans.sort((a, b) => a.start - b.start);
      for (let i = 1; i < spans.length; i++) {
        if (spans[i].start < spans[i - 1].end) {
          throw new SequenceFault(SequenceErrorKind.OVERLAPPING_WINDOWS, spans[i].name,
            `Window '${spans[i].name}' overlaps '${spans[i - 1].name}' in channel '${channel.name}'`);
        }
      }
    }
  }

  const jumps = allJumps(sequence);
  const jumpTimes = new Map<number, string>();
  const destinationTimes: { jump: string; time: number }[] = [];
  for (const { jump } of jumps) {
    const time = resolver.jumpTime(jump.name);
    checkInside(sequence, jump.name, time);
    const clash = jumpTimes.get(time);
    if (clash !== undefined) {
      throw new SequenceFault(SequenceErrorKind.JUMP_COLLISION, jump.name,
        `Jumps '${clash}' and '${jump.name}' happen at the same time ${time}`);
    }
    jumpTimes.set(time, jump.name);
    const boundary = boundaries.get(time);
    if (boundary !== undefined) {
      throw new SequenceFault(SequenceErrorKind.JUMP_COLLISION, jump.name,
        `Jump '${jump.name}' coincides with a boundary of window '${boundary}'`);
    }
    for (const target of targetsOf(jump, [])) {
      if (target.kind === 'destination') {
        destinationTimes.push({ jump: jump.name, time: resolver.reference(target.reference, jump.name) });
      }
    }
  }

  for (const { jump, channel } of jumps) {
    if (jump.kind !== 'conditional') continue;
    const time = resolver.jumpTime(jump.name);
    const start = resolver.windowStart(jump.window);
    const end = resolver.windowEnd(jump.window);
    if (end > time) invalid(jump.name, `Window '${jump.window}' of jump '${jump.name}' ends after the jump`);
    for (const destination of destinationTimes) {
      if (destination.time > start && destination.time < time) {
        invalid(jump.name, `Jump '${destination.jump}' lands inside the counting period of '${jump.name}'`);
      }
    }
    for (const window of channel.windows) {
      if (window.name === jump.window) continue;
      const otherEnd = resolver.windowEnd(window.name);
      if (otherEnd <= time && otherEnd > end) {
        invalid(jump.name, `Window '${window.name}' ends between window '${jump.window}' and jump '${jump.name}'`);
      }
    }
  }

  checkReachability(buildReachabilityTree(sequence, resolver), sequence.name);
}

// ---- Entry point ----

function checkSequence(sequence: Sequence, warnings: Warning[]): SequenceIndex {
  checkCounts(sequence);
  verifyHardware(sequence.hardware);
  checkVariables(sequence);
  checkNames(sequence);
  for (const channel of sequence.channels) checkChannelMapping(sequence, channel);

  const index = indexSequence(sequence);
  for (const { jump, channel } of allJumps(sequence)) checkJump(jump, channel, index, warnings);
  for (let variant = 0; variant < sequence.variants; variant++) checkVariant(sequence, index, variant);
  return index;
}

export function verifySequence(sequence: Sequence): PhaseResult<SequenceIndex> {
  const warnings: Warning[] = [];
  return runPhase(warnings, () => checkSequence(sequence, warnings));
}
