/**
 * Sequence compiler main pipeline.
 * verify → setup → windows → jumps → complete (state, inheritance, placement,
 * gap filling) → finalize (polarity, addresses, encoding)
 */
import {
  CONTROL_REGISTER_HIGH_TIME, END_BLOCK, MAX_JUMP_CONDITIONS, START_BLOCK,
} from '../constants';
import {
  CompilerErrorKind, CompilerFault, runPhase, SequenceErrorKind, SequenceFault,
} from '../types';
import type { CompileError, Warning, Word32 } from '../types';
import { TimeResolver, allJumps, fpgaChannelFor, latestTime, spcChannelFor } from '../sequence/sequence';
import type { Sequence, SequenceIndex } from '../sequence/sequence';
import {
  grayEncode, negativeMask, registerCapacity, registerMask, registerWidth, requiredWidth, valueToState,
} from '../sequence/control-register';
import { polarityMask } from '../sequence/hardware';
import type { Target } from '../sequence/jumps';
import { toTicks } from '../sequence/timing';
import type { Reference } from '../sequence/timing';
import { verifySequence } from '../sequence/verify';
import { compiledConditions, formatChain, orderJumpTimes } from './conditions';
import type { ScheduledJump } from './conditions';
import { createEnd, createJump, createSet } from './instructions';
import type { EndInstruction, Instruction, SetInstruction } from './instructions';
import { InstructionLedger } from './ledger';
import { placeInstructions } from './placement';
import type { CompilerReport } from './report';

export interface CompilerOptions {
  /** End the sequence right after its latest window end or jump */
  truncate: boolean;
  /** Ticks a control register write stays on the bus */
  controlRegisterHighTime: number;
  maxJumpConditions: number;
}

export const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  truncate: false,
  controlRegisterHighTime: CONTROL_REGISTER_HIGH_TIME,
  maxJumpConditions: MAX_JUMP_CONDITIONS,
};

export type CompileResult =
  | { ok: true; words: Word32[]; report: CompilerReport; listing: string; warnings: Warning[] }
  | { ok: false; error: CompileError; warnings: Warning[] };

export function resolveOptions(options: Partial<CompilerOptions> = {}): CompilerOptions {
  const resolved = { ...DEFAULT_COMPILER_OPTIONS, ...options };
  if (!Number.isInteger(resolved.controlRegisterHighTime) || resolved.controlRegisterHighTime < 1) {
    throw new RangeError(`controlRegisterHighTime must be a positive integer, got ${resolved.controlRegisterHighTime}`);
  }
  if (!Number.isInteger(resolved.maxJumpConditions) || resolved.maxJumpConditions < 1) {
    throw new RangeError(`maxJumpConditions must be a positive integer, got ${resolved.maxJumpConditions}`);
  }
  return resolved;
}

// ---- Context ----

interface ActiveWindow {
  start: number;
  end: number;
  bit: number;
}

interface CompileContext {
  sequence: Sequence;
  variant: number;
  options: CompilerOptions;
  resolver: TimeResolver;
  ledger: InstructionLedger;
  warnings: Warning[];
  /** Sequence length in ticks; the END sits on the last one */
  length: number;
  terminatorTick: number;
  controlMask: number;
  negativeMask: number;
  windows: ActiveWindow[];
  nextDestinationId: number;
  end: EndInstruction;
  jumpTimes: Map<number, ScheduledJump>;
}

function ticks(ctx: Pick<CompileContext, 'sequence'>, time: number): number {
  return toTicks(time, ctx.sequence.hardware.fpgaDelayUnit);
}

/** Logical bus state at a tick: every window with start <= tick < end is high. */
function stateAt(ctx: CompileContext, tick: number): number {
  let state = 0;
  for (const w of ctx.windows) {
    if (w.start <= tick && tick < w.end) state |= 1 << w.bit;
  }
  return state;
}

// ---- Control register ----

function newDestinationId(ctx: CompileContext): number {
  const register = ctx.sequence.hardware.controlRegister;
  const id = ctx.nextDestinationId++;
  if (id > registerCapacity(register)) {
    throw new CompilerFault(CompilerErrorKind.CONTROL_REGISTER_OVERFLOW,
      `Control register of ${registerWidth(register)} bits cannot carry destination id ${id}; ${requiredWidth(id)} bits are needed`);
  }
  return id;
}

/** Write `id` to the control register at `tick` and clear it again after the high time. */
function controlWrite(ctx: CompileContext, tick: number, id: number, block: string | null): [SetInstruction, SetInstruction] {
  const reset = tick + ctx.options.controlRegisterHighTime;
  if (reset >= ctx.terminatorTick) {
    throw new CompilerFault(CompilerErrorKind.SEQUENCE_TOO_SHORT,
      `Control register write at tick ${tick} needs the sequence to run past tick ${reset}`, block ?? undefined);
  }
  const value = valueToState(ctx.sequence.hardware.controlRegister, grayEncode(id));
  const write = createSet(tick, value, ctx.controlMask, block, true);
  const clear = createSet(reset, 0, ctx.controlMask, block, true);
  ctx.ledger.add(write, clear);
  return [write, clear];
}

/** Landing point of a jump: marker pair plus the full output state of the destination tick. */
function destinationTriple(ctx: CompileContext, tick: number): SetInstruction {
  const [write] = controlWrite(ctx, tick, newDestinationId(ctx), null);
  ctx.ledger.add(createSet(tick, stateAt(ctx, tick), ctx.negativeMask));
  return write;
}

function destinationTick(ctx: CompileContext, reference: Reference, jumpName: string): number {
  let tick: number;
  if (reference.kind === 'jump') {
    const scheduled = [...ctx.jumpTimes.values()].find(s => s.jump.name === reference.jump);
    tick = scheduled === undefined
      ? ticks(ctx, ctx.resolver.jumpTime(reference.jump))
      : scheduled.tick;
  } else {
    tick = ticks(ctx, ctx.resolver.reference(reference, jumpName));
  }
  if (tick >= ctx.terminatorTick) {
    const clamped = ctx.terminatorTick - 1;
    ctx.warnings.push({ message: `Destination of jump '${jumpName}' moved from tick ${tick} to ${clamped}`, subject: jumpName });
    return clamped;
  }
  return tick;
}

function targetInstruction(ctx: CompileContext, target: Target, jumpName: string): Instruction {
  switch (target.kind) {
    case 'terminate':
      return ctx.end;
    case 'destination':
      return destinationTriple(ctx, destinationTick(ctx, target.reference, jumpName));
    case 'pass':
      throw new CompilerFault(CompilerErrorKind.INTERNAL, `Pass of jump '${jumpName}' has no instruction`, jumpName);
  }
}

// ---- Setup ----

function sequenceLength(sequence: Sequence, resolver: TimeResolver, options: CompilerOptions, warnings: Warning[]): number {
  const full = toTicks(sequence.length, sequence.hardware.fpgaDelayUnit);
  if (!options.truncate) return full;
  const latest = latestTime(sequence, resolver);
  if (latest <= 0) {
    warnings.push({ message: 'Nothing to truncate to, keeping the full sequence length', subject: sequence.name });
    return full;
  }
  return Math.min(full, toTicks(latest, sequence.hardware.fpgaDelayUnit) + 2);
}

function createContext(
  sequence: Sequence, index: SequenceIndex, variant: number, options: CompilerOptions, warnings: Warning[],
): CompileContext {
  if (!Number.isInteger(variant) || variant < 0 || variant >= sequence.variants) {
    throw new SequenceFault(SequenceErrorKind.INVALID_DEFINITION, sequence.name,
      `Variant ${variant} outside 0..${sequence.variants - 1}`);
  }
  const resolver = new TimeResolver(sequence, variant, index);
  const length = sequenceLength(sequence, resolver, options, warnings);
  if (length < 2) {
    throw new CompilerFault(CompilerErrorKind.SEQUENCE_TOO_SHORT,
      `Sequence '${sequence.name}' is only ${length} ticks long`, sequence.name);
  }
  const register = sequence.hardware.controlRegister;
  return {
    sequence, variant, options, resolver, warnings,
    ledger: new InstructionLedger(),
    length,
    terminatorTick: length - 1,
    controlMask: registerMask(register),
    negativeMask: negativeMask(register),
    windows: [],
    nextDestinationId: 1,
    end: createEnd(length - 1, END_BLOCK),
    jumpTimes: new Map(),
  };
}

function setup(ctx: CompileContext): void {
  if (allJumps(ctx.sequence).length > 0) {
    controlWrite(ctx, 0, newDestinationId(ctx), START_BLOCK);
  } else {
    ctx.warnings.push({ message: 'No jumps in sequence, not using the control register', subject: ctx.sequence.name });
  }
  ctx.ledger.add(ctx.end);
}

// ---- Windows ----

function addWindows(ctx: CompileContext): void {
  const { hardware } = ctx.sequence;
  for (const channel of ctx.sequence.channels) {
    if (channel.kind === 'counter') continue;
    const bit = channel.kind === 'output'
      ? fpgaChannelFor(hardware, channel).channelId
      : spcChannelFor(hardware, channel).gate;

    const spans: ActiveWindow[] = [];
    for (const window of channel.windows) {
      const start = ticks(ctx, ctx.resolver.windowStart(window.name));
      let end = ticks(ctx, ctx.resolver.windowEnd(window.name));
      if (end >= ctx.terminatorTick) {
        ctx.warnings.push({ message: `Window '${window.name}' truncated to end at tick ${ctx.terminatorTick - 1}`, subject: window.name });
        end = ctx.terminatorTick - 1;
      }
      if (start >= end) {
        ctx.warnings.push({ message: `Window '${window.name}' has length 0 and is skipped`, subject: window.name });
        continue;
      }
      spans.push({ start, end, bit });
    }

    // Windows that touch after quantization drive the line as one
    spans.sort((a, b) => a.start - b.start);
    const merged: ActiveWindow[] = [];
    for (const span of spans) {
      const last = merged[merged.length - 1];
      if (last !== undefined && span.start <= last.end) last.end = Math.max(last.end, span.end);
      else merged.push({ ...span });
    }
    for (const span of merged) {
      ctx.windows.push(span);
      ctx.ledger.add(createSet(span.start, 1 << bit, 1 << bit), createSet(span.end, 0, 1 << bit));
    }
  }
}

// ---- Jumps ----

function scheduleJumps(ctx: CompileContext): void {
  const { hardware } = ctx.sequence;
  const scheduled: ScheduledJump[] = allJumps(ctx.sequence).map(({ jump, channel }) => {
    const time = ctx.resolver.jumpTime(jump.name);
    const tick = ticks(ctx, time);
    if (tick >= ctx.terminatorTick) {
      throw new CompilerFault(CompilerErrorKind.SEQUENCE_TOO_SHORT,
        `Jump '${jump.name}' at tick ${tick} is not before the end of the sequence`, jump.name);
    }
    return { jump, channelId: spcChannelFor(hardware, channel).channelId, time, tick };
  });
  ctx.jumpTimes = orderJumpTimes(scheduled, ctx.warnings);
}

function emitJump(ctx: CompileContext, scheduled: ScheduledJump): void {
  const { jump, tick, channelId } = scheduled;
  const chain = compiledConditions(jump);
  if (chain.length > ctx.options.maxJumpConditions) {
    throw new CompilerFault(CompilerErrorKind.TOO_MANY_CONDITIONS,
      `Jump '${jump.name}' needs ${chain.length} conditions, at most ${ctx.options.maxJumpConditions} are supported (${formatChain(chain)})`,
      jump.name);
  }

  if (chain.length === 1) {
    const { target } = chain[0];
    if (target.kind === 'pass') {
      ctx.warnings.push({ message: `Jump '${jump.name}' always passes and is skipped`, subject: jump.name });
      return;
    }
    ctx.ledger.add(createJump(tick, targetInstruction(ctx, target, jump.name),
      { always: true, channelId, threshold: 0, block: null }));
    return;
  }

  let passMarker: SetInstruction | null = null;
  if (chain.some(e => e.target.kind === 'pass')) {
    [passMarker] = controlWrite(ctx, tick + 1, newDestinationId(ctx), jump.name);
  }

  // Ascending thresholds, placed backwards from the jump tick
  let entries = [...chain].reverse();
  if (entries[0].threshold === 0 && entries[0].target.kind === 'pass') entries = entries.slice(1);

  entries.forEach((entry, i) => {
    const at = tick - i;
    if (at < 0) {
      throw new CompilerFault(CompilerErrorKind.NOT_ENOUGH_ROOM,
        `Jump '${jump.name}' has no room for its ${entries.length} conditions`, jump.name);
    }
    let target: Instruction;
    if (entry.target.kind === 'pass') {
      if (passMarker === null) throw new CompilerFault(CompilerErrorKind.INTERNAL, `Jump '${jump.name}' lost its pass marker`, jump.name);
      target = passMarker;
    } else {
      target = targetInstruction(ctx, entry.target, jump.name);
    }
    ctx.ledger.add(createJump(at, target,
      { always: entry.threshold === 0, channelId, threshold: entry.threshold, block: jump.name }));
  });
}

function addJumps(ctx: CompileContext): void {
  scheduleJumps(ctx);
  const ordered = [...ctx.jumpTimes.values()].sort((a, b) => a.tick - b.tick);
  for (const scheduled of ordered) emitJump(ctx, scheduled);
}

// ---- Completion ----

function completeList(ctx: CompileContext): void {
  const { ledger } = ctx;
  ledger.add(createSet(0, stateAt(ctx, 0), ctx.negativeMask));
  ledger.compress(ctx.controlMask, ctx.warnings);
  ledger.inheritOutputs(ctx.negativeMask);
  ledger.compress(ctx.controlMask, ctx.warnings);

  ledger.replace(placeInstructions(ledger.instructions, ctx.length, ctx.warnings));
  ledger.inheritOutputs(ctx.negativeMask);
  ledger.fillGaps();
  ledger.sort();

  const count = ledger.length;
  ledger.compress(ctx.controlMask, ctx.warnings);
  if (ledger.length !== count) {
    throw new CompilerFault(CompilerErrorKind.INTERNAL,
      `Final compression changed the instruction count from ${count} to ${ledger.length}`);
  }
}

function finalize(ctx: CompileContext): Word32[] {
  ctx.ledger.applyPolarity(polarityMask(ctx.sequence.hardware));
  ctx.ledger.assignAddresses();
  return ctx.ledger.encode();
}

function report(ctx: CompileContext, words: Word32[]): CompilerReport {
  return {
    flags: {
      truncate: ctx.options.truncate,
      controlRegisterHighTime: ctx.options.controlRegisterHighTime,
    },
    constants: { maxJumpConditions: ctx.options.maxJumpConditions },
    controlValues: Object.fromEntries(ctx.resolver.values),
    variant: ctx.variant,
    fpgaDelayUnit: ctx.sequence.hardware.fpgaDelayUnit,
    length: ctx.length,
    containsJumps: allJumps(ctx.sequence).length > 0,
    compiled: words,
  };
}

// ---- Entry points ----

/**
 * Compile one variant of a sequence to IPU words.
 * Each call works on its own context; nothing is shared between calls.
 */
export function compileSequence(sequence: Sequence, variant: number, options: Partial<CompilerOptions> = {}): CompileResult {
  const resolved = resolveOptions(options);
  const verified = verifySequence(sequence);
  if (!verified.ok) return verified;
  const index = verified.value;

  const warnings = [...verified.warnings];
  const compiled = runPhase(warnings, () => {
    const ctx = createContext(sequence, index, variant, resolved, warnings);
    setup(ctx);
    addWindows(ctx);
    ctx.ledger.compress(ctx.controlMask, warnings);
    addJumps(ctx);
    ctx.ledger.compress(ctx.controlMask, warnings);
    ctx.ledger.sort();
    completeList(ctx);
    const words = finalize(ctx);
    return { words, report: report(ctx, words), listing: ctx.ledger.describe() };
  });
  if (!compiled.ok) return compiled;
  return { ok: true, ...compiled.value, warnings };
}

export class Compiler {
  readonly options: CompilerOptions;

  constructor(options: Partial<CompilerOptions> = {}) {
    this.options = resolveOptions(options);
  }

  compile(sequence: Sequence, variant = 0): CompileResult {
    return compileSequence(sequence, variant, this.options);
  }

  compileAll(sequence: Sequence): CompileResult[] {
    const results: CompileResult[] = [];
    for (let variant = 0; variant < sequence.variants; variant++) {
      results.push(this.compile(sequence, variant));
    }
    return results;
  }
}
