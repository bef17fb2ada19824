import { DEFAULT_FPGA_DELAY_UNIT, FPGA_CHANNELS, SPC_CHANNELS, TDC_CHANNELS } from '../constants';
import { SequenceErrorKind, SequenceFault } from '../types';

export interface FpgaChannel {
  name: string;
  channelId: number;
  /** true: logical high drives the line high */
  polarity: boolean;
  idleState: boolean;
}

export interface TdcChannel {
  name: string;
  channelId: number;
}

/** Sequence pulse counter: counts while its gate output is high; `channelId` selects it in a JUMP. */
export interface SpcChannel {
  name: string;
  channelId: number;
  gate: number;
}

export interface ControlBit {
  bit: number;
  /** FPGA output driving this register bit */
  output: number;
  /** TDC input the register bit is read back on */
  input: number;
}

export interface ControlRegister {
  bits: ControlBit[];
}

export interface HardwareConfig {
  name: string;
  fpgaDelayUnit: number;
  outputs: FpgaChannel[];
  counters: TdcChannel[];
  spcs: SpcChannel[];
  controlRegister: ControlRegister;
}

export function createHardware(config: Partial<HardwareConfig> & { name: string }): HardwareConfig {
  return {
    fpgaDelayUnit: DEFAULT_FPGA_DELAY_UNIT,
    outputs: [],
    counters: [],
    spcs: [],
    controlRegister: { bits: [] },
    ...config,
  };
}

/** Outputs that are active low; their SET bits are inverted on the wire. */
export function polarityMask(hardware: HardwareConfig): number {
  let mask = 0;
  for (const output of hardware.outputs) {
    if (!output.polarity) mask |= 1 << output.channelId;
  }
  return mask;
}

export function idleState(hardware: HardwareConfig): number {
  let state = 0;
  for (const output of hardware.outputs) {
    if (output.idleState) state |= 1 << output.channelId;
  }
  return state;
}

// ---- Verification ----

function fail(subject: string, message: string): never {
  throw new SequenceFault(SequenceErrorKind.INVALID_HARDWARE, subject, message);
}

function checkUnique<T>(items: T[], key: (item: T) => number | string, what: string, subject: (item: T) => string): void {
  const seen = new Set<number | string>();
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) fail(subject(item), `Duplicate ${what} ${k}`);
    seen.add(k);
  }
}

function checkRange(id: number, limit: number, what: string, subject: string): void {
  if (!Number.isInteger(id) || id < 0 || id >= limit) {
    fail(subject, `${what} ${id} of '${subject}' outside 0..${limit - 1}`);
  }
}

export function verifyHardware(hardware: HardwareConfig): void {
  if (!(hardware.fpgaDelayUnit > 0)) {
    fail(hardware.name, `FPGA delay unit must be positive, got ${hardware.fpgaDelayUnit}`);
  }

  for (const o of hardware.outputs) checkRange(o.channelId, FPGA_CHANNELS, 'FPGA channel', o.name);
  for (const c of hardware.counters) checkRange(c.channelId, TDC_CHANNELS, 'TDC channel', c.name);
  for (const s of hardware.spcs) {
    checkRange(s.channelId, SPC_CHANNELS, 'SPC channel', s.name);
    checkRange(s.gate, FPGA_CHANNELS, 'SPC gate', s.name);
  }

  checkUnique(hardware.outputs, o => o.channelId, 'FPGA channel', o => o.name);
  checkUnique(hardware.counters, c => c.channelId, 'TDC channel', c => c.name);
  checkUnique(hardware.spcs, s => s.channelId, 'SPC channel', s => s.name);
  checkUnique(hardware.spcs, s => s.gate, 'SPC gate', s => s.name);
  const named = [...hardware.outputs, ...hardware.counters, ...hardware.spcs];
  checkUnique(named, c => c.name, 'channel name', c => c.name);

  const bits = hardware.controlRegister.bits;
  const bitNumbers = new Set(bits.map(b => b.bit));
  for (let i = 0; i < bits.length; i++) {
    if (!bitNumbers.has(i)) fail(hardware.name, `Control register is missing bit ${i}`);
  }
  checkUnique(bits, b => b.bit, 'control register bit', () => hardware.name);
  checkUnique(bits, b => b.output, 'control register output', () => hardware.name);
  checkUnique(bits, b => b.input, 'control register input', () => hardware.name);
  for (const b of bits) {
    checkRange(b.output, FPGA_CHANNELS, 'Control register output', hardware.name);
    checkRange(b.input, TDC_CHANNELS, 'Control register input', hardware.name);
  }

  const controlOutputs = new Set(bits.map(b => b.output));
  const controlInputs = new Set(bits.map(b => b.input));
  const gates = new Set(hardware.spcs.map(s => s.gate));
  for (const o of hardware.outputs) {
    if (controlOutputs.has(o.channelId)) fail(o.name, `FPGA channel ${o.channelId} of '${o.name}' is a control register output`);
    if (gates.has(o.channelId)) fail(o.name, `FPGA channel ${o.channelId} of '${o.name}' is an SPC gate`);
  }
  for (const s of hardware.spcs) {
    if (controlOutputs.has(s.gate)) fail(s.name, `SPC gate ${s.gate} of '${s.name}' is a control register output`);
  }
  for (const c of hardware.counters) {
    if (controlInputs.has(c.channelId)) fail(c.name, `TDC channel ${c.channelId} of '${c.name}' is a control register input`);
  }
}
