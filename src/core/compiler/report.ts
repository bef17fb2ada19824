import type { Word32 } from '../types';

export interface CompilerReport {
  flags: {
    truncate: boolean;
    controlRegisterHighTime: number;
  };
  constants: {
    maxJumpConditions: number;
  };
  controlValues: Record<string, number>;
  variant: number;
  fpgaDelayUnit: number;
  /** Final sequence length in ticks */
  length: number;
  containsJumps: boolean;
  compiled: Word32[];
}

export function reportToJson(report: CompilerReport): string {
  return JSON.stringify(report, null, 2);
}

export function summarizeReport(report: CompilerReport): string {
  const values = Object.entries(report.controlValues).map(([name, value]) => `${name}=${value}`);
  return [
    `variant ${report.variant}: ${report.compiled.length} instructions, ${report.length} ticks of ${report.fpgaDelayUnit} µs`,
    `jumps: ${report.containsJumps ? 'yes' : 'no'}, truncate: ${report.flags.truncate}, control high time: ${report.flags.controlRegisterHighTime}`,
    ...(values.length > 0 ? [`values: ${values.join(', ')}`] : []),
  ].join('\n');
}
