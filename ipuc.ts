/**
 * ipuc: IPU sequence compiler command line
 *
 * Usage:
 *   npx tsx ipuc.ts compile <sequence.ts> [options]
 *   npx tsx ipuc.ts disasm <words.txt>
 *   npx tsx ipuc.ts run <words.txt> [--counts=2:15,3:0]
 *
 * A sequence module default-exports a Sequence. A word file holds one word
 * per line, decimal or 0x-prefixed hex; '#' starts a comment.
 *
 * Compile options:
 *   --variant=N     Compile variant N (default 0)
 *   --all           Compile every variant
 *   --truncate      End the sequence after its last window or jump
 *   --high-time=N   Control register high time in ticks
 *   --json          Print the compiler report as JSON
 *   --disasm        Show the disassembly
 *   --listing       Show the scheduled instruction list
 *   --quiet         Only show errors
 */
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { Compiler } from './src/core/compiler/compiler';
import type { CompileResult, CompilerOptions } from './src/core/compiler/compiler';
import { reportToJson, summarizeReport } from './src/core/compiler/report';
import { formatListing } from './src/core/disassembler';
import { simulate } from './src/core/ipu';
import type { Sequence } from './src/core/sequence/sequence';
import type { Word32 } from './src/core/types';

// ---- Argument parsing ----

const args = process.argv.slice(2);
const flags = new Map(
  args.filter(a => a.startsWith('--')).map(a => {
    const [key, value] = a.slice(2).split('=', 2);
    return [key, value ?? ''] as const;
  }),
);
const [command, filePath] = args.filter(a => !a.startsWith('--'));

function usage(): never {
  console.error('ipuc: IPU sequence compiler');
  console.error('');
  console.error('Usage: ipuc compile <sequence.ts> [--variant=N] [--all] [--truncate] [--high-time=N] [--json] [--disasm] [--listing] [--quiet]');
  console.error('       ipuc disasm <words.txt>');
  console.error('       ipuc run <words.txt> [--counts=ch:n,...]');
  process.exit(1);
}

if (command === undefined || filePath === undefined) usage();

function intFlag(name: string, fallback: number): number {
  const raw = flags.get(name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.error(`Error: --${name} expects an integer, got '${raw}'`);
    process.exit(1);
  }
  return value;
}

// ---- Word files ----

function readWords(path: string): Word32[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch {
    console.error(`Error: cannot read file '${path}'`);
    process.exit(1);
  }
  const words: Word32[] = [];
  text.split('\n').forEach((line, i) => {
    const content = line.split('#')[0].trim();
    if (content === '') return;
    const value = Number(content);
    if (!Number.isInteger(value) || value < 0 || value > 0xFFFFFFFF) {
      console.error(`${path}:${i + 1}: not a 32-bit word: '${content}'`);
      process.exit(1);
    }
    words.push(value);
  });
  return words;
}

function parseCounts(raw: string | undefined): Record<number, number> {
  const counts: Record<number, number> = {};
  if (raw === undefined || raw === '') return counts;
  for (const pair of raw.split(',')) {
    const [channel, count] = pair.split(':').map(Number);
    if (!Number.isInteger(channel) || !Number.isInteger(count)) {
      console.error(`Error: bad --counts entry '${pair}', expected channel:count`);
      process.exit(1);
    }
    counts[channel] = count;
  }
  return counts;
}

// ---- Sequence modules ----

function isSequence(value: unknown): value is Sequence {
  return typeof value === 'object' && value !== null
    && 'name' in value && typeof value.name === 'string'
    && 'length' in value && typeof value.length === 'number'
    && 'hardware' in value && typeof value.hardware === 'object'
    && 'channels' in value && Array.isArray(value.channels);
}

async function loadSequence(path: string): Promise<Sequence> {
  const mod: unknown = await import(pathToFileURL(resolve(path)).href);
  const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
  if (!isSequence(exported)) {
    console.error(`Error: '${path}' does not default-export a sequence`);
    process.exit(1);
  }
  return exported;
}

function printResult(result: CompileResult, variant: number): boolean {
  const quiet = flags.has('quiet');
  if (!quiet) {
    for (const w of result.warnings) console.error(`  \x1b[33mwarning\x1b[0m ${w.message}`);
  }
  if (!result.ok) {
    const subject = result.error.subject === undefined ? '' : ` (${result.error.subject})`;
    console.error(`\x1b[31m✗ ${filePath} variant ${variant}: ${result.error.kind}${subject}\x1b[0m`);
    console.error(`  ${result.error.message}`);
    return false;
  }
  if (flags.has('json')) {
    console.log(reportToJson(result.report));
    return true;
  }
  if (quiet) {
    console.log(`\x1b[32m✓ ${filePath} variant ${variant}\x1b[0m`);
    return true;
  }
  console.log(`\x1b[32m✓ ${filePath}\x1b[0m compiled successfully`);
  console.log(summarizeReport(result.report).replace(/^/gm, '  '));
  if (flags.has('listing')) {
    console.log('');
    console.log(result.listing.replace(/^/gm, '    '));
  }
  if (flags.has('disasm')) {
    console.log('');
    console.log(formatListing(result.words).replace(/^/gm, '    '));
  }
  return true;
}

// ---- Commands ----

switch (command) {
  case 'compile': {
    const sequence = await loadSequence(filePath);
    const options: Partial<CompilerOptions> = {
      truncate: flags.has('truncate'),
    };
    if (flags.has('high-time')) options.controlRegisterHighTime = intFlag('high-time', 0);
    const compiler = new Compiler(options);
    const variants = flags.has('all')
      ? Array.from({ length: sequence.variants }, (_, i) => i)
      : [intFlag('variant', 0)];
    let ok = true;
    for (const variant of variants) {
      ok = printResult(compiler.compile(sequence, variant), variant) && ok;
    }
    process.exit(ok ? 0 : 1);
  }
  case 'disasm':
    console.log(formatListing(readWords(filePath)));
    break;
  case 'run': {
    const trace = simulate(readWords(filePath), parseCounts(flags.get('counts')));
    for (const change of trace.changes) {
      console.log(`  tick ${String(change.tick).padStart(8)}  bus 0x${change.value.toString(16).toUpperCase().padStart(6, '0')}`);
    }
    console.log(`  halted (${trace.halt}) after ${trace.ticks} ticks, ${trace.jumps} jumps taken`);
    break;
  }
  default:
    usage();
}
