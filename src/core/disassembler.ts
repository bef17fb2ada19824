import {
  BUS_MASK, JUMP_ADDRESS_MASK, JUMP_ALWAYS_BIT, JUMP_CHANNEL_MASK, JUMP_CHANNEL_SHIFT,
  JUMP_THRESHOLD_MASK, JUMP_THRESHOLD_SHIFT, OPCODE_SHIFT, WAIT_DURATION_MAX,
} from './constants';
import { Opcode } from './types';
import type { Word32 } from './types';

export type DecodedInstruction =
  | { op: typeof Opcode.WAIT; duration: number }
  | { op: typeof Opcode.SET; value: number }
  | { op: typeof Opcode.JUMP; always: boolean; channelId: number; threshold: number; address: number }
  | { op: typeof Opcode.END };

/**
 * Decode one 32-bit word. Bits outside the opcode's fields are ignored.
 */
export function decodeWord(word: Word32): DecodedInstruction {
  const w = word >>> 0;
  switch (w >>> OPCODE_SHIFT) {
    case Opcode.WAIT:
      return { op: Opcode.WAIT, duration: w & WAIT_DURATION_MAX };
    case Opcode.JUMP:
      return {
        op: Opcode.JUMP,
        always: ((w >>> JUMP_ALWAYS_BIT) & 1) === 1,
        channelId: (w >>> JUMP_CHANNEL_SHIFT) & JUMP_CHANNEL_MASK,
        threshold: (w >>> JUMP_THRESHOLD_SHIFT) & JUMP_THRESHOLD_MASK,
        address: w & JUMP_ADDRESS_MASK,
      };
    case Opcode.SET:
      return { op: Opcode.SET, value: w & BUS_MASK };
    default:
      return { op: Opcode.END };
  }
}

/**
 * Format a decoded word as a human-readable string
 */
export function formatInstruction(word: Word32): string {
  const ins = decodeWord(word);
  switch (ins.op) {
    case Opcode.WAIT:
      return `WAIT ${ins.duration}`;
    case Opcode.SET:
      return `SET  0x${ins.value.toString(16).toUpperCase().padStart(6, '0')}`;
    case Opcode.JUMP:
      return ins.always
        ? `JUMP ${ins.address}`
        : `JUMP ${ins.address} if spc${ins.channelId} >= ${ins.threshold}`;
    case Opcode.END:
      return 'END';
  }
}

/** Listing with 1-based addresses, one instruction per line. */
export function formatListing(words: Word32[]): string {
  const width = String(words.length).length;
  return words
    .map((word, i) => {
      const raw = (word >>> 0).toString(16).toUpperCase().padStart(8, '0');
      return `${String(i + 1).padStart(width, ' ')}  ${raw}  ${formatInstruction(word)}`;
    })
    .join('\n');
}
