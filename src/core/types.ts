// 32-bit IPU instruction word (stored as an unsigned JS number)
export type Word32 = number;

export const Opcode = {
  WAIT: 0,
  JUMP: 1,
  SET: 2,
  END: 3,
} as const;
export type Opcode = typeof Opcode[keyof typeof Opcode];

// ---- Error taxonomy ----

export const SequenceErrorKind = {
  INVALID_DEFINITION: 'invalid-definition',
  INVALID_HARDWARE: 'invalid-hardware',
  INVALID_VARIABLE: 'invalid-variable',
  UNRESOLVED_REFERENCE: 'unresolved-reference',
  RECURSIVE_REFERENCE: 'recursive-reference',
  OVERLAPPING_WINDOWS: 'overlapping-windows',
  OVERLAPPING_CONDITIONS: 'overlapping-conditions',
  JUMP_COLLISION: 'jump-collision',
  UNREACHABLE_TERMINATOR: 'unreachable-terminator',
  DEPTH_EXCEEDED: 'depth-exceeded',
} as const;
export type SequenceErrorKind = typeof SequenceErrorKind[keyof typeof SequenceErrorKind];

export const CompilerErrorKind = {
  TOO_MANY_CONDITIONS: 'too-many-conditions',
  CONTROL_REGISTER_OVERFLOW: 'control-register-overflow',
  SEQUENCE_TOO_SHORT: 'sequence-too-short',
  NOT_ENOUGH_ROOM: 'not-enough-room',
  FIELD_OVERFLOW: 'field-overflow',
  INTERNAL: 'internal',
} as const;
export type CompilerErrorKind = typeof CompilerErrorKind[keyof typeof CompilerErrorKind];

export type ErrorKind = SequenceErrorKind | CompilerErrorKind;

export interface CompileError {
  kind: ErrorKind;
  message: string;
  /** Name of the offending window, jump, channel, variable or block */
  subject?: string;
}

export interface Warning {
  message: string;
  subject?: string;
}

/**
 * Raised while reading or verifying a sequence description.
 * Always names the entity at fault.
 */
export class SequenceFault extends Error {
  readonly kind: SequenceErrorKind;
  readonly subject: string;

  constructor(kind: SequenceErrorKind, subject: string, message: string) {
    super(message);
    this.name = 'SequenceFault';
    this.kind = kind;
    this.subject = subject;
  }
}

/** Raised by the compiler passes: capacity limits and internal invariants. */
export class CompilerFault extends Error {
  readonly kind: CompilerErrorKind;
  readonly subject?: string;

  constructor(kind: CompilerErrorKind, message: string, subject?: string) {
    super(message);
    this.name = 'CompilerFault';
    this.kind = kind;
    this.subject = subject;
  }
}

/**
 * Convert a fault thrown inside a phase into an error value.
 * Returns null for anything that is not one of ours; callers rethrow those.
 */
export function toCompileError(e: unknown): CompileError | null {
  if (e instanceof SequenceFault) {
    return { kind: e.kind, message: e.message, subject: e.subject };
  }
  if (e instanceof CompilerFault) {
    return e.subject === undefined
      ? { kind: e.kind, message: e.message }
      : { kind: e.kind, message: e.message, subject: e.subject };
  }
  return null;
}

const SEQUENCE_ERROR_KINDS = new Set<string>(Object.values(SequenceErrorKind));

export function isSequenceErrorKind(kind: ErrorKind): kind is SequenceErrorKind {
  return SEQUENCE_ERROR_KINDS.has(kind);
}

export type PhaseResult<T> =
  | { ok: true; value: T; warnings: Warning[] }
  | { ok: false; error: CompileError; warnings: Warning[] };

/**
 * Run one phase, turning its faults into a failed result.
 * Foreign exceptions propagate unchanged.
 */
export function runPhase<T>(warnings: Warning[], phase: () => T): PhaseResult<T> {
  try {
    return { ok: true, value: phase(), warnings };
  } catch (e) {
    const error = toCompileError(e);
    if (error === null) throw e;
    return { ok: false, error, warnings };
  }
}
