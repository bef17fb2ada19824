import { SequenceErrorKind, SequenceFault } from '../types';

export type ControlVariable =
  | { kind: 'constant'; name: string; value: number }
  | { kind: 'linear'; name: string; start: number; stop: number }
  | { kind: 'expression'; name: string; expression: (x: number) => number; from: number; to: number };

/** Evenly spaced value i of `count` samples from start to stop inclusive. */
export function linspace(start: number, stop: number, count: number, index: number): number {
  if (count <= 1) return start;
  return start + (stop - start) * index / (count - 1);
}

export function variableValue(variable: ControlVariable, variant: number, variants: number): number {
  switch (variable.kind) {
    case 'constant':
      return variable.value;
    case 'linear':
      return linspace(variable.start, variable.stop, variants, variant);
    case 'expression': {
      const x = linspace(variable.from, variable.to, variants, variant);
      const value = variable.expression(x);
      if (!Number.isFinite(value)) {
        throw new SequenceFault(SequenceErrorKind.INVALID_VARIABLE, variable.name,
          `Variable '${variable.name}' evaluates to ${value} at x = ${x}`);
      }
      return value;
    }
  }
}

/** Values of every control variable for one variant, keyed by name. */
export function controlValues(variables: ControlVariable[], variant: number, variants: number): Map<string, number> {
  const values = new Map<string, number>();
  for (const variable of variables) {
    values.set(variable.name, variableValue(variable, variant, variants));
  }
  return values;
}

export function verifyVariable(variable: ControlVariable, variants: number): void {
  if (variable.name.length === 0) {
    throw new SequenceFault(SequenceErrorKind.INVALID_VARIABLE, variable.name, 'Control variable without a name');
  }
  const numbers = variable.kind === 'constant' ? [variable.value]
    : variable.kind === 'linear' ? [variable.start, variable.stop]
    : [variable.from, variable.to];
  for (const n of numbers) {
    if (!Number.isFinite(n)) {
      throw new SequenceFault(SequenceErrorKind.INVALID_VARIABLE, variable.name,
        `Variable '${variable.name}' has a non-finite parameter`);
    }
  }
  for (let v = 0; v < variants; v++) variableValue(variable, v, variants);
}
