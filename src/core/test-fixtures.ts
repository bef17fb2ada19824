// Shared sequences for the test suites. One tick is 1 µs so times read as ticks.
import { controlChannel, outputChannel } from './sequence/channels';
import { createHardware } from './sequence/hardware';
import type { HardwareConfig } from './sequence/hardware';
import {
  conditionalJump, destination, endJump, otherwise, PASS, TERMINATE, whenAtLeast, whenInRange,
} from './sequence/jumps';
import { createSequence } from './sequence/sequence';
import type { Sequence } from './sequence/sequence';
import { at, startRef, timeWindow } from './sequence/timing';

export function benchHardware(overrides: Partial<HardwareConfig> = {}): HardwareConfig {
  return createHardware({
    name: 'bench',
    fpgaDelayUnit: 1,
    outputs: [{ name: 'laser', channelId: 0, polarity: true, idleState: false }],
    counters: [{ name: 'apd', channelId: 0 }],
    spcs: [{ name: 'detector', channelId: 2, gate: 1 }],
    controlRegister: {
      bits: [
        { bit: 0, output: 22, input: 6 },
        { bit: 1, output: 23, input: 7 },
      ],
    },
    ...overrides,
  });
}

/** One pulse [5, 20) in a 30-tick sequence. */
export function staticSequence(): Sequence {
  return createSequence({
    name: 'static',
    length: 30,
    hardware: benchHardware(),
    channels: [outputChannel('laser', [timeWindow('pulse', 5, 20)])],
  });
}

/**
 * Count during [10, 20), decide at 25: below 10 → pulseA (then stop at 55),
 * 10..99 → pulseB, otherwise terminate.
 */
export function branchSequence(hardware: HardwareConfig = benchHardware()): Sequence {
  return createSequence({
    name: 'branch',
    length: 100,
    hardware,
    channels: [
      outputChannel('laser', [
        timeWindow('pulseA', 40, 50),
        timeWindow('pulseB', 60, 70),
      ]),
      controlChannel('detector', [timeWindow('count', 10, 20)], [
        conditionalJump('check', at(25), 'count', [
          whenInRange(0, 10, destination(startRef('pulseA'))),
          whenInRange(10, 100, destination(startRef('pulseB'))),
          otherwise(TERMINATE),
        ]),
        endJump('stopA', at(55)),
      ]),
    ],
  });
}

/** Count during [5, 10); at 15 terminate on 5 or more, otherwise carry on to the pulse. */
export function gateSequence(): Sequence {
  return createSequence({
    name: 'gate',
    length: 40,
    hardware: benchHardware(),
    channels: [
      outputChannel('laser', [timeWindow('pulse', 20, 30)]),
      controlChannel('detector', [timeWindow('count', 5, 10)], [
        conditionalJump('gate', at(15), 'count', [
          whenAtLeast(5, TERMINATE),
          otherwise(PASS),
        ]),
      ]),
    ],
  });
}

/** Count during [10, 20); at 25 stop on 5 or more, otherwise count again. */
export function retrySequence(): Sequence {
  return createSequence({
    name: 'retry',
    length: 100,
    hardware: benchHardware(),
    channels: [
      controlChannel('detector', [timeWindow('count', 10, 20)], [
        conditionalJump('retry', at(25), 'count', [
          whenAtLeast(5, TERMINATE),
          otherwise(destination(startRef('count'))),
        ]),
      ]),
    ],
  });
}
