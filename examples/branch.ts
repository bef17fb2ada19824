// Count photons for 10 µs, then play pulse A for a dim result, pulse B for a
// bright one, and stop early when the count saturates.
//
//   npx tsx ipuc.ts compile examples/branch.ts --disasm

import { controlChannel, outputChannel } from '../src/core/sequence/channels';
import { createHardware } from '../src/core/sequence/hardware';
import { conditionalJump, destination, endJump, otherwise, TERMINATE, whenInRange } from '../src/core/sequence/jumps';
import { createSequence } from '../src/core/sequence/sequence';
import { at, startRef, timeWindow } from '../src/core/sequence/timing';

const hardware = createHardware({
  name: 'bench',
  outputs: [{ name: 'laser', channelId: 0, polarity: true, idleState: false }],
  spcs: [{ name: 'detector', channelId: 2, gate: 1 }],
  controlRegister: {
    bits: [
      { bit: 0, output: 22, input: 6 },
      { bit: 1, output: 23, input: 7 },
    ],
  },
});

export default createSequence({
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
