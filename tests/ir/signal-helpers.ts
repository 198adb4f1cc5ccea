/**
 * Shared helpers for decoder tests
 */

import type { DecodedFrame, IrDecoder } from '../../src/ir/decoder';
import { toBits } from '../../src/ir/encoder';

export interface FedFrame {
  index: number;
  frame: DecodedFrame;
}

/** Feed every sample, collecting frames with the sample index they completed on */
export function feedAll(decoder: IrDecoder, samples: ArrayLike<number>): FedFrame[] {
  const frames: FedFrame[] = [];
  for (let index = 0; index < samples.length; index++) {
    if (decoder.addSample(samples[index])) {
      const frame = decoder.getData();
      if (frame) {
        frames.push({ index, frame });
      }
    }
  }
  return frames;
}

/** Address, command, inverted command: the standard NEC layout */
export function necBits(address: number, command: number): number[] {
  return [...toBits(address, 16, true), ...toBits(command, 8, true), ...toBits(command ^ 0xff, 8, true)];
}

export function summary(frame: DecodedFrame): [string, number, number, number] {
  return [frame.protocolName, frame.address, frame.command, frame.flags];
}
