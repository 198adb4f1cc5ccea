/**
 * Logic capture replay
 *
 * ロジックアナライザのキャプチャ (1 チャネル) をデコーダのティックレートに間引いて流し込み、
 * 見つかったフレームをキャプチャ上のサンプル位置に戻して返す。
 */

import type { DecodedFrame, IrDecoder } from '../ir/decoder';
import { ConfigurationError } from '../ir/errors';
import { REPETITION_FLAG } from '../ir/repetition';

/** active-low: the receiver pulls the line low while the carrier is present */
export type Polarity = 'active-low' | 'active-high';

export interface ReplayOptions {
  /** Capture samples per second; an integer multiple of the decoder tick rate */
  sampleRate: number;
  polarity?: Polarity;
  decoder: IrDecoder;
  /** Feed idle ticks after the capture so that a trailing frame can finish */
  flush?: boolean;
}

export interface ReplayedFrame extends DecodedFrame {
  readonly startSample: number;
  readonly endSample: number;
}

export function decimationFactor(sampleRate: number, tickRate: number): number {
  if (!Number.isInteger(sampleRate) || sampleRate <= 0 || sampleRate % tickRate !== 0) {
    throw new ConfigurationError(`capture sample rate ${sampleRate} must be a multiple of ${tickRate}`);
  }
  return sampleRate / tickRate;
}

export function replayCapture(samples: ArrayLike<number | boolean>, options: ReplayOptions): ReplayedFrame[] {
  const { decoder, polarity = 'active-low', flush = true } = options;
  const factor = decimationFactor(options.sampleRate, decoder.getTickRate());
  const activeLevel = polarity === 'active-low' ? 0 : 1;
  const baseTick = decoder.ticks;
  const frames: ReplayedFrame[] = [];

  const collect = (lit: boolean): void => {
    if (!decoder.addSample(lit)) {
      return;
    }
    const frame = decoder.getData();
    if (frame) {
      frames.push({
        ...frame,
        startSample: (frame.startTick - baseTick) * factor,
        endSample: (frame.endTick - baseTick) * factor
      });
    }
  };

  for (let index = 0; index < samples.length; index += factor) {
    collect(Number(samples[index]) === activeLevel);
  }

  if (flush) {
    const table = decoder.getTimingTable();
    const idleTicks = Math.max(table.defaultTimeout, ...table.descriptors.map(descriptor => descriptor.timeout)) + 1;
    for (let i = 0; i < idleTicks; i++) {
      collect(false);
    }
  }

  return frames;
}

function hex(value: number, width = 0): string {
  return value.toString(16).padStart(width, '0');
}

/**
 * Annotation texts for a frame, longest first.
 *
 * @example
 * formatAnnotation(frame)[0] // 'Protocol: 2 (NEC), Address 0x00ff, Command: 0x001a'
 */
export function formatAnnotation(frame: DecodedFrame): string[] {
  const { protocol: nr, protocolName: name, address, command } = frame;
  const repeat = (frame.flags & REPETITION_FLAG) !== 0;
  const [long, medium, short] = repeat ? ['repeat', 'rep', 'r'] : ['', '', ''];
  return [
    `Protocol: ${nr} (${name}), Address 0x${hex(address, 4)}, Command: 0x${hex(command, 4)} ${long}`,
    `P: ${name} (${nr}), Addr: 0x${hex(address)}, Cmd: 0x${hex(command)} ${medium}`,
    `P: ${nr} A: 0x${hex(address)} C: 0x${hex(command)} ${medium}`,
    `C:${hex(command)} A:${hex(address)} ${short}`,
    `C:${hex(command)}`
  ].map(text => text.trimEnd());
}
