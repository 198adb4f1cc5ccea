/**
 * Frame encoder
 *
 * Renders raw frame bits into a canonical sample stream (1 = carrier present)
 * at a given tick rate. Used to drive the decoder from tests and tools.
 */

import { ConfigurationError } from './errors';
import type { ProtocolName } from './protocol-id';
import {
  PROTOCOL_SPECS,
  type BangOlufsenSpec,
  type ManchesterSpec,
  type ProtocolSpec,
  type PulseDistanceSpec,
  type RcmmSpec,
  type SerialSpec
} from './protocol-spec';

/** One interval: carrier level and duration in microseconds */
export type Segment = readonly [level: boolean, us: number];

const mark = (us: number): Segment => [true, us];
const space = (us: number): Segment => [false, us];

/** Split `value` into `length` bits in transmission order */
export function toBits(value: number, length: number, lsbFirst: boolean): number[] {
  const bits: number[] = [];
  for (let i = 0; i < length; i++) {
    const weight = lsbFirst ? i : length - 1 - i;
    bits.push(Math.floor(value / 2 ** weight) % 2);
  }
  return bits;
}

export function concatSamples(...parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function pulseDistanceSegments(spec: PulseDistanceSpec, bits: readonly number[]): Segment[] {
  const segments: Segment[] = [];
  if (spec.start && !spec.flags.includes('startIsPayload')) {
    segments.push(mark(spec.start.pulse), space(spec.start.pause));
  }
  const { bit, sync } = spec;
  bits.forEach((value, index) => {
    if (sync && index === sync.at) {
      segments.push(mark(sync.pulse), space(sync.pause));
    }
    segments.push(
      mark(value ? bit.pulse1 : bit.pulse0),
      space(value ? bit.pause1 : bit.pause0)
    );
  });
  if (spec.stopBit) {
    segments.push(mark(bit.pulse0));
  }
  return segments;
}

function manchesterSegments(spec: ManchesterSpec, bits: readonly number[]): Segment[] {
  const segments: Segment[] = [];
  if (spec.start) {
    segments.push(mark(spec.start.pulse), space(spec.start.pause));
  }
  // firstPulseIsOne: 1 = light then dark; otherwise 1 = dark then light
  const markFirstForOne = spec.flags.includes('firstPulseIsOne');
  bits.forEach((value, index) => {
    const width = (spec.wideBit === index ? 2 : 1) * spec.unit;
    const markFirst = (value === 1) === markFirstForOne;
    segments.push(...(markFirst ? [mark(width), space(width)] : [space(width), mark(width)]));
  });
  return segments;
}

function serialSegments(spec: SerialSpec, bits: readonly number[]): Segment[] {
  const segments: Segment[] = spec.start ? [mark(spec.start.pulse), space(spec.start.pause)] : [];
  for (const value of bits) {
    segments.push(value ? mark(spec.unit) : space(spec.unit));
  }
  return segments;
}

function rcmmSegments(spec: RcmmSpec, bits: readonly number[]): Segment[] {
  if (bits.length % 2 !== 0) {
    throw new ConfigurationError('RCMM frames carry an even number of bits', spec.id);
  }
  const segments: Segment[] = spec.start ? [mark(spec.start.pulse), space(spec.start.pause)] : [];
  for (let i = 0; i < bits.length; i += 2) {
    segments.push(mark(spec.pulse), space(spec.symbols[bits[i] * 2 + bits[i + 1]]));
  }
  segments.push(mark(spec.pulse));
  return segments;
}

function bangOlufsenSegments(spec: BangOlufsenSpec, bits: readonly number[]): Segment[] {
  const { pulse, symbols } = spec;
  const segments: Segment[] = spec.start ? [mark(spec.start.pulse), space(spec.start.pause)] : [];
  for (const pause of [symbols.zero, symbols.start3, symbols.zero]) {
    segments.push(mark(pulse), space(pause));
  }
  bits.forEach((value, index) => {
    // R stands for "same as the previous bit"
    const pause = index > 0 && bits[index - 1] === value ? symbols.repeat : value ? symbols.one : symbols.zero;
    segments.push(mark(pulse), space(pause));
  });
  segments.push(mark(pulse), space(symbols.trailer), mark(pulse));
  return segments;
}

export class FrameEncoder {
  private readonly specs: ReadonlyMap<ProtocolName, ProtocolSpec>;

  constructor(
    readonly tickRate: number = 15000,
    specs: readonly ProtocolSpec[] = PROTOCOL_SPECS
  ) {
    this.specs = new Map(specs.map(spec => [spec.id, spec]));
  }

  /** Sample stream for one frame, starting at its first light interval */
  encode(protocol: ProtocolName, bits: readonly number[]): Uint8Array {
    return this.render(this.segments(protocol, bits));
  }

  segments(protocol: ProtocolName, bits: readonly number[]): Segment[] {
    const spec = this.spec(protocol);
    switch (spec.encoding) {
      case 'pulse-distance':
        return pulseDistanceSegments(spec, bits);
      case 'manchester':
        return manchesterSegments(spec, bits);
      case 'serial':
        return serialSegments(spec, bits);
      case 'rcmm':
        return rcmmSegments(spec, bits);
      case 'bang-olufsen':
        return bangOlufsenSegments(spec, bits);
    }
  }

  /** NEC repetition burst: start pulse, short pause, stop pulse */
  ditto(): Uint8Array {
    const spec = this.spec('NEC');
    if (spec.encoding !== 'pulse-distance' || spec.start === null || spec.repetition.kind !== 'ditto') {
      throw new ConfigurationError('no repetition burst', 'NEC');
    }
    return this.render([mark(spec.start.pulse), space(spec.repetition.pause), mark(spec.bit.pulse0)]);
  }

  /** JVC repeat frame: the data bits and stop pulse without a start bit */
  headless(bits: readonly number[]): Uint8Array {
    const spec = this.spec('JVC');
    if (spec.encoding !== 'pulse-distance') {
      throw new ConfigurationError('not pulse-distance coded', 'JVC');
    }
    return this.render(pulseDistanceSegments({ ...spec, start: null }, bits));
  }

  silence(us: number): Uint8Array {
    return new Uint8Array(this.ticks(us));
  }

  /**
   * Adjacent intervals of the same level are merged first; each merged
   * interval is then rounded to whole ticks.
   */
  render(segments: readonly Segment[]): Uint8Array {
    const merged: [boolean, number][] = [];
    for (const [level, us] of segments) {
      const last = merged[merged.length - 1];
      if (last && last[0] === level) {
        last[1] += us;
      } else {
        merged.push([level, us]);
      }
    }
    return concatSamples(
      ...merged.map(([level, us]) => new Uint8Array(this.ticks(us)).fill(level ? 1 : 0))
    );
  }

  private ticks(us: number): number {
    return Math.round((us * this.tickRate) / 1e6);
  }

  private spec(protocol: ProtocolName): ProtocolSpec {
    const spec = this.specs.get(protocol);
    if (!spec) {
      throw new ConfigurationError('no timing data', protocol);
    }
    return spec;
  }
}
