/**
 * Field extraction and per-protocol integrity checks
 */

import { ProtocolId } from './protocol-id';
import type { ProtocolDescriptor } from './timing-table';

export interface ExtractedFields {
  protocol: ProtocolId;
  address: number;
  command: number;
  flags: number;
}

export interface RawFrame {
  readonly descriptor: ProtocolDescriptor;
  readonly bits: Uint8Array;
  readonly length: number;
}

/** Read `length` bits starting at `offset`; LSB-first puts the first bit at weight 1 */
export function readField(bits: Uint8Array, offset: number, length: number, lsbFirst: boolean): number {
  let value = 0;
  for (let i = 0; i < length; i++) {
    const bit = bits[offset + i] ?? 0;
    value = lsbFirst ? value + bit * 2 ** i : value * 2 + bit;
  }
  return value;
}

function complementOf(value: number, width: number): number {
  const mask = 2 ** width - 1;
  return mask - (value & mask);
}

interface FinisherContext {
  readonly frame: RawFrame;
  readonly fields: ExtractedFields;
  readonly enabled: ReadonlySet<ProtocolId>;
  /** Bit-order-aware read over the raw buffer */
  read(offset: number, length: number): number;
}

type Finisher = (context: FinisherContext) => ExtractedFields | null;

const APPLE_ADDRESS = 0x87ee;

// 0 -> 15, 2 -> 13, ... : absolute bit index -> command bit
const ACP24_COMMAND_BITS: ReadonlyMap<number, number> = new Map([
  [0, 15], [2, 13], [3, 12], [4, 10], [5, 9], [6, 8],
  [20, 6], [22, 11], [23, 7], [24, 14], [26, 5],
  [44, 4], [66, 3], [67, 2], [68, 1], [69, 0]
]);

function necFinisher({ fields, enabled, read }: FinisherContext): ExtractedFields | null {
  const address = read(0, 16);
  const raw = read(16, 16);
  const low = raw & 0xff;
  const high = raw >>> 8;
  if (address === APPLE_ADDRESS && enabled.has(ProtocolId.APPLE)) {
    return { ...fields, protocol: ProtocolId.APPLE, address: high, command: low };
  }
  if (high === complementOf(low, 8)) {
    return { ...fields, address, command: low };
  }
  if (enabled.has(ProtocolId.ONKYO)) {
    return { ...fields, protocol: ProtocolId.ONKYO, address, command: raw };
  }
  return null;
}

function complementedByteFinisher(offset: number): Finisher {
  return ({ fields, read }) => {
    const low = read(offset, 8);
    const high = read(offset + 8, 8);
    return high === complementOf(low, 8) ? { ...fields, command: low } : null;
  };
}

const FINISHERS: Partial<Record<ProtocolId, Finisher>> = {
  [ProtocolId.NEC]: necFinisher,

  [ProtocolId.NEC42]: ({ fields, read }) => {
    const address = read(0, 13);
    const command = read(26, 8);
    if (read(13, 13) !== complementOf(address, 13) || read(34, 8) !== complementOf(command, 8)) {
      return null;
    }
    return { ...fields, address, command };
  },

  [ProtocolId.SAMSUNG32]: complementedByteFinisher(16),

  [ProtocolId.SAMSUNG]: ({ fields, read }) => {
    const id = read(16, 4);
    const low = read(20, 8);
    const high = read(28, 8);
    return high === complementOf(low, 8) ? { ...fields, command: low | (id << 8) } : null;
  },

  [ProtocolId.SAMSUNG48]: ({ fields, read }) => {
    const [b2, b3, b4, b5] = [read(16, 8), read(24, 8), read(32, 8), read(40, 8)];
    if (b3 !== complementOf(b2, 8) || b5 !== complementOf(b4, 8)) {
      return null;
    }
    return { ...fields, command: b2 | (b4 << 8) };
  },

  [ProtocolId.BOSE]: complementedByteFinisher(0),

  [ProtocolId.VINCENT]: ({ fields, read }) => {
    const command = read(16, 16);
    return command >>> 8 === (command & 0xff) ? { ...fields, command: command & 0xff } : null;
  },

  [ProtocolId.TECHNICS]: ({ fields, read }) => {
    const command = read(0, 11);
    return read(11, 11) === complementOf(command, 11) ? { ...fields, command } : null;
  },

  [ProtocolId.KASEIKYO]: ({ fields, read }) => {
    const bytes = [0, 1, 2, 3, 4, 5].map(index => read(index * 8, 8));
    const vendorParity = (bytes[0] ^ (bytes[0] >> 4) ^ bytes[1] ^ (bytes[1] >> 4)) & 0x0f;
    if (vendorParity !== (bytes[2] & 0x0f) || bytes[5] !== (bytes[2] ^ bytes[3] ^ bytes[4])) {
      return null;
    }
    const genre1 = read(20, 4);
    const genre2 = read(24, 4);
    return {
      ...fields,
      command: read(28, 12) | (genre1 << 12),
      flags: fields.flags | (genre2 << 4)
    };
  },

  [ProtocolId.LEGO]: ({ fields, read }) => {
    const raw = read(0, 16);
    const nibble = (shift: number) => (raw >> shift) & 0x0f;
    const lrc = 0x0f ^ nibble(12) ^ nibble(8) ^ nibble(4);
    return lrc === nibble(0) ? { ...fields, command: raw >> 4 } : null;
  },

  [ProtocolId.LGAIR]: ({ fields, read }) => {
    const command = read(8, 16);
    const sum = ((command >> 12) + ((command >> 8) & 0x0f) + ((command >> 4) & 0x0f) + (command & 0x0f)) & 0x0f;
    return read(24, 4) === sum ? fields : null;
  },

  [ProtocolId.ORTEK]: ({ fields, frame }) => {
    let ones = 0;
    for (let i = 0; i < 14; i++) {
      ones += frame.bits[i];
    }
    // bit 14 set: even number of ones in bits 0..13; clear: odd
    const even = ones % 2 === 0;
    return (frame.bits[14] === 1) === even ? fields : null;
  },

  [ProtocolId.SIEMENS]: ({ fields, frame }) => {
    const last = frame.length - 1;
    return frame.bits[last] !== frame.bits[last - 1] ? fields : null;
  },

  [ProtocolId.RC5]: ({ fields, frame }) => {
    // the second start bit carries the inverted command bit 6
    return frame.bits[1] === 0 ? { ...fields, command: fields.command | 0x40 } : fields;
  },

  [ProtocolId.RC6]: ({ fields, frame, read }) => {
    return frame.bits[0] === 1 && read(1, 3) === 0 ? fields : null;
  },

  [ProtocolId.RC6A]: ({ fields, frame, read }) => {
    return frame.bits[0] === 1 && read(1, 3) === 6 ? fields : null;
  },

  [ProtocolId.ACP24]: ({ fields, frame }) => {
    let command = 0;
    for (const [index, bit] of ACP24_COMMAND_BITS) {
      if (frame.bits[index] === 1) {
        command |= 1 << bit;
      }
    }
    return { ...fields, address: 0, command };
  },

  [ProtocolId.MITSU_HEAVY]: ({ fields, read }) => {
    const bytes: number[] = [];
    for (let pair = 0; pair < 4; pair++) {
      const value = read(24 + pair * 16, 8);
      if (read(32 + pair * 16, 8) !== complementOf(value, 8)) {
        return null;
      }
      bytes.push(value);
    }
    return { ...fields, address: bytes[0] | (bytes[1] << 8), command: bytes[2] | (bytes[3] << 8) };
  },

  [ProtocolId.GRUNDIG]: startBitFinisher,
  [ProtocolId.NOKIA]: startBitFinisher,
  [ProtocolId.IR60]: startBitFinisher
};

function startBitFinisher({ fields, frame }: FinisherContext): ExtractedFields | null {
  return frame.bits[0] === 1 ? fields : null;
}

// Checks that must hold before a frame may end at its nominal length
const EARLY_CHECKS: Partial<Record<ProtocolId, (bits: Uint8Array) => boolean>> = {
  [ProtocolId.SAMSUNG32]: bits => readField(bits, 24, 8, true) === complementOf(readField(bits, 16, 8, true), 8)
};

/**
 * False when the frame may not end at its nominal length; the track then
 * continues as its longer sibling.
 */
export function passesEarlyCheck(protocol: ProtocolId, bits: Uint8Array): boolean {
  const check = EARLY_CHECKS[protocol];
  return check === undefined || check(bits);
}

/**
 * Slice address and command out of a completed frame and apply the
 * protocol's integrity check. Returns null when the check fails.
 */
export function extractFrame(frame: RawFrame, enabled: ReadonlySet<ProtocolId>): ExtractedFields | null {
  const { descriptor, bits, length } = frame;
  const read = (offset: number, width: number) =>
    readField(bits, offset, Math.max(0, Math.min(width, length - offset)), descriptor.lsbFirst);

  const fields: ExtractedFields = {
    protocol: descriptor.protocol,
    address: read(descriptor.address[0], descriptor.address[1]),
    command: read(descriptor.command[0], descriptor.command[1]),
    flags: 0
  };

  const finisher = FINISHERS[descriptor.protocol];
  return finisher ? finisher({ frame, fields, enabled, read }) : fields;
}
