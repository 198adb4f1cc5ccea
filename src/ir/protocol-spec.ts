/**
 * Protocol timing specifications
 *
 * protocols.json はマイクロ秒単位のタイミングとビットレイアウトだけを持つ。
 * ティック単位への変換は TimingTable が行う。配列の順序がスタートビット照合の優先順位。
 */

import rawProtocols from './protocols.json';
import { ProtocolSpecError } from './errors';
import { isProtocolName, type ProtocolName } from './protocol-id';

/** Percentage, or an asymmetric [below, above] pair */
export type Tolerance = number | readonly [number, number];

export type Encoding = 'pulse-distance' | 'manchester' | 'serial' | 'rcmm' | 'bang-olufsen';

export type SpecFlag = 'startIsPayload' | 'firstPulseIsOne' | 'virtualStop';

export type BitOrder = 'lsb' | 'msb';

/** Field position inside the raw bit buffer: [offset, length] */
export type FieldLayout = readonly [number, number];

export type RepetitionPolicy =
  | { readonly kind: 'none' }
  | { readonly kind: 'auto'; readonly frames: number; readonly window?: number }
  | { readonly kind: 'alternate'; readonly window?: number }
  | { readonly kind: 'pair'; readonly window?: number }
  | { readonly kind: 'ditto'; readonly pause: number }
  | { readonly kind: 'headless'; readonly window: number };

interface SpecBase {
  readonly id: ProtocolName;
  readonly start: { readonly pulse: number; readonly pause: number } | null;
  readonly startTolerance: Tolerance;
  readonly tolerance: Tolerance;
  readonly length: readonly [number, number];
  readonly address: FieldLayout;
  readonly command: FieldLayout;
  readonly bitOrder: BitOrder;
  readonly stopBit: boolean;
  readonly flags: readonly SpecFlag[];
  readonly timeout: number | null;
  readonly minTickRate: number | null;
  readonly promotesTo: ProtocolName | null;
  readonly repetition: RepetitionPolicy;
}

export interface PulseDistanceSpec extends SpecBase {
  readonly encoding: 'pulse-distance';
  readonly bit: { readonly pulse1: number; readonly pause1: number; readonly pulse0: number; readonly pause0: number };
  readonly sync: { readonly at: number; readonly pulse: number; readonly pause: number } | null;
}

export interface ManchesterSpec extends SpecBase {
  readonly encoding: 'manchester';
  readonly unit: number;
  readonly maxUnits: number;
  readonly wideBit: number | null;
}

export interface SerialSpec extends SpecBase {
  readonly encoding: 'serial';
  readonly unit: number;
}

export interface RcmmSpec extends SpecBase {
  readonly encoding: 'rcmm';
  readonly pulse: number;
  readonly symbols: readonly [number, number, number, number];
}

export interface BangOlufsenSpec extends SpecBase {
  readonly encoding: 'bang-olufsen';
  readonly pulse: number;
  readonly symbols: {
    readonly repeat: number;
    readonly zero: number;
    readonly one: number;
    readonly trailer: number;
    readonly start3: number;
  };
}

export type ProtocolSpec = PulseDistanceSpec | ManchesterSpec | SerialSpec | RcmmSpec | BangOlufsenSpec;

// Raw bit buffers are sized for the longest frame
export const MAX_FRAME_BITS = 96;

const ENCODINGS: readonly Encoding[] = ['pulse-distance', 'manchester', 'serial', 'rcmm', 'bang-olufsen'];
const FLAGS: readonly SpecFlag[] = ['startIsPayload', 'firstPulseIsOne', 'virtualStop'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEncoding(value: unknown): value is Encoding {
  return ENCODINGS.some(encoding => encoding === value);
}

function isFlag(value: unknown): value is SpecFlag {
  return FLAGS.some(flag => flag === value);
}

/**
 * Field-by-field reader that reports the offending entry and key.
 */
class EntryReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly index: number
  ) {}

  fail(reason: string): never {
    throw new ProtocolSpecError(reason, this.index);
  }

  has(key: string): boolean {
    return this.raw[key] !== undefined;
  }

  positive(key: string, source: Record<string, unknown> = this.raw): number {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      return value;
    }
    return this.fail(`"${key}" must be a positive number`);
  }

  optionalPositive(key: string): number | null {
    return this.has(key) ? this.positive(key) : null;
  }

  record(key: string, source: Record<string, unknown> = this.raw): Record<string, unknown> {
    const value = source[key];
    if (isRecord(value)) {
      return value;
    }
    return this.fail(`"${key}" must be an object`);
  }

  boolean(key: string): boolean {
    const value = this.raw[key];
    if (typeof value === 'boolean') {
      return value;
    }
    return this.fail(`"${key}" must be a boolean`);
  }

  tolerance(key: string, fallback?: Tolerance): Tolerance {
    const value = this.raw[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value === 'number' && value >= 0 && value < 100) {
      return value;
    }
    if (Array.isArray(value) && value.length === 2) {
      const [below, above] = value;
      if (typeof below === 'number' && typeof above === 'number' && below >= 0 && below < 100 && above >= 0) {
        return [below, above];
      }
    }
    return this.fail(`"${key}" must be a percentage or a [below, above] pair`);
  }

  pair(key: string): readonly [number, number] {
    const value = this.raw[key];
    if (Array.isArray(value) && value.length === 2) {
      const [first, second] = value;
      if (typeof first === 'number' && typeof second === 'number' && Number.isInteger(first) && Number.isInteger(second)) {
        return [first, second];
      }
    }
    return this.fail(`"${key}" must be a pair of integers`);
  }

  protocolName(key: string): ProtocolName {
    const value = this.raw[key];
    if (typeof value === 'string' && isProtocolName(value)) {
      return value;
    }
    return this.fail(`"${key}" must name a protocol`);
  }
}

function readLength(reader: EntryReader, raw: Record<string, unknown>): readonly [number, number] {
  const value = raw.length;
  if (typeof value === 'number') {
    return [value, value];
  }
  return reader.pair('length');
}

function readRepetition(reader: EntryReader): RepetitionPolicy {
  if (!reader.has('repetition')) {
    return { kind: 'none' };
  }
  const raw = reader.record('repetition');
  const window = raw.window === undefined ? undefined : reader.positive('window', raw);
  switch (raw.kind) {
    case 'auto':
      return { kind: 'auto', frames: reader.positive('frames', raw), window };
    case 'alternate':
      return { kind: 'alternate', window };
    case 'pair':
      return { kind: 'pair', window };
    case 'ditto':
      return { kind: 'ditto', pause: reader.positive('pause', raw) };
    case 'headless':
      return { kind: 'headless', window: reader.positive('window', raw) };
    default:
      return reader.fail('unknown repetition kind');
  }
}

function readBase(reader: EntryReader, raw: Record<string, unknown>): SpecBase {
  const flagsValue: unknown = raw.flags ?? [];
  if (!Array.isArray(flagsValue) || !flagsValue.every(isFlag)) {
    return reader.fail('"flags" must list known flags');
  }
  const flags: readonly SpecFlag[] = flagsValue;

  let start: SpecBase['start'] = null;
  if (reader.has('start')) {
    const startRaw = reader.record('start');
    start = { pulse: reader.positive('pulse', startRaw), pause: reader.positive('pause', startRaw) };
  } else if (!flags.includes('startIsPayload')) {
    reader.fail('"start" is required unless the start bit is payload');
  }

  const tolerance = reader.tolerance('tolerance');
  const length = readLength(reader, raw);
  if (length[0] < 1 || length[0] > length[1] || length[1] > MAX_FRAME_BITS) {
    reader.fail(`"length" must lie in 1..${MAX_FRAME_BITS}`);
  }
  const address = reader.pair('address');
  const command = reader.pair('command');
  for (const [offset, width] of [address, command]) {
    if (offset < 0 || width < 0 || width > 32 || offset + width > length[1]) {
      reader.fail('field layout exceeds the frame');
    }
  }

  const bitOrder = raw.bitOrder;
  if (bitOrder !== 'lsb' && bitOrder !== 'msb') {
    return reader.fail('"bitOrder" must be "lsb" or "msb"');
  }

  return {
    id: reader.protocolName('id'),
    start,
    startTolerance: reader.tolerance('startTolerance', tolerance),
    tolerance,
    length,
    address,
    command,
    bitOrder,
    stopBit: reader.boolean('stopBit'),
    flags,
    timeout: reader.optionalPositive('timeout'),
    minTickRate: reader.optionalPositive('minTickRate'),
    promotesTo: reader.has('promotesTo') ? reader.protocolName('promotesTo') : null,
    repetition: readRepetition(reader)
  };
}

function readEntry(raw: unknown, index: number): ProtocolSpec {
  if (!isRecord(raw)) {
    throw new ProtocolSpecError('entry must be an object', index);
  }
  const reader = new EntryReader(raw, index);
  const encoding = raw.encoding;
  if (!isEncoding(encoding)) {
    return reader.fail('unknown encoding');
  }
  const base = readBase(reader, raw);

  switch (encoding) {
    case 'pulse-distance': {
      const bit = reader.record('bit');
      let sync: PulseDistanceSpec['sync'] = null;
      if (reader.has('sync')) {
        const syncRaw = reader.record('sync');
        sync = { at: reader.positive('at', syncRaw), pulse: reader.positive('pulse', syncRaw), pause: reader.positive('pause', syncRaw) };
      }
      return {
        ...base,
        encoding,
        bit: {
          pulse1: reader.positive('pulse1', bit),
          pause1: reader.positive('pause1', bit),
          pulse0: reader.positive('pulse0', bit),
          pause0: reader.positive('pause0', bit)
        },
        sync
      };
    }
    case 'manchester':
      return {
        ...base,
        encoding,
        unit: reader.positive('unit'),
        maxUnits: reader.has('maxUnits') ? reader.positive('maxUnits') : 2,
        wideBit: reader.has('wideBit') ? reader.positive('wideBit') : null
      };
    case 'serial':
      return { ...base, encoding, unit: reader.positive('unit') };
    case 'rcmm': {
      const symbols = raw.symbols;
      if (!Array.isArray(symbols) || symbols.length !== 4 || !symbols.every(s => typeof s === 'number' && s > 0)) {
        return reader.fail('"symbols" must hold four pause lengths');
      }
      const [s0, s1, s2, s3] = symbols.filter((s): s is number => typeof s === 'number');
      return { ...base, encoding, pulse: reader.positive('pulse'), symbols: [s0, s1, s2, s3] };
    }
    case 'bang-olufsen': {
      const symbols = reader.record('symbols');
      return {
        ...base,
        encoding,
        pulse: reader.positive('pulse'),
        symbols: {
          repeat: reader.positive('repeat', symbols),
          zero: reader.positive('zero', symbols),
          one: reader.positive('one', symbols),
          trailer: reader.positive('trailer', symbols),
          start3: reader.positive('start3', symbols)
        }
      };
    }
  }
}

/**
 * Validate a protocol table. Order is preserved: it is the start-bit priority.
 */
export function parseProtocolSpecs(data: unknown): readonly ProtocolSpec[] {
  if (!Array.isArray(data)) {
    throw new ProtocolSpecError('table must be an array');
  }
  const specs = data.map((entry: unknown, index: number) => readEntry(entry, index));

  const seen = new Set<ProtocolName>();
  specs.forEach((spec, index) => {
    if (seen.has(spec.id)) {
      throw new ProtocolSpecError(`duplicate protocol ${spec.id}`, index);
    }
    seen.add(spec.id);
  });
  specs.forEach((spec, index) => {
    if (spec.promotesTo !== null && !seen.has(spec.promotesTo)) {
      throw new ProtocolSpecError(`promotion target ${spec.promotesTo} has no timing entry`, index);
    }
  });
  return Object.freeze(specs);
}

export const PROTOCOL_SPECS: readonly ProtocolSpec[] = parseProtocolSpecs(rawProtocols);
