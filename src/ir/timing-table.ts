import { ConfigurationError } from './errors';
import {
  DEFAULT_DISABLED_PROTOCOLS,
  ProtocolId,
  getProtocolName
} from './protocol-id';
import {
  PROTOCOL_SPECS,
  type FieldLayout,
  type ProtocolSpec,
  type RepetitionPolicy,
  type Tolerance
} from './protocol-spec';

export const MIN_TICK_RATE = 10000;
export const MAX_TICK_RATE = 20000;
export const DEFAULT_TIMEOUT_US = 15500;

/** Inclusive tick-count window */
export interface TickWindow {
  readonly min: number;
  readonly max: number;
}

export type DescriptorVariant = 'frame' | 'ditto' | 'headless';

interface DescriptorBase {
  readonly protocol: ProtocolId;
  readonly name: string;
  readonly variant: DescriptorVariant;
  /** Position in the protocol table; the lowest wins when several candidates complete a frame */
  readonly priority: number;
  readonly startPulse: readonly TickWindow[];
  readonly startPause: readonly TickWindow[];
  readonly minLength: number;
  readonly maxLength: number;
  readonly address: FieldLayout;
  readonly command: FieldLayout;
  readonly lsbFirst: boolean;
  readonly stopBit: boolean;
  readonly startIsPayload: boolean;
  readonly firstPulseIsOne: boolean;
  readonly virtualStop: boolean;
  /** Darkness ceiling in ticks */
  readonly timeout: number;
  readonly promotion: ProtocolId | null;
  readonly repetition: RepetitionPolicy;
}

export interface PulseDistanceDescriptor extends DescriptorBase {
  readonly encoding: 'pulse-distance';
  readonly pulse1: TickWindow;
  readonly pause1: TickWindow;
  readonly pulse0: TickWindow;
  readonly pause0: TickWindow;
  readonly sync: { readonly at: number; readonly pulse: TickWindow; readonly pause: TickWindow } | null;
}

export interface ManchesterDescriptor extends DescriptorBase {
  readonly encoding: 'manchester';
  readonly unit: TickWindow;
  readonly maxUnits: number;
  readonly wideBit: number | null;
}

export interface SerialDescriptor extends DescriptorBase {
  readonly encoding: 'serial';
  readonly unit: TickWindow;
  readonly unitTicks: number;
}

export interface RcmmDescriptor extends DescriptorBase {
  readonly encoding: 'rcmm';
  readonly pulse: TickWindow;
  readonly symbols: readonly TickWindow[];
}

export interface BangOlufsenDescriptor extends DescriptorBase {
  readonly encoding: 'bang-olufsen';
  readonly pulse: TickWindow;
  readonly repeat: TickWindow;
  readonly zero: TickWindow;
  readonly one: TickWindow;
  readonly trailer: TickWindow;
  readonly start3: TickWindow;
}

export type ProtocolDescriptor =
  | PulseDistanceDescriptor
  | ManchesterDescriptor
  | SerialDescriptor
  | RcmmDescriptor
  | BangOlufsenDescriptor;

export interface TimingTableOptions {
  tickRate: number;
  /** Explicit protocol selection; omitted means the default set */
  protocols?: readonly ProtocolId[];
  specs?: readonly ProtocolSpec[];
}

// Output labels carried by NEC frames; they have no timing of their own
const DERIVED_PROTOCOLS: ReadonlyMap<ProtocolId, ProtocolId> = new Map([
  [ProtocolId.APPLE, ProtocolId.NEC],
  [ProtocolId.ONKYO, ProtocolId.NEC]
]);

function toleranceBounds(tolerance: Tolerance): readonly [number, number] {
  return typeof tolerance === 'number' ? [tolerance, tolerance] : tolerance;
}

/**
 * Convert a nominal duration to an inclusive tick window.
 *
 * min = max(1, floor(rate * us * (1 - lo%) + 0.5) - 1)
 * max = floor(rate * us * (1 + hi%) + 0.5) + 1
 */
export function toTickWindow(us: number, tolerance: Tolerance, tickRate: number): TickWindow {
  const [below, above] = toleranceBounds(tolerance);
  const nominal = (tickRate * us) / 1e6;
  return Object.freeze({
    min: Math.max(1, Math.floor(nominal * (1 - below / 100) + 0.5) - 1),
    max: Math.floor(nominal * (1 + above / 100) + 0.5) + 1
  });
}

/** Manchester k-unit window: the 1-unit bounds times k */
export function scaleWindow(window: TickWindow, units: number): TickWindow {
  return { min: window.min * units, max: window.max * units };
}

export function toTicks(us: number, tickRate: number): number {
  return Math.floor((tickRate * us) / 1e6 + 0.5);
}

function shortestTiming(spec: ProtocolSpec): number {
  const timings: number[] = spec.start ? [spec.start.pulse, spec.start.pause] : [];
  switch (spec.encoding) {
    case 'pulse-distance':
      timings.push(spec.bit.pulse1, spec.bit.pause1, spec.bit.pulse0, spec.bit.pause0);
      break;
    case 'manchester':
    case 'serial':
      timings.push(spec.unit);
      break;
    case 'rcmm':
      timings.push(spec.pulse, ...spec.symbols);
      break;
    case 'bang-olufsen':
      timings.push(spec.pulse, spec.symbols.zero);
      break;
  }
  return Math.min(...timings);
}

function buildDescriptor(spec: ProtocolSpec, priority: number, tickRate: number, promotion: ProtocolId | null): ProtocolDescriptor {
  const protocol = ProtocolId[spec.id];
  const toWindow = (us: number, tolerance: Tolerance = spec.tolerance) => toTickWindow(us, tolerance, tickRate);
  const startPulse = spec.start ? [toWindow(spec.start.pulse, spec.startTolerance)] : [];
  const startPause = spec.start ? [toWindow(spec.start.pause, spec.startTolerance)] : [];

  const base = {
    protocol,
    name: getProtocolName(protocol),
    variant: 'frame' as const,
    priority,
    startPulse,
    startPause,
    minLength: spec.length[0],
    maxLength: spec.length[1],
    address: spec.address,
    command: spec.command,
    lsbFirst: spec.bitOrder === 'lsb',
    stopBit: spec.stopBit,
    startIsPayload: spec.flags.includes('startIsPayload'),
    firstPulseIsOne: spec.flags.includes('firstPulseIsOne'),
    virtualStop: spec.flags.includes('virtualStop'),
    timeout: toTicks(spec.timeout ?? DEFAULT_TIMEOUT_US, tickRate),
    promotion,
    repetition: spec.repetition
  };

  switch (spec.encoding) {
    case 'pulse-distance': {
      const pulse1 = toWindow(spec.bit.pulse1);
      const pause1 = toWindow(spec.bit.pause1);
      const pulse0 = toWindow(spec.bit.pulse0);
      const pause0 = toWindow(spec.bit.pause0);
      return {
        ...base,
        encoding: 'pulse-distance',
        // スタートビットがデータを兼ねる場合は、ビット窓をそのまま開始窓にする
        startPulse: base.startIsPayload ? [pulse1, pulse0] : startPulse,
        startPause: base.startIsPayload ? [pause1, pause0] : startPause,
        pulse1,
        pause1,
        pulse0,
        pause0,
        sync: spec.sync
          ? {
            at: spec.sync.at,
            pulse: toWindow(spec.sync.pulse),
            pause: toWindow(spec.sync.pause, spec.startTolerance)
          }
          : null
      };
    }
    case 'manchester': {
      const unit = toWindow(spec.unit);
      const halves = [unit, scaleWindow(unit, 2)];
      return {
        ...base,
        encoding: 'manchester',
        startPulse: base.startIsPayload ? halves : startPulse,
        startPause: base.startIsPayload ? halves : startPause,
        unit,
        maxUnits: spec.maxUnits,
        wideBit: spec.wideBit
      };
    }
    case 'serial':
      return {
        ...base,
        encoding: 'serial',
        unit: toWindow(spec.unit),
        unitTicks: toTicks(spec.unit, tickRate)
      };
    case 'rcmm':
      return {
        ...base,
        encoding: 'rcmm',
        pulse: toWindow(spec.pulse),
        symbols: spec.symbols.map(us => toWindow(us))
      };
    case 'bang-olufsen':
      return {
        ...base,
        encoding: 'bang-olufsen',
        pulse: toWindow(spec.pulse),
        repeat: toWindow(spec.symbols.repeat),
        zero: toWindow(spec.symbols.zero),
        one: toWindow(spec.symbols.one),
        trailer: toWindow(spec.symbols.trailer),
        start3: toWindow(spec.symbols.start3)
      };
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Tick windows for every enabled protocol at one tick rate.
 *
 * 構築後は凍結され、複数のデコーダで共有できる。ティックレートを変えるときは作り直す。
 */
export class TimingTable {
  readonly tickRate: number;
  /** Enabled descriptors in start-bit priority order */
  readonly descriptors: readonly ProtocolDescriptor[];
  /** Descriptors tried at a start bit; promotion-only siblings are left out */
  readonly startCandidates: readonly ProtocolDescriptor[];
  /** NEC repetition burst (start pulse, short pause, stop pulse) */
  readonly ditto: PulseDistanceDescriptor | null;
  /** JVC repeat frame: data bits without a start bit */
  readonly headless: PulseDistanceDescriptor | null;
  readonly enabled: ReadonlySet<ProtocolId>;
  /** Default protocols that could not run at this tick rate */
  readonly dropped: readonly ProtocolId[];
  readonly defaultTimeout: number;

  private readonly byProtocol: ReadonlyMap<ProtocolId, ProtocolDescriptor>;

  constructor(options: TimingTableOptions) {
    const { tickRate } = options;
    if (!Number.isInteger(tickRate) || tickRate < MIN_TICK_RATE || tickRate > MAX_TICK_RATE) {
      throw new ConfigurationError(`tick rate ${tickRate} outside ${MIN_TICK_RATE}..${MAX_TICK_RATE}`);
    }
    this.tickRate = tickRate;
    this.defaultTimeout = toTicks(DEFAULT_TIMEOUT_US, tickRate);

    const specs = options.specs ?? PROTOCOL_SPECS;
    const explicit = options.protocols !== undefined;
    const requested = new Set<ProtocolId>(
      options.protocols ?? specs.map(spec => ProtocolId[spec.id]).filter(id => !DEFAULT_DISABLED_PROTOCOLS.includes(id))
    );
    if (!explicit) {
      for (const [derived] of DERIVED_PROTOCOLS) {
        if (!DEFAULT_DISABLED_PROTOCOLS.includes(derived)) {
          requested.add(derived);
        }
      }
    }

    const dropped: ProtocolId[] = [];
    const usable = specs.filter(spec => {
      const protocol = ProtocolId[spec.id];
      if (!requested.has(protocol)) {
        return false;
      }
      const reason = this.unsupportedReason(spec);
      if (reason === null) {
        return true;
      }
      if (explicit) {
        throw new ConfigurationError(reason, spec.id);
      }
      dropped.push(protocol);
      return false;
    });

    const usableIds = new Set(usable.map(spec => ProtocolId[spec.id]));
    for (const protocol of requested) {
      const carrier = DERIVED_PROTOCOLS.get(protocol);
      if (carrier !== undefined) {
        if (explicit && !requested.has(carrier)) {
          throw new ConfigurationError(`requires ${getProtocolName(carrier)}`, getProtocolName(protocol));
        }
        continue;
      }
      if (explicit && !usableIds.has(protocol)) {
        throw new ConfigurationError('no timing data', getProtocolName(protocol));
      }
    }

    const specById = new Map(usable.map(spec => [ProtocolId[spec.id], spec]));
    const nextEnabled = (spec: ProtocolSpec): ProtocolId | null => {
      let target = spec.promotesTo;
      while (target !== null) {
        const id = ProtocolId[target];
        if (usableIds.has(id)) {
          return id;
        }
        target = specs.find(candidate => candidate.id === target)?.promotesTo ?? null;
      }
      return null;
    };

    const descriptors = usable.map(spec => buildDescriptor(spec, specs.indexOf(spec), tickRate, nextEnabled(spec)));
    for (const descriptor of descriptors) {
      const target = descriptor.promotion === null ? undefined : descriptors.find(d => d.protocol === descriptor.promotion);
      if (target && target.encoding !== descriptor.encoding) {
        throw new ConfigurationError(`promotion to ${target.name} changes encoding`, descriptor.name);
      }
    }
    const promotionTargets = new Set(descriptors.map(d => d.promotion));

    this.descriptors = descriptors;
    this.startCandidates = descriptors.filter(d => !promotionTargets.has(d.protocol));
    this.byProtocol = new Map(descriptors.map(d => [d.protocol, d]));
    this.enabled = new Set([...usableIds, ...[...requested].filter(id => DERIVED_PROTOCOLS.has(id) && usableIds.has(ProtocolId.NEC))]);
    this.dropped = dropped;

    const nec = specById.get(ProtocolId.NEC);
    this.ditto = nec ? this.buildDitto(nec, specs.indexOf(nec)) : null;
    const jvc = this.byProtocol.get(ProtocolId.JVC);
    this.headless = jvc && jvc.encoding === 'pulse-distance' ? this.buildHeadless(jvc) : null;

    deepFreeze(this);
  }

  get(protocol: ProtocolId): ProtocolDescriptor | undefined {
    return this.byProtocol.get(protocol);
  }

  isEnabled(protocol: ProtocolId): boolean {
    return this.enabled.has(protocol);
  }

  promotionOf(descriptor: ProtocolDescriptor): ProtocolDescriptor | null {
    return descriptor.promotion === null ? null : this.byProtocol.get(descriptor.promotion) ?? null;
  }

  /** Microseconds to ticks at this table's rate */
  ticks(us: number): number {
    return toTicks(us, this.tickRate);
  }

  private unsupportedReason(spec: ProtocolSpec): string | null {
    if (spec.minTickRate !== null && this.tickRate < spec.minTickRate) {
      return `needs a tick rate of at least ${spec.minTickRate}`;
    }
    if ((this.tickRate * shortestTiming(spec)) / 1e6 < 2) {
      return `shortest timing is under 2 ticks at ${this.tickRate}`;
    }
    return null;
  }

  private buildDitto(nec: ProtocolSpec, priority: number): PulseDistanceDescriptor | null {
    const descriptor = buildDescriptor(nec, priority, this.tickRate, null);
    if (descriptor.encoding !== 'pulse-distance' || nec.repetition.kind !== 'ditto' || nec.start === null) {
      return null;
    }
    return {
      ...descriptor,
      variant: 'ditto',
      startPause: [toTickWindow(nec.repetition.pause, nec.startTolerance, this.tickRate)],
      minLength: 0,
      maxLength: 0
    };
  }

  private buildHeadless(jvc: PulseDistanceDescriptor): PulseDistanceDescriptor {
    return {
      ...jvc,
      variant: 'headless',
      startIsPayload: true,
      startPulse: [jvc.pulse1, jvc.pulse0],
      startPause: [jvc.pause1, jvc.pause0],
      promotion: null
    };
  }
}
