import type {
  BangOlufsenDescriptor,
  ManchesterDescriptor,
  ProtocolDescriptor,
  PulseDistanceDescriptor,
  RcmmDescriptor,
  TickWindow
} from './timing-table';
import { scaleWindow } from './timing-table';

export type BitClass = 0 | 1 | 'sync' | null;

export type BangOlufsenSymbol = 'repeat' | 'zero' | 'one' | 'trailer' | 'start3';

export function within(window: TickWindow, ticks: number): boolean {
  return ticks >= window.min && ticks <= window.max;
}

export function withinAny(windows: readonly TickWindow[], ticks: number): boolean {
  return windows.some(window => within(window, ticks));
}

export function startPulseMatches(descriptor: ProtocolDescriptor, pulse: number): boolean {
  return withinAny(descriptor.startPulse, pulse);
}

export function matchStart(descriptor: ProtocolDescriptor, pulse: number, pause: number): boolean {
  return withinAny(descriptor.startPulse, pulse) && withinAny(descriptor.startPause, pause);
}

/**
 * Classify one (pulse, pause) pair. Where a sync pair is due, only the sync
 * windows are tried.
 */
export function classifyBit(descriptor: PulseDistanceDescriptor, pulse: number, pause: number, expectSync = false): BitClass {
  if (expectSync) {
    const { sync } = descriptor;
    return sync !== null && within(sync.pulse, pulse) && within(sync.pause, pause) ? 'sync' : null;
  }
  if (within(descriptor.pulse1, pulse) && within(descriptor.pause1, pause)) {
    return 1;
  }
  if (within(descriptor.pulse0, pulse) && within(descriptor.pause0, pause)) {
    return 0;
  }
  return null;
}

/** Pulse-width decision for a last bit whose pause merged into the idle gap */
export function classifyPulse(descriptor: PulseDistanceDescriptor, pulse: number): 0 | 1 | null {
  const one = within(descriptor.pulse1, pulse);
  const zero = within(descriptor.pulse0, pulse);
  if (one === zero) {
    return null;
  }
  return one ? 1 : 0;
}

export function matchStop(descriptor: ProtocolDescriptor, pulse: number): boolean {
  switch (descriptor.encoding) {
    case 'pulse-distance':
      return within(descriptor.pulse0, pulse);
    case 'rcmm':
    case 'bang-olufsen':
      return within(descriptor.pulse, pulse);
    default:
      return false;
  }
}

/**
 * Number of Manchester units in an interval, trying 1x first.
 */
export function unitsOf(descriptor: ManchesterDescriptor, ticks: number): number | null {
  for (let units = 1; units <= descriptor.maxUnits; units++) {
    if (within(scaleWindow(descriptor.unit, units), ticks)) {
      return units;
    }
  }
  return null;
}

/** RCMM pause symbol: two bits, 00..11 */
export function classifyRcmmSymbol(descriptor: RcmmDescriptor, pause: number): number | null {
  const index = descriptor.symbols.findIndex(window => within(window, pause));
  return index < 0 ? null : index;
}

export function classifyBangOlufsen(descriptor: BangOlufsenDescriptor, pause: number): BangOlufsenSymbol | null {
  const order: readonly BangOlufsenSymbol[] = ['zero', 'repeat', 'one', 'trailer', 'start3'];
  return order.find(symbol => within(descriptor[symbol], pause)) ?? null;
}

/** Longest pause a pulse-distance data pair may carry */
export function dataPauseCeiling(descriptor: PulseDistanceDescriptor, expectSync = false): number {
  const ceiling = Math.max(descriptor.pause1.max, descriptor.pause0.max);
  return expectSync && descriptor.sync !== null ? Math.max(ceiling, descriptor.sync.pause.max) : ceiling;
}
