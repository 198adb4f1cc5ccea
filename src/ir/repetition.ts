/**
 * Repetition handling
 *
 * - ditto frames (NEC repetition burst, JVC frames without start bit)
 * - mandatory in-press duplicates (SIRCS x3, NUBERT/SPEAKER x2, alternate SAMSUNG32/KASEIKYO frames)
 * - DENON frame + inverted twin
 * - key-hold flag for identical frames inside the key repetition window
 */

import type { ExtractedFields } from './extractor';
import { ProtocolId } from './protocol-id';
import type { ProtocolDescriptor, TimingTable } from './timing-table';

export const REPETITION_FLAG = 0x01;
export const AUTO_REPETITION_WINDOW_US = 80000;
export const KEY_REPETITION_WINDOW_US = 150000;

// DENON's twin carries the 10 command bits inverted
const DENON_COMMAND_MASK = 0x3ff;

// Frames a NEC repetition burst may stand for
const DITTO_SOURCES: ReadonlySet<ProtocolId> = new Set([
  ProtocolId.NEC,
  ProtocolId.NEC16,
  ProtocolId.NEC42,
  ProtocolId.APPLE,
  ProtocolId.ONKYO
]);

export type RepetitionOutcome =
  | { kind: 'emit'; fields: ExtractedFields }
  | { kind: 'suppress' }
  | { kind: 'drop' };

interface SeenFrame {
  protocol: ProtocolId;
  address: number;
  command: number;
  tick: number;
}

export class RepetitionTracker {
  private last: SeenFrame | null = null;
  private duplicates = 0;
  private pendingPair: SeenFrame | null = null;

  constructor(private readonly table: TimingTable) {}

  reset(): void {
    this.last = null;
    this.duplicates = 0;
    this.pendingPair = null;
  }

  /** JVC repeat frames are only believed shortly after a JVC frame */
  headlessAllowed(descriptor: ProtocolDescriptor, tick: number): boolean {
    const { repetition } = descriptor;
    if (repetition.kind !== 'headless' || this.last === null || this.last.protocol !== ProtocolId.JVC) {
      return false;
    }
    return tick - this.last.tick <= this.table.ticks(repetition.window);
  }

  accept(fields: ExtractedFields, descriptor: ProtocolDescriptor, tick: number): RepetitionOutcome {
    if (descriptor.variant === 'ditto') {
      return this.acceptDitto(tick);
    }
    if (descriptor.variant === 'headless') {
      this.remember(fields, tick);
      return { kind: 'emit', fields: { ...fields, flags: fields.flags | REPETITION_FLAG } };
    }

    const { repetition } = descriptor;
    const last = this.last;
    const same = last !== null &&
      last.protocol === fields.protocol &&
      last.address === fields.address &&
      last.command === fields.command;
    const gap = last === null ? Infinity : tick - last.tick;
    const held = same && gap <= this.table.ticks(KEY_REPETITION_WINDOW_US);
    const emit = (flagged: boolean): RepetitionOutcome => ({
      kind: 'emit',
      fields: flagged ? { ...fields, flags: fields.flags | REPETITION_FLAG } : fields
    });

    switch (repetition.kind) {
      case 'pair':
        return this.acceptPair(fields, tick, repetition.window ?? AUTO_REPETITION_WINDOW_US);

      case 'auto':
      case 'alternate': {
        const window = this.table.ticks(repetition.window ?? AUTO_REPETITION_WINDOW_US);
        this.remember(fields, tick);
        if (!same || gap > window) {
          this.duplicates = 0;
          return emit(held);
        }
        this.duplicates++;
        const frames = repetition.kind === 'auto' ? repetition.frames : 2;
        if (this.duplicates < frames) {
          return { kind: 'suppress' };
        }
        this.duplicates = 0;
        return emit(held);
      }

      default:
        this.remember(fields, tick);
        return emit(held);
    }
  }

  private acceptDitto(tick: number): RepetitionOutcome {
    const last = this.last;
    if (last === null || !DITTO_SOURCES.has(last.protocol) || tick - last.tick > this.table.ticks(KEY_REPETITION_WINDOW_US)) {
      return { kind: 'drop' };
    }
    last.tick = tick;
    return {
      kind: 'emit',
      fields: { protocol: last.protocol, address: last.address, command: last.command, flags: REPETITION_FLAG }
    };
  }

  private acceptPair(fields: ExtractedFields, tick: number, windowUs: number): RepetitionOutcome {
    const pending = this.pendingPair;
    const isTwin = pending !== null &&
      tick - pending.tick <= this.table.ticks(windowUs) &&
      pending.protocol === fields.protocol &&
      pending.address === fields.address &&
      (pending.command ^ fields.command) === DENON_COMMAND_MASK;

    if (!isTwin || pending === null) {
      this.pendingPair = { protocol: fields.protocol, address: fields.address, command: fields.command, tick };
      return { kind: 'suppress' };
    }

    this.pendingPair = null;
    const last = this.last;
    const held = last !== null &&
      last.protocol === pending.protocol &&
      last.address === pending.address &&
      last.command === pending.command &&
      tick - last.tick <= this.table.ticks(KEY_REPETITION_WINDOW_US);
    const first: ExtractedFields = { ...fields, command: pending.command };
    this.remember(first, tick);
    return { kind: 'emit', fields: held ? { ...first, flags: first.flags | REPETITION_FLAG } : first };
  }

  private remember(fields: ExtractedFields, tick: number): void {
    this.last = { protocol: fields.protocol, address: fields.address, command: fields.command, tick };
  }
}
