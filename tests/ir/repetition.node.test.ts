/**
 * Repetition tracker tests
 *
 * At 15000 ticks/s: key window 2250 ticks, auto window 1200, DENON twin window 1800, JVC repeat window 1050.
 */

import { describe, test, expect, beforeEach } from 'vitest';
import type { ExtractedFields } from '../../src/ir/extractor';
import { ProtocolId } from '../../src/ir/protocol-id';
import { REPETITION_FLAG, RepetitionTracker } from '../../src/ir/repetition';
import { TimingTable, type ProtocolDescriptor } from '../../src/ir/timing-table';

const table = new TimingTable({ tickRate: 15000 });

function descriptorOf(protocol: ProtocolId): ProtocolDescriptor {
  const descriptor = table.get(protocol);
  if (!descriptor) {
    throw new Error(`${ProtocolId[protocol]} not enabled`);
  }
  return descriptor;
}

function fields(protocol: ProtocolId, address: number, command: number): ExtractedFields {
  return { protocol, address, command, flags: 0 };
}

describe('RepetitionTracker', () => {
  let tracker: RepetitionTracker;

  beforeEach(() => {
    tracker = new RepetitionTracker(table);
  });

  describe('Key hold', () => {
    const nec = descriptorOf(ProtocolId.NEC);

    test('identical frame inside the key window is flagged', () => {
      expect(tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 0))
        .toEqual({ kind: 'emit', fields: fields(ProtocolId.NEC, 1, 2) });
      expect(tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 1000))
        .toEqual({ kind: 'emit', fields: { ...fields(ProtocolId.NEC, 1, 2), flags: REPETITION_FLAG } });
    });

    test('outside the key window the frame is new', () => {
      tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 0);
      const outcome = tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 2251);
      expect(outcome).toEqual({ kind: 'emit', fields: fields(ProtocolId.NEC, 1, 2) });
    });

    test('different command is a new key', () => {
      tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 0);
      const outcome = tracker.accept(fields(ProtocolId.NEC, 1, 3), nec, 100);
      expect(outcome).toEqual({ kind: 'emit', fields: fields(ProtocolId.NEC, 1, 3) });
    });
  });

  describe('NEC repetition burst', () => {
    const ditto = table.ditto;
    if (ditto === null) {
      throw new Error('NEC repetition burst missing');
    }

    test('repeats the last NEC frame with the repetition flag', () => {
      tracker.accept(fields(ProtocolId.NEC, 0xff, 0x1a), descriptorOf(ProtocolId.NEC), 100);
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 500))
        .toEqual({ kind: 'emit', fields: { ...fields(ProtocolId.NEC, 0xff, 0x1a), flags: REPETITION_FLAG } });
    });

    test('each burst extends the window', () => {
      tracker.accept(fields(ProtocolId.NEC, 0xff, 0x1a), descriptorOf(ProtocolId.NEC), 0);
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 2000).kind).toBe('emit');
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 4000).kind).toBe('emit');
    });

    test('dropped without a preceding frame', () => {
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 500)).toEqual({ kind: 'drop' });
    });

    test('dropped after a frame of another family', () => {
      tracker.accept(fields(ProtocolId.SIRCS, 1, 0x15), descriptorOf(ProtocolId.SIRCS), 100);
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 500)).toEqual({ kind: 'drop' });
    });

    test('dropped when late', () => {
      tracker.accept(fields(ProtocolId.NEC, 0xff, 0x1a), descriptorOf(ProtocolId.NEC), 0);
      expect(tracker.accept(fields(ProtocolId.NEC, 0, 0), ditto, 3000)).toEqual({ kind: 'drop' });
    });
  });

  describe('Mandatory duplicates', () => {
    const sircs = descriptorOf(ProtocolId.SIRCS);

    test('SIRCS sends each press three times', () => {
      const frame = fields(ProtocolId.SIRCS, 1, 0x15);

      expect(tracker.accept(frame, sircs, 0).kind).toBe('emit');
      expect(tracker.accept(frame, sircs, 675)).toEqual({ kind: 'suppress' });
      expect(tracker.accept(frame, sircs, 1350)).toEqual({ kind: 'suppress' });
      expect(tracker.accept(frame, sircs, 2025))
        .toEqual({ kind: 'emit', fields: { ...frame, flags: REPETITION_FLAG } });
    });

    test('a gap longer than the auto window starts over', () => {
      const frame = fields(ProtocolId.SIRCS, 1, 0x15);

      tracker.accept(frame, sircs, 0);
      expect(tracker.accept(frame, sircs, 1300))
        .toEqual({ kind: 'emit', fields: { ...frame, flags: REPETITION_FLAG } });
    });

    test('alternate frames of SAMSUNG32', () => {
      const samsung = descriptorOf(ProtocolId.SAMSUNG32);
      const frame = fields(ProtocolId.SAMSUNG32, 0x0707, 0x02);

      expect(tracker.accept(frame, samsung, 0).kind).toBe('emit');
      expect(tracker.accept(frame, samsung, 800)).toEqual({ kind: 'suppress' });
      expect(tracker.accept(frame, samsung, 1600).kind).toBe('emit');
    });
  });

  describe('DENON pair', () => {
    const denon = descriptorOf(ProtocolId.DENON);

    test('first frame is held until its inverted twin arrives', () => {
      expect(tracker.accept(fields(ProtocolId.DENON, 8, 0x155), denon, 0)).toEqual({ kind: 'suppress' });
      expect(tracker.accept(fields(ProtocolId.DENON, 8, 0x2aa), denon, 1200))
        .toEqual({ kind: 'emit', fields: fields(ProtocolId.DENON, 8, 0x155) });
    });

    test('twin outside the window starts a new pair', () => {
      tracker.accept(fields(ProtocolId.DENON, 8, 0x155), denon, 0);
      expect(tracker.accept(fields(ProtocolId.DENON, 8, 0x2aa), denon, 1801)).toEqual({ kind: 'suppress' });
      expect(tracker.accept(fields(ProtocolId.DENON, 8, 0x155), denon, 2800))
        .toEqual({ kind: 'emit', fields: fields(ProtocolId.DENON, 8, 0x2aa) });
    });

    test('twin with another address does not pair', () => {
      tracker.accept(fields(ProtocolId.DENON, 8, 0x155), denon, 0);
      expect(tracker.accept(fields(ProtocolId.DENON, 9, 0x2aa), denon, 1000)).toEqual({ kind: 'suppress' });
    });
  });

  describe('JVC repeat frames', () => {
    const headless = table.headless;
    if (headless === null) {
      throw new Error('JVC repeat descriptor missing');
    }

    test('only believed shortly after a JVC frame', () => {
      expect(tracker.headlessAllowed(headless, 100)).toBe(false);

      tracker.accept(fields(ProtocolId.JVC, 3, 0x123), descriptorOf(ProtocolId.JVC), 0);
      expect(tracker.headlessAllowed(headless, 1050)).toBe(true);
      expect(tracker.headlessAllowed(headless, 1051)).toBe(false);
    });

    test('emitted with the repetition flag', () => {
      tracker.accept(fields(ProtocolId.JVC, 3, 0x123), descriptorOf(ProtocolId.JVC), 0);
      expect(tracker.accept(fields(ProtocolId.JVC, 3, 0x123), headless, 900))
        .toEqual({ kind: 'emit', fields: { ...fields(ProtocolId.JVC, 3, 0x123), flags: REPETITION_FLAG } });
      expect(tracker.headlessAllowed(headless, 1900)).toBe(true);
    });

    test('other descriptors are never headless', () => {
      expect(tracker.headlessAllowed(descriptorOf(ProtocolId.NEC), 0)).toBe(false);
    });
  });

  test('reset forgets the last frame', () => {
    const nec = descriptorOf(ProtocolId.NEC);
    tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 0);
    tracker.reset();

    expect(tracker.accept(fields(ProtocolId.NEC, 1, 2), nec, 10))
      .toEqual({ kind: 'emit', fields: fields(ProtocolId.NEC, 1, 2) });
  });
});
