/**
 * Timing table tests - tick windows and protocol selection
 */

import { describe, test, expect } from 'vitest';
import { ConfigurationError } from '../../src/ir/errors';
import { ProtocolId } from '../../src/ir/protocol-id';
import {
  DEFAULT_TIMEOUT_US,
  TimingTable,
  scaleWindow,
  toTickWindow,
  toTicks
} from '../../src/ir/timing-table';

describe('toTickWindow', () => {
  test('NEC start pulse at 15000 ticks/s', () => {
    expect(toTickWindow(9000, 10, 15000)).toEqual({ min: 121, max: 150 });
  });

  test('NEC data pulse with 30% tolerance', () => {
    expect(toTickWindow(560, 30, 15000)).toEqual({ min: 5, max: 12 });
  });

  test('RC5 half bit', () => {
    expect(toTickWindow(889, 10, 15000)).toEqual({ min: 11, max: 16 });
  });

  test('asymmetric tolerance', () => {
    expect(toTickWindow(1000, [10, 50], 10000)).toEqual({ min: 8, max: 16 });
  });

  test('minimum never drops below one tick', () => {
    expect(toTickWindow(100, 30, 10000).min).toBe(1);
  });

  test('Manchester multiples scale both bounds', () => {
    expect(scaleWindow({ min: 11, max: 16 }, 2)).toEqual({ min: 22, max: 32 });
  });

  test('microseconds to ticks rounds half up', () => {
    expect(toTicks(DEFAULT_TIMEOUT_US, 15000)).toBe(233);
    expect(toTicks(4500, 15000)).toBe(68);
  });
});

describe('TimingTable', () => {
  test('default selection leaves out the disabled protocols', () => {
    const table = new TimingTable({ tickRate: 15000 });

    expect(table.isEnabled(ProtocolId.NEC)).toBe(true);
    expect(table.isEnabled(ProtocolId.APPLE)).toBe(true);
    expect(table.isEnabled(ProtocolId.ONKYO)).toBe(false);
    expect(table.isEnabled(ProtocolId.FAN)).toBe(false);
    expect(table.defaultTimeout).toBe(233);
  });

  test('protocols that need a faster tick are dropped from the default set', () => {
    const table = new TimingTable({ tickRate: 15000 });

    expect(table.dropped).toEqual([ProtocolId.RCMM12, ProtocolId.RCMM24, ProtocolId.RCMM32]);
    expect(table.get(ProtocolId.RCMM32)).toBeUndefined();
  });

  test('at 10000 ticks/s the short-pulse protocols are dropped as well', () => {
    const table = new TimingTable({ tickRate: 10000 });

    expect(table.dropped).toContain(ProtocolId.SIEMENS);
    expect(table.dropped).toContain(ProtocolId.LEGO);
    expect(table.isEnabled(ProtocolId.NEC)).toBe(true);
  });

  test('only chain roots are start candidates', () => {
    const table = new TimingTable({ tickRate: 15000 });
    const starts = table.startCandidates.map(descriptor => descriptor.protocol);

    expect(starts).toContain(ProtocolId.JVC);
    expect(starts).toContain(ProtocolId.IR60);
    expect(starts).toContain(ProtocolId.SAMSUNG32);
    expect(starts).not.toContain(ProtocolId.NEC);
    expect(starts).not.toContain(ProtocolId.NEC42);
    expect(starts).not.toContain(ProtocolId.SAMSUNG48);
    expect(starts).not.toContain(ProtocolId.RC6A);
  });

  test('promotion skips disabled siblings', () => {
    const table = new TimingTable({ tickRate: 15000, protocols: [ProtocolId.JVC, ProtocolId.NEC] });
    const jvc = table.get(ProtocolId.JVC);

    expect(jvc?.promotion).toBe(ProtocolId.NEC);
    expect(table.get(ProtocolId.NEC)?.promotion).toBeNull();
  });

  test('payload start bits use the bit windows as start windows', () => {
    const table = new TimingTable({ tickRate: 15000 });
    const rc5 = table.get(ProtocolId.RC5);

    expect(rc5?.startPulse).toEqual([{ min: 11, max: 16 }, { min: 22, max: 32 }]);
  });

  test('NEC repetition burst descriptor', () => {
    const table = new TimingTable({ tickRate: 15000 });

    expect(table.ditto?.variant).toBe('ditto');
    expect(table.ditto?.startPause).toEqual([{ min: 29, max: 38 }]);
    expect(table.ditto?.maxLength).toBe(0);
  });

  test('priority follows the protocol table order', () => {
    const table = new TimingTable({ tickRate: 15000, protocols: [ProtocolId.NEC, ProtocolId.JVC, ProtocolId.NUBERT, ProtocolId.FAN] });

    expect([ProtocolId.JVC, ProtocolId.NEC, ProtocolId.NUBERT, ProtocolId.FAN].map(id => table.get(id)?.priority))
      .toEqual([2, 4, 27, 28]);
    expect(table.ditto?.priority).toBe(4);
    expect(table.headless?.priority).toBe(2);
  });

  test('NIKON keeps its longer timeout', () => {
    const table = new TimingTable({ tickRate: 15000 });

    expect(table.get(ProtocolId.NIKON)?.timeout).toBe(443);
  });

  test('table is frozen', () => {
    const table = new TimingTable({ tickRate: 15000 });

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.descriptors)).toBe(true);
    expect(Object.isFrozen(table.get(ProtocolId.NEC))).toBe(true);
  });

  describe('Configuration errors', () => {
    test('tick rate outside 10000..20000', () => {
      expect(() => new TimingTable({ tickRate: 9999 })).toThrow(ConfigurationError);
      expect(() => new TimingTable({ tickRate: 20001 })).toThrow('ir: tick rate 20001 outside 10000..20000');
    });

    test('explicitly enabled protocol that needs a faster tick', () => {
      expect(() => new TimingTable({ tickRate: 15000, protocols: [ProtocolId.RCMM12] }))
        .toThrow('ir: RCMM12: needs a tick rate of at least 20000');
    });

    test('APPLE without NEC', () => {
      expect(() => new TimingTable({ tickRate: 15000, protocols: [ProtocolId.APPLE] }))
        .toThrow('ir: APPLE: requires NEC');
    });

    test('protocol without timing data', () => {
      expect(() => new TimingTable({ tickRate: 15000, protocols: [ProtocolId.UNKNOWN] }))
        .toThrow('ir: UNKNOWN: no timing data');
    });

    test('error carries the protocol', () => {
      try {
        new TimingTable({ tickRate: 15000, protocols: [ProtocolId.RCMM24] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error instanceof ConfigurationError && error.protocol).toBe('RCMM24');
      }
    });
  });
});
