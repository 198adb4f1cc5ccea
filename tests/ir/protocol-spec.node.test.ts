/**
 * Protocol table parsing
 */

import { describe, test, expect } from 'vitest';
import { ProtocolSpecError } from '../../src/ir/errors';
import { PROTOCOL_SPECS, parseProtocolSpecs } from '../../src/ir/protocol-spec';
import { PROTOCOL_COUNT, ProtocolId, getProtocolName, isProtocolId, isProtocolName } from '../../src/ir/protocol-id';

function necEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'NEC',
    encoding: 'pulse-distance',
    start: { pulse: 9000, pause: 4500 },
    bit: { pulse1: 560, pause1: 1690, pulse0: 560, pause0: 560 },
    tolerance: 30,
    length: 32,
    address: [0, 16],
    command: [16, 16],
    bitOrder: 'lsb',
    stopBit: true,
    ...overrides
  };
}

describe('Protocol identifiers', () => {
  test('numbering', () => {
    expect(ProtocolId.NEC).toBe(2);
    expect(ProtocolId.ONKYO).toBe(56);
    expect(PROTOCOL_COUNT).toBe(57);
  });

  test('display names', () => {
    expect(getProtocolName(ProtocolId.BANG_OLUFSEN)).toBe('BANG OLU');
    expect(getProtocolName(ProtocolId.LGAIR)).toBe('LG AIR');
    expect(getProtocolName(ProtocolId.UNKNOWN)).toBe('UNKNOWN');
    expect(getProtocolName(-1)).toBe('unknown');
    expect(getProtocolName(57)).toBe('unknown');
  });

  test('guards', () => {
    expect(isProtocolName('RC6A')).toBe(true);
    expect(isProtocolName('7')).toBe(false);
    expect(isProtocolName('toString')).toBe(false);
    expect(isProtocolId(56)).toBe(true);
    expect(isProtocolId(57)).toBe(false);
    expect(isProtocolId(1.5)).toBe(false);
  });
});

describe('parseProtocolSpecs', () => {
  test('bundled table', () => {
    expect(PROTOCOL_SPECS).toHaveLength(54);
    expect(PROTOCOL_SPECS[0].id).toBe('SIRCS');
    expect(Object.isFrozen(PROTOCOL_SPECS)).toBe(true);
  });

  test('defaults for optional keys', () => {
    const [spec] = parseProtocolSpecs([necEntry()]);

    expect(spec).toEqual(expect.objectContaining({
      id: 'NEC',
      startTolerance: 30,
      length: [32, 32],
      flags: [],
      timeout: null,
      minTickRate: null,
      promotesTo: null,
      repetition: { kind: 'none' },
      sync: null
    }));
  });

  test('asymmetric tolerance and repetition policy', () => {
    const [spec] = parseProtocolSpecs([necEntry({ tolerance: [10, 50], repetition: { kind: 'ditto', pause: 2250 } })]);

    expect(spec.tolerance).toEqual([10, 50]);
    expect(spec.repetition).toEqual({ kind: 'ditto', pause: 2250 });
  });

  test.each([
    [necEntry({ encoding: 'morse' }), 'ir: protocol table entry 0: unknown encoding'],
    [necEntry({ id: 'FOO' }), 'ir: protocol table entry 0: "id" must name a protocol'],
    [necEntry({ start: undefined }), 'ir: protocol table entry 0: "start" is required unless the start bit is payload'],
    [necEntry({ length: 97 }), 'ir: protocol table entry 0: "length" must lie in 1..96'],
    [necEntry({ command: [16, 20] }), 'ir: protocol table entry 0: field layout exceeds the frame'],
    [necEntry({ bitOrder: 'big' }), 'ir: protocol table entry 0: "bitOrder" must be "lsb" or "msb"'],
    [necEntry({ tolerance: 120 }), 'ir: protocol table entry 0: "tolerance" must be a percentage or a [below, above] pair'],
    [necEntry({ bit: { pulse1: 560, pause1: -1, pulse0: 560, pause0: 560 } }), 'ir: protocol table entry 0: "pause1" must be a positive number'],
    [necEntry({ flags: ['fast'] }), 'ir: protocol table entry 0: "flags" must list known flags'],
    [necEntry({ repetition: { kind: 'sometimes' } }), 'ir: protocol table entry 0: unknown repetition kind']
  ])('rejects malformed entry %#', (entry, message) => {
    expect(() => parseProtocolSpecs([entry])).toThrow(ProtocolSpecError);
    expect(() => parseProtocolSpecs([entry])).toThrow(message);
  });

  test('table must be an array of objects', () => {
    expect(() => parseProtocolSpecs({})).toThrow('ir: protocol table: table must be an array');
    expect(() => parseProtocolSpecs([42])).toThrow('ir: protocol table entry 0: entry must be an object');
  });

  test('duplicate protocol', () => {
    expect(() => parseProtocolSpecs([necEntry(), necEntry()])).toThrow('ir: protocol table entry 1: duplicate protocol NEC');
  });

  test('promotion target must have an entry', () => {
    expect(() => parseProtocolSpecs([necEntry({ promotesTo: 'NEC42' })]))
      .toThrow('ir: protocol table entry 0: promotion target NEC42 has no timing entry');
  });

  test('error reports the entry index', () => {
    try {
      parseProtocolSpecs([necEntry(), necEntry({ id: 'NEC16', length: 0 })]);
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ProtocolSpecError && error.entry).toBe(1);
    }
  });
});
