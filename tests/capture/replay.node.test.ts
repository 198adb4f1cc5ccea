/**
 * Logic capture replay tests
 */

import { describe, test, expect } from 'vitest';
import { decimationFactor, formatAnnotation, replayCapture } from '../../src/capture/replay';
import { IrDecoder, type DecodedFrame } from '../../src/ir/decoder';
import { FrameEncoder, concatSamples } from '../../src/ir/encoder';
import { ConfigurationError } from '../../src/ir/errors';
import { ProtocolId } from '../../src/ir/protocol-id';
import { necBits } from '../ir/signal-helpers';

// 30 kHz capture: 10 ms idle, NEC frame, 5 ms idle
const capture = new FrameEncoder(30000);
const activeHigh = concatSamples(capture.silence(10000), capture.encode('NEC', necBits(0xff, 0x1a)), capture.silence(5000));
const activeLow = activeHigh.map(sample => 1 - sample);

describe('decimationFactor', () => {
  test('integer multiples of the tick rate', () => {
    expect(decimationFactor(30000, 15000)).toBe(2);
    expect(decimationFactor(15000, 15000)).toBe(1);
  });

  test('other rates are rejected', () => {
    expect(() => decimationFactor(44100, 15000)).toThrow(ConfigurationError);
    expect(() => decimationFactor(44100, 15000)).toThrow('ir: capture sample rate 44100 must be a multiple of 15000');
    expect(() => decimationFactor(0, 15000)).toThrow(ConfigurationError);
  });
});

describe('replayCapture', () => {
  test('active-low capture', () => {
    const frames = replayCapture(activeLow, { sampleRate: 30000, decoder: new IrDecoder() });

    expect(frames).toEqual([{
      protocol: ProtocolId.NEC,
      protocolName: 'NEC',
      address: 0xff,
      command: 0x1a,
      flags: 0,
      startTick: 150,
      endTick: 1211,
      startSample: 300,
      endSample: 2422
    }]);
  });

  test('active-high capture', () => {
    const frames = replayCapture(activeHigh, { sampleRate: 30000, decoder: new IrDecoder(), polarity: 'active-high' });
    expect(frames.map(frame => [frame.startSample, frame.endSample])).toEqual([[300, 2422]]);
  });

  test('sample positions are relative to the start of the capture', () => {
    const decoder = new IrDecoder();
    for (let i = 0; i < 100; i++) {
      decoder.addSample(0);
    }
    const frames = replayCapture(activeLow, { sampleRate: 30000, decoder });

    expect(frames.map(frame => [frame.startTick, frame.startSample])).toEqual([[250, 300]]);
  });

  test('capture rate must fit the decoder tick rate', () => {
    expect(() => replayCapture(activeLow, { sampleRate: 22050, decoder: new IrDecoder() })).toThrow(ConfigurationError);
  });
});

describe('formatAnnotation', () => {
  const frame: DecodedFrame = {
    protocol: ProtocolId.NEC,
    protocolName: 'NEC',
    address: 0xff,
    command: 0x1a,
    flags: 0,
    startTick: 150,
    endTick: 1179
  };

  test('longest first', () => {
    expect(formatAnnotation(frame)).toEqual([
      'Protocol: 2 (NEC), Address 0x00ff, Command: 0x001a',
      'P: NEC (2), Addr: 0xff, Cmd: 0x1a',
      'P: 2 A: 0xff C: 0x1a',
      'C:1a A:ff',
      'C:1a'
    ]);
  });

  test('repetition suffixes', () => {
    expect(formatAnnotation({ ...frame, flags: 1 })).toEqual([
      'Protocol: 2 (NEC), Address 0x00ff, Command: 0x001a repeat',
      'P: NEC (2), Addr: 0xff, Cmd: 0x1a rep',
      'P: 2 A: 0xff C: 0x1a rep',
      'C:1a A:ff r',
      'C:1a'
    ]);
  });
});
