export { Event, EventEmitter, type DecoderStatistics } from './core';

export {
  IrDecoder,
  DEFAULT_IR_DECODER_CONFIG,
  type DecodedFrame,
  type IrDecoderConfig,
  type SampleBuffer
} from './ir/decoder';
export { DecoderPhase } from './ir/state-machine';
export { ConfigurationError, ProtocolSpecError } from './ir/errors';
export {
  ProtocolId,
  PROTOCOL_COUNT,
  DEFAULT_DISABLED_PROTOCOLS,
  getProtocolName,
  isProtocolId,
  isProtocolName,
  type ProtocolName
} from './ir/protocol-id';
export { PROTOCOL_SPECS, parseProtocolSpecs, type ProtocolSpec } from './ir/protocol-spec';
export {
  TimingTable,
  toTickWindow,
  toTicks,
  DEFAULT_TIMEOUT_US,
  MIN_TICK_RATE,
  MAX_TICK_RATE,
  type ProtocolDescriptor,
  type TickWindow
} from './ir/timing-table';
export {
  REPETITION_FLAG,
  AUTO_REPETITION_WINDOW_US,
  KEY_REPETITION_WINDOW_US
} from './ir/repetition';
export { FrameEncoder, toBits, concatSamples, type Segment } from './ir/encoder';

export {
  replayCapture,
  formatAnnotation,
  decimationFactor,
  type Polarity,
  type ReplayOptions,
  type ReplayedFrame
} from './capture/replay';
