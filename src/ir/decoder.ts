/**
 * IR Decoder - public API
 *
 * 1 サンプル (= 1 ティック) ずつ addSample() に渡す。フレームが完成したティックでのみ true を返し、
 * 結果は getData() で一度だけ取り出せる。
 */

import {
  Event,
  EventEmitter,
  createDecoderStatistics,
  type DecoderStatistics,
  type MutableDecoderStatistics
} from '../core';
import { ConfigurationError } from './errors';
import { extractFrame, type ExtractedFields } from './extractor';
import { getProtocolName, ProtocolId } from './protocol-id';
import { RepetitionTracker } from './repetition';
import { DecoderPhase, FrameStateMachine, type CompletedFrame, type MachineOutcome } from './state-machine';
import { TimingTable } from './timing-table';

export interface IrDecoderConfig {
  /** Samples per second; every timing window derives from it */
  tickRate: number;
  /** Enabled protocols; undefined selects the default set */
  protocols: readonly ProtocolId[] | undefined;
  /** Width of the command field in the output record */
  commandWidth: 16 | 32;
  instanceName: string;
  debug: boolean;
}

export const DEFAULT_IR_DECODER_CONFIG: IrDecoderConfig = {
  tickRate: 15000,
  protocols: undefined,
  commandWidth: 32,
  instanceName: 'ir',
  debug: false
};

export interface DecodedFrame {
  readonly protocol: ProtocolId;
  readonly protocolName: string;
  readonly address: number;
  readonly command: number;
  /** bit 0: repetition; bits 4..7: KASEIKYO genre 2 */
  readonly flags: number;
  readonly startTick: number;
  readonly endTick: number;
}

export type SampleBuffer = ArrayLike<boolean | number>;

interface DecoderEngine {
  table: TimingTable;
  machine: FrameStateMachine;
  repetition: RepetitionTracker;
}

function buildEngine(table: TimingTable): DecoderEngine {
  const repetition = new RepetitionTracker(table);
  const machine = new FrameStateMachine(table, {
    isEligible: (descriptor, tick) => repetition.headlessAllowed(descriptor, tick)
  });
  return { table, machine, repetition };
}

function validateCommandWidth(width: number): void {
  if (width !== 16 && width !== 32) {
    throw new ConfigurationError(`command width ${width} is neither 16 nor 32`);
  }
}

function checkSharedTable(table: TimingTable, config: IrDecoderConfig): void {
  if (table.tickRate !== config.tickRate) {
    throw new ConfigurationError(`shared table runs at ${table.tickRate}, config asks for ${config.tickRate}`);
  }
  if (config.protocols === undefined) {
    return;
  }
  const requested = new Set(config.protocols);
  if (requested.size !== table.enabled.size || [...requested].some(protocol => !table.enabled.has(protocol))) {
    throw new ConfigurationError('shared table enables other protocols than the config');
  }
}

export class IrDecoder extends EventEmitter {
  private config: IrDecoderConfig;
  private engine: DecoderEngine;
  private statistics: MutableDecoderStatistics = createDecoderStatistics();

  private tickCount = 0;
  private pending: DecodedFrame | null = null;

  // detect() resumes where it stopped for the same buffer
  private detectBuffer: SampleBuffer | null = null;
  private detectPosition = 0;

  /**
   * @param table - share a prebuilt table between decoders; its tick rate and protocols must match the config
   */
  constructor(config: Partial<IrDecoderConfig> = {}, table?: TimingTable) {
    super();
    this.config = { ...DEFAULT_IR_DECODER_CONFIG, ...config };
    validateCommandWidth(this.config.commandWidth);
    if (table) {
      checkSharedTable(table, this.config);
    }
    this.engine = buildEngine(table ?? this.buildTable());
    this.log(`Initialized at ${this.config.tickRate} ticks/s with ${this.engine.table.enabled.size} protocols`);
  }

  /**
   * Apply a partial configuration. The timing table is rebuilt and the decoder reset.
   */
  configure(config: Partial<IrDecoderConfig>): void {
    const next = { ...this.config, ...config };
    validateCommandWidth(next.commandWidth);
    const previous = this.config;
    this.config = next;
    try {
      this.engine = buildEngine(this.buildTable());
    } catch (error) {
      this.config = previous;
      throw error;
    }
    this.log(`Configured: tickRate=${next.tickRate}, protocols=${this.engine.table.enabled.size}, commandWidth=${next.commandWidth}`);
    this.reset();
  }

  getConfig(): IrDecoderConfig {
    return { ...this.config };
  }

  getTimingTable(): TimingTable {
    return this.engine.table;
  }

  getTickRate(): number {
    return this.engine.table.tickRate;
  }

  getProtocolName(protocol: number): string {
    return getProtocolName(protocol);
  }

  getStatistics(): DecoderStatistics {
    return { ...this.statistics };
  }

  get phase(): DecoderPhase {
    const phase = this.engine.machine.phase;
    return phase === DecoderPhase.IDLE && this.pending !== null ? DecoderPhase.FRAME_DONE : phase;
  }

  /** Absolute tick counter since the last reset */
  get ticks(): number {
    return this.tickCount;
  }

  reset(): void {
    this.engine.machine.reset();
    this.engine.repetition.reset();
    this.statistics = createDecoderStatistics();
    this.tickCount = 0;
    this.pending = null;
    this.detectBuffer = null;
    this.detectPosition = 0;
    this.emit('reset');
  }

  /**
   * Advance exactly one tick.
   *
   * @param level - true (or non-zero) while the carrier is present
   * @returns true on the tick a valid frame completes
   */
  addSample(level: boolean | number): boolean {
    const tick = this.tickCount++;
    const lit = typeof level === 'number' ? level !== 0 : level;
    const outcome = this.engine.machine.tick(lit, tick);
    return outcome === null ? false : this.handleOutcome(outcome);
  }

  /** The most recently completed frame; cleared by the call */
  getData(): DecodedFrame | null {
    const frame = this.pending;
    this.pending = null;
    return frame;
  }

  /**
   * Feed samples until a frame completes or the buffer runs out. A second
   * call with the same buffer continues after the last consumed sample.
   */
  detect(buffer: SampleBuffer): DecodedFrame | null {
    if (buffer !== this.detectBuffer) {
      this.detectBuffer = buffer;
      this.detectPosition = 0;
    }
    while (this.detectPosition < buffer.length) {
      const sample = buffer[this.detectPosition++];
      if (this.addSample(sample)) {
        return this.getData();
      }
    }
    return null;
  }

  private buildTable(): TimingTable {
    const table = new TimingTable({ tickRate: this.config.tickRate, protocols: this.config.protocols });
    if (table.dropped.length > 0) {
      this.log(`Dropped at ${table.tickRate} ticks/s: ${table.dropped.map(getProtocolName).join(', ')}`);
    }
    return table;
  }

  private handleOutcome(outcome: MachineOutcome): boolean {
    if (outcome.kind === 'abort') {
      this.statistics.timingMismatches++;
      this.log(`Frame discarded: ${outcome.reason}`);
      return false;
    }
    return this.completeFrame(outcome.candidates);
  }

  private completeFrame(candidates: readonly CompletedFrame[]): boolean {
    const { table, repetition } = this.engine;

    const valid = candidates.flatMap(frame => {
      const fields: ExtractedFields | null = frame.descriptor.variant === 'ditto'
        ? { protocol: frame.descriptor.protocol, address: 0, command: 0, flags: 0 }
        : extractFrame(frame, table.enabled);
      return fields === null ? [] : [{ frame, fields }];
    });

    if (valid.length === 0) {
      this.statistics.integrityFailures++;
      this.log(`Integrity check failed: ${candidates.map(frame => frame.descriptor.name).join(', ')}`);
      return false;
    }
    // 優先順位 (プロトコル表の順) が最も高い候補だけを残す
    const top = Math.min(...valid.map(({ frame }) => frame.descriptor.priority));
    const preferred = valid.filter(({ frame }) => frame.descriptor.priority === top);
    const readings = new Set(preferred.map(({ fields }) => `${fields.protocol}:${fields.address}:${fields.command}:${fields.flags}`));
    if (readings.size > 1) {
      this.statistics.ambiguousFrames++;
      this.log(`Ambiguous frame: ${preferred.map(({ frame }) => frame.descriptor.name).join(', ')}`);
      return false;
    }

    const [{ frame, fields }] = preferred;
    const verdict = repetition.accept(fields, frame.descriptor, frame.endTick);
    if (verdict.kind !== 'emit') {
      this.statistics.repetitionsSuppressed++;
      this.log(`${getProtocolName(fields.protocol)} repetition ${verdict.kind === 'drop' ? 'dropped' : 'suppressed'}`);
      return false;
    }

    const decoded = this.toDecodedFrame(verdict.fields, frame);
    this.pending = decoded;
    this.statistics.framesDecoded++;
    this.log(`Frame: ${decoded.protocolName} address=0x${decoded.address.toString(16)} command=0x${decoded.command.toString(16)} flags=${decoded.flags}`);
    this.emit('frame', new Event(decoded));
    return true;
  }

  private toDecodedFrame(fields: ExtractedFields, frame: CompletedFrame): DecodedFrame {
    const commandMask = this.config.commandWidth === 16 ? 0xffff : 0xffffffff;
    return {
      protocol: fields.protocol,
      protocolName: getProtocolName(fields.protocol),
      address: fields.address & 0xffff,
      command: (fields.command & commandMask) >>> 0,
      flags: fields.flags,
      startTick: frame.startTick,
      endTick: frame.endTick
    };
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[IrDecoder:${this.config.instanceName}] ${message}`);
    }
  }
}
