/**
 * Frame state machine
 *
 * 1 サンプル = 1 ティック。点灯/消灯の連続長を数え、エッジごとに候補トラックへ渡す。
 *
 *   IDLE -> START_PULSE -> START_PAUSE -> DATA_BITS -> (STOP_BIT) -> FRAME_DONE -> IDLE
 *
 * Every descriptor whose start pair matches opens a candidate track. The
 * machine reports a frame once no track can change the outcome any more;
 * choosing among several completed candidates is left to the caller.
 */

import { matchStart, startPulseMatches } from './classifier';
import type { RawFrame } from './extractor';
import type { ProtocolId } from './protocol-id';
import type { ProtocolDescriptor, TimingTable } from './timing-table';
import { createTrack, type CandidateTrack } from './track';

// eslint-disable-next-line no-unused-vars
export enum DecoderPhase {
  // eslint-disable-next-line no-unused-vars
  IDLE,
  // eslint-disable-next-line no-unused-vars
  START_PULSE,
  // eslint-disable-next-line no-unused-vars
  START_PAUSE,
  // eslint-disable-next-line no-unused-vars
  DATA_BITS,
  // eslint-disable-next-line no-unused-vars
  STOP_BIT,
  // eslint-disable-next-line no-unused-vars
  FRAME_DONE
}

export interface CompletedFrame extends RawFrame {
  readonly startTick: number;
  readonly endTick: number;
}

export type AbortReason = 'timing' | 'timeout';

export type MachineOutcome =
  | { kind: 'frame'; candidates: CompletedFrame[] }
  | { kind: 'abort'; reason: AbortReason };

export interface FrameStateMachineOptions {
  /** Gate for contextual descriptors (JVC frames without start bit) */
  isEligible?(descriptor: ProtocolDescriptor, tick: number): boolean;
}

type Stage = 'idle' | 'start-pulse' | 'start-pause' | 'data';

export class FrameStateMachine {
  private stage: Stage = 'idle';
  private lastLevel = false;
  private run = 0;
  private startTick = 0;
  private startPulse = 0;
  private startPauseTimeout = 0;
  private tracks: CandidateTrack[] = [];

  private readonly candidates: readonly ProtocolDescriptor[];
  private readonly longestStartPulse: number;

  constructor(
    private readonly table: TimingTable,
    private readonly options: FrameStateMachineOptions = {}
  ) {
    const { headless, ditto, startCandidates } = table;
    this.candidates = [
      ...(headless ? [headless] : []),
      ...(ditto ? [ditto] : []),
      ...startCandidates
    ];
    this.longestStartPulse = Math.max(
      0,
      ...this.candidates.flatMap(descriptor => descriptor.startPulse.map(window => window.max))
    );
  }

  get phase(): DecoderPhase {
    switch (this.stage) {
      case 'idle':
        return DecoderPhase.IDLE;
      case 'start-pulse':
        return DecoderPhase.START_PULSE;
      case 'start-pause':
        return DecoderPhase.START_PAUSE;
      case 'data':
        return this.activeTrack()?.status === 'stop-pending' ? DecoderPhase.STOP_BIT : DecoderPhase.DATA_BITS;
    }
  }

  /** Protocol of the first surviving candidate */
  get activeProtocol(): ProtocolId | null {
    return this.activeTrack()?.descriptor.protocol ?? null;
  }

  /** Number of live candidate tracks */
  get candidateCount(): number {
    return this.tracks.filter(track => track.alive).length;
  }

  reset(): void {
    this.stage = 'idle';
    this.lastLevel = false;
    this.run = 0;
    this.startPulse = 0;
    this.startPauseTimeout = 0;
    this.tracks = [];
  }

  /**
   * Advance one tick. Returns an outcome on the tick a frame completes or
   * the in-flight frame is given up.
   */
  tick(level: boolean, tickIndex: number): MachineOutcome | null {
    const edge = level !== this.lastLevel;
    this.lastLevel = level;

    switch (this.stage) {
      case 'idle':
        if (level && edge) {
          this.beginStart(tickIndex);
        }
        return null;

      case 'start-pulse':
        if (level) {
          this.run++;
          return this.run > this.longestStartPulse ? this.abort('timing') : null;
        }
        return this.endStartPulse(tickIndex);

      case 'start-pause':
        if (!level) {
          this.run++;
          return this.run >= this.startPauseTimeout ? this.abort('timeout') : null;
        }
        return this.endStartPause(tickIndex);

      case 'data':
        return level ? this.lightTick(edge, tickIndex) : this.darkTick(edge, tickIndex);
    }
  }

  private beginStart(tickIndex: number): void {
    this.stage = 'start-pulse';
    this.run = 1;
    this.startTick = tickIndex;
    this.tracks = [];
  }

  private eligible(descriptor: ProtocolDescriptor, tickIndex: number): boolean {
    if (descriptor.variant !== 'headless') {
      return true;
    }
    return this.options.isEligible?.(descriptor, tickIndex) ?? false;
  }

  private endStartPulse(tickIndex: number): MachineOutcome | null {
    const pulse = this.run;
    const matched = this.candidates.filter(
      descriptor => startPulseMatches(descriptor, pulse) && this.eligible(descriptor, tickIndex)
    );
    if (matched.length === 0) {
      return this.abort('timing');
    }
    this.startPulse = pulse;
    this.startPauseTimeout = Math.max(...matched.map(descriptor => descriptor.timeout));
    this.stage = 'start-pause';
    this.run = 1;
    return null;
  }

  private endStartPause(tickIndex: number): MachineOutcome | null {
    const tracks = this.openTracks(this.startPulse, this.run, tickIndex);
    if (tracks.length === 0) {
      return this.resync(tickIndex);
    }
    this.tracks = tracks;
    this.stage = 'data';
    this.run = 1;
    return null;
  }

  private openTracks(pulse: number, pause: number, tickIndex: number): CandidateTrack[] {
    const tracks: CandidateTrack[] = [];
    for (const descriptor of this.candidates) {
      if (!matchStart(descriptor, pulse, pause) || !this.eligible(descriptor, tickIndex)) {
        continue;
      }
      const track = createTrack(descriptor, this.table, this.startTick);
      if (track.begin(pulse, pause)) {
        tracks.push(track);
      }
    }
    return tracks;
  }

  private lightTick(edge: boolean, tickIndex: number): MachineOutcome | null {
    if (!edge) {
      this.run++;
      return null;
    }
    const pause = this.run;
    for (const track of this.tracks) {
      track.pauseEnded(pause);
    }
    this.run = 1;
    if (!this.tracks.some(track => track.alive)) {
      return this.resync(tickIndex);
    }
    return null;
  }

  private darkTick(edge: boolean, tickIndex: number): MachineOutcome | null {
    if (edge) {
      const pulse = this.run;
      for (const track of this.tracks) {
        track.pulseEnded(pulse);
      }
      this.run = 1;
    } else {
      this.run++;
    }

    const live = this.tracks.filter(track => track.alive);
    if (live.length === 0) {
      return this.abort('timing');
    }

    for (const track of live) {
      track.pauseTick(this.run);
    }

    const timeout = Math.max(...live.map(track => track.descriptor.timeout));
    if (this.run >= timeout) {
      for (const track of live) {
        track.timedOut();
      }
      const complete = live.filter(track => track.status === 'complete');
      return complete.length > 0 ? this.finish(complete, tickIndex) : this.abort('timeout');
    }

    if (live.some(track => track.blocking)) {
      return null;
    }
    const complete = live.filter(track => track.status === 'complete');
    return complete.length > 0 ? this.finish(complete, tickIndex) : null;
  }

  private finish(complete: readonly CandidateTrack[], tickIndex: number): MachineOutcome {
    const candidates = complete.map(track => ({
      descriptor: track.descriptor,
      bits: track.bits.slice(0, track.bitIndex),
      length: track.bitIndex,
      startTick: track.startTick,
      endTick: tickIndex
    }));
    this.toIdle();
    return { kind: 'frame', candidates };
  }

  private abort(reason: AbortReason): MachineOutcome {
    this.toIdle();
    return { kind: 'abort', reason };
  }

  /** Light after a mismatch: this burst is the next start pulse */
  private resync(tickIndex: number): MachineOutcome {
    this.beginStart(tickIndex);
    return { kind: 'abort', reason: 'timing' };
  }

  private toIdle(): void {
    this.stage = 'idle';
    this.run = 0;
    this.tracks = [];
  }

  private activeTrack(): CandidateTrack | undefined {
    return this.tracks.find(track => track.alive);
  }
}
