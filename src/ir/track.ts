/**
 * Candidate tracks
 *
 * スタートビットに一致したプロトコルごとに 1 トラックを作り、以降のパルス/ポーズを並行して評価する。
 * ビットは生のまま保持し、アドレス/コマンドの切り出しはフレーム完了後に最終的な記述子で行う。
 *
 * Track lifecycle:
 *   running       - accepting data
 *   stalled       - current pause is longer than any data pause; waits for the timeout
 *   stop-pending  - stop pulse seen, a longer sibling could still continue the frame
 *   complete      - frame ended validly for this protocol
 *   dead          - mismatch
 */

import {
  classifyBangOlufsen,
  classifyBit,
  classifyPulse,
  classifyRcmmSymbol,
  dataPauseCeiling,
  matchStop,
  unitsOf,
  within
} from './classifier';
import { passesEarlyCheck } from './extractor';
import { MAX_FRAME_BITS } from './protocol-spec';
import type {
  BangOlufsenDescriptor,
  ManchesterDescriptor,
  ProtocolDescriptor,
  PulseDistanceDescriptor,
  RcmmDescriptor,
  SerialDescriptor,
  TimingTable
} from './timing-table';

export type TrackStatus = 'running' | 'stalled' | 'stop-pending' | 'complete' | 'dead';

export abstract class CandidateTrack {
  abstract descriptor: ProtocolDescriptor;

  readonly bits = new Uint8Array(MAX_FRAME_BITS);
  bitIndex = 0;
  status: TrackStatus = 'running';

  constructor(
    protected readonly table: TimingTable,
    readonly startTick: number
  ) {}

  get alive(): boolean {
    return this.status !== 'dead';
  }

  /** A blocking track can still change the outcome of the frame */
  get blocking(): boolean {
    return this.status === 'running' || this.status === 'stop-pending' || (this.status === 'stalled' && this.endsAtTimeout);
  }

  /** Frames that have no stop bit finish on the darkness timeout */
  get endsAtTimeout(): boolean {
    return !this.descriptor.stopBit;
  }

  /**
   * Consume the start pair. Tracks whose start bit is payload decode it here.
   */
  abstract begin(pulse: number, pause: number): boolean;

  /** Light turned off after `pulse` ticks */
  pulseEnded(pulse: number): void {
    if (this.status === 'dead') {
      return;
    }
    this.onPulse(pulse);
  }

  /** Light returned after `pause` ticks of darkness */
  pauseEnded(pause: number): void {
    if (this.status === 'dead') {
      return;
    }
    if (this.status === 'complete') {
      // the frame went on after this protocol's end
      this.status = 'dead';
      return;
    }
    this.onPause(pause);
  }

  /** Called on every dark tick of the data phase */
  pauseTick(pause: number): void {
    if (this.status !== 'running' && this.status !== 'stop-pending') {
      return;
    }
    if (pause > this.pauseCeiling()) {
      this.status = this.status === 'stop-pending' ? 'complete' : 'stalled';
    }
  }

  /** Darkness reached the timeout */
  timedOut(): void {
    if (this.status === 'stop-pending') {
      this.status = 'complete';
      return;
    }
    if (this.status === 'running' || this.status === 'stalled') {
      this.status = this.endsAtTimeout && this.finishAtTimeout() && this.lengthComplete() ? 'complete' : 'dead';
    }
  }

  lengthComplete(): boolean {
    return this.bitIndex >= this.descriptor.minLength && this.bitIndex <= this.descriptor.maxLength;
  }

  protected abstract onPulse(pulse: number): void;
  protected abstract onPause(pause: number): void;
  protected abstract pauseCeiling(): number;

  protected finishAtTimeout(): boolean {
    return true;
  }

  protected canPromote(): boolean {
    return this.table.promotionOf(this.descriptor) !== null;
  }

  /** Switch to the longer sibling; false when there is none */
  protected abstract promote(): boolean;

  protected pushBit(bit: number): boolean {
    if (this.bitIndex >= this.descriptor.maxLength && !this.promote()) {
      return false;
    }
    this.bits[this.bitIndex++] = bit;
    return true;
  }

  protected die(): void {
    this.status = 'dead';
  }
}

export class PulseDistanceTrack extends CandidateTrack {
  private pendingPulse = 0;
  private syncSeen = false;

  constructor(
    public descriptor: PulseDistanceDescriptor,
    table: TimingTable,
    startTick: number
  ) {
    super(table, startTick);
  }

  begin(pulse: number, pause: number): boolean {
    if (this.descriptor.startIsPayload) {
      this.pendingPulse = pulse;
      this.onPause(pause);
    }
    return this.status !== 'dead';
  }

  protected onPulse(pulse: number): void {
    const { descriptor } = this;
    this.pendingPulse = pulse;

    if (descriptor.virtualStop && this.bitIndex === descriptor.maxLength - 1) {
      const bit = classifyPulse(descriptor, pulse);
      if (bit === null) {
        this.die();
        return;
      }
      this.pushBit(bit);
      this.pendingPulse = 0;
      this.status = 'complete';
      return;
    }

    if (!descriptor.stopBit || this.bitIndex < descriptor.minLength) {
      return;
    }

    const atEnd = this.bitIndex === descriptor.maxLength;
    if (matchStop(descriptor, pulse) && passesEarlyCheck(descriptor.protocol, this.bits)) {
      const continuation = atEnd ? this.canPromote() : true;
      this.status = continuation ? 'stop-pending' : 'complete';
    } else if (atEnd && !this.canPromote()) {
      this.die();
    }
  }

  protected onPause(pause: number): void {
    const { descriptor } = this;
    const expectSync = this.expectSync();
    const bit = classifyBit(descriptor, this.pendingPulse, pause, expectSync);
    this.pendingPulse = 0;
    if (bit === null) {
      this.die();
      return;
    }
    this.status = 'running';
    if (bit === 'sync') {
      this.syncSeen = true;
      return;
    }
    if (!this.pushBit(bit)) {
      this.die();
    }
  }

  protected pauseCeiling(): number {
    if (this.status === 'stop-pending') {
      const next = this.table.promotionOf(this.descriptor);
      return next !== null && next.encoding === 'pulse-distance' && this.bitIndex === this.descriptor.maxLength
        ? dataPauseCeiling(next)
        : dataPauseCeiling(this.descriptor);
    }
    return dataPauseCeiling(this.descriptor, this.expectSync());
  }

  protected finishAtTimeout(): boolean {
    // the last pause merged into the idle gap: the pulse alone decides the bit
    if (this.pendingPulse > 0 && this.bitIndex < this.descriptor.maxLength) {
      const bit = classifyPulse(this.descriptor, this.pendingPulse);
      this.pendingPulse = 0;
      return bit !== null && this.pushBit(bit);
    }
    return true;
  }

  protected promote(): boolean {
    const next = this.table.promotionOf(this.descriptor);
    if (next === null || next.encoding !== 'pulse-distance') {
      return false;
    }
    this.descriptor = next;
    return true;
  }

  private expectSync(): boolean {
    const { sync } = this.descriptor;
    return sync !== null && !this.syncSeen && this.bitIndex === sync.at;
  }
}

type Half = 'mark' | 'space';

export class ManchesterTrack extends CandidateTrack {
  private pendingHalf: Half | null = null;

  constructor(
    public descriptor: ManchesterDescriptor,
    table: TimingTable,
    startTick: number
  ) {
    super(table, startTick);
  }

  get endsAtTimeout(): boolean {
    return true;
  }

  begin(pulse: number, pause: number): boolean {
    if (!this.descriptor.startIsPayload) {
      return true;
    }
    // 先頭ビットの前半 (消灯) はアイドル期間に埋もれて見えない
    this.pendingHalf = this.descriptor.firstPulseIsOne ? null : 'space';
    return this.feed('mark', pulse) && this.feed('space', pause);
  }

  protected onPulse(pulse: number): void {
    if (!this.feed('mark', pulse)) {
      this.die();
    }
  }

  protected onPause(pause: number): void {
    this.status = 'running';
    if (!this.feed('space', pause)) {
      this.die();
    }
  }

  protected pauseCeiling(): number {
    return this.descriptor.unit.max * this.descriptor.maxUnits;
  }

  protected finishAtTimeout(): boolean {
    if (this.pendingHalf === 'space') {
      return false;
    }
    // a trailing light half ends in darkness
    return this.pendingHalf === null || this.pushHalf('space');
  }

  protected promote(): boolean {
    const next = this.table.promotionOf(this.descriptor);
    if (next === null || next.encoding !== 'manchester') {
      return false;
    }
    this.descriptor = next;
    return true;
  }

  private feed(level: Half, ticks: number): boolean {
    let units = unitsOf(this.descriptor, ticks);
    if (units === null) {
      return false;
    }
    while (units > 0) {
      const width = this.descriptor.wideBit === this.bitIndex ? 2 : 1;
      if (units < width || !this.pushHalf(level)) {
        return false;
      }
      units -= width;
    }
    return true;
  }

  private pushHalf(level: Half): boolean {
    if (this.pendingHalf === null) {
      this.pendingHalf = level;
      return true;
    }
    if (this.pendingHalf === level) {
      return false;
    }
    const first = this.pendingHalf;
    this.pendingHalf = null;
    const bit = this.descriptor.firstPulseIsOne
      ? (first === 'mark' ? 1 : 0)
      : (level === 'mark' ? 1 : 0);
    return this.pushBit(bit);
  }
}

export class SerialTrack extends CandidateTrack {
  constructor(
    public descriptor: SerialDescriptor,
    table: TimingTable,
    startTick: number
  ) {
    super(table, startTick);
  }

  begin(): boolean {
    return true;
  }

  protected onPulse(pulse: number): void {
    if (!this.feedRun(1, pulse)) {
      this.die();
    }
  }

  protected onPause(pause: number): void {
    this.status = 'running';
    if (!this.feedRun(0, pause)) {
      this.die();
    }
  }

  protected pauseCeiling(): number {
    const remaining = this.descriptor.maxLength - this.bitIndex;
    return Math.max(0, remaining - 1) * this.descriptor.unitTicks + this.descriptor.unit.max;
  }

  protected finishAtTimeout(): boolean {
    // trailing zeros merge into the idle gap
    while (this.bitIndex < this.descriptor.maxLength) {
      this.pushBit(0);
    }
    return true;
  }

  protected promote(): boolean {
    return false;
  }

  private feedRun(bit: number, ticks: number): boolean {
    const { unit, unitTicks } = this.descriptor;
    let rest = ticks;
    while (rest > unit.max) {
      if (!this.pushBit(bit)) {
        return false;
      }
      rest -= unitTicks;
    }
    return within(unit, rest) && this.pushBit(bit);
  }
}

export class RcmmTrack extends CandidateTrack {
  private pendingPulse = 0;

  constructor(
    public descriptor: RcmmDescriptor,
    table: TimingTable,
    startTick: number
  ) {
    super(table, startTick);
  }

  begin(): boolean {
    return true;
  }

  protected onPulse(pulse: number): void {
    this.pendingPulse = pulse;
    if (this.bitIndex !== this.descriptor.maxLength) {
      return;
    }
    if (matchStop(this.descriptor, pulse)) {
      this.status = this.canPromote() ? 'stop-pending' : 'complete';
    } else if (!this.canPromote()) {
      this.die();
    }
  }

  protected onPause(pause: number): void {
    this.status = 'running';
    const symbol = classifyRcmmSymbol(this.descriptor, pause);
    if (!within(this.descriptor.pulse, this.pendingPulse) || symbol === null) {
      this.die();
      return;
    }
    if (!this.pushBit(symbol >> 1) || !this.pushBit(symbol & 1)) {
      this.die();
    }
  }

  protected pauseCeiling(): number {
    const next = this.status === 'stop-pending' ? this.table.promotionOf(this.descriptor) : null;
    const symbols = next !== null && next.encoding === 'rcmm' ? next.symbols : this.descriptor.symbols;
    return Math.max(...symbols.map(window => window.max));
  }

  protected promote(): boolean {
    const next = this.table.promotionOf(this.descriptor);
    if (next === null || next.encoding !== 'rcmm') {
      return false;
    }
    this.descriptor = next;
    return true;
  }
}

// Pauses of the three start pairs that follow the one matched at the start bit
const BANG_OLUFSEN_START: readonly ('zero' | 'start3')[] = ['zero', 'start3', 'zero'];

export class BangOlufsenTrack extends CandidateTrack {
  private pendingPulse = 0;
  private startStep = 0;
  private trailerSeen = false;
  private lastBit = 0;

  constructor(
    public descriptor: BangOlufsenDescriptor,
    table: TimingTable,
    startTick: number
  ) {
    super(table, startTick);
  }

  begin(): boolean {
    return true;
  }

  protected onPulse(pulse: number): void {
    this.pendingPulse = pulse;
    if (this.trailerSeen) {
      this.status = matchStop(this.descriptor, pulse) ? 'complete' : 'dead';
    }
  }

  protected onPause(pause: number): void {
    const { descriptor } = this;
    this.status = 'running';
    if (!within(descriptor.pulse, this.pendingPulse) || this.trailerSeen) {
      this.die();
      return;
    }

    if (this.startStep < BANG_OLUFSEN_START.length) {
      if (within(descriptor[BANG_OLUFSEN_START[this.startStep]], pause)) {
        this.startStep++;
      } else {
        this.die();
      }
      return;
    }

    switch (classifyBangOlufsen(descriptor, pause)) {
      case 'one':
        this.pushData(1);
        break;
      case 'zero':
        this.pushData(0);
        break;
      case 'repeat':
        // R: same value as the previous data bit
        if (this.bitIndex === 0) {
          this.die();
        } else {
          this.pushData(this.lastBit);
        }
        break;
      case 'trailer':
        if (this.lengthComplete()) {
          this.trailerSeen = true;
        } else {
          this.die();
        }
        break;
      default:
        this.die();
    }
  }

  protected pauseCeiling(): number {
    const { descriptor } = this;
    return this.startStep === 1 ? descriptor.start3.max : descriptor.trailer.max;
  }

  protected promote(): boolean {
    return false;
  }

  private pushData(bit: number): void {
    if (this.pushBit(bit)) {
      this.lastBit = bit;
    } else {
      this.die();
    }
  }
}

export function createTrack(descriptor: ProtocolDescriptor, table: TimingTable, startTick: number): CandidateTrack {
  switch (descriptor.encoding) {
    case 'pulse-distance':
      return new PulseDistanceTrack(descriptor, table, startTick);
    case 'manchester':
      return new ManchesterTrack(descriptor, table, startTick);
    case 'serial':
      return new SerialTrack(descriptor, table, startTick);
    case 'rcmm':
      return new RcmmTrack(descriptor, table, startTick);
    case 'bang-olufsen':
      return new BangOlufsenTrack(descriptor, table, startTick);
  }
}
