// Core interfaces and base classes for the IR decoder

/**
 * Decoder statistics for monitoring and diagnostics
 *
 * 破棄理由ごとに数える。addSample() からは例外を投げないため、失敗はここでしか観測できない。
 */
export interface DecoderStatistics {
  readonly framesDecoded: number;
  readonly timingMismatches: number;      // no window matched, or darkness ran into the timeout
  readonly integrityFailures: number;     // complement / parity / checksum rejected the frame
  readonly ambiguousFrames: number;       // several protocols completed the same frame
  readonly repetitionsSuppressed: number; // in-press duplicates and unmatched repeat frames
}

/*
 * Internal mutable statistics (for implementation use)
 */
export interface MutableDecoderStatistics {
  framesDecoded: number;
  timingMismatches: number;
  integrityFailures: number;
  ambiguousFrames: number;
  repetitionsSuppressed: number;
}

export function createDecoderStatistics(): MutableDecoderStatistics {
  return {
    framesDecoded: 0,
    timingMismatches: 0,
    integrityFailures: 0,
    ambiguousFrames: 0,
    repetitionsSuppressed: 0
  };
}

// Base event class
export class Event {
  constructor(public readonly data: unknown = null) {}
}

// Event system base class
export abstract class EventEmitter {
  private listeners = new Map<string, Array<(_event: Event) => void>>();

  on(eventName: string, callback: (_event: Event) => void): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      eventListeners.push(callback);
    } else {
      this.listeners.set(eventName, [callback]);
    }
  }

  off(eventName: string, callback: (_event: Event) => void): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      const index = eventListeners.indexOf(callback);
      if (index !== -1) {
        eventListeners.splice(index, 1);
      }
    }
  }

  emit(eventName: string, event: Event = new Event()): void {
    const eventListeners = this.listeners.get(eventName);
    if (eventListeners) {
      // snapshot: a listener may unsubscribe itself
      [...eventListeners].forEach(callback => callback(event));
    }
  }

  removeAllListeners(eventName?: string): void {
    if (eventName) {
      this.listeners.delete(eventName);
    } else {
      this.listeners.clear();
    }
  }

  listenerCount(eventName: string): number {
    return this.listeners.get(eventName)?.length ?? 0;
  }
}
