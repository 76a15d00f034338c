import { RingBuffer } from '../utils/ringBuffer.js';
import { logger } from '../utils/logger.js';
import type { HudReading } from './hudReading.js';
import type { FrameSource } from './types.js';

export type EnqueueResult =
  | { accepted: true; depth: number; evictedCapturedAt?: number }
  | { accepted: false; reason: 'out_of_order'; lastCapturedAt: number };

/**
 * Bounded FIFO of pushed HUD readings; the monitor drains it in arrival order.
 * When the monitor falls behind, the oldest readings are dropped first.
 */
export class HudFrameQueue implements FrameSource<HudReading> {
  private readings: RingBuffer<HudReading>;
  private lastCapturedAt: number | undefined;
  private received = 0;
  private evicted = 0;

  constructor(capacity: number) {
    this.readings = new RingBuffer<HudReading>(capacity);
  }

  push(reading: HudReading): EnqueueResult {
    // Readings must not go back in time: elapsed-time checks assume ordered timestamps.
    if (this.lastCapturedAt !== undefined && reading.capturedAt < this.lastCapturedAt) {
      return { accepted: false, reason: 'out_of_order', lastCapturedAt: this.lastCapturedAt };
    }
    this.lastCapturedAt = reading.capturedAt;
    this.received++;

    const { evicted } = this.readings.push(reading);
    if (evicted) {
      this.evicted++;
      logger.warn('hud_reading_evicted', {
        capturedAt: evicted.capturedAt,
        capacity: this.readings.maxSize,
        reason: 'monitor_behind',
      });
      return { accepted: true, depth: this.readings.length, evictedCapturedAt: evicted.capturedAt };
    }
    return { accepted: true, depth: this.readings.length };
  }

  async pollFrame(): Promise<HudReading | undefined> {
    return this.readings.shift();
  }

  /** Drops queued readings and forgets the last timestamp (a new capture session may restart its clock). */
  reset(): void {
    this.readings.clear();
    this.lastCapturedAt = undefined;
  }

  status(): { depth: number; capacity: number; received: number; evicted: number; lastCapturedAt?: number } {
    return {
      depth: this.readings.length,
      capacity: this.readings.maxSize,
      received: this.received,
      evicted: this.evicted,
      lastCapturedAt: this.lastCapturedAt,
    };
  }
}
