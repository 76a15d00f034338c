import type { RoundSnapshot } from '../domain/roundSnapshot.js';

/** Produces one frame per poll; undefined when nothing new was captured yet. */
export interface FrameSource<F> {
  pollFrame(): Promise<F | undefined>;
}

/**
 * Turns a frame into structured HUD state. Must either return a complete, validated
 * snapshot or throw; the core never sees partial readings.
 */
export interface HudReader<F> {
  readRoundSnapshot(frame: F): RoundSnapshot;
  isMidRound(frame: F): boolean;
}
