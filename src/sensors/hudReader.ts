import { ZodError } from 'zod';
import type { KillFeedOrder } from '../config/index.js';
import { HudReadError } from '../domain/errors.js';
import { classifyRoundPhase, parseRoundInfo, type RoundInfo } from '../domain/roundInfo.js';
import { createRoundSnapshot, type RoundSnapshot } from '../domain/roundSnapshot.js';
import { logger } from '../utils/logger.js';
import type { HudReading } from './hudReading.js';
import type { HudReader } from './types.js';

/**
 * HudReader over readings that were extracted out of process. Normalizes the kill feed to
 * oldest-first, which is what team-diff reconstruction replays.
 */
export class PushedHudReader implements HudReader<HudReading> {
  constructor(private readonly killFeedOrder: KillFeedOrder) {}

  readRoundSnapshot(reading: HudReading): RoundSnapshot {
    const killFeedEntries = this.killFeedOrder === 'newest_first' ? [...reading.killFeed].reverse() : reading.killFeed;

    try {
      return createRoundSnapshot({
        teamAliveCounts: reading.teamAliveCounts,
        killFeedEntries,
        playerIsDead: reading.playerIsDead,
        timestamp: reading.capturedAt,
        roundInfo: this.readRoundInfo(reading),
      });
    } catch (err) {
      if (err instanceof ZodError) {
        throw new HudReadError('HUD reading does not form a valid snapshot', {
          capturedAt: reading.capturedAt,
          issues: err.issues,
        });
      }
      throw err;
    }
  }

  isMidRound(reading: HudReading): boolean {
    const phase = reading.roundPhase ?? classifyRoundPhase(reading.bannerText ?? []);
    return phase === 'MID_ROUND';
  }

  // Round info is decoration for notifications; an unreadable score bar doesn't drop the frame.
  private readRoundInfo(reading: HudReading): RoundInfo | undefined {
    if (!reading.roundInfoText) return undefined;
    try {
      return parseRoundInfo(reading.roundInfoText);
    } catch (err) {
      if (!(err instanceof HudReadError)) throw err;
      logger.warn('round_info_unreadable', { capturedAt: reading.capturedAt, reason: err.message });
      return undefined;
    }
  }
}
