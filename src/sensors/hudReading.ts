import { z } from 'zod';
import { KillFeedEntrySchema, TeamAliveCountsSchema } from '../domain/roundSnapshot.js';
import { RoundPhaseSchema } from '../domain/roundInfo.js';

/**
 * One HUD reading as posted by the external vision process (capture + OCR + icon matching
 * happen there). This is the "frame" the monitor polls.
 */
export const HudReadingSchema = z.object({
  /** Capture time in ms, monotonic for one capture session. */
  capturedAt: z.number().finite(),
  teamAliveCounts: TeamAliveCountsSchema,
  /** In the order the reader lists them; see HUD_KILL_FEED_ORDER. */
  killFeed: z.array(KillFeedEntrySchema).default([]),
  playerIsDead: z.boolean(),
  /**
   * Either an already classified phase, or the raw banner words and we classify them.
   * Neither means the round is live.
   */
  roundPhase: RoundPhaseSchema.optional(),
  bannerText: z.array(z.string()).optional(),
  /** Score bar texts: own score, clock, opposing score. */
  roundInfoText: z.array(z.string()).optional(),
});

export type HudReading = z.infer<typeof HudReadingSchema>;
