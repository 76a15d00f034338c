import { z } from 'zod';

const AliveCount = z.number().int().min(0).max(5);

export const TeamAliveCountsSchema = z.object({
  monitored: AliveCount,
  opposing: AliveCount,
});

export const KillFeedEntrySchema = z.object({
  killer: z.string(),
  victim: z.string(),
  /** True when the victim belongs to the monitored team. */
  victimWasOwnTeam: z.boolean(),
});

export const RoundSnapshotSchema = z.object({
  teamAliveCounts: TeamAliveCountsSchema,
  /**
   * Oldest event first. Readers that see the feed newest-first must reverse it
   * before building a snapshot; reconstruction replays this array in order.
   */
  killFeedEntries: z.array(KillFeedEntrySchema),
  playerIsDead: z.boolean(),
  /** Monotonic capture time in ms. */
  timestamp: z.number().finite(),
  roundInfo: z
    .object({
      currentRound: z.number().int().positive(),
      roundTimeSec: z.number().int().nonnegative(),
      score: z.string(),
    })
    .optional(),
});

export type TeamAliveCounts = Readonly<z.infer<typeof TeamAliveCountsSchema>>;
export type KillFeedEntry = Readonly<z.infer<typeof KillFeedEntrySchema>>;

export type RoundSnapshot = {
  readonly teamAliveCounts: TeamAliveCounts;
  readonly killFeedEntries: readonly KillFeedEntry[];
  readonly playerIsDead: boolean;
  readonly timestamp: number;
  readonly roundInfo?: Readonly<NonNullable<z.infer<typeof RoundSnapshotSchema>['roundInfo']>>;
};

/**
 * Validates already-extracted HUD values and freezes them. Throws a ZodError on bad input;
 * no sensing happens here.
 */
export function createRoundSnapshot(input: z.input<typeof RoundSnapshotSchema>): RoundSnapshot {
  const parsed = RoundSnapshotSchema.parse(input);
  return Object.freeze({
    teamAliveCounts: Object.freeze(parsed.teamAliveCounts),
    killFeedEntries: Object.freeze(parsed.killFeedEntries.map(e => Object.freeze(e))),
    playerIsDead: parsed.playerIsDead,
    timestamp: parsed.timestamp,
    ...(parsed.roundInfo ? { roundInfo: Object.freeze(parsed.roundInfo) } : {}),
  });
}

/** Monitored alive minus opposing alive. */
export function teamDiffOf(snapshot: RoundSnapshot): number {
  return snapshot.teamAliveCounts.monitored - snapshot.teamAliveCounts.opposing;
}
