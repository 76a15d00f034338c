import { createRoundSnapshot, type KillFeedEntry, type RoundSnapshot } from '../src/domain/roundSnapshot.js';
import type { HudReading } from '../src/sensors/hudReading.js';

export const PLAYER = 'Target';

export function own(victim: string, killer = 'enemy'): KillFeedEntry {
  return { killer, victim, victimWasOwnTeam: true };
}

export function enemy(victim: string, killer = 'mate'): KillFeedEntry {
  return { killer, victim, victimWasOwnTeam: false };
}

export function snap(
  monitored: number,
  opposing: number,
  opts: { dead?: boolean; t?: number; feed?: KillFeedEntry[] } = {}
): RoundSnapshot {
  return createRoundSnapshot({
    teamAliveCounts: { monitored, opposing },
    killFeedEntries: opts.feed ?? [],
    playerIsDead: opts.dead ?? false,
    timestamp: opts.t ?? 0,
  });
}

export function reading(
  capturedAt: number,
  monitored: number,
  opposing: number,
  opts: Partial<Omit<HudReading, 'capturedAt' | 'teamAliveCounts'>> = {}
): HudReading {
  return {
    capturedAt,
    teamAliveCounts: { monitored, opposing },
    killFeed: [],
    playerIsDead: false,
    ...opts,
  };
}
