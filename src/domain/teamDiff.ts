import type { RoundSnapshot } from './roundSnapshot.js';
import { teamDiffOf } from './roundSnapshot.js';

/**
 * Where a reconstructed differential came from.
 * - single_death: exactly one net death between the snapshots, so it was the player's.
 * - feed_match: kill-feed replay reached the line with the player as victim.
 * - feed_fallback: replay never saw the player; value is the end-of-feed differential.
 */
export type TeamDiffSource = 'single_death' | 'feed_match' | 'feed_fallback';

export type TeamDiffAtDeath = {
  teamDiff: number;
  source: TeamDiffSource;
};

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Team differential right after `playerName` died, given snapshots taken just before and
 * just after the death.
 *
 * Alive counts alone can't order several kills landing in one sampling gap, so in that case
 * the feed of `after` is replayed from the `before` differential. The feed must be oldest
 * first (see RoundSnapshot).
 */
export function reconstructTeamDiff(playerName: string, before: RoundSnapshot, after: RoundSnapshot): TeamDiffAtDeath {
  const diffBefore = teamDiffOf(before);
  const diffAfter = teamDiffOf(after);

  if (diffAfter === diffBefore - 1) {
    return { teamDiff: diffAfter, source: 'single_death' };
  }

  let running = diffBefore;
  for (const entry of after.killFeedEntries) {
    running = entry.victimWasOwnTeam ? running - 1 : running + 1;
    if (sameName(entry.victim, playerName)) {
      return { teamDiff: running, source: 'feed_match' };
    }
  }

  return { teamDiff: running, source: 'feed_fallback' };
}
