import type { RoundSnapshot } from './roundSnapshot.js';
import { reconstructTeamDiff, type TeamDiffSource } from './teamDiff.js';

export type DeathPolicy = {
  /** Deaths below this differential are not candidates (default -1: down 2+ is already lost). */
  minDeathTeamDiff: number;
};

export type DeathRecord = Readonly<{
  teamDiffAtDeath: number;
  latchedAt: number;
  source: TeamDiffSource;
}>;

export type DeathCheck =
  | { outcome: 'alive' }
  | { outcome: 'below_threshold'; teamDiffAtDeath: number; source: TeamDiffSource }
  | { outcome: 'latched'; record: DeathRecord };

/**
 * Same as `detectDeath`, but tells apart "player is alive" from "died in an already
 * lost fight" so the loop can stop looking for this life's death.
 */
export function checkDeath(playerName: string, prev: RoundSnapshot, cur: RoundSnapshot, policy: DeathPolicy): DeathCheck {
  if (!cur.playerIsDead) return { outcome: 'alive' };

  const { teamDiff, source } = reconstructTeamDiff(playerName, prev, cur);
  if (teamDiff < policy.minDeathTeamDiff) {
    return { outcome: 'below_threshold', teamDiffAtDeath: teamDiff, source };
  }

  return {
    outcome: 'latched',
    record: Object.freeze({ teamDiffAtDeath: teamDiff, latchedAt: cur.timestamp, source }),
  };
}

/**
 * Death record for the transition prev -> cur, or undefined when the player is alive or
 * the death isn't a candidate for the overheat judgement. Pure; latching once is the
 * caller's job.
 */
export function detectDeath(
  playerName: string,
  prev: RoundSnapshot,
  cur: RoundSnapshot,
  policy: DeathPolicy
): DeathRecord | undefined {
  const check = checkDeath(playerName, prev, cur, policy);
  return check.outcome === 'latched' ? check.record : undefined;
}
