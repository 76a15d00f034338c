import type { DeathRecord } from './deathDetector.js';
import { StateInvariantViolation } from './errors.js';
import type { RoundSnapshot } from './roundSnapshot.js';

export type ClassificationResult = 'SAFE_CONTINUE' | 'SAFE_RESET' | 'OVERHEAT';

export type TradePolicy = {
  tradeWindowMs: number;
};

function assertAliveCount(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 5) {
    throw new StateInvariantViolation(`${field} out of range`, { field, value });
  }
}

/**
 * Outcome of the fight after a latched death, judged on a later snapshot.
 * The window is exclusive: exactly `tradeWindowMs` after the death is still in time.
 */
export function classifyOverheat(death: DeathRecord, cur: RoundSnapshot, policy: TradePolicy): ClassificationResult {
  if (!Number.isInteger(death.teamDiffAtDeath)) {
    throw new StateInvariantViolation('death record has no team differential', {
      teamDiffAtDeath: death.teamDiffAtDeath,
    });
  }
  assertAliveCount(cur.teamAliveCounts.monitored, 'teamAliveCounts.monitored');
  assertAliveCount(cur.teamAliveCounts.opposing, 'teamAliveCounts.opposing');

  const elapsedMs = cur.timestamp - death.latchedAt;
  if (!Number.isFinite(elapsedMs) || elapsedMs < 0) {
    throw new StateInvariantViolation('snapshot predates the latched death', {
      latchedAt: death.latchedAt,
      timestamp: cur.timestamp,
    });
  }

  const curDiff = cur.teamAliveCounts.monitored - cur.teamAliveCounts.opposing;
  const tradeAchieved = curDiff > death.teamDiffAtDeath;

  if (elapsedMs > policy.tradeWindowMs && !tradeAchieved) return 'OVERHEAT';
  if (tradeAchieved) return 'SAFE_RESET';
  return 'SAFE_CONTINUE';
}
