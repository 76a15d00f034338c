import { checkDeath, type DeathPolicy, type DeathRecord } from '../domain/deathDetector.js';
import { classifyOverheat, type TradePolicy } from '../domain/overheatClassifier.js';
import { teamDiffOf, type RoundSnapshot } from '../domain/roundSnapshot.js';
import type { TeamDiffSource } from '../domain/teamDiff.js';

export type MonitorPolicy = DeathPolicy & TradePolicy;

export type MonitorState =
  /** lifeSpent: this life's death was already judged; wait for the player to be alive again. */
  | { kind: 'MONITORING'; lifeSpent: boolean }
  | { kind: 'ANALYZING'; death: DeathRecord };

export const INITIAL_MONITOR_STATE: MonitorState = { kind: 'MONITORING', lifeSpent: false };

export type MonitorInput = {
  prev: RoundSnapshot;
  cur: RoundSnapshot;
  midRound: boolean;
};

export type MonitorContext = {
  playerName: string;
  policy: MonitorPolicy;
};

export type MonitorEvent =
  | { type: 'round_reset'; discarded: DeathRecord }
  | { type: 'death_latched'; record: DeathRecord }
  | { type: 'death_skipped'; teamDiffAtDeath: number; source: TeamDiffSource; at: number }
  | { type: 'trade_confirmed'; death: DeathRecord; teamDiff: number; elapsedMs: number }
  | { type: 'overheat'; death: DeathRecord; snapshot: RoundSnapshot; teamDiff: number; elapsedMs: number };

export type MonitorStep = {
  state: MonitorState;
  events: MonitorEvent[];
};

function monitoring(lifeSpent: boolean): MonitorState {
  return { kind: 'MONITORING', lifeSpent };
}

function onAnalyzing(state: Extract<MonitorState, { kind: 'ANALYZING' }>, cur: RoundSnapshot, ctx: MonitorContext): MonitorStep {
  const verdict = classifyOverheat(state.death, cur, ctx.policy);
  const teamDiff = teamDiffOf(cur);
  const elapsedMs = cur.timestamp - state.death.latchedAt;

  switch (verdict) {
    case 'SAFE_CONTINUE':
      return { state, events: [] };
    case 'SAFE_RESET':
      return {
        state: monitoring(cur.playerIsDead),
        events: [{ type: 'trade_confirmed', death: state.death, teamDiff, elapsedMs }],
      };
    case 'OVERHEAT':
      return {
        state: monitoring(cur.playerIsDead),
        events: [{ type: 'overheat', death: state.death, snapshot: cur, teamDiff, elapsedMs }],
      };
  }
}

function onMonitoring(
  state: Extract<MonitorState, { kind: 'MONITORING' }>,
  prev: RoundSnapshot,
  cur: RoundSnapshot,
  ctx: MonitorContext
): MonitorStep {
  if (!cur.playerIsDead) return { state: state.lifeSpent ? monitoring(false) : state, events: [] };
  if (state.lifeSpent) return { state, events: [] };
  // Only an alive -> dead pair brackets the death; dead on both sides means it happened unseen.
  if (prev.playerIsDead) return { state: monitoring(true), events: [] };

  const check = checkDeath(ctx.playerName, prev, cur, ctx.policy);
  switch (check.outcome) {
    case 'alive':
      return { state, events: [] };
    case 'below_threshold':
      return {
        state: monitoring(true),
        events: [{ type: 'death_skipped', teamDiffAtDeath: check.teamDiffAtDeath, source: check.source, at: cur.timestamp }],
      };
    case 'latched':
      return { state: { kind: 'ANALYZING', death: check.record }, events: [{ type: 'death_latched', record: check.record }] };
  }
}

/**
 * One transition of the MONITORING/ANALYZING machine. Pure: same inputs, same step.
 *
 * Leaving mid-round always lands in MONITORING and drops any latched death. Classification
 * errors (StateInvariantViolation) propagate without a step; the caller keeps its state.
 */
export function advanceMonitor(state: MonitorState, input: MonitorInput, ctx: MonitorContext): MonitorStep {
  const { prev, cur, midRound } = input;

  // A player still dead at the boundary died in the round that just ended.
  if (!midRound) {
    const next = monitoring(cur.playerIsDead);
    if (state.kind === 'ANALYZING') {
      return { state: next, events: [{ type: 'round_reset', discarded: state.death }] };
    }
    return { state: state.lifeSpent === cur.playerIsDead ? state : next, events: [] };
  }

  switch (state.kind) {
    case 'ANALYZING':
      return onAnalyzing(state, cur, ctx);
    case 'MONITORING':
      return onMonitoring(state, prev, cur, ctx);
  }
}
