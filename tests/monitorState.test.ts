import { describe, it, expect } from 'vitest';
import type { DeathRecord } from '../src/domain/deathDetector.js';
import { StateInvariantViolation } from '../src/domain/errors.js';
import type { RoundSnapshot } from '../src/domain/roundSnapshot.js';
import { advanceMonitor, INITIAL_MONITOR_STATE, type MonitorState } from '../src/monitor/monitorState.js';
import { enemy, own, PLAYER, snap } from './fixtures.js';

const ctx = { playerName: PLAYER, policy: { tradeWindowMs: 3000, minDeathTeamDiff: -1 } };
const death: DeathRecord = { teamDiffAtDeath: -1, latchedAt: 1000, source: 'single_death' };
const latched: MonitorState = { kind: 'ANALYZING', death };

describe('advanceMonitor', () => {
  it('moves to ANALYZING when a death is detected', () => {
    const step = advanceMonitor(
      INITIAL_MONITOR_STATE,
      { prev: snap(5, 5, { t: 900 }), cur: snap(4, 5, { dead: true, t: 1000 }), midRound: true },
      ctx
    );
    expect(step.state).toEqual(latched);
    expect(step.events).toEqual([
      { type: 'death_latched', record: { teamDiffAtDeath: -1, latchedAt: 1000, source: 'single_death' } },
    ]);
  });

  it('stays in MONITORING while the player is alive', () => {
    const step = advanceMonitor(INITIAL_MONITOR_STATE, { prev: snap(5, 5), cur: snap(4, 5), midRound: true }, ctx);
    expect(step).toEqual({ state: INITIAL_MONITOR_STATE, events: [] });
  });

  it('remains ANALYZING while the trade window is open', () => {
    const step = advanceMonitor(latched, { prev: snap(4, 5), cur: snap(4, 5, { dead: true, t: 2000 }), midRound: true }, ctx);
    expect(step).toEqual({ state: latched, events: [] });
  });

  it('returns to MONITORING on a trade and remembers the life was judged', () => {
    const step = advanceMonitor(latched, { prev: snap(4, 5), cur: snap(4, 4, { dead: true, t: 2000 }), midRound: true }, ctx);
    expect(step.state).toEqual({ kind: 'MONITORING', lifeSpent: true });
    expect(step.events).toEqual([
      { type: 'trade_confirmed', death, teamDiff: 0, elapsedMs: 1000 },
    ]);
  });

  it('emits an overheat when the window expires', () => {
    const cur = snap(4, 5, { dead: true, t: 4500 });
    const step = advanceMonitor(latched, { prev: snap(4, 5), cur, midRound: true }, ctx);
    expect(step.state).toEqual({ kind: 'MONITORING', lifeSpent: true });
    expect(step.events).toHaveLength(1);
    expect(step.events[0]).toMatchObject({ type: 'overheat', teamDiff: -1, elapsedMs: 3500 });
  });

  it('drops a latched death when the round leaves mid-round, even past the window', () => {
    const step = advanceMonitor(latched, { prev: snap(4, 5), cur: snap(4, 5, { dead: true, t: 9000 }), midRound: false }, ctx);
    expect(step.state).toEqual({ kind: 'MONITORING', lifeSpent: true });
    expect(step.events).toEqual([
      { type: 'round_reset', discarded: { teamDiffAtDeath: -1, latchedAt: 1000, source: 'single_death' } },
    ]);
  });

  it('does not detect deaths outside mid-round', () => {
    const step = advanceMonitor(
      INITIAL_MONITOR_STATE,
      { prev: snap(5, 5), cur: snap(4, 5, { dead: true }), midRound: false },
      ctx
    );
    expect(step).toEqual({ state: { kind: 'MONITORING', lifeSpent: true }, events: [] });
  });

  it('re-arms detection when a new round starts with the player alive', () => {
    const spent: MonitorState = { kind: 'MONITORING', lifeSpent: true };
    const step = advanceMonitor(spent, { prev: snap(3, 5, { dead: true }), cur: snap(5, 5), midRound: false }, ctx);
    expect(step).toEqual({ state: { kind: 'MONITORING', lifeSpent: false }, events: [] });
  });

  it('does not latch the same life twice', () => {
    const spent: MonitorState = { kind: 'MONITORING', lifeSpent: true };
    const step = advanceMonitor(spent, { prev: snap(4, 5, { dead: true }), cur: snap(3, 5, { dead: true }), midRound: true }, ctx);
    expect(step).toEqual({ state: spent, events: [] });
  });

  it('re-arms detection once the player is seen alive', () => {
    const spent: MonitorState = { kind: 'MONITORING', lifeSpent: true };
    const step = advanceMonitor(spent, { prev: snap(4, 5), cur: snap(4, 5), midRound: true }, ctx);
    expect(step.state).toEqual({ kind: 'MONITORING', lifeSpent: false });
  });

  it('does not latch a death that was already on screen in the previous frame', () => {
    const feed = [enemy('e1'), own(PLAYER)];
    const step = advanceMonitor(
      INITIAL_MONITOR_STATE,
      { prev: snap(4, 4, { dead: true, t: 0, feed }), cur: snap(4, 4, { dead: true, t: 100, feed }), midRound: true },
      ctx
    );
    expect(step).toEqual({ state: { kind: 'MONITORING', lifeSpent: true }, events: [] });
  });

  it('marks the life as judged when the death is below the threshold', () => {
    const step = advanceMonitor(
      INITIAL_MONITOR_STATE,
      { prev: snap(3, 5), cur: snap(2, 5, { dead: true, t: 70 }), midRound: true },
      ctx
    );
    expect(step.state).toEqual({ kind: 'MONITORING', lifeSpent: true });
    expect(step.events).toEqual([{ type: 'death_skipped', teamDiffAtDeath: -3, source: 'single_death', at: 70 }]);
  });

  it('propagates invariant violations from classification', () => {
    const cur: RoundSnapshot = {
      teamAliveCounts: { monitored: 7, opposing: 3 },
      killFeedEntries: [],
      playerIsDead: true,
      timestamp: 2000,
    };
    expect(() => advanceMonitor(latched, { prev: snap(4, 5), cur, midRound: true }, ctx)).toThrow(StateInvariantViolation);
  });
});
