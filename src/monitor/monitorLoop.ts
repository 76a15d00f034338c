import { StateInvariantViolation } from '../domain/errors.js';
import type { RoundSnapshot } from '../domain/roundSnapshot.js';
import type { OverheatNotifier } from '../notify/overheatNotifier.js';
import type { FrameSource, HudReader } from '../sensors/types.js';
import { logger } from '../utils/logger.js';
import {
  advanceMonitor,
  INITIAL_MONITOR_STATE,
  type MonitorEvent,
  type MonitorPolicy,
  type MonitorState,
  type MonitorStep,
} from './monitorState.js';

export type MonitorLoopOptions<F> = {
  playerName: string;
  policy: MonitorPolicy;
  frameSource: FrameSource<F>;
  hudReader: HudReader<F>;
  notifier: OverheatNotifier;
  /** Sleep between polls when the source has nothing new. */
  pollIntervalMs: number;
  logFrames?: boolean;
};

type MonitorCounters = {
  framesProcessed: number;
  deathsLatched: number;
  deathsSkipped: number;
  tradesConfirmed: number;
  overheats: number;
  roundResets: number;
  hudReadFailures: number;
  invariantViolations: number;
};

export type MonitorStatus = {
  running: boolean;
  playerName: string;
  state: MonitorState['kind'];
  latchedDeath?: { teamDiffAtDeath: number; latchedAt: number };
  startedAt?: number;
  lastFrameAt?: number;
  lastEvent?: MonitorEvent['type'];
  lastError?: string;
  counters: MonitorCounters;
};

export type StartResult = { started: true } | { started: false; reason: 'already_running' };

function emptyCounters(): MonitorCounters {
  return {
    framesProcessed: 0,
    deathsLatched: 0,
    deathsSkipped: 0,
    tradesConfirmed: 0,
    overheats: 0,
    roundResets: 0,
    hudReadFailures: 0,
    invariantViolations: 0,
  };
}

/**
 * Polls frames, runs them through the overheat state machine in arrival order and owns the
 * latched death between polls. One worker per handle: start() while running is rejected.
 */
export class MonitorLoop<F> {
  private state: MonitorState = INITIAL_MONITOR_STATE;
  private prev: RoundSnapshot | undefined;
  private counters: MonitorCounters = emptyCounters();
  private worker: Promise<void> | null = null;
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private startedAt?: number;
  private lastEvent?: MonitorEvent['type'];
  private lastError?: string;

  constructor(private readonly opts: MonitorLoopOptions<F>) {}

  get isRunning(): boolean {
    return this.worker !== null;
  }

  getStatus(): MonitorStatus {
    return {
      running: this.isRunning,
      playerName: this.opts.playerName,
      state: this.state.kind,
      latchedDeath:
        this.state.kind === 'ANALYZING'
          ? { teamDiffAtDeath: this.state.death.teamDiffAtDeath, latchedAt: this.state.death.latchedAt }
          : undefined,
      startedAt: this.startedAt,
      lastFrameAt: this.prev?.timestamp,
      lastEvent: this.lastEvent,
      lastError: this.lastError,
      counters: { ...this.counters },
    };
  }

  start(): StartResult {
    if (this.worker) {
      logger.warn('monitor_start_rejected', { reason: 'already_running', player: this.opts.playerName });
      return { started: false, reason: 'already_running' };
    }

    // Each run starts clean: a previous session's latched death means nothing now.
    this.state = INITIAL_MONITOR_STATE;
    this.prev = undefined;
    this.counters = emptyCounters();
    this.lastEvent = undefined;
    this.lastError = undefined;
    this.stopRequested = false;
    this.startedAt = Date.now();

    logger.info('monitor_started', {
      player: this.opts.playerName,
      tradeWindowMs: this.opts.policy.tradeWindowMs,
      minDeathTeamDiff: this.opts.policy.minDeathTeamDiff,
      pollIntervalMs: this.opts.pollIntervalMs,
    });

    this.worker = this.run().finally(() => {
      this.worker = null;
      logger.info('monitor_stopped', { player: this.opts.playerName, ...this.counters });
    });
    return { started: true };
  }

  /** Cooperative: the worker finishes the frame it is on, then exits. */
  async stop(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.stopRequested = true;
    this.wake?.();
    await worker;
  }

  /**
   * Runs one frame through the machine. Synchronous; returns the events it produced.
   * A HUD read failure skips the frame; an invariant violation keeps the current state and
   * the previous snapshot so the next frame retries.
   */
  processFrame(frame: F): MonitorEvent[] {
    let cur: RoundSnapshot;
    let midRound: boolean;
    try {
      cur = this.opts.hudReader.readRoundSnapshot(frame);
      midRound = this.opts.hudReader.isMidRound(frame);
    } catch (err) {
      this.counters.hudReadFailures++;
      this.lastError = String(err);
      logger.warn('hud_read_failed', { err: String(err) });
      return [];
    }

    this.counters.framesProcessed++;
    if (this.opts.logFrames) {
      logger.info('frame_read', {
        timestamp: cur.timestamp,
        alive: cur.teamAliveCounts,
        playerIsDead: cur.playerIsDead,
        killFeed: cur.killFeedEntries.length,
        midRound,
        state: this.state.kind,
      });
    }

    const prev = this.prev;
    if (!prev) {
      // Nothing to bracket a death with yet. Dead already means this life is not ours to judge.
      this.prev = cur;
      this.state = { kind: 'MONITORING', lifeSpent: cur.playerIsDead };
      return [];
    }

    let step: MonitorStep;
    try {
      step = advanceMonitor(this.state, { prev, cur, midRound }, { playerName: this.opts.playerName, policy: this.opts.policy });
    } catch (err) {
      if (!(err instanceof StateInvariantViolation)) throw err;
      this.counters.invariantViolations++;
      this.lastError = err.message;
      logger.warn('classification_aborted', { reason: err.message, ...err.details, state: this.state.kind });
      return [];
    }

    this.state = step.state;
    this.prev = cur;
    for (const event of step.events) this.handleEvent(event);
    return step.events;
  }

  private handleEvent(event: MonitorEvent): void {
    this.lastEvent = event.type;

    switch (event.type) {
      case 'death_latched':
        this.counters.deathsLatched++;
        if (event.record.source === 'feed_fallback') {
          logger.warn('team_diff_feed_fallback', { player: this.opts.playerName, teamDiff: event.record.teamDiffAtDeath });
        }
        logger.info('death_latched', { ...event.record });
        return;
      case 'death_skipped':
        this.counters.deathsSkipped++;
        if (event.source === 'feed_fallback') {
          logger.warn('team_diff_feed_fallback', { player: this.opts.playerName, teamDiff: event.teamDiffAtDeath });
        }
        logger.info('death_skipped', {
          teamDiffAtDeath: event.teamDiffAtDeath,
          minDeathTeamDiff: this.opts.policy.minDeathTeamDiff,
          at: event.at,
        });
        return;
      case 'trade_confirmed':
        this.counters.tradesConfirmed++;
        logger.info('trade_confirmed', {
          teamDiffAtDeath: event.death.teamDiffAtDeath,
          teamDiff: event.teamDiff,
          elapsedMs: event.elapsedMs,
        });
        return;
      case 'overheat':
        this.counters.overheats++;
        this.notify(event);
        return;
      case 'round_reset':
        this.counters.roundResets++;
        logger.info('round_reset', { discardedDeathAt: event.discarded.latchedAt });
        return;
    }
  }

  private notify(event: Extract<MonitorEvent, { type: 'overheat' }>): void {
    try {
      this.opts.notifier.notifyOverheat({
        playerName: this.opts.playerName,
        detectedAt: event.snapshot.timestamp,
        latchedAt: event.death.latchedAt,
        elapsedMs: event.elapsedMs,
        teamDiffAtDeath: event.death.teamDiffAtDeath,
        teamDiffNow: event.teamDiff,
        source: event.death.source,
        round: event.snapshot.roundInfo,
      });
    } catch (err) {
      logger.error('overheat_notify_failed', { err: String(err) });
    }
  }

  private async run(): Promise<void> {
    while (!this.stopRequested) {
      try {
        const frame = await this.opts.frameSource.pollFrame();
        if (frame === undefined) {
          await this.sleep(this.opts.pollIntervalMs);
          continue;
        }
        this.processFrame(frame);
      } catch (err) {
        this.lastError = String(err);
        logger.error('monitor_tick_failed', { err: String(err) });
        await this.sleep(this.opts.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopRequested) return Promise.resolve();
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
