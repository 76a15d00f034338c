import * as dotenv from 'dotenv';
import { logger } from '../utils/logger.js';

dotenv.config();

export type KillFeedOrder = 'oldest_first' | 'newest_first';

function killFeedOrderFromEnv(raw: string | undefined): KillFeedOrder {
  const v = (raw || '').trim().toLowerCase();
  return v === 'newest_first' ? 'newest_first' : 'oldest_first';
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

/** Unset keeps the default; a value that isn't a finite number also does, with a warning. */
export function numberFromEnv(name: string, fallback: number): number {
  const raw = (process.env[name] || '').trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    logger.warn('config_value_invalid', { key: name, value: raw, fallback });
    return fallback;
  }
  return n;
}

export const config = {
  port: numberFromEnv('PORT', 8787),

  // Auth for the vision process pushing HUD readings -> monitor
  monitorToken: process.env.MONITOR_TOKEN || '',

  // Auth for operator-only endpoints (start/stop).
  // Kept separate from MONITOR_TOKEN so the ingest credential can't stop the loop.
  monitorOperatorToken: process.env.MONITOR_OPERATOR_TOKEN || '',

  /** In-game name of the monitored player, matched case-insensitively against kill-feed victims. */
  playerName: (process.env.MONITOR_PLAYER_NAME || '').trim(),

  /** Time budget after a death for the team to trade it. */
  tradeWindowMs: numberFromEnv('OVERHEAT_TRADE_WINDOW_MS', 3_000),

  /**
   * Deaths with a team differential below this are not judged
   * (already down 2+ means the fight was lost anyway).
   */
  minDeathTeamDiff: numberFromEnv('OVERHEAT_MIN_DEATH_TEAM_DIFF', -1),

  // Sleep between polls when no reading is queued.
  pollIntervalMs: numberFromEnv('MONITOR_POLL_INTERVAL_MS', 50),

  // Order in which the upstream HUD reader lists kill-feed lines.
  killFeedOrder: killFeedOrderFromEnv(process.env.HUD_KILL_FEED_ORDER),

  hudQueueCapacity: numberFromEnv('HUD_QUEUE_CAPACITY', 64),
  overheatHistoryCapacity: numberFromEnv('OVERHEAT_HISTORY_CAPACITY', 20),

  // Optional webhook for overheat notifications (fire-and-forget).
  overheatWebhookUrl: (process.env.OVERHEAT_WEBHOOK_URL || '').trim(),
  // Bearer for the webhook; separate from MONITOR_TOKEN.
  overheatWebhookToken: process.env.OVERHEAT_WEBHOOK_TOKEN || '',

  // Logging / behavior toggles
  autostart: flag(process.env.MONITOR_AUTOSTART, true), // default: true
  logFrames: flag(process.env.MONITOR_LOG_FRAMES, false), // default: false
};
