import type { RoundInfo } from '../domain/roundInfo.js';
import type { TeamDiffSource } from '../domain/teamDiff.js';
import { RingBuffer } from '../utils/ringBuffer.js';
import { logger } from '../utils/logger.js';

export type OverheatEvent = {
  playerName: string;
  /** Snapshot timestamp at which the trade window was found expired. */
  detectedAt: number;
  latchedAt: number;
  elapsedMs: number;
  teamDiffAtDeath: number;
  teamDiffNow: number;
  /** single_death / feed_match are confident; feed_fallback is a best-effort estimate. */
  source: TeamDiffSource;
  round?: RoundInfo;
};

export interface OverheatNotifier {
  /** Fire-and-forget; must not throw into the monitor loop. */
  notifyOverheat(event: OverheatEvent): void;
}

/**
 * In-memory history of recent overheats (RAM only; a restart clears it).
 */
export class OverheatHistory {
  private buf: RingBuffer<OverheatEvent>;

  constructor(capacity: number = 20) {
    this.buf = new RingBuffer<OverheatEvent>(capacity);
  }

  push(event: OverheatEvent): void {
    this.buf.push(event);
  }

  listNewestFirst(): OverheatEvent[] {
    return this.buf.toArray().reverse();
  }

  latest(): OverheatEvent | undefined {
    return this.buf.newest();
  }

  size(): number {
    return this.buf.length;
  }
}

type WebhookOptions = {
  url: string;
  token?: string;
  timeoutMs?: number;
};

/**
 * POST the event to a webhook. Failures are logged, never retried.
 */
export async function sendOverheatWebhook(event: OverheatEvent, opts: WebhookOptions): Promise<void> {
  const ac = new AbortController();
  const timeout = setTimeout(() => ac.abort(), opts.timeoutMs ?? 2500);

  try {
    const response = await fetch(opts.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(opts.token ? { Authorization: `Bearer ${opts.token}` } : {}),
      },
      body: JSON.stringify(event),
      signal: ac.signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      logger.warn('overheat_webhook_failed', {
        detectedAt: event.detectedAt,
        status: response.status,
        body: text.slice(0, 200),
      });
    } else {
      logger.info('overheat_webhook_sent', { detectedAt: event.detectedAt });
    }
  } catch (err) {
    logger.warn('overheat_webhook_error', { detectedAt: event.detectedAt, error: String(err) });
  } finally {
    clearTimeout(timeout);
  }
}

export function createOverheatNotifier(opts: { history: OverheatHistory; webhookUrl?: string; webhookToken?: string }): OverheatNotifier {
  const { history, webhookUrl, webhookToken } = opts;

  return {
    notifyOverheat(event: OverheatEvent): void {
      logger.info('overheat_detected', {
        player: event.playerName,
        teamDiffAtDeath: event.teamDiffAtDeath,
        teamDiffNow: event.teamDiffNow,
        elapsedMs: event.elapsedMs,
        source: event.source,
        round: event.round?.currentRound,
      });
      history.push(event);

      if (!webhookUrl) return;
      void sendOverheatWebhook(event, { url: webhookUrl, token: webhookToken });
    },
  };
}
