import { config } from '../config/index.js';
import { MonitorLoop } from '../monitor/monitorLoop.js';
import { createOverheatNotifier, OverheatHistory } from '../notify/overheatNotifier.js';
import { HudFrameQueue } from '../sensors/hudFrameQueue.js';
import type { HudReading } from '../sensors/hudReading.js';
import { PushedHudReader } from '../sensors/hudReader.js';

export type MonitorServices = {
  frames: HudFrameQueue;
  monitor: MonitorLoop<HudReading>;
  overheats: OverheatHistory;
};

export function createMonitorServices(cfg: typeof config = config): MonitorServices {
  const frames = new HudFrameQueue(cfg.hudQueueCapacity);
  const overheats = new OverheatHistory(cfg.overheatHistoryCapacity);
  const monitor = new MonitorLoop<HudReading>({
    playerName: cfg.playerName,
    policy: { tradeWindowMs: cfg.tradeWindowMs, minDeathTeamDiff: cfg.minDeathTeamDiff },
    frameSource: frames,
    hudReader: new PushedHudReader(cfg.killFeedOrder),
    notifier: createOverheatNotifier({
      history: overheats,
      webhookUrl: cfg.overheatWebhookUrl,
      webhookToken: cfg.overheatWebhookToken || undefined,
    }),
    pollIntervalMs: cfg.pollIntervalMs,
    logFrames: cfg.logFrames,
  });
  return { frames, monitor, overheats };
}
