import type { Express } from 'express';
import express from 'express';
import { makeBearerAuth } from './middleware/auth.js';
import type { MonitorServices } from './services.js';
import { HudReadingSchema } from '../sensors/hudReading.js';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

export type RouteTokens = {
  // vision process -> monitor
  ingest: string;
  // operator-only endpoints (start/stop); separate so the ingest credential can't stop the loop
  operator: string;
};

export function registerRoutes(
  app: Express,
  services: MonitorServices,
  tokens: RouteTokens = { ingest: config.monitorToken, operator: config.monitorOperatorToken }
): void {
  const { frames, monitor, overheats } = services;
  const ingestAuth = makeBearerAuth(tokens.ingest);
  const operatorAuth = makeBearerAuth(tokens.operator);

  app.use(express.json({ limit: '256kb' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, ts: Date.now() });
  });

  app.get('/monitor/status', (_req, res) => {
    res.status(200).json({ ok: true, ...monitor.getStatus(), frames: frames.status() });
  });

  app.post('/monitor/start', operatorAuth, (_req, res) => {
    // Readings queued while stopped are stale, and a new capture session may restart its clock.
    if (!monitor.isRunning) frames.reset();
    const out = monitor.start();
    if (!out.started) {
      return res.status(409).json({ ok: false, error: out.reason });
    }
    res.status(200).json({ ok: true });
  });

  app.post('/monitor/stop', operatorAuth, async (_req, res) => {
    const wasRunning = monitor.isRunning;
    try {
      await monitor.stop();
      res.status(200).json({ ok: true, wasRunning });
    } catch (err) {
      res.status(500).json({ ok: false, error: String(err) });
    }
  });

  app.get('/monitor/overheats', (_req, res) => {
    res.status(200).json({ ok: true, items: overheats.listNewestFirst() });
  });

  app.get('/monitor/overheats/latest', (_req, res) => {
    const latest = overheats.latest();
    if (!latest) {
      return res.status(404).json({ error: 'no_overheat' });
    }
    res.status(200).json(latest);
  });

  app.post('/frames', ingestAuth, (req, res) => {
    const parsed = HudReadingSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_payload', issues: parsed.error.issues });
    }

    const out = frames.push(parsed.data);
    if (!out.accepted) {
      logger.warn('hud_reading_rejected', {
        reason: out.reason,
        capturedAt: parsed.data.capturedAt,
        lastCapturedAt: out.lastCapturedAt,
      });
      return res.status(409).json({ error: out.reason, lastCapturedAt: out.lastCapturedAt });
    }

    res.status(202).json({ ok: true, depth: out.depth, monitoring: monitor.isRunning });
  });
}
