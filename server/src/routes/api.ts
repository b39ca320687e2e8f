/**
 * HTTP API
 * Status and control endpoints mirroring the WebSocket client messages.
 */

import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ResourceBusyError, VigilError } from '../errors.js';
import type { Orchestrator } from '../orchestrator/index.js';
import type { Timeline } from '../timeline/Timeline.js';

const kindParam = z.object({ kind: z.enum(['mic', 'speaker', 'camera']) });
const modalityParam = z.object({ modality: z.enum(['voice', 'face']) });

function sendError(res: Response, err: unknown): void {
  if (err instanceof ResourceBusyError) {
    res.status(409).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof VigilError) {
    res.status(503).json({ error: err.message, code: err.code });
    return;
  }
  logger.error('API', 'Request failed', err);
  res.status(500).json({ error: 'Internal error' });
}

export function createApiRouter(orchestrator: Orchestrator, timeline: Timeline): express.Router {
  const router = express.Router();

  /**
   * GET /status
   * Stage, security overlay, resources and worker states
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(orchestrator.getStatus());
  });

  /**
   * GET /timeline
   */
  router.get('/timeline', (_req: Request, res: Response) => {
    res.json({ entries: timeline.list() });
  });

  /**
   * POST /wake
   * Same acceptance rules as a spoken wake phrase; 202 because the wake may
   * still be dropped.
   */
  router.post('/wake', (_req: Request, res: Response) => {
    orchestrator.wake('ui');
    res.status(202).json({ accepted: true });
  });

  router.post('/security/clear', (_req: Request, res: Response) => {
    const cleared = orchestrator.clearSecurity();
    res.json({ cleared, security: orchestrator.getSecurity() });
  });

  router.post('/resources/:kind/reset', async (req: Request, res: Response) => {
    const params = kindParam.safeParse(req.params);
    if (!params.success) {
      res.status(400).json({ error: 'Unknown resource kind' });
      return;
    }
    try {
      const ok = await orchestrator.resetResource(params.data.kind);
      res.json({ kind: params.data.kind, ok });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /enroll/:modality
   * Blocks until the profile is recorded and saved.
   */
  router.post('/enroll/:modality', async (req: Request, res: Response) => {
    const params = modalityParam.safeParse(req.params);
    if (!params.success) {
      res.status(400).json({ error: 'Modality must be voice or face' });
      return;
    }
    try {
      const profile = await orchestrator.enroll(params.data.modality);
      res.json({ modality: profile.modality, samples: profile.samples, createdAt: profile.createdAt });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
