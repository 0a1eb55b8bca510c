/**
 * Live Session API Routes
 *
 * Join, chat and leave endpoints for human participants, the SSE stream
 * for viewers and a JSON snapshot of the session.
 */

import { Router, type Request, type Response } from 'express';
import { createLogger } from '../utils/logger.js';
import { ValidationError } from '../types/errors.js';
import type { BroadcastBus } from '../services/broadcast/broadcast-bus.js';
import type { IngressService } from '../services/session/ingress-service.js';
import type { SessionState } from '../services/session/session-state.js';
import type { SSEManager } from '../services/sse/sse-manager.js';

const logger = createLogger({ module: 'session-routes' });

export interface SessionRouteDeps {
  ingress: IngressService;
  sse: SSEManager;
  state: SessionState;
  bus: BroadcastBus;
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(error.issues.length > 0 && { details: error.issues }),
    });
    return;
  }

  logger.error({ error }, 'Session request failed');
  res.status(500).json({ error: 'Internal server error' });
}

export function createSessionRoutes(deps: SessionRouteDeps): Router {
  const { ingress, sse, state, bus } = deps;
  const router = Router();

  /**
   * POST /api/join
   * Register a participant: { name } -> { id, name, color }
   */
  router.post('/join', (req: Request, res: Response) => {
    try {
      const participant = ingress.join(req.body);
      res.json({ id: participant.id, name: participant.name, color: participant.color });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/send
   * Post a chat message: { id, text, msgId? }
   */
  router.post('/send', (req: Request, res: Response) => {
    try {
      ingress.send(req.body);
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/leave
   * Announce that a participant left: { id }
   */
  router.post('/leave', (req: Request, res: Response) => {
    try {
      ingress.leave(req.body);
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/stream
   * Server-Sent Events: `fullstate` first, then every session event
   */
  router.get('/stream', (req: Request, res: Response) => {
    const clientId = sse.registerClient(req, res);
    logger.debug({ clientId }, 'Stream opened');
  });

  /**
   * GET /api/state
   * Point-in-time snapshot of the session
   */
  router.get('/state', (_req: Request, res: Response) => {
    res.json(state.snapshot(bus.listenerCount));
  });

  return router;
}
