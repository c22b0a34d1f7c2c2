// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTE — Liveness Probe
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { SERVER_NAME } from '../../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HealthCheck {
  status: 'healthy';
  service: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Static liveness answer; nothing downstream is checked.
 */
export function healthHandler(_req: Request, res: Response): void {
  const health: HealthCheck = { status: 'healthy', service: SERVER_NAME };
  res.status(200).json(health);
}

export function createHealthRouter(): Router {
  const router = Router();
  router.get('/health', healthHandler);
  return router;
}
