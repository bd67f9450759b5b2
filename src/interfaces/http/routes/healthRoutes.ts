/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Liveness only: it does not call the registry or the completion provider,
 * and says nothing about whether their credentials are set.
 */
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
