/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Liveness only: confirms the worker process answers HTTP. It does not query
 * the database.
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
