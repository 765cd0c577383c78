import express from 'express';
import type { Router } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import type { AppServices } from '../config/serviceInitialization.js';

export function createHealthRouter({ analysisService }: AppServices): Router {
  const router = express.Router();

  /**
   * GET /health
   * Liveness plus in-memory store sizes; does not call the AI service
   */
  router.get('/health', asyncHandler(async (_req, res) => {
    const stats = analysisService.getStats();
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      documents: stats.documents,
      chat_entries: stats.chatEntries,
      ai_configured: await analysisService.isAiConfigured(),
    });
  }));

  return router;
}
