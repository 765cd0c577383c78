import express from 'express';
import type { Router } from 'express';
import { validate } from '../middleware/validation.js';
import type { AppServices } from '../config/serviceInitialization.js';
import { chatSchemas, type AppendChatBody } from '../validation/documentSchemas.js';

/**
 * Chat history: one process-wide feed of question/answer exchanges, oldest first
 */
export function createChatRouter({ analysisService }: AppServices): Router {
  const router = express.Router();

  router.get('/chat-history', (_req, res) => {
    res.json({ history: analysisService.listChatHistory() });
  });

  router.post('/chat-history', validate(chatSchemas.appendRecord), (req, res) => {
    const body: AppendChatBody = req.body;
    const entry = analysisService.appendChat(body);
    res.status(201).json({ message: 'Chat entry saved', entry });
  });

  router.delete('/chat-history', (_req, res) => {
    analysisService.clearChatHistory();
    res.json({ message: 'Chat history cleared' });
  });

  return router;
}
