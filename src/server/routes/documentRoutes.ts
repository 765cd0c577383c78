import express from 'express';
import type { Router } from 'express';
import multer from 'multer';
import { asyncHandler } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import { BadRequestError } from '../types/errors.js';
import { normalizeText } from '../services/analysis/TextNormalizer.js';
import type { AppServices } from '../config/serviceInitialization.js';
import type { AnalysisConfig } from '../services/analysis/types.js';
import {
  documentSchemas,
  type AnalyzeDocumentBody,
  type AnalyzeTextBody,
  type AskQuestionBody,
} from '../validation/documentSchemas.js';

export interface DocumentRouterOptions {
  maxUploadBytes: number;
}

function toAnalysisConfig(body: AnalyzeDocumentBody): Partial<AnalysisConfig> {
  return {
    documentType: body.document_type,
    userRole: body.user_role,
    complexityLevel: body.complexity_level,
  };
}

export function createDocumentRouter(services: AppServices, options: DocumentRouterOptions): Router {
  const { analysisService, textExtractor } = services;
  const router = express.Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 },
  });

  /**
   * POST /analyze-text
   * Analyze pasted document text
   *
   * Request body:
   * {
   *   text: string,
   *   document_type?: string,    // default "contract"
   *   user_role?: string,        // default "individual"
   *   complexity_level?: string  // default "simple"
   * }
   */
  router.post('/analyze-text', validate(documentSchemas.analyzeText), asyncHandler(async (req, res) => {
    const body: AnalyzeTextBody = req.body;
    const result = await analysisService.analyzeDocument(body.text, toAnalysisConfig(body));
    res.json(result);
  }));

  /**
   * POST /analyze-document
   * Analyze an uploaded file (multipart field "file" plus the analysis options)
   */
  router.post(
    '/analyze-document',
    upload.single('file'),
    validate(documentSchemas.analyzeDocument),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) {
        throw new BadRequestError('A file upload is required', { field: 'file' });
      }

      const rawText = await textExtractor.extract(file);
      const { text } = normalizeText(rawText, {
        field: 'file',
        emptyMessage: 'Could not extract text from the document',
        softLimit: Number.POSITIVE_INFINITY,
      });

      const body: AnalyzeDocumentBody = req.body;
      const result = await analysisService.analyzeDocument(text, toAnalysisConfig(body));
      res.json(result);
    })
  );

  /**
   * POST /ask-question
   * Answer a question grounded in a stored document or in supplied text
   *
   * Request body:
   * {
   *   question: string,
   *   document_id?: string,   // takes precedence when present
   *   document_text?: string
   * }
   */
  router.post('/ask-question', validate(documentSchemas.askQuestion), asyncHandler(async (req, res) => {
    const body: AskQuestionBody = req.body;
    const answer = await analysisService.askQuestion(body.question, {
      documentId: body.document_id,
      documentText: body.document_text,
    });
    res.json(answer);
  }));

  /**
   * GET /documents/:documentId
   * Read back a stored document and its latest analysis
   */
  router.get('/documents/:documentId', validate(documentSchemas.getDocument), (req, res) => {
    const record = analysisService.getDocument(req.params.documentId);
    res.json({
      id: record.id,
      config: {
        document_type: record.config.documentType,
        user_role: record.config.userRole,
        complexity_level: record.config.complexityLevel,
      },
      analysis: record.analysis,
      created_at: record.createdAt.toISOString(),
      character_count: record.text.length,
    });
  });

  return router;
}
