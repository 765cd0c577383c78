import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import type { Env } from './config/env.js';
import type { AppServices } from './config/serviceInitialization.js';
import { logger } from './utils/logger.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler } from './middleware/errorHandler.js';
import { NotFoundError } from './types/errors.js';
import { createDocumentRouter } from './routes/documentRoutes.js';
import { createChatRouter } from './routes/chatRoutes.js';
import { createHealthRouter } from './routes/healthRoutes.js';

const DEFAULT_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://localhost:8080',
  'http://127.0.0.1:5173',
  'http://127.0.0.1:8080',
];

export type AppConfig = Pick<Env, 'NODE_ENV' | 'ALLOWED_ORIGINS' | 'MAX_UPLOAD_BYTES'>;

export function parseAllowedOrigins(value: string | undefined): string[] {
  const origins = (value ?? '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  return origins.length > 0 ? origins : DEFAULT_ORIGINS;
}

function buildCorsOptions(config: AppConfig): CorsOptions {
  const allowedOrigins = parseAllowedOrigins(config.ALLOWED_ORIGINS);

  return {
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server) are allowed
      if (!origin || allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      if (config.NODE_ENV === 'development' && (origin.includes('localhost') || origin.includes('127.0.0.1'))) {
        return callback(null, true);
      }
      logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      callback(null, false);
    },
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
  };
}

/**
 * Build the Express application around already-initialized services
 */
export function createApp(services: AppServices, config: AppConfig): Express {
  const app = express();

  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(helmet());
  app.use(cors(buildCorsOptions(config)));
  app.use(express.json({ limit: config.MAX_UPLOAD_BYTES }));

  app.use(createHealthRouter(services));
  app.use(createDocumentRouter(services, { maxUploadBytes: config.MAX_UPLOAD_BYTES }));
  app.use(createChatRouter(services));

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });

  // Error handling middleware - must be last
  app.use(errorHandler);

  return app;
}
