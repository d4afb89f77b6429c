import express from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { config } from './config';
import { logger } from './logger';
import { apiRouter } from './routes';
import { errorHandler } from './middleware/errorHandler';

export function createApp() {
  const app = express();

  // CORS: allow the grading dashboard to call the API
  app.use(cors({
    origin: config.corsOrigin,
    credentials: true,
  }));

  // Body parsing; CSV sources travel as JSON strings
  app.use(express.json({ limit: config.bodyLimit }));

  // Request logging with pino-http
  app.use(pinoHttp({
    logger,
    genReqId: () => uuidv4(),
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        query: req.query,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/v1', apiRouter);

  // Error handler
  app.use(errorHandler);

  return app;
}
