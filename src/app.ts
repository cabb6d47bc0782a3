import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { PairingAlgorithm } from './pairing/types';
import { createAuthRouter } from './routes/auth';
import { createDrawsRouter } from './routes/draws';
import { createRevealRouter } from './routes/reveal';
import type { Stores } from './store/types';

export interface AppOptions {
  jwtSecret: string;
  defaultAlgorithm: PairingAlgorithm;
  hamiltonianMaxTries?: bigint;
}

export function createApp(stores: Stores, options: AppOptions) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // Routes
  app.use('/api/auth', createAuthRouter(stores.organisers, options.jwtSecret));
  app.use('/api/draws', createDrawsRouter(stores.draws, options));
  app.use('/api/reveal', createRevealRouter(stores.draws));

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Request body is not valid JSON' });
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
