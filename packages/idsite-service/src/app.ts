/**
 * Express application for the ID Site service
 */

import express, { type Express } from 'express';
import { createIdSiteRouter, type IdSiteRouteOptions } from './routes/idsite.js';

export interface AppOptions extends IdSiteRouteOptions {
  /** Reports whether the nonce store connection is open */
  redisConnected: () => boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');

  /**
   * Health check endpoint
   */
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'idsite',
      redis: options.redisConnected() ? 'connected' : 'disconnected',
    });
  });

  app.use('/idsite', createIdSiteRouter(options));

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
