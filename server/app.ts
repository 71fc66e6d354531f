import express from 'express';
import cors from 'cors';
import compression from 'compression';
import type { World } from '../engine/index.js';
import { worldRouter } from './routes/world.js';

export function createApp(world: World): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(compression());
  app.use(express.json());

  app.use('/api', worldRouter(world));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      engine: 'character_world',
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
