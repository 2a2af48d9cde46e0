// ============================================================
// Deepsky Chart - Express Application
// ============================================================

import express, { type Express } from 'express';
import cors from 'cors';
import type { ChartCatalogs } from '@chart/catalog';
import type { CanvasFactory } from './render/canvas-surface';
import { createCatalogRouter } from './routes/catalog';
import { createChartRouter } from './routes/chart';
import type { JsonRequest, JsonResponse } from './routes/types';

export const VERSION = '0.1.0';

export function healthHandler(_req: JsonRequest, res: JsonResponse): void {
  res.json({ status: 'ok', version: VERSION });
}

export function createApp(catalogs: ChartCatalogs, createTarget?: CanvasFactory): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/chart', createChartRouter(catalogs, createTarget));
  app.use('/api/catalog', createCatalogRouter(catalogs.deepsky));

  // Health check
  app.get('/api/health', (req, res) => healthHandler(req, res));

  return app;
}
