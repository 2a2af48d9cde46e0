// ============================================================
// POST /api/chart
// Renders a chart for the requested field and returns the PNG
// together with the placement report
// ============================================================

import { Router } from 'express';
import type { ChartCatalogs } from '@chart/catalog';
import { ChartRequestError, errorMessage } from '../errors';
import type { CanvasFactory } from '../render/canvas-surface';
import { parseChartRequest, renderChartImage } from '../render/chart-renderer';
import type { JsonRequest, JsonResponse } from './types';

export function createChartHandler(catalogs: ChartCatalogs, createTarget?: CanvasFactory) {
  return (req: JsonRequest, res: JsonResponse) => {
    try {
      const request = parseChartRequest(req.body);
      const image = renderChartImage(request, catalogs, createTarget);
      console.log(
        `[chart] Rendered ${image.width}x${image.height}px, ` +
          `${image.report.deepskyCount} deepsky, ${image.report.starCount} stars`,
      );
      return res.json(image);
    } catch (err) {
      if (err instanceof ChartRequestError) {
        return res.status(400).json({ error: err.message });
      }
      console.error('[chart] Error:', err);
      return res.status(500).json({ error: errorMessage(err) });
    }
  };
}

export function createChartRouter(catalogs: ChartCatalogs, createTarget?: CanvasFactory): Router {
  const router = Router();
  const handler = createChartHandler(catalogs, createTarget);
  router.post('/', (req, res) => {
    handler(req, res);
  });
  return router;
}
