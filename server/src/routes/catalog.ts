// ============================================================
// GET /api/catalog/deepsky?ra=&dec=&radius=
// Lists the deep-sky objects in a field, angles in degrees
// ============================================================

import { Router } from 'express';
import { dsoLabel, type DeepskyCatalog } from '@chart/catalog';
import { CHART_DEFAULTS } from '@shared/constants';
import { ChartRequestError, errorMessage } from '../errors';
import type { JsonRequest, JsonResponse } from './types';

const DEG = Math.PI / 180;

function queryNumber(req: JsonRequest, key: string, min: number, max: number): number {
  const raw = req.query?.[key];
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ChartRequestError(`${key} must be a number between ${min} and ${max}`);
  }
  return value;
}

export function createDeepskyHandler(catalog: DeepskyCatalog | undefined) {
  return (req: JsonRequest, res: JsonResponse) => {
    try {
      const ra = queryNumber(req, 'ra', 0, 360);
      const dec = queryNumber(req, 'dec', -90, 90);
      const radius = queryNumber(req, 'radius', 0.01, 90);

      const found = catalog ? catalog.select({ ra: ra * DEG, dec: dec * DEG }, radius * DEG) : [];
      const objects = [...found]
        .sort((a, b) => a.mag - b.mag)
        .map((o) => ({
          label: dsoLabel(o, CHART_DEFAULTS.DEEPSKY_LABEL_LIMIT),
          type: o.type,
          ra: o.ra / DEG,
          dec: o.dec / DEG,
          mag: o.mag,
          rlong: o.rlong / DEG * 60,
          rshort: o.rshort / DEG * 60,
          positionAngle: o.positionAngle / DEG,
        }));

      return res.json({ count: objects.length, objects });
    } catch (err) {
      if (err instanceof ChartRequestError) {
        return res.status(400).json({ error: err.message });
      }
      console.error('[catalog] Error:', err);
      return res.status(500).json({ error: errorMessage(err) });
    }
  };
}

export function createCatalogRouter(catalog: DeepskyCatalog | undefined): Router {
  const router = Router();
  const handler = createDeepskyHandler(catalog);
  router.get('/deepsky', (req, res) => {
    handler(req, res);
  });
  return router;
}
