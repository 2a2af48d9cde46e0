// ============================================================
// Deepsky Chart - Server-side Chart Renderer
// Validates a chart request, runs the skymap engine on a canvas
// surface and returns the PNG as Base64.
// ============================================================

import type { ChartCatalogs } from '@chart/catalog';
import { SkymapEngine } from '@chart/skymap-engine';
import { CHART_DEFAULTS } from '@shared/constants';
import {
  DEFAULT_LINE_WIDTHS,
  type ChartOptions,
  type ExtraPosition,
  type LineWidthOptions,
  type RenderReport,
} from '@shared/types';
import { ChartRequestError } from '../errors';
import { CanvasSurface, type CanvasFactory } from './canvas-surface';

const DEG = Math.PI / 180;

export interface ChartRequest {
  /** Field centre and radius in degrees */
  ra: number;
  dec: number;
  fieldRadius: number;
  /** Drawing width (mm) */
  width: number;
  pixelsPerMm: number;
  options: Partial<ChartOptions>;
}

export interface ChartImage {
  /** Raw Base64-encoded PNG (no data-URL prefix) */
  imageBase64: string;
  width: number;
  height: number;
  report: RenderReport;
}

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberIn(body: Body, key: string, min: number, max: number, fallback?: number): number {
  const value = body[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ChartRequestError(`${key} must be a number`);
  }
  if (value < min || value > max) {
    throw new ChartRequestError(`${key} must be between ${min} and ${max}`);
  }
  return value;
}

function optionalBoolean(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ChartRequestError(`${key} must be a boolean`);
  return value;
}

function parseLineWidths(value: unknown): Partial<LineWidthOptions> | undefined {
  if (value === undefined) return undefined;
  if (!isBody(value)) throw new ChartRequestError('lineWidths must be an object');
  const widths: Partial<LineWidthOptions> = {};
  const keys = ['starBorder', 'openCluster', 'dso', 'legend', 'constellation'] as const;
  for (const key of keys) {
    if (value[key] !== undefined) widths[key] = numberIn(value, key, 0, 5);
  }
  return widths;
}

function parseExtraPositions(value: unknown): ExtraPosition[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new ChartRequestError('extraPositions must be an array');
  return value.map((entry: unknown) => {
    if (!isBody(entry)) throw new ChartRequestError('extraPositions entries must be objects');
    const label = entry.label ?? '';
    if (typeof label !== 'string') throw new ChartRequestError('extraPositions label must be a string');
    return {
      ra: numberIn(entry, 'ra', 0, 360) * DEG,
      dec: numberIn(entry, 'dec', -90, 90) * DEG,
      label,
      labelPosition: numberIn(entry, 'labelPosition', 0, 3, 0),
    };
  });
}

/** Validate a POST /api/chart body. Angles arrive in degrees. */
export function parseChartRequest(input: unknown): ChartRequest {
  if (!isBody(input)) {
    throw new ChartRequestError('Request body must be a JSON object');
  }
  const ra = numberIn(input, 'ra', 0, 360);
  const dec = numberIn(input, 'dec', -90, 90);
  const fieldRadius = numberIn(input, 'fieldRadius', 0.01, 45);
  const width = numberIn(input, 'width', 20, 1000, CHART_DEFAULTS.DRAWING_WIDTH);
  const pixelsPerMm = numberIn(input, 'pixelsPerMm', 0.5, 20, 4);

  const raw = input.options ?? {};
  if (!isBody(raw)) throw new ChartRequestError('options must be an object');

  const caption = input.caption ?? '';
  if (typeof caption !== 'string') throw new ChartRequestError('caption must be a string');
  const language = raw.language ?? 'EN';
  if (language !== 'EN' && language !== 'NL') {
    throw new ChartRequestError('language must be "EN" or "NL"');
  }

  const options: Partial<ChartOptions> = {
    ra: ra * DEG,
    dec: dec * DEG,
    fieldRadius: fieldRadius * DEG,
    caption,
    languageCode: language,
  };
  if (raw.limitingMagnitude !== undefined) {
    options.limitingMagnitude = numberIn(raw, 'limitingMagnitude', -2, 20);
  }
  if (raw.deepskyLabelLimit !== undefined) {
    options.deepskyLabelLimit = numberIn(raw, 'deepskyLabelLimit', -2, 30);
  }
  const flags = ['mirrorX', 'mirrorY', 'showDsoLegend', 'invertColors'] as const;
  for (const flag of flags) {
    const value = optionalBoolean(raw, flag);
    if (value !== undefined) options[flag] = value;
  }
  const lineWidths = parseLineWidths(raw.lineWidths);
  if (lineWidths) {
    options.lineWidths = { ...DEFAULT_LINE_WIDTHS, ...lineWidths };
  }
  const extraPositions = parseExtraPositions(raw.extraPositions);
  if (extraPositions) options.extraPositions = extraPositions;

  return { ra, dec, fieldRadius, width, pixelsPerMm, options };
}

/** Render a chart to PNG. Catalog and surface failures propagate. */
export function renderChartImage(
  request: ChartRequest,
  catalogs: ChartCatalogs,
  createTarget?: CanvasFactory,
): ChartImage {
  const surface = new CanvasSurface({
    width: request.width,
    pixelsPerMm: request.pixelsPerMm,
    createTarget,
  });
  const engine = new SkymapEngine(surface, request.options);
  const report = engine.makeMap(catalogs);
  return {
    imageBase64: surface.toBuffer().toString('base64'),
    width: surface.widthPx,
    height: surface.heightPx,
    report,
  };
}
