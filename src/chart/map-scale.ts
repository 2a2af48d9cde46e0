// ============================================================
// Deepsky Chart - Map Scale Widget
// Picks the longest "round" angular ruler that fits and draws it
// in the lower-right corner of the map.
// ============================================================

import { RULER_SCALE } from '@shared/constants';
import type { DrawingSurface } from './surface';

export interface RulerScale {
  /** Ruler length (mm) */
  lengthMm: number;
  label: string;
  arcminutes: number;
}

const ARCMIN_TO_RAD = Math.PI / (180 * 60);

/**
 * Largest table entry whose projected length does not exceed `maxLength`.
 * Degrades to the smallest entry when nothing fits.
 */
export function selectRulerScale(maxLength: number, drawingScale: number): RulerScale {
  const { ARCMINUTES, LABELS } = RULER_SCALE;
  for (let i = ARCMINUTES.length - 1; i >= 0; i--) {
    const lengthMm = ARCMINUTES[i] * ARCMIN_TO_RAD * drawingScale;
    if (lengthMm <= maxLength) {
      return { lengthMm, label: LABELS[i], arcminutes: ARCMINUTES[i] };
    }
  }
  return {
    lengthMm: ARCMINUTES[0] * ARCMIN_TO_RAD * drawingScale,
    label: LABELS[0],
    arcminutes: ARCMINUTES[0],
  };
}

export interface MapScaleParams {
  /** mm per radian */
  drawingScale: number;
  /** Longest ruler allowed (mm) */
  maxLength: number;
  legendFontSize: number;
  legendLineWidth: number;
}

export class MapScaleWidget {
  readonly ruler: RulerScale;
  readonly width: number;
  readonly height: number;
  private readonly fh: number;

  constructor(private readonly params: MapScaleParams) {
    this.ruler = selectRulerScale(params.maxLength, params.drawingScale);
    this.fh = params.legendFontSize * RULER_SCALE.HEIGHT_FACTOR;
    this.width = this.ruler.lengthMm + 2 * this.fh;
    this.height = 3 * this.fh;
  }

  /** Footprint reserved out of the clip region: [width, height] */
  getSize(): [number, number] {
    return [this.width, this.height];
  }

  /** Draw with the widget's lower-right corner at (right, bottom). */
  draw(surface: DrawingSurface, right: number, bottom: number): void {
    const { fh } = this;
    const length = this.ruler.lengthMm;
    const x = right - fh;
    const y = bottom + fh + fh / 2;

    surface.setLinewidth(this.params.legendLineWidth);
    const lw = surface.lineWidth;

    surface.line(x, y, x - length, y);
    surface.line(x - lw / 2, y - 0.5 * fh, x - lw / 2, y + 0.5 * fh);
    surface.line(x - length + lw / 2, y - 0.5 * fh, x - length + lw / 2, y + 0.5 * fh);

    const oldSize = surface.fontSize;
    surface.setFont(surface.font, fh);
    surface.textCentred(x - length / 2, y + (surface.fontSize * 2) / 3, this.ruler.label);
    surface.setFont(surface.font, oldSize);

    surface.line(right - this.width, bottom + this.height, right, bottom + this.height);
    surface.line(right - this.width, bottom + this.height, right - this.width, bottom);
  }
}
