// ============================================================
// Deepsky Chart - Magnitude Scale Widget
// Column of reference stars in the lower-left corner, faintest
// at the bottom, each with its magnitude.
// ============================================================

import type { LineWidthOptions } from '@shared/types';
import { withSavedState, type DrawingSurface } from './surface';
import { magnitudeToRadius, star } from './symbols';

export interface MagnitudeScaleParams {
  legendFontSize: number;
  starsInScale: number;
  limitingMagnitude: number;
  lineWidths: LineWidthOptions;
}

export class MagnitudeScaleWidget {
  /** Magnitudes shown, faintest first */
  readonly magnitudes: number[];
  readonly width: number;
  readonly height: number;

  constructor(private readonly params: MagnitudeScaleParams) {
    const faintest = Math.floor(params.limitingMagnitude);
    this.magnitudes = Array.from({ length: params.starsInScale }, (_, i) => faintest - i);
    this.width = 3.2 * params.legendFontSize;
    this.height = (params.starsInScale + 0.5) * params.legendFontSize;
  }

  getSize(): [number, number] {
    return [this.width, this.height];
  }

  /** Draw with the widget's lower-left corner at (left, bottom). */
  draw(surface: DrawingSurface, left: number, bottom: number): void {
    const { legendFontSize: fh, lineWidths, limitingMagnitude } = this.params;
    const x = left + 0.66 * fh;

    withSavedState(surface, () => {
      surface.setLinewidth(lineWidths.starBorder);
      surface.setPenGray(1.0);
      surface.setFillGray(0.0);
      this.magnitudes.forEach((mag, i) => {
        const y = bottom + (i + 0.75) * fh;
        star({ surface, lineWidths }, x, y, magnitudeToRadius(mag, limitingMagnitude));
      });
    });

    this.magnitudes.forEach((mag, i) => {
      const y = bottom + (i + 0.75) * fh;
      surface.textRight(x + 0.66 * fh, y - fh / 3, String(mag));
    });

    surface.setLinewidth(lineWidths.legend);
    surface.line(left, bottom + this.height, left + this.width, bottom + this.height);
    surface.line(left + this.width, bottom + this.height, left + this.width, bottom);
  }
}
