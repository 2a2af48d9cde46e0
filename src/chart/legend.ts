// ============================================================
// Deepsky Chart - Legend
// Caption, field border, orientation cross, field-centre
// coordinates and the symbol key. Straight drawing code.
// ============================================================

import { CHART_DEFAULTS } from '@shared/constants';
import type { LegendKey, LegendLanguage } from './language';
import type { DrawingSurface } from './surface';
import {
  asterism,
  diffuseNebula,
  galaxy,
  globularCluster,
  openCluster,
  planetaryNebula,
  supernovaRemnant,
  unknownObject,
  type SymbolContext,
} from './symbols';

/**
 * Sexagesimal field-centre text, e.g. ` 0h42m44s +41°16'9"`. Rounded
 * seconds carry into minutes, hours and degrees.
 */
export function formatCoordinates(ra: number, dec: number, language: LegendLanguage): string {
  const hours = (ra * 12) / Math.PI;
  let rah = Math.trunc(hours);
  let ram = Math.trunc((hours - rah) * 60);
  let ras = Math.trunc(((hours - rah) * 60 - ram) * 60 + 0.5);
  if (ras === 60) {
    ram += 1;
    ras = 0;
  }
  if (ram === 60) {
    rah += 1;
    ram = 0;
  }
  if (rah === 24) rah = 0;

  const sign = dec < 0 ? '-' : '+';
  const degrees = (Math.abs(dec) * 180) / Math.PI;
  let decd = Math.trunc(degrees);
  let decm = Math.trunc((degrees - decd) * 60);
  let decs = Math.trunc(((degrees - decd) * 60 - decm) * 60 + 0.5);
  if (decs === 60) {
    decm += 1;
    decs = 0;
  }
  if (decm === 60) {
    decd += 1;
    decm = 0;
  }

  return (
    `${String(rah).padStart(2)}${language.h}${ram}${language.m}${ras}${language.s}` +
    ` ${sign}${decd}°${decm}'${decs}"`
  );
}

/** Caption text above the map, twice the legend font size. */
export function drawCaption(
  surface: DrawingSurface,
  caption: string,
  drawingWidth: number,
  legendFontSize: number,
): void {
  if (caption === '') return;
  const oldSize = surface.fontSize;
  surface.setFont(surface.font, 2 * legendFontSize);
  surface.textCentred(0, (drawingWidth / 2) * CHART_DEFAULTS.BASE_SCALE + legendFontSize, caption);
  surface.setFont(surface.font, oldSize);
}

/** Square around the field of view. */
export function drawFieldBorder(surface: DrawingSurface, r: number, lineWidth: number): void {
  surface.setLinewidth(lineWidth);
  surface.line(-r, -r, -r, r);
  surface.line(-r, r, r, r);
  surface.line(r, r, r, -r);
  surface.line(r, -r, -r, -r);
}

export interface OrientationParams {
  fieldRadiusMm: number;
  drawingWidth: number;
  fontSize: number;
  mirrorX: boolean;
  mirrorY: boolean;
}

/** North/west cross in the upper-left corner, relabelled when mirrored. */
export function drawOrientation(surface: DrawingSurface, params: OrientationParams): void {
  const { fieldRadiusMm: r, drawingWidth, fontSize, mirrorX, mirrorY } = params;
  const dl = 0.02 * drawingWidth;
  const x = -r + dl + 0.2 * fontSize;
  const y = r - dl - fontSize * 1.3;

  surface.textCentred(x, y + dl + 0.65 * fontSize, mirrorY ? 'S' : 'N');
  surface.textRight(x + dl + fontSize / 6, y - fontSize / 3, mirrorX ? 'E' : 'W');
  surface.line(x - dl, y, x + dl, y);
  surface.line(x, y - dl, x, y + dl);
}

interface LegendEntry {
  key: LegendKey;
  draw: (ctx: SymbolContext, x: number, y: number, r: number) => void;
}

const TOP_ENTRIES: LegendEntry[] = [
  { key: 'OCL', draw: (ctx, x, y, r) => openCluster(ctx, x, y, r) },
  { key: 'AST', draw: (ctx, x, y, r) => asterism(ctx, x, y, r) },
  { key: 'G', draw: (ctx, x, y, r) => galaxy(ctx, x, y, r) },
  { key: 'GCL', draw: (ctx, x, y, r) => globularCluster(ctx, x, y, r) },
];

const BOTTOM_ENTRIES: LegendEntry[] = [
  { key: 'SNR', draw: (ctx, x, y, r) => supernovaRemnant(ctx, x, y, r) },
  { key: 'N', draw: (ctx, x, y, r) => diffuseNebula(ctx, x, y, r) },
  { key: 'PN', draw: (ctx, x, y, r) => planetaryNebula(ctx, x, y, r) },
  { key: 'PG', draw: (ctx, x, y, r) => unknownObject(ctx, x, y, r) },
];

/** Longest names first; equal lengths in reverse listing order. */
export function orderLegendEntries<T extends { key: LegendKey }>(
  entries: readonly T[],
  language: LegendLanguage,
): T[] {
  return [...entries]
    .sort((a, b) => language[a.key].length - language[b.key].length)
    .reverse();
}

/** Symbol key along the right-hand edge of the chart. */
export function drawDsoLegend(ctx: SymbolContext, language: LegendLanguage): void {
  const { surface } = ctx;
  const fh = surface.fontSize;
  const legendX = 0.48 * surface.width;
  const r = fh / 3;
  const textOffset = -2.5 * r;

  let legendY = 0.49 * surface.width;
  orderLegendEntries(TOP_ENTRIES, language).forEach((entry, i) => {
    const y = legendY - (i + 1) * fh;
    entry.draw(ctx, legendX, y, r);
    surface.textLeft(legendX + textOffset, y - fh / 3, language[entry.key]);
  });

  legendY = CHART_DEFAULTS.LEGEND_MARGIN * surface.width;
  orderLegendEntries(BOTTOM_ENTRIES, language).forEach((entry, i) => {
    const y = -legendY + i * fh;
    entry.draw(ctx, legendX, y, r);
    surface.textLeft(legendX + textOffset, y - fh / 3, language[entry.key]);
  });
}
