// ============================================================
// Deepsky Chart - Skymap Engine
// One render pass: constellations, deep-sky objects with
// automatic label placement, extra markers, stars, legend.
// Configuration is read-only; the repulsion field and the
// report live only for the duration of makeMap().
// ============================================================

import { CHART_DEFAULTS, CONSTELLATION_RGB, STAR_LABELS } from '@shared/constants';
import {
  DEFAULT_CHART_OPTIONS,
  type ChartOptions,
  type DeepSkyObject,
  type FieldOfView,
  type ProjectedObject,
  type RenderReport,
} from '@shared/types';
import {
  dsoLabel,
  type ChartCatalogs,
  type ConstellationCatalog,
  type DeepskyCatalog,
  type StarCatalog,
} from './catalog';
import {
  LABEL_RIGHT,
  circularCandidates,
  labelCandidatesFor,
  normalizeEllipseAngle,
  unknownObjectCandidates,
  type CandidateMetrics,
} from './label-candidates';
import { LabelPotential, type PotentialSeed } from './label-potential';
import { LANGUAGES } from './language';
import { drawCaption, drawDsoLegend, drawFieldBorder, drawOrientation, formatCoordinates } from './legend';
import { MagnitudeScaleWidget } from './mag-scale';
import { MapScaleWidget } from './map-scale';
import { MirroringSurface } from './mirroring';
import { placeLabel } from './placement';
import {
  angularDistance,
  createFieldOfView,
  fieldRadiusMm,
  northAngle,
  projectToMap,
} from './projection';
import type { DrawingSurface } from './surface';
import {
  drawDeepskyObject,
  drawLabel,
  magnitudeToRadius,
  star,
  unknownObject,
  type SymbolContext,
  type SymbolLabel,
} from './symbols';

/** Merge caller overrides into the defaults, line widths included. */
export function resolveChartOptions(overrides: Partial<ChartOptions> = {}): ChartOptions {
  return {
    ...DEFAULT_CHART_OPTIONS,
    ...overrides,
    lineWidths: { ...DEFAULT_CHART_OPTIONS.lineWidths, ...overrides.lineWidths },
  };
}

export class SkymapEngine {
  readonly options: ChartOptions;
  readonly field: FieldOfView;
  readonly drawingWidth: number;
  /** Legend font scale: one hundredth of the drawing width */
  readonly legendFontScale: number;

  constructor(
    private readonly graphics: DrawingSurface,
    options: Partial<ChartOptions> = {},
  ) {
    this.options = resolveChartOptions(options);
    this.drawingWidth = graphics.width;
    this.legendFontScale = this.drawingWidth / 100;
    this.field = createFieldOfView(
      this.options.ra,
      this.options.dec,
      this.options.fieldRadius,
      this.drawingWidth,
    );
  }

  get fieldRadiusMm(): number {
    return fieldRadiusMm(this.field);
  }

  get legendFontSize(): number {
    return CHART_DEFAULTS.FONT_SIZE * this.legendFontScale;
  }

  /** Render the whole chart. Collaborator errors abort the pass. */
  makeMap(catalogs: ChartCatalogs = {}): RenderReport {
    const { graphics, options } = this;
    const map: DrawingSurface = options.mirrorX || options.mirrorY
      ? new MirroringSurface(graphics, options.mirrorX, options.mirrorY)
      : graphics;

    const height = options.caption === ''
      ? this.drawingWidth
      : this.drawingWidth + 2 * this.legendFontSize;
    graphics.setDimensions(this.drawingWidth, height);
    graphics.setInvertColors(options.invertColors);
    graphics.newPage();
    graphics.setPenGray(0.0);
    graphics.setFillGray(0.0);
    graphics.setFont(graphics.font, CHART_DEFAULTS.FONT_SIZE);
    graphics.setLinewidth(options.lineWidths.legend);

    const r = this.fieldRadiusMm;
    const magScale = new MagnitudeScaleWidget({
      legendFontSize: this.legendFontSize,
      starsInScale: CHART_DEFAULTS.STARS_IN_SCALE,
      limitingMagnitude: options.limitingMagnitude,
      lineWidths: options.lineWidths,
    });
    const mapScale = new MapScaleWidget({
      drawingScale: this.field.drawingScale,
      maxLength: this.drawingWidth / 3,
      legendFontSize: this.legendFontSize,
      legendLineWidth: options.lineWidths.legend,
    });
    const [magWidth, magHeight] = magScale.getSize();
    const [mapWidth, mapHeight] = mapScale.getSize();

    graphics.clipPath([
      { x: r, y: r },
      { x: r, y: -r + mapHeight },
      { x: r - mapWidth, y: -r + mapHeight },
      { x: r - mapWidth, y: -r },
      { x: -r + magWidth, y: -r },
      { x: -r + magWidth, y: -r + magHeight },
      { x: -r, y: -r + magHeight },
      { x: -r, y: r },
    ]);

    const report: RenderReport = {
      deepskyCount: 0,
      starCount: 0,
      constellationLineCount: 0,
      labels: [],
      ruler: { label: mapScale.ruler.label, lengthMm: mapScale.ruler.lengthMm },
    };
    const ctx: SymbolContext = { surface: map, lineWidths: options.lineWidths };

    if (catalogs.constellations) this.drawConstellations(ctx, catalogs.constellations, report);
    if (catalogs.deepsky) this.drawDeepskyObjects(ctx, catalogs.deepsky, report);
    if (options.extraPositions.length > 0) this.drawExtraObjects(ctx);
    if (catalogs.stars) this.drawStars(ctx, catalogs.stars, report);

    graphics.resetClip();

    drawCaption(graphics, options.caption, this.drawingWidth, this.legendFontSize);
    this.drawLegend(magScale, mapScale);
    if (options.showDsoLegend) {
      drawDsoLegend({ surface: graphics, lineWidths: options.lineWidths }, LANGUAGES[options.languageCode]);
    }

    graphics.finish();
    return report;
  }

  /** Project, seed the repulsion field, then place and draw brightest first. */
  private drawDeepskyObjects(ctx: SymbolContext, catalog: DeepskyCatalog, report: RenderReport): void {
    const { field, options } = this;
    const minRadius = options.minSymbolRadius;
    const objects = [...catalog.select(field, field.radius)].sort((a, b) => a.mag - b.mag);
    console.log(`[skymap] ${objects.length} deepsky object${objects.length === 1 ? '' : 's'} in map.`);
    report.deepskyCount = objects.length;

    const seeds: PotentialSeed[] = objects.map((object) => {
      const { x, y } = projectToMap(object, field);
      let radius = object.rlong * field.drawingScale;
      if (object.type === 'GALAXY_CLUSTER') radius = minRadius;
      if (radius < minRadius) radius = minRadius;
      return { x, y, radius };
    });
    const potential = new LabelPotential(this.fieldRadiusMm, seeds);
    const metrics = this.candidateMetrics(ctx.surface);

    objects.forEach((object, i) => {
      const projected = this.projectObject(object, seeds[i], ctx.surface);

      let label: SymbolLabel | undefined;
      if (projected.label !== '') {
        const candidates = labelCandidatesFor(object.type, projected, projected.labelWidth, metrics);
        const placement = placeLabel(candidates, potential, projected.labelWidth, i);
        if (placement) {
          label = { text: projected.label, candidate: placement.candidate };
          report.labels.push({
            label: projected.label,
            type: object.type,
            position: placement.index,
            anchor: placement.candidate.center,
          });
        }
      }
      drawDeepskyObject(ctx, object.type, projected, label);
    });
  }

  private projectObject(
    object: DeepSkyObject,
    seed: PotentialSeed,
    surface: DrawingSurface,
  ): ProjectedObject {
    const { field, options } = this;
    const minRadius = options.minSymbolRadius;
    let rlong = object.rlong * field.drawingScale;
    let rshort = object.rshort * field.drawingScale;
    const positionAngle = normalizeEllipseAngle(
      object.positionAngle + northAngle(object, field) + 0.5 * Math.PI,
    );

    if (rlong <= minRadius) {
      rshort = rlong > 0 ? (rshort * minRadius) / rlong : minRadius;
      rlong = minRadius;
    }
    if (object.type === 'GALAXY_CLUSTER') {
      rlong /= 3;
    }

    const label = dsoLabel(object, options.deepskyLabelLimit);
    return {
      x: seed.x,
      y: seed.y,
      rlong,
      rshort,
      positionAngle,
      label,
      labelWidth: label === '' ? 0 : surface.textWidth(label),
    };
  }

  private drawExtraObjects(ctx: SymbolContext): void {
    const { field, options } = this;
    const metrics = this.candidateMetrics(ctx.surface);
    for (const extra of options.extraPositions) {
      if (angularDistance(extra, field) >= field.radius) continue;
      const { x, y } = projectToMap(extra, field);
      const radius = options.minSymbolRadius;
      const candidates = unknownObjectCandidates(
        x,
        y,
        radius,
        ctx.surface.textWidth(extra.label),
        metrics,
      );
      const index = Number.isInteger(extra.labelPosition) && extra.labelPosition >= 0 &&
        extra.labelPosition < candidates.length ? extra.labelPosition : 0;
      unknownObject(ctx, x, y, radius, { text: extra.label, candidate: candidates[index] });
    }
  }

  private drawStars(ctx: SymbolContext, catalog: StarCatalog, report: RenderReport): void {
    const { field, options } = this;
    const { surface } = ctx;
    const stars = [...catalog.select(field, field.radius, options.limitingMagnitude)]
      .sort((a, b) => a.mag - b.mag);
    console.log(`[skymap] ${stars.length} stars in map.`);
    report.starCount = stars.length;

    surface.setLinewidth(options.lineWidths.starBorder);
    surface.setPenGray(1.0);
    surface.setFillGray(0.0);
    for (const s of stars) {
      if (s.mag > options.limitingMagnitude) continue;
      const { x, y } = projectToMap(s, field);
      star(ctx, x, y, magnitudeToRadius(s.mag, options.limitingMagnitude));
    }
    surface.setPenGray(0.0);
  }

  private drawConstellations(
    ctx: SymbolContext,
    catalog: ConstellationCatalog,
    report: RenderReport,
  ): void {
    const { field, options } = this;
    const { surface } = ctx;
    const visible = (position: { ra: number; dec: number }): boolean =>
      angularDistance(position, field) < 0.5 * Math.PI;

    surface.setLinewidth(options.lineWidths.constellation);
    const oldSize = surface.fontSize;
    surface.setFont(surface.font, CHART_DEFAULTS.CONSTELLATION_LABEL_FONT_SCALE * oldSize);
    const metrics = this.candidateMetrics(surface);
    const printed = new Map<string, Set<string>>();

    for (const bright of catalog.brightStars) {
      if (bright.greek === '' || !visible(bright)) continue;
      let seen = printed.get(bright.constellation);
      if (!seen) {
        seen = new Set();
        printed.set(bright.constellation, seen);
      } else if (seen.has(bright.greek)) {
        continue;
      }
      seen.add(bright.greek);

      const letter = STAR_LABELS[bright.greek];
      if (!letter) {
        console.warn(`[skymap] Unknown greek letter: ${bright.greek}`);
        continue;
      }
      const { x, y } = projectToMap(bright, field);
      const r = magnitudeToRadius(bright.mag, options.limitingMagnitude);
      const candidates = circularCandidates(x, y, r, surface.textWidth(letter), metrics);
      drawLabel(surface, { text: letter, candidate: candidates[LABEL_RIGHT] });
    }
    surface.setFont(surface.font, oldSize);

    surface.setPenRgb(CONSTELLATION_RGB);
    for (const constellation of catalog.constellations) {
      for (const [first, second] of constellation.lines) {
        const star1 = catalog.brightStars[first - 1];
        const star2 = catalog.brightStars[second - 1];
        if (!star1 || !star2) {
          console.warn(`[skymap] ${constellation.abbreviation}: line ${first}-${second} references a missing star`);
          continue;
        }
        if (!visible(star1) || !visible(star2)) continue;
        const p1 = projectToMap(star1, field);
        const p2 = projectToMap(star2, field);
        surface.line(p1.x, p1.y, p2.x, p2.y);
        report.constellationLineCount++;
      }
    }
    surface.setPenGray(0.0);
  }

  private drawLegend(magScale: MagnitudeScaleWidget, mapScale: MapScaleWidget): void {
    const { graphics, options } = this;
    const fontSize = this.legendFontSize;
    graphics.setFont(graphics.font, fontSize);

    const r = this.fieldRadiusMm;
    magScale.draw(graphics, -r, -r);
    mapScale.draw(graphics, r, -r);
    drawFieldBorder(graphics, r, options.lineWidths.legend);
    drawOrientation(graphics, {
      fieldRadiusMm: r,
      drawingWidth: this.drawingWidth,
      fontSize,
      mirrorX: options.mirrorX,
      mirrorY: options.mirrorY,
    });
    graphics.textLeft(
      r - fontSize / 2,
      r - fontSize,
      formatCoordinates(this.field.ra, this.field.dec, LANGUAGES[options.languageCode]),
    );
  }

  private candidateMetrics(surface: DrawingSurface): CandidateMetrics {
    return { fontSize: surface.fontSize, drawingWidth: surface.width };
  }
}
