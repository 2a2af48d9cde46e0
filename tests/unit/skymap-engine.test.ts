// ============================================================
// Tests for src/chart/skymap-engine.ts
// Covers: end-to-end label placement, crowded fields, draw
//         order, caption, legend, stars, constellations,
//         extra positions, mirroring, error propagation
// ============================================================

import { describe, it, expect } from 'vitest';
import { InMemoryDeepskyCatalog, InMemoryStarCatalog, type DeepskyCatalog } from '@chart/catalog';
import { EN } from '@chart/language';
import { formatCoordinates } from '@chart/legend';
import { SkymapEngine, resolveChartOptions } from '@chart/skymap-engine';
import { CONSTELLATION_RGB } from '@shared/constants';
import type { ChartOptions, DeepSkyObject } from '@shared/types';
import { RecordingSurface } from '../mocks/recording-surface';

const RA = 1;
const DEC = 0.5;
const RADIUS = 0.05;

function createEngine(options: Partial<ChartOptions> = {}) {
  const surface = new RecordingSurface(180, 0.5);
  const engine = new SkymapEngine(surface, { ra: RA, dec: DEC, fieldRadius: RADIUS, ...options });
  return { surface, engine };
}

function dso(overrides: Partial<DeepSkyObject>): DeepSkyObject {
  return {
    ra: RA,
    dec: DEC,
    type: 'GALAXY',
    rlong: 0,
    rshort: 0,
    positionAngle: 0,
    mag: 10,
    messier: 0,
    cat: 'NGC',
    allNames: ['1'],
    ...overrides,
  };
}

describe('resolveChartOptions', () => {
  it('should take overridden line widths and keep the other defaults', () => {
    const options = resolveChartOptions({ lineWidths: { starBorder: 0.1, openCluster: 0.3, dso: 0.5, legend: 0.2, constellation: 0.5 } });
    expect(options.lineWidths.dso).toBe(0.5);
    expect(options.limitingMagnitude).toBe(13.8);
    expect(options.extraPositions).toEqual([]);
  });
});

describe('SkymapEngine', () => {
  it('should derive the field geometry from the drawing width', () => {
    const { engine } = createEngine();
    expect(engine.fieldRadiusMm).toBeCloseTo(88.2, 9);
    expect(engine.legendFontSize).toBeCloseTo(4.68, 12);
    expect(engine.field.drawingScale).toBeCloseTo(88.2 / Math.sin(RADIUS), 9);
  });

  it('should place a lone galaxy at the centre of a field around (1.5, 1.0) and label it below', () => {
    const surface = new RecordingSurface(180, 0.5);
    const engine = new SkymapEngine(surface, { ra: 1.5, dec: 1.0, fieldRadius: 0.05 });
    const m31 = dso({ ra: 1.5, dec: 1.0, rlong: 0.01, rshort: 0.005, positionAngle: 0, messier: 31 });
    const report = engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([m31]) });

    expect(report.labels).toHaveLength(1);
    expect(report.labels[0].label).toBe('M31');
    expect(report.labels[0].position).toBe(0);
    expect(report.labels[0].anchor.x).toBeCloseTo(0.005 * engine.field.drawingScale + 1.3, 6);
    expect(report.labels[0].anchor.y).toBeCloseTo(0, 6);

    const [ellipse] = surface.ofType('ellipse');
    expect(ellipse.x).toBeCloseTo(0, 9);
    expect(ellipse.y).toBeCloseTo(0, 9);
    expect(ellipse.rlong).toBeCloseTo(0.01 * engine.field.drawingScale, 9);
    expect(ellipse.rshort).toBeCloseTo(0.005 * engine.field.drawingScale, 9);
  });

  it('should place the label of a lone galaxy below it', () => {
    const { surface, engine } = createEngine();
    const m31 = dso({ rlong: 0.005, rshort: 0.002, messier: 31, mag: 3.4 });
    const report = engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([m31]) });

    expect(report.deepskyCount).toBe(1);
    expect(report.labels).toHaveLength(1);
    expect(report.labels[0].label).toBe('M31');
    expect(report.labels[0].type).toBe('GALAXY');
    expect(report.labels[0].position).toBe(0);

    // the long axis points north, so "below" the minor axis is to the right
    const rshort = 0.002 * engine.field.drawingScale;
    expect(report.labels[0].anchor.x).toBeCloseTo(rshort + 1.3, 6);
    expect(report.labels[0].anchor.y).toBeCloseTo(0, 6);

    const [ellipse] = surface.ofType('ellipse');
    expect(ellipse.x).toBeCloseTo(0, 9);
    expect(ellipse.y).toBeCloseTo(0, 9);
    expect(ellipse.rlong).toBeCloseTo(0.005 * engine.field.drawingScale, 9);
    expect(ellipse.angle).toBeCloseTo(Math.PI / 2, 12);

    const label = surface.texts().find((t) => t.text === 'M31');
    expect(label?.op).toBe('textCentred');
    expect(label?.angle).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should place brighter objects first and steer later labels away', () => {
    const { engine } = createEngine();
    const south = DEC - Math.asin(6 / engine.field.drawingScale);
    const m13 = dso({ type: 'GLOBULAR_CLUSTER', messier: 13, mag: 8 });
    const m12 = dso({ type: 'GLOBULAR_CLUSTER', messier: 12, mag: 5, dec: south });

    const report = engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([m13, m12]) });

    expect(report.labels.map((l) => [l.label, l.position])).toEqual([
      ['M12', 0],
      ['M13', 1],
    ]);
  });

  it('should leave faint non-Messier objects unlabelled', () => {
    const { surface, engine } = createEngine();
    const report = engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([dso({ mag: 16 })]) });

    expect(report.deepskyCount).toBe(1);
    expect(report.labels).toEqual([]);
    expect(surface.ofType('ellipse')).toHaveLength(1);
  });

  it('should draw objects inside the clip region and the legend outside it', () => {
    const { surface, engine } = createEngine({ caption: 'Test field' });
    engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([dso({ messier: 1 })]) });

    const ops = surface.calls.map((c) => c.op);
    const clip = ops.indexOf('clipPath');
    const ellipse = ops.indexOf('ellipse');
    const reset = ops.indexOf('resetClip');
    const caption = surface.calls.findIndex((c) => c.op === 'textCentred' && c.text === 'Test field');

    expect(clip).toBeGreaterThan(ops.indexOf('newPage'));
    expect(ellipse).toBeGreaterThan(clip);
    expect(reset).toBeGreaterThan(ellipse);
    expect(caption).toBeGreaterThan(reset);
    expect(ops.at(-1)).toBe('finish');
    expect(surface.ofType('clipPath')[0].points).toHaveLength(8);
  });

  it('should make room for the caption', () => {
    const { surface, engine } = createEngine({ caption: 'Test field' });
    engine.makeMap();
    expect(surface.width).toBe(180);
    expect(surface.height).toBeCloseTo(189.36, 9);
  });

  it('should keep a square page without a caption', () => {
    const { surface, engine } = createEngine();
    engine.makeMap();
    expect(surface.height).toBe(180);
  });

  it('should report the ruler and write the field-centre coordinates', () => {
    const { surface, engine } = createEngine();
    const report = engine.makeMap();

    expect(report.ruler.label).toBe('1°');
    expect(report.ruler.lengthMm).toBeCloseTo((Math.PI / 180) * engine.field.drawingScale, 9);
    expect(surface.texts().some((t) => t.text === formatCoordinates(RA, DEC, EN))).toBe(true);
  });

  it('should draw the stars of the field brightest first', () => {
    const { surface, engine } = createEngine();
    const stars = new InMemoryStarCatalog([
      { ra: RA, dec: DEC + 0.01, mag: 9 },
      { ra: RA, dec: DEC - 0.01, mag: 3 },
      { ra: RA, dec: DEC, mag: 15 },
    ]);
    const report = engine.makeMap({ stars });

    expect(report.starCount).toBe(2);
    const discs = surface.ofType('circle').filter((c) => c.mode === 'both');
    // two field stars, then seven magnitude-scale stars
    expect(discs).toHaveLength(9);
    expect(discs[0].y).toBeLessThan(0);
    expect(discs[0].r).toBeGreaterThan(discs[1].r);
  });

  it('should draw constellation lines and greek letters on the near hemisphere', () => {
    const { surface, engine } = createEngine();
    const report = engine.makeMap({
      constellations: {
        brightStars: [
          { ra: RA, dec: DEC + 0.01, mag: 2, greek: 'alp', constellation: 'AND' },
          { ra: RA + 0.01, dec: DEC, mag: 3, greek: 'bet', constellation: 'AND' },
          { ra: RA + Math.PI, dec: -DEC, mag: 3, greek: 'gam', constellation: 'AND' },
          { ra: RA, dec: DEC, mag: 4, greek: 'alp', constellation: 'AND' },
        ],
        constellations: [{ abbreviation: 'AND', lines: [[1, 2], [2, 3], [1, 9]] }],
      },
    });

    expect(report.constellationLineCount).toBe(1);
    const letters = surface.texts().map((t) => t.text).filter((t) => /^[α-ω]$/.test(t));
    expect(letters).toEqual(['α', 'β']);
    expect(surface.ofType('setPenRgb')).toEqual([{ op: 'setPenRgb', rgb: CONSTELLATION_RGB }]);
    expect(console.warn).toHaveBeenCalledWith('[skymap] AND: line 1-9 references a missing star');
  });

  it('should mark extra positions inside the field with the requested label side', () => {
    const { surface, engine } = createEngine({
      extraPositions: [
        { ra: RA, dec: DEC, label: 'X1', labelPosition: 3 },
        { ra: RA + 1, dec: DEC, label: 'X2', labelPosition: 0 },
      ],
    });
    engine.makeMap();

    const texts = surface.texts();
    expect(texts.some((t) => t.text === 'X2')).toBe(false);
    const x1 = texts.find((t) => t.text === 'X1');
    expect(x1?.x).toBeCloseTo(1 / Math.SQRT2 + 2.6 / 6 + 1.3, 6);
    expect(x1?.y).toBeCloseTo(-2.6 / 3, 6);
  });

  it('should fall back to the first side for an invalid extra label position', () => {
    const { surface, engine } = createEngine({
      extraPositions: [{ ra: RA, dec: DEC, label: 'X1', labelPosition: 7 }],
    });
    engine.makeMap();

    const x1 = surface.texts().find((t) => t.text === 'X1');
    expect(x1?.x).toBeCloseTo(0, 6);
    expect(x1?.y).toBeCloseTo(-1 / Math.SQRT2 - 1.3, 6);
  });

  it('should mirror the map but not the legend', () => {
    const east = dso({ ra: RA + 0.01, messier: 2 });

    const plain = createEngine();
    plain.engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([east]) });
    const mirrored = createEngine({ mirrorX: true });
    mirrored.engine.makeMap({ deepsky: new InMemoryDeepskyCatalog([east]) });

    expect(plain.surface.ofType('ellipse')[0].x).toBeLessThan(0);
    expect(mirrored.surface.ofType('ellipse')[0].x).toBeGreaterThan(0);
    expect(mirrored.surface.texts().map((t) => t.text)).toContain('E');
    expect(mirrored.surface.ofType('clipPath')[0].points).toEqual(plain.surface.ofType('clipPath')[0].points);
  });

  it('should draw the symbol key in the chosen language', () => {
    const { surface, engine } = createEngine({ showDsoLegend: true, languageCode: 'NL' });
    engine.makeMap();
    expect(surface.texts().map((t) => t.text)).toContain('Sterrenstelsel');
  });

  it('should pass the colour inversion to the surface', () => {
    const { surface, engine } = createEngine({ invertColors: true });
    engine.makeMap();
    expect(surface.ofType('setInvertColors')).toEqual([{ op: 'setInvertColors', invert: true }]);
  });

  it('should propagate catalog failures', () => {
    const broken: DeepskyCatalog = {
      select: () => {
        throw new Error('catalog offline');
      },
    };
    const { engine } = createEngine();
    expect(() => engine.makeMap({ deepsky: broken })).toThrow('catalog offline');
  });
});
