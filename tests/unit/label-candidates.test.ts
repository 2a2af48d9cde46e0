// ============================================================
// Tests for src/chart/label-candidates.ts
// Covers: candidate order and offsets for every symbol shape,
//         galaxy rotation, angle normalisation, radius fallback
// ============================================================

import { describe, it, expect } from 'vitest';
import {
  LABEL_ABOVE,
  LABEL_BELOW,
  LABEL_LEFT,
  LABEL_RIGHT,
  asterismCandidates,
  circularCandidates,
  defaultRadius,
  diffuseNebulaCandidates,
  galaxyCandidates,
  labelCandidatesFor,
  normalizeEllipseAngle,
  shoulderAngle,
  symbolShape,
  unknownObjectCandidates,
  type CandidateMetrics,
} from '@chart/label-candidates';

const METRICS: CandidateMetrics = { fontSize: 3, drawingWidth: 180 };

describe('normalizeEllipseAngle', () => {
  it('should keep angles inside (-pi/2, pi/2]', () => {
    expect(normalizeEllipseAngle(0.3)).toBe(0.3);
    expect(normalizeEllipseAngle(Math.PI / 2)).toBe(Math.PI / 2);
  });

  it('should fold angles by half turns', () => {
    expect(normalizeEllipseAngle(Math.PI)).toBe(0);
    expect(normalizeEllipseAngle((3 * Math.PI) / 4)).toBeCloseTo(-Math.PI / 4, 12);
    expect(normalizeEllipseAngle(-Math.PI / 2)).toBeCloseTo(Math.PI / 2, 12);
    expect(normalizeEllipseAngle(5 * Math.PI + 0.2)).toBeCloseTo(0.2, 12);
  });
});

describe('galaxyCandidates', () => {
  it('should place an unrotated ellipse in the order below, above, left, right', () => {
    const c = galaxyCandidates(10, 20, 6, 2, 0, 12, METRICS);

    expect(c).toHaveLength(4);
    expect(c[LABEL_BELOW]).toEqual({ start: { x: 4, y: 16.5 }, center: { x: 10, y: 16.5 }, end: { x: 16, y: 16.5 } });
    expect(c[LABEL_ABOVE].center).toEqual({ x: 10, y: 23.5 });
    expect(c[LABEL_LEFT]).toEqual({ start: { x: -8.5, y: 19 }, center: { x: -2.5, y: 19 }, end: { x: 3.5, y: 19 } });
    expect(c[LABEL_RIGHT]).toEqual({ start: { x: 16.5, y: 19 }, center: { x: 22.5, y: 19 }, end: { x: 28.5, y: 19 } });
  });

  it('should rotate the offsets with the position angle', () => {
    const c = galaxyCandidates(10, 20, 6, 2, Math.PI / 2, 12, METRICS);

    // the minor axis now points along -x, so "below" sits to the right
    expect(c[LABEL_BELOW].center.x).toBeCloseTo(13.5, 12);
    expect(c[LABEL_BELOW].center.y).toBeCloseTo(20, 12);
    expect(c[LABEL_BELOW].start.y).toBeCloseTo(14, 12);
    expect(c[LABEL_RIGHT].center.x).toBeCloseTo(11, 12);
    expect(c[LABEL_RIGHT].center.y).toBeCloseTo(32.5, 12);
  });

  it('should treat angles that differ by pi the same', () => {
    const a = galaxyCandidates(0, 0, 6, 2, 0.4, 8, METRICS);
    const b = galaxyCandidates(0, 0, 6, 2, 0.4 + Math.PI, 8, METRICS);
    a.forEach((candidate, i) => {
      expect(b[i].center.x).toBeCloseTo(candidate.center.x, 9);
      expect(b[i].center.y).toBeCloseTo(candidate.center.y, 9);
    });
  });

  it('should fall back to the default radius for a missing size', () => {
    const c = galaxyCandidates(0, 0, -1, -1, 0, 4, METRICS);
    // rlong = 180 / 40 = 4.5, rshort = 2.25
    expect(c[LABEL_BELOW].center).toEqual({ x: 0, y: -3.75 });
    expect(c[LABEL_RIGHT].start).toEqual({ x: 5, y: -1 });
  });

  it('should use half the long axis when only the short axis is missing', () => {
    const c = galaxyCandidates(0, 0, 6, -1, 0, 4, METRICS);
    expect(c[LABEL_ABOVE].center).toEqual({ x: 0, y: 4.5 });
  });
});

describe('diffuseNebulaCandidates', () => {
  it('should place labels around the square', () => {
    const c = diffuseNebulaCandidates(0, 0, 8, 10, METRICS);

    expect(c[LABEL_BELOW]).toEqual({ start: { x: -5, y: -5.5 }, center: { x: 0, y: -5.5 }, end: { x: 5, y: -5.5 } });
    expect(c[LABEL_ABOVE].center).toEqual({ x: 0, y: 5.5 });
    expect(c[LABEL_LEFT]).toEqual({ start: { x: -14.5, y: -1 }, center: { x: -9.5, y: -1 }, end: { x: -4.5, y: -1 } });
    expect(c[LABEL_RIGHT]).toEqual({ start: { x: 4.5, y: -1 }, center: { x: 9.5, y: -1 }, end: { x: 14.5, y: -1 } });
  });
});

describe('circularCandidates', () => {
  it('should set side labels at the lower shoulder of the circle', () => {
    const c = circularCandidates(0, 0, 3, 6, METRICS);
    // acos(1/3) has sine 2*sqrt(2)/3, so the clearance is 2*sqrt(2) + 0.5
    const clearance = 2 * Math.SQRT2 + 0.5;

    expect(c[LABEL_BELOW].center).toEqual({ x: 0, y: -5 });
    expect(c[LABEL_ABOVE].center).toEqual({ x: 0, y: 4 });
    expect(c[LABEL_LEFT].end.x).toBeCloseTo(-clearance, 12);
    expect(c[LABEL_LEFT].end.y).toBe(-3);
    expect(c[LABEL_RIGHT].start.x).toBeCloseTo(clearance, 12);
    expect(c[LABEL_RIGHT].center.x).toBeCloseTo(clearance + 3, 12);
  });

  it('should use the default radius when none is given', () => {
    const c = circularCandidates(0, 0, 0, 2, METRICS);
    expect(c[LABEL_BELOW].center.y).toBe(-defaultRadius(180) - 2);
  });
});

describe('shoulderAngle', () => {
  it('should fall back to a right angle when the font is too large', () => {
    expect(shoulderAngle(1, 3)).toBe(Math.PI / 2);
  });

  it('should follow the cap height on a large circle', () => {
    expect(shoulderAngle(3, 3)).toBeCloseTo(Math.acos(1 / 3), 12);
  });
});

describe('asterismCandidates', () => {
  it('should place labels around the diamond', () => {
    const c = asterismCandidates(0, 0, 4 * Math.SQRT2, 4, METRICS);

    expect(c[LABEL_BELOW].center.y).toBeCloseTo(-6, 12);
    expect(c[LABEL_ABOVE].center.y).toBeCloseTo(5, 12);
    expect(c[LABEL_LEFT].end.x).toBeCloseTo(-4.5, 12);
    expect(c[LABEL_LEFT].end.y).toBe(-1);
    expect(c[LABEL_RIGHT].start.x).toBeCloseTo(4.5, 12);
  });
});

describe('unknownObjectCandidates', () => {
  it('should place labels around the cross', () => {
    const c = unknownObjectCandidates(0, 0, 4 * Math.SQRT2, 4, METRICS);

    expect(c[LABEL_BELOW].center.y).toBeCloseTo(-5.5, 12);
    expect(c[LABEL_ABOVE].center.y).toBeCloseTo(5.5, 12);
    expect(c[LABEL_LEFT].center.x).toBeCloseTo(-6.5, 12);
    expect(c[LABEL_RIGHT].center.x).toBeCloseTo(6.5, 12);
    expect(c[LABEL_RIGHT].center.y).toBe(-1);
  });
});

describe('symbolShape', () => {
  it('should map every object type to its outline', () => {
    expect(symbolShape('GALAXY')).toBe('ellipse');
    expect(symbolShape('DIFFUSE_NEBULA')).toBe('rectangle');
    expect(symbolShape('OPEN_CLUSTER')).toBe('circle');
    expect(symbolShape('GLOBULAR_CLUSTER')).toBe('circle');
    expect(symbolShape('PLANETARY_NEBULA')).toBe('circle');
    expect(symbolShape('SUPERNOVA_REMNANT')).toBe('circle');
    expect(symbolShape('ASTERISM')).toBe('diamond');
    expect(symbolShape('GALAXY_CLUSTER')).toBe('cross');
    expect(symbolShape('UNKNOWN')).toBe('cross');
  });
});

describe('labelCandidatesFor', () => {
  const object = { x: 0, y: 0, rlong: 4, rshort: 2, positionAngle: 0 };

  it('should size a diffuse nebula square by its full long axis', () => {
    expect(labelCandidatesFor('DIFFUSE_NEBULA', object, 10, METRICS)).toEqual(
      diffuseNebulaCandidates(0, 0, 8, 10, METRICS),
    );
  });

  it('should route clusters to the circular candidates', () => {
    expect(labelCandidatesFor('OPEN_CLUSTER', object, 10, METRICS)).toEqual(
      circularCandidates(0, 0, 4, 10, METRICS),
    );
  });

  it('should always return four candidates with the centre halfway along the baseline', () => {
    for (const type of ['GALAXY', 'ASTERISM', 'UNKNOWN', 'PLANETARY_NEBULA'] as const) {
      const candidates = labelCandidatesFor(type, object, 10, METRICS);
      expect(candidates).toHaveLength(4);
      for (const c of candidates) {
        expect(c.center.x).toBeCloseTo((c.start.x + c.end.x) / 2, 12);
        expect(c.center.y).toBeCloseTo((c.start.y + c.end.y) / 2, 12);
      }
    }
  });
});
