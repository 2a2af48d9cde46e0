// ============================================================
// Deepsky Chart - Catalog Loader
// Reads the JSON catalogs from disk and converts catalog units
// (degrees, arcminutes) to the radians the engine works in.
// ============================================================

import fs from 'fs';
import path from 'path';
import {
  InMemoryDeepskyCatalog,
  InMemoryStarCatalog,
  type ChartCatalogs,
  type ConstellationCatalog,
} from '@chart/catalog';
import { DSO_TYPES } from '@shared/types';
import type { BrightStar, Constellation, DeepSkyObject, DsoType, Star } from '@shared/types';
import { CatalogLoadError } from '../errors';

const DEG = Math.PI / 180;
const ARCMIN = DEG / 60;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDsoType(value: unknown): value is DsoType {
  return DSO_TYPES.some((t) => t === value);
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (err) {
    const code = isRecord(err) && typeof err.code === 'string' ? err.code : 'unknown error';
    throw new CatalogLoadError(file, `cannot read file (${code})`);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new CatalogLoadError(file, 'invalid JSON');
  }
}

function num(record: JsonRecord, key: string, file: string, index: number, fallback?: number): number {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (value === undefined && fallback !== undefined) return fallback;
  throw new CatalogLoadError(file, `entry ${index}: "${key}" must be a number`);
}

function str(record: JsonRecord, key: string, file: string, index: number, fallback?: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (value === undefined && fallback !== undefined) return fallback;
  throw new CatalogLoadError(file, `entry ${index}: "${key}" must be a string`);
}

function entries(data: unknown, file: string): JsonRecord[] {
  if (!Array.isArray(data)) {
    throw new CatalogLoadError(file, 'expected an array of entries');
  }
  return data.map((entry, i) => {
    if (!isRecord(entry)) throw new CatalogLoadError(file, `entry ${i} is not an object`);
    return entry;
  });
}

/** Deep-sky entries: ra/dec and position angle in degrees, axes in arcminutes */
export function parseDeepsky(data: unknown, file = 'deepsky.json'): DeepSkyObject[] {
  return entries(data, file).map((e, i) => {
    const type = e.type ?? 'UNKNOWN';
    if (!isDsoType(type)) {
      throw new CatalogLoadError(file, `entry ${i}: unknown type "${String(type)}"`);
    }
    const names = e.names ?? [];
    if (!Array.isArray(names) || !names.every((n): n is string => typeof n === 'string')) {
      throw new CatalogLoadError(file, `entry ${i}: "names" must be a list of strings`);
    }
    const rlong = num(e, 'rlong', file, i, 0);
    const rshort = num(e, 'rshort', file, i, rlong);
    return {
      ra: num(e, 'ra', file, i) * DEG,
      dec: num(e, 'dec', file, i) * DEG,
      type,
      rlong: Math.max(rlong, rshort) * ARCMIN,
      rshort: Math.min(rlong, rshort) * ARCMIN,
      positionAngle: num(e, 'positionAngle', file, i, 0) * DEG,
      mag: num(e, 'mag', file, i),
      messier: num(e, 'messier', file, i, 0),
      cat: str(e, 'cat', file, i, ''),
      allNames: names,
    };
  });
}

export function parseStars(data: unknown, file = 'stars.json'): Star[] {
  return entries(data, file).map((e, i) => ({
    ra: num(e, 'ra', file, i) * DEG,
    dec: num(e, 'dec', file, i) * DEG,
    mag: num(e, 'mag', file, i),
  }));
}

export function parseConstellations(data: unknown, file = 'constellations.json'): ConstellationCatalog {
  if (!isRecord(data)) {
    throw new CatalogLoadError(file, 'expected { brightStars, constellations }');
  }
  const brightStars: BrightStar[] = entries(data.brightStars, file).map((e, i) => ({
    ra: num(e, 'ra', file, i) * DEG,
    dec: num(e, 'dec', file, i) * DEG,
    mag: num(e, 'mag', file, i),
    greek: str(e, 'greek', file, i, ''),
    constellation: str(e, 'constellation', file, i),
  }));
  const constellations: Constellation[] = entries(data.constellations, file).map((e, i) => {
    const lines = e.lines;
    if (
      !Array.isArray(lines) ||
      !lines.every((l): l is [number, number] =>
        Array.isArray(l) && l.length === 2 && l.every((n) => Number.isInteger(n) && n >= 1))
    ) {
      throw new CatalogLoadError(file, `entry ${i}: "lines" must be pairs of 1-based star indices`);
    }
    return { abbreviation: str(e, 'abbreviation', file, i), lines };
  });
  return { brightStars, constellations };
}

/** Load all three catalogs from `dir`; a missing file is fatal. */
export function loadCatalogs(dir: string): ChartCatalogs {
  const file = (name: string) => path.join(dir, name);
  const deepsky = parseDeepsky(readJson(file('deepsky.json')), file('deepsky.json'));
  const stars = parseStars(readJson(file('stars.json')), file('stars.json'));
  const constellations = parseConstellations(
    readJson(file('constellations.json')),
    file('constellations.json'),
  );
  console.log(
    `[catalog] Loaded ${deepsky.length} deepsky objects, ${stars.length} stars, ` +
      `${constellations.constellations.length} constellations from ${dir}`,
  );
  return {
    deepsky: new InMemoryDeepskyCatalog(deepsky),
    stars: new InMemoryStarCatalog(stars),
    constellations,
  };
}
