// ============================================================
// Deepsky Chart - Server Configuration
// ============================================================

import path from 'path';
import { fileURLToPath } from 'url';

export interface ServerConfig {
  port: number;
  /** Directory holding deepsky.json, stars.json and constellations.json */
  catalogDir: string;
}

const DEFAULT_CATALOG_DIR = fileURLToPath(new URL('../../data', import.meta.url));

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT ? parseInt(env.PORT, 10) : 3456;
  return {
    port: Number.isNaN(port) ? 3456 : port,
    catalogDir: env.CATALOG_DIR ? path.resolve(env.CATALOG_DIR) : DEFAULT_CATALOG_DIR,
  };
}
