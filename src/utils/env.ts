// Environment loading and typed access to kmzcraft environment variables
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

// Later files override earlier ones
const envFiles = [
  '.env',
  '.env.local',
];

let envLoaded = false;

export function loadEnvFiles(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];
  envFiles.forEach(envFile => {
    const envPath = path.resolve(cwd, envFile);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, override: true });
      loaded.push(envFile);
    }
  });
  envLoaded = true;
  return loaded;
}

function ensureEnvLoaded(): void {
  if (!envLoaded) {
    loadEnvFiles();
  }
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export const env = {
  get datum(): string | undefined {
    ensureEnvLoaded();
    return process.env.KMZCRAFT_DATUM || undefined;
  },

  get verbose(): boolean {
    ensureEnvLoaded();
    const value = process.env.KMZCRAFT_VERBOSE ?? process.env.VERBOSE;
    return value === 'true' || value === '1';
  },

  get coordinatePrecision(): number | undefined {
    ensureEnvLoaded();
    return parseOptionalInt(process.env.KMZCRAFT_COORDINATE_PRECISION);
  },

  get distancePrecision(): number | undefined {
    ensureEnvLoaded();
    return parseOptionalInt(process.env.KMZCRAFT_DISTANCE_PRECISION);
  },
};
