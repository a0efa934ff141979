import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ARCHIVE_SETTINGS, DEFAULT_DATUM_ID, KMZCRAFT_VERSION } from '../constants';
import { resolveDatum } from '../geodesy/datum-registry';
import type { DatumId } from '../types';
import { env } from './env';

export const CONFIG_FILENAME = 'kmzcraft.config.yaml';

export interface KmzcraftConfig {
  version: string;
  defaults: {
    datum: DatumId;
    documentName: string;
  };
  archive: {
    markupEntry: string;
    compressionLevel: number;
  };
  pointList: {
    supportedExtensions: string[];
    commentPrefix: string;
  };
  logging: {
    verbose: boolean;
  };
  /** File the configuration was read from, null when built-in defaults are used */
  source: string | null;
}

let configCache: KmzcraftConfig | null = null;

/**
 * Find a config file in multiple possible directories
 */
function findConfigFile(filename: string, possiblePaths: string[]): string | null {
  for (const basePath of possiblePaths) {
    const fullPath = path.join(basePath, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

export function getConfigSearchPaths(cwd: string = process.cwd()): string[] {
  return [
    path.join(cwd, 'configs/kmzcraft'), // Consumer configs in kmzcraft subdir (highest priority)
    path.join(cwd, 'configs'),          // Consumer configs in root configs dir
    path.join(__dirname, '../../configs'),    // Package defaults (src/utils or dist/utils)
    path.join(__dirname, '../../../configs')  // Alternative package path
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function stringListOr(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) {
    return fallback;
  }
  const items = value
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim().replace(/^\./, '').toLowerCase())
    .filter(item => item !== '');
  return items.length > 0 ? items : fallback;
}

export function defaultConfig(): KmzcraftConfig {
  return {
    version: KMZCRAFT_VERSION,
    defaults: {
      datum: DEFAULT_DATUM_ID,
      documentName: 'Untitled',
    },
    archive: {
      markupEntry: ARCHIVE_SETTINGS.DEFAULT_MARKUP_ENTRY,
      compressionLevel: ARCHIVE_SETTINGS.DEFAULT_COMPRESSION_LEVEL,
    },
    pointList: {
      supportedExtensions: ['txt', 'csv'],
      commentPrefix: '#',
    },
    logging: {
      verbose: false,
    },
    source: null,
  };
}

/**
 * Build a configuration from a parsed YAML document, falling back to defaults
 * for missing keys. Environment variables win over YAML values.
 */
export function parseConfig(raw: unknown, source: string | null = null): KmzcraftConfig {
  const defaults = defaultConfig();
  const root = isRecord(raw) ? raw : {};
  const defaultsSection = section(root, 'defaults');
  const archive = section(root, 'archive');
  const pointList = section(root, 'pointList');
  const logging = section(root, 'logging');

  // Unknown datum identifiers are configuration errors, never silently defaulted
  const datumId = env.datum ?? stringOr(defaultsSection.datum, defaults.defaults.datum);
  const compressionLevel = numberOr(archive.compressionLevel, defaults.archive.compressionLevel);

  return {
    version: stringOr(root.version, defaults.version),
    defaults: {
      datum: resolveDatum(datumId).id,
      documentName: stringOr(defaultsSection.documentName, defaults.defaults.documentName),
    },
    archive: {
      markupEntry: stringOr(archive.markupEntry, defaults.archive.markupEntry),
      compressionLevel: Math.min(9, Math.max(1, Math.round(compressionLevel))),
    },
    pointList: {
      supportedExtensions: stringListOr(pointList.supportedExtensions, defaults.pointList.supportedExtensions),
      commentPrefix: stringOr(pointList.commentPrefix, defaults.pointList.commentPrefix),
    },
    logging: {
      verbose: env.verbose || booleanOr(logging.verbose, defaults.logging.verbose),
    },
    source,
  };
}

/**
 * Load the kmzcraft configuration from YAML file
 */
export function loadConfig(): KmzcraftConfig {
  if (configCache) {
    return configCache;
  }

  const configPath = findConfigFile(CONFIG_FILENAME, getConfigSearchPaths());
  if (!configPath) {
    configCache = parseConfig({});
    return configCache;
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new Error(`Failed to load configuration from ${configPath}: ${error}`);
  }

  configCache = parseConfig(raw, configPath);
  return configCache;
}

export function resetConfigCache(): void {
  configCache = null;
}

export function getArchiveSettings(): KmzcraftConfig['archive'] {
  return loadConfig().archive;
}

export function getPointListSettings(): KmzcraftConfig['pointList'] {
  return loadConfig().pointList;
}
