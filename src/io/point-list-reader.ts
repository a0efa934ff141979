import * as fs from 'fs';
import * as path from 'path';
import { InvalidFileExtensionError, PointListExtractionError, toError } from '../errors';
import type { PointRegistry } from '../registry/PointRegistry';
import type { BulkEntry, SkippedEntry } from '../types';
import type { BulkImportReport } from '../types/ServiceResult';
import { getPointListSettings } from '../utils/config-loader';
import { logVerbose } from '../utils/logging';

export interface PointListOptions {
  /** Datum for lines that do not name one */
  defaultDatum?: string;
}

export interface PointListParseResult {
  entries: BulkEntry[];
  rejected: SkippedEntry[];
}

const MALFORMED_LINE = 'MALFORMED_LINE';

function splitFields(line: string): string[] {
  const clean = (fields: string[]): string[] => fields.map(field => field.trim()).filter(field => field !== '');

  if (/[\t;]/.test(line)) {
    return clean(line.split(/\s*[\t;]\s*/));
  }
  // "a, b, c": comma separated even though spaces are present
  if (/,\s/.test(line)) {
    return clean(line.split(/\s*,\s*/));
  }
  const byWhitespace = clean(line.split(/\s+/));
  if (byWhitespace.length > 1) {
    return byWhitespace;
  }
  return clean(line.split(','));
}

/**
 * Parse a coordinate value, accepting a decimal comma ("463712,5") only
 * when digits follow it
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed.includes(',') && !/^[+-]?\d+,\d+$/.test(trimmed)) {
    return null;
  }
  const normalized = trimmed.replace(',', '.');
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(normalized)) {
    return null;
  }
  return Number(normalized);
}

/**
 * Read "name easting northing zone [datum]" lines. Malformed lines are
 * rejected with their 1-based line number; zone and datum are checked when
 * the entries are added to a registry.
 */
export function parsePointList(text: string, options: PointListOptions = {}): PointListParseResult {
  const { commentPrefix } = getPointListSettings();
  const entries: BulkEntry[] = [];
  const rejected: SkippedEntry[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index === 0 ? rawLine.replace(/^\uFEFF/, '').trim() : rawLine.trim();
    const lineNumber = index + 1;
    if (line === '' || line.startsWith(commentPrefix)) {
      return;
    }

    const fields = splitFields(line);
    if (fields.length !== 4 && fields.length !== 5) {
      rejected.push({
        line: lineNumber,
        reason: `Invalid line format (expected 4 or 5 columns, got ${fields.length}): ${line}`,
        code: MALFORMED_LINE,
      });
      return;
    }

    const [name, eastingText, northingText, zone, datum] = fields;
    const easting = parseDecimal(eastingText);
    const northing = parseDecimal(northingText);
    if (easting === null || northing === null) {
      rejected.push({
        line: lineNumber,
        name,
        reason: `Could not convert line to numeric coordinates: ${line}`,
        code: MALFORMED_LINE,
      });
      return;
    }

    const entry: BulkEntry = { name, easting, northing, zone, line: lineNumber };
    const entryDatum = datum ?? options.defaultDatum;
    if (entryDatum !== undefined) {
      entry.datum = entryDatum;
    }
    entries.push(entry);
  });

  return { entries, rejected };
}

/**
 * Read a point-list file after checking its extension
 */
export async function readPointListFile(filePath: string): Promise<string> {
  const { supportedExtensions } = getPointListSettings();
  const extension = path.extname(filePath).replace(/^\./, '').toLowerCase();
  if (!supportedExtensions.includes(extension)) {
    throw new InvalidFileExtensionError(extension, filePath, supportedExtensions);
  }

  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    throw new PointListExtractionError(filePath, toError(error));
  }
}

/**
 * Parse a point list and add its entries to the registry. Reader rejections
 * and registry skips are merged into one report ordered by line.
 */
export function importPointList(registry: PointRegistry, text: string, options: PointListOptions = {}): BulkImportReport {
  const { entries, rejected } = parsePointList(text, options);
  const bulk = registry.addBulk(entries, options.defaultDatum);

  const skipped = [...rejected, ...bulk.skipped].sort(
    (a, b) => (a.line ?? Number.MAX_SAFE_INTEGER) - (b.line ?? Number.MAX_SAFE_INTEGER)
  );
  const total = entries.length + rejected.length;

  logVerbose(`📋 Point list: ${bulk.accepted.length} of ${total} lines imported`);

  const report: BulkImportReport = { success: skipped.length === 0, accepted: bulk.accepted, skipped };
  if (skipped.length > 0) {
    report.error = `${skipped.length} of ${total} entries skipped`;
  }
  return report;
}
