import * as fs from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { ARCHIVE_SETTINGS } from '../constants';
import { MalformedArchiveError, MissingMarkupError, toError } from '../errors';
import type { PlacemarkDocument } from '../types';
import { getArchiveSettings } from '../utils/config-loader';
import { logVerbose } from '../utils/logging';
import { buildKml, parseKml, type ParsedMarkup } from './kml-markup';

export interface DecodedArchive extends ParsedMarkup {
  /** Archive entry the markup was read from */
  markupEntry: string;
}

/**
 * Append the .kmz extension when the path has none
 */
export function withKmzExtension(filePath: string): string {
  return path.extname(filePath) === '' ? `${filePath}${ARCHIVE_SETTINGS.FILE_EXTENSION}` : filePath;
}

/**
 * Pick the markup entry: the configured name first, then a .kml file at the
 * archive root, then a .kml file anywhere
 */
function selectMarkupEntry(entries: string[], preferred: string): string | undefined {
  const markup = entries.filter(entry => entry.toLowerCase().endsWith('.kml'));
  return markup.find(entry => entry === preferred)
    ?? markup.find(entry => !entry.includes('/'))
    ?? markup[0];
}

export async function serialize(document: PlacemarkDocument): Promise<Buffer> {
  const { markupEntry, compressionLevel } = getArchiveSettings();
  const zip = new JSZip();
  zip.file(markupEntry, buildKml(document));
  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: compressionLevel },
  });
}

export async function deserialize(bytes: Uint8Array): Promise<DecodedArchive> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new MalformedArchiveError(`Data is not a readable KMZ archive: ${toError(error).message}`, toError(error));
  }

  const entries = Object.values(zip.files)
    .filter(entry => !entry.dir)
    .map(entry => entry.name);

  const markupEntry = selectMarkupEntry(entries, getArchiveSettings().markupEntry);
  const file = markupEntry === undefined ? null : zip.file(markupEntry);
  if (markupEntry === undefined || file === null) {
    throw new MissingMarkupError(entries);
  }

  let xml: string;
  try {
    xml = await file.async('string');
  } catch (error) {
    throw new MalformedArchiveError(`Archive entry ${markupEntry} could not be extracted: ${toError(error).message}`, toError(error));
  }

  logVerbose(`   📄 Reading markup from ${markupEntry}`);
  return { ...parseKml(xml), markupEntry };
}

export async function writeKmzFile(filePath: string, document: PlacemarkDocument): Promise<string> {
  const target = withKmzExtension(filePath);
  const bytes = await serialize(document);
  await fs.promises.writeFile(target, bytes);
  logVerbose(`💾 Wrote ${document.points.length} points to ${target}`);
  return target;
}

export async function readKmzFile(filePath: string): Promise<DecodedArchive & { path: string }> {
  const source = withKmzExtension(filePath);
  const bytes = await fs.promises.readFile(source);
  logVerbose(`📂 Reading ${source}`);
  return { ...(await deserialize(bytes)), path: source };
}
