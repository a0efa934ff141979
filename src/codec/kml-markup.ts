/**
 * KML 2.2 markup for placemark documents.
 *
 * Coordinates are always written in WGS84, which is what map viewers assume.
 * Each placemark also records its own datum in ExtendedData so points entered
 * in NAD83 or ETRS89 come back in the datum they were stored in.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { DEFAULT_DATUM_ID, KML_NAMESPACE } from '../constants';
import { MalformedMarkupError, toError } from '../errors';
import { isDatumId } from '../geodesy/datum-registry';
import { reproject } from '../geodesy/datum-shift';
import type { DatumId, GeographicCoordinate, PlacemarkDocument, Point, PointStyle } from '../types';
import type { DefaultedPlacemark, DeserializeReport, SkippedPlacemark } from '../types/ServiceResult';
import { loadConfig } from '../utils/config-loader';
import { logVerbose, warnVerbose } from '../utils/logging';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';
const DATUM_DATA_NAME = 'datum';
const ARRAY_TAGS = new Set(['Document', 'Folder', 'Placemark', 'Data', 'Point']);

type XmlNode = Record<string, unknown>;

export interface ParsedMarkup {
  document: PlacemarkDocument;
  report: DeserializeReport;
}

function isRecord(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function arrayOf(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function readText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return readText(value[0]);
  }
  if (isRecord(value)) {
    return readText(value['#text']);
  }
  return undefined;
}

function formatNumber(value: number): string {
  // Avoid "-0" in the output
  return Object.is(value, -0) ? '0' : String(value);
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

function placemarkNode(point: Point): XmlNode {
  const wgs84 = reproject(point.coordinate, DEFAULT_DATUM_ID);
  const tuple = [formatNumber(wgs84.longitude), formatNumber(wgs84.latitude)];
  if (point.coordinate.altitude !== undefined && wgs84.altitude !== undefined) {
    tuple.push(formatNumber(wgs84.altitude));
  }

  const node: XmlNode = { name: point.name };
  if (point.style?.description !== undefined) {
    node.description = point.style.description;
  }
  if (point.style?.styleUrl !== undefined) {
    node.styleUrl = point.style.styleUrl;
  }
  node.ExtendedData = {
    Data: [{ '@_name': DATUM_DATA_NAME, value: point.coordinate.datum }],
  };
  node.Point = { coordinates: tuple.join(',') };
  return node;
}

export function buildKml(document: PlacemarkDocument): string {
  const documentNode: XmlNode = { name: document.name };
  if (document.points.length > 0) {
    documentNode.Placemark = document.points.map(placemarkNode);
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });

  const body = builder.build({
    kml: {
      '@_xmlns': KML_NAMESPACE,
      Document: documentNode,
    },
  });
  return XML_DECLARATION + body;
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

function collectPlacemarks(container: XmlNode, found: XmlNode[]): void {
  for (const placemark of arrayOf(container.Placemark)) {
    if (isRecord(placemark)) {
      found.push(placemark);
    }
  }
  for (const nested of [...arrayOf(container.Folder), ...arrayOf(container.Document)]) {
    if (isRecord(nested)) {
      collectPlacemarks(nested, found);
    }
  }
}

function readDatumMarker(placemark: XmlNode): string | undefined {
  const extended = arrayOf(placemark.ExtendedData).find(isRecord);
  if (!extended) {
    return undefined;
  }
  for (const data of arrayOf(extended.Data)) {
    if (isRecord(data) && data['@_name'] === DATUM_DATA_NAME) {
      return readText(data.value);
    }
  }
  return undefined;
}

interface CoordinateTuple {
  longitude: number;
  latitude: number;
  altitude?: number;
  altitudeMalformed: boolean;
}

function readCoordinateTuple(placemark: XmlNode): CoordinateTuple | string {
  const pointNode = arrayOf(placemark.Point).find(isRecord);
  if (!pointNode) {
    return 'unsupported geometry (only Point placemarks are read)';
  }

  const raw = readText(pointNode.coordinates);
  if (!raw) {
    return 'missing coordinates';
  }

  const first = raw.split(/\s+/)[0];
  const parts = first.split(',').filter(part => part !== '');
  if (parts.length < 2) {
    return `malformed coordinates '${raw}'`;
  }

  const longitude = Number(parts[0]);
  const latitude = Number(parts[1]);
  if (!Number.isFinite(longitude) || !Number.isFinite(latitude)) {
    return `malformed coordinates '${raw}'`;
  }
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    return `coordinates out of range '${raw}'`;
  }

  const tuple: CoordinateTuple = { longitude, latitude, altitudeMalformed: false };
  if (parts.length >= 3) {
    const altitude = Number(parts[2]);
    if (Number.isFinite(altitude)) {
      tuple.altitude = altitude;
    } else {
      tuple.altitudeMalformed = true;
    }
  }
  return tuple;
}

function parseXml(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new MalformedMarkupError(`Markup is not well-formed XML: ${msg} (line ${line}, column ${col})`, { code, line, col });
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
  });

  try {
    const parsed: unknown = parser.parse(xml);
    if (!isRecord(parsed)) {
      throw new MalformedMarkupError('Markup did not parse to an element tree');
    }
    return parsed;
  } catch (error) {
    if (error instanceof MalformedMarkupError) {
      throw error;
    }
    throw new MalformedMarkupError(`Markup could not be parsed: ${toError(error).message}`, undefined, toError(error));
  }
}

/**
 * Read a KML document. Unknown shapes are tolerated: placemarks that lack a
 * name or a point coordinate are skipped, missing optional fields are
 * defaulted, and both are listed in the report.
 */
export function parseKml(xml: string): ParsedMarkup {
  const root = parseXml(xml);
  if (!('kml' in root)) {
    throw new MalformedMarkupError('Markup root element is not <kml>', { roots: Object.keys(root).filter(key => !key.startsWith('?')) });
  }
  const kml: XmlNode = isRecord(root.kml) ? root.kml : {};

  const documentNode = arrayOf(kml.Document).find(isRecord);
  const documentName = documentNode ? readText(documentNode.name) : undefined;
  const documentNameDefaulted = !documentName;

  const placemarks: XmlNode[] = [];
  collectPlacemarks(kml, placemarks);

  const points: Point[] = [];
  const seen = new Set<string>();
  const accepted: string[] = [];
  const skipped: SkippedPlacemark[] = [];
  const defaulted: DefaultedPlacemark[] = [];

  placemarks.forEach((placemark, index) => {
    const name = readText(placemark.name);
    if (!name) {
      skipped.push({ index, reason: 'missing name' });
      return;
    }

    const tuple = readCoordinateTuple(placemark);
    if (typeof tuple === 'string') {
      skipped.push({ index, name, reason: tuple });
      return;
    }

    if (seen.has(name)) {
      skipped.push({ index, name, reason: 'duplicate name, first occurrence kept' });
      return;
    }

    const defaultedFields: string[] = [];
    const marker = readDatumMarker(placemark);
    const markerId = marker?.toUpperCase();
    let datum: DatumId = DEFAULT_DATUM_ID;
    if (markerId !== undefined && isDatumId(markerId)) {
      datum = markerId;
    } else {
      defaultedFields.push('datum');
    }
    if (tuple.altitudeMalformed) {
      defaultedFields.push('altitude');
    }

    const wgs84: GeographicCoordinate = {
      latitude: tuple.latitude,
      longitude: tuple.longitude,
      datum: DEFAULT_DATUM_ID,
    };
    if (tuple.altitude !== undefined) {
      wgs84.altitude = tuple.altitude;
    }

    const point: Point = { name, coordinate: reproject(wgs84, datum) };
    const style: PointStyle = {};
    const description = readText(placemark.description);
    const styleUrl = readText(placemark.styleUrl);
    if (description) {
      style.description = description;
    }
    if (styleUrl) {
      style.styleUrl = styleUrl;
    }
    if (style.description !== undefined || style.styleUrl !== undefined) {
      point.style = style;
    }

    seen.add(name);
    points.push(point);
    accepted.push(name);
    if (defaultedFields.length > 0) {
      defaulted.push({ name, fields: defaultedFields });
    }
  });

  const duplicates = skipped.filter(entry => entry.reason.startsWith('duplicate'));
  if (duplicates.length > 0) {
    warnVerbose(`⚠️  Duplicate placemark names found: ${duplicates.map(entry => entry.name).join(', ')}. Only the first of each was kept.`);
  }
  logVerbose(`   📊 Read ${accepted.length} placemarks, skipped ${skipped.length}`);

  const report: DeserializeReport = {
    success: skipped.length === 0,
    accepted,
    skipped,
    defaulted,
    documentNameDefaulted,
  };
  if (skipped.length > 0) {
    report.error = `${skipped.length} placemark(s) skipped`;
  }

  return {
    document: {
      name: documentName || loadConfig().defaults.documentName,
      points,
    },
    report,
  };
}
