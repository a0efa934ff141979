import { COORDINATE_LIMITS } from '../constants';
import {
  DuplicateNameError,
  InvalidArgumentError,
  NotFoundError,
  OutOfRangeError,
  isKmzcraftError
} from '../errors';
import { resolveDatum } from '../geodesy/datum-registry';
import { toGeographic, utmFromLabel } from '../geodesy/projection-engine';
import type {
  BulkEntry,
  GeographicCoordinate,
  PlacemarkDocument,
  Point,
  PointStyle,
  SkippedEntry,
  UtmCoordinate
} from '../types';
import type { BulkImportReport } from '../types/ServiceResult';
import { loadConfig } from '../utils/config-loader';
import { logVerbose } from '../utils/logging';

function cloneCoordinate(coordinate: GeographicCoordinate): GeographicCoordinate {
  const copy: GeographicCoordinate = {
    latitude: coordinate.latitude,
    longitude: coordinate.longitude,
    datum: coordinate.datum,
  };
  if (coordinate.altitude !== undefined) {
    copy.altitude = coordinate.altitude;
  }
  return copy;
}

function clonePoint(point: Point): Point {
  const copy: Point = { name: point.name, coordinate: cloneCoordinate(point.coordinate) };
  if (point.style) {
    copy.style = { ...point.style };
  }
  return copy;
}

function freezePoint(point: Point): Point {
  Object.freeze(point.coordinate);
  if (point.style) {
    Object.freeze(point.style);
  }
  return Object.freeze(point);
}

function normalizeName(name: string): string {
  const trimmed = typeof name === 'string' ? name.trim() : '';
  if (trimmed === '') {
    throw new InvalidArgumentError('Point name must be a non-empty string', { name });
  }
  return trimmed;
}

/**
 * Check a geographic coordinate and return a normalised copy
 */
export function validateCoordinate(coordinate: GeographicCoordinate): GeographicCoordinate {
  const { latitude, longitude, altitude } = coordinate;
  if (!Number.isFinite(latitude) || latitude < COORDINATE_LIMITS.MIN_LATITUDE || latitude > COORDINATE_LIMITS.MAX_LATITUDE) {
    throw new OutOfRangeError(`Latitude must be between -90 and 90, got ${latitude}`, { latitude });
  }
  if (!Number.isFinite(longitude) || longitude < COORDINATE_LIMITS.MIN_LONGITUDE || longitude > COORDINATE_LIMITS.MAX_LONGITUDE) {
    throw new OutOfRangeError(`Longitude must be between -180 and 180, got ${longitude}`, { longitude });
  }
  if (altitude !== undefined && !Number.isFinite(altitude)) {
    throw new OutOfRangeError(`Altitude must be a finite number, got ${altitude}`, { altitude });
  }
  return cloneCoordinate({ ...coordinate, datum: resolveDatum(coordinate.datum).id });
}

/**
 * Ordered, name-keyed collection of placemarks. Every single-point operation
 * either completes or leaves the registry untouched.
 */
export class PointRegistry {
  private points: Point[] = [];
  private positions = new Map<string, number>();
  private name: string;

  constructor(documentName?: string) {
    this.name = documentName?.trim() || loadConfig().defaults.documentName;
  }

  /**
   * Rebuild a registry from a decoded document. Fails on duplicate names.
   */
  static fromDocument(document: PlacemarkDocument): PointRegistry {
    const registry = new PointRegistry(document.name);
    for (const point of document.points) {
      registry.add(point.name, point.coordinate, point.style);
    }
    return registry;
  }

  get documentName(): string {
    return this.name;
  }

  set documentName(value: string) {
    this.name = normalizeName(value);
  }

  get size(): number {
    return this.points.length;
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  find(name: string): Point | undefined {
    const position = this.positions.get(name);
    return position === undefined ? undefined : freezePoint(clonePoint(this.points[position]));
  }

  get(name: string): Point {
    const point = this.find(name);
    if (!point) {
      throw new NotFoundError(name);
    }
    return point;
  }

  add(name: string, coordinate: GeographicCoordinate, style?: PointStyle): Point {
    const pointName = normalizeName(name);
    if (this.positions.has(pointName)) {
      throw new DuplicateNameError(pointName);
    }

    const point: Point = { name: pointName, coordinate: validateCoordinate(coordinate) };
    if (style && (style.styleUrl !== undefined || style.description !== undefined)) {
      point.style = { ...style };
    }

    this.points.push(point);
    this.positions.set(pointName, this.points.length - 1);
    return freezePoint(clonePoint(point));
  }

  addFromUtm(name: string, utm: UtmCoordinate, style?: PointStyle): Point {
    // Check the name first so a duplicate is reported even for a bad coordinate
    const pointName = normalizeName(name);
    if (this.positions.has(pointName)) {
      throw new DuplicateNameError(pointName);
    }
    return this.add(pointName, toGeographic(utm), style);
  }

  rename(oldName: string, newName: string): Point {
    const position = this.positionOf(oldName);
    const targetName = normalizeName(newName);
    if (targetName !== oldName && this.positions.has(targetName)) {
      throw new DuplicateNameError(targetName);
    }

    const point = this.points[position];
    this.positions.delete(point.name);
    point.name = targetName;
    this.positions.set(targetName, position);
    return freezePoint(clonePoint(point));
  }

  move(name: string, coordinate: GeographicCoordinate): Point {
    const position = this.positionOf(name);
    const point = this.points[position];
    point.coordinate = validateCoordinate(coordinate);
    return freezePoint(clonePoint(point));
  }

  moveFromUtm(name: string, utm: UtmCoordinate): Point {
    this.positionOf(name);
    return this.move(name, toGeographic(utm));
  }

  delete(name: string): Point {
    const position = this.positionOf(name);
    const [removed] = this.points.splice(position, 1);
    this.reindex();
    return freezePoint(removed);
  }

  /**
   * Read-only snapshot in insertion order
   */
  list(): readonly Point[] {
    return Object.freeze(this.points.map(point => freezePoint(clonePoint(point))));
  }

  /**
   * Add UTM entries one at a time. A bad entry is skipped and reported; the
   * rest are still added and nothing is rolled back.
   */
  addBulk(entries: readonly BulkEntry[], defaultDatum?: string): BulkImportReport {
    const fallbackDatum = defaultDatum ?? loadConfig().defaults.datum;
    const accepted: Point[] = [];
    const skipped: SkippedEntry[] = [];

    for (const entry of entries) {
      try {
        const utm = utmFromLabel(entry.easting, entry.northing, entry.zone, entry.datum ?? fallbackDatum);
        accepted.push(this.addFromUtm(entry.name, utm));
      } catch (error) {
        if (!isKmzcraftError(error)) {
          throw error;
        }
        const skippedEntry: SkippedEntry = { name: entry.name, reason: error.message, code: error.code };
        if (entry.line !== undefined) {
          skippedEntry.line = entry.line;
        }
        skipped.push(skippedEntry);
        logVerbose(`   ⚠️  Skipped ${entry.line !== undefined ? `line ${entry.line} ` : ''}(${entry.name}): ${error.message}`);
      }
    }

    logVerbose(`   📊 Bulk import: ${accepted.length} added, ${skipped.length} skipped`);

    const report: BulkImportReport = { success: skipped.length === 0, accepted, skipped };
    if (skipped.length > 0) {
      report.error = `${skipped.length} of ${entries.length} entries skipped`;
    }
    return report;
  }

  toDocument(): PlacemarkDocument {
    return {
      name: this.name,
      points: this.points.map(clonePoint),
    };
  }

  private positionOf(name: string): number {
    const position = this.positions.get(name);
    if (position === undefined) {
      throw new NotFoundError(name);
    }
    return position;
  }

  private reindex(): void {
    this.positions = new Map(this.points.map((point, position) => [point.name, position] as const));
  }
}
