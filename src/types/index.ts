/**
 * KMZCRAFT Type Definitions
 */

import type { SUPPORTED_DATUMS } from '../constants';

export type DatumId = typeof SUPPORTED_DATUMS[number];

export type Hemisphere = 'N' | 'S';

/**
 * Seven-parameter Helmert transformation from WGS84 to a datum.
 * Translations in metres, rotations in arc-seconds, scale in parts per million.
 */
export interface HelmertParameters {
  tx: number;
  ty: number;
  tz: number;
  rx: number;
  ry: number;
  rz: number;
  s: number;
}

export interface Datum {
  readonly id: DatumId;
  readonly name: string;
  readonly shortName: string;
  /** Semi-major axis (m) */
  readonly a: number;
  /** Flattening */
  readonly f: number;
  /** Semi-minor axis (m) */
  readonly b: number;
  /** First eccentricity squared */
  readonly e2: number;
  /** Third flattening */
  readonly n: number;
  readonly fromWgs84: Readonly<HelmertParameters>;
}

export interface GeographicCoordinate {
  latitude: number;
  longitude: number;
  datum: DatumId;
  /** Ellipsoidal height in metres */
  altitude?: number;
}

export interface UtmCoordinate {
  zone: number;
  hemisphere: Hemisphere;
  easting: number;
  northing: number;
  datum: DatumId;
  /** Latitude band letter, informational only */
  band?: string;
}

export interface ProjectedUtmCoordinate extends UtmCoordinate {
  band: string;
  /** Meridian convergence in degrees */
  convergence: number;
  /** Point scale factor */
  scale: number;
}

export interface PointStyle {
  /** Style reference, e.g. "#red-pin" */
  styleUrl?: string;
  description?: string;
}

export interface Point {
  name: string;
  coordinate: GeographicCoordinate;
  style?: PointStyle;
}

export interface PlacemarkDocument {
  name: string;
  points: Point[];
}

/**
 * One entry of a bulk UTM import. The zone is kept as the raw label
 * ("30T") so that malformed zones are reported per entry.
 */
export interface BulkEntry {
  name: string;
  easting: number;
  northing: number;
  zone: string;
  datum?: string;
  /** 1-based source line, when read from a point list */
  line?: number;
}

export interface SkippedEntry {
  line?: number;
  name?: string;
  reason: string;
  code: string;
}

export interface DistanceResult {
  from: string;
  to: string;
  meters: number;
}

export interface LineDistanceResult {
  legs: DistanceResult[];
  totalMeters: number;
}
