/**
 * KMZCRAFT Constants
 */

export const KMZCRAFT_VERSION = '1.0.0';

export const SUPPORTED_DATUMS = [
  'WGS84',
  'NAD83',
  'ETRS89'
] as const;

export const DEFAULT_DATUM_ID = 'WGS84';

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

export const ARCHIVE_SETTINGS = {
  DEFAULT_MARKUP_ENTRY: 'doc.kml',
  DEFAULT_COMPRESSION_LEVEL: 6,
  FILE_EXTENSION: '.kmz'
} as const;

export const UTM = {
  SCALE_FACTOR: 0.9996,
  FALSE_EASTING: 500000,
  FALSE_NORTHING_SOUTH: 10000000,
  MIN_ZONE: 1,
  MAX_ZONE: 60,
  MAX_LATITUDE: 84,
  // Latitude bands C..X, 8 degrees each from 80S; X stretches to 84N
  BAND_LETTERS: 'CDEFGHJKLMNPQRSTUVWXX'
} as const;

export const COORDINATE_LIMITS = {
  MIN_LATITUDE: -90,
  MAX_LATITUDE: 90,
  MIN_LONGITUDE: -180,
  MAX_LONGITUDE: 180
} as const;
