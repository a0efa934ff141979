// Global configuration constants for kmzcraft
// Display precision shared by the CLI and the core

import { env } from '../utils/env';

export interface PrecisionSetting {
  precision: number;
  defaultPrecision: number;
  maxPrecision: number;
  minPrecision: number;
}

export const GLOBAL_CONFIG = {
  // Decimal places for latitude/longitude display
  coordinates: {
    precision: env.coordinatePrecision ?? 8,
    defaultPrecision: 8,
    maxPrecision: 10,
    minPrecision: 4,
  },

  // Decimal places for distances in metres
  distance: {
    precision: env.distancePrecision ?? 2,
    defaultPrecision: 2,
    maxPrecision: 6,
    minPrecision: 0,
  },

  // Decimal places for UTM easting/northing display
  utm: {
    precision: 2,
    defaultPrecision: 2,
    maxPrecision: 4,
    minPrecision: 0,
  },
} as const;

function validatePrecision(setting: PrecisionSetting, label: string): number {
  const { precision, minPrecision, maxPrecision, defaultPrecision } = setting;
  if (!Number.isInteger(precision) || precision < minPrecision || precision > maxPrecision) {
    console.warn(`⚠️  Invalid ${label} precision: ${precision}. Using default: ${defaultPrecision}`);
    return defaultPrecision;
  }
  return precision;
}

// Validated once so a bad setting warns once, not per formatted value
const PRECISION = {
  coordinates: validatePrecision(GLOBAL_CONFIG.coordinates, 'coordinate'),
  distance: validatePrecision(GLOBAL_CONFIG.distance, 'distance'),
  utm: validatePrecision(GLOBAL_CONFIG.utm, 'UTM'),
};

// Helper functions for configuration
export const configHelpers = {
  validatePrecision,

  getCoordinatePrecision(): number {
    return PRECISION.coordinates;
  },

  formatCoordinate(value: number, precision: number = PRECISION.coordinates): string {
    return value.toFixed(precision);
  },

  getDistancePrecision(): number {
    return PRECISION.distance;
  },

  /**
   * Format a distance in metres, switching to kilometres from 10 km up
   */
  formatDistance(meters: number, precision: number = PRECISION.distance): string {
    if (Math.abs(meters) >= 10000) {
      return `${(meters / 1000).toFixed(precision)} km`;
    }
    return `${meters.toFixed(precision)} m`;
  },

  getUtmPrecision(): number {
    return PRECISION.utm;
  },

  formatUtmValue(value: number, precision: number = PRECISION.utm): string {
    return value.toFixed(precision);
  },
};
