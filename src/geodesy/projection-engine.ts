/**
 * Universal Transverse Mercator projection.
 *
 * Krüger series to sixth order in the third flattening n (Karney 2011),
 * parameterised by the datum ellipsoid. Accurate to a few nanometres within
 * a zone and well under a millimetre several degrees outside it.
 */

import { configHelpers } from '../config/kmzcraft.global.config';
import { COORDINATE_LIMITS, UTM } from '../constants';
import { InvalidZoneError, OutOfRangeError } from '../errors';
import type {
  Datum,
  DatumId,
  GeographicCoordinate,
  Hemisphere,
  ProjectedUtmCoordinate,
  UtmCoordinate
} from '../types';
import { resolveDatum } from './datum-registry';

const DEG2RAD = Math.PI / 180;
const RAD2DEG = 180 / Math.PI;
const NEWTON_TOLERANCE = 1e-12;
const NEWTON_MAX_ITERATIONS = 10;

interface SeriesCoefficients {
  /** Rectifying radius */
  A: number;
  /** Forward series, index 1..6 (index 0 unused) */
  alpha: number[];
  /** Inverse series, index 1..6 (index 0 unused) */
  beta: number[];
  e: number;
}

const coefficientCache = new Map<DatumId, SeriesCoefficients>();

function seriesFor(datum: Datum): SeriesCoefficients {
  const cached = coefficientCache.get(datum.id);
  if (cached) {
    return cached;
  }

  const n = datum.n;
  const n2 = n * n, n3 = n2 * n, n4 = n3 * n, n5 = n4 * n, n6 = n5 * n;

  const A = datum.a / (1 + n) * (1 + n2 / 4 + n4 / 64 + n6 / 256);

  const alpha = [
    0,
    1 / 2 * n - 2 / 3 * n2 + 5 / 16 * n3 + 41 / 180 * n4 - 127 / 288 * n5 + 7891 / 37800 * n6,
    13 / 48 * n2 - 3 / 5 * n3 + 557 / 1440 * n4 + 281 / 630 * n5 - 1983433 / 1935360 * n6,
    61 / 240 * n3 - 103 / 140 * n4 + 15061 / 26880 * n5 + 167603 / 181440 * n6,
    49561 / 161280 * n4 - 179 / 168 * n5 + 6601661 / 7257600 * n6,
    34729 / 80640 * n5 - 3418889 / 1995840 * n6,
    212378941 / 319334400 * n6,
  ];

  const beta = [
    0,
    1 / 2 * n - 2 / 3 * n2 + 37 / 96 * n3 - 1 / 360 * n4 - 81 / 512 * n5 + 96199 / 604800 * n6,
    1 / 48 * n2 + 1 / 15 * n3 - 437 / 1440 * n4 + 46 / 105 * n5 - 1118711 / 3870720 * n6,
    17 / 480 * n3 - 37 / 840 * n4 - 209 / 4480 * n5 + 5569 / 90720 * n6,
    4397 / 161280 * n4 - 11 / 504 * n5 - 830251 / 7257600 * n6,
    4583 / 161280 * n5 - 108847 / 3991680 * n6,
    20648693 / 638668800 * n6,
  ];

  const coefficients: SeriesCoefficients = { A, alpha, beta, e: Math.sqrt(datum.e2) };
  coefficientCache.set(datum.id, coefficients);
  return coefficients;
}

/**
 * Conformal latitude parameter tau' from tau = tan(phi)
 */
function conformalTau(tau: number, e: number): number {
  const sigma = Math.sinh(e * Math.atanh(e * tau / Math.sqrt(1 + tau * tau)));
  return tau * Math.sqrt(1 + sigma * sigma) - sigma * Math.sqrt(1 + tau * tau);
}

function assertZone(zone: number): void {
  if (!Number.isInteger(zone) || zone < UTM.MIN_ZONE || zone > UTM.MAX_ZONE) {
    throw new InvalidZoneError(`UTM zone must be an integer between ${UTM.MIN_ZONE} and ${UTM.MAX_ZONE}, got ${zone}`, { zone });
  }
}

function assertFinite(value: number, label: string): void {
  if (!Number.isFinite(value)) {
    throw new OutOfRangeError(`${label} must be a finite number, got ${value}`, { [label]: value });
  }
}

export function naturalZone(longitude: number): number {
  const zone = Math.floor((longitude + 180) / 6) + 1;
  return zone > UTM.MAX_ZONE ? UTM.MAX_ZONE : zone;
}

export function centralMeridian(zone: number): number {
  return zone * 6 - 183;
}

export function latitudeBand(latitude: number): string {
  const index = Math.floor(latitude / 8 + 10);
  const clamped = Math.max(0, Math.min(UTM.BAND_LETTERS.length - 1, index));
  return UTM.BAND_LETTERS.charAt(clamped);
}

export function hemisphereOfBand(band: string): Hemisphere {
  return band.toUpperCase() >= 'N' ? 'N' : 'S';
}

export interface ParsedZoneLabel {
  zone: number;
  band: string;
  hemisphere: Hemisphere;
}

/**
 * Parse a zone label such as "30T" or "33n". The letter is a latitude band:
 * N and later is the northern hemisphere.
 */
export function parseZoneLabel(label: string): ParsedZoneLabel {
  const match = /^(\d{1,2})([A-Za-z])$/.exec(label.trim());
  if (!match) {
    throw new InvalidZoneError(`Malformed UTM zone '${label}', expected a zone number and band letter such as 30T`, { label });
  }

  const zone = parseInt(match[1], 10);
  const band = match[2].toUpperCase();
  if (zone < UTM.MIN_ZONE || zone > UTM.MAX_ZONE) {
    throw new InvalidZoneError(`UTM zone in '${label}' must be between ${UTM.MIN_ZONE} and ${UTM.MAX_ZONE}`, { label, zone });
  }
  if (!UTM.BAND_LETTERS.includes(band)) {
    throw new InvalidZoneError(`Invalid latitude band '${band}' in '${label}', expected C to X without I and O`, { label, band });
  }

  return { zone, band, hemisphere: hemisphereOfBand(band) };
}

export interface ToUtmOptions {
  /** Project into this zone instead of the natural one */
  zone?: number;
}

/**
 * Forward projection: geographic to UTM
 */
export function toUtm(coordinate: GeographicCoordinate, options: ToUtmOptions = {}): ProjectedUtmCoordinate {
  const { latitude, longitude } = coordinate;
  assertFinite(latitude, 'latitude');
  assertFinite(longitude, 'longitude');

  if (Math.abs(latitude) > UTM.MAX_LATITUDE) {
    throw new OutOfRangeError(
      `Latitude ${latitude} is outside the UTM band of ±${UTM.MAX_LATITUDE}°`,
      { latitude }
    );
  }
  if (longitude < COORDINATE_LIMITS.MIN_LONGITUDE || longitude > COORDINATE_LIMITS.MAX_LONGITUDE) {
    throw new OutOfRangeError(`Longitude ${longitude} is outside [-180, 180]`, { longitude });
  }

  const zone = options.zone ?? naturalZone(longitude);
  assertZone(zone);

  let deltaLongitude = longitude - centralMeridian(zone);
  // Shortest way round, for overrides across the antimeridian
  if (deltaLongitude > 180) deltaLongitude -= 360;
  if (deltaLongitude < -180) deltaLongitude += 360;
  if (Math.abs(deltaLongitude) >= 90) {
    throw new OutOfRangeError(
      `Longitude ${longitude} is too far from the central meridian of zone ${zone} to project`,
      { longitude, zone }
    );
  }

  const datum = resolveDatum(coordinate.datum);
  const { A, alpha, e } = seriesFor(datum);

  const phi = latitude * DEG2RAD;
  const lambda = deltaLongitude * DEG2RAD;
  const cosLambda = Math.cos(lambda);
  const sinLambda = Math.sin(lambda);

  const tau = Math.tan(phi);
  const tauPrime = conformalTau(tau, e);

  const xiPrime = Math.atan2(tauPrime, cosLambda);
  const etaPrime = Math.asinh(sinLambda / Math.sqrt(tauPrime * tauPrime + cosLambda * cosLambda));

  let xi = xiPrime;
  let eta = etaPrime;
  let pPrime = 1;
  let qPrime = 0;
  for (let j = 1; j <= 6; j++) {
    const twoJ = 2 * j;
    xi += alpha[j] * Math.sin(twoJ * xiPrime) * Math.cosh(twoJ * etaPrime);
    eta += alpha[j] * Math.cos(twoJ * xiPrime) * Math.sinh(twoJ * etaPrime);
    pPrime += twoJ * alpha[j] * Math.cos(twoJ * xiPrime) * Math.cosh(twoJ * etaPrime);
    qPrime += twoJ * alpha[j] * Math.sin(twoJ * xiPrime) * Math.sinh(twoJ * etaPrime);
  }

  const x = UTM.SCALE_FACTOR * A * eta;
  const y = UTM.SCALE_FACTOR * A * xi;

  // Convergence and scale (Karney 2011 eqs 23-25)
  const gammaPrime = Math.atan(tauPrime / Math.sqrt(1 + tauPrime * tauPrime) * Math.tan(lambda));
  const gammaDoublePrime = Math.atan2(qPrime, pPrime);
  const convergence = (gammaPrime + gammaDoublePrime) * RAD2DEG;

  const sinPhi = Math.sin(phi);
  const kPrime = Math.sqrt(1 - datum.e2 * sinPhi * sinPhi) * Math.sqrt(1 + tau * tau)
    / Math.sqrt(tauPrime * tauPrime + cosLambda * cosLambda);
  const kDoublePrime = A / datum.a * Math.sqrt(pPrime * pPrime + qPrime * qPrime);
  const scale = UTM.SCALE_FACTOR * kPrime * kDoublePrime;

  const hemisphere: Hemisphere = latitude >= 0 ? 'N' : 'S';

  return {
    zone,
    hemisphere,
    band: latitudeBand(latitude),
    easting: UTM.FALSE_EASTING + x,
    northing: hemisphere === 'S' ? UTM.FALSE_NORTHING_SOUTH + y : y,
    datum: datum.id,
    convergence,
    scale,
  };
}

/**
 * Inverse projection: UTM to geographic
 */
export function toGeographic(utm: UtmCoordinate): GeographicCoordinate {
  assertZone(utm.zone);
  if (utm.hemisphere !== 'N' && utm.hemisphere !== 'S') {
    throw new InvalidZoneError(`Hemisphere must be 'N' or 'S', got '${String(utm.hemisphere)}'`, { hemisphere: utm.hemisphere });
  }
  assertFinite(utm.easting, 'easting');
  assertFinite(utm.northing, 'northing');

  const datum = resolveDatum(utm.datum);
  const { A, beta, e } = seriesFor(datum);

  const x = utm.easting - UTM.FALSE_EASTING;
  const y = utm.hemisphere === 'S' ? utm.northing - UTM.FALSE_NORTHING_SOUTH : utm.northing;

  const eta = x / (UTM.SCALE_FACTOR * A);
  const xi = y / (UTM.SCALE_FACTOR * A);

  let xiPrime = xi;
  let etaPrime = eta;
  for (let j = 1; j <= 6; j++) {
    const twoJ = 2 * j;
    xiPrime -= beta[j] * Math.sin(twoJ * xi) * Math.cosh(twoJ * eta);
    etaPrime -= beta[j] * Math.cos(twoJ * xi) * Math.sinh(twoJ * eta);
  }

  const sinhEtaPrime = Math.sinh(etaPrime);
  const sinXiPrime = Math.sin(xiPrime);
  const cosXiPrime = Math.cos(xiPrime);
  const tauPrime = sinXiPrime / Math.sqrt(sinhEtaPrime * sinhEtaPrime + cosXiPrime * cosXiPrime);

  // Newton-Raphson for tau = tan(phi)
  let tau = tauPrime;
  for (let i = 0; i < NEWTON_MAX_ITERATIONS; i++) {
    const tauIPrime = conformalTau(tau, e);
    const delta = (tauPrime - tauIPrime) / Math.sqrt(1 + tauIPrime * tauIPrime)
      * (1 + (1 - datum.e2) * tau * tau) / ((1 - datum.e2) * Math.sqrt(1 + tau * tau));
    tau += delta;
    if (Math.abs(delta) < NEWTON_TOLERANCE) {
      break;
    }
  }

  const latitude = Math.atan(tau) * RAD2DEG;
  let longitude = centralMeridian(utm.zone) + Math.atan2(sinhEtaPrime, cosXiPrime) * RAD2DEG;
  if (longitude > 180) longitude -= 360;
  if (longitude < -180) longitude += 360;

  if (!Number.isFinite(latitude) || Math.abs(latitude) > UTM.MAX_LATITUDE) {
    throw new OutOfRangeError(
      `UTM coordinate ${utm.zone}${utm.hemisphere} ${utm.easting}E ${utm.northing}N lies outside the UTM band of ±${UTM.MAX_LATITUDE}°`,
      { zone: utm.zone, easting: utm.easting, northing: utm.northing, latitude }
    );
  }

  return { latitude, longitude, datum: datum.id };
}

/**
 * Build a UtmCoordinate from a zone label such as "30T"
 */
export function utmFromLabel(easting: number, northing: number, zoneLabel: string, datum: string): UtmCoordinate {
  const { zone, band, hemisphere } = parseZoneLabel(zoneLabel);
  return { zone, hemisphere, band, easting, northing, datum: resolveDatum(datum).id };
}

export function formatUtm(utm: UtmCoordinate, fractionDigits: number = configHelpers.getUtmPrecision()): string {
  const label = utm.band ?? utm.hemisphere;
  const easting = configHelpers.formatUtmValue(utm.easting, fractionDigits);
  const northing = configHelpers.formatUtmValue(utm.northing, fractionDigits);
  return `${utm.zone}${label} ${easting}E ${northing}N`;
}
