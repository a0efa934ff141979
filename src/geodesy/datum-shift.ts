import type { Datum, GeographicCoordinate, HelmertParameters } from '../types';
import { resolveDatum } from './datum-registry';

const DEG2RAD = Math.PI / 180;
const RAD2DEG = 180 / Math.PI;
const ARCSEC2RAD = Math.PI / (180 * 3600);

export interface Cartesian {
  x: number;
  y: number;
  z: number;
}

export function geodeticToCartesian(latitude: number, longitude: number, height: number, datum: Datum): Cartesian {
  const phi = latitude * DEG2RAD;
  const lambda = longitude * DEG2RAD;
  const sinPhi = Math.sin(phi);
  const cosPhi = Math.cos(phi);
  const nu = datum.a / Math.sqrt(1 - datum.e2 * sinPhi * sinPhi);

  return {
    x: (nu + height) * cosPhi * Math.cos(lambda),
    y: (nu + height) * cosPhi * Math.sin(lambda),
    z: (nu * (1 - datum.e2) + height) * sinPhi,
  };
}

/**
 * Bowring's closed form; sub-millimetre for points near the ellipsoid surface.
 */
export function cartesianToGeodetic(point: Cartesian, datum: Datum): { latitude: number; longitude: number; height: number } {
  const { x, y, z } = point;
  const { a, b, e2 } = datum;
  const secondEccentricity2 = e2 / (1 - e2);
  const p = Math.sqrt(x * x + y * y);
  const theta = Math.atan2(z * a, p * b);
  const sinTheta = Math.sin(theta);
  const cosTheta = Math.cos(theta);

  const phi = Math.atan2(
    z + secondEccentricity2 * b * sinTheta * sinTheta * sinTheta,
    p - e2 * a * cosTheta * cosTheta * cosTheta
  );
  const lambda = Math.atan2(y, x);
  const sinPhi = Math.sin(phi);
  const height = p * Math.cos(phi) + z * sinPhi - a * Math.sqrt(1 - e2 * sinPhi * sinPhi);

  return { latitude: phi * RAD2DEG, longitude: lambda * RAD2DEG, height };
}

export function applyHelmert(point: Cartesian, params: HelmertParameters, inverse = false): Cartesian {
  const sign = inverse ? -1 : 1;
  const tx = sign * params.tx;
  const ty = sign * params.ty;
  const tz = sign * params.tz;
  const rx = sign * params.rx * ARCSEC2RAD;
  const ry = sign * params.ry * ARCSEC2RAD;
  const rz = sign * params.rz * ARCSEC2RAD;
  const scale = 1 + sign * params.s * 1e-6;

  return {
    x: tx + scale * point.x - rz * point.y + ry * point.z,
    y: ty + rz * point.x + scale * point.y - rx * point.z,
    z: tz - ry * point.x + rx * point.y + scale * point.z,
  };
}

/**
 * Express a geographic coordinate in another datum. Same datum in, same
 * numbers out.
 */
export function reproject(coordinate: GeographicCoordinate, targetDatumId: string): GeographicCoordinate {
  const source = resolveDatum(coordinate.datum);
  const target = resolveDatum(targetDatumId);

  if (source.id === target.id) {
    return { ...coordinate, datum: target.id };
  }

  const height = coordinate.altitude ?? 0;
  const sourceCartesian = geodeticToCartesian(coordinate.latitude, coordinate.longitude, height, source);
  const wgs84Cartesian = applyHelmert(sourceCartesian, source.fromWgs84, true);
  const targetCartesian = applyHelmert(wgs84Cartesian, target.fromWgs84);
  const shifted = cartesianToGeodetic(targetCartesian, target);

  const result: GeographicCoordinate = {
    latitude: shifted.latitude,
    longitude: shifted.longitude,
    datum: target.id,
  };
  if (coordinate.altitude !== undefined) {
    result.altitude = shifted.height;
  }
  return result;
}
