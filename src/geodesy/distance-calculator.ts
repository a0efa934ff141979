import { Geodesic } from 'geographiclib-geodesic';
import type { Datum, DatumId, DistanceResult, GeographicCoordinate, LineDistanceResult, Point } from '../types';
import { resolveDatum } from './datum-registry';
import { reproject } from './datum-shift';

export interface Measurement {
  meters: number;
  /** Forward azimuths at each end, degrees clockwise from north */
  initialAzimuth: number;
  finalAzimuth: number;
  /** Datum both coordinates were expressed in when measured */
  datum: Datum;
}

type GeodesicSolver = InstanceType<typeof Geodesic.Geodesic>;

const solvers = new Map<DatumId, GeodesicSolver>();

function solverFor(datum: Datum): GeodesicSolver {
  let solver = solvers.get(datum.id);
  if (!solver) {
    solver = new Geodesic.Geodesic(datum.a, datum.f);
    solvers.set(datum.id, solver);
  }
  return solver;
}

/**
 * Geodesic distance between two coordinates on the ellipsoid (Karney's
 * inverse solution, which converges for antipodal points as well). When the
 * datums differ the first coordinate is reprojected into the datum of the
 * second.
 */
export function measure(from: GeographicCoordinate, to: GeographicCoordinate): Measurement {
  const datum = resolveDatum(to.datum);
  const origin = from.datum === datum.id ? from : reproject(from, datum.id);

  const { s12, azi1, azi2 } = solverFor(datum).Inverse(
    origin.latitude,
    origin.longitude,
    to.latitude,
    to.longitude,
    Geodesic.DISTANCE | Geodesic.AZIMUTH
  );
  if (s12 === undefined || azi1 === undefined || azi2 === undefined) {
    throw new Error('Geodesic inverse returned no distance');
  }
  return { meters: s12, initialAzimuth: azi1, finalAzimuth: azi2, datum };
}

/**
 * Distance in metres between two points
 */
export function distance(a: Point, b: Point): number {
  if (a === b) {
    return 0;
  }
  return measure(a.coordinate, b.coordinate).meters;
}

export interface DistanceListOptions {
  /** Express every point in this datum before measuring */
  datum?: string;
}

function inDatum(points: readonly Point[], datum?: string): readonly Point[] {
  if (datum === undefined) {
    return points;
  }
  const target = resolveDatum(datum).id;
  return points.map(point => ({ ...point, coordinate: reproject(point.coordinate, target) }));
}

/**
 * Distances between every pair of points, in registry order
 */
export function distancesAll(input: readonly Point[], options: DistanceListOptions = {}): DistanceResult[] {
  const points = inDatum(input, options.datum);
  const results: DistanceResult[] = [];
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      results.push({ from: points[i].name, to: points[j].name, meters: distance(points[i], points[j]) });
    }
  }
  return results;
}

/**
 * Distances between consecutive points, plus the total along the chain
 */
export function distancesLine(input: readonly Point[], options: DistanceListOptions = {}): LineDistanceResult {
  const points = inDatum(input, options.datum);
  const legs: DistanceResult[] = [];
  for (let i = 0; i + 1 < points.length; i++) {
    legs.push({ from: points[i].name, to: points[i + 1].name, meters: distance(points[i], points[i + 1]) });
  }
  return {
    legs,
    totalMeters: legs.reduce((sum, leg) => sum + leg.meters, 0),
  };
}
