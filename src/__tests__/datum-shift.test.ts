import { UnknownDatumError } from '../errors';
import { resolveDatum } from '../geodesy/datum-registry';
import { applyHelmert, cartesianToGeodetic, geodeticToCartesian, reproject } from '../geodesy/datum-shift';
import type { GeographicCoordinate } from '../types';

describe('Datum shift', () => {
  const madrid: GeographicCoordinate = { latitude: 40.4168, longitude: -3.7038, datum: 'WGS84' };

  describe('reproject', () => {
    it('is the identity when the datum is unchanged', () => {
      const result = reproject(madrid, 'wgs84');
      expect(result).toEqual(madrid);
      expect(result).not.toBe(madrid);
    });

    it('keeps the exact numbers for an identity shift with altitude', () => {
      const withAltitude: GeographicCoordinate = { ...madrid, datum: 'ETRS89', altitude: 657.25 };
      expect(reproject(withAltitude, 'ETRS89')).toEqual(withAltitude);
    });

    it('moves a point by less than a few metres between WGS84 and NAD83', () => {
      const shifted = reproject({ latitude: 39.7392, longitude: -104.9903, datum: 'WGS84' }, 'NAD83');
      expect(shifted.datum).toBe('NAD83');
      expect(shifted.latitude).not.toBe(39.7392);
      expect(Math.abs(shifted.latitude - 39.7392)).toBeLessThan(1e-4);
      expect(Math.abs(shifted.longitude - -104.9903)).toBeLessThan(1e-4);
    });

    it('returns to the starting coordinate after a shift there and back', () => {
      const etrs = reproject(madrid, 'ETRS89');
      const back = reproject(etrs, 'WGS84');
      expect(back.latitude).toBeCloseTo(madrid.latitude, 8);
      expect(back.longitude).toBeCloseTo(madrid.longitude, 8);
      expect(back.datum).toBe('WGS84');
    });

    it('goes through WGS84 between two non-WGS84 datums', () => {
      const start: GeographicCoordinate = { latitude: 45.5, longitude: -73.5, datum: 'NAD83' };
      const etrs = reproject(start, 'ETRS89');
      const back = reproject(etrs, 'NAD83');
      expect(etrs.datum).toBe('ETRS89');
      expect(back.latitude).toBeCloseTo(45.5, 8);
      expect(back.longitude).toBeCloseTo(-73.5, 8);
    });

    it('carries altitude only when present', () => {
      expect(reproject(madrid, 'ETRS89').altitude).toBeUndefined();
      const withAltitude = reproject({ ...madrid, altitude: 650 }, 'ETRS89');
      expect(withAltitude.altitude).toBeDefined();
      expect(Math.abs((withAltitude.altitude ?? 0) - 650)).toBeLessThan(1);
    });

    it('rejects unknown target datums', () => {
      expect(() => reproject(madrid, 'ED50')).toThrow(UnknownDatumError);
    });
  });

  describe('cartesian conversion', () => {
    it('places the equator and prime meridian on the x axis', () => {
      const point = geodeticToCartesian(0, 0, 0, resolveDatum('WGS84'));
      expect(point.x).toBeCloseTo(6378137, 6);
      expect(point.y).toBeCloseTo(0, 6);
      expect(point.z).toBeCloseTo(0, 6);
    });

    it('places the north pole at the semi-minor axis', () => {
      const wgs84 = resolveDatum('WGS84');
      const point = geodeticToCartesian(90, 0, 0, wgs84);
      expect(point.z).toBeCloseTo(wgs84.b, 6);
    });

    it('inverts geodetic to cartesian', () => {
      const datum = resolveDatum('ETRS89');
      const geodetic = cartesianToGeodetic(geodeticToCartesian(52.37, 4.89, 120, datum), datum);
      expect(geodetic.latitude).toBeCloseTo(52.37, 8);
      expect(geodetic.longitude).toBeCloseTo(4.89, 8);
      expect(geodetic.height).toBeCloseTo(120, 2);
    });
  });

  describe('applyHelmert', () => {
    it('undoes itself when applied inversely', () => {
      const params = resolveDatum('NAD83').fromWgs84;
      const start = { x: 1000000, y: -4500000, z: 4300000 };
      const back = applyHelmert(applyHelmert(start, params), params, true);
      expect(back.x).toBeCloseTo(start.x, 3);
      expect(back.y).toBeCloseTo(start.y, 3);
      expect(back.z).toBeCloseTo(start.z, 3);
    });

    it('only translates when rotations and scale are zero', () => {
      const shifted = applyHelmert({ x: 1, y: 2, z: 3 }, { tx: 10, ty: 20, tz: 30, rx: 0, ry: 0, rz: 0, s: 0 });
      expect(shifted).toEqual({ x: 11, y: 22, z: 33 });
    });
  });
});
