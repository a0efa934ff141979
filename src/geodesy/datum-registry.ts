import { DEFAULT_DATUM_ID, SUPPORTED_DATUMS } from '../constants';
import { UnknownDatumError } from '../errors';
import type { Datum, DatumId, HelmertParameters } from '../types';

interface DatumDefinition {
  id: DatumId;
  name: string;
  shortName: string;
  a: number;
  inverseFlattening: number;
  fromWgs84: HelmertParameters;
}

const NO_SHIFT: HelmertParameters = { tx: 0, ty: 0, tz: 0, rx: 0, ry: 0, rz: 0, s: 0 };

// Position-vector convention. NAD83 and ETRS89 are plate-fixed frames, so the
// shift from WGS84 drifts over time; these values are fixed at a recent epoch
// and are good to a few centimetres, which is below what the tool displays.
const DEFINITIONS: DatumDefinition[] = [
  {
    id: 'WGS84',
    name: 'World Geodetic System 1984',
    shortName: 'WGS 84',
    a: 6378137,
    inverseFlattening: 298.257223563,
    fromWgs84: NO_SHIFT,
  },
  {
    id: 'NAD83',
    name: 'North American Datum 1983',
    shortName: 'NAD83',
    a: 6378137,
    inverseFlattening: 298.257222101,
    fromWgs84: { tx: 0.991, ty: -1.9072, tz: -0.5129, rx: 0.02579, ry: 0.00965, rz: 0.01166, s: 0 },
  },
  {
    id: 'ETRS89',
    name: 'European Terrestrial Reference System 1989',
    shortName: 'ETRS89',
    a: 6378137,
    inverseFlattening: 298.257222101,
    fromWgs84: { tx: 0.054, ty: 0.051, tz: -0.048, rx: 0.00251, ry: 0.01519, rz: -0.02455, s: 0 },
  },
];

function buildDatum(definition: DatumDefinition): Datum {
  const f = 1 / definition.inverseFlattening;
  const b = definition.a * (1 - f);
  return Object.freeze({
    id: definition.id,
    name: definition.name,
    shortName: definition.shortName,
    a: definition.a,
    f,
    b,
    e2: f * (2 - f),
    n: f / (2 - f),
    fromWgs84: Object.freeze({ ...definition.fromWgs84 }),
  });
}

const DATUMS: ReadonlyMap<DatumId, Datum> = new Map(
  DEFINITIONS.map(definition => [definition.id, buildDatum(definition)] as const)
);

export function isDatumId(value: string): value is DatumId {
  return SUPPORTED_DATUMS.some(id => id === value);
}

/**
 * Look up a datum by identifier. Matching is case-insensitive; no identifier
 * means WGS84.
 */
export function resolveDatum(identifier?: string): Datum {
  const key = (identifier ?? DEFAULT_DATUM_ID).trim().toUpperCase();
  const datum = isDatumId(key) ? DATUMS.get(key) : undefined;
  if (!datum) {
    throw new UnknownDatumError(identifier ?? '', SUPPORTED_DATUMS);
  }
  return datum;
}

export function listDatums(): Datum[] {
  return SUPPORTED_DATUMS.map(id => resolveDatum(id));
}

export const DEFAULT_DATUM: Datum = resolveDatum(DEFAULT_DATUM_ID);
