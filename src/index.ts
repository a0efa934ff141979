/**
 * KMZCRAFT - Placemark collections with UTM and datum support
 *
 * A TypeScript library for building KMZ placemark documents from geographic
 * or UTM coordinates, with datum shifts and geodesic distances.
 */

// Geodesy
export { DEFAULT_DATUM, isDatumId, listDatums, resolveDatum } from './geodesy/datum-registry';
export { applyHelmert, cartesianToGeodetic, geodeticToCartesian, reproject } from './geodesy/datum-shift';
export type { Cartesian } from './geodesy/datum-shift';
export {
  centralMeridian,
  formatUtm,
  hemisphereOfBand,
  latitudeBand,
  naturalZone,
  parseZoneLabel,
  toGeographic,
  toUtm,
  utmFromLabel
} from './geodesy/projection-engine';
export type { ParsedZoneLabel, ToUtmOptions } from './geodesy/projection-engine';
export { distance, distancesAll, distancesLine, measure } from './geodesy/distance-calculator';
export type { DistanceListOptions, Measurement } from './geodesy/distance-calculator';

// Registry
export { PointRegistry, validateCoordinate } from './registry/PointRegistry';

// Codec
export { buildKml, parseKml } from './codec/kml-markup';
export type { ParsedMarkup } from './codec/kml-markup';
export { deserialize, readKmzFile, serialize, withKmzExtension, writeKmzFile } from './codec/kmz-codec';
export type { DecodedArchive } from './codec/kmz-codec';

// Point lists
export { importPointList, parseDecimal, parsePointList, readPointListFile } from './io/point-list-reader';
export type { PointListOptions, PointListParseResult } from './io/point-list-reader';

// Session
export { Session } from './session/Session';
export type { OpenResult, SessionOptions, SessionStatus } from './session/Session';
export { CommandProcessor, tokenize } from './session/CommandProcessor';
export type {
  CommandMessage,
  CommandProcessorOptions,
  CommandResult,
  ConfirmFn,
  MessageLevel
} from './session/CommandProcessor';
export { COMMANDS, resolveCommand } from './session/commands';
export type { CommandDefinition, CommandName } from './session/commands';

// Configuration
export { GLOBAL_CONFIG, configHelpers } from './config/kmzcraft.global.config';
export { defaultConfig, loadConfig, parseConfig, resetConfigCache } from './utils/config-loader';
export type { KmzcraftConfig } from './utils/config-loader';

// Errors and types
export * from './errors';
export * from './types';
export * from './types/ServiceResult';

// Constants
export * from './constants';
