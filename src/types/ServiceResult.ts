import type { Point, SkippedEntry } from './index';

/**
 * Base interface for all service results
 * Provides consistent success/error handling across all services
 */
export interface BaseServiceResult {
  success: boolean;
  error?: string;
}

/**
 * Outcome of an operation that accepts some inputs and skips others
 */
export interface BulkImportReport extends BaseServiceResult {
  accepted: Point[];
  skipped: SkippedEntry[];
}

export interface DefaultedPlacemark {
  name: string;
  fields: string[];
}

export interface SkippedPlacemark {
  /** 0-based position of the placemark in document order */
  index: number;
  name?: string;
  reason: string;
}

export interface DeserializeReport extends BaseServiceResult {
  accepted: string[];
  skipped: SkippedPlacemark[];
  defaulted: DefaultedPlacemark[];
  /** True when the document carried no name of its own */
  documentNameDefaulted: boolean;
}
