/**
 * Error details type
 */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for kmzcraft
 */
export class KmzcraftError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: ErrorDetails,
    public cause?: Error
  ) {
    super(message);
    this.name = 'KmzcraftError';
  }
}

/**
 * Datum identifier outside the supported set
 */
export class UnknownDatumError extends KmzcraftError {
  constructor(identifier: string, supported: readonly string[]) {
    super(
      `Unknown datum '${identifier}'. Supported datums are: ${supported.join(', ')}`,
      'UNKNOWN_DATUM',
      { identifier, supported: [...supported] }
    );
    this.name = 'UnknownDatumError';
  }
}

/**
 * Coordinate outside the domain of the requested operation
 */
export class OutOfRangeError extends KmzcraftError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'OUT_OF_RANGE', details);
    this.name = 'OutOfRangeError';
  }
}

export class InvalidZoneError extends KmzcraftError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INVALID_ZONE', details);
    this.name = 'InvalidZoneError';
  }
}

export class DuplicateNameError extends KmzcraftError {
  constructor(public pointName: string) {
    super(`A point named '${pointName}' already exists`, 'DUPLICATE_NAME', { name: pointName });
    this.name = 'DuplicateNameError';
  }
}

export class NotFoundError extends KmzcraftError {
  constructor(public pointName: string) {
    super(`Point '${pointName}' not found`, 'NOT_FOUND', { name: pointName });
    this.name = 'NotFoundError';
  }
}

/**
 * Bytes that do not form a readable zip archive
 */
export class MalformedArchiveError extends KmzcraftError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_ARCHIVE', undefined, cause);
    this.name = 'MalformedArchiveError';
  }
}

export class MalformedMarkupError extends KmzcraftError {
  constructor(message: string, details?: ErrorDetails, cause?: Error) {
    super(message, 'MALFORMED_MARKUP', details, cause);
    this.name = 'MalformedMarkupError';
  }
}

/**
 * Valid archive without a markup document inside
 */
export class MissingMarkupError extends KmzcraftError {
  constructor(entries: string[]) {
    super(
      `Archive does not contain a .kml document (entries: ${entries.length > 0 ? entries.join(', ') : 'none'})`,
      'MISSING_MARKUP',
      { entries }
    );
    this.name = 'MissingMarkupError';
  }
}

export class InvalidFileExtensionError extends KmzcraftError {
  constructor(extension: string, filePath: string, supported: readonly string[]) {
    super(
      `Invalid file extension: ${extension || '(none)'} in file ${filePath}. Supported extensions are: ${supported.join(', ')}`,
      'INVALID_FILE_EXTENSION',
      { extension, filePath, supported: [...supported] }
    );
    this.name = 'InvalidFileExtensionError';
  }
}

export class PointListExtractionError extends KmzcraftError {
  constructor(filePath: string, cause?: Error) {
    super(
      `An error occurred while reading point list ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'POINT_LIST_EXTRACTION',
      { filePath },
      cause
    );
    this.name = 'PointListExtractionError';
  }
}

export class NoDocumentError extends KmzcraftError {
  constructor() {
    super('No KMZ loaded or created. Use create or open <path> to begin', 'NO_DOCUMENT');
    this.name = 'NoDocumentError';
  }
}

export class InvalidArgumentError extends KmzcraftError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INVALID_ARGUMENT', details);
    this.name = 'InvalidArgumentError';
  }
}

export function isKmzcraftError(error: unknown): error is KmzcraftError {
  return error instanceof KmzcraftError;
}

/**
 * Render any thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
