import * as fs from 'fs';
import { readKmzFile, withKmzExtension, writeKmzFile } from '../codec/kmz-codec';
import { InvalidArgumentError, NoDocumentError } from '../errors';
import { resolveDatum } from '../geodesy/datum-registry';
import { PointRegistry } from '../registry/PointRegistry';
import type { DatumId } from '../types';
import type { DeserializeReport } from '../types/ServiceResult';
import { loadConfig } from '../utils/config-loader';

export interface SessionOptions {
  /** Starting default datum; falls back to the configured default */
  datum?: string;
}

export interface SessionStatus {
  loaded: boolean;
  documentName: string | null;
  pointCount: number;
  filePath: string | null;
  unsavedChanges: boolean;
  datum: DatumId;
  datumIsDefault: boolean;
}

export interface OpenResult {
  registry: PointRegistry;
  report: DeserializeReport;
  path: string;
}

/**
 * One open document plus the state around it. Each session is independent,
 * so several can live in the same process.
 */
export class Session {
  private registry: PointRegistry | null = null;
  private filePath: string | null = null;
  private dirty = false;
  private currentDatum: DatumId;
  private readonly defaultDatum: DatumId;

  constructor(options: SessionOptions = {}) {
    this.defaultDatum = loadConfig().defaults.datum;
    this.currentDatum = resolveDatum(options.datum ?? this.defaultDatum).id;
  }

  get hasDocument(): boolean {
    return this.registry !== null;
  }

  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  get path(): string | null {
    return this.filePath;
  }

  get datum(): DatumId {
    return this.currentDatum;
  }

  requireRegistry(): PointRegistry {
    if (!this.registry) {
      throw new NoDocumentError();
    }
    return this.registry;
  }

  markChanged(): void {
    this.dirty = true;
  }

  /**
   * Start a new empty document. It counts as unsaved until written.
   */
  create(documentName?: string): PointRegistry {
    this.registry = new PointRegistry(documentName);
    this.filePath = null;
    this.dirty = true;
    return this.registry;
  }

  /**
   * Load a document from disk. The current document is replaced only when
   * the read succeeds.
   */
  async open(filePath: string): Promise<OpenResult> {
    const source = withKmzExtension(filePath.trim());
    if (!fs.existsSync(source)) {
      throw new InvalidArgumentError(`File ${source} does not exist`, { path: source });
    }

    const decoded = await readKmzFile(source);
    const registry = PointRegistry.fromDocument(decoded.document);

    this.registry = registry;
    this.filePath = decoded.path;
    this.dirty = false;
    return { registry, report: decoded.report, path: decoded.path };
  }

  /**
   * Write the document, to the given path or to the one it was last opened
   * from or saved to
   */
  async save(filePath?: string): Promise<string> {
    const registry = this.requireRegistry();
    const target = filePath?.trim() || this.filePath;
    if (!target) {
      throw new InvalidArgumentError('No file path provided');
    }

    const written = await writeKmzFile(target, registry.toDocument());
    this.filePath = written;
    this.dirty = false;
    return written;
  }

  setDatum(identifier: string): DatumId {
    this.currentDatum = resolveDatum(identifier).id;
    return this.currentDatum;
  }

  resetDatum(): DatumId {
    this.currentDatum = this.defaultDatum;
    return this.currentDatum;
  }

  status(): SessionStatus {
    return {
      loaded: this.registry !== null,
      documentName: this.registry?.documentName ?? null,
      pointCount: this.registry?.size ?? 0,
      filePath: this.filePath,
      unsavedChanges: this.dirty,
      datum: this.currentDatum,
      datumIsDefault: this.currentDatum === this.defaultDatum,
    };
  }
}
