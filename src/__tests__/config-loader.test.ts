import * as path from 'path';
import { UnknownDatumError } from '../errors';
import {
  defaultConfig,
  getConfigSearchPaths,
  loadConfig,
  parseConfig,
  resetConfigCache
} from '../utils/config-loader';

describe('Config Loader', () => {
  const savedDatum = process.env.KMZCRAFT_DATUM;

  beforeEach(() => {
    delete process.env.KMZCRAFT_DATUM;
    resetConfigCache();
  });

  afterEach(() => {
    if (savedDatum === undefined) {
      delete process.env.KMZCRAFT_DATUM;
    } else {
      process.env.KMZCRAFT_DATUM = savedDatum;
    }
    resetConfigCache();
  });

  describe('parseConfig', () => {
    it('should use defaults for an empty document', () => {
      const config = parseConfig({});
      expect(config.defaults).toEqual({ datum: 'WGS84', documentName: 'Untitled' });
      expect(config.archive).toEqual(defaultConfig().archive);
      expect(config.pointList).toEqual({ supportedExtensions: ['txt', 'csv'], commentPrefix: '#' });
      expect(config.source).toBeNull();
    });

    it('should resolve datum identifiers case-insensitively', () => {
      expect(parseConfig({ defaults: { datum: 'etrs89' } }).defaults.datum).toBe('ETRS89');
    });

    it('should reject unknown datums', () => {
      expect(() => parseConfig({ defaults: { datum: 'ED50' } })).toThrow(UnknownDatumError);
    });

    it('should let the environment override the datum', () => {
      process.env.KMZCRAFT_DATUM = 'NAD83';
      expect(parseConfig({ defaults: { datum: 'ETRS89' } }).defaults.datum).toBe('NAD83');
    });

    it('should clamp the compression level', () => {
      expect(parseConfig({ archive: { compressionLevel: 42 } }).archive.compressionLevel).toBe(9);
      expect(parseConfig({ archive: { compressionLevel: 0 } }).archive.compressionLevel).toBe(1);
    });

    it('should normalize point-list extensions', () => {
      const config = parseConfig({ pointList: { supportedExtensions: ['.TXT', 'csv', 7] } });
      expect(config.pointList.supportedExtensions).toEqual(['txt', 'csv']);
    });

    it('should ignore values of the wrong type', () => {
      const config = parseConfig({ defaults: { documentName: 12 }, archive: 'fast', logging: { verbose: 'yes' } });
      expect(config.defaults.documentName).toBe('Untitled');
      expect(config.archive.markupEntry).toBe('doc.kml');
    });
  });

  describe('loadConfig', () => {
    it('should search the working directory before the package defaults', () => {
      const paths = getConfigSearchPaths('/work');
      expect(paths[0]).toBe(path.join('/work', 'configs/kmzcraft'));
      expect(paths[1]).toBe(path.join('/work', 'configs'));
    });

    it('should cache until reset', () => {
      const first = loadConfig();
      expect(loadConfig()).toBe(first);
      resetConfigCache();
      expect(loadConfig()).not.toBe(first);
    });

    it('should read the packaged configuration', () => {
      const config = loadConfig();
      expect(config.source).not.toBeNull();
      expect(config.defaults.datum).toBe('WGS84');
      expect(config.archive.compressionLevel).toBe(6);
    });
  });
});
