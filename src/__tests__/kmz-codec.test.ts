import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { buildKml, parseKml } from '../codec/kml-markup';
import { deserialize, readKmzFile, serialize, withKmzExtension, writeKmzFile } from '../codec/kmz-codec';
import { MalformedArchiveError, MalformedMarkupError, MissingMarkupError } from '../errors';
import type { PlacemarkDocument } from '../types';

const survey: PlacemarkDocument = {
  name: 'Ridge & Col',
  points: [
    { name: 'Point_1', coordinate: { latitude: 40.0151, longitude: -3.6531, datum: 'WGS84' } },
    {
      name: 'Summit',
      coordinate: { latitude: 40.4168, longitude: -3.7038, datum: 'ETRS89', altitude: 657 },
      style: { styleUrl: '#red-pin', description: 'Trig point' },
    },
  ],
};

async function zipOf(entries: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

function kmlDocument(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<kml xmlns="http://www.opengis.net/kml/2.2">${body}</kml>`;
}

describe('KML markup', () => {
  it('writes WGS84 coordinates in lon,lat order with a datum marker', () => {
    const kml = buildKml({ name: 'One', points: [survey.points[0]] });
    expect(kml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<kml xmlns="http://www.opengis.net/kml/2.2">')).toBe(true);
    expect(kml).toContain('<coordinates>-3.6531,40.0151</coordinates>');
    expect(kml).toContain('<Data name="datum">');
    expect(kml).toContain('<value>WGS84</value>');
  });

  it('escapes markup characters in names', () => {
    expect(buildKml({ name: 'A & B', points: [] })).toContain('<name>A &amp; B</name>');
  });

  it('reads back what it writes', () => {
    const { document, report } = parseKml(buildKml(survey));
    expect(document.name).toBe('Ridge & Col');
    expect(document.points[0]).toEqual(survey.points[0]);
    expect(document.points[1].name).toBe('Summit');
    expect(document.points[1].style).toEqual({ styleUrl: '#red-pin', description: 'Trig point' });
    expect(document.points[1].coordinate.datum).toBe('ETRS89');
    expect(document.points[1].coordinate.latitude).toBeCloseTo(40.4168, 8);
    expect(document.points[1].coordinate.longitude).toBeCloseTo(-3.7038, 8);
    expect(document.points[1].coordinate.altitude).toBeCloseTo(657, 3);
    expect(report).toEqual({
      success: true,
      accepted: ['Point_1', 'Summit'],
      skipped: [],
      defaulted: [],
      documentNameDefaulted: false,
    });
  });

  it('flattens folders and reports skipped and defaulted placemarks', () => {
    const kml = kmlDocument(`
      <Document>
        <name>Survey</name>
        <Placemark><name>Top</name><Point><coordinates>-3.5,40.5,650</coordinates></Point></Placemark>
        <Folder>
          <name>Group</name>
          <Placemark><name>Inner</name><description>inside</description><Point><coordinates>-3.6,40.6</coordinates></Point></Placemark>
          <Placemark><name>Track</name><LineString><coordinates>-3.6,40.6 -3.7,40.7</coordinates></LineString></Placemark>
          <Placemark><Point><coordinates>-3.8,40.8</coordinates></Point></Placemark>
          <Placemark><name>Top</name><Point><coordinates>-3.9,40.9</coordinates></Point></Placemark>
        </Folder>
      </Document>`);

    const { document, report } = parseKml(kml);

    expect(document.name).toBe('Survey');
    expect(document.points).toEqual([
      { name: 'Top', coordinate: { latitude: 40.5, longitude: -3.5, datum: 'WGS84', altitude: 650 } },
      { name: 'Inner', coordinate: { latitude: 40.6, longitude: -3.6, datum: 'WGS84' }, style: { description: 'inside' } },
    ]);
    expect(report.accepted).toEqual(['Top', 'Inner']);
    expect(report.skipped).toEqual([
      { index: 2, name: 'Track', reason: 'unsupported geometry (only Point placemarks are read)' },
      { index: 3, reason: 'missing name' },
      { index: 4, name: 'Top', reason: 'duplicate name, first occurrence kept' },
    ]);
    expect(report.defaulted).toEqual([
      { name: 'Top', fields: ['datum'] },
      { name: 'Inner', fields: ['datum'] },
    ]);
    expect(report.success).toBe(false);
    expect(report.error).toBe('3 placemark(s) skipped');
  });

  it('defaults a missing document name', () => {
    const { document, report } = parseKml(kmlDocument('<Document></Document>'));
    expect(document).toEqual({ name: 'Untitled', points: [] });
    expect(report.documentNameDefaulted).toBe(true);
  });

  it('skips placemarks with unreadable coordinates', () => {
    const { report } = parseKml(kmlDocument(`
      <Document><name>D</name>
        <Placemark><name>A</name><Point><coordinates>abc,def</coordinates></Point></Placemark>
        <Placemark><name>B</name><Point><coordinates>10,95</coordinates></Point></Placemark>
        <Placemark><name>C</name><Point></Point></Placemark>
      </Document>`));
    expect(report.accepted).toEqual([]);
    expect(report.skipped.map(entry => entry.reason)).toEqual([
      "malformed coordinates 'abc,def'",
      "coordinates out of range '10,95'",
      'unsupported geometry (only Point placemarks are read)',
    ]);
  });

  it('treats an unknown datum marker as WGS84', () => {
    const { document, report } = parseKml(kmlDocument(`
      <Document><name>D</name>
        <Placemark><name>A</name>
          <ExtendedData><Data name="datum"><value>ED50</value></Data></ExtendedData>
          <Point><coordinates>1,2</coordinates></Point>
        </Placemark>
      </Document>`));
    expect(document.points[0].coordinate).toEqual({ latitude: 2, longitude: 1, datum: 'WGS84' });
    expect(report.defaulted).toEqual([{ name: 'A', fields: ['datum'] }]);
  });

  it('rejects markup that is not well-formed', () => {
    expect(() => parseKml('<kml><Document></kml>')).toThrow(MalformedMarkupError);
  });

  it('rejects documents whose root is not kml', () => {
    expect(() => parseKml('<gpx><wpt/></gpx>')).toThrow(MalformedMarkupError);
    expect(() => parseKml('<gpx><wpt/></gpx>')).toThrow('Markup root element is not <kml>');
  });
});

describe('KMZ archive', () => {
  it('stores the markup as doc.kml', async () => {
    const bytes = await serialize(survey);
    const zip = await JSZip.loadAsync(bytes);
    expect(Object.keys(zip.files)).toEqual(['doc.kml']);
    const kml = await zip.file('doc.kml')?.async('string');
    expect(kml).toBe(buildKml(survey));
  });

  it('round trips a document', async () => {
    const decoded = await deserialize(await serialize(survey));
    expect(decoded.markupEntry).toBe('doc.kml');
    expect(decoded.document.name).toBe('Ridge & Col');
    expect(decoded.document.points.map(point => point.name)).toEqual(['Point_1', 'Summit']);
    expect(decoded.document.points[0].coordinate).toEqual({ latitude: 40.0151, longitude: -3.6531, datum: 'WGS84' });
  });

  it('round trips an empty document', async () => {
    const decoded = await deserialize(await serialize({ name: 'Empty', points: [] }));
    expect(decoded.document).toEqual({ name: 'Empty', points: [] });
  });

  it('falls back to another .kml entry at the archive root', async () => {
    const kml = kmlDocument('<Document><name>Other</name></Document>');
    const decoded = await deserialize(await zipOf({ 'files/nested.kml': kml, 'other.kml': kml, 'files/icon.png': 'x' }));
    expect(decoded.markupEntry).toBe('other.kml');
    expect(decoded.document.name).toBe('Other');
  });

  it('uses a nested .kml entry when nothing else is there', async () => {
    const kml = kmlDocument('<Document><name>Nested</name></Document>');
    const decoded = await deserialize(await zipOf({ 'files/nested.kml': kml }));
    expect(decoded.markupEntry).toBe('files/nested.kml');
  });

  it('rejects bytes that are not a zip archive', async () => {
    await expect(deserialize(Buffer.from('definitely not a zip'))).rejects.toThrow(MalformedArchiveError);
  });

  it('rejects archives without markup', async () => {
    await expect(deserialize(await zipOf({ 'readme.txt': 'hello' }))).rejects.toThrow(MissingMarkupError);
    await expect(deserialize(await zipOf({ 'readme.txt': 'hello' }))).rejects.toThrow(
      'Archive does not contain a .kml document (entries: readme.txt)'
    );
  });

  it('rejects archives with broken markup', async () => {
    await expect(deserialize(await zipOf({ 'doc.kml': '<kml><Document>' }))).rejects.toThrow(MalformedMarkupError);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kmzcraft-codec-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('appends the .kmz extension when missing', () => {
      expect(withKmzExtension('survey')).toBe('survey.kmz');
      expect(withKmzExtension('survey.kmz')).toBe('survey.kmz');
      expect(withKmzExtension('archive.zip')).toBe('archive.zip');
    });

    it('writes and reads a file', async () => {
      const written = await writeKmzFile(path.join(dir, 'survey'), survey);
      expect(written).toBe(path.join(dir, 'survey.kmz'));
      expect(fs.existsSync(written)).toBe(true);

      const decoded = await readKmzFile(path.join(dir, 'survey'));
      expect(decoded.path).toBe(written);
      expect(decoded.document.points).toHaveLength(2);
    });
  });
});
