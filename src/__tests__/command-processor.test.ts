import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandProcessor, tokenize, type CommandMessage } from '../session/CommandProcessor';
import { Session } from '../session/Session';
import { resolveCommand } from '../session/commands';

function texts(messages: CommandMessage[]): string[] {
  return messages.map(message => message.text);
}

describe('CommandProcessor', () => {
  let dir: string;
  let session: Session;
  let processor: CommandProcessor;
  let confirmAnswer: boolean;
  let questions: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kmzcraft-commands-'));
    session = new Session();
    confirmAnswer = false;
    questions = [];
    processor = new CommandProcessor(session, {
      cwd: dir,
      confirm: async question => {
        questions.push(question);
        return confirmAnswer;
      },
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('tokenize', () => {
    it('splits on whitespace and keeps quoted words together', () => {
      expect(tokenize('  addlonlat "North gate" 40.1  -3.2 ')).toEqual(['addlonlat', 'North gate', '40.1', '-3.2']);
      expect(tokenize('')).toEqual([]);
    });
  });

  describe('aliases', () => {
    it('resolves aliases to canonical commands', () => {
      expect(resolveCommand('sp')?.name).toBe('list');
      expect(resolveCommand('NEW')?.name).toBe('create');
      expect(resolveCommand('quit')?.name).toBe('exit');
      expect(resolveCommand('nope')).toBeUndefined();
    });
  });

  it('ignores empty lines', async () => {
    await expect(processor.execute('   ')).resolves.toEqual({ messages: [], exit: false });
  });

  it('reports unknown commands', async () => {
    const result = await processor.execute('frobnicate');
    expect(result.messages).toEqual([{ level: 'error', text: 'Unknown command: frobnicate. Type help to list commands.' }]);
  });

  it('requires a document for point commands', async () => {
    const result = await processor.execute('list');
    expect(result.messages).toEqual([
      { level: 'error', text: 'Error: No KMZ loaded or created. Use create or open <path> to begin' },
    ]);
  });

  it('creates, saves, reopens and lists a point', async () => {
    await processor.execute('create');
    const added = await processor.execute('addlonlat Point_1 40.0151 -3.6531');
    expect(added.messages).toEqual([
      { level: 'success', text: 'Point Point_1 added at (lat: 40.01510000, lon: -3.65310000, WGS84).' },
    ]);

    const saved = await processor.execute('save f.kmz');
    expect(saved.messages).toEqual([{ level: 'success', text: `KMZ saved successfully to ${path.join(dir, 'f.kmz')}.` }]);

    const opened = await processor.execute('open f.kmz');
    expect(opened.messages).toEqual([
      { level: 'success', text: `KMZ file ${path.join(dir, 'f.kmz')} loaded successfully (1 points).` },
    ]);
    expect(questions).toEqual([]);

    const listed = await processor.execute('list');
    expect(listed.messages).toEqual([
      { level: 'success', text: 'Points in the KMZ (1):' },
      { level: 'data', text: ' - Point_1: (lat: 40.01510000, lon: -3.65310000, WGS84)' },
    ]);

    const points = session.requireRegistry().list();
    expect(points).toHaveLength(1);
    expect(points[0].name).toBe('Point_1');
    expect(points[0].coordinate.latitude).toBe(40.0151);
    expect(points[0].coordinate.longitude).toBe(-3.6531);
  });

  it('saves to the last path when none is given', async () => {
    await processor.execute('create');
    await processor.execute('save first');
    const result = await processor.execute('s');
    expect(texts(result.messages)).toEqual([
      `Last path recovered (${path.join(dir, 'first.kmz')})`,
      `KMZ saved successfully to ${path.join(dir, 'first.kmz')}.`,
    ]);
  });

  it('asks before discarding unsaved changes', async () => {
    await processor.execute('create Draft');
    await processor.execute('addlonlat A 1 2');

    const cancelled = await processor.execute('create');
    expect(cancelled.messages).toEqual([{ level: 'warn', text: 'Operation cancelled.' }]);
    expect(questions).toEqual([
      'You have unsaved changes. All unsaved changes will be lost. Are you sure you want to create a new KMZ? (y/n)',
    ]);
    expect(session.requireRegistry().has('A')).toBe(true);

    confirmAnswer = true;
    await processor.execute('create');
    expect(session.requireRegistry().size).toBe(0);
  });

  it('asks before exiting with unsaved changes', async () => {
    await processor.execute('create');
    await expect(processor.execute('exit')).resolves.toEqual({
      messages: [{ level: 'warn', text: 'Exit cancelled.' }],
      exit: false,
    });
    confirmAnswer = true;
    const result = await processor.execute('q');
    expect(result.exit).toBe(true);
  });

  it('exits without asking when everything is saved', async () => {
    const result = await processor.execute('exit');
    expect(result).toEqual({ messages: [{ level: 'info', text: 'Exiting...' }], exit: true });
    expect(questions).toEqual([]);
  });

  it('adds UTM points in the session datum', async () => {
    await processor.execute('create');
    await processor.execute('setdatum ETRS89');
    const result = await processor.execute('addutm T1 500000 0 30N');
    expect(result.messages).toEqual([
      { level: 'success', text: 'Point T1 added at (lat: 0.00000000, lon: -3.00000000, ETRS89) from UTM 30N 500000.00E 0.00N.' },
    ]);
    await processor.execute('au T2 500000 0 30N WGS84');
    expect(session.requireRegistry().get('T2').coordinate.datum).toBe('WGS84');
  });

  it('turns core errors into messages', async () => {
    await processor.execute('create');
    await processor.execute('addlonlat A 1 2');
    expect(texts((await processor.execute('addlonlat A 3 4')).messages)).toEqual(["Error: A point named 'A' already exists"]);
    expect(texts((await processor.execute('addlonlat B 95 4')).messages)).toEqual(['Error: Latitude must be between -90 and 90, got 95']);
    expect(texts((await processor.execute('addlonlat B north 4')).messages)).toEqual(["Error: latitude must be a numeric value, got 'north'"]);
    expect(texts((await processor.execute('addutm C 1 2')).messages)).toEqual([
      'Error: Invalid arguments. Usage: addutm <name> <easting> <northing> <zone> [datum]',
    ]);
    expect(texts((await processor.execute('delete Z')).messages)).toEqual(["Error: Point 'Z' not found"]);
  });

  it('renames, relocates and deletes points', async () => {
    await processor.execute('create');
    await processor.execute('addlonlat A 1 2');
    expect(texts((await processor.execute('modpoint rename A B')).messages)).toEqual(['Point renamed from A to B.']);
    expect(texts((await processor.execute('mp relocate B 10 20')).messages)).toEqual([
      'Point B relocated to (lat: 10.00000000, lon: 20.00000000, WGS84).',
    ]);
    await processor.execute('modpoint relocateutm B 500000 0 30N');
    expect(session.requireRegistry().get('B').coordinate.longitude).toBeCloseTo(-3, 8);
    expect(texts((await processor.execute('modpoint shuffle B')).messages)).toEqual([
      "Error: Unknown subcommand 'shuffle'. See 'help modpoint' for usage.",
    ]);
    expect(texts((await processor.execute('del B')).messages)).toEqual(['Point B deleted successfully.']);
    expect(session.requireRegistry().size).toBe(0);
  });

  it('imports a point list and reports skipped lines', async () => {
    fs.writeFileSync(path.join(dir, 'points.txt'), 'P1 500000 4649776 30T\nP2 abc 1 30T\nbad\n');
    await processor.execute('create');
    const result = await processor.execute('addlist points.txt');
    const [first, ...rest] = result.messages;
    expect(first.level).toBe('data');
    expect(first.text.startsWith(' + P1: (lat: ')).toBe(true);
    expect(rest).toEqual([
      { level: 'warn', text: 'Line 2 (P2): Could not convert line to numeric coordinates: P2 abc 1 30T' },
      { level: 'warn', text: 'Line 3: Invalid line format (expected 4 or 5 columns, got 1): bad' },
      { level: 'success', text: 'Added 1 of 3 points from points.txt.' },
    ]);
  });

  it('keeps the coordinate when a UTM point is renamed', async () => {
    await processor.execute('create');
    await processor.execute('addutm Point_x 0 0 10T WGS84');
    const before = session.requireRegistry().get('Point_x').coordinate;

    await processor.execute('modpoint rename Point_x Point_1');
    const points = session.requireRegistry().list();
    expect(points.map(point => point.name)).toEqual(['Point_1']);
    expect(points[0].coordinate).toEqual(before);
    expect(points[0].coordinate.longitude).toBeLessThan(-123);
  });

  it('skips a bad zone without aborting the rest of the list', async () => {
    const lines = Array.from({ length: 10 }, (_, i) => `P${i + 1} 500000 ${4649776 + i * 100} ${i === 3 ? '99T' : '30T'}`);
    fs.writeFileSync(path.join(dir, 'ten.txt'), lines.join('\n'));
    await processor.execute('create');

    const result = await processor.execute('addlist ten.txt');
    const warnings = result.messages.filter(message => message.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].text.startsWith('Line 4 (P4): ')).toBe(true);
    expect(result.messages[result.messages.length - 1]).toEqual({
      level: 'success',
      text: 'Added 9 of 10 points from ten.txt.',
    });
    expect(session.requireRegistry().has('P4')).toBe(false);
    expect(session.requireRegistry().size).toBe(9);
  });

  it('rejects point lists with unsupported extensions', async () => {
    await processor.execute('create');
    const result = await processor.execute('addlist points.gpx');
    expect(texts(result.messages)).toEqual([
      `Error: Invalid file extension: gpx in file ${path.join(dir, 'points.gpx')}. Supported extensions are: txt, csv`,
    ]);
  });

  it('lists distances', async () => {
    await processor.execute('create');
    await processor.execute('addlonlat A 0 0');
    await processor.execute('addlonlat B 0 1');
    await processor.execute('addlonlat C 0 2');

    expect((await processor.execute('distance A B')).messages).toEqual([
      { level: 'data', text: 'A to B: 111.32 km' },
    ]);
    expect(texts((await processor.execute('distancesall')).messages)).toEqual([
      'Distances between all points (using datum WGS84):',
      ' - A to B: 111.32 km',
      ' - A to C: 222.64 km',
      ' - B to C: 111.32 km',
    ]);
    expect(texts((await processor.execute('distances')).messages)).toEqual([
      'Distances follow the order the points were added. Use distancesall for every pair.',
      'Distances between points in a line (using datum WGS84):',
      ' - A to B: 111.32 km',
      ' - B to C: 111.32 km',
      'Total distance: 222.64 km',
    ]);
  });

  it('needs two points for distance listings', async () => {
    await processor.execute('create');
    expect(texts((await processor.execute('distances')).messages)).toEqual([
      'Error: At least two points are required to calculate distances',
    ]);
  });

  it('shows datum and status', async () => {
    expect(texts((await processor.execute('datum')).messages)).toEqual(['Current datum: WGS84 (default)']);
    await processor.execute('stdt nad83');
    expect((await processor.execute('dt')).messages).toEqual([
      { level: 'warn', text: 'Current datum: NAD83 (changed from default)' },
    ]);
    expect(texts((await processor.execute('setdatum ED50')).messages)).toEqual([
      "Error: Unknown datum 'ED50'. Supported datums are: WGS84, NAD83, ETRS89",
    ]);
    await processor.execute('resetdatum');

    await processor.execute('create Notes');
    expect(texts((await processor.execute('status')).messages)).toEqual([
      '=== KMZ STATUS ===',
      "KMZ 'Notes' loaded with 0 points.",
      'There are unsaved changes. Use save <path> to preserve them',
      'Current datum: WGS84 (default)',
    ]);
  });

  it('shows help for a command', async () => {
    expect(texts((await processor.execute('help mp')).messages)).toEqual([
      "Help for 'modpoint':",
      '  modpoint <rename|relocate|relocateutm> ...',
      "  Modify a point's name or position.",
      '  modpoint rename <old> <new>',
      '  modpoint relocate <name> <lat> <lon> [datum]',
      '  modpoint relocateutm <name> <easting> <northing> <zone> [datum]',
      '  Aliases: mp, mpoint, modp',
    ]);
    expect(texts((await processor.execute('help nope')).messages)).toEqual(['Error: Unknown command: nope']);
  });

  it('lists every command in general help', async () => {
    const result = await processor.execute('?');
    expect(result.messages).toHaveLength(20);
    expect(result.messages[1].text.startsWith('  create [document name]')).toBe(true);
  });
});
