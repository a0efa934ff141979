import * as path from 'path';
import { DEFAULT_DATUM_ID } from '../constants';
import { InvalidArgumentError, describeError } from '../errors';
import { configHelpers } from '../config/kmzcraft.global.config';
import { resolveDatum } from '../geodesy/datum-registry';
import { distancesAll, distancesLine, measure } from '../geodesy/distance-calculator';
import { formatUtm, utmFromLabel } from '../geodesy/projection-engine';
import { importPointList, parseDecimal, readPointListFile } from '../io/point-list-reader';
import type { GeographicCoordinate, Point } from '../types';
import type { DeserializeReport } from '../types/ServiceResult';
import { COMMANDS, resolveCommand, type CommandDefinition, type CommandName } from './commands';
import type { Session } from './Session';

export type MessageLevel = 'info' | 'success' | 'warn' | 'error' | 'data';

export interface CommandMessage {
  level: MessageLevel;
  text: string;
}

export interface CommandResult {
  messages: CommandMessage[];
  /** True when the shell should stop reading commands */
  exit: boolean;
}

export type ConfirmFn = (question: string) => Promise<boolean>;

export interface CommandProcessorOptions {
  /** Asked before unsaved changes would be lost; declines when absent */
  confirm?: ConfirmFn;
  /** Base directory for relative file paths */
  cwd?: string;
}

type Handler = (args: string[], out: CommandMessage[]) => Promise<boolean | void>;

const UNSAVED_WARNING = 'You have unsaved changes. All unsaved changes will be lost.';

/**
 * Split a command line into words. Double quotes group words containing
 * spaces.
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(line)) !== null) {
    tokens.push(match[1] ?? match[2]);
  }
  return tokens;
}

function numberArg(text: string, label: string): number {
  const value = parseDecimal(text);
  if (value === null) {
    throw new InvalidArgumentError(`${label} must be a numeric value, got '${text}'`, { [label]: text });
  }
  return value;
}

function usageError(command: CommandDefinition): InvalidArgumentError {
  return new InvalidArgumentError(`Invalid arguments. Usage: ${command.usage}`, { command: command.name });
}

function describePosition(coordinate: GeographicCoordinate): string {
  const lat = configHelpers.formatCoordinate(coordinate.latitude);
  const lon = configHelpers.formatCoordinate(coordinate.longitude);
  return `(lat: ${lat}, lon: ${lon}, ${coordinate.datum})`;
}

/**
 * Turns command lines into session operations and reports the outcome as
 * messages. Nothing is printed here; the shell decides how to render.
 */
export class CommandProcessor {
  private readonly confirm: ConfirmFn;
  private readonly cwd: string;
  private readonly handlers: Record<CommandName, Handler>;

  constructor(private readonly session: Session, options: CommandProcessorOptions = {}) {
    this.confirm = options.confirm ?? (async () => false);
    this.cwd = options.cwd ?? process.cwd();
    this.handlers = {
      create: (args, out) => this.create(args, out),
      open: (args, out) => this.open(args, out),
      save: (args, out) => this.save(args, out),
      list: async (_args, out) => this.list(out),
      addlonlat: async (args, out) => this.addLonLat(args, out),
      addutm: async (args, out) => this.addUtm(args, out),
      addlist: (args, out) => this.addList(args, out),
      delete: async (args, out) => this.deletePoint(args, out),
      modpoint: async (args, out) => this.modPoint(args, out),
      distance: async (args, out) => this.distance(args, out),
      distances: async (args, out) => this.distances(args, out, false),
      distancesall: async (args, out) => this.distances(args, out, true),
      setdatum: async (args, out) => this.setDatum(args, out),
      resetdatum: async (_args, out) => this.resetDatum(out),
      datum: async (_args, out) => this.showDatum(out),
      status: async (_args, out) => this.status(out),
      help: async (args, out) => this.help(args, out),
      exit: (_args, out) => this.exit(out),
    };
  }

  async execute(line: string): Promise<CommandResult> {
    const [word, ...args] = tokenize(line);
    if (word === undefined) {
      return { messages: [], exit: false };
    }

    const command = resolveCommand(word);
    if (!command) {
      return {
        messages: [{ level: 'error', text: `Unknown command: ${word}. Type help to list commands.` }],
        exit: false,
      };
    }

    const messages: CommandMessage[] = [];
    try {
      const exit = await this.handlers[command.name](args, messages);
      return { messages, exit: exit === true };
    } catch (error) {
      messages.push({ level: 'error', text: `Error: ${describeError(error)}` });
      return { messages, exit: false };
    }
  }

  private resolvePath(filePath: string): string {
    return path.resolve(this.cwd, filePath);
  }

  private async confirmDiscard(action: string): Promise<boolean> {
    if (!this.session.hasUnsavedChanges) {
      return true;
    }
    return this.confirm(`${UNSAVED_WARNING} Are you sure you want to ${action}? (y/n)`);
  }

  // === Document commands ===

  private async create(args: string[], out: CommandMessage[]): Promise<void> {
    if (!(await this.confirmDiscard('create a new KMZ'))) {
      out.push({ level: 'warn', text: 'Operation cancelled.' });
      return;
    }
    const name = args.join(' ').trim();
    const registry = this.session.create(name === '' ? undefined : name);
    out.push({
      level: 'success',
      text: `New KMZ '${registry.documentName}' created in memory. (Not yet saved, use save <path>)`,
    });
  }

  private async open(args: string[], out: CommandMessage[]): Promise<void> {
    const target = args.join(' ').trim();
    if (target === '') {
      throw new InvalidArgumentError('No file path provided');
    }
    if (!(await this.confirmDiscard('open another KMZ'))) {
      out.push({ level: 'warn', text: 'Operation cancelled.' });
      return;
    }

    const { registry, report, path: openedPath } = await this.session.open(this.resolvePath(target));
    out.push({ level: 'success', text: `KMZ file ${openedPath} loaded successfully (${registry.size} points).` });
    this.describeReadReport(report, out);
  }

  private describeReadReport(report: DeserializeReport, out: CommandMessage[]): void {
    for (const entry of report.skipped) {
      const label = entry.name !== undefined ? `'${entry.name}'` : `#${entry.index + 1}`;
      out.push({ level: 'warn', text: `Skipped placemark ${label}: ${entry.reason}` });
    }

    const byField = new Map<string, number>();
    for (const entry of report.defaulted) {
      for (const field of entry.fields) {
        byField.set(field, (byField.get(field) ?? 0) + 1);
      }
    }
    const datumCount = byField.get('datum');
    if (datumCount !== undefined) {
      out.push({ level: 'info', text: `${datumCount} placemark(s) carried no datum and were read as ${DEFAULT_DATUM_ID}.` });
    }
    const altitudeCount = byField.get('altitude');
    if (altitudeCount !== undefined) {
      out.push({ level: 'info', text: `${altitudeCount} placemark(s) had an unreadable altitude, which was dropped.` });
    }
    if (report.documentNameDefaulted) {
      out.push({ level: 'info', text: 'The document had no name; a default name was used.' });
    }
  }

  private async save(args: string[], out: CommandMessage[]): Promise<void> {
    this.session.requireRegistry();
    const target = args.join(' ').trim();
    if (target === '' && this.session.path) {
      out.push({ level: 'info', text: `Last path recovered (${this.session.path})` });
    }
    const written = await this.session.save(target === '' ? undefined : this.resolvePath(target));
    out.push({ level: 'success', text: `KMZ saved successfully to ${written}.` });
  }

  private list(out: CommandMessage[]): void {
    const points = this.session.requireRegistry().list();
    if (points.length === 0) {
      out.push({ level: 'warn', text: 'No points found in the KMZ.' });
      return;
    }
    out.push({ level: 'success', text: `Points in the KMZ (${points.length}):` });
    for (const point of points) {
      out.push({ level: 'data', text: ` - ${point.name}: ${describePosition(point.coordinate)}` });
    }
  }

  // === Point commands ===

  private addLonLat(args: string[], out: CommandMessage[]): void {
    const registry = this.session.requireRegistry();
    if (args.length !== 3 && args.length !== 4) {
      throw usageError(this.definition('addlonlat'));
    }
    const [name, latText, lonText, datum] = args;
    const coordinate: GeographicCoordinate = {
      latitude: numberArg(latText, 'latitude'),
      longitude: numberArg(lonText, 'longitude'),
      datum: resolveDatum(datum ?? DEFAULT_DATUM_ID).id,
    };
    const point = registry.add(name, coordinate);
    this.session.markChanged();
    out.push({ level: 'success', text: `Point ${point.name} added at ${describePosition(point.coordinate)}.` });
  }

  private addUtm(args: string[], out: CommandMessage[]): void {
    const registry = this.session.requireRegistry();
    if (args.length !== 4 && args.length !== 5) {
      throw usageError(this.definition('addutm'));
    }
    const [name, eastingText, northingText, zone, datum] = args;
    const utm = utmFromLabel(
      numberArg(eastingText, 'easting'),
      numberArg(northingText, 'northing'),
      zone,
      datum ?? this.session.datum
    );
    const point = registry.addFromUtm(name, utm);
    this.session.markChanged();
    out.push({
      level: 'success',
      text: `Point ${point.name} added at ${describePosition(point.coordinate)} from UTM ${formatUtm(utm)}.`,
    });
  }

  private async addList(args: string[], out: CommandMessage[]): Promise<void> {
    const registry = this.session.requireRegistry();
    const target = args.join(' ').trim();
    if (target === '') {
      throw new InvalidArgumentError('No file path provided');
    }

    const text = await readPointListFile(this.resolvePath(target));
    const report = importPointList(registry, text, { defaultDatum: this.session.datum });
    if (report.accepted.length > 0) {
      this.session.markChanged();
    }

    for (const point of report.accepted) {
      out.push({ level: 'data', text: ` + ${point.name}: ${describePosition(point.coordinate)}` });
    }
    for (const entry of report.skipped) {
      const where = entry.line !== undefined ? `Line ${entry.line}` : 'Entry';
      const who = entry.name !== undefined ? ` (${entry.name})` : '';
      out.push({ level: 'warn', text: `${where}${who}: ${entry.reason}` });
    }

    const total = report.accepted.length + report.skipped.length;
    if (report.accepted.length === 0) {
      out.push({ level: 'error', text: `No valid points found in ${target}.` });
    } else {
      out.push({ level: 'success', text: `Added ${report.accepted.length} of ${total} points from ${target}.` });
    }
  }

  private deletePoint(args: string[], out: CommandMessage[]): void {
    const registry = this.session.requireRegistry();
    const name = args.join(' ').trim();
    if (name === '') {
      throw new InvalidArgumentError('No point name provided');
    }
    registry.delete(name);
    this.session.markChanged();
    out.push({ level: 'success', text: `Point ${name} deleted successfully.` });
  }

  private modPoint(args: string[], out: CommandMessage[]): void {
    const registry = this.session.requireRegistry();
    const [subcommand, ...rest] = args;

    switch (subcommand?.toLowerCase()) {
      case 'rename': {
        if (rest.length !== 2) {
          throw new InvalidArgumentError('Invalid arguments for rename. Usage: modpoint rename <old> <new>');
        }
        const [oldName, newName] = rest;
        const point = registry.rename(oldName, newName);
        this.session.markChanged();
        out.push({ level: 'success', text: `Point renamed from ${oldName} to ${point.name}.` });
        return;
      }
      case 'relocate': {
        if (rest.length !== 3 && rest.length !== 4) {
          throw new InvalidArgumentError('Invalid arguments for relocate. Usage: modpoint relocate <name> <lat> <lon> [datum]');
        }
        const [name, latText, lonText, datum] = rest;
        const point = registry.move(name, {
          latitude: numberArg(latText, 'latitude'),
          longitude: numberArg(lonText, 'longitude'),
          datum: resolveDatum(datum ?? DEFAULT_DATUM_ID).id,
        });
        this.session.markChanged();
        out.push({ level: 'success', text: `Point ${point.name} relocated to ${describePosition(point.coordinate)}.` });
        return;
      }
      case 'relocateutm': {
        if (rest.length !== 4 && rest.length !== 5) {
          throw new InvalidArgumentError(
            'Invalid arguments for relocateutm. Usage: modpoint relocateutm <name> <easting> <northing> <zone> [datum]'
          );
        }
        const [name, eastingText, northingText, zone, datum] = rest;
        const utm = utmFromLabel(
          numberArg(eastingText, 'easting'),
          numberArg(northingText, 'northing'),
          zone,
          datum ?? this.session.datum
        );
        const point = registry.moveFromUtm(name, utm);
        this.session.markChanged();
        out.push({
          level: 'success',
          text: `Point ${point.name} relocated to ${describePosition(point.coordinate)} from UTM ${formatUtm(utm)}.`,
        });
        return;
      }
      default:
        throw new InvalidArgumentError(
          subcommand === undefined
            ? "Missing subcommand. See 'help modpoint' for usage."
            : `Unknown subcommand '${subcommand}'. See 'help modpoint' for usage.`
        );
    }
  }

  // === Distance commands ===

  private distance(args: string[], out: CommandMessage[]): void {
    const registry = this.session.requireRegistry();
    if (args.length !== 2) {
      throw usageError(this.definition('distance'));
    }
    const [from, to] = args.map(name => registry.get(name));
    const result = measure(from.coordinate, to.coordinate);
    out.push({
      level: 'data',
      text: `${from.name} to ${to.name}: ${configHelpers.formatDistance(result.meters)}`,
    });
  }

  private distances(args: string[], out: CommandMessage[], allPairs: boolean): void {
    const registry = this.session.requireRegistry();
    const datum = resolveDatum(args[0] ?? this.session.datum).id;
    const points: readonly Point[] = registry.list();
    if (points.length < 2) {
      throw new InvalidArgumentError('At least two points are required to calculate distances');
    }

    if (allPairs) {
      out.push({ level: 'success', text: `Distances between all points (using datum ${datum}):` });
      for (const leg of distancesAll(points, { datum })) {
        out.push({ level: 'data', text: ` - ${leg.from} to ${leg.to}: ${configHelpers.formatDistance(leg.meters)}` });
      }
      return;
    }

    const line = distancesLine(points, { datum });
    out.push({ level: 'warn', text: 'Distances follow the order the points were added. Use distancesall for every pair.' });
    out.push({ level: 'success', text: `Distances between points in a line (using datum ${datum}):` });
    for (const leg of line.legs) {
      out.push({ level: 'data', text: ` - ${leg.from} to ${leg.to}: ${configHelpers.formatDistance(leg.meters)}` });
    }
    out.push({ level: 'info', text: `Total distance: ${configHelpers.formatDistance(line.totalMeters)}` });
  }

  // === Session commands ===

  private setDatum(args: string[], out: CommandMessage[]): void {
    if (args.length === 0) {
      throw new InvalidArgumentError(`No datum provided. Current datum is ${this.session.datum}.`);
    }
    const datum = this.session.setDatum(args[0]);
    out.push({ level: 'success', text: `Default datum set to ${datum}.` });
  }

  private resetDatum(out: CommandMessage[]): void {
    const datum = this.session.resetDatum();
    out.push({ level: 'success', text: `Datum reset to default (${datum}).` });
  }

  private datumMessage(): CommandMessage {
    const { datum, datumIsDefault } = this.session.status();
    return datumIsDefault
      ? { level: 'success', text: `Current datum: ${datum} (default)` }
      : { level: 'warn', text: `Current datum: ${datum} (changed from default)` };
  }

  private showDatum(out: CommandMessage[]): void {
    out.push(this.datumMessage());
  }

  private status(out: CommandMessage[]): void {
    const status = this.session.status();
    out.push({ level: 'info', text: '=== KMZ STATUS ===' });
    if (status.loaded) {
      const where = status.filePath ? ` from ${status.filePath}` : '';
      out.push({ level: 'success', text: `KMZ '${status.documentName}' loaded${where} with ${status.pointCount} points.` });
    } else {
      out.push({ level: 'warn', text: 'No KMZ loaded or created. Use create or open <path> to begin' });
    }
    out.push(
      status.unsavedChanges
        ? { level: 'warn', text: 'There are unsaved changes. Use save <path> to preserve them' }
        : { level: 'success', text: 'No unsaved changes.' }
    );
    out.push(this.datumMessage());
  }

  private help(args: string[], out: CommandMessage[]): void {
    if (args.length > 0) {
      const command = resolveCommand(args[0]);
      if (!command) {
        throw new InvalidArgumentError(`Unknown command: ${args[0]}`);
      }
      out.push({ level: 'info', text: `Help for '${command.name}':` });
      out.push({ level: 'data', text: `  ${command.usage}` });
      out.push({ level: 'info', text: `  ${command.summary}` });
      for (const detail of command.details ?? []) {
        out.push({ level: 'info', text: `  ${detail}` });
      }
      if (command.aliases.length > 0) {
        out.push({ level: 'info', text: `  Aliases: ${command.aliases.join(', ')}` });
      }
      return;
    }

    out.push({ level: 'info', text: 'Start with create or open <path>, add points with addlonlat, addutm or addlist, then save <path>.' });
    for (const command of COMMANDS) {
      out.push({ level: 'data', text: `  ${command.usage.padEnd(52)}${command.summary}` });
    }
    out.push({ level: 'info', text: 'Type help <command> for details and aliases.' });
  }

  private async exit(out: CommandMessage[]): Promise<boolean> {
    if (!(await this.confirmDiscard('exit'))) {
      out.push({ level: 'warn', text: 'Exit cancelled.' });
      return false;
    }
    out.push({ level: 'info', text: 'Exiting...' });
    return true;
  }

  private definition(name: CommandName): CommandDefinition {
    const command = resolveCommand(name);
    if (!command) {
      throw new InvalidArgumentError(`Unknown command: ${name}`);
    }
    return command;
  }
}
