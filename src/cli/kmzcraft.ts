#!/usr/bin/env node
/**
 * kmzcraft command-line interface
 *
 * Without a subcommand an interactive shell is started. The other
 * subcommands run one operation against a file and exit.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'readline';
import { readKmzFile, writeKmzFile } from '../codec/kmz-codec';
import { configHelpers } from '../config/kmzcraft.global.config';
import { KMZCRAFT_VERSION } from '../constants';
import { describeError } from '../errors';
import { resolveDatum } from '../geodesy/datum-registry';
import { reproject } from '../geodesy/datum-shift';
import { distancesAll, distancesLine } from '../geodesy/distance-calculator';
import { formatUtm, toUtm } from '../geodesy/projection-engine';
import { importPointList, parseDecimal, readPointListFile } from '../io/point-list-reader';
import { PointRegistry } from '../registry/PointRegistry';
import type { GeographicCoordinate } from '../types';
import { CommandProcessor, type CommandMessage } from '../session/CommandProcessor';
import { Session } from '../session/Session';
import { loadConfig } from '../utils/config-loader';
import { loadEnvFiles } from '../utils/env';

function render(message: CommandMessage): void {
  switch (message.level) {
    case 'success':
      console.log(chalk.green(message.text));
      break;
    case 'warn':
      console.log(chalk.yellow(message.text));
      break;
    case 'error':
      console.error(chalk.red(message.text));
      break;
    case 'data':
      console.log(chalk.magenta(message.text));
      break;
    default:
      console.log(chalk.cyan(message.text));
  }
}

function fail(error: unknown): never {
  console.error(chalk.red(`❌ ${describeError(error)}`));
  process.exit(1);
}

function numberOption(text: string, label: string): number {
  const value = parseDecimal(text);
  if (value === null) {
    throw new Error(`${label} must be a number, got '${text}'`);
  }
  return value;
}

async function runShell(options: { datum?: string }): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  // Resolves null once input has ended
  const ask = (question: string): Promise<string | null> =>
    new Promise(resolve => {
      if (closed) {
        resolve(null);
        return;
      }
      const onClose = (): void => resolve(null);
      rl.once('close', onClose);
      rl.question(question, answer => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });

  const session = new Session({ datum: options.datum });
  const processor = new CommandProcessor(session, {
    confirm: async question => (await ask(chalk.yellow(`${question} `)))?.trim().toLowerCase() === 'y',
  });

  console.log(chalk.cyan.bold(`\nkmzcraft ${KMZCRAFT_VERSION}. Type help or ? to list commands.`));

  for (;;) {
    const line = await ask(chalk.cyan('\n[kmzcraft] >>> '));
    if (line === null) {
      break;
    }
    const result = await processor.execute(line);
    result.messages.forEach(render);
    if (result.exit) {
      break;
    }
  }

  rl.close();
}

const program = new Command();

program
  .name('kmzcraft')
  .description('Create and edit KMZ placemark files from geographic or UTM coordinates')
  .version(KMZCRAFT_VERSION)
  .hook('preAction', () => {
    loadEnvFiles();
    loadConfig();
  });

program
  .command('shell', { isDefault: true })
  .description('Start the interactive shell')
  .option('-d, --datum <datum>', 'Session datum for UTM input')
  .action(async (options: { datum?: string }) => {
    try {
      await runShell(options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('list')
  .description('List the points of a KMZ file')
  .argument('<kmz>', 'KMZ file to read')
  .action(async (kmz: string) => {
    try {
      const { document, report, path } = await readKmzFile(kmz);
      console.log(chalk.green(`📂 ${document.name} (${path}): ${document.points.length} points`));
      for (const point of document.points) {
        const { latitude, longitude, datum } = point.coordinate;
        console.log(chalk.magenta(
          ` - ${point.name}: (lat: ${configHelpers.formatCoordinate(latitude)}, lon: ${configHelpers.formatCoordinate(longitude)}, ${datum})`
        ));
      }
      for (const skipped of report.skipped) {
        console.warn(chalk.yellow(`⚠️  Skipped placemark ${skipped.name ?? `#${skipped.index + 1}`}: ${skipped.reason}`));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('import')
  .description('Build a KMZ file from a UTM point list')
  .argument('<pointlist>', 'Point-list file (name easting northing zone [datum] per line)')
  .requiredOption('-o, --output <kmz>', 'KMZ file to write')
  .option('-d, --datum <datum>', 'Datum for lines that do not name one')
  .option('-n, --name <name>', 'Document name')
  .action(async (pointList: string, options: { output: string; datum?: string; name?: string }) => {
    try {
      const datum = resolveDatum(options.datum ?? loadConfig().defaults.datum).id;
      const registry = new PointRegistry(options.name);
      const report = importPointList(registry, await readPointListFile(pointList), { defaultDatum: datum });

      for (const skipped of report.skipped) {
        console.warn(chalk.yellow(`⚠️  Line ${skipped.line ?? '?'}${skipped.name ? ` (${skipped.name})` : ''}: ${skipped.reason}`));
      }
      if (report.accepted.length === 0) {
        throw new Error(`No valid points found in ${pointList}`);
      }

      const written = await writeKmzFile(options.output, registry.toDocument());
      console.log(chalk.green(`✅ Wrote ${report.accepted.length} points to ${written}`));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('distances')
  .description('Distances between the points of a KMZ file')
  .argument('<kmz>', 'KMZ file to read')
  .option('-a, --all', 'Every pair instead of consecutive points')
  .option('-d, --datum <datum>', 'Datum to measure in')
  .action(async (kmz: string, options: { all?: boolean; datum?: string }) => {
    try {
      const { document } = await readKmzFile(kmz);
      if (document.points.length < 2) {
        throw new Error('At least two points are required to calculate distances');
      }
      const datum = options.datum === undefined ? undefined : resolveDatum(options.datum).id;
      const legs = options.all
        ? distancesAll(document.points, { datum })
        : distancesLine(document.points, { datum }).legs;
      for (const leg of legs) {
        console.log(chalk.magenta(` - ${leg.from} to ${leg.to}: ${configHelpers.formatDistance(leg.meters)}`));
      }
      if (!options.all) {
        const total = legs.reduce((sum, leg) => sum + leg.meters, 0);
        console.log(chalk.yellow(`📏 Total distance: ${configHelpers.formatDistance(total)}`));
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('convert')
  .description('Convert a latitude/longitude to UTM')
  .argument('<lat>', 'Latitude in decimal degrees')
  .argument('<lon>', 'Longitude in decimal degrees')
  .option('-d, --datum <datum>', 'Datum of the coordinate', 'WGS84')
  .option('-t, --to <datum>', 'Reproject into this datum first')
  .option('-z, --zone <zone>', 'Force a UTM zone (1-60)')
  .action((lat: string, lon: string, options: { datum: string; to?: string; zone?: string }) => {
    try {
      let coordinate: GeographicCoordinate = {
        latitude: numberOption(lat, 'Latitude'),
        longitude: numberOption(lon, 'Longitude'),
        datum: resolveDatum(options.datum).id,
      };
      if (options.to !== undefined) {
        coordinate = reproject(coordinate, options.to);
        console.log(chalk.cyan(
          `🌐 ${coordinate.datum}: lat ${configHelpers.formatCoordinate(coordinate.latitude)}, lon ${configHelpers.formatCoordinate(coordinate.longitude)}`
        ));
      }
      const zone = options.zone === undefined ? undefined : numberOption(options.zone, 'Zone');
      const utm = toUtm(coordinate, { zone });
      console.log(chalk.green(`📍 ${formatUtm(utm)} (${utm.datum})`));
      console.log(chalk.gray(`   convergence ${utm.convergence.toFixed(6)}°, scale ${utm.scale.toFixed(8)}`));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
