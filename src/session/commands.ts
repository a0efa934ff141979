// Command table for the interactive shell: canonical names, aliases and help

export type CommandName =
  | 'create'
  | 'open'
  | 'save'
  | 'list'
  | 'addlonlat'
  | 'addutm'
  | 'addlist'
  | 'delete'
  | 'modpoint'
  | 'distance'
  | 'distances'
  | 'distancesall'
  | 'setdatum'
  | 'resetdatum'
  | 'datum'
  | 'status'
  | 'help'
  | 'exit';

export interface CommandDefinition {
  name: CommandName;
  aliases: readonly string[];
  usage: string;
  summary: string;
  details?: readonly string[];
}

export const COMMANDS: readonly CommandDefinition[] = [
  {
    name: 'create',
    aliases: ['new', 'n', 'c'],
    usage: 'create [document name]',
    summary: 'Create a new blank KMZ in memory.',
  },
  {
    name: 'open',
    aliases: ['load', 'l', 'o'],
    usage: 'open <path>',
    summary: 'Open an existing KMZ file. The .kmz extension is added when missing.',
  },
  {
    name: 'save',
    aliases: ['s'],
    usage: 'save [path]',
    summary: 'Save the current KMZ. Without a path the last opened or saved path is reused.',
  },
  {
    name: 'list',
    aliases: ['showpoints', 'sp', 'points', 'listpoints', 'lp'],
    usage: 'list',
    summary: 'List all points in the current KMZ.',
  },
  {
    name: 'addlonlat',
    aliases: ['addlatlon', 'al', 'npl', 'addclassic', 'addll'],
    usage: 'addlonlat <name> <lat> <lon> [datum]',
    summary: 'Add a point from latitude and longitude in decimal degrees (WGS84 unless a datum is given).',
  },
  {
    name: 'addutm',
    aliases: ['au', 'autm', 'np', 'add'],
    usage: 'addutm <name> <easting> <northing> <zone> [datum]',
    summary: 'Add a point from UTM coordinates, e.g. addutm T1 463712.5 4469224.7 30T.',
    details: ['Without a datum the session datum is used (see setdatum).'],
  },
  {
    name: 'addlist',
    aliases: ['addfile', 'afl'],
    usage: 'addlist <path>',
    summary: 'Add points from a point-list file.',
    details: [
      'One point per line: name easting northing zone [datum]',
      'Fields may be separated by spaces, tabs, semicolons or commas. Lines starting with # are ignored.',
      'Supported file extensions: txt, csv',
    ],
  },
  {
    name: 'delete',
    aliases: ['del', 'dp', 'remove'],
    usage: 'delete <name>',
    summary: 'Delete a point by name.',
  },
  {
    name: 'modpoint',
    aliases: ['mp', 'mpoint', 'modp'],
    usage: 'modpoint <rename|relocate|relocateutm> ...',
    summary: "Modify a point's name or position.",
    details: [
      'modpoint rename <old> <new>',
      'modpoint relocate <name> <lat> <lon> [datum]',
      'modpoint relocateutm <name> <easting> <northing> <zone> [datum]',
    ],
  },
  {
    name: 'distance',
    aliases: ['dst'],
    usage: 'distance <name1> <name2>',
    summary: 'Geodesic distance between two points.',
  },
  {
    name: 'distances',
    aliases: ['dist', 'distancesline', 'distline'],
    usage: 'distances [datum]',
    summary: 'Distances between consecutive points in the order they were added, with the total.',
  },
  {
    name: 'distancesall',
    aliases: ['distall', 'distanceall'],
    usage: 'distancesall [datum]',
    summary: 'Distances between every pair of points.',
  },
  {
    name: 'setdatum',
    aliases: ['stdt', 'setdt'],
    usage: 'setdatum <WGS84|NAD83|ETRS89>',
    summary: 'Set the session datum used for UTM input and distance listings.',
  },
  {
    name: 'resetdatum',
    aliases: ['rstd', 'resetdt'],
    usage: 'resetdatum',
    summary: 'Reset the session datum to the configured default.',
  },
  {
    name: 'datum',
    aliases: ['dt'],
    usage: 'datum',
    summary: 'Show the session datum.',
  },
  {
    name: 'status',
    aliases: ['stat', 'st'],
    usage: 'status',
    summary: 'Show whether a KMZ is loaded, unsaved changes and the session datum.',
  },
  {
    name: 'help',
    aliases: ['?', 'h'],
    usage: 'help [command]',
    summary: 'List commands, or show help for one command.',
  },
  {
    name: 'exit',
    aliases: ['quit', 'q', 'e', 'x'],
    usage: 'exit',
    summary: 'Leave the shell, asking first when there are unsaved changes.',
  },
];

const LOOKUP = new Map<string, CommandDefinition>();
for (const command of COMMANDS) {
  LOOKUP.set(command.name, command);
  for (const alias of command.aliases) {
    LOOKUP.set(alias, command);
  }
}

/**
 * Find a command by name or alias, case-insensitively
 */
export function resolveCommand(word: string): CommandDefinition | undefined {
  return LOOKUP.get(word.toLowerCase());
}
