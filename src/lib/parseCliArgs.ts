import { InvalidArgumentError } from './errors';

export const COMMANDS = ['get-top-tracks', 'get-top-artists', 'search'] as const;
export type CommandName = (typeof COMMANDS)[number];

export type CliArgs = {
  command: CommandName | null;
  timeRange: string | null;
  limit: number | null;
  artist: string | null;
  track: string | null;
  verbose: boolean;
  noColor: boolean;
  help: boolean;
};

function isCommand(v: string): v is CommandName {
  return (COMMANDS as readonly string[]).includes(v);
}

function parseLimit(raw: string): number {
  if (!/^[-+]?\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError('limit', `Invalid limit ${raw}. Limit must be a whole number`);
  }
  return Number(raw);
}

/**
 * Parse CLI arguments.
 *
 * Recognised flags:
 * - --time-range <short_term|medium_term|long_term>
 * - --limit <n>
 * - --artist <name> | --track <name>
 * - --verbose
 * - --no-color
 * - --help | -h
 * Flags taking a value accept `--flag value` and `--flag=value`.
 * The first non-flag argument is the command. Range checks happen later, in validate().
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    timeRange: null,
    limit: null,
    artist: null,
    track: null,
    verbose: false,
    noColor: false,
    help: false,
  };

  // Skip node and script path
  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? null : arg.slice(eq + 1);
    const value = () => {
      if (inline !== null) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new InvalidArgumentError('option', `${flag} needs a value`);
      }
      i += 1;
      return next;
    };

    switch (flag) {
      case '--verbose':
        result.verbose = true;
        break;
      case '--no-color':
        result.noColor = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--time-range':
        result.timeRange = value();
        break;
      case '--limit':
        result.limit = parseLimit(value());
        break;
      case '--artist':
        result.artist = value();
        break;
      case '--track':
        result.track = value();
        break;
      default:
        if (arg.startsWith('-')) {
          throw new InvalidArgumentError('option', `Unknown option ${flag}`);
        }
        if (result.command) {
          throw new InvalidArgumentError('command', `Unexpected argument ${arg}`);
        }
        if (!isCommand(arg)) {
          throw new InvalidArgumentError(
            'command',
            `Unknown command ${arg}. Commands: ${COMMANDS.join(', ')}`,
          );
        }
        result.command = arg;
        break;
    }
  }
  return result;
}
