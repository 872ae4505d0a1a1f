import { getTopArtists, getTopTracks, search, type CommandContext } from './commands';
import {
  AuthenticationError,
  InvalidArgumentError,
  RemoteApiError,
  errorMessage,
} from './errors';
import { createLogger, type Logger } from './log';
import { parseCliArgs, type CliArgs } from './parseCliArgs';
import { SessionCache } from './session';
import { SpotifySessionFactory, type SessionFactory } from './spotifyAuth';
import { colorSupported, setColorEnabled } from './ui/colors';
import { createSpinner, type Spinner } from './ui/spinner';

export const USAGE = `Usage: topspot [--verbose] [--no-color] <command> [options]

Commands:
  get-top-tracks   [--time-range <range>] [--limit <1-50>]   Your top tracks
  get-top-artists  [--time-range <range>] [--limit <1-50>]   Your top artists
  search           [--artist <name> | --track <name>] [--limit <1-50>]

Time ranges:
  short_term   last 4 weeks
  medium_term  last 6 months (default)
  long_term    all time

Credentials are read from CLIENT_ID, CLIENT_SECRET and REDIRECT_URI (or a .env file).`;

export type MainDeps = {
  factory?: SessionFactory;
  out?: (line: string) => void;
  err?: (line: string) => void;
  spinner?: Spinner;
};

/** Map a failure to its exit code, logging it once. */
export function reportError(err: unknown, logger: Logger): number {
  if (err instanceof InvalidArgumentError) {
    logger.error(`Error: ${err.message}`);
    return 2;
  }
  if (err instanceof AuthenticationError) {
    logger.error(`Authentication failed: ${err.message}`);
    if (err.cause !== undefined) logger.debug(`Cause: ${errorMessage(err.cause)}`);
    return 1;
  }
  if (err instanceof RemoteApiError) {
    // Status 0: the request never got an answer.
    logger.error(err.status ? `Spotify API error ${err.status}: ${err.message}` : err.message);
    if (err.retryAfterSeconds !== null) {
      logger.warn(`Rate limited; try again in ${err.retryAfterSeconds}s`);
    }
    return 1;
  }
  logger.error(errorMessage(err));
  if (err instanceof Error && err.stack) logger.debug(err.stack);
  return 1;
}

async function dispatch(args: CliArgs, ctx: CommandContext): Promise<void> {
  const opts = { timeRange: args.timeRange, limit: args.limit };
  switch (args.command) {
    case 'get-top-tracks':
      await getTopTracks(ctx, opts);
      return;
    case 'get-top-artists':
      await getTopArtists(ctx, opts);
      return;
    case 'search':
      await search(ctx, { artist: args.artist, track: args.track, limit: args.limit });
      return;
    case null:
      return;
  }
}

/**
 * Parse argv, run one command and return the process exit code:
 * 0 on success, 1 on authentication or API failure, 2 on bad arguments.
 */
export async function main(argv: string[] = process.argv, deps: MainDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    return reportError(e, createLogger({}, err));
  }
  if (args.noColor || !colorSupported()) setColorEnabled(false);
  const logger = createLogger({ verbose: args.verbose }, err);

  if (args.help) {
    out(USAGE);
    return 0;
  }
  if (!args.command) {
    logger.info(USAGE);
    return 2;
  }

  const factory = deps.factory ?? new SpotifySessionFactory({ logger });
  const ctx: CommandContext = {
    sessions: new SessionCache(factory, logger),
    out,
    logger,
    spinner: deps.spinner ?? createSpinner(!!process.stderr.isTTY && !args.verbose),
  };
  try {
    await dispatch(args, ctx);
    return 0;
  } catch (e) {
    return reportError(e, logger);
  }
}
