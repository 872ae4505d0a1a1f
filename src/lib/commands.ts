import { artistLine, searchHeading, topHeading, topTrackLine, trackLine } from './format';
import { silentLogger, type Logger } from './log';
import { TOP_READ_SCOPE, type SessionCache } from './session';
import type { Artist, Track } from './spotifyApi';
import { createSpinner, withSpinner, type Spinner } from './ui/spinner';
import { DEFAULT_SEARCH_LIMIT, resolveTopOptions, validate } from './validation';

export type CommandContext = {
  sessions: SessionCache;
  out: (line: string) => void;
  logger?: Logger;
  spinner?: Spinner;
};

export type TopOptions = { timeRange?: string | null; limit?: number | null };
export type SearchOptions = {
  artist?: string | null;
  track?: string | null;
  limit?: number | null;
};

export type SearchResult =
  | { kind: 'tracks'; query: string; items: Track[] }
  | { kind: 'artists'; query: string; items: Artist[] }
  | { kind: 'none' };

const noSpinner = createSpinner(false);

export async function getTopTracks(ctx: CommandContext, opts: TopOptions = {}): Promise<Track[]> {
  const { timeRange, limit } = resolveTopOptions(opts);
  const logger = ctx.logger ?? silentLogger;
  const session = await ctx.sessions.getSession(TOP_READ_SCOPE);
  const displayName = await ctx.sessions.getDisplayName();
  logger.debug(`Top tracks: time_range=${timeRange} limit=${limit}`);
  const tracks = await withSpinner(ctx.spinner ?? noSpinner, 'fetching top tracks', () =>
    session.topTracks({ timeRange, limit }),
  );
  if (!tracks.length) {
    ctx.out('No top tracks found.');
    return tracks;
  }
  ctx.out(topHeading(displayName, 'tracks', timeRange));
  ctx.out('');
  tracks.forEach((t, i) => ctx.out(topTrackLine(t, i)));
  return tracks;
}

export async function getTopArtists(ctx: CommandContext, opts: TopOptions = {}): Promise<Artist[]> {
  const { timeRange, limit } = resolveTopOptions(opts);
  const logger = ctx.logger ?? silentLogger;
  const session = await ctx.sessions.getSession(TOP_READ_SCOPE);
  const displayName = await ctx.sessions.getDisplayName();
  logger.debug(`Top artists: time_range=${timeRange} limit=${limit}`);
  const artists = await withSpinner(ctx.spinner ?? noSpinner, 'fetching top artists', () =>
    session.topArtists({ timeRange, limit }),
  );
  if (!artists.length) {
    ctx.out('No top artists found.');
    return artists;
  }
  ctx.out(topHeading(displayName, 'artists', timeRange));
  ctx.out('');
  artists.forEach((a, i) => ctx.out(artistLine(a, i)));
  return artists;
}

/**
 * Catalogue search on the app session. `track` wins when both are given; with
 * neither, a prompt is printed and no session is created.
 */
export async function search(ctx: CommandContext, opts: SearchOptions = {}): Promise<SearchResult> {
  validate(null, opts.limit);
  const limit = opts.limit ?? DEFAULT_SEARCH_LIMIT;
  const track = (opts.track || '').trim();
  const artist = (opts.artist || '').trim();
  const spinner = ctx.spinner ?? noSpinner;

  if (track) {
    const session = await ctx.sessions.getSession();
    const items = await withSpinner(spinner, 'searching', () => session.searchTracks(track, limit));
    ctx.out(searchHeading(track));
    ctx.out('');
    if (!items.length) ctx.out('No results found.');
    items.forEach((t, i) => ctx.out(trackLine(t, i)));
    return { kind: 'tracks', query: track, items };
  }

  if (artist) {
    const session = await ctx.sessions.getSession();
    const items = await withSpinner(spinner, 'searching', () =>
      session.searchArtists(artist, limit),
    );
    ctx.out(searchHeading(artist));
    ctx.out('');
    if (!items.length) ctx.out('No results found.');
    items.forEach((a, i) => ctx.out(artistLine(a, i)));
    return { kind: 'artists', query: artist, items };
  }

  ctx.out('Please provide an artist or track.');
  return { kind: 'none' };
}
