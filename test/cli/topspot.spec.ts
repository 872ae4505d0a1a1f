import { AuthenticationError } from '../../src/lib/errors';
import { main } from '../../src/lib/runCli';
import { setColorEnabled } from '../../src/lib/ui/colors';
import { createSpinner } from '../../src/lib/ui/spinner';
import { FakeSessionFactory, jsonResponse, mockFetch } from '../helpers/fakeSpotify';

const buddyHolly = {
  name: 'Buddy Holly',
  uri: 'spotify:track:bh1',
  duration_ms: 159000,
  artists: [{ name: 'Weezer' }],
};

describe('topspot CLI', () => {
  let factory: FakeSessionFactory;
  let out: string[];
  let err: string[];
  let payloads: Record<string, Response | null>;

  beforeEach(() => {
    setColorEnabled(false);
    factory = new FakeSessionFactory();
    out = [];
    err = [];
    payloads = {};
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const server = () =>
    mockFetch((url) => {
      const key =
        url.pathname === '/v1/search' ? `search:${url.searchParams.get('type')}` : url.pathname;
      if (key in payloads) return payloads[key];
      switch (key) {
        case '/v1/me':
          return jsonResponse(200, { id: 'ada', display_name: 'Ada' });
        case '/v1/me/top/tracks':
          return jsonResponse(200, { items: [buddyHolly] });
        case '/v1/me/top/artists':
          return jsonResponse(200, {
            items: [
              { name: 'Weezer', genres: ['alternative rock', 'rock'] },
              { name: 'Garage Demo', genres: [] },
            ],
          });
        case 'search:track':
          return jsonResponse(200, {
            tracks: { items: [{ name: 'Buddy Holly', album: { artists: [{ name: 'Weezer' }] } }] },
          });
        case 'search:artist':
          return jsonResponse(200, {
            artists: { items: [{ name: 'Weezer', genres: ['alternative rock'] }] },
          });
        default:
          return null;
      }
    });

  const run = (...args: string[]) =>
    main(['node', 'topspot', ...args], {
      factory,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      spinner: createSpinner(false),
    });

  test('get-top-tracks prints ranked tracks', async () => {
    server();
    expect(await run('get-top-tracks')).toBe(0);
    expect(out).toEqual([
      "Displaying Ada's top tracks in the last six months!",
      '',
      '1 - Buddy Holly by Weezer (2:39)',
    ]);
    expect(factory.userScopes).toEqual(['user-top-read']);
    expect(err).toEqual([]);
  });

  test('get-top-tracks passes options through', async () => {
    const { calls } = server();
    expect(await run('get-top-tracks', '--time-range', 'long_term', '--limit', '1')).toBe(0);
    const top = calls.find((c) => c.url.pathname === '/v1/me/top/tracks');
    expect(top?.url.searchParams.get('time_range')).toBe('long_term');
    expect(top?.url.searchParams.get('limit')).toBe('1');
    expect(out[0]).toBe("Displaying Ada's top tracks of all time!");
  });

  test('get-top-artists prints genres or a placeholder', async () => {
    server();
    expect(await run('get-top-artists', '--time-range', 'short_term')).toBe(0);
    expect(out).toEqual([
      "Displaying Ada's top artists in the last month!",
      '',
      '1 - Weezer - alternative rock, rock',
      '2 - Garage Demo - No genres found',
    ]);
  });

  test('an empty top list is not an error', async () => {
    server();
    payloads['/v1/me/top/tracks'] = jsonResponse(200, { items: [] });
    expect(await run('get-top-tracks')).toBe(0);
    expect(out).toEqual(['No top tracks found.']);
  });

  test('search --track uses the app session', async () => {
    const { calls } = server();
    expect(await run('search', '--track', 'Buddy Holly')).toBe(0);
    expect(out).toEqual(['Results for "Buddy Holly":', '', '1 - Buddy Holly by Weezer']);
    expect(factory.appCalls).toBe(1);
    expect(factory.userScopes).toEqual([]);
    expect(calls[0].url.searchParams.get('limit')).toBe('10');
  });

  test('search --artist prints genres', async () => {
    server();
    expect(await run('search', '--artist', 'Weezer', '--limit', '1')).toBe(0);
    expect(out).toEqual(['Results for "Weezer":', '', '1 - Weezer - alternative rock']);
  });

  test('search with no matches', async () => {
    server();
    payloads['search:track'] = jsonResponse(200, { tracks: { items: [] } });
    expect(await run('search', '--track', 'zzzz')).toBe(0);
    expect(out).toEqual(['Results for "zzzz":', '', 'No results found.']);
  });

  test('search without --artist or --track prompts and stays offline', async () => {
    const { spy } = server();
    expect(await run('search')).toBe(0);
    expect(await run('search', '--track', '   ')).toBe(0);
    expect(out).toEqual([
      'Please provide an artist or track.',
      'Please provide an artist or track.',
    ]);
    expect(spy).not.toHaveBeenCalled();
    expect(factory.appCalls).toBe(0);
  });

  test('invalid time range exits 2 before any network call', async () => {
    const { spy } = server();
    expect(await run('get-top-tracks', '--time-range', 'weekly')).toBe(2);
    expect(err).toEqual([
      'Error: Invalid time range: weekly. Valid options: short_term, medium_term, long_term',
    ]);
    expect(out).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
    expect(factory.userScopes).toEqual([]);
  });

  test('invalid limit exits 2', async () => {
    server();
    expect(await run('get-top-artists', '--limit', '51')).toBe(2);
    expect(await run('search', '--track', 'x', '--limit', '0')).toBe(2);
    expect(err).toEqual([
      'Error: Invalid limit 51. Limit must be between 1 and 50',
      'Error: Invalid limit 0. Limit must be between 1 and 50',
    ]);
  });

  test('authentication failure exits 1', async () => {
    server();
    factory.fail = new AuthenticationError('Set CLIENT_ID in your environment or .env file');
    expect(await run('get-top-tracks')).toBe(1);
    expect(err).toEqual(['Authentication failed: Set CLIENT_ID in your environment or .env file']);
    expect(out).toEqual([]);
  });

  test('remote API failure exits 1 and mentions the retry delay', async () => {
    server();
    payloads['/v1/me/top/tracks'] = jsonResponse(
      429,
      { error: { status: 429, message: 'API rate limit exceeded' } },
      { 'Retry-After': '4' },
    );
    expect(await run('get-top-tracks')).toBe(1);
    expect(err).toEqual([
      'Spotify API error 429: API rate limit exceeded',
      'Rate limited; try again in 4s',
    ]);
  });

  test('an unreachable API exits 1 with the connection error', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    expect(await run('search', '--track', 'Buddy Holly')).toBe(1);
    expect(err).toEqual(['Could not reach Spotify: fetch failed']);
    expect(out).toEqual([]);
  });

  test('--verbose adds debug lines without changing the exit code', async () => {
    server();
    expect(await run('--verbose', 'get-top-tracks')).toBe(0);
    expect(err).toContain('[debug] Creating user session for "user-top-read"');
    expect(err).toContain('[debug] Top tracks: time_range=medium_term limit=20');
  });

  test('--help prints usage', async () => {
    expect(await run('--help')).toBe(0);
    expect(out[0].split('\n')[0]).toBe('Usage: topspot [--verbose] [--no-color] <command> [options]');
  });

  test('no command prints usage and exits 2', async () => {
    expect(await run()).toBe(2);
    expect(err[0].split('\n')[0]).toBe('Usage: topspot [--verbose] [--no-color] <command> [options]');
  });

  test('unknown command exits 2', async () => {
    expect(await run('get-top-albums')).toBe(2);
    expect(err).toEqual([
      'Error: Unknown command get-top-albums. Commands: get-top-tracks, get-top-artists, search',
    ]);
  });
});
