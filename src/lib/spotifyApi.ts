import { AuthenticationError, RemoteApiError, errorMessage } from './errors';
import { silentLogger, type Logger } from './log';
import type { TimeRange } from './validation';

export const API_BASE = 'https://api.spotify.com/v1';

export type Track = {
  name: string;
  artist: string;
  durationMs: number;
  uri: string;
};

export type Artist = {
  name: string;
  genres: string[];
};

export type UserProfile = {
  id: string;
  displayName: string | null;
};

// Wire shapes: everything optional, decoded below into the types above.
type WireArtist = { name?: string | null; genres?: (string | null)[] | null };
type WireTrack = {
  name?: string | null;
  uri?: string | null;
  duration_ms?: number | null;
  artists?: (WireArtist | null)[] | null;
  album?: { artists?: (WireArtist | null)[] | null } | null;
};
type WirePaging<T> = { items?: (T | null)[] | null };
type WireUser = { id?: string | null; display_name?: string | null };

export type TokenSupplier = () => Promise<string>;

export function decodeTrack(t: WireTrack): Track {
  const first = t.artists?.find(Boolean) ?? t.album?.artists?.find(Boolean);
  return {
    name: (t.name || '').trim() || 'Unknown',
    artist: (first?.name || '').trim() || 'Unknown',
    durationMs: typeof t.duration_ms === 'number' ? t.duration_ms : 0,
    uri: t.uri || '',
  };
}

export function decodeArtist(a: WireArtist): Artist {
  return {
    name: (a.name || '').trim() || 'Unknown',
    genres: genresOf(a).filter((g) => !!g.trim()),
  };
}

function genresOf(a: WireArtist): string[] {
  const out: string[] = [];
  for (const g of a.genres || []) if (typeof g === 'string') out.push(g);
  return out;
}

function itemsOf<T>(page: WirePaging<T> | null | undefined): T[] {
  const out: T[] = [];
  for (const it of page?.items || []) if (it != null) out.push(it);
  return out;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

// Spotify error bodies look like {"error":{"status":404,"message":"..."}}
function spotifyErrorMessage(txt: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(txt);
  } catch {
    return txt;
  }
  if (isRecord(parsed)) {
    const err = parsed.error;
    if (isRecord(err) && typeof err.message === 'string') return err.message;
    if (typeof parsed.error_description === 'string') return parsed.error_description;
    if (typeof err === 'string') return err;
  }
  return txt;
}

async function errorFromResponse(res: Response): Promise<Error> {
  const txt = await res.text().catch(() => '');
  const message = spotifyErrorMessage(txt) || res.statusText || 'request failed';
  if (res.status === 401) {
    return new AuthenticationError(`Spotify rejected the access token: ${message}`);
  }
  const header = res.status === 429 ? res.headers.get('retry-after') : null;
  const retryAfter = header ? Number(header) : NaN;
  return new RemoteApiError(res.status, message, Number.isFinite(retryAfter) ? retryAfter : null);
}

/**
 * An authenticated session handle. Every call asks the token supplier for a
 * bearer token, so expiry and refresh stay with whoever built the session.
 */
export class SpotifyApi {
  constructor(
    private readonly token: TokenSupplier,
    private readonly logger: Logger = silentLogger,
    readonly label = 'app',
  ) {}

  private async fetchJson<T>(pathAndQuery: string): Promise<T> {
    const url = `${API_BASE}${pathAndQuery}`;
    const token = await this.token();
    this.logger.debug(`GET ${url} (${this.label} session)`);
    let res: Response;
    try {
      res = await fetch(url, { headers: { Authorization: `Bearer ${token}` } });
    } catch (err) {
      throw new RemoteApiError(0, `Could not reach Spotify: ${errorMessage(err)}`);
    }
    if (!res.ok) throw await errorFromResponse(res);
    return (await res.json()) as T;
  }

  async currentUser(): Promise<UserProfile> {
    const me = await this.fetchJson<WireUser | null>('/me');
    return { id: me?.id || '', displayName: me?.display_name || null };
  }

  async topTracks(opts: { timeRange: TimeRange; limit: number }): Promise<Track[]> {
    const q = new URLSearchParams({ time_range: opts.timeRange, limit: String(opts.limit) });
    const page = await this.fetchJson<WirePaging<WireTrack>>(`/me/top/tracks?${q}`);
    return itemsOf(page).map(decodeTrack);
  }

  async topArtists(opts: { timeRange: TimeRange; limit: number }): Promise<Artist[]> {
    const q = new URLSearchParams({ time_range: opts.timeRange, limit: String(opts.limit) });
    const page = await this.fetchJson<WirePaging<WireArtist>>(`/me/top/artists?${q}`);
    return itemsOf(page).map(decodeArtist);
  }

  async searchTracks(query: string, limit: number): Promise<Track[]> {
    const q = new URLSearchParams({ q: query, type: 'track', limit: String(limit) });
    const res = await this.fetchJson<{ tracks?: WirePaging<WireTrack> | null }>(`/search?${q}`);
    return itemsOf(res.tracks).map(decodeTrack);
  }

  async searchArtists(query: string, limit: number): Promise<Artist[]> {
    const q = new URLSearchParams({ q: query, type: 'artist', limit: String(limit) });
    const res = await this.fetchJson<{ artists?: WirePaging<WireArtist> | null }>(`/search?${q}`);
    return itemsOf(res.artists).map(decodeArtist);
  }
}
