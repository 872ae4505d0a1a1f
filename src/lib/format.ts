import { highlight } from './ui/colors';
import type { Artist, Track } from './spotifyApi';
import type { TimeRange } from './validation';

/** 68000 -> "1:08". Sub-second remainders are truncated, minutes are unbounded. */
export function durationToClock(ms: number): string {
  const totalSeconds = Math.trunc(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

const rank = (idx: number) => highlight(String(idx + 1));

export function genresText(genres: string[]): string {
  const cleaned = genres.map((g) => g.trim()).filter(Boolean);
  return cleaned.length ? cleaned.join(', ') : 'No genres found';
}

export function topTrackLine(track: Track, idx: number): string {
  return `${rank(idx)} - ${track.name} by ${track.artist} (${durationToClock(track.durationMs)})`;
}

export function trackLine(track: Track, idx: number): string {
  return `${rank(idx)} - ${track.name} by ${track.artist}`;
}

export function artistLine(artist: Artist, idx: number): string {
  return `${rank(idx)} - ${artist.name} - ${genresText(artist.genres)}`;
}

const PERIOD: Record<TimeRange, string> = {
  short_term: 'in the last month',
  medium_term: 'in the last six months',
  long_term: 'of all time',
};

export function topHeading(
  displayName: string,
  kind: 'tracks' | 'artists',
  timeRange: TimeRange,
): string {
  return `Displaying ${highlight(`${displayName}'s`)} top ${kind} ${PERIOD[timeRange]}!`;
}

export function searchHeading(query: string): string {
  return `Results for "${highlight(query)}":`;
}
