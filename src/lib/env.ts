import path from 'node:path';
// Load environment variables from .env (via dotenv) once, on first import.
import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

export type SpotifyCredentials = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

type Env = Record<string, string | undefined>;

function pick(env: Env, name: string): string {
  return (env[name] ?? env[`SPOTIFY_${name}`] ?? '').trim();
}

/**
 * Read CLIENT_ID / CLIENT_SECRET / REDIRECT_URI (a SPOTIFY_ prefix is also accepted).
 * Values are read at call time so tests can change process.env between cases.
 */
export function readCredentials(env: Env = process.env): SpotifyCredentials {
  return {
    clientId: pick(env, 'CLIENT_ID'),
    clientSecret: pick(env, 'CLIENT_SECRET'),
    redirectUri: pick(env, 'REDIRECT_URI'),
  };
}

export function tokenCachePath(env: Env = process.env): string {
  const p = (env.SPOTIFY_TOKEN_CACHE || '').trim();
  return path.resolve(p || '.cache');
}
