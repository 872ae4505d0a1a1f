import fs from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline';
import { randomBytes } from 'node:crypto';
import { readCredentials, tokenCachePath, type SpotifyCredentials } from './env';
import { AuthenticationError, errorMessage } from './errors';
import { silentLogger, type Logger } from './log';
import { SpotifyApi, type TokenSupplier } from './spotifyApi';

export const TOKEN_URL = 'https://accounts.spotify.com/api/token';
export const AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
// Refresh a little before Spotify says the token dies.
const EXPIRY_MARGIN_MS = 30_000;

export type StoredToken = {
  accessToken: string;
  refreshToken: string | null;
  scope: string;
  expiresAt: number; // epoch ms
};

type TokenResponse = {
  access_token?: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
};

export type Prompt = (question: string) => Promise<string>;

/** The collaborator the session cache builds handles through. */
export interface SessionFactory {
  appSession(): Promise<SpotifyApi>;
  userSession(scope: string): Promise<SpotifyApi>;
}

/** Read one line; input that ends before a line arrives means the login was abandoned. */
export function askLine(
  question: string,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const rl = readline.createInterface({ input, output });
    let answered = false;
    rl.once('close', () => {
      if (!answered) reject(new AuthenticationError('Authorization was not completed'));
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

export const terminalPrompt: Prompt = (question) =>
  askLine(question, process.stdin, process.stderr);

export function scopeCovers(granted: string, requested: string): boolean {
  const have = new Set(granted.split(/\s+/).filter(Boolean));
  return requested
    .split(/\s+/)
    .filter(Boolean)
    .every((s) => have.has(s));
}

export function isFresh(token: StoredToken, now: number): boolean {
  return token.expiresAt - EXPIRY_MARGIN_MS > now;
}

export function authorizeUrl(creds: SpotifyCredentials, scope: string, state: string): string {
  const q = new URLSearchParams({
    response_type: 'code',
    client_id: creds.clientId,
    scope,
    redirect_uri: creds.redirectUri,
    state,
  });
  return `${AUTHORIZE_URL}?${q}`;
}

/** Pull the authorization code out of the URL the browser was redirected to. */
export function parseRedirect(redirected: string, expectedState: string): string {
  let u: URL;
  try {
    u = new URL(redirected.trim());
  } catch (err) {
    throw new AuthenticationError('That does not look like the redirect URL', { cause: err });
  }
  const error = u.searchParams.get('error');
  if (error === 'access_denied') {
    throw new AuthenticationError('Authorization was declined in the browser');
  }
  if (error) throw new AuthenticationError(`Authorization failed: ${error}`);
  if (u.searchParams.get('state') !== expectedState) {
    throw new AuthenticationError('Authorization state mismatch; start the login again');
  }
  const code = u.searchParams.get('code');
  if (!code) throw new AuthenticationError('Redirect URL is missing the authorization code');
  return code;
}

export function requireCredentials(
  creds: SpotifyCredentials,
  { needRedirect = false }: { needRedirect?: boolean } = {},
): void {
  const missing: string[] = [];
  if (!creds.clientId) missing.push('CLIENT_ID');
  if (!creds.clientSecret) missing.push('CLIENT_SECRET');
  if (needRedirect && !creds.redirectUri) missing.push('REDIRECT_URI');
  if (missing.length) {
    throw new AuthenticationError(`Set ${missing.join(', ')} in your environment or .env file`);
  }
}

async function requestToken(
  creds: SpotifyCredentials,
  body: URLSearchParams,
  now: number,
): Promise<StoredToken> {
  const basic = Buffer.from(`${creds.clientId}:${creds.clientSecret}`).toString('base64');
  let res: Response;
  try {
    res = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body,
    });
  } catch (err) {
    throw new AuthenticationError(`Could not reach Spotify: ${errorMessage(err)}`, { cause: err });
  }
  if (!res.ok) {
    const txt = await res.text().catch(() => '');
    throw new AuthenticationError(`Spotify auth failed: ${res.status} ${txt}`.trim());
  }
  const json = (await res.json()) as TokenResponse;
  if (!json.access_token) {
    throw new AuthenticationError('Spotify auth response missing access_token');
  }
  return {
    accessToken: json.access_token,
    refreshToken: json.refresh_token || null,
    scope: json.scope || '',
    expiresAt: now + (json.expires_in ?? 3600) * 1000,
  };
}

export function clientCredentialsToken(creds: SpotifyCredentials, now = Date.now()) {
  return requestToken(creds, new URLSearchParams({ grant_type: 'client_credentials' }), now);
}

export async function refreshUserToken(
  creds: SpotifyCredentials,
  stored: StoredToken & { refreshToken: string },
  now = Date.now(),
): Promise<StoredToken> {
  const next = await requestToken(
    creds,
    new URLSearchParams({ grant_type: 'refresh_token', refresh_token: stored.refreshToken }),
    now,
  );
  // Spotify may omit both on refresh; keep what we had.
  return {
    ...next,
    refreshToken: next.refreshToken || stored.refreshToken,
    scope: next.scope || stored.scope,
  };
}

function isStoredToken(v: unknown): v is StoredToken {
  return (
    typeof v === 'object' &&
    v !== null &&
    'accessToken' in v &&
    typeof v.accessToken === 'string' &&
    'refreshToken' in v &&
    (v.refreshToken === null || typeof v.refreshToken === 'string') &&
    'scope' in v &&
    typeof v.scope === 'string' &&
    'expiresAt' in v &&
    typeof v.expiresAt === 'number'
  );
}

/** The user token, persisted as JSON so later runs skip the browser round trip. */
export class TokenCacheFile {
  constructor(
    readonly file: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async load(): Promise<StoredToken | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      this.logger.debug(`No token cache at ${this.file}: ${errorMessage(err)}`);
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Ignoring unreadable token cache ${this.file}: ${errorMessage(err)}`);
      return null;
    }
    if (!isStoredToken(parsed)) {
      this.logger.warn(`Ignoring token cache ${this.file}: unexpected shape`);
      return null;
    }
    return parsed;
  }

  async save(token: StoredToken): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.writeFile(this.file, JSON.stringify(token, null, 2), {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (err) {
      this.logger.warn(`Could not write token cache ${this.file}: ${errorMessage(err)}`);
    }
  }
}

export type SpotifySessionFactoryOptions = {
  credentials?: SpotifyCredentials;
  cache?: TokenCacheFile;
  prompt?: Prompt;
  logger?: Logger;
  now?: () => number;
};

/**
 * Builds session handles from the OAuth flows: client credentials for the app
 * session, authorization code (with a cached, refreshable token) for user sessions.
 */
export class SpotifySessionFactory implements SessionFactory {
  private readonly credentials: SpotifyCredentials;
  private readonly cache: TokenCacheFile;
  private readonly prompt: Prompt;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: SpotifySessionFactoryOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.credentials = opts.credentials ?? readCredentials();
    this.cache = opts.cache ?? new TokenCacheFile(tokenCachePath(), this.logger);
    this.prompt = opts.prompt ?? terminalPrompt;
    this.now = opts.now ?? Date.now;
  }

  async appSession(): Promise<SpotifyApi> {
    const creds = this.credentials;
    requireCredentials(creds);
    this.logger.debug('Requesting client-credentials token');
    let current = await clientCredentialsToken(creds, this.now());
    const supplier: TokenSupplier = async () => {
      if (!isFresh(current, this.now())) {
        this.logger.debug('App token expired; requesting a new one');
        current = await clientCredentialsToken(creds, this.now());
      }
      return current.accessToken;
    };
    return new SpotifyApi(supplier, this.logger, 'app');
  }

  async userSession(scope: string): Promise<SpotifyApi> {
    requireCredentials(this.credentials, { needRedirect: true });
    let current = await this.userToken(scope);
    const supplier: TokenSupplier = async () => {
      if (!isFresh(current, this.now()) && current.refreshToken) {
        current = await this.refresh({ ...current, refreshToken: current.refreshToken });
      }
      return current.accessToken;
    };
    return new SpotifyApi(supplier, this.logger, `user:${scope}`);
  }

  private async refresh(stored: StoredToken & { refreshToken: string }): Promise<StoredToken> {
    this.logger.debug('Refreshing user token');
    const next = await refreshUserToken(this.credentials, stored, this.now());
    await this.cache.save(next);
    return next;
  }

  private async userToken(scope: string): Promise<StoredToken> {
    const stored = await this.cache.load();
    if (stored && scopeCovers(stored.scope, scope)) {
      if (isFresh(stored, this.now())) {
        this.logger.debug(`Using cached user token from ${this.cache.file}`);
        return stored;
      }
      if (stored.refreshToken) {
        return this.refresh({ ...stored, refreshToken: stored.refreshToken });
      }
    }
    return this.authorize(scope);
  }

  private async authorize(scope: string): Promise<StoredToken> {
    const creds = this.credentials;
    const state = randomBytes(12).toString('hex');
    this.logger.info(`Open this URL in your browser to authorize access (${scope}):`);
    this.logger.info(authorizeUrl(creds, scope, state));
    const redirected = await this.prompt('Paste the URL you were redirected to: ');
    const code = parseRedirect(redirected, state);
    const token = await requestToken(
      creds,
      new URLSearchParams({
        grant_type: 'authorization_code',
        code,
        redirect_uri: creds.redirectUri,
      }),
      this.now(),
    );
    const stored = { ...token, scope: token.scope || scope };
    await this.cache.save(stored);
    return stored;
  }
}
