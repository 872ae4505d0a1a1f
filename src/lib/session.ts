import { AuthenticationError, errorMessage } from './errors';
import { silentLogger, type Logger } from './log';
import type { SpotifyApi, UserProfile } from './spotifyApi';
import type { SessionFactory } from './spotifyAuth';

export const TOP_READ_SCOPE = 'user-top-read';

function asAuthError(err: unknown, what: string): AuthenticationError {
  if (err instanceof AuthenticationError) return err;
  return new AuthenticationError(`${what}: ${errorMessage(err)}`, { cause: err });
}

async function handshake(build: () => Promise<SpotifyApi>, what: string): Promise<SpotifyApi> {
  try {
    return await build();
  } catch (err) {
    throw asAuthError(err, what);
  }
}

/**
 * Holds at most one app session and one user session for the life of a CLI
 * invocation. The user session is rebuilt only when a different scope is asked
 * for; the display name belongs to the user session and is dropped with it.
 */
export class SessionCache {
  private appSession: SpotifyApi | null = null;
  private userSession: SpotifyApi | null = null;
  private userScope: string | null = null;
  private displayName: string | null = null;

  constructor(
    private readonly factory: SessionFactory,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** An empty or missing scope means the app-only (client credentials) session. */
  async getSession(scope?: string | null): Promise<SpotifyApi> {
    if (!scope) {
      if (!this.appSession) {
        this.logger.debug('Creating app session');
        this.appSession = await handshake(
          () => this.factory.appSession(),
          'Could not create app session',
        );
      }
      return this.appSession;
    }

    if (this.userSession && this.userScope === scope) return this.userSession;

    if (this.userSession) {
      this.logger.debug(`Scope changed from "${this.userScope}" to "${scope}"; re-authorizing`);
    } else {
      this.logger.debug(`Creating user session for "${scope}"`);
    }
    const requested: string = scope;
    const session = await handshake(
      () => this.factory.userSession(requested),
      'Could not create user session',
    );
    this.userSession = session;
    this.userScope = requested;
    this.displayName = null;
    return session;
  }

  /** Fetched once per user session; later calls never touch the network. */
  async getDisplayName(): Promise<string> {
    if (this.displayName !== null) return this.displayName;
    const session = await this.getSession(TOP_READ_SCOPE);
    let profile: UserProfile;
    try {
      profile = await session.currentUser();
    } catch (err) {
      throw asAuthError(err, 'Could not look up the current user');
    }
    const name = (profile.displayName || profile.id).trim();
    if (!name) throw new AuthenticationError('Spotify returned no identifiable user');
    this.displayName = name;
    return name;
  }
}
