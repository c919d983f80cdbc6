import {
  PublicClientApplication,
  type AccountInfo,
  type AuthenticationResult,
  type Configuration,
  type SilentFlowRequest,
  type UsernamePasswordRequest,
} from '@azure/msal-node';
import { ProviderAuthError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

const SCOPES = ['Calendars.Read', 'Mail.Read', 'User.Read'];

export type TokenResult = Pick<AuthenticationResult, 'accessToken' | 'account'>;

/** The two MSAL calls the notifier needs */
export interface MsalClient {
  acquireTokenSilent(request: SilentFlowRequest): Promise<TokenResult>;
  acquireTokenByUsernamePassword(request: UsernamePasswordRequest): Promise<TokenResult | null>;
}

export interface TokenSource {
  getAccessToken(): Promise<string>;
}

export interface OutlookCredentials {
  clientId: string;
  tenantId: string;
  username: string;
  password: string;
}

export function createMsalApp(credentials: OutlookCredentials): PublicClientApplication {
  const msalConfig: Configuration = {
    auth: {
      clientId: credentials.clientId,
      authority: `https://login.microsoftonline.com/${credentials.tenantId}`,
    },
  };
  return new PublicClientApplication(msalConfig);
}

/**
 * Signs in with the mailbox credentials once, then refreshes silently from
 * MSAL's in-memory cache. Falls back to a fresh sign-in when the silent
 * refresh fails.
 */
export class OutlookAuth implements TokenSource {
  private account: AccountInfo | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly credentials: OutlookCredentials,
    private readonly app: MsalClient = createMsalApp(credentials),
    logger?: Logger,
  ) {
    this.logger = logger ?? rootLogger.child('outlook-auth');
  }

  async getAccessToken(): Promise<string> {
    if (this.account) {
      try {
        const result = await this.app.acquireTokenSilent({ scopes: SCOPES, account: this.account });
        return result.accessToken;
      } catch (error) {
        this.logger.warn('Silent token refresh failed, signing in again', { error });
        this.account = null;
      }
    }

    const result = await this.app.acquireTokenByUsernamePassword({
      scopes: SCOPES,
      username: this.credentials.username,
      password: this.credentials.password,
    });
    if (!result) {
      throw new ProviderAuthError('Sign-in returned no token');
    }

    this.account = result.account;
    this.logger.info('Signed in to Outlook', { username: this.credentials.username });
    return result.accessToken;
  }

  getScopes(): string[] {
    return [...SCOPES];
  }
}
