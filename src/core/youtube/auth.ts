import { createServer, type Server } from 'http';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { google, type Auth } from 'googleapis';
import type { YouTubeOAuthConfig } from '../../types/index.js';
import { isNotFound } from '../pipeline/index.js';

export const UPLOAD_SCOPES = ['https://www.googleapis.com/auth/youtube.upload'];

const EXPIRY_MARGIN_MS = 60_000;

/**
 * Persisted OAuth credential. The upload command only talks to this
 * interface, so the on-disk format stays private to the implementation.
 */
export interface TokenStore {
  load(): Promise<Auth.Credentials | null>;
  isValid(token: Auth.Credentials): boolean;
  refresh(token: Auth.Credentials): Promise<Auth.Credentials>;
  persist(token: Auth.Credentials): Promise<void>;
}

export type InteractiveFlow = (onAuthUrl: (url: string) => void) => Promise<Auth.Credentials>;

export interface AuthCallbacks {
  onAuthUrl?: (url: string) => void;
  onProgress?: (message: string) => void;
}

export function createOAuthClient(config: YouTubeOAuthConfig, redirectUri?: string): Auth.OAuth2Client {
  return new google.auth.OAuth2(config.clientId, config.clientSecret, redirectUri);
}

export function isTokenValid(token: Auth.Credentials, now: number = Date.now()): boolean {
  if (!token.access_token) return false;
  if (typeof token.expiry_date !== 'number') return true;
  return token.expiry_date - EXPIRY_MARGIN_MS > now;
}

export class FileTokenStore implements TokenStore {
  private tokenPath: string;
  private oauth: YouTubeOAuthConfig;

  constructor(tokenPath: string, oauth: YouTubeOAuthConfig) {
    this.tokenPath = tokenPath;
    this.oauth = oauth;
  }

  async load(): Promise<Auth.Credentials | null> {
    let content: string;
    try {
      content = await readFile(this.tokenPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    return parseCredentials(JSON.parse(content));
  }

  isValid(token: Auth.Credentials): boolean {
    return isTokenValid(token);
  }

  async refresh(token: Auth.Credentials): Promise<Auth.Credentials> {
    const client = createOAuthClient(this.oauth);
    client.setCredentials(token);
    const { credentials } = await client.refreshAccessToken();
    // The token endpoint does not always repeat the refresh token.
    return { ...token, ...credentials, refresh_token: credentials.refresh_token ?? token.refresh_token };
  }

  async persist(token: Auth.Credentials): Promise<void> {
    await mkdir(dirname(this.tokenPath), { recursive: true });
    await writeFile(this.tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
  }
}

function parseCredentials(value: unknown): Auth.Credentials | null {
  if (!isRecord(value)) return null;
  const record = value;
  const text = (key: string): string | undefined => {
    const field = record[key];
    return typeof field === 'string' ? field : undefined;
  };

  return {
    access_token: text('access_token'),
    refresh_token: text('refresh_token'),
    token_type: text('token_type'),
    scope: text('scope'),
    id_token: text('id_token'),
    expiry_date: typeof record.expiry_date === 'number' ? record.expiry_date : undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class YouTubeAuthorizer {
  private oauth: YouTubeOAuthConfig;
  private store: TokenStore;
  private interactiveFlow: InteractiveFlow;

  constructor(oauth: YouTubeOAuthConfig, store: TokenStore, interactiveFlow?: InteractiveFlow) {
    this.oauth = oauth;
    this.store = store;
    this.interactiveFlow = interactiveFlow ?? ((onAuthUrl) => runLocalServerFlow(oauth, onAuthUrl));
  }

  /**
   * Returns an authorized client. A stored valid token is used directly; an
   * expired one with a refresh token is refreshed; anything else goes through
   * the browser consent flow. Refresh and consent failures propagate.
   */
  async authorize(callbacks: AuthCallbacks = {}): Promise<Auth.OAuth2Client> {
    const { onProgress, onAuthUrl } = callbacks;
    let token = await this.store.load();

    if (token && this.store.isValid(token)) {
      onProgress?.('Using cached YouTube credentials');
    } else {
      if (token?.refresh_token) {
        onProgress?.('Refreshing expired YouTube credentials...');
        token = await this.store.refresh(token);
      } else {
        onProgress?.('No usable YouTube credentials, starting browser authorization...');
        token = await this.interactiveFlow((url) => onAuthUrl?.(url));
      }
      await this.store.persist(token);
    }

    const client = createOAuthClient(this.oauth);
    client.setCredentials(token);
    return client;
  }
}

/**
 * Installed-app consent flow: listens on an ephemeral loopback port, hands
 * the consent URL to `onAuthUrl`, and exchanges the returned code.
 */
export async function runLocalServerFlow(
  oauth: YouTubeOAuthConfig,
  onAuthUrl: (url: string) => void
): Promise<Auth.Credentials> {
  const server = createServer();
  const port = await listen(server);
  const client = createOAuthClient(oauth, `http://localhost:${port}`);

  try {
    const codePromise = waitForCode(server);
    onAuthUrl(
      client.generateAuthUrl({
        access_type: 'offline',
        prompt: 'consent',
        scope: UPLOAD_SCOPES,
      })
    );
    const code = await codePromise;
    const { tokens } = await client.getToken(code);
    return tokens;
  } finally {
    server.close();
  }
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Could not determine the local authorization port'));
        return;
      }
      resolve(address.port);
    });
  });
}

function waitForCode(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', 'http://localhost');
      const code = url.searchParams.get('code');
      const error = url.searchParams.get('error');

      if (!code && !error) {
        res.writeHead(404).end();
        return;
      }

      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      if (code) {
        res.end('Authorization complete. You can close this window.');
        resolve(code);
      } else {
        res.end('Authorization was not granted.');
        reject(new Error(`YouTube authorization failed: ${error}`));
      }
    });
  });
}
