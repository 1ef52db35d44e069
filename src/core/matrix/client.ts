import type { MatrixConfig, MatrixMessagesPage } from '../../types/index.js';

const PAGE_LIMIT = 100;

export class MatrixClient {
  private homeserver: string;
  private roomId: string;
  private accessToken: string;

  constructor(config: MatrixConfig) {
    this.homeserver = config.homeserver.replace(/\/$/, '');
    this.roomId = config.roomId;
    this.accessToken = config.accessToken;
  }

  buildMessagesUrl(from?: string): string {
    const params = new URLSearchParams({
      access_token: this.accessToken,
      dir: 'b',
      limit: String(PAGE_LIMIT),
    });
    if (from) {
      params.set('from', from);
    }

    return `${this.homeserver}/_matrix/client/v3/rooms/${encodeURIComponent(this.roomId)}/messages?${params}`;
  }

  async fetchPage(from?: string): Promise<MatrixMessagesPage> {
    const response = await fetch(this.buildMessagesUrl(from), {
      headers: { Accept: 'application/json' },
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Matrix API error (${response.status}): ${errorText}`);
    }

    return (await response.json()) as MatrixMessagesPage;
  }
}
