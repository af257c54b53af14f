/**
 * Authentication Service
 * Holds the client credentials token for the project scope
 */

import type { CommerceClient } from '../api/client.js';

// Buffer time before token expiration (5 minutes)
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;

export class AuthService {
  private appToken: { accessToken: string; scope: string; expiresAt: number } | null = null;

  constructor(private readonly client: CommerceClient) {}

  /**
   * Get app-level access token (client credentials)
   * Fetches a new one when the cached token is for another scope or about to expire
   */
  async getAppToken(scope: string): Promise<string> {
    const now = Date.now();

    if (
      this.appToken &&
      this.appToken.scope === scope &&
      this.appToken.expiresAt > now + TOKEN_REFRESH_BUFFER_MS
    ) {
      return this.appToken.accessToken;
    }

    const response = await this.client.getClientToken(scope);
    this.appToken = {
      accessToken: response.access_token,
      scope,
      expiresAt: now + response.expires_in * 1000,
    };

    return this.appToken.accessToken;
  }
}
