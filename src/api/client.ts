/**
 * Commerce Platform API Client
 * Low-level HTTP client with OAuth2 client credentials authentication
 */

import { z } from 'zod';
import { ApiError, AuthenticationError, RequestTimeoutError } from '../errors.js';
import type { TokenResponse } from './types.js';

export interface CommerceClientConfig {
  authUrl: string;
  apiUrl: string;
  projectKey: string;
  clientId: string;
  clientSecret: string;
  userAgent?: string;
  timeoutMs?: number;
}

const DEFAULT_USER_AGENT = 'cart-multi-ship';
const DEFAULT_TIMEOUT_MS = 30_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.enum(['Bearer', 'bearer']).default('Bearer'),
  expires_in: z.number(),
  scope: z.string().optional(),
});

const AuthErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
  message: z.string().optional(),
});

const PlatformErrorSchema = z.object({
  message: z.string().optional(),
  errors: z
    .array(
      z.object({
        code: z.string(),
        message: z.string(),
        currentVersion: z.number().optional(),
      })
    )
    .optional(),
});

/**
 * Read a JSON body, or undefined when the body is not JSON
 */
async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

export class CommerceClient {
  private readonly authUrl: string;
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(config: CommerceClientConfig) {
    this.authUrl = config.authUrl.replace(/\/+$/, '');
    this.baseUrl = `${config.apiUrl.replace(/\/+$/, '')}/${config.projectKey}`;
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Get base64-encoded client credentials
   */
  private getBasicAuth(): string {
    const credentials = `${this.clientId}:${this.clientSecret}`;
    return Buffer.from(credentials).toString('base64');
  }

  /**
   * The timeout signal covers the body as well, so reads go through here too
   */
  private async timed<T>(method: string, path: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new RequestTimeoutError(method, path, this.timeoutMs);
      }
      throw error;
    }
  }

  /**
   * fetch with a per-request timeout
   */
  private send(url: string, method: string, path: string, init: RequestInit): Promise<Response> {
    return this.timed(method, path, () =>
      fetch(url, { ...init, signal: init.signal ?? AbortSignal.timeout(this.timeoutMs) })
    );
  }

  /**
   * Get access token using client credentials grant
   */
  async getClientToken(scope: string): Promise<TokenResponse> {
    const response = await this.send(`${this.authUrl}/oauth/token`, 'POST', '/oauth/token', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${this.getBasicAuth()}`,
        'User-Agent': this.userAgent,
      },
      body: new URLSearchParams({ grant_type: 'client_credentials', scope }).toString(),
    });

    const body = await this.timed('POST', '/oauth/token', () => readJson(response));

    if (!response.ok) {
      const error = AuthErrorSchema.safeParse(body);
      const reason = error.success
        ? error.data.error_description || error.data.message || error.data.error
        : undefined;
      throw new AuthenticationError(
        `Token request failed: ${reason || response.statusText}`,
        response.status
      );
    }

    const token = TokenResponseSchema.safeParse(body);
    if (!token.success) {
      throw new AuthenticationError('Token request failed: response carried no access token', response.status);
    }

    return token.data;
  }

  /**
   * Make an authenticated API request against the project
   */
  async request<T>(path: string, accessToken: string, options: RequestInit = {}): Promise<T> {
    const method = options.method ?? 'GET';

    const response = await this.send(`${this.baseUrl}${path}`, method, path, {
      ...options,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${accessToken}`,
        'User-Agent': this.userAgent,
        ...options.headers,
      },
    });

    if (!response.ok) {
      const parsed = PlatformErrorSchema.safeParse(await this.timed(method, path, () => readJson(response)));
      const message = (parsed.success && parsed.data.message) || response.statusText;
      throw new ApiError(
        `API request failed: ${message}`,
        response.status,
        method,
        path,
        parsed.success ? (parsed.data.errors ?? []) : []
      );
    }

    return this.timed(method, path, () => response.json() as Promise<T>);
  }
}
