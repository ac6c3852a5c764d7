// src/services/reddit-auth-service.ts
import axios, { AxiosInstance } from 'axios';
import type { RedditCredentials } from '../types';
import { SourceError, getErrorMessage } from '../types/errors';

export interface RedditAuthResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  scope: string;
}

export const GENERIC_USER_AGENT = 'nodejs:reddit-monitors:v1.0.0';

export class RedditAuthService {
  private token: string | null = null;
  private tokenExpiry: Date | null = null;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly config: RedditCredentials,
    private readonly http: AxiosInstance = axios.create(),
    private readonly timeoutMs = 10000
  ) {
    if (!config.userAgent || config.userAgent === GENERIC_USER_AGENT) {
      console.warn('Warning: Using a generic User-Agent may cause API blocks. Consider using a more specific one.');
    }
  }

  /**
   * Get a valid access token, refreshing if necessary
   */
  async getAccessToken(): Promise<string> {
    if (this.token && this.tokenExpiry && this.tokenExpiry > new Date()) {
      return this.token;
    }
    // Concurrent cycles share one refresh
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Drop the cached token, e.g. after a 401
   */
  invalidate(): void {
    this.token = null;
    this.tokenExpiry = null;
  }

  private async requestToken(): Promise<string> {
    const { username, password } = this.config;
    const body =
      username && password
        ? new URLSearchParams({ grant_type: 'password', username, password })
        : new URLSearchParams({ grant_type: 'client_credentials' });

    try {
      console.log('Requesting new access token...');

      const response = await this.http.post<RedditAuthResponse>(
        'https://www.reddit.com/api/v1/access_token',
        body,
        {
          headers: {
            'User-Agent': this.config.userAgent,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          auth: {
            username: this.config.clientId,
            password: this.config.clientSecret,
          },
          timeout: this.timeoutMs,
        }
      );

      if (!response.data.access_token) {
        throw new Error('Authentication succeeded but token is undefined');
      }

      console.log('Access token obtained successfully');
      this.token = response.data.access_token;

      // Set expiry time (with a small buffer)
      const expiresInMs = (response.data.expires_in - 60) * 1000;
      this.tokenExpiry = new Date(Date.now() + expiresInMs);

      return this.token;
    } catch (error) {
      throw new SourceError(`Failed to authenticate with Reddit API: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
