// src/core/api/transport.ts
import { ApiRequestError, ApiResponseError, TwitterApi, type TwitterApiReadOnly } from 'twitter-api-v2';
import type { ApiCredentials } from '../config/app-config.js';
import { ErrorCode, LikedropError } from '../errors.js';
import type { QueryValue, TwitterTransport } from './types.js';

/**
 * Translates library errors into the taxonomy the client reacts to.
 */
export function classifyApiError(error: unknown): unknown {
  if (error instanceof ApiResponseError) {
    if (error.rateLimitError) {
      return new LikedropError(ErrorCode.RATE_LIMITED, error.message, true, undefined, {
        status: error.code,
        resetAt: error.rateLimit?.reset,
      });
    }
    if (error.code === 401) {
      return new LikedropError(
        ErrorCode.AUTH_FAILED,
        `Authentication rejected: ${error.message}`,
        false,
        'Check CONSUMER_KEY, CONSUMER_SECRET, ACCESS_TOKEN and ACCESS_TOKEN_SECRET'
      );
    }
    if (error.code === 404) {
      return new LikedropError(ErrorCode.NOT_FOUND, error.message, false, undefined, { status: error.code });
    }
    if (error.code >= 500) {
      return new LikedropError(ErrorCode.NETWORK_ERROR, error.message, true, undefined, { status: error.code });
    }
    return new LikedropError(ErrorCode.API_ERROR, error.message, false, undefined, { status: error.code });
  }

  if (error instanceof ApiRequestError) {
    return new LikedropError(ErrorCode.NETWORK_ERROR, error.message, true);
  }

  return error;
}

export class TwitterApiTransport implements TwitterTransport {
  private client: TwitterApiReadOnly;

  constructor(credentials: ApiCredentials) {
    this.client = new TwitterApi({
      appKey: credentials.consumerKey,
      appSecret: credentials.consumerSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessTokenSecret,
    }).readOnly;
  }

  async get(endpoint: string, query: Record<string, QueryValue>): Promise<unknown> {
    try {
      const data: unknown = await this.client.v1.get(endpoint, query);
      return data;
    } catch (error) {
      throw classifyApiError(error);
    }
  }
}
