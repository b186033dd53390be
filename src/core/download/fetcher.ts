// src/core/download/fetcher.ts
import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_TIMEOUT } from '../config/constants.js';
import { ErrorCode, LikedropError } from '../errors.js';

export interface MediaFetcher {
  fetch(url: string): Promise<Buffer>;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class HttpMediaFetcher implements MediaFetcher {
  private http: AxiosInstance;

  constructor(timeout: number = DEFAULT_TIMEOUT) {
    this.http = axios.create({
      timeout,
      responseType: 'arraybuffer',
      maxRedirects: 5,
    });
  }

  async fetch(url: string): Promise<Buffer> {
    try {
      const response = await this.http.get<ArrayBuffer>(url);
      return Buffer.from(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) {
          throw new LikedropError(
            ErrorCode.DOWNLOAD_FAILED,
            `HTTP ${status} for ${url}`,
            isRetryableStatus(status),
            undefined,
            { status }
          );
        }
        // No response at all: timeout, DNS failure, connection reset.
        throw new LikedropError(ErrorCode.NETWORK_ERROR, `${error.code ?? 'Request failed'}: ${error.message}`, true);
      }
      throw error;
    }
  }
}
