/**
 * axios wrapper for address provider calls: timeout, backoff retry, typed failures
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import { config } from '../config';
import { logger } from '../config/logger';
import { ShippingError, ErrorCode, errorMessage, isRetryableError, providerStatusToErrorCode } from '../errors';

const log = logger.child('http');

export interface HttpClientOptions {
  /**
   * Provider name used in log lines and error messages
   */
  provider: string;
  baseURL?: string;
  timeout?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
}

export class HttpClient {
  private readonly client: AxiosInstance;
  private readonly provider: string;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpClientOptions) {
    this.provider = options.provider;
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout || config.http.timeoutMs,
    });
    this.retryAttempts = Math.max(1, options.retryAttempts ?? config.http.retryAttempts);
    this.retryDelayMs = options.retryDelayMs ?? config.http.retryDelayMs;
  }

  async get<T>(url: string, axiosConfig?: AxiosRequestConfig): Promise<T> {
    return this.send<T>({ ...axiosConfig, method: 'GET', url });
  }

  async post<T>(url: string, data?: unknown, axiosConfig?: AxiosRequestConfig): Promise<T> {
    return this.send<T>({ ...axiosConfig, method: 'POST', url, data });
  }

  private async send<T>(request: AxiosRequestConfig): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        log.debug(`${this.provider} ${request.method}`, { attempt, maxAttempts: this.retryAttempts });
        const response = await this.client.request<T>(request);
        return response.data;
      } catch (error) {
        const failure = this.toShippingError(error);
        if (!isRetryableError(failure) || attempt >= this.retryAttempts) {
          throw failure;
        }

        const delayMs = this.retryDelayMs * 2 ** (attempt - 1);
        log.warn(`${this.provider} call failed, retrying in ${delayMs}ms`, { attempt, error: failure.message });
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  private toShippingError(error: unknown): ShippingError {
    if (!(error instanceof AxiosError)) {
      return new ShippingError(ErrorCode.UNKNOWN, errorMessage(error), {
        originalError: error instanceof Error ? error : undefined,
      });
    }

    const status = error.response?.status;
    if (status === undefined) {
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      return new ShippingError(
        timedOut ? ErrorCode.TIMEOUT : ErrorCode.NETWORK_ERROR,
        timedOut ? `${this.provider} request timed out` : `${this.provider} unreachable: ${error.message}`,
        { originalError: error }
      );
    }

    return new ShippingError(providerStatusToErrorCode(status), `${this.provider} responded with HTTP ${status}`, {
      statusCode: status,
      originalError: error,
    });
  }
}
