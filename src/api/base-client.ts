import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import pLimit from 'p-limit';
import { withRetry, type RetryPolicy, type RetryOptions } from '../lib/retry.js';

export interface BaseClientOptions {
  baseURL?: string;
  /** milliseconds */
  timeout: number;
  headers?: Record<string, string>;
  /** Maximum concurrent requests through this client. */
  concurrency?: number;
  /** `http://host:port` */
  proxy?: string;
  retry: RetryPolicy;
  /** Swaps the transport; tests use it to answer in process. */
  adapter?: AxiosRequestConfig['adapter'];
}

function proxyConfig(proxy: string | undefined): AxiosRequestConfig['proxy'] {
  if (!proxy) return undefined;
  const url = new URL(proxy);
  return {
    protocol: url.protocol.replace(':', ''),
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : url.protocol === 'https:' ? 443 : 80,
  };
}

export abstract class BaseApiClient {
  protected client: AxiosInstance;
  protected limiter: ReturnType<typeof pLimit>;
  protected retryPolicy: RetryPolicy;

  constructor(options: BaseClientOptions) {
    this.limiter = pLimit(options.concurrency ?? 2);
    this.retryPolicy = options.retry;

    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout,
      headers: options.headers,
      proxy: proxyConfig(options.proxy),
      adapter: options.adapter,
    });
  }

  protected async send<T>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.limiter(() => this.client.request<T>(config));
  }

  protected async request<T>(config: AxiosRequestConfig, retry: RetryOptions = {}): Promise<T> {
    const response = await withRetry(() => this.send<T>(config), this.retryPolicy, {
      label: `${config.method ?? 'GET'} ${config.url ?? ''}`,
      ...retry,
    });
    return response.data;
  }
}
