import type { Agent } from 'node:http';

import { Actor } from 'apify';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { ProductApiConfig } from '../types';
import { isRecord, UnknownRecord } from '../utils/records';

export interface ApiClientOptions {
  /** Replaces axios' transport; used to serve canned responses. */
  adapter?: AxiosAdapter;
  /** Source of the proxy variables; defaults to process.env. */
  proxyEnv?: NodeJS.ProcessEnv;
}

/**
 * Shared plumbing for the Real-Time Amazon Data endpoints: one lazily built
 * axios instance per client, provider headers and an optional outbound proxy.
 */
export abstract class BaseApiClient {
  private httpClientPromise?: Promise<AxiosInstance>;

  constructor(
    protected readonly name: string,
    protected readonly config: ProductApiConfig,
    private readonly options: ApiClientOptions = {},
  ) {}

  protected async getJson(path: string, params: Record<string, string>): Promise<UnknownRecord> {
    const http = await this.getHttpClient();
    const response = await http.get<unknown>(path, { params });
    return isRecord(response.data) ? response.data : {};
  }

  protected async getHttpClient(): Promise<AxiosInstance> {
    if (!this.httpClientPromise) {
      this.httpClientPromise = this.buildAxiosInstance();
    }
    return this.httpClientPromise;
  }

  private async buildAxiosInstance(): Promise<AxiosInstance> {
    const agent = await this.resolveProxyAgent();

    return axios.create({
      baseURL: `https://${this.config.host}`,
      timeout: this.config.timeoutMs,
      headers: {
        'x-rapidapi-key': this.config.apiKey,
        'x-rapidapi-host': this.config.host,
        Accept: 'application/json',
      },
      ...(this.options.adapter ? { adapter: this.options.adapter } : {}),
      ...(agent
        ? {
            httpAgent: agent,
            httpsAgent: agent,
            proxy: false as const,
          }
        : {}),
    });
  }

  private async resolveProxyAgent(): Promise<Agent | undefined> {
    const env = this.options.proxyEnv ?? process.env;
    const proxyUrl = env.APIFY_PROXY_URL;
    const proxyGroups = env.APIFY_PROXY_GROUPS;

    if (!proxyUrl && !proxyGroups) {
      return undefined;
    }

    try {
      if (proxyUrl) {
        return new HttpsProxyAgent(proxyUrl);
      }

      const groups = proxyGroups
        ?.split(',')
        .map((group) => group.trim())
        .filter(Boolean);

      const proxyConfiguration = await Actor.createProxyConfiguration({ groups });
      if (!proxyConfiguration) {
        console.warn(`[${this.name}] failed to initialize Apify proxy configuration`);
        return undefined;
      }
      const proxyInfo = await proxyConfiguration.newProxyInfo();
      if (!proxyInfo?.url) {
        console.warn(`[${this.name}] failed to acquire Apify proxy URL`);
        return undefined;
      }
      return new HttpsProxyAgent(proxyInfo.url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${this.name}] failed to configure proxy, calling the API directly: ${message}`);
      return undefined;
    }
  }
}
