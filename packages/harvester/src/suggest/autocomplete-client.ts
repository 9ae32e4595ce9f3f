import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { createLogger } from '@workspace/logger';
import { describeError } from '../errors.js';
import { extractSuggestions } from './suggestion-parser.js';
import type { SuggestQuery, SuggestResult } from './types.js';

const log = createLogger('Autocomplete');

type AutocompleteClientConfig = {
  streetUrl: string;
  numberUrl: string;
  timeoutMs: number;
  /** Replaces the HTTP transport; tests answer requests in process. */
  adapter?: AxiosAdapter;
};

const DEFAULT_STREET_URL =
  'https://service.stuttgart.de/lhs-services/aws/strassennamen';
const DEFAULT_NUMBER_URL =
  'https://service.stuttgart.de/lhs-services/aws/hausnummern';

const DEFAULT_CONFIG: AutocompleteClientConfig = {
  streetUrl: DEFAULT_STREET_URL,
  numberUrl: DEFAULT_NUMBER_URL,
  timeoutMs: 10_000,
};

/**
 * Axios client for the city's address autocomplete service.
 * Never throws: every transport or body problem comes back as a failed result.
 */
export class AutocompleteClient {
  private readonly config: AutocompleteClientConfig;
  private readonly axiosInstance: AxiosInstance;

  constructor(config?: Partial<AutocompleteClientConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.axiosInstance = axios.create({
      timeout: this.config.timeoutMs,
      maxRedirects: 5,
      // Status codes are checked below so 4xx/5xx become failed results
      validateStatus: () => true,
      headers: {
        Accept: 'application/json, text/javascript, */*; q=0.01',
        'Accept-Language': 'de-DE,de;q=0.9,en;q=0.8',
        'X-Requested-With': 'XMLHttpRequest',
      },
      httpsAgent: new https.Agent({
        keepAlive: true,
        keepAliveMsecs: 1000,
        maxSockets: 1,
        timeout: this.config.timeoutMs,
      }),
      httpAgent: new http.Agent({
        keepAlive: true,
        keepAliveMsecs: 1000,
        maxSockets: 1,
        timeout: this.config.timeoutMs,
      }),
      adapter: this.config.adapter,
    });
  }

  suggest(query: SuggestQuery): Promise<SuggestResult> {
    if (query.kind === 'street') {
      return this.request(this.config.streetUrl, { street: query.prefix });
    }

    const params: Record<string, string> = { street: query.street };
    if (query.prefix) {
      params.streetnr = query.prefix;
    }

    return this.request(this.config.numberUrl, params);
  }

  private async request(
    url: string,
    params: Record<string, string>,
  ): Promise<SuggestResult> {
    log.trace(`GET ${url}`, params);

    try {
      const response = await this.axiosInstance.get<unknown>(url, { params });

      if (response.status >= 400) {
        return {
          success: false,
          errorCode: 'http',
          error: `Autocomplete request failed with status ${response.status}`,
        };
      }

      // axios leaves bodies that are not JSON as raw strings
      if (typeof response.data === 'string') {
        return {
          success: false,
          errorCode: 'parse',
          error: 'Autocomplete response is not JSON',
        };
      }

      return {
        success: true,
        suggestions: extractSuggestions(response.data),
      };
    } catch (error) {
      const errorMessage = describeError(error);
      log.debug('Autocomplete request failed:', errorMessage);

      return {
        success: false,
        errorCode: 'network',
        error: errorMessage,
      };
    }
  }
}

export { DEFAULT_NUMBER_URL, DEFAULT_STREET_URL };
export type { AutocompleteClientConfig };
