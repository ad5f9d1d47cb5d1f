/**
 * idlestop REST API Client
 *
 * HTTP client for the daemon's activity and status endpoints.
 */

import type { ActivityResponse, CLIConfiguration, MonitorStatus } from '@idlestop/shared';

export interface APIClientOptions {
  baseUrl: string;
  token?: string;
  timeout?: number;
}

export interface APIResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

/**
 * Pick a readable message out of an error body
 */
function errorFromBody(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string') return body.message;
    if ('error' in body && typeof body.error === 'string') return body.error;
  }
  return fallback;
}

/**
 * Create API client from CLI configuration
 */
export function createAPIClient(config: CLIConfiguration): IdlestopAPIClient {
  return new IdlestopAPIClient({
    baseUrl: config.apiUrl,
    token: config.apiToken,
    timeout: 10000,
  });
}

/**
 * idlestop REST API Client
 *
 * Never throws: transport failures come back as `{ ok: false, status: 0 }`.
 */
export class IdlestopAPIClient {
  private baseUrl: string;
  private token?: string;
  private timeout: number;

  constructor(options: APIClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.token = options.token;
    this.timeout = options.timeout || 10000;
  }

  private async request<T>(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<APIResponse<T>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const contentType = response.headers.get('content-type');
      const parsed: unknown = contentType?.includes('application/json')
        ? await response.json()
        : undefined;

      if (!response.ok) {
        return {
          ok: false,
          status: response.status,
          error: errorFromBody(parsed, response.statusText),
        };
      }

      return {
        ok: true,
        status: response.status,
        data: parsed as T,
      };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return {
          ok: false,
          status: 0,
          error: `Request timeout after ${this.timeout}ms`,
        };
      }

      return {
        ok: false,
        status: 0,
        error: err instanceof Error ? err.message : 'Network error',
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async health(): Promise<APIResponse<{ status: string; timestamp: string }>> {
    return this.request('GET', '/health');
  }

  async recordActivity(source?: string): Promise<APIResponse<ActivityResponse>> {
    return this.request('POST', '/api/activity', source === undefined ? {} : { source });
  }

  async getStatus(): Promise<APIResponse<MonitorStatus & { timestamp: string }>> {
    return this.request('GET', '/api/status');
  }
}
