/**
 * Issuer Client
 * Calls GET /credentials on the credential service
 */

import {
  AuthError,
  parseCredentialResponseBody,
  parseErrorKind,
  type AuthErrorKind,
  type CredentialBundle,
} from '@s3bridge/bridge-core';
import type { CredentialSource, IssuerClientConfig } from './types';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_DURATION_SECONDS = 3600;

/**
 * Kind for a failure body that did not name one
 */
function kindForStatus(status: number): AuthErrorKind {
  if (status >= 500) {
    return 'UpstreamFailure';
  }
  if (status === 401 || status === 403) {
    return 'InvalidApiKey';
  }
  return 'InvalidRequest';
}

export class IssuerClient implements CredentialSource {
  private baseUrl: string;
  private apiKey: string;
  private fetchFn: typeof fetch;
  private timeoutMs: number;
  private durationSeconds: number;
  private now: () => number;

  constructor(config: IssuerClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.fetchFn = config.fetch || globalThis.fetch.bind(globalThis);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.durationSeconds = config.durationSeconds ?? DEFAULT_DURATION_SECONDS;
    this.now = config.now ?? Date.now;

    if (!this.baseUrl) {
      throw new Error('Credential API URL is not configured');
    }
    if (!this.apiKey) {
      throw new Error('API key is not configured');
    }
  }

  async fetchCredentials(serviceId: string): Promise<CredentialBundle> {
    const params = new URLSearchParams({
      service: serviceId,
      duration: String(this.durationSeconds),
    });
    const url = `${this.baseUrl}/credentials?${params.toString()}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'X-API-Key': this.apiKey,
        },
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AuthError(
          `Credential service timed out after ${this.timeoutMs}ms`,
          'UpstreamFailure',
          { cause: error }
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Credential service request failed: ${message}`, 'UpstreamFailure', {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    let body: unknown = null;
    try {
      body = JSON.parse(text);
    } catch {
      body = null;
    }

    if (status < 200 || status >= 300) {
      const { kind, message } = parseErrorKind(body);
      throw new AuthError(
        message ?? `Credential service failed with status ${status}`,
        kind ?? kindForStatus(status)
      );
    }

    if (body === null) {
      throw new AuthError('Credential service returned invalid JSON', 'UpstreamFailure');
    }

    return parseCredentialResponseBody(body, serviceId, this.now());
  }
}
