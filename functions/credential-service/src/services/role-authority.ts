/**
 * Role-assumption authority
 *
 * The broker never mints secrets itself; STS AssumeRole does.
 */

import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts';

export interface AssumeRoleRequest {
  roleReference: string;
  durationSeconds: number;
  sessionName: string;
}

export interface AssumedCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  /** Expiry reported by the authority, when it reports one */
  expiration?: Date;
}

export interface RoleAuthority {
  assume(request: AssumeRoleRequest): Promise<AssumedCredentials>;
}

export interface StsRoleAuthorityOptions {
  client?: STSClient;
  region?: string;
  /** Abort the AssumeRole call after this many milliseconds */
  timeoutMs: number;
}

let stsClient: STSClient | null = null;

function getStsClient(region?: string): STSClient {
  if (!stsClient) {
    stsClient = new STSClient(region ? { region } : {});
  }
  return stsClient;
}

/**
 * Reset the shared STS client (for testing)
 */
export function resetStsClient(): void {
  stsClient = null;
}

/**
 * STS session names allow [\w+=,.@-] and at most 64 characters
 */
export function buildSessionName(serviceId: string, issuedAtMs: number): string {
  const suffix = `-session-${Math.floor(issuedAtMs / 1000)}`;
  const prefix = serviceId.replace(/[^\w+=,.@-]/g, '-').slice(0, 64 - suffix.length);
  return `${prefix || 'service'}${suffix}`;
}

export class StsRoleAuthority implements RoleAuthority {
  private readonly client?: STSClient;
  private readonly region?: string;
  private readonly timeoutMs: number;

  constructor(options: StsRoleAuthorityOptions) {
    this.client = options.client;
    this.region = options.region;
    this.timeoutMs = options.timeoutMs;
  }

  async assume(request: AssumeRoleRequest): Promise<AssumedCredentials> {
    const client = this.client ?? getStsClient(this.region);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await client.send(
        new AssumeRoleCommand({
          RoleArn: request.roleReference,
          RoleSessionName: request.sessionName,
          DurationSeconds: request.durationSeconds,
        }),
        { abortSignal: controller.signal }
      );

      const credentials = response.Credentials;
      if (!credentials) {
        throw new Error('AssumeRole returned no credentials');
      }

      const { AccessKeyId, SecretAccessKey, SessionToken, Expiration } = credentials;
      if (!AccessKeyId || !SecretAccessKey || !SessionToken) {
        throw new Error('Incomplete STS credentials response');
      }

      return {
        accessKeyId: AccessKeyId,
        secretAccessKey: SecretAccessKey,
        sessionToken: SessionToken,
        expiration: Expiration,
      };
    } catch (error) {
      if (timedOut) {
        throw new Error(`AssumeRole timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
