/**
 * Credential Broker
 *
 * Assumes a named role in another account and hands back the temporary
 * credentials. Client-side STS failures (the role does not exist yet, the
 * trust policy has not propagated, throttling) are retried forever with a
 * fixed delay; anything else is fatal.
 */

import { STSClient, AssumeRoleCommand } from '@aws-sdk/client-sts';
import { setTimeout as delay } from 'timers/promises';
import { loadConfig } from './config.js';
import { isClientFault } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export interface TemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration?: Date;
}

export interface RoleSessionIssuer {
  assumeRole(roleArn: string, sessionName: string): Promise<TemporaryCredentials>;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export function buildRoleArn(accountId: string, roleName: string): string {
  return `arn:aws:iam::${accountId}:role/${roleName}`;
}

export class StsRoleSessionIssuer implements RoleSessionIssuer {
  constructor(private readonly client: STSClient = new STSClient({ region: loadConfig().awsRegion })) {}

  async assumeRole(roleArn: string, sessionName: string): Promise<TemporaryCredentials> {
    const response = await this.client.send(
      new AssumeRoleCommand({
        RoleArn: roleArn,
        RoleSessionName: sessionName,
      })
    );

    const credentials = response.Credentials;
    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
      throw new Error(`AssumeRole returned no credentials for role ${roleArn}`);
    }

    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
      expiration: credentials.Expiration,
    };
  }
}

export interface CredentialBrokerOptions {
  sessionName?: string;
  retryDelayMs?: number;
  logger?: Logger;
  sleep?: Sleep;
}

export class CredentialBroker {
  private readonly sessionName: string;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly issuer: RoleSessionIssuer,
    options: CredentialBrokerOptions = {}
  ) {
    this.sessionName = options.sessionName ?? 'NewAccountRole';
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.logger = options.logger ?? getLogger();
    this.sleep = options.sleep ?? sleep;
  }

  async assumeRole(accountId: string, roleName: string): Promise<TemporaryCredentials> {
    const roleArn = buildRoleArn(accountId, roleName);

    // No attempt cap: a run blocks here until the role can be assumed
    for (;;) {
      this.logger.info({ roleArn }, 'Assuming role');
      try {
        const credentials = await this.issuer.assumeRole(roleArn, this.sessionName);
        this.logger.info({ roleArn }, 'Assumed role');
        return credentials;
      } catch (error) {
        if (!isClientFault(error)) {
          this.logger.error({ err: error, roleArn }, 'Failed to assume role');
          throw error;
        }
        this.logger.warn(
          { err: error, roleArn, retryInMs: this.retryDelayMs },
          'Failed to assume role, retrying'
        );
        await this.sleep(this.retryDelayMs);
      }
    }
  }
}

export function createCredentialBroker(logger?: Logger): CredentialBroker {
  const config = loadConfig();
  return new CredentialBroker(new StsRoleSessionIssuer(), {
    sessionName: config.roleSessionName,
    retryDelayMs: config.assumeRoleRetryDelaySeconds * 1000,
    logger,
  });
}
