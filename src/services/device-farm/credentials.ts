/**
 * Role credential exchange
 */

import { randomBytes } from 'node:crypto';
import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts';
import type { AssumeRoleCommandOutput } from '@aws-sdk/client-sts';
import { createModuleLogger } from '../../utils/logger.js';
import { CredentialExchangeError } from './errors.js';
import type { DeviceFarmCredentials } from './types.js';

const logger = createModuleLogger('device-farm:credentials');

const SESSION_NAME_PREFIX = 'device-farm-';
const SESSION_SUFFIX_LENGTH = 8;
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Random role session name, e.g. `device-farm-a8Kq2ZpX`
 */
export function createSessionName(): string {
  const bytes = randomBytes(SESSION_SUFFIX_LENGTH);
  let suffix = '';
  for (const byte of bytes) {
    suffix += ALPHANUMERIC.charAt(byte % ALPHANUMERIC.length);
  }
  return `${SESSION_NAME_PREFIX}${suffix}`;
}

/**
 * Exchange a role ARN for temporary session credentials.
 *
 * Rejects with CredentialExchangeError when STS fails or returns an
 * incomplete credential set.
 */
export async function assumeRole(
  roleArn: string,
  sts: STSClient = new STSClient({})
): Promise<DeviceFarmCredentials> {
  const sessionName = createSessionName();
  logger.debug({ roleArn, sessionName }, 'Assuming role');

  let response: AssumeRoleCommandOutput;
  try {
    response = await sts.send(
      new AssumeRoleCommand({ RoleArn: roleArn, RoleSessionName: sessionName })
    );
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.error(cause, `AssumeRole failed for ${roleArn}`);
    throw new CredentialExchangeError(roleArn, cause.message, cause);
  }

  const credentials = response.Credentials;
  if (!credentials?.AccessKeyId || !credentials.SecretAccessKey) {
    throw new CredentialExchangeError(roleArn, 'response carried no credentials');
  }

  logger.info({ roleArn, expiration: credentials.Expiration }, 'Assumed role');

  return {
    accessKeyId: credentials.AccessKeyId,
    secretAccessKey: credentials.SecretAccessKey,
    sessionToken: credentials.SessionToken,
    expiration: credentials.Expiration,
  };
}
