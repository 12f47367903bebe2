/**
 * Shared CLI setup: credentials and service construction from the environment
 */

import type { Env } from '../config/env.js';
import { DeviceFarmService } from '../services/device-farm/index.js';
import type { DeviceFarmAuth, ProgressWriter } from '../services/device-farm/index.js';

/**
 * Pick the authentication mode from configuration.
 * A role ARN wins over static keys.
 */
export function resolveAuth(env: Env): DeviceFarmAuth {
  if (env.DEVICE_FARM_ROLE_ARN) {
    return { roleArn: env.DEVICE_FARM_ROLE_ARN };
  }

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    return {
      credentials: {
        accessKeyId: env.AWS_ACCESS_KEY_ID,
        secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
        sessionToken: env.AWS_SESSION_TOKEN,
      },
    };
  }

  throw new Error(
    'No AWS credentials configured: set DEVICE_FARM_ROLE_ARN, or AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY'
  );
}

export async function createServiceFromEnv(
  env: Env,
  writer: ProgressWriter | null = process.stderr
): Promise<DeviceFarmService> {
  return DeviceFarmService.create(resolveAuth(env), {
    region: env.AWS_REGION,
    userAgent: env.DEVICE_FARM_USER_AGENT,
    pollIntervalMs: env.UPLOAD_POLL_INTERVAL_MS,
    uploadTimeoutMs: env.UPLOAD_TIMEOUT_MS,
    writer,
  });
}
