/**
 * CloudWatch Logs client construction
 */

import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { AuthError, ParseError } from './errors';
import { logger } from './logger';
import { SigningCredentials } from './types';

export interface AwsClientOptions {
  region?: string;
  profile?: string;
}

/**
 * Builds a client with SDK retries disabled; retries are handled by
 * {@link withRetry} so there is one budget per page.
 */
export function createLogsClient(options: AwsClientOptions): CloudWatchLogsClient {
  logger.debug(
    `Creating CloudWatch Logs client (region=${options.region ?? 'default'}, profile=${options.profile ?? 'default'})`
  );
  return new CloudWatchLogsClient({
    maxAttempts: 1,
    ...(options.region ? { region: options.region } : {}),
    ...(options.profile ? { profile: options.profile } : {}),
  });
}

export async function resolveRegion(client: CloudWatchLogsClient): Promise<string> {
  try {
    return await client.config.region();
  } catch (error) {
    throw new ParseError('No AWS region configured; pass --region, set AWS_REGION or add region to the config file', {
      cause: error,
    });
  }
}

/**
 * Credentials for manual signing, resolved through the client's provider
 * chain on every call
 */
export function credentialSource(client: CloudWatchLogsClient): () => Promise<SigningCredentials> {
  return async () => {
    try {
      const identity = await client.config.credentials();
      return {
        accessKeyId: identity.accessKeyId,
        secretAccessKey: identity.secretAccessKey,
        sessionToken: identity.sessionToken,
      };
    } catch (error) {
      throw new AuthError(`Unable to resolve AWS credentials: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  };
}
