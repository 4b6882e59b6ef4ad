/**
 * Unzip Relay Lambda
 *
 * Copies ZIP archives from this account's S3 buckets and republishes their
 * contents into buckets in the account named by the event.
 */

import type { Context } from 'aws-lambda';
import { loadConfig } from './lib/config.js';
import { createCredentialBroker, sleep } from './lib/credentialBroker.js';
import { getLogger } from './lib/logger.js';
import { createObjectStore } from './lib/objectStore.js';
import { unzipRelayJob } from './jobs/unzipRelayJob.js';

export async function handler(event: unknown, context: Pick<Context, 'invokedFunctionArn'>): Promise<void> {
  const logger = getLogger();
  const config = loadConfig();

  logger.debug({ event }, 'Lambda triggered');

  try {
    await unzipRelayJob.process(
      event,
      { invokedFunctionArn: context.invokedFunctionArn },
      {
        broker: createCredentialBroker(logger),
        sourceStore: createObjectStore(),
        createDestinationStore: createObjectStore,
        logger,
        sleep,
        bucketAccessMaxRetries: config.bucketAccessMaxRetries,
        bucketAccessRetryDelayMs: config.bucketAccessRetryDelaySeconds * 1000,
      }
    );
  } catch (error) {
    logger.error({ err: error }, 'Unzip relay job failed');
    throw error;
  }
}
