/**
 * Unzip Relay Job
 *
 * Workflow:
 * 1. Parse the job description
 * 2. Reject the run if the invoking alias names a different account
 * 3. Assume the cross-account role
 * 4. Resolve every destination bucket and wait until it is reachable
 * 5. For each pair in order: download the archive, publish its entries,
 *    delete destination objects the archive no longer contains
 *
 * Any failure aborts the remaining pairs.
 */

import { fetchArchive } from '../lib/archive.js';
import { awaitBucketAccess, listBucketNames, type BucketAccessOptions } from '../lib/bucketAccess.js';
import { CredentialBroker, type Sleep, type TemporaryCredentials } from '../lib/credentialBroker.js';
import { BucketResolutionError, InvokerMismatchError } from '../lib/errors.js';
import { getInvokingAccount } from '../lib/invocation.js';
import { parseJobInput, type DestinationBucket, type TransferPair } from '../lib/jobInput.js';
import type { Logger } from '../lib/logger.js';
import type { ObjectStore } from '../lib/objectStore.js';
import { syncArchive, type SyncResult } from '../lib/syncEngine.js';

export interface UnzipRelayDependencies {
  broker: CredentialBroker;
  /**
   * Store for the function's own account, used to read archives
   */
  sourceStore: ObjectStore;
  /**
   * Store acting with the assumed role in the destination account
   */
  createDestinationStore: (credentials: TemporaryCredentials) => ObjectStore;
  logger: Logger;
  sleep: Sleep;
  bucketAccessMaxRetries: number;
  bucketAccessRetryDelayMs: number;
}

export interface InvocationInfo {
  invokedFunctionArn: string;
}

export interface PairResult extends SyncResult {
  sourceBucket: string;
  sourceKey: string;
  destinationBucket: string;
}

/**
 * Resolves with the bucket name and the store to use from then on
 */
async function resolveDestinationBucket(
  destination: DestinationBucket,
  access: BucketAccessOptions
): Promise<{ bucket: string; store: ObjectStore }> {
  if ('name' in destination) {
    return { bucket: destination.name, store: access.store };
  }

  const { value: names, store } = await listBucketNames(access);
  const matches = names.filter((name) => name.startsWith(destination.namePrefix));
  if (matches.length !== 1) {
    access.logger.error(
      { prefix: destination.namePrefix, matches },
      'Expected to find 1 bucket matching the prefix'
    );
    throw new BucketResolutionError(destination.namePrefix, matches);
  }
  return { bucket: matches[0], store };
}

export const unzipRelayJob = {
  name: 'unzip-relay',
  description: 'Publish the contents of ZIP archives to buckets in another account',

  async process(event: unknown, invocation: InvocationInfo, deps: UnzipRelayDependencies): Promise<PairResult[]> {
    const { broker, sourceStore, createDestinationStore, logger, sleep } = deps;

    const job = parseJobInput(event);
    const { accountId, roleName } = job;

    const invokedBy = getInvokingAccount(invocation.invokedFunctionArn);
    if (invokedBy !== null) {
      logger.debug({ invokedBy }, 'Unzip relay job: Invoked through alias');
      if (invokedBy !== accountId) {
        logger.error({ invokedBy, accountId }, 'Unzip relay job: Invoking account does not match target account');
        throw new InvokerMismatchError(invokedBy, accountId);
      }
    } else {
      logger.debug('Unzip relay job: Invoked unqualified');
    }

    logger.info({ accountId, roleName, pairs: job.pairs.length }, 'Unzip relay job: Starting');

    let destinationStore = createDestinationStore(await broker.assumeRole(accountId, roleName));
    const refresh = async (): Promise<ObjectStore> =>
      createDestinationStore(await broker.assumeRole(accountId, roleName));

    const access = {
      maxRetries: deps.bucketAccessMaxRetries,
      retryDelayMs: deps.bucketAccessRetryDelayMs,
      logger,
      sleep,
      refresh,
    };

    const destinationBuckets: string[] = [];
    for (const pair of job.pairs) {
      const resolved = await resolveDestinationBucket(pair.destination, { ...access, store: destinationStore });
      destinationStore = await awaitBucketAccess(resolved.bucket, { ...access, store: resolved.store });
      destinationBuckets.push(resolved.bucket);
    }

    const results: PairResult[] = [];
    for (const [index, pair] of job.pairs.entries()) {
      results.push(await relayPair(pair, destinationBuckets[index], sourceStore, destinationStore, logger));
    }

    logger.info({ accountId, pairs: results.length }, 'Unzip relay job: Completed');
    return results;
  },
};

async function relayPair(
  pair: TransferPair,
  destinationBucket: string,
  sourceStore: ObjectStore,
  destinationStore: ObjectStore,
  logger: Logger
): Promise<PairResult> {
  const archive = await fetchArchive(
    sourceStore,
    { bucket: pair.sourceBucket, key: pair.sourceKey, versionId: pair.sourceVersion },
    logger
  );

  const result = await syncArchive(
    archive,
    { bucket: destinationBucket, prefix: pair.destinationPrefix, deleteStale: true },
    destinationStore,
    logger
  );

  return {
    sourceBucket: pair.sourceBucket,
    sourceKey: pair.sourceKey,
    destinationBucket,
    ...result,
  };
}
