/**
 * Destination bucket access
 *
 * A freshly assumed role is not always authorized right away, so the first
 * calls against the destination account may be rejected. Retry a bounded
 * number of times, optionally with fresh credentials before each retry.
 */

import { BucketListingError, BucketUnreachableError, isClientFault } from './errors.js';
import type { ObjectStore } from './objectStore.js';
import type { Sleep } from './credentialBroker.js';
import type { Logger } from './logger.js';

export interface BucketAccessOptions {
  store: ObjectStore;
  maxRetries: number;
  retryDelayMs: number;
  logger: Logger;
  sleep: Sleep;
  /**
   * Called before every retry; the returned store is used from then on
   */
  refresh?: () => Promise<ObjectStore>;
}

export interface AccessResult<T> {
  value: T;
  /**
   * Store whose credentials made the successful call
   */
  store: ObjectStore;
}

interface AccessAttempt<T> {
  call: (store: ObjectStore) => Promise<T>;
  context: Record<string, unknown>;
  action: string;
  exhausted: (attempts: number, cause: unknown) => Error;
}

async function retryClientFaults<T>(attempt: AccessAttempt<T>, options: BucketAccessOptions): Promise<AccessResult<T>> {
  const { maxRetries, retryDelayMs, logger, sleep, refresh } = options;
  const { call, context, action, exhausted } = attempt;
  let store = options.store;
  let retries = 0;

  for (;;) {
    try {
      const value = await call(store);
      return { value, store };
    } catch (error) {
      if (!isClientFault(error)) {
        logger.error({ err: error, ...context }, `Failed to ${action}`);
        throw error;
      }
      logger.warn({ err: error, ...context, retries }, `Failed to ${action}`);

      if (retries >= maxRetries) {
        logger.error({ ...context, attempts: retries + 1 }, `Exceeded number of retries to ${action}`);
        throw exhausted(retries + 1, error);
      }

      logger.warn({ ...context, retryInMs: retryDelayMs }, `Retrying to ${action}`);
      await sleep(retryDelayMs);
      retries += 1;

      if (refresh) {
        store = await refresh();
      }
    }
  }
}

/**
 * HeadBucket until the bucket answers. Resolves with the store that reached it.
 */
export async function awaitBucketAccess(bucket: string, options: BucketAccessOptions): Promise<ObjectStore> {
  const { store } = await retryClientFaults(
    {
      call: (current) => current.headBucket(bucket),
      context: { bucket },
      action: 'access bucket',
      exhausted: (attempts, cause) => new BucketUnreachableError(bucket, attempts, cause),
    },
    options
  );
  options.logger.info({ bucket }, 'Destination bucket reachable');
  return store;
}

/**
 * ListBuckets under the same retry rules as awaitBucketAccess
 */
export async function listBucketNames(options: BucketAccessOptions): Promise<AccessResult<string[]>> {
  return retryClientFaults(
    {
      call: (current) => current.listBucketNames(),
      context: {},
      action: 'list buckets',
      exhausted: (attempts, cause) => new BucketListingError(attempts, cause),
    },
    options
  );
}
