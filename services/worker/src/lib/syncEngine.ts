/**
 * Sync Engine
 *
 * Publishes every archive entry to the destination bucket (overwriting what
 * is there), then deletes destination objects the archive no longer has.
 *
 * Reconciliation diffs against a full listing of the destination, so its
 * cost grows with the number of destination objects, not the archive size.
 */

import { readArchiveEntries } from './archive.js';
import { resolveContentType } from './contentType.js';
import type { ObjectStore } from './objectStore.js';
import type { Logger } from './logger.js';

export interface SyncTarget {
  bucket: string;
  prefix?: string;
  deleteStale: boolean;
}

export interface SyncResult {
  published: string[];
  deleted: string[];
}

function normalizePrefix(prefix: string | undefined): string {
  return (prefix ?? '').replace(/\/+$/, '');
}

export function buildDestinationKey(path: string, prefix?: string): string {
  const normalized = normalizePrefix(prefix);
  return normalized ? `${normalized}/${path}` : path;
}

export async function syncArchive(
  archive: Uint8Array,
  target: SyncTarget,
  store: ObjectStore,
  logger: Logger
): Promise<SyncResult> {
  const { bucket, deleteStale } = target;
  const prefix = normalizePrefix(target.prefix);
  const published: string[] = [];

  logger.debug({ bucket, prefix }, 'Uploading archive contents');

  for await (const entry of readArchiveEntries(archive)) {
    const key = buildDestinationKey(entry.path, prefix);
    const contentType = resolveContentType(entry.path);
    try {
      await store.putObject(bucket, key, entry.content, contentType);
    } catch (error) {
      logger.error({ err: error, bucket, key }, 'Failed to upload archive entry');
      throw error;
    }
    logger.debug({ bucket, key, contentType, sizeBytes: entry.content.length }, 'Uploaded archive entry');
    published.push(key);
  }

  logger.info({ bucket, prefix, count: published.length }, 'Uploaded archive contents');

  if (!deleteStale) {
    return { published, deleted: [] };
  }

  const publishedKeys = new Set(published);
  let existing: string[];
  try {
    existing = await store.listKeys(bucket, prefix ? `${prefix}/` : undefined);
  } catch (error) {
    logger.error({ err: error, bucket, prefix }, 'Failed to list destination bucket');
    throw error;
  }

  const stale = existing.filter((key) => !publishedKeys.has(key));
  logger.debug({ bucket, stale }, 'Found objects in destination that are not in the archive');

  if (stale.length > 0) {
    try {
      await store.deleteKeys(bucket, stale);
    } catch (error) {
      logger.error({ err: error, bucket, count: stale.length }, 'Failed to delete stale objects');
      throw error;
    }
    logger.info({ bucket, count: stale.length }, 'Deleted stale objects');
  }

  return { published, deleted: stale };
}
