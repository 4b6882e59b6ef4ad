/**
 * Archive fetch + ZIP decoding
 *
 * The archive is held entirely in memory; entries are read from the central
 * directory in stored order and decompressed one at a time as the caller iterates.
 */

import { buffer } from 'stream/consumers';
import { fromBuffer, type Entry, type ZipFile } from 'yauzl';
import type { ObjectStore } from './objectStore.js';
import type { Logger } from './logger.js';

export interface ArchiveLocation {
  bucket: string;
  key: string;
  versionId?: string;
}

export interface ArchiveEntry {
  path: string;
  content: Uint8Array;
}

/**
 * Download the archive from the source bucket using the store's credentials.
 * No retry: a failed download aborts the run.
 */
export async function fetchArchive(
  store: ObjectStore,
  location: ArchiveLocation,
  logger: Logger
): Promise<Buffer> {
  const { bucket, key, versionId } = location;
  try {
    const archive = await store.getObjectBuffer(bucket, key, versionId);
    logger.info({ bucket, key, versionId, sizeBytes: archive.length }, 'Downloaded archive');
    return archive;
  } catch (error) {
    logger.error({ err: error, bucket, key, versionId }, 'Failed to download archive from S3');
    throw error;
  }
}

function openZip(archive: Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    fromBuffer(archive, { lazyEntries: true }, (error, zipfile) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(zipfile);
    });
  });
}

/**
 * Next central directory record, or null once the directory is exhausted
 */
function nextEntry(zipfile: ZipFile): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: Entry) => {
      detach();
      resolve(entry);
    };
    const onEnd = () => {
      detach();
      resolve(null);
    };
    const onError = (error: Error) => {
      detach();
      reject(error);
    };
    const detach = () => {
      zipfile.off('entry', onEntry);
      zipfile.off('end', onEnd);
      zipfile.off('error', onError);
    };

    zipfile.on('entry', onEntry);
    zipfile.on('end', onEnd);
    zipfile.on('error', onError);
    zipfile.readEntry();
  });
}

function readContent(zipfile: ZipFile, entry: Entry): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error) {
        reject(error);
        return;
      }
      buffer(stream).then(resolve, reject);
    });
  });
}

/**
 * Entries in archive order. Directory records carry no content and are skipped.
 */
export async function* readArchiveEntries(archive: Uint8Array): AsyncGenerator<ArchiveEntry> {
  const zipfile = await openZip(Buffer.isBuffer(archive) ? archive : Buffer.from(archive));

  for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
    if (entry.fileName.endsWith('/')) {
      continue;
    }
    yield {
      path: entry.fileName,
      content: await readContent(zipfile, entry),
    };
  }
}
