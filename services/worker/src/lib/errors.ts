/**
 * Job errors
 *
 * Every failure that aborts a run is raised as-is to the Lambda runtime.
 * The `code` is what shows up in the function's error payload and logs.
 */

export type JobErrorCode =
  | 'INVALID_JOB_INPUT'
  | 'INVOKER_MISMATCH'
  | 'BUCKET_UNREACHABLE'
  | 'BUCKET_LISTING_FAILED'
  | 'BUCKET_RESOLUTION_FAILED'
  | 'DELETE_OBJECTS_FAILED';

export class JobError extends Error {
  readonly code: JobErrorCode;

  constructor(code: JobErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class JobInputError extends JobError {
  constructor(readonly issues: string[]) {
    super('INVALID_JOB_INPUT', `Invalid job input: ${issues.join('; ')}`);
  }
}

export class InvokerMismatchError extends JobError {
  constructor(
    readonly invokedBy: string,
    readonly accountId: string
  ) {
    super(
      'INVOKER_MISMATCH',
      `Invoked by account '${invokedBy}' but asked to assume a role in account '${accountId}'`
    );
  }
}

export class BucketUnreachableError extends JobError {
  constructor(
    readonly bucket: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super('BUCKET_UNREACHABLE', `Bucket '${bucket}' still unreachable after ${attempts} attempts`, { cause });
  }
}

export class BucketListingError extends JobError {
  constructor(
    readonly attempts: number,
    cause: unknown
  ) {
    super('BUCKET_LISTING_FAILED', `Buckets still not listable after ${attempts} attempts`, { cause });
  }
}

export class BucketResolutionError extends JobError {
  constructor(
    readonly prefix: string,
    readonly matches: string[]
  ) {
    super(
      'BUCKET_RESOLUTION_FAILED',
      `Expected exactly 1 bucket matching prefix '${prefix}', found ${matches.length}`
    );
  }
}

export class DeleteObjectsError extends JobError {
  constructor(
    readonly bucket: string,
    readonly failedKeys: string[]
  ) {
    super('DELETE_OBJECTS_FAILED', `Failed to delete ${failedKeys.length} object(s) from bucket '${bucket}'`);
  }
}

/**
 * AWS SDK errors caused by the request (403, 404, throttling on STS, ...)
 * carry `$fault: 'client'`; those are the ones worth retrying here.
 */
export function isClientFault(error: unknown): boolean {
  return typeof error === 'object' && error !== null && '$fault' in error && error.$fault === 'client';
}
