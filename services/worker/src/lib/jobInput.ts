import { z } from 'zod';
import { JobInputError } from './errors.js';

// Presence checks only; values are passed through to AWS as given
const requiredString = z.string().min(1);
// Absent, null and '' all mean "not set"
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

const TransferPairSchema = z
  .object({
    s3_source_bucket: requiredString,
    s3_source_key: requiredString,
    s3_source_version: optionalString,
    s3_target_bucket: requiredString.optional(),
    s3_target_bucket_prefix: requiredString.optional(),
    s3_target_prefix: optionalString,
  })
  .refine((pair) => pair.s3_target_bucket !== undefined || pair.s3_target_bucket_prefix !== undefined, {
    message: 's3_target_bucket or s3_target_bucket_prefix is required',
    path: ['s3_target_bucket'],
  });

const JobEventSchema = z
  .object({
    account_id: requiredString,
    role_to_assume: requiredString.optional(),
    cross_account_role: requiredString.optional(),
    s3_source_target_pairs: z.array(TransferPairSchema),
  })
  .refine((event) => event.role_to_assume !== undefined || event.cross_account_role !== undefined, {
    message: 'role_to_assume or cross_account_role is required',
    path: ['role_to_assume'],
  });

export type DestinationBucket = { name: string } | { namePrefix: string };

export interface TransferPair {
  sourceBucket: string;
  sourceKey: string;
  sourceVersion?: string;
  destination: DestinationBucket;
  destinationPrefix?: string;
}

export interface JobInput {
  accountId: string;
  roleName: string;
  pairs: TransferPair[];
}

export function parseJobInput(event: unknown): JobInput {
  const result = JobEventSchema.safeParse(event);

  if (!result.success) {
    throw new JobInputError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }

  const data = result.data;
  // The refine above guarantees one of the two is set
  const roleName = data.role_to_assume ?? data.cross_account_role ?? '';

  return {
    accountId: data.account_id,
    roleName,
    pairs: data.s3_source_target_pairs.map((pair) => ({
      sourceBucket: pair.s3_source_bucket,
      sourceKey: pair.s3_source_key,
      sourceVersion: pair.s3_source_version,
      destination:
        pair.s3_target_bucket !== undefined
          ? { name: pair.s3_target_bucket }
          : { namePrefix: pair.s3_target_bucket_prefix ?? '' },
      destinationPrefix: pair.s3_target_prefix,
    })),
  };
}
