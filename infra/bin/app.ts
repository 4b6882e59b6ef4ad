#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { UnzipRelayStack } from '../lib/unzip-relay-stack.js';

const app = new cdk.App();

// Comma-separated context values, e.g. --context sourceBuckets=artifacts,releases
function listContext(key: string): string[] {
  const value: unknown = app.node.tryGetContext(key);
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const region: string = app.node.tryGetContext('region') ?? 'eu-west-1';
const roleName: string = app.node.tryGetContext('crossAccountRole') ?? 'unzip-relay-target';

// app.js is emitted at dist/infra/bin/, three levels below the repo root
const projectRoot = fileURLToPath(new URL('../../../', import.meta.url));
const lockFile = resolve(projectRoot, 'package-lock.json');

new UnzipRelayStack(app, 'UnzipRelayStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region,
  },
  entry: resolve(projectRoot, 'services', 'worker', 'src', 'index.ts'),
  projectRoot,
  depsLockFilePath: existsSync(lockFile) ? lockFile : resolve(projectRoot, 'package.json'),
  sourceBucketNames: listContext('sourceBuckets'),
  crossAccountRoleName: roleName,
  trustedAccountIds: listContext('trustedAccounts'),
  description: 'Republishes ZIP archive contents into buckets in other accounts',
});
