import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { NodejsFunction, OutputFormat } from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

export interface UnzipRelayStackProps extends cdk.StackProps {
  /** Worker entry module; it must export `handler` */
  entry: string;
  /** Directory holding the workspaces and their lock file */
  projectRoot: string;
  depsLockFilePath: string;
  /** Buckets in this account the function may read archives from */
  sourceBucketNames: string[];
  /** Role the function assumes in destination accounts */
  crossAccountRoleName: string;
  /** Accounts allowed to invoke the function, each through its own `account-<id>` alias */
  trustedAccountIds: string[];
  logLevel?: string;
}

export class UnzipRelayStack extends cdk.Stack {
  readonly function: NodejsFunction;

  constructor(scope: Construct, id: string, props: UnzipRelayStackProps) {
    super(scope, id, props);

    const { entry, projectRoot, depsLockFilePath, sourceBucketNames, crossAccountRoleName, trustedAccountIds } = props;

    // ============================================================
    // Function
    // ============================================================
    const logGroup = new logs.LogGroup(this, 'LogGroup', {
      logGroupName: '/unzip-relay/worker',
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.function = new NodejsFunction(this, 'Function', {
      runtime: lambda.Runtime.NODEJS_20_X,
      entry,
      handler: 'handler',
      projectRoot,
      depsLockFilePath,
      bundling: {
        format: OutputFormat.ESM,
        target: 'node20',
        mainFields: ['module', 'main'],
        // CommonJS dependencies bundled into an ES module still call require()
        banner: "import { createRequire } from 'module'; const require = createRequire(import.meta.url);",
      },
      // The whole archive and its entries are held in memory
      memorySize: 1024,
      // Role assumption retries without a cap
      timeout: cdk.Duration.minutes(15),
      logGroup,
      environment: {
        NODE_ENV: 'production',
        LOG_LEVEL: props.logLevel ?? 'info',
      },
    });

    // ============================================================
    // Permissions
    // ============================================================
    for (const [index, bucketName] of sourceBucketNames.entries()) {
      const bucket = s3.Bucket.fromBucketName(this, `SourceBucket${index}`, bucketName);
      this.function.addToRolePolicy(
        new iam.PolicyStatement({
          actions: ['s3:GetObject', 's3:GetObjectVersion'],
          resources: [bucket.arnForObjects('*')],
        })
      );
    }

    this.function.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['sts:AssumeRole'],
        resources: [`arn:aws:iam::*:role/${crossAccountRoleName}`],
      })
    );

    // ============================================================
    // Per-account aliases
    // ============================================================
    for (const accountId of trustedAccountIds) {
      const alias = new lambda.Alias(this, `Alias-${accountId}`, {
        aliasName: `account-${accountId}`,
        version: this.function.currentVersion,
      });
      alias.grantInvoke(new iam.AccountPrincipal(accountId));

      new cdk.CfnOutput(this, `AliasArn-${accountId}`, {
        value: alias.functionArn,
        description: `Function alias to invoke from account ${accountId}`,
      });
    }

    // ============================================================
    // Outputs
    // ============================================================
    new cdk.CfnOutput(this, 'FunctionName', {
      value: this.function.functionName,
      description: 'Unzip relay function name',
    });
  }
}
