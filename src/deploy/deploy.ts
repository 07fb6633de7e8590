import { Duration, Effect, Option } from "effect";
import * as fs from "fs/promises";
import {
  getCallerIdentity,
  convergeStack,
  getStackOutputs,
  updateFunctionCode,
  type StackStatus,
} from "../aws";
import { packageFunction, type PackagedArtifact } from "~/build/artifact";
import {
  BUCKET_OUTPUT_KEY,
  FUNCTION_OUTPUT_KEY,
  type DeploymentConfig,
  type DeploymentPaths,
} from "~/config";
import {
  CodeUpdateError,
  ConvergenceError,
  CredentialValidationError,
  MissingStackOutputError,
  PackagingError,
} from "./errors";

export type StackOutputs = {
  bucketName: string;
  functionArn: string;
};

export type DeploymentResult = {
  config: DeploymentConfig;
  stackStatus: StackStatus;
  outputs: StackOutputs;
  artifact: PackagedArtifact;
  codeSha256: string;
};

export type DeployInput = {
  config: DeploymentConfig;
  paths: DeploymentPaths;
  /** Spacing between CloudFormation and Lambda status polls */
  pollInterval?: Duration.DurationInput;
};

const describeProfile = (config: DeploymentConfig) =>
  Option.match(config.credentialProfile, {
    onNone: () => "default credentials",
    onSome: (profile) => `profile ${profile}`,
  });

// ============ Steps ============

export const verifyCredentials = (config: DeploymentConfig) =>
  getCallerIdentity().pipe(
    Effect.tap((identity) =>
      Effect.logInfo(`Authenticated as ${identity.arn} (account ${identity.account}) in ${config.region}`)
    ),
    Effect.mapError((e) =>
      new CredentialValidationError({
        message: `Could not authenticate with ${describeProfile(config)} in ${config.region}: ${e.message}`,
        cause: e,
      })
    )
  );

export const packageArtifact = (paths: DeploymentPaths) =>
  packageFunction({
    sourceDir: paths.sourceDir,
    stagingDir: paths.stagingDir,
    archiveFile: paths.archiveFile,
  }).pipe(
    Effect.mapError((e) => new PackagingError({ message: e.message, cause: e }))
  );

export const convergeAccessReviewStack = (
  config: DeploymentConfig,
  templateFile: string,
  pollInterval?: Duration.DurationInput
) =>
  Effect.gen(function* () {
    const { stackName } = config;

    const templateBody = yield* Effect.tryPromise({
      try: () => fs.readFile(templateFile, "utf-8"),
      catch: (cause) =>
        new ConvergenceError({
          stackName,
          message: `Cannot read template ${templateFile}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    });

    return yield* convergeStack({
      stackName,
      templateBody,
      capabilities: ["CAPABILITY_IAM"],
      parameters: {
        RecipientEmail: config.recipientEmail,
        ScheduleExpression: config.schedule,
      },
      ...(pollInterval ? { pollInterval } : {}),
    }).pipe(
      Effect.mapError((e) => new ConvergenceError({ stackName, message: e.message, cause: e }))
    );
  });

export const resolveStackOutputs = (stackName: string) =>
  Effect.gen(function* () {
    const outputs = yield* getStackOutputs(stackName).pipe(
      Effect.mapError((e) =>
        new MissingStackOutputError({
          stackName,
          message: `Could not read outputs of stack ${stackName}: ${e.message}`,
          cause: e,
        })
      )
    );

    const requireOutput = (outputKey: string): Effect.Effect<string, MissingStackOutputError> => {
      const value = outputs[outputKey];
      return value
        ? Effect.succeed(value)
        : Effect.fail(new MissingStackOutputError({
            stackName,
            outputKey,
            message: `Stack ${stackName} converged but has no output ${outputKey}`,
          }));
    };

    const bucketName = yield* requireOutput(BUCKET_OUTPUT_KEY);
    const functionArn = yield* requireOutput(FUNCTION_OUTPUT_KEY);

    return { bucketName, functionArn } satisfies StackOutputs;
  });

export const pushFunctionCode = (
  functionArn: string,
  archivePath: string,
  pollInterval?: Duration.DurationInput
) =>
  Effect.gen(function* () {
    const code = yield* Effect.tryPromise({
      try: () => fs.readFile(archivePath),
      catch: (cause) =>
        new CodeUpdateError({
          functionArn,
          message: `Cannot read archive ${archivePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    });

    return yield* updateFunctionCode({
      functionName: functionArn,
      code,
      ...(pollInterval ? { pollInterval } : {}),
    }).pipe(
      Effect.mapError((e) => new CodeUpdateError({ functionArn, message: e.message, cause: e }))
    );
  });

// ============ Pipeline ============

/**
 * Run every deployment step in order, stopping at the first failure.
 * Requires the AWS clients (see `Aws.makeClients`) in context.
 */
export const deployAccessReview = ({ config, paths, pollInterval }: DeployInput) =>
  Effect.gen(function* () {
    yield* verifyCredentials(config);

    const artifact = yield* packageArtifact(paths);

    const { status: stackStatus } = yield* convergeAccessReviewStack(config, paths.templateFile, pollInterval);
    yield* Effect.logInfo(`Stack ${config.stackName} ${stackStatus}`);

    const outputs = yield* resolveStackOutputs(config.stackName);

    // Always pushed: a template that did not change says nothing about the code
    const codeSha256 = yield* pushFunctionCode(outputs.functionArn, artifact.archivePath, pollInterval);
    if (codeSha256 && codeSha256 !== artifact.sha256) {
      yield* Effect.logWarning(`Lambda reports CodeSha256 ${codeSha256}, archive hash is ${artifact.sha256}`);
    }

    return {
      config,
      stackStatus,
      outputs,
      artifact,
      codeSha256,
    } satisfies DeploymentResult;
  });
