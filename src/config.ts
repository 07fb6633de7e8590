import * as path from "path";
import type { Option } from "effect";

/**
 * Resolved intent for one deployment run. Built once by the CLI and never mutated.
 */
export type DeploymentConfig = {
  readonly stackName: string;
  readonly region: string;
  /**
   * EventBridge schedule expression, passed to the template as-is.
   * @example "rate(30 days)", "cron(0 9 1 * ? *)"
   */
  readonly schedule: string;
  /** Address the report is mailed to. SES will ask it to confirm on first deploy. */
  readonly recipientEmail: string;
  /** Named AWS profile. `None` falls back to the SDK's default credential chain. */
  readonly credentialProfile: Option.Option<string>;
};

export const DEFAULT_STACK_NAME = "aws-access-review";
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_SCHEDULE = "rate(30 days)";

// Stack outputs the template is expected to export
export const BUCKET_OUTPUT_KEY = "AccessReviewS3Bucket";
export const FUNCTION_OUTPUT_KEY = "AccessReviewLambdaArn";

/**
 * Files a run reads and writes, all absolute.
 */
export type DeploymentPaths = {
  templateFile: string;
  sourceDir: string;
  stagingDir: string;
  archiveFile: string;
};

export const resolvePaths = (projectDir: string): DeploymentPaths => ({
  templateFile: path.join(projectDir, "templates", "access-review.yaml"),
  sourceDir: path.join(projectDir, "functions", "access-review"),
  stagingDir: path.join(projectDir, ".access-review", "staging"),
  archiveFile: path.join(projectDir, ".access-review", "access-review.zip"),
});
