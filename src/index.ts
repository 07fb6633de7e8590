// Config
export {
  DEFAULT_STACK_NAME,
  DEFAULT_REGION,
  DEFAULT_SCHEDULE,
  BUCKET_OUTPUT_KEY,
  FUNCTION_OUTPUT_KEY,
  resolvePaths,
} from "./config";
export type { DeploymentConfig, DeploymentPaths } from "./config";

// Pipeline
export {
  deployAccessReview,
  verifyCredentials,
  packageArtifact,
  convergeAccessReviewStack,
  resolveStackOutputs,
  pushFunctionCode,
} from "./deploy/deploy";
export type { DeployInput, DeploymentResult, StackOutputs } from "./deploy/deploy";
export { reportDeployment, buildRunReportCommand, RUN_REPORT_COMMAND } from "./deploy/report";
export {
  MissingRequiredOption,
  CredentialValidationError,
  PackagingError,
  ConvergenceError,
  MissingStackOutputError,
  CodeUpdateError,
  formatDiagnostic,
} from "./deploy/errors";
export type { DeploymentError } from "./deploy/errors";

// Packaging
export { packageFunction, stageSources, zipDirectory, computeCodeHash } from "./build/artifact";
export type { PackageInput, PackagedArtifact } from "./build/artifact";

// AWS
export { Aws } from "./aws";
