import * as Data from "effect/Data";

export class MissingRequiredOption
  extends Data.TaggedError("MissingRequiredOption")<{
    field: string,
    flag: string
  }> {
  get message() {
    return `Missing required option ${this.flag} (${this.field})`;
  }
}

export class CredentialValidationError
  extends Data.TaggedError("CredentialValidationError")<{
    message: string,
    cause?: unknown
  }> { }

export class PackagingError
  extends Data.TaggedError("PackagingError")<{
    message: string,
    cause?: unknown
  }> { }

export class ConvergenceError
  extends Data.TaggedError("ConvergenceError")<{
    stackName: string,
    message: string,
    cause?: unknown
  }> { }

export class MissingStackOutputError
  extends Data.TaggedError("MissingStackOutputError")<{
    stackName: string,
    /** Absent when the outputs could not be read at all */
    outputKey?: string,
    message: string,
    cause?: unknown
  }> { }

export class CodeUpdateError
  extends Data.TaggedError("CodeUpdateError")<{
    functionArn: string,
    message: string,
    cause?: unknown
  }> { }

export type DeploymentError =
  | MissingRequiredOption
  | CredentialValidationError
  | PackagingError
  | ConvergenceError
  | MissingStackOutputError
  | CodeUpdateError;

const STEP_LABELS: Record<DeploymentError["_tag"], string> = {
  MissingRequiredOption: "configuration",
  CredentialValidationError: "credentials",
  PackagingError: "package",
  ConvergenceError: "converge",
  MissingStackOutputError: "stack outputs",
  CodeUpdateError: "update code",
};

/** One-line diagnostic printed before the process exits non-zero */
export const formatDiagnostic = (error: DeploymentError): string =>
  `Deployment failed at ${STEP_LABELS[error._tag]}: ${error.message.replace(/\s*\n\s*/g, " ")}`;
