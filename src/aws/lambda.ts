import { Data, Duration, Effect, Schedule } from "effect";
import type { GetFunctionConfigurationCommandOutput } from "@aws-sdk/client-lambda";
import { lambda } from "./clients";

export type UpdateCodeInput = {
  /** Function name or ARN */
  functionName: string;
  code: Uint8Array;
  /** Spacing between status polls (default: 2 seconds) */
  pollInterval?: Duration.DurationInput;
};

export class FunctionUpdateFailed extends Data.TaggedError("FunctionUpdateFailed")<{
  functionName: string;
  message: string;
}> {}

class UpdateInProgress extends Data.TaggedError("UpdateInProgress")<{
  functionName: string;
}> {}

/**
 * Replace a function's code with the given zip and wait until Lambda has applied it.
 * Returns the CodeSha256 Lambda reports for the new code.
 */
export const updateFunctionCode = (input: UpdateCodeInput) =>
  Effect.gen(function* () {
    const { functionName, code } = input;

    yield* Effect.logInfo(`Updating function code: ${functionName}`);

    const result = yield* lambda.updateFunctionCode({
      FunctionName: functionName,
      ZipFile: code,
    });

    yield* waitForFunctionUpdated(functionName, input.pollInterval ?? "2 seconds");

    return result.CodeSha256 ?? "";
  });

const waitForFunctionUpdated = (functionName: string, interval: Duration.DurationInput) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for function ${functionName} to finish updating`);

    yield* Effect.retry(
      lambda.getFunctionConfiguration({ FunctionName: functionName }).pipe(
        Effect.flatMap((r): Effect.Effect<GetFunctionConfigurationCommandOutput, UpdateInProgress | FunctionUpdateFailed> => {
          switch (r.LastUpdateStatus) {
            case "InProgress":
              return Effect.fail(new UpdateInProgress({ functionName }));
            case "Failed":
              return Effect.fail(new FunctionUpdateFailed({
                functionName,
                message: r.LastUpdateStatusReason ?? `Update of ${functionName} failed`,
              }));
            default:
              return Effect.succeed(r);
          }
        })
      ),
      {
        schedule: Schedule.spaced(interval),
        while: e => e._tag === "UpdateInProgress",
      }
    );

    yield* Effect.logDebug(`Function ${functionName} is up to date`);
  });
