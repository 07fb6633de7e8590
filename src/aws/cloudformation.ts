import { Data, Duration, Effect, Schedule } from "effect";
import type { Change, DescribeChangeSetCommandOutput, Stack } from "@aws-sdk/client-cloudformation";
import { cloudformation } from "./clients";

export type StackParameters = Record<string, string>;

export type ConvergeStackInput = {
  stackName: string;
  templateBody: string;
  parameters: StackParameters;
  /** Capabilities acknowledged on the change set, e.g. CAPABILITY_IAM */
  capabilities?: ("CAPABILITY_IAM" | "CAPABILITY_NAMED_IAM" | "CAPABILITY_AUTO_EXPAND")[];
  /** Spacing between status polls (default: 5 seconds) */
  pollInterval?: Duration.DurationInput;
};

export type StackStatus = "created" | "updated" | "unchanged";

export type ConvergeStackResult = {
  stackName: string;
  stackId?: string;
  status: StackStatus;
  changes: Change[];
};

export class StackOperationError extends Data.TaggedError("StackOperationError")<{
  stackName: string;
  status: string;
  message: string;
}> {}

class StillInProgress extends Data.TaggedError("StillInProgress")<{
  status: string;
}> {}

// Change set names are capped at 128 characters, so the stack name is left out
export const CHANGE_SET_PREFIX = "access-review-";

// CloudFormation rejects inline template bodies above this size
export const MAX_TEMPLATE_BODY_BYTES = 51_200;

const EMPTY_CHANGE_SET_REASONS = [
  "The submitted information didn't contain changes",
  "No updates are to be performed",
];

const isEmptyChangeSet = (reason: string | undefined): boolean =>
  !!reason && EMPTY_CHANGE_SET_REASONS.some(r => reason.includes(r));

const toParameterList = (parameters: StackParameters) =>
  Object.entries(parameters).map(([ParameterKey, ParameterValue]) => ({ ParameterKey, ParameterValue }));

/**
 * Look up a stack by name. A stack that does not exist resolves to `undefined`.
 */
export const findStack = (stackName: string) =>
  cloudformation.describeStacks({ StackName: stackName }).pipe(
    Effect.map(r => r.Stacks?.[0]),
    Effect.catchIf(
      e => e.is("ValidationError") && e.message.includes("does not exist"),
      () => Effect.succeed(undefined)
    )
  );

/**
 * Read every output of a stack into a key/value map.
 * Outputs without a key or value are skipped.
 */
export const getStackOutputs = (stackName: string) =>
  Effect.gen(function* () {
    const stack = yield* findStack(stackName);
    if (!stack) {
      return yield* Effect.fail(new StackOperationError({
        stackName,
        status: "MISSING",
        message: `Stack ${stackName} does not exist`,
      }));
    }

    const outputs: Record<string, string> = {};
    for (const output of stack.Outputs ?? []) {
      if (output.OutputKey && output.OutputValue !== undefined) {
        outputs[output.OutputKey] = output.OutputValue;
      }
    }
    return outputs;
  });

const waitForChangeSet = (stackName: string, changeSetId: string, interval: Duration.DurationInput) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for change set ${changeSetId} to be created`);

    return yield* Effect.retry(
      cloudformation.describeChangeSet({ StackName: stackName, ChangeSetName: changeSetId }).pipe(
        Effect.flatMap((r): Effect.Effect<DescribeChangeSetCommandOutput, StillInProgress> =>
          r.Status === "CREATE_PENDING" || r.Status === "CREATE_IN_PROGRESS"
            ? Effect.fail(new StillInProgress({ status: r.Status }))
            : Effect.succeed(r)
        )
      ),
      {
        schedule: Schedule.spaced(interval),
        while: e => e._tag === "StillInProgress",
      }
    );
  });

const waitForStack = (stackName: string, interval: Duration.DurationInput) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for stack ${stackName} to settle`);

    return yield* Effect.retry(
      findStack(stackName).pipe(
        Effect.flatMap((stack): Effect.Effect<Stack, StackOperationError | StillInProgress> => {
          if (!stack) {
            return Effect.fail(new StackOperationError({
              stackName,
              status: "MISSING",
              message: `Stack ${stackName} disappeared while waiting for it`,
            }));
          }
          const status = stack.StackStatus ?? "UNKNOWN";
          if (status.endsWith("_IN_PROGRESS")) {
            return Effect.fail(new StillInProgress({ status }));
          }
          return Effect.succeed(stack);
        })
      ),
      {
        schedule: Schedule.spaced(interval),
        while: e => e._tag === "StillInProgress",
      }
    );
  });

/**
 * Converge a stack to the given template through a change set, the way `aws cloudformation deploy` does.
 * Creates the stack when it does not exist, updates it otherwise, and treats an empty change set as success.
 */
export const convergeStack = (input: ConvergeStackInput) =>
  Effect.gen(function* () {
    const { stackName, templateBody, parameters } = input;
    const interval = input.pollInterval ?? "5 seconds";

    const templateBytes = Buffer.byteLength(templateBody, "utf-8");
    if (templateBytes > MAX_TEMPLATE_BODY_BYTES) {
      return yield* Effect.fail(new StackOperationError({
        stackName,
        status: "TEMPLATE_TOO_LARGE",
        message: `Template is ${templateBytes} bytes, CloudFormation accepts at most ${MAX_TEMPLATE_BODY_BYTES} inline`,
      }));
    }

    // A stack left in REVIEW_IN_PROGRESS by an earlier failed create has no resources yet
    const existing = yield* findStack(stackName);
    const changeSetType = !existing || existing.StackStatus === "REVIEW_IN_PROGRESS" ? "CREATE" : "UPDATE";

    const changeSetName = `${CHANGE_SET_PREFIX}${Date.now()}`;
    yield* Effect.logInfo(`Creating ${changeSetType.toLowerCase()} change set for stack ${stackName}`);

    const created = yield* cloudformation.createChangeSet({
      StackName: stackName,
      ChangeSetName: changeSetName,
      ChangeSetType: changeSetType,
      TemplateBody: templateBody,
      Capabilities: input.capabilities,
      Parameters: toParameterList(parameters),
    });
    const changeSetId = created.Id ?? changeSetName;

    const changeSet = yield* waitForChangeSet(stackName, changeSetId, interval);

    if (changeSet.Status === "FAILED") {
      if (isEmptyChangeSet(changeSet.StatusReason)) {
        yield* Effect.logInfo(`No changes to deploy for stack ${stackName}`);
        yield* cloudformation.deleteChangeSet({ StackName: stackName, ChangeSetName: changeSetId });
        return {
          stackName,
          stackId: existing?.StackId,
          status: "unchanged",
          changes: [],
        } satisfies ConvergeStackResult;
      }
      return yield* Effect.fail(new StackOperationError({
        stackName,
        status: "FAILED",
        message: changeSet.StatusReason ?? `Change set ${changeSetName} failed`,
      }));
    }

    const changes = changeSet.Changes ?? [];
    yield* Effect.logDebug(`Change set ${changeSetName} has ${changes.length} change(s)`);

    yield* cloudformation.executeChangeSet({ StackName: stackName, ChangeSetName: changeSetId });

    const stack = yield* waitForStack(stackName, interval);
    const finalStatus = stack.StackStatus ?? "UNKNOWN";

    if (finalStatus !== "CREATE_COMPLETE" && finalStatus !== "UPDATE_COMPLETE") {
      return yield* Effect.fail(new StackOperationError({
        stackName,
        status: finalStatus,
        message: stack.StackStatusReason
          ? `${finalStatus}: ${stack.StackStatusReason}`
          : finalStatus,
      }));
    }

    yield* Effect.logInfo(`Stack ${stackName} is ${finalStatus}`);

    return {
      stackName,
      stackId: stack.StackId,
      status: changeSetType === "CREATE" ? "created" : "updated",
      changes,
    } satisfies ConvergeStackResult;
  });
