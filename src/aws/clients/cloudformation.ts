import { Context, Data, Effect, Layer } from "effect";
import {
  CloudFormationClient,
  CreateChangeSetCommand,
  DeleteChangeSetCommand,
  DescribeChangeSetCommand,
  DescribeStacksCommand,
  ExecuteChangeSetCommand,
  type CreateChangeSetCommandInput,
  type DeleteChangeSetCommandInput,
  type DescribeChangeSetCommandInput,
  type DescribeStacksCommandInput,
  type ExecuteChangeSetCommandInput,
} from "@aws-sdk/client-cloudformation";
import { toClientConfig, errorMessage, errorName, type ClientOptions } from "./shared";

export class CloudFormationClientService extends Context.Tag("CloudFormationClient")<
  CloudFormationClientService,
  CloudFormationClient
>() {}

export class CloudFormationError extends Data.TaggedError("CloudFormationError")<{
  operation: string;
  message: string;
  cause: unknown;
}> {
  is(name: string): boolean {
    return errorName(this.cause) === name;
  }
}

export const layer = (options: ClientOptions) =>
  Layer.scoped(
    CloudFormationClientService,
    Effect.acquireRelease(
      Effect.sync(() => new CloudFormationClient(toClientConfig(options))),
      (client) => Effect.sync(() => client.destroy())
    )
  );

const call = <A>(operation: string, send: (client: CloudFormationClient) => Promise<A>) =>
  Effect.flatMap(CloudFormationClientService, (client) =>
    Effect.tryPromise({
      try: () => send(client),
      catch: (cause) => new CloudFormationError({ operation, message: errorMessage(cause), cause }),
    })
  );

export const describeStacks = (input: DescribeStacksCommandInput) =>
  call("describe_stacks", (client) => client.send(new DescribeStacksCommand(input)));

export const createChangeSet = (input: CreateChangeSetCommandInput) =>
  call("create_change_set", (client) => client.send(new CreateChangeSetCommand(input)));

export const describeChangeSet = (input: DescribeChangeSetCommandInput) =>
  call("describe_change_set", (client) => client.send(new DescribeChangeSetCommand(input)));

export const executeChangeSet = (input: ExecuteChangeSetCommandInput) =>
  call("execute_change_set", (client) => client.send(new ExecuteChangeSetCommand(input)));

export const deleteChangeSet = (input: DeleteChangeSetCommandInput) =>
  call("delete_change_set", (client) => client.send(new DeleteChangeSetCommand(input)));
