import { Context, Data, Effect, Layer } from "effect";
import {
  STSClient,
  GetCallerIdentityCommand,
  type GetCallerIdentityCommandInput,
} from "@aws-sdk/client-sts";
import { toClientConfig, errorMessage, errorName, type ClientOptions } from "./shared";

export class STSClientService extends Context.Tag("STSClient")<STSClientService, STSClient>() {}

export class STSError extends Data.TaggedError("STSError")<{
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
    STSClientService,
    Effect.acquireRelease(
      Effect.sync(() => new STSClient(toClientConfig(options))),
      (client) => Effect.sync(() => client.destroy())
    )
  );

const call = <A>(operation: string, send: (client: STSClient) => Promise<A>) =>
  Effect.flatMap(STSClientService, (client) =>
    Effect.tryPromise({
      try: () => send(client),
      catch: (cause) => new STSError({ operation, message: errorMessage(cause), cause }),
    })
  );

export const getCallerIdentity = (input: GetCallerIdentityCommandInput = {}) =>
  call("get_caller_identity", (client) => client.send(new GetCallerIdentityCommand(input)));
