import { Context, Data, Effect, Layer } from "effect";
import {
  LambdaClient,
  GetFunctionConfigurationCommand,
  UpdateFunctionCodeCommand,
  type GetFunctionConfigurationCommandInput,
  type UpdateFunctionCodeCommandInput,
} from "@aws-sdk/client-lambda";
import { toClientConfig, errorMessage, errorName, type ClientOptions } from "./shared";

export class LambdaClientService extends Context.Tag("LambdaClient")<LambdaClientService, LambdaClient>() {}

export class LambdaError extends Data.TaggedError("LambdaError")<{
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
    LambdaClientService,
    Effect.acquireRelease(
      Effect.sync(() => new LambdaClient(toClientConfig(options))),
      (client) => Effect.sync(() => client.destroy())
    )
  );

const call = <A>(operation: string, send: (client: LambdaClient) => Promise<A>) =>
  Effect.flatMap(LambdaClientService, (client) =>
    Effect.tryPromise({
      try: () => send(client),
      catch: (cause) => new LambdaError({ operation, message: errorMessage(cause), cause }),
    })
  );

export const updateFunctionCode = (input: UpdateFunctionCodeCommandInput) =>
  call("update_function_code", (client) => client.send(new UpdateFunctionCodeCommand(input)));

export const getFunctionConfiguration = (input: GetFunctionConfigurationCommandInput) =>
  call("get_function_configuration", (client) => client.send(new GetFunctionConfigurationCommand(input)));
