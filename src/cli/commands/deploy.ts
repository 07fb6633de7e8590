import { Command } from "@effect/cli";
import { Console, Effect, Logger, LogLevel, Option } from "effect";

import { Aws } from "../../aws";
import { resolvePaths, type DeploymentConfig } from "~/config";
import { deployAccessReview } from "~/deploy/deploy";
import { reportDeployment } from "~/deploy/report";
import { formatDiagnostic, type DeploymentError } from "~/deploy/errors";
import { deployOptions, resolveConfig } from "~/cli/config";
import { c } from "~/cli/colors";

/**
 * Deploy from the current directory and print the summary.
 */
export const runDeployment = (config: DeploymentConfig) =>
  deployAccessReview({ config, paths: resolvePaths(process.cwd()) }).pipe(
    Effect.flatMap(reportDeployment),
    Effect.provide(
      Aws.makeClients({
        region: config.region,
        ...Option.match(config.credentialProfile, {
          onNone: () => ({}),
          onSome: (profile) => ({ profile }),
        }),
      })
    )
  );

export const makeDeployCommand = <R>(
  run: (config: DeploymentConfig) => Effect.Effect<void, DeploymentError, R>
) =>
  Command.make("access-review-deploy", deployOptions, (options) =>
    Effect.gen(function* () {
      const config = yield* resolveConfig(options);
      yield* run(config);
    }).pipe(
      Effect.tapError((error) => Console.error(c.red(formatDiagnostic(error)))),
      Logger.withMinimumLogLevel(LogLevel.Info)
    )
  ).pipe(Command.withDescription("Deploy the scheduled access review Lambda and its report bucket"));

export const deployCommand = makeDeployCommand(runDeployment);
