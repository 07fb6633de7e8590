import { Options } from "@effect/cli";
import { Effect, Option } from "effect";
import {
  DEFAULT_REGION,
  DEFAULT_SCHEDULE,
  DEFAULT_STACK_NAME,
  type DeploymentConfig,
} from "~/config";
import { MissingRequiredOption } from "~/deploy/errors";

export const stackNameOption = Options.text("stack-name").pipe(
  Options.withDescription("CloudFormation stack name"),
  Options.withDefault(DEFAULT_STACK_NAME)
);

export const regionOption = Options.text("region").pipe(
  Options.withDescription("AWS region"),
  Options.withDefault(DEFAULT_REGION)
);

export const scheduleOption = Options.text("schedule").pipe(
  Options.withDescription("EventBridge schedule expression for the review"),
  Options.withDefault(DEFAULT_SCHEDULE)
);

export const emailOption = Options.text("email").pipe(
  Options.withDescription("Recipient of the access review report (required)"),
  Options.optional
);

export const profileOption = Options.text("profile").pipe(
  Options.withDescription("AWS profile to deploy with (default credential chain if omitted)"),
  Options.optional
);

export const deployOptions = {
  stackName: stackNameOption,
  region: regionOption,
  schedule: scheduleOption,
  email: emailOption,
  profile: profileOption,
};

export type DeployOptions = {
  stackName: string;
  region: string;
  schedule: string;
  email: Option.Option<string>;
  profile: Option.Option<string>;
};

/**
 * Turn parsed flags into the immutable config for one run.
 * Fails when no recipient was given; a blank profile means the default credential chain.
 */
export const resolveConfig = (options: DeployOptions): Effect.Effect<DeploymentConfig, MissingRequiredOption> => {
  const recipientEmail = Option.getOrElse(options.email, () => "").trim();
  if (!recipientEmail) {
    return Effect.fail(new MissingRequiredOption({ field: "recipientEmail", flag: "--email" }));
  }

  return Effect.succeed({
    stackName: options.stackName,
    region: options.region,
    schedule: options.schedule,
    recipientEmail,
    credentialProfile: options.profile.pipe(
      Option.map((profile) => profile.trim()),
      Option.filter((profile) => profile.length > 0)
    ),
  });
};
