import { Console, Effect, Option } from "effect";
import { c } from "~/cli/colors";
import type { DeploymentConfig } from "~/config";
import type { DeploymentResult } from "./deploy";

/** Binary of the companion tool that triggers the access review on demand */
export const RUN_REPORT_COMMAND = "access-review-run";

/**
 * Command line that runs the deployed review immediately, with the same stack, region and profile.
 */
export const buildRunReportCommand = (config: DeploymentConfig): string => {
  let command = `${RUN_REPORT_COMMAND} --stack-name ${config.stackName} --region ${config.region}`;
  if (Option.isSome(config.credentialProfile)) {
    command += ` --profile ${config.credentialProfile.value}`;
  }
  return command;
};

export const reportDeployment = (result: DeploymentResult) =>
  Effect.gen(function* () {
    const { config, outputs } = result;

    yield* Console.log(`\n${c.green("Access review deployed successfully")} ${c.dim(`(stack ${config.stackName} ${result.stackStatus})`)}\n`);
    yield* Console.log(`  Function:  ${c.cyan(outputs.functionArn)}`);
    yield* Console.log(`  Bucket:    ${c.cyan(outputs.bucketName)}`);
    yield* Console.log(`  Recipient: ${config.recipientEmail}`);
    yield* Console.log(`  Schedule:  ${config.schedule}`);

    yield* Console.log(`\n  ${c.yellow("⚠")} On a first deployment SES sends a verification email to ${config.recipientEmail}.`);
    yield* Console.log(`    Reports are only delivered once the link in it has been clicked.`);

    yield* Console.log(`\nRun a review now:`);
    yield* Console.log(`  ${c.bold(buildRunReportCommand(config))}`);
  });
