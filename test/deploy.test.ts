import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { Effect, Exit, Option } from "effect"
import { Command } from "@effect/cli"
import { NodeContext } from "@effect/platform-node"
import * as fs from "fs/promises"
import * as path from "path"
import {
  CreateChangeSetCommand,
  DescribeChangeSetCommand,
  DescribeStacksCommand,
} from "@aws-sdk/client-cloudformation"
import { UpdateFunctionCodeCommand } from "@aws-sdk/client-lambda"
import { GetCallerIdentityCommand } from "@aws-sdk/client-sts"

import { deployAccessReview } from "~/deploy/deploy"
import { reportDeployment } from "~/deploy/report"
import { makeDeployCommand } from "~/cli/commands/deploy"
import type { DeploymentConfig } from "~/config"
import { awsError, exists, makeConfig, makeProject, removeProject, testClients, type TestProject } from "./helpers/project"
import {
  accessReviewOutputs,
  cfMock,
  lambdaMock,
  resetMocks,
  stack,
  stsMock,
  stubSuccessfulDeployment,
} from "./helpers/aws-stubs"

describe("deployAccessReview", () => {
  let project: TestProject

  beforeEach(async () => {
    resetMocks()
    vi.clearAllMocks()
    project = await makeProject()
  })

  afterEach(async () => {
    await removeProject(project)
  })

  const deploy = (config: DeploymentConfig = makeConfig()) =>
    deployAccessReview({ config, paths: project.paths, pollInterval: "1 millis" }).pipe(
      Effect.provide(testClients)
    )

  it("should run every step and return the stack outputs", async () => {
    stubSuccessfulDeployment()

    const result = await Effect.runPromise(deploy())

    expect(result.stackStatus).toBe("updated")
    expect(result.outputs).toEqual({ bucketName: "my-bucket", functionArn: "arn:x:y:fn" })
    expect(result.codeSha256).toBe("test-sha")
    expect(result.artifact.files).toEqual(["index.mjs", "lib/report.mjs"])

    const upload = lambdaMock.commandCalls(UpdateFunctionCodeCommand)[0]?.args[0].input
    expect(upload?.FunctionName).toBe("arn:x:y:fn")
    expect(Buffer.from(upload?.ZipFile ?? []).equals(await fs.readFile(project.paths.archiveFile))).toBe(true)
  })

  it("should pass the recipient and schedule as stack parameters", async () => {
    stubSuccessfulDeployment()

    await Effect.runPromise(deploy(makeConfig({ recipientEmail: "sec@example.com", schedule: "rate(7 days)" })))

    const input = cfMock.commandCalls(CreateChangeSetCommand)[0]?.args[0].input
    expect(input?.Capabilities).toEqual(["CAPABILITY_IAM"])
    expect(input?.Parameters).toEqual([
      { ParameterKey: "RecipientEmail", ParameterValue: "sec@example.com" },
      { ParameterKey: "ScheduleExpression", ParameterValue: "rate(7 days)" },
    ])
  })

  it("should push the code even when the stack is unchanged", async () => {
    stubSuccessfulDeployment()
    cfMock.on(DescribeChangeSetCommand).resolves({
      Status: "FAILED",
      StatusReason: "The submitted information didn't contain changes. Submit different information to create a change set.",
    })

    const result = await Effect.runPromise(deploy())

    expect(result.stackStatus).toBe("unchanged")
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(1)
  })

  it("should stop before packaging when credentials are rejected", async () => {
    stubSuccessfulDeployment()
    stsMock.on(GetCallerIdentityCommand).rejects(
      awsError("ExpiredToken", "The security token included in the request is expired")
    )

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("CredentialValidationError")
    expect(error.message).toBe(
      "Could not authenticate with default credentials in us-east-1: The security token included in the request is expired"
    )
    expect(await exists(project.paths.stagingDir)).toBe(false)
    expect(await exists(project.paths.archiveFile)).toBe(false)
    expect(cfMock.commandCalls(CreateChangeSetCommand)).toHaveLength(0)
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
  })

  it("should name the profile when credentials are rejected", async () => {
    stsMock.on(GetCallerIdentityCommand).rejects(awsError("InvalidClientTokenId", "The security token included in the request is invalid."))

    const error = await Effect.runPromise(Effect.flip(deploy(makeConfig({ credentialProfile: Option.some("audit") }))))

    expect(error.message).toBe(
      "Could not authenticate with profile audit in us-east-1: The security token included in the request is invalid."
    )
  })

  it("should fail with a packaging error when the sources are missing", async () => {
    stubSuccessfulDeployment()
    await fs.rm(project.paths.sourceDir, { recursive: true })

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("PackagingError")
    expect(cfMock.commandCalls(CreateChangeSetCommand)).toHaveLength(0)
  })

  it("should fail with a convergence error when the template is missing", async () => {
    stubSuccessfulDeployment()
    await fs.rm(project.paths.templateFile)

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("ConvergenceError")
    expect(error.message).toMatch(/^Cannot read template .+access-review\.yaml: ENOENT/)
    expect(cfMock.commandCalls(CreateChangeSetCommand)).toHaveLength(0)
  })

  it("should not update code when the bucket output is missing", async () => {
    stubSuccessfulDeployment([{ OutputKey: "AccessReviewLambdaArn", OutputValue: "arn:x:y:fn" }])

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("MissingStackOutputError")
    if (error._tag === "MissingStackOutputError") {
      expect(error.outputKey).toBe("AccessReviewS3Bucket")
    }
    expect(error.message).toBe("Stack aws-access-review converged but has no output AccessReviewS3Bucket")
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
  })

  it("should not update code when the function output is missing", async () => {
    stubSuccessfulDeployment([{ OutputKey: "AccessReviewS3Bucket", OutputValue: "my-bucket" }])

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("MissingStackOutputError")
    expect(error.message).toBe("Stack aws-access-review converged but has no output AccessReviewLambdaArn")
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
  })

  it("should not blame an output key when the outputs cannot be read", async () => {
    stubSuccessfulDeployment()
    cfMock.on(DescribeStacksCommand)
      .resolvesOnce({ Stacks: [stack("UPDATE_COMPLETE", accessReviewOutputs())] })
      .resolvesOnce({ Stacks: [stack("UPDATE_COMPLETE", accessReviewOutputs())] })
      .rejects(awsError("AccessDenied", "User is not authorized to perform: cloudformation:DescribeStacks"))

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("MissingStackOutputError")
    if (error._tag === "MissingStackOutputError") {
      expect(error.outputKey).toBeUndefined()
    }
    expect(error.message).toBe(
      "Could not read outputs of stack aws-access-review: User is not authorized to perform: cloudformation:DescribeStacks"
    )
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
  })

  it("should map a failed code update", async () => {
    stubSuccessfulDeployment()
    lambdaMock.on(UpdateFunctionCodeCommand).rejects(
      awsError("AccessDeniedException", "User is not authorized to perform: lambda:UpdateFunctionCode")
    )

    const error = await Effect.runPromise(Effect.flip(deploy()))

    expect(error._tag).toBe("CodeUpdateError")
    expect(error.message).toBe("User is not authorized to perform: lambda:UpdateFunctionCode")
  })

})

describe("access-review-deploy end to end", () => {
  let project: TestProject

  beforeEach(async () => {
    resetMocks()
    vi.clearAllMocks()
    project = await makeProject()
  })

  afterEach(async () => {
    await removeProject(project)
  })

  const run = (args: string[]) =>
    Command.run(
      makeDeployCommand((config) =>
        deployAccessReview({ config, paths: project.paths, pollInterval: "1 millis" }).pipe(
          Effect.flatMap(reportDeployment),
          Effect.provide(testClients)
        )
      ),
      { name: "access-review-deploy", version: "0.0.0" }
    )(["node", "access-review-deploy", ...args]).pipe(
      Effect.provide(NodeContext.layer),
      Effect.runPromiseExit
    )

  it("should deploy and print the summary", async () => {
    stubSuccessfulDeployment()

    const exit = await run(["--email", "ops@example.com", "--schedule", "rate(30 days)"])

    expect(Exit.isSuccess(exit)).toBe(true)
    expect(console.log).toHaveBeenCalledWith("  Function:  arn:x:y:fn")
    expect(console.log).toHaveBeenCalledWith("  Bucket:    my-bucket")
    expect(console.log).toHaveBeenCalledWith("  Recipient: ops@example.com")
    expect(console.log).toHaveBeenCalledWith("  Schedule:  rate(30 days)")
    expect(console.log).toHaveBeenCalledWith("  access-review-run --stack-name aws-access-review --region us-east-1")
  })

  it("should fail on a convergence error with a fresh staging directory", async () => {
    stubSuccessfulDeployment()
    cfMock.on(CreateChangeSetCommand).rejects(
      awsError("ValidationError", "Template format error: YAML not well-formed. (line 3, column 1)")
    )
    await fs.mkdir(project.paths.stagingDir, { recursive: true })
    await fs.writeFile(path.join(project.paths.stagingDir, "stale.mjs"), "old")

    const exit = await run(["--email", "ops@example.com"])

    expect(Exit.isFailure(exit)).toBe(true)
    expect(console.error).toHaveBeenCalledWith(
      "Deployment failed at converge: Template format error: YAML not well-formed. (line 3, column 1)"
    )
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
    expect(await exists(path.join(project.paths.stagingDir, "stale.mjs"))).toBe(false)
    expect(await exists(path.join(project.paths.stagingDir, "index.mjs"))).toBe(true)
  })

  it("should fail on a stack that rolled back", async () => {
    stubSuccessfulDeployment()
    cfMock.on(DescribeStacksCommand)
      .resolvesOnce({ Stacks: [stack("UPDATE_COMPLETE")] })
      .resolves({ Stacks: [stack("UPDATE_ROLLBACK_COMPLETE", [], "Resource handler returned message: Access Denied")] })

    const exit = await run(["--email", "ops@example.com"])

    expect(Exit.isFailure(exit)).toBe(true)
    expect(console.error).toHaveBeenCalledWith(
      "Deployment failed at converge: UPDATE_ROLLBACK_COMPLETE: Resource handler returned message: Access Denied"
    )
    expect(lambdaMock.commandCalls(UpdateFunctionCodeCommand)).toHaveLength(0)
  })

  it("should include the profile in the run command", async () => {
    stubSuccessfulDeployment()

    const exit = await run(["--email", "ops@example.com", "--profile", "audit", "--region", "eu-west-1"])

    expect(Exit.isSuccess(exit)).toBe(true)
    expect(console.log).toHaveBeenCalledWith(
      "  access-review-run --stack-name aws-access-review --region eu-west-1 --profile audit"
    )
  })

})
