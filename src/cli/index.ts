#!/usr/bin/env node

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";

import { deployCommand } from "./commands/deploy";

const cli = Command.run(deployCommand, {
  name: "access-review-deploy",
  version: "0.1.0",
});

// Failures have already printed their one-line diagnostic
NodeRuntime.runMain(
  cli(process.argv).pipe(Effect.provide(NodeContext.layer)),
  { disableErrorReporting: true }
);
