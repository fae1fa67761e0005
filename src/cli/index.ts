#!/usr/bin/env node
/**
 * One-shot Azure OpenAI quick test: provisions a resource group, an OpenAI account and
 * two model deployments with the Azure CLI, smoke-tests the endpoint, writes a small
 * test service, and offers to start it.
 */

import { runAz } from "./az.js";
import { writeTestApp } from "./artifact.js";
import { loadConfig } from "./config.js";
import { isInteractive, launchTestApp, promptYesNo } from "./launch.js";
import { FatalError, errorMessage, failure, log } from "./log.js";
import { runQuickTest } from "./pipeline.js";

async function main(): Promise<void> {
  const config = loadConfig();

  await runQuickTest(config, {
    az: runAz,
    fetch,
    writeApp: (c) => writeTestApp(c),
    confirm: async (question) => {
      if (!isInteractive()) {
        log("Non-interactive session, not starting the test application.", "dim");
        return false;
      }
      return promptYesNo(question);
    },
    launch: launchTestApp,
  });
}

main().catch((err) => {
  if (err instanceof FatalError) {
    failure(err.message);
  } else {
    failure(`Fatal error: ${errorMessage(err)}`);
  }
  process.exit(1);
});
