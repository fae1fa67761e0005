import { type AzRunner, checkAzCli } from "./az.js";
import type { QuickTestConfig } from "./config.js";
import { getCredentials } from "./credentials.js";
import { appEnv } from "./launch.js";
import { FatalError, banner, log, step, success } from "./log.js";
import { provision } from "./provision.js";
import { type FetchLike, runSmokeTests } from "./smoke.js";
import { type RunReport, printSummary } from "./summary.js";

export interface PipelineDeps {
  az: AzRunner;
  fetch: FetchLike;
  /** Writes the generated test application and returns its path. */
  writeApp: (config: QuickTestConfig) => Promise<string>;
  /** Asks whether to start the app. Returns false without asking when there is no terminal. */
  confirm: (question: string) => Promise<boolean>;
  /** Runs the app in the foreground; resolves with its exit code. */
  launch: (file: string, env: Record<string, string>) => Promise<number>;
}

export const START_QUESTION = "Start the test application now?";

/**
 * Provision, verify, write the test app, summarize, then optionally launch.
 * Strictly sequential; any FatalError stops the run where it was raised.
 */
export async function runQuickTest(config: QuickTestConfig, deps: PipelineDeps): Promise<RunReport> {
  banner("🚀 Azure OpenAI Quick Test Deployment");

  const cli = await checkAzCli(deps.az);
  if (cli === "not-installed") {
    throw new FatalError("Azure CLI (az) is not installed. Install it from https://aka.ms/azure-cli");
  }
  if (cli === "not-authenticated") {
    throw new FatalError("Azure CLI (az) is not authenticated. Run: az login");
  }

  step("Creating Azure resources...");
  step(`Resource Group: ${config.resourceGroup}`);
  step(`Location: ${config.location}`);

  const provisioning = await provision(config, deps.az);
  const credentials = await getCredentials(config, deps.az);

  log("");
  const smokeTests = await runSmokeTests(config, credentials, deps.fetch);

  log("");
  const appFile = await deps.writeApp(config);

  const report: RunReport = { config, credentials, provisioning, smokeTests, appFile };
  printSummary(report);

  if (await deps.confirm(START_QUESTION)) {
    step("Starting test application...");
    log(`Access the app at: http://localhost:${config.appPort}`);
    log("Press Ctrl+C to stop");
    const code = await deps.launch(appFile, appEnv(credentials, config.appPort));
    if (code === 0) success("Test application stopped");
    else log(`Test application exited with code ${code}`, "yellow");
  }

  return report;
}
