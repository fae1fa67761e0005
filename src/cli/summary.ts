import type { QuickTestConfig } from "./config.js";
import type { Credentials } from "./credentials.js";
import { banner, colors, log, success } from "./log.js";
import { cleanupCommand, type StepResult } from "./provision.js";

export interface RunReport {
  config: QuickTestConfig;
  credentials: Credentials;
  provisioning: StepResult[];
  smokeTests: StepResult[];
  appFile: string;
}

const STATUS_LABEL: Record<StepResult["status"], string> = {
  success: "✅ PASS",
  failed: "⚠️ WARN",
  skipped: "⏭️ SKIP",
};

// Terminal columns of every label: a 2-column emoji, a space and a 4-letter word.
// String length can't be used: "⚠️" and "⏭️" carry a U+FE0F selector, "✅" does not.
const LABEL_WIDTH = 7;

const STATUS_COLOR = {
  success: "green",
  failed: "yellow",
  skipped: "dim",
} as const;

/** Box table of step outcomes. Failed rows are warnings: a required failure never reaches the summary. */
export function printResultsTable(rows: StepResult[]): void {
  const nameWidth = Math.max(...rows.map((r) => r.name.length), 20) + 2;
  const statusWidth = 12;
  const sep = "─";

  log(`┌${sep.repeat(nameWidth)}┬${sep.repeat(statusWidth)}┐`);
  log(`│ ${"Step".padEnd(nameWidth - 2)} │ ${"Result".padEnd(statusWidth - 2)} │`);
  log(`├${sep.repeat(nameWidth)}┼${sep.repeat(statusWidth)}┤`);

  for (const row of rows) {
    const label = STATUS_LABEL[row.status];
    process.stdout.write(`│ ${row.name.padEnd(nameWidth - 2)} │ `);
    process.stdout.write(colors[STATUS_COLOR[row.status]] + label + colors.reset);
    process.stdout.write(" ".repeat(statusWidth - LABEL_WIDTH - 1) + "│\n");
  }

  log(`└${sep.repeat(nameWidth)}┴${sep.repeat(statusWidth)}┘`);
}

export function warningCount(report: RunReport): number {
  return [...report.provisioning, ...report.smokeTests].filter((r) => r.status === "failed").length;
}

export function printSummary(report: RunReport): void {
  const { config, credentials } = report;
  const url = `http://localhost:${config.appPort}`;

  log("");
  success("🎉 Azure OpenAI setup complete!");
  log("");
  banner("📋 DEPLOYMENT SUMMARY");
  log(`Resource Group: ${config.resourceGroup}`);
  log(`Azure OpenAI Service: ${config.accountName}`);
  log(`Endpoint: ${credentials.endpoint}`);
  log(`Location: ${config.location}`);
  log("");
  log("🧪 TEST RESULTS:");
  printResultsTable([...report.provisioning, ...report.smokeTests]);

  const warnings = warningCount(report);
  if (warnings > 0) {
    log(`${warnings} optional step(s) failed, see warnings above.`, "yellow");
  }

  log("");
  log("🚀 NEXT STEPS:");
  log(`1. Start the test app: node --import tsx ${report.appFile}`);
  log("2. Test endpoints:");
  log(`   - Health: curl ${url}/health`);
  log(`   - Query: curl -X POST ${url}/query -H 'Content-Type: application/json' -d '{"query":"How do I install lap siding?"}'`);
  log(`   - Test Suite: curl ${url}/test`);
  log(`   - Metrics: curl ${url}/metrics`);
  log("");
  log("💰 COST INFO:");
  log("- Current setup costs ~$0.50-2.00 per hour when actively used");
  log("- GPT-4 tokens: $0.03 per 1K input tokens, $0.06 per 1K output tokens");
  log("");
  log("🧹 CLEANUP (when done testing):");
  log(`   ${cleanupCommand(config)}`);
  log("");
  log("🔑 CREDENTIALS (save these for app deployment):");
  log(`AZURE_OPENAI_ENDPOINT=${credentials.endpoint}`);
  log(`AZURE_OPENAI_KEY=${credentials.key}`);
  log("=".repeat(50), "cyan");
}
