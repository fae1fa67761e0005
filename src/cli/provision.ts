import type { AzRunner } from "./az.js";
import { lastErrorLine } from "./az.js";
import type { ModelDeployment, QuickTestConfig } from "./config.js";
import { FatalError, step, success, warning } from "./log.js";

export type StepStatus = "success" | "failed" | "skipped";

export interface StepResult {
  name: string;
  required: boolean;
  status: StepStatus;
  error?: string;
}

export interface ProvisionStep {
  name: string;
  /** Progress line printed before the az call. */
  progress: string;
  required: boolean;
  args: string[];
}

function deploymentArgs(config: QuickTestConfig, model: ModelDeployment): string[] {
  return [
    "cognitiveservices", "account", "deployment", "create",
    "--name", config.accountName,
    "--resource-group", config.resourceGroup,
    "--deployment-name", model.deploymentName,
    "--model-name", model.modelName,
    "--model-version", model.modelVersion,
    "--model-format", "OpenAI",
    "--scale-settings-scale-type", "Standard",
    "--scale-settings-capacity", String(model.capacity),
  ];
}

/** The create operations, in the order they must run. */
export function provisioningSteps(config: QuickTestConfig): ProvisionStep[] {
  return [
    {
      name: "Resource group",
      progress: "Creating resource group...",
      required: true,
      args: [
        "group", "create",
        "--name", config.resourceGroup,
        "--location", config.location,
        "--tags", `Project=${config.projectTag}`, "Environment=Testing",
      ],
    },
    {
      name: "Azure OpenAI service",
      progress: "Creating Azure OpenAI service (this may take 2-3 minutes)...",
      required: true,
      args: [
        "cognitiveservices", "account", "create",
        "--name", config.accountName,
        "--resource-group", config.resourceGroup,
        "--location", config.location,
        "--kind", "OpenAI",
        "--sku", config.sku,
        "--yes",
      ],
    },
    {
      name: `Chat model (${config.chat.deploymentName})`,
      progress: `Deploying ${config.chat.modelName} model...`,
      required: true,
      args: deploymentArgs(config, config.chat),
    },
    {
      name: `Embedding model (${config.embedding.deploymentName})`,
      progress: "Deploying embedding model...",
      required: false,
      args: deploymentArgs(config, config.embedding),
    },
  ];
}

export function cleanupCommand(config: QuickTestConfig): string {
  return `az group delete --name ${config.resourceGroup} --yes --no-wait`;
}

/**
 * Run the steps in order. A failed required step throws and leaves whatever was
 * already created in place; a failed optional step is recorded and skipped past.
 */
export async function provision(config: QuickTestConfig, az: AzRunner): Promise<StepResult[]> {
  const results: StepResult[] = [];

  for (const s of provisioningSteps(config)) {
    step(s.progress);
    const result = await az(s.args);

    if (result.code === 0) {
      success(`${s.name} created`);
      results.push({ name: s.name, required: s.required, status: "success" });
      continue;
    }

    const reason = lastErrorLine(result);
    if (s.required) {
      // Later steps depend on this one; the first step has nothing to clean up.
      const hint = results.length > 0 ? ` (clean up with: ${cleanupCommand(config)})` : "";
      throw new FatalError(`Failed to create ${s.name}: ${reason}${hint}`);
    }

    warning(`${s.name} deployment failed (optional): ${reason}`);
    results.push({ name: s.name, required: false, status: "failed", error: reason });
  }

  return results;
}
