import type { AzRunner } from "./az.js";
import type { QuickTestConfig } from "./config.js";
import { FatalError, step, success } from "./log.js";

export interface Credentials {
  endpoint: string;
  key: string;
}

async function queryAccount(az: AzRunner, config: QuickTestConfig, command: string[], query: string): Promise<string> {
  const result = await az([
    "cognitiveservices", "account", ...command,
    "--name", config.accountName,
    "--resource-group", config.resourceGroup,
    "--query", query,
    "--output", "tsv",
  ]);
  return result.code === 0 ? result.stdout.trim() : "";
}

/** Read the endpoint and primary key of the provisioned account. Both must be non-empty. */
export async function getCredentials(config: QuickTestConfig, az: AzRunner): Promise<Credentials> {
  step("Retrieving credentials...");

  const endpoint = await queryAccount(az, config, ["show"], "properties.endpoint");
  const key = await queryAccount(az, config, ["keys", "list"], "key1");

  if (!endpoint || !key) {
    throw new FatalError("Failed to retrieve credentials");
  }

  success("Credentials retrieved");
  return { endpoint, key };
}

/** Endpoint without trailing slashes, so paths can be appended directly. */
export function baseUrl(credentials: Credentials): string {
  return credentials.endpoint.replace(/\/+$/, "");
}
