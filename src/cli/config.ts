import { warning } from "./log.js";

export interface ModelDeployment {
  deploymentName: string;
  modelName: string;
  modelVersion: string;
  capacity: number;
}

export interface QuickTestConfig {
  timestamp: number;
  resourceGroup: string;
  accountName: string;
  location: string;
  projectTag: string;
  sku: string;
  apiVersion: string;
  chat: ModelDeployment;
  embedding: ModelDeployment;
  requestTimeoutMs: number;
  appPort: number;
  appFile: string;
}

type Env = Record<string, string | undefined>;

export const APP_FILE_NAME = "quick-test-app.mts";

const DEFAULT_API_VERSION = "2024-02-01";
const DEFAULT_TIMEOUT_MS = 120_000;

/** Parse a positive integer env value, falling back to the default when absent or invalid. */
export function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    warning(`${key}="${raw}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function text(env: Env, key: string, fallback: string): string {
  return env[key]?.trim() || fallback;
}

/**
 * Build the run configuration. Resource names embed the unix timestamp in seconds
 * so repeated runs never collide.
 */
export function loadConfig(env: Env = process.env, now: Date = new Date()): QuickTestConfig {
  const timestamp = Math.floor(now.getTime() / 1000);
  const prefix = text(env, "QUICKTEST_PREFIX", "quicktest").toLowerCase();

  return {
    timestamp,
    resourceGroup: `${prefix}-test-${timestamp}`,
    accountName: `${prefix}-openai-${timestamp}`,
    location: text(env, "QUICKTEST_LOCATION", "eastus"),
    projectTag: text(env, "QUICKTEST_PROJECT_TAG", "Azure OpenAI Quick Test"),
    sku: "S0",
    apiVersion: text(env, "QUICKTEST_API_VERSION", DEFAULT_API_VERSION),
    chat: {
      deploymentName: "gpt-4",
      modelName: "gpt-4",
      modelVersion: "0613",
      capacity: positiveInt(env, "QUICKTEST_CHAT_CAPACITY", 10),
    },
    embedding: {
      deploymentName: "text-embedding-ada-002",
      modelName: "text-embedding-ada-002",
      modelVersion: "2",
      capacity: positiveInt(env, "QUICKTEST_EMBEDDING_CAPACITY", 120),
    },
    requestTimeoutMs: positiveInt(env, "QUICKTEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    appPort: positiveInt(env, "QUICKTEST_APP_PORT", 5000),
    appFile: APP_FILE_NAME,
  };
}
