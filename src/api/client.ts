import { AzureOpenAI, OpenAI } from "openai";
import { getModelConfig } from "./model-config.js";

const COGNITIVE_SERVICES_SCOPE = "https://cognitiveservices.azure.com/.default";

let client: AzureOpenAI | null = null;
let fallbackClient: OpenAI | null = null;

/**
 * Shared AzureOpenAI singleton. Uses AZURE_OPENAI_KEY when set, otherwise a
 * Microsoft Entra token from DefaultAzureCredential (managed identity, az login).
 */
export async function getClient(): Promise<AzureOpenAI> {
  if (!client) {
    const { endpoint, apiKey, apiVersion } = getModelConfig();
    if (!endpoint) {
      throw new Error("AZURE_OPENAI_ENDPOINT is not set");
    }
    if (apiKey) {
      client = new AzureOpenAI({ endpoint, apiKey, apiVersion });
    } else {
      const { DefaultAzureCredential, getBearerTokenProvider } = await import("@azure/identity");
      const azureADTokenProvider = getBearerTokenProvider(new DefaultAzureCredential(), COGNITIVE_SERVICES_SCOPE);
      client = new AzureOpenAI({ endpoint, azureADTokenProvider, apiVersion });
    }
  }
  return client;
}

/** Standard OpenAI client, or null when OPENAI_API_KEY is not set. */
export function getFallbackClient(): OpenAI | null {
  if (!fallbackClient) {
    const { openaiApiKey } = getModelConfig();
    if (!openaiApiKey) return null;
    fallbackClient = new OpenAI({ apiKey: openaiApiKey });
  }
  return fallbackClient;
}
