export const DEFAULT_CHAT_MODEL = "gpt-4";
export const DEFAULT_API_VERSION = "2024-02-01";
export const DEFAULT_FALLBACK_MODEL = "gpt-4o-mini";
export const DEFAULT_PORT = 5000;

export const SYSTEM_PROMPT =
  "You are a fiber cement siding technical expert. Provide helpful, accurate information " +
  "about fiber cement building products, installation, and troubleshooting.";

export const DEFAULT_QUERY = "How can I help you with fiber cement siding products?";

export interface ModelConfig {
  endpoint: string | undefined;
  apiKey: string | undefined;
  chatModel: string;
  apiVersion: string;
  /** Standard OpenAI key; when set, requests that fail on Azure are retried there. */
  openaiApiKey: string | undefined;
  fallbackModel: string;
}

/** Read the service's model settings from the environment on every call. */
export function getModelConfig(env: Record<string, string | undefined> = process.env): ModelConfig {
  return {
    endpoint: env.AZURE_OPENAI_ENDPOINT?.trim() || undefined,
    apiKey: env.AZURE_OPENAI_KEY?.trim() || undefined,
    chatModel: env.AZURE_OPENAI_CHAT_MODEL?.trim() || DEFAULT_CHAT_MODEL,
    apiVersion: env.AZURE_OPENAI_API_VERSION?.trim() || DEFAULT_API_VERSION,
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    fallbackModel: env.OPENAI_CHAT_MODEL?.trim() || DEFAULT_FALLBACK_MODEL,
  };
}

/**
 * Detect Azure's "DeploymentNotFound" error and replace it with a hint; a freshly
 * created deployment can take a few minutes before it accepts requests.
 */
export function enhanceModelError(err: unknown): Error {
  const msg = err instanceof Error ? err.message : String(err);
  if (msg.includes("DeploymentNotFound")) {
    return new Error(
      `Deployment "${getModelConfig().chatModel}" was not found on this endpoint. ` +
      `New deployments can take a few minutes to become available; ` +
      `check AZURE_OPENAI_CHAT_MODEL matches a deployment name.`
    );
  }
  return err instanceof Error ? err : new Error(msg);
}
