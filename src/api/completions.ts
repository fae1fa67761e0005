import type { OpenAI } from "openai";
import type { ChatCompletion, ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { getClient, getFallbackClient } from "./client.js";
import { enhanceModelError, getModelConfig } from "./model-config.js";
import { recordError, recordRequest } from "./stats.js";

export type Provider = "azure_openai" | "openai";

export interface CompleteOptions {
  maxTokens: number;
  temperature?: number;
  /** Retry on standard OpenAI when Azure fails and OPENAI_API_KEY is set. Defaults to true. */
  fallback?: boolean;
}

export interface ModelReply {
  completion: ChatCompletion;
  provider: Provider;
  /** Deployment (Azure) or model (OpenAI) that answered. */
  model: string;
  /** Seconds from the first attempt to the answer. */
  responseTime: number;
}

function secondsSince(start: number): number {
  return (performance.now() - start) / 1000;
}

/**
 * One non-streaming chat completion, counted in /metrics. Azure OpenAI is tried
 * first; each failed attempt counts as an error.
 */
export async function complete(messages: ChatCompletionMessageParam[], opts: CompleteOptions): Promise<ModelReply> {
  recordRequest();
  const start = performance.now();
  const { chatModel, fallbackModel } = getModelConfig();

  try {
    const azure = await getClient();
    const completion = await azure.chat.completions.create({
      model: chatModel,
      messages,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
    });
    return { completion, provider: "azure_openai", model: chatModel, responseTime: secondsSince(start) };
  } catch (err) {
    recordError();
    const azureError = enhanceModelError(err);
    const fallback = opts.fallback === false ? null : getFallbackClient();
    if (!fallback) throw azureError;
    return completeOnOpenAI(fallback, fallbackModel, messages, opts, start, azureError);
  }
}

async function completeOnOpenAI(
  openai: OpenAI,
  model: string,
  messages: ChatCompletionMessageParam[],
  opts: CompleteOptions,
  start: number,
  azureError: Error,
): Promise<ModelReply> {
  try {
    const completion = await openai.chat.completions.create({
      model,
      messages,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
    });
    return { completion, provider: "openai", model, responseTime: secondsSince(start) };
  } catch (err) {
    recordError();
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${azureError.message} (OpenAI fallback also failed: ${reason})`);
  }
}

export function replyText(completion: ChatCompletion): string {
  return completion.choices[0]?.message.content ?? "";
}
