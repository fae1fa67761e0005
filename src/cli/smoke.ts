import type { QuickTestConfig } from "./config.js";
import { type Credentials, baseUrl } from "./credentials.js";
import { FatalError, errorMessage, log, step, success, warning } from "./log.js";
import type { StepResult } from "./provision.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type ChatMessage = { role: "system" | "user"; content: string };

interface ChatSmokeTest {
  kind: "chat";
  title: string;
  query: string;
  required: boolean;
  messages: ChatMessage[];
  maxTokens: number;
}

interface EmbeddingSmokeTest {
  kind: "embedding";
  title: string;
  required: boolean;
  input: string;
}

export type SmokeTest = ChatSmokeTest | EmbeddingSmokeTest;

export interface SmokeResult extends StepResult {
  /** Reply text for chat tests, embedding dimension for the embedding test. */
  detail?: string;
}

export const SMOKE_TESTS: readonly SmokeTest[] = [
  {
    kind: "chat",
    title: "Basic Chat Completion",
    query: "What is fiber cement lap siding?",
    required: true,
    messages: [
      { role: "system", content: "You are a helpful assistant specializing in fiber cement building products." },
      { role: "user", content: "What is fiber cement lap siding? Give me a brief 2-sentence explanation." },
    ],
    maxTokens: 150,
  },
  {
    kind: "chat",
    title: "Technical Installation Query",
    query: "How do I install fiber cement lap siding?",
    required: false,
    messages: [
      { role: "system", content: "You are a fiber cement siding technical expert. Provide accurate installation guidance." },
      { role: "user", content: "How do I install fiber cement lap siding? List the 3 most important steps." },
    ],
    maxTokens: 200,
  },
  {
    kind: "embedding",
    title: "Embedding Generation",
    required: false,
    input: "Fiber cement siding installation guide",
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }
}

/** First choice's message content, or undefined when the body is not a chat completion. */
export function chatReply(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return "";
  const content = first.message.content;
  return typeof content === "string" ? content : "";
}

/** Dimension of the first embedding; `"unknown"` when the vector can't be read. */
export function embeddingDimension(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.data)) return undefined;
  const first: unknown = body.data[0];
  if (isRecord(first) && Array.isArray(first.embedding)) {
    return String(first.embedding.length);
  }
  return "unknown";
}

function requestFor(test: SmokeTest, config: QuickTestConfig, credentials: Credentials): { url: string; body: unknown } {
  const root = `${baseUrl(credentials)}/openai/deployments`;
  const query = `api-version=${config.apiVersion}`;
  if (test.kind === "chat") {
    return {
      url: `${root}/${config.chat.deploymentName}/chat/completions?${query}`,
      body: { messages: test.messages, max_tokens: test.maxTokens, temperature: 0.1 },
    };
  }
  return {
    url: `${root}/${config.embedding.deploymentName}/embeddings?${query}`,
    body: { input: test.input },
  };
}

/**
 * Send one smoke request. Passing means an OK status and a JSON body carrying the
 * `choices` (chat) or `data` (embedding) array; anything else, including a network
 * error or timeout, is a failure.
 */
export async function runSmokeTest(
  test: SmokeTest,
  config: QuickTestConfig,
  credentials: Credentials,
  fetchImpl: FetchLike = fetch,
): Promise<SmokeResult> {
  const { url, body } = requestFor(test, config, credentials);
  const base = { name: test.title, required: test.required };

  let raw: string;
  let ok: boolean;
  try {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", "api-key": credentials.key },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(config.requestTimeoutMs),
    });
    ok = response.ok;
    raw = await response.text();
  } catch (err) {
    return { ...base, status: "failed", error: errorMessage(err) };
  }

  const parsed = parseJson(raw);
  const detail = test.kind === "chat" ? chatReply(parsed) : embeddingDimension(parsed);
  if (!ok || detail === undefined) {
    return { ...base, status: "failed", error: `Response: ${raw}` };
  }
  return { ...base, status: "success", detail };
}

/**
 * Run the fixed smoke tests in order. The first required failure throws; optional
 * failures are logged as warnings and the remaining tests still run.
 */
export async function runSmokeTests(
  config: QuickTestConfig,
  credentials: Credentials,
  fetchImpl: FetchLike = fetch,
  tests: readonly SmokeTest[] = SMOKE_TESTS,
): Promise<SmokeResult[]> {
  step("Testing Azure OpenAI API...");
  const results: SmokeResult[] = [];

  for (const [i, test] of tests.entries()) {
    log("");
    log(`🧪 Test ${i + 1}: ${test.title}`);
    if (test.kind === "chat") log(`Query: '${test.query}'`);

    const result = await runSmokeTest(test, config, credentials, fetchImpl);
    results.push(result);

    if (result.status === "success") {
      success(`${test.title} test PASSED`);
      if (test.kind === "chat") {
        log("Response:");
        log(result.detail ?? "");
      } else {
        log(`Generated embedding with ${result.detail ?? "unknown"} dimensions`);
      }
      continue;
    }

    if (test.required) {
      throw new FatalError(`${test.title} test failed. ${result.error ?? ""}`.trim());
    }
    warning(`${test.title} test failed${test.kind === "embedding" ? " (optional feature)" : ""}`);
  }

  return results;
}
