import { vi } from "vitest";
import type { AzResult, AzRunner } from "./az.js";
import { loadConfig, type QuickTestConfig } from "./config.js";

export const TEST_ENDPOINT = "https://quicktest-openai-1700000000.openai.azure.com/";
export const TEST_KEY = "test-key";

/** Fixed config: timestamp 1700000000, default names. */
export function testConfig(): QuickTestConfig {
  return loadConfig({}, new Date(1_700_000_000_000));
}

type Handler = (args: string[]) => Partial<AzResult> | undefined;

/**
 * In-process stand-in for the Azure CLI. Every call succeeds unless `handler` returns
 * an override; the credential queries answer with TEST_ENDPOINT and TEST_KEY.
 */
export function fakeAz(handler: Handler = () => undefined) {
  const calls: string[][] = [];
  const az = vi.fn<AzRunner>(async (args) => {
    calls.push(args);
    const override = handler(args);
    let stdout = "";
    if (args.includes("properties.endpoint")) stdout = `${TEST_ENDPOINT}\n`;
    else if (args.includes("key1")) stdout = `${TEST_KEY}\n`;
    return { code: 0, stdout, stderr: "", ...override };
  });
  return { az, calls };
}

/** First two words of each az call, e.g. "group create". */
export function commandsOf(calls: string[][]): string[] {
  return calls.map((args) => {
    const flagAt = args.findIndex((a) => a.startsWith("--"));
    return args.slice(0, flagAt === -1 ? args.length : flagAt).join(" ");
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export const CHAT_OK = { choices: [{ message: { role: "assistant", content: "Fiber cement is durable." } }] };
export const EMBEDDING_OK = { data: [{ embedding: [0.1, 0.2, 0.3] }] };

/** Silence console output and keep it for assertions. */
export function captureOutput() {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  });
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  // Strip ANSI colors so tests assert on plain text.
  const plain = () => lines.map((l) => l.replace(/\x1b\[[0-9;]*m/g, ""));
  return { lines, plain };
}
