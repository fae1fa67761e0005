import { describe, it, beforeAll, afterAll, expect } from "vitest";
import { type ChildProcess } from "child_process";
import { API_TIMEOUT_MS, killServer, spawnServer, waitForReady } from "./helpers.js";

const PORT = 9105;
const BASE_URL = `http://localhost:${PORT}`;

const azureConfigured = !!(process.env.AZURE_OPENAI_ENDPOINT && process.env.AZURE_OPENAI_KEY);

describe.skipIf(!azureConfigured)("test service against a live deployment", () => {
  let server: ChildProcess;

  beforeAll(async () => {
    server = spawnServer(PORT);
    const ready = await waitForReady(PORT);
    expect(ready).toBe(true);
  }, 45_000);

  afterAll(async () => {
    if (server) await killServer(server);
  });

  it("reports healthy", async () => {
    const res = await fetch(`${BASE_URL}/health`, { signal: AbortSignal.timeout(API_TIMEOUT_MS) });
    const body = (await res.json()) as { status?: string };
    expect(res.status).toBe(200);
    expect(body.status).toBe("healthy");
  }, API_TIMEOUT_MS);

  it("answers a query with token usage", async () => {
    const res = await fetch(`${BASE_URL}/query`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query: "Say hello in one word" }),
      signal: AbortSignal.timeout(API_TIMEOUT_MS),
    });
    const body = (await res.json()) as { response?: string; usage?: { total_tokens?: number } };
    expect(res.status).toBe(200);
    expect(body.response?.length).toBeGreaterThan(0);
    expect(body.usage?.total_tokens).toBeGreaterThan(0);
  }, API_TIMEOUT_MS);
});
