import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("openai", () => {
  class MockOpenAI {
    _opts: Record<string, unknown>;
    constructor(opts: Record<string, unknown>) {
      this._opts = opts;
    }
  }
  return {
    OpenAI: MockOpenAI,
    AzureOpenAI: class MockAzureOpenAI extends MockOpenAI {},
  };
});

const tokenProvider = vi.hoisted(() => vi.fn(async () => "mock-bearer-token"));

vi.mock("@azure/identity", () => ({
  DefaultAzureCredential: class {},
  getBearerTokenProvider: vi.fn(() => tokenProvider),
}));

describe("getClient", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
  });

  it("uses the API key when AZURE_OPENAI_KEY is set", async () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "https://test.openai.azure.com/");
    vi.stubEnv("AZURE_OPENAI_KEY", "test-key");
    vi.stubEnv("AZURE_OPENAI_API_VERSION", "");
    const { getClient } = await import("./client.js");
    const client = await getClient();
    expect((client as unknown as { _opts: unknown })._opts).toEqual({
      endpoint: "https://test.openai.azure.com/",
      apiKey: "test-key",
      apiVersion: "2024-02-01",
    });
  });

  it("falls back to an Entra token provider without a key", async () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "https://test.openai.azure.com");
    vi.stubEnv("AZURE_OPENAI_KEY", "");
    vi.stubEnv("AZURE_OPENAI_API_VERSION", "2024-06-01");
    const { getClient } = await import("./client.js");
    const { getBearerTokenProvider } = await import("@azure/identity");
    const client = await getClient();

    expect(getBearerTokenProvider).toHaveBeenCalledWith(
      expect.anything(),
      "https://cognitiveservices.azure.com/.default",
    );
    expect((client as unknown as { _opts: unknown })._opts).toEqual({
      endpoint: "https://test.openai.azure.com",
      azureADTokenProvider: tokenProvider,
      apiVersion: "2024-06-01",
    });
  });

  it("throws when AZURE_OPENAI_ENDPOINT is missing", async () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "");
    const { getClient } = await import("./client.js");
    await expect(getClient()).rejects.toThrow("AZURE_OPENAI_ENDPOINT is not set");
  });

  it("returns the same instance on subsequent calls (singleton)", async () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "https://test.openai.azure.com");
    vi.stubEnv("AZURE_OPENAI_KEY", "test-key");
    const { getClient } = await import("./client.js");
    const client1 = await getClient();
    const client2 = await getClient();
    expect(client1).toBe(client2);
  });
});

describe("getFallbackClient", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
  });

  it("returns null without OPENAI_API_KEY", async () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    const { getFallbackClient } = await import("./client.js");
    expect(getFallbackClient()).toBeNull();
  });

  it("builds a standard OpenAI client from OPENAI_API_KEY", async () => {
    vi.stubEnv("OPENAI_API_KEY", "test-openai-key");
    const { getFallbackClient } = await import("./client.js");
    const client = getFallbackClient();
    expect((client as unknown as { _opts: unknown })._opts).toEqual({ apiKey: "test-openai-key" });
    expect(getFallbackClient()).toBe(client);
  });
});
