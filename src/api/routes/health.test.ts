import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import request from "supertest";
import express from "express";

vi.mock("../client.js", () => ({
  getClient: vi.fn(),
  getFallbackClient: vi.fn(() => null),
}));

import healthRoutes from "./health.js";
import { getClient } from "../client.js";

function createApp() {
  const app = express();
  app.use(healthRoutes);
  return app;
}

function mockCreate(create: Mock) {
  (getClient as Mock).mockResolvedValue({ chat: { completions: { create } } });
}

describe("GET /", () => {
  it("describes the service and its routes", async () => {
    const res = await request(createApp()).get("/");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      message: "Azure OpenAI Quick Test Service",
      status: "running",
      endpoints: {
        health: "/health",
        query: "/query (POST)",
        test: "/test",
        metrics: "/metrics",
      },
    });
  });
});

describe("GET /health", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.unstubAllEnvs();
  });

  it("returns healthy after a 1-token probe", async () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "https://test.openai.azure.com/");
    vi.stubEnv("AZURE_OPENAI_CHAT_MODEL", "");
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: "ok" } }] });
    mockCreate(create);

    const res = await request(createApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "healthy",
      azure_openai: "connected",
      model: "gpt-4",
      endpoint: "https://test.openai.azure.com/",
    });
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4",
      messages: [{ role: "user", content: "test" }],
      max_tokens: 1,
      temperature: undefined,
    });
  });

  it("returns 500 unhealthy when the probe fails", async () => {
    mockCreate(vi.fn().mockRejectedValue(new Error("401 Access denied")));

    const res = await request(createApp()).get("/health");
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: "unhealthy", error: "401 Access denied" });
  });

  it("returns 500 when the client can't be created", async () => {
    (getClient as Mock).mockRejectedValue(new Error("AZURE_OPENAI_ENDPOINT is not set"));

    const res = await request(createApp()).get("/health");
    expect(res.status).toBe(500);
    expect(res.body.error).toBe("AZURE_OPENAI_ENDPOINT is not set");
  });
});
