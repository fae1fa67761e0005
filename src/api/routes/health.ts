import { Router } from "express";
import { complete } from "../completions.js";
import { getModelConfig } from "../model-config.js";

const router = Router();

router.get("/", (_req, res) => {
  res.json({
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

/** Live probe: a 1-token completion against the Azure chat deployment, never the OpenAI fallback. */
router.get("/health", async (_req, res) => {
  const { chatModel, endpoint } = getModelConfig();
  try {
    await complete([{ role: "user", content: "test" }], { maxTokens: 1, fallback: false });
    res.json({
      status: "healthy",
      azure_openai: "connected",
      model: chatModel,
      endpoint: endpoint ?? "not_set",
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    res.status(500).json({ status: "unhealthy", error: message });
  }
});

export default router;
