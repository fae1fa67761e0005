import { Router } from "express";
import { complete, replyText } from "../completions.js";
import { quickAnswer } from "../knowledge.js";
import { DEFAULT_QUERY, SYSTEM_PROMPT } from "../model-config.js";

const router = Router();

router.post("/query", async (req, res) => {
  const start = performance.now();
  const query: unknown = req.body?.query;
  const userQuery = typeof query === "string" && query.trim().length > 0 ? query : DEFAULT_QUERY;

  const answer = quickAnswer(userQuery);
  if (answer !== undefined) {
    res.json({
      query: userQuery,
      response: answer,
      provider: "knowledge_base",
      cached: true,
      response_time: (performance.now() - start) / 1000,
    });
    return;
  }

  try {
    const reply = await complete(
      [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: userQuery },
      ],
      { maxTokens: 500, temperature: 0.1 },
    );
    const { usage } = reply.completion;

    res.json({
      query: userQuery,
      response: replyText(reply.completion),
      model: reply.model,
      provider: reply.provider,
      usage: {
        prompt_tokens: usage?.prompt_tokens ?? 0,
        completion_tokens: usage?.completion_tokens ?? 0,
        total_tokens: usage?.total_tokens ?? 0,
      },
      response_time: reply.responseTime,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : "Internal server error";
    res.status(500).json({ error: message });
  }
});

export default router;
