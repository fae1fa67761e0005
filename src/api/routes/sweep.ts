import { Router } from "express";
import { type Provider, complete, replyText } from "../completions.js";
import { quickAnswer } from "../knowledge.js";

const router = Router();

export const TEST_QUERIES = [
  "What is fiber cement lap siding?",
  "How do I install lap siding?",
  "What tools do I need for installation?",
  "What are the fastener requirements for fiber cement siding?",
];

const PREVIEW_LENGTH = 200;

type SweepResult =
  | { query: string; response: string; provider: Provider | "knowledge_base"; status: "success" }
  | { query: string; error: string; status: "failed" };

/** First PREVIEW_LENGTH code points, so a surrogate pair is never split. */
export function preview(text: string): string {
  return Array.from(text).slice(0, PREVIEW_LENGTH).join("") + "...";
}

/** Canned regression sweep. Each query is independent; one failure doesn't stop the rest. */
router.get("/test", async (_req, res) => {
  const results: SweepResult[] = [];

  for (const query of TEST_QUERIES) {
    const answer = quickAnswer(query);
    if (answer !== undefined) {
      results.push({ query, response: preview(answer), provider: "knowledge_base", status: "success" });
      continue;
    }

    try {
      const reply = await complete(
        [
          { role: "system", content: "You are a fiber cement siding technical expert." },
          { role: "user", content: query },
        ],
        { maxTokens: 100, temperature: 0.1 },
      );
      results.push({
        query,
        response: preview(replyText(reply.completion)),
        provider: reply.provider,
        status: "success",
      });
    } catch (err) {
      results.push({
        query,
        error: err instanceof Error ? err.message : String(err),
        status: "failed",
      });
    }
  }

  res.json({
    test_results: results,
    total_tests: TEST_QUERIES.length,
    passed: results.filter((r) => r.status === "success").length,
  });
});

export default router;
