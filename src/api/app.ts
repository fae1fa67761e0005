import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import healthRoutes from "./routes/health.js";
import queryRoutes from "./routes/query.js";
import sweepRoutes from "./routes/sweep.js";
import metricsRoutes from "./routes/metrics.js";

export function parseAllowedOrigins(raw: string | undefined): string[] {
  return (raw?.split(",") ?? []).map((o) => o.trim()).filter(Boolean);
}

/** Errors that escape a route, including malformed JSON bodies, answer 500 `{ error }`. */
const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
  const message = err instanceof Error ? err.message : "Internal server error";
  res.status(500).json({ error: message });
};

export function createApp(): express.Express {
  const app = express();

  const allowedOrigins = parseAllowedOrigins(process.env.ALLOWED_ORIGINS);
  app.use(cors(allowedOrigins.length > 0 ? { origin: allowedOrigins } : undefined));
  app.use(express.json({ limit: "1mb" }));
  app.use(healthRoutes);
  app.use(queryRoutes);
  app.use(sweepRoutes);
  app.use(metricsRoutes);
  app.use(handleError);

  return app;
}
