import type { Server } from "http";
import { createApp } from "./app.js";
import { DEFAULT_PORT } from "./model-config.js";

export interface TestAppOptions {
  chatModel?: string;
  apiVersion?: string;
  port?: number;
}

/**
 * Start the test service. Options are defaults only: AZURE_OPENAI_CHAT_MODEL,
 * AZURE_OPENAI_API_VERSION and PORT in the environment take precedence.
 */
export function startTestApp(opts: TestAppOptions = {}): Server {
  if (opts.chatModel) process.env.AZURE_OPENAI_CHAT_MODEL ??= opts.chatModel;
  if (opts.apiVersion) process.env.AZURE_OPENAI_API_VERSION ??= opts.apiVersion;

  if (!process.env.AZURE_OPENAI_ENDPOINT) {
    console.warn("⚠ AZURE_OPENAI_ENDPOINT is not set. Model endpoints will not work.");
  }
  if (!process.env.AZURE_OPENAI_KEY) {
    console.warn("⚠ AZURE_OPENAI_KEY is not set. Falling back to DefaultAzureCredential.");
  }

  const port = Number(process.env.PORT) || opts.port || DEFAULT_PORT;
  const app = createApp();
  const server = app.listen(port, () => {
    console.log(`Azure OpenAI test service listening on port ${port}`);
  });
  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(`❌ Port ${port} is already in use. Set PORT to a free port and start again.`);
    } else {
      console.error(`❌ Test service failed to start: ${err.message}`);
    }
    process.exitCode = 1;
  });
  return server;
}
