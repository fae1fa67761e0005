import { writeFile } from "fs/promises";
import { extname, join } from "path";
import { fileURLToPath } from "url";
import type { QuickTestConfig } from "./config.js";
import { step, success } from "./log.js";

export interface TestAppOptions {
  /** URL of the module exporting `startTestApp`. */
  serverModule: string;
  chatModel: string;
  apiVersion: string;
  port: number;
  generatedAt: Date;
}

/**
 * Location of the test service entry, with the same extension as this module so it
 * resolves both from sources (tsx) and from the compiled `dist/` tree.
 */
export function serverModuleUrl(moduleUrl: string = import.meta.url): string {
  const ext = extname(fileURLToPath(moduleUrl));
  return new URL(`../api/server${ext}`, moduleUrl).href;
}

/** Source text of the generated test application. */
export function renderTestApp(opts: TestAppOptions): string {
  return [
    `// Generated by azure-openai-quicktest on ${opts.generatedAt.toISOString()}.`,
    "// This file is overwritten on every run.",
    "//",
    "// Start:  node --import tsx quick-test-app.mts",
    "// Needs AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_KEY in the environment.",
    `import { startTestApp } from ${JSON.stringify(opts.serverModule)};`,
    "",
    "startTestApp({",
    `  chatModel: ${JSON.stringify(opts.chatModel)},`,
    `  apiVersion: ${JSON.stringify(opts.apiVersion)},`,
    `  port: ${opts.port},`,
    "});",
    "",
  ].join("\n");
}

/** Write the test application into `dir`, replacing any previous copy. Returns its path. */
export async function writeTestApp(config: QuickTestConfig, dir: string = process.cwd(), now: Date = new Date()): Promise<string> {
  step("Creating simple test application...");
  const file = join(dir, config.appFile);
  const source = renderTestApp({
    serverModule: serverModuleUrl(),
    chatModel: config.chat.deploymentName,
    apiVersion: config.apiVersion,
    port: config.appPort,
    generatedAt: now,
  });
  await writeFile(file, source, "utf-8");
  success(`Test application written to ${file}`);
  return file;
}
