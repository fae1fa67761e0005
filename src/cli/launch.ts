import { spawn } from "child_process";
import { createInterface } from "readline/promises";
import type { Credentials } from "./credentials.js";

/** True when a person can answer a prompt: stdin is a terminal and CI is unset or empty. */
export function isInteractive(
  stdin: { isTTY?: boolean } = process.stdin,
  env: Record<string, string | undefined> = process.env,
): boolean {
  if (env.CI) return false;

  if (!stdin.isTTY) return false;

  return true;
}

/** Ask a y/N question. Anything other than an answer starting with "y" is a no. */
export async function promptYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} (y/N): `);
    return /^y/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/** Environment for the test application: the parent env plus the run's credentials. */
export function appEnv(credentials: Credentials, port: number): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  env.AZURE_OPENAI_ENDPOINT = credentials.endpoint;
  env.AZURE_OPENAI_KEY = credentials.key;
  if (!env.PORT) env.PORT = String(port);
  return env;
}

/** URL of the tsx loader, resolved from this package: the working directory may not have it installed. */
export function tsxLoader(): string {
  return import.meta.resolve("tsx");
}

/** Run the generated app in the foreground until it exits (Ctrl+C stops it). Resolves with its exit code. */
export function launchTestApp(file: string, env: Record<string, string>, loader: string = tsxLoader()): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(process.execPath, ["--import", loader, file], {
      env,
      stdio: "inherit",
    });
    child.on("error", () => resolve(1));
    child.on("close", (code) => resolve(code ?? 0));
  });
}
